import { Module } from '@nestjs/common';
import { RagModule } from '../rag/rag.module';
import { ChatController } from './chat.controller';
import { IndexController } from './index.controller';

/**
 * API Module - chat and index administration endpoints
 */
@Module({
  imports: [RagModule],
  controllers: [ChatController, IndexController],
})
export class ApiModule { }
