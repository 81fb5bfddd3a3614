import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { RagModule } from '../rag/rag.module';
import { HealthController } from './health.controller';
import { IndexHealthIndicator } from './index.health';

@Module({
  imports: [TerminusModule, RagModule],
  controllers: [HealthController],
  providers: [IndexHealthIndicator],
})
export class HealthModule { }
