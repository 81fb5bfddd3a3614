import { Module } from '@nestjs/common';
import { IndexStoreService } from './index-store.service';

/**
 * Vector Store Module - in-process index persistence
 */
@Module({
    providers: [IndexStoreService],
    exports: [IndexStoreService],
})
export class VectorStoreModule { }
