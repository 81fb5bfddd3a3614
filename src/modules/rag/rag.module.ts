import { Module } from '@nestjs/common';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { EMBEDDER, TEXT_GENERATOR } from './interfaces/model-provider.interface';
import { AnswerGeneratorService } from './services/answer-generator.service';
import { ChunkerService } from './services/chunker.service';
import { ContextAssemblerService } from './services/context-assembler.service';
import { DocumentService } from './services/document.service';
import { IndexManagerService } from './services/index-manager.service';
import { OpenAIService } from './services/openai.service';
import { PromptBuilderService } from './services/prompt-builder.service';
import { RagService } from './services/rag.service';
import { ReadinessService } from './services/readiness.service';
import { RetrieverService } from './services/retriever.service';

/**
 * RAG Module - profile retrieval pipeline
 *
 * The embedder and generator are bound through tokens; swap OpenAIService to
 * target another provider.
 */
@Module({
    imports: [VectorStoreModule],
    providers: [
        OpenAIService,
        { provide: EMBEDDER, useExisting: OpenAIService },
        { provide: TEXT_GENERATOR, useExisting: OpenAIService },
        ReadinessService,
        DocumentService,
        ChunkerService,
        IndexManagerService,
        RetrieverService,
        ContextAssemblerService,
        PromptBuilderService,
        AnswerGeneratorService,
        RagService,
    ],
    exports: [RagService, IndexManagerService, ReadinessService],
})
export class RagModule { }
