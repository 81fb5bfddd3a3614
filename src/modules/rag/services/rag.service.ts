import { Injectable, Logger } from '@nestjs/common';
import { InvalidInputException } from '../../../common/exceptions/rag.exceptions';
import { errorMessage } from '../../../common/utils/error.util';
import { QueryResponse } from '../types';
import { AnswerGeneratorService } from './answer-generator.service';
import { ContextAssemblerService } from './context-assembler.service';
import { IndexManagerService } from './index-manager.service';
import { RetrieverService } from './retriever.service';

/**
 * RAG Service - question in, grounded answer out
 */
@Injectable()
export class RagService {
    private readonly logger = new Logger(RagService.name);

    constructor(
        private readonly indexManager: IndexManagerService,
        private readonly retriever: RetrieverService,
        private readonly contextAssembler: ContextAssemblerService,
        private readonly answerGenerator: AnswerGeneratorService,
    ) { }

    /**
     * Query RAG pipeline
     *
     * @throws {InvalidInputException} blank question, before any model call
     * @throws {IndexNotReadyException} index not READY, without waiting
     * @throws {EmbeddingUnavailableException | GenerationUnavailableException} provider failures
     */
    async ask(rawQuestion: string): Promise<QueryResponse> {
        const question = rawQuestion.trim();
        if (question.length === 0) {
            throw new InvalidInputException();
        }

        const index = this.indexManager.getReadyIndex();

        try {
            const startTime = Date.now();
            this.logger.log(`🔍 RAG Query: "${question}"`);

            const results = await this.retriever.retrieve(question, index);
            const context = this.contextAssembler.assemble(results);
            const retrievalEnd = Date.now();

            const result = await this.answerGenerator.generate(question, context);
            const endTime = Date.now();

            this.logger.log(
                `✅ Answered in ${endTime - startTime}ms ` +
                    `(retrieval ${retrievalEnd - startTime}ms, generation ${endTime - retrievalEnd}ms, ` +
                    `grounded=${result.grounded}, sources=${result.sources.length})`,
            );

            return { question, ...result };
        } catch (error) {
            this.logger.error(`❌ RAG query failed: ${errorMessage(error)}`);
            throw error;
        }
    }
}
