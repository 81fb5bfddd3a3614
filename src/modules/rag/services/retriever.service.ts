import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagSettings } from '../../../config/rag.config';
import { EmbeddingUnavailableException } from '../../../common/exceptions/rag.exceptions';
import { withTimeout } from '../../../common/utils/async.util';
import { errorMessage } from '../../../common/utils/error.util';
import { VectorIndex } from '../../vector-store/vector-index';
import { validateEmbeddingDim } from '../../vector-store/vector.utils';
import { EMBEDDER, Embedder } from '../interfaces/model-provider.interface';
import { RetrievedChunk } from '../types';

/**
 * Retriever Service
 *
 * Embeds the question and keeps the top-k chunks scoring at or above the
 * relevance threshold. An empty result means "nothing relevant", not a failure.
 */
@Injectable()
export class RetrieverService {
    private readonly logger = new Logger(RetrieverService.name);
    private readonly settings: RagSettings;

    constructor(
        private readonly configService: ConfigService,
        @Inject(EMBEDDER) private readonly embedder: Embedder,
    ) {
        this.settings = this.configService.getOrThrow<RagSettings>('rag');
    }

    async retrieve(question: string, index: VectorIndex): Promise<RetrievedChunk[]> {
        const queryVector = await this.embedQuestion(question, index.dimension);

        const candidates = index.search(queryVector, this.settings.topK);
        const relevant = candidates
            .filter((candidate) => candidate.score >= this.settings.similarityThreshold)
            .map((candidate, rank) => ({ ...candidate, rank }));

        this.logger.debug(
            `🔍 Retrieved ${relevant.length}/${candidates.length} chunks above ${this.settings.similarityThreshold} ` +
                `(scores: ${candidates.map((c) => c.score.toFixed(3)).join(', ') || 'none'})`,
        );
        return relevant;
    }

    /**
     * Single attempt at query time: a retry would only delay the error the caller gets anyway.
     */
    private async embedQuestion(question: string, dimension: number): Promise<number[]> {
        try {
            const vector = await withTimeout(
                (signal) => this.embedder.embed(question, signal),
                this.settings.embeddingTimeoutMs,
                'Query embedding',
            );
            validateEmbeddingDim(vector, dimension);
            return vector;
        } catch (error) {
            this.logger.error(`❌ Failed to embed question: ${errorMessage(error)}`);
            throw new EmbeddingUnavailableException(errorMessage(error), error);
        }
    }
}
