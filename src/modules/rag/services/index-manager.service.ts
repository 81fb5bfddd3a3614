import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagSettings } from '../../../config/rag.config';
import {
    EmbeddingUnavailableException,
    IndexBuildException,
    IndexNotReadyException,
} from '../../../common/exceptions/rag.exceptions';
import { batchArray, withRetryAndTimeout } from '../../../common/utils/async.util';
import { errorMessage } from '../../../common/utils/error.util';
import { createContentHash } from '../../../common/utils/hash.util';
import { IndexFingerprint, IndexStoreService } from '../../vector-store/index-store.service';
import { VectorIndex } from '../../vector-store/vector-index';
import { EMBEDDER, Embedder } from '../interfaces/model-provider.interface';
import { Chunk, IndexStats } from '../types';
import { ChunkerService } from './chunker.service';
import { DocumentService } from './document.service';
import { ReadinessService, ReadinessState } from './readiness.service';

export interface BuildOptions {
    /** Reuse a compatible index from INDEX_STORE_PATH instead of re-embedding */
    useStore?: boolean;
}

/**
 * Owns the published vector index.
 *
 * A build chunks the profile, embeds every chunk and only then swaps the new
 * index in; a failed build leaves the previous index (if any) untouched but
 * marks readiness FAILED. Concurrent build requests share one in-flight run.
 * While FAILED, a query starts a new background build once the recovery
 * cooldown has passed.
 */
@Injectable()
export class IndexManagerService implements OnApplicationBootstrap {
    private readonly logger = new Logger(IndexManagerService.name);
    private readonly settings: RagSettings;
    private current: VectorIndex | null = null;
    private inFlight: Promise<IndexStats> | null = null;
    private lastFailureAt = 0;

    constructor(
        private readonly configService: ConfigService,
        private readonly readiness: ReadinessService,
        private readonly documentService: DocumentService,
        private readonly chunkerService: ChunkerService,
        private readonly indexStore: IndexStoreService,
        @Inject(EMBEDDER) private readonly embedder: Embedder,
    ) {
        this.settings = this.configService.getOrThrow<RagSettings>('rag');
    }

    /**
     * Kick off the startup build without holding up the HTTP listener, so
     * /health can report `degraded` while it runs.
     */
    onApplicationBootstrap(): void {
        this.build({ useStore: true }).catch((error: unknown) => {
            this.logger.error(`❌ Startup index build failed; serving degraded until a rebuild succeeds: ${errorMessage(error)}`);
        });
    }

    /**
     * Build (or rebuild) the index. Joins the running build if there is one.
     */
    build(options: BuildOptions = {}): Promise<IndexStats> {
        if (this.inFlight) {
            this.logger.log(`⏳ Index build already running; joining it`);
            return this.inFlight;
        }

        const run = this.runBuild(options).finally(() => {
            this.inFlight = null;
        });
        this.inFlight = run;
        return run;
    }

    /** The running build, if any */
    getInFlightBuild(): Promise<IndexStats> | null {
        return this.inFlight;
    }

    /**
     * The published index. Callers capture it once per request.
     * @throws {IndexNotReadyException} unless readiness is READY
     */
    getReadyIndex(): VectorIndex {
        if (!this.readiness.isReady() || !this.current) {
            this.recoverIfFailed();
            throw new IndexNotReadyException();
        }
        return this.current;
    }

    private recoverIfFailed(): void {
        if (this.readiness.getState() !== ReadinessState.FAILED || this.inFlight) {
            return;
        }
        if (Date.now() - this.lastFailureAt < this.settings.recoveryCooldownMs) {
            return;
        }

        this.logger.log(`🔁 Index is FAILED; retrying the build in the background`);
        this.build({ useStore: true }).catch((error: unknown) => {
            this.logger.error(`❌ Recovery build failed: ${errorMessage(error)}`);
        });
    }

    private async runBuild({ useStore = false }: BuildOptions): Promise<IndexStats> {
        this.readiness.beginBuild();
        const startTime = Date.now();

        try {
            const document = await this.loadDocument();
            const chunkingOptions = this.chunkerService.getDefaultOptions();
            const chunks = this.chunkerService.chunkDocument(document, chunkingOptions);
            if (chunks.length === 0) {
                throw new IndexBuildException('Profile document is empty');
            }

            const fingerprint: IndexFingerprint = {
                documentHash: createContentHash(document),
                chunkSize: chunkingOptions.chunkSize,
                chunkOverlap: chunkingOptions.overlap,
                embeddingModel: this.embedder.embeddingModel,
            };

            let index = useStore && this.indexStore.isEnabled() ? await this.indexStore.load(fingerprint) : null;
            if (!index) {
                index = await this.embedChunks(chunks, fingerprint);
                await this.indexStore.save(index, fingerprint);
            }

            this.current = index;
            const stats = index.getStats();
            this.readiness.markReady(stats);

            this.logger.log(`✅ Index ready: ${stats.chunkCount} chunks, ${stats.dimension} dimensions (${Date.now() - startTime}ms)`);
            return stats;
        } catch (error) {
            const failure =
                error instanceof IndexBuildException ? error : new IndexBuildException(errorMessage(error), error);
            this.readiness.markFailed(failure.reason);
            this.lastFailureAt = Date.now();
            this.logger.error(`❌ Index build failed after ${Date.now() - startTime}ms: ${failure.reason}`);
            throw failure;
        }
    }

    private async loadDocument(): Promise<string> {
        try {
            return await this.documentService.load();
        } catch (error) {
            throw new IndexBuildException(
                `Cannot read profile document at ${this.documentService.getSourcePath()}: ${errorMessage(error)}`,
                error,
            );
        }
    }

    private async embedChunks(chunks: Chunk[], fingerprint: IndexFingerprint): Promise<VectorIndex> {
        const batches = batchArray(chunks, this.settings.embeddingBatchSize);
        const embeddings: number[][] = [];

        this.logger.log(`🔄 Embedding ${chunks.length} chunks in ${batches.length} batch(es)`);

        for (const [i, batch] of batches.entries()) {
            const operationName = `Embedding batch ${i + 1}/${batches.length}`;
            try {
                const vectors = await withRetryAndTimeout((signal) => this.embedder.embedBatch(batch.map((c) => c.text), signal), {
                    maxRetries: this.settings.embeddingMaxRetries,
                    timeoutMs: this.settings.embeddingTimeoutMs,
                    initialDelayMs: this.settings.embeddingRetryDelayMs,
                    operationName,
                    onRetry: (error, attempt, delayMs) =>
                        this.logger.warn(`⚠️ ${operationName} attempt ${attempt} failed (${error.message}); retrying in ${delayMs}ms`),
                });
                if (vectors.length !== batch.length) {
                    throw new Error(`expected ${batch.length} vectors, received ${vectors.length}`);
                }
                embeddings.push(...vectors);
            } catch (error) {
                const reason = `${operationName} failed after ${this.settings.embeddingMaxRetries} attempt(s): ${errorMessage(error)}`;
                throw new IndexBuildException(reason, new EmbeddingUnavailableException(reason, error));
            }
        }

        return new VectorIndex(
            chunks.map((chunk, i) => ({ chunk, embedding: embeddings[i] })),
            {
                embeddingModel: fingerprint.embeddingModel,
                documentHash: fingerprint.documentHash,
                builtAt: new Date().toISOString(),
            },
        );
    }
}
