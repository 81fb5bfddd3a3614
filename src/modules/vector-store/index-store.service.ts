import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { RagSettings } from '../../config/rag.config';
import { errorMessage } from '../../common/utils/error.util';
import { VectorIndex } from './vector-index';

const STORE_VERSION = 1;

/**
 * Everything that must match for a stored index to be reused. A different
 * document, chunking setup or embedding model means a cold rebuild.
 */
export interface IndexFingerprint {
    documentHash: string;
    chunkSize: number;
    chunkOverlap: number;
    embeddingModel: string;
}

const chunkSchema = z.object({
    id: z.string().min(1),
    text: z.string().min(1),
    startIndex: z.number().int().min(0),
    endIndex: z.number().int().min(0),
    metadata: z.object({
        chunkIndex: z.number().int().min(0),
        totalChunks: z.number().int().min(1),
        heading: z.string().optional(),
    }),
});

const storeFileSchema = z.object({
    version: z.literal(STORE_VERSION),
    meta: z.object({
        documentHash: z.string(),
        chunkSize: z.number(),
        chunkOverlap: z.number(),
        embeddingModel: z.string(),
        dimension: z.number().int().positive(),
        builtAt: z.string(),
    }),
    entries: z.array(z.object({ chunk: chunkSchema, embedding: z.array(z.number()) })).min(1),
});

/**
 * Persists the vector index as a JSON file so a restart with an unchanged
 * profile skips re-embedding. Disabled when INDEX_STORE_PATH is unset.
 */
@Injectable()
export class IndexStoreService {
    private readonly logger = new Logger(IndexStoreService.name);
    private readonly storePath?: string;

    constructor(private readonly configService: ConfigService) {
        this.storePath = this.configService.getOrThrow<RagSettings>('rag').indexStorePath;
    }

    isEnabled(): boolean {
        return this.storePath !== undefined;
    }

    /**
     * Load a previously saved index. Returns null when nothing usable is stored:
     * no file, unreadable or malformed content, or a fingerprint mismatch.
     */
    async load(expected: IndexFingerprint): Promise<VectorIndex | null> {
        if (!this.storePath) {
            return null;
        }

        let raw: string;
        try {
            raw = await fs.readFile(this.storePath, 'utf8');
        } catch (error) {
            if (isNotFound(error)) {
                this.logger.log(`📂 No stored index at ${this.storePath}`);
            } else {
                this.logger.warn(`⚠️ Failed to read stored index at ${this.storePath}: ${errorMessage(error)}`);
            }
            return null;
        }

        try {
            const parsed = storeFileSchema.safeParse(JSON.parse(raw));
            if (!parsed.success) {
                this.logger.warn(`⚠️ Stored index at ${this.storePath} is malformed. Performing cold rebuild.`);
                return null;
            }

            const { meta, entries } = parsed.data;
            if (
                meta.documentHash !== expected.documentHash ||
                meta.chunkSize !== expected.chunkSize ||
                meta.chunkOverlap !== expected.chunkOverlap ||
                meta.embeddingModel !== expected.embeddingModel
            ) {
                this.logger.log(`🔄 Stored index is stale (document, chunking or model changed). Performing cold rebuild.`);
                return null;
            }

            const index = new VectorIndex(entries, {
                embeddingModel: meta.embeddingModel,
                documentHash: meta.documentHash,
                builtAt: meta.builtAt,
            });
            if (index.dimension !== meta.dimension) {
                this.logger.warn(`⚠️ Stored index dimension mismatch. Performing cold rebuild.`);
                return null;
            }

            this.logger.log(`✅ Loaded stored index: ${index.size} chunks`);
            return index;
        } catch (error) {
            this.logger.warn(`⚠️ Failed to load stored index at ${this.storePath}: ${errorMessage(error)}`);
            return null;
        }
    }

    /**
     * Persist the index. Write failures are logged, never thrown: the cache is optional.
     */
    async save(index: VectorIndex, fingerprint: IndexFingerprint): Promise<void> {
        if (!this.storePath) {
            return;
        }

        const out: z.infer<typeof storeFileSchema> = {
            version: STORE_VERSION,
            meta: {
                ...fingerprint,
                dimension: index.dimension,
                builtAt: index.metadata.builtAt,
            },
            entries: index.getEntries().map((entry) => ({
                chunk: entry.chunk,
                embedding: Array.from(entry.embedding),
            })),
        };

        try {
            await fs.mkdir(path.dirname(this.storePath), { recursive: true });
            const tmpPath = `${this.storePath}.tmp`;
            await fs.writeFile(tmpPath, JSON.stringify(out));
            await fs.rename(tmpPath, this.storePath);
            this.logger.log(`💾 Persisted index to ${this.storePath}`);
        } catch (error) {
            this.logger.error(`❌ Failed to save index store: ${errorMessage(error)}`);
        }
    }
}

function isNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
