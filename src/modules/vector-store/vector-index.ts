import { Chunk, IndexedChunk, IndexStats, RetrievedChunk } from '../rag/types';
import { cosineSimilarity, validateEmbeddingDim, validateEmbeddingValues } from './vector.utils';

export interface IndexEntry {
    readonly chunk: Chunk;
    readonly embedding: readonly number[];
}

export interface VectorIndexMetadata {
    embeddingModel: string;
    documentHash: string;
    builtAt: string;
}

/**
 * Immutable in-memory vector index over the profile chunks.
 *
 * Every entry shares the same dimension, fixed at construction. Nothing
 * mutates an instance after construction, so concurrent searches need no locking;
 * a rebuild produces a new instance instead.
 */
export class VectorIndex {
    readonly dimension: number;
    private readonly entries: readonly IndexEntry[];

    constructor(entries: IndexedChunk[], readonly metadata: VectorIndexMetadata) {
        if (entries.length === 0) {
            throw new Error('Cannot create an empty vector index');
        }

        this.dimension = entries[0].embedding.length;
        if (this.dimension === 0) {
            throw new Error('Embeddings must have at least one dimension');
        }

        const seen = new Set<string>();
        for (const entry of entries) {
            validateEmbeddingDim(entry.embedding, this.dimension);
            validateEmbeddingValues(entry.embedding);
            if (seen.has(entry.chunk.id)) {
                throw new Error(`Duplicate chunk id: ${entry.chunk.id}`);
            }
            seen.add(entry.chunk.id);
        }

        this.entries = Object.freeze(
            entries.map(
                (entry): IndexEntry =>
                    Object.freeze({
                        chunk: Object.freeze({ ...entry.chunk, metadata: Object.freeze({ ...entry.chunk.metadata }) }),
                        embedding: Object.freeze([...entry.embedding]),
                    }),
            ),
        );
    }

    get size(): number {
        return this.entries.length;
    }

    /** Entries in insertion (document) order */
    getEntries(): readonly IndexEntry[] {
        return this.entries;
    }

    /**
     * Top-k chunks by cosine similarity, highest first. Equal scores keep
     * insertion order. `k` larger than the index returns every chunk.
     */
    search(queryVector: readonly number[], k: number): RetrievedChunk[] {
        validateEmbeddingDim(queryVector, this.dimension);
        if (k <= 0) {
            return [];
        }

        return this.entries
            .map((entry, position) => ({
                chunk: entry.chunk,
                score: cosineSimilarity(queryVector, entry.embedding),
                position,
            }))
            .sort((a, b) => b.score - a.score || a.position - b.position)
            .slice(0, Math.floor(k))
            .map(({ chunk, score }, rank) => ({ chunk, score, rank }));
    }

    getStats(): IndexStats {
        return {
            chunkCount: this.size,
            dimension: this.dimension,
            embeddingModel: this.metadata.embeddingModel,
            documentHash: this.metadata.documentHash,
            builtAt: this.metadata.builtAt,
        };
    }
}
