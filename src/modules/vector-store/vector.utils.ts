/**
 * Utility functions for vector operations
 */

/**
 * Validate embedding dimension
 */
export function validateEmbeddingDim(embedding: readonly number[], expectedDim: number): void {
    if (embedding.length !== expectedDim) {
        throw new Error(`Embedding dimension mismatch: expected ${expectedDim}, got ${embedding.length}`);
    }
}

/**
 * Validate embedding values
 */
export function validateEmbeddingValues(embedding: readonly number[]): void {
    for (let i = 0; i < embedding.length; i++) {
        if (!Number.isFinite(embedding[i])) {
            throw new Error(`Invalid embedding value at index ${i}: ${embedding[i]}`);
        }
    }
}

/**
 * Calculate cosine similarity between two embeddings. A zero vector has no
 * direction and scores 0 against everything. The result is clamped to [-1, 1]
 * to absorb floating point drift.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error('Embeddings must have the same dimension');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
        dotProduct += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);

    if (denominator === 0) {
        return 0;
    }

    return Math.max(-1, Math.min(1, dotProduct / denominator));
}
