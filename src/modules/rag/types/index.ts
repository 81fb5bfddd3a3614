/**
 * Core RAG Type Definitions
 */

/**
 * A bounded, contiguous slice of the profile document.
 * `text` is exactly `document.slice(startIndex, endIndex)`.
 */
export interface Chunk {
    id: string;
    text: string;
    startIndex: number;
    endIndex: number;
    metadata: ChunkMetadata;
}

export interface ChunkMetadata {
    chunkIndex: number;
    totalChunks: number;
    /** Nearest Markdown heading above the chunk, without the leading hashes */
    heading?: string;
}

/**
 * Chunking options
 */
export interface ChunkingOptions {
    chunkSize: number;
    overlap: number;
}

export interface IndexedChunk {
    chunk: Chunk;
    embedding: number[];
}

/**
 * Search result from the vector index
 */
export interface RetrievedChunk {
    chunk: Chunk;
    /** Cosine similarity in [-1, 1] */
    score: number;
    /** 0-based position in the result list */
    rank: number;
}

export interface AssembledContext {
    chunks: RetrievedChunk[];
    text: string;
    length: number;
}

export interface GenerationRequest {
    systemPrompt: string;
    userPrompt: string;
}

export interface AnswerResult {
    answer: string;
    /** False when the fallback answer was returned without a model call */
    grounded: boolean;
    sources: RetrievedChunk[];
}

/**
 * Query response
 */
export interface QueryResponse extends AnswerResult {
    question: string;
}

export interface IndexStats {
    chunkCount: number;
    dimension: number;
    embeddingModel: string;
    documentHash: string;
    builtAt: string;
}
