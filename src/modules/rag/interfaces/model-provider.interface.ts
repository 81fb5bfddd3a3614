import { GenerationRequest } from '../types';

export const EMBEDDER = Symbol('EMBEDDER');
export const TEXT_GENERATOR = Symbol('TEXT_GENERATOR');

/**
 * Maps text to a fixed-dimension vector. Implementations must be
 * deterministic for a given model and keep the input order in `embedBatch`.
 * An aborted `signal` must cancel the underlying request.
 */
export interface Embedder {
    readonly embeddingModel: string;
    embed(text: string, signal?: AbortSignal): Promise<number[]>;
    embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * Produces free text for a fully assembled prompt.
 */
export interface TextGenerator {
    readonly chatModel: string;
    generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}
