import { registerAs } from '@nestjs/config';
import { parseEnv } from './env.schema';

/**
 * Tunables for the retrieval pipeline. `topK` and `similarityThreshold`
 * depend on the embedding model in use and are meant to be tuned per deployment.
 */
export interface RagSettings {
  profilePath: string;
  profileOwner: string;
  indexStorePath?: string;
  rebuildEnabled: boolean;
  /** Minimum wait after a failed build before a query triggers another attempt */
  recoveryCooldownMs: number;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  similarityThreshold: number;
  maxContextLength: number;
  dedupeOverlap: number;
  embeddingBatchSize: number;
  embeddingMaxRetries: number;
  embeddingRetryDelayMs: number;
  embeddingTimeoutMs: number;
  generationTimeoutMs: number;
}

export default registerAs('rag', (): RagSettings => {
  const env = parseEnv(process.env);
  return {
    profilePath: env.PROFILE_PATH,
    profileOwner: env.PROFILE_OWNER,
    indexStorePath: env.INDEX_STORE_PATH?.trim() || undefined,
    rebuildEnabled: env.INDEX_REBUILD_ENABLED,
    recoveryCooldownMs: env.INDEX_RECOVERY_COOLDOWN_MS,
    chunkSize: env.RAG_CHUNK_SIZE,
    chunkOverlap: env.RAG_CHUNK_OVERLAP,
    topK: env.RAG_TOP_K,
    similarityThreshold: env.RAG_SIMILARITY_THRESHOLD,
    maxContextLength: env.RAG_MAX_CONTEXT_LENGTH,
    dedupeOverlap: env.RAG_DEDUPE_OVERLAP,
    embeddingBatchSize: env.EMBEDDING_BATCH_SIZE,
    embeddingMaxRetries: env.EMBEDDING_MAX_RETRIES,
    embeddingRetryDelayMs: env.EMBEDDING_RETRY_DELAY_MS,
    embeddingTimeoutMs: env.EMBEDDING_TIMEOUT_MS,
    generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
  };
});
