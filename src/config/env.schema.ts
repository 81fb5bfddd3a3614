import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

export const envSchema = z
  .object({
    // Application
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    CORS_ORIGINS: z.string().default('*'),

    // OpenAI-compatible model provider
    OPENAI_API_KEY: z.string().min(1),
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(800),

    // Profile document & index
    PROFILE_PATH: z.string().default('data/profile.md'),
    PROFILE_OWNER: z.string().default('the profile owner'),
    INDEX_STORE_PATH: z.string().optional(),
    INDEX_REBUILD_ENABLED: booleanString,
    INDEX_RECOVERY_COOLDOWN_MS: z.coerce.number().int().min(0).default(30000),

    // RAG Pipeline Configuration
    RAG_CHUNK_SIZE: z.coerce.number().int().min(100).max(10000).default(1000),
    RAG_CHUNK_OVERLAP: z.coerce.number().int().min(0).default(150),
    RAG_TOP_K: z.coerce.number().int().positive().default(4),
    RAG_SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.3),
    RAG_MAX_CONTEXT_LENGTH: z.coerce.number().int().positive().default(4000),
    RAG_DEDUPE_OVERLAP: z.coerce.number().gt(0).max(1).default(0.5),

    // External call budgets
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(64),
    EMBEDDING_MAX_RETRIES: z.coerce.number().int().positive().default(3),
    EMBEDDING_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  })
  .superRefine((env, ctx) => {
    if (env.RAG_CHUNK_OVERLAP >= env.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_CHUNK_OVERLAP'],
        message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
      });
    }
    if (env.RAG_MAX_CONTEXT_LENGTH < env.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_MAX_CONTEXT_LENGTH'],
        message: 'RAG_MAX_CONTEXT_LENGTH must be at least RAG_CHUNK_SIZE',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parses raw environment variables, throwing with every failing key listed.
 */
export function parseEnv(raw: Record<string, unknown>): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Environment validation failed: ${issues}`);
  }
  return result.data;
}
