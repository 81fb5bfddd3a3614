import { registerAs } from '@nestjs/config';
import { parseEnv } from './env.schema';

export interface OpenAISettings {
  apiKey: string;
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  maxTokens: number;
}

export default registerAs('openai', (): OpenAISettings => {
  const env = parseEnv(process.env);
  return {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    chatModel: env.OPENAI_MODEL,
    embeddingModel: env.OPENAI_EMBEDDING_MODEL,
    temperature: env.OPENAI_TEMPERATURE,
    maxTokens: env.OPENAI_MAX_TOKENS,
  };
});
