import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { AppSettings } from '../../src/config/app.config';
import { OpenAISettings } from '../../src/config/openai.config';
import { RagSettings } from '../../src/config/rag.config';

export const FIXTURE_PROFILE = path.join(__dirname, '..', 'fixtures', 'profile.md');

export function ragSettings(overrides: Partial<RagSettings> = {}): RagSettings {
    return {
        profilePath: FIXTURE_PROFILE,
        profileOwner: 'Rohit Singh',
        indexStorePath: undefined,
        rebuildEnabled: false,
        recoveryCooldownMs: 60000,
        chunkSize: 1000,
        chunkOverlap: 150,
        topK: 4,
        similarityThreshold: 0.3,
        maxContextLength: 4000,
        dedupeOverlap: 0.5,
        embeddingBatchSize: 64,
        embeddingMaxRetries: 3,
        embeddingRetryDelayMs: 1,
        embeddingTimeoutMs: 1000,
        generationTimeoutMs: 1000,
        ...overrides,
    };
}

export function openAISettings(overrides: Partial<OpenAISettings> = {}): OpenAISettings {
    return {
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:0/v1',
        chatModel: 'fake-chat',
        embeddingModel: 'fake-embedding',
        temperature: 0.3,
        maxTokens: 800,
        ...overrides,
    };
}

export function appSettings(overrides: Partial<AppSettings> = {}): AppSettings {
    return {
        env: 'test',
        port: 0,
        host: '127.0.0.1',
        logLevel: 'error',
        corsOrigins: '*',
        ...overrides,
    };
}

export function createConfigService(rag: Partial<RagSettings> = {}): ConfigService {
    return new ConfigService({ rag: ragSettings(rag), openai: openAISettings(), app: appSettings() });
}
