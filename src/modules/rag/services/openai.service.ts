import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { OpenAISettings } from '../../../config/openai.config';
import { errorMessage } from '../../../common/utils/error.util';
import { Embedder, TextGenerator } from '../interfaces/model-provider.interface';
import { GenerationRequest } from '../types';

/**
 * OpenAI Service - Native OpenAI SDK Integration
 *
 * Serves as both the embedder and the text generator. Any OpenAI-compatible
 * endpoint can be targeted through OPENAI_BASE_URL.
 */
@Injectable()
export class OpenAIService implements Embedder, TextGenerator {
    private readonly logger = new Logger(OpenAIService.name);
    private readonly client: OpenAI;
    private readonly settings: OpenAISettings;

    constructor(private readonly configService: ConfigService) {
        this.settings = this.configService.getOrThrow<OpenAISettings>('openai');
        this.client = this.initializeClient();
    }

    get embeddingModel(): string {
        return this.settings.embeddingModel;
    }

    get chatModel(): string {
        return this.settings.chatModel;
    }

    /**
     * Initialize OpenAI client. SDK-level retries are off: callers own the retry policy.
     */
    private initializeClient(): OpenAI {
        if (!this.settings.apiKey) {
            throw new Error('OPENAI_API_KEY environment variable is not set');
        }

        const client = new OpenAI({
            apiKey: this.settings.apiKey,
            baseURL: this.settings.baseUrl,
            maxRetries: 0,
        });

        this.logger.log(`✅ OpenAI client initialized`);
        this.logger.log(`📊 Embedding model: ${this.settings.embeddingModel}`);
        this.logger.log(`💬 Chat model: ${this.settings.chatModel}`);
        return client;
    }

    /**
     * Generate embedding for text
     */
    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        const [embedding] = await this.embedBatch([text], signal);
        return embedding;
    }

    /**
     * Generate embeddings for multiple texts
     */
    async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        try {
            this.logger.debug(`🔄 Generating embeddings for ${texts.length} texts`);

            const response = await this.client.embeddings.create(
                {
                    model: this.settings.embeddingModel,
                    input: texts,
                    encoding_format: 'float',
                },
                { signal },
            );

            const embeddings = [...response.data]
                .sort((a, b) => a.index - b.index)
                .map((item) => item.embedding);

            if (embeddings.length !== texts.length) {
                throw new Error(`Expected ${texts.length} embeddings, received ${embeddings.length}`);
            }

            this.logger.debug(`✅ Generated ${embeddings.length} embeddings (${embeddings[0]?.length ?? 0} dimensions)`);
            return embeddings;
        } catch (error) {
            this.logger.error(`❌ Failed to generate embeddings: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Generate chat response for a system + user prompt pair
     */
    async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
        ];

        try {
            this.logger.debug(`💬 Generating chat response (${messages.length} messages)`);

            const response = await this.client.chat.completions.create(
                {
                    model: this.settings.chatModel,
                    messages,
                    temperature: this.settings.temperature,
                    max_tokens: this.settings.maxTokens,
                },
                { signal },
            );

            const content = response.choices[0]?.message?.content ?? '';

            this.logger.debug(`📊 Tokens used: ${response.usage?.total_tokens ?? 0}`);
            return content;
        } catch (error) {
            this.logger.error(`❌ Failed to generate chat response: ${errorMessage(error)}`);
            throw error;
        }
    }
}
