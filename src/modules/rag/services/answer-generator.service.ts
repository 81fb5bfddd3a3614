import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagSettings } from '../../../config/rag.config';
import { GenerationUnavailableException } from '../../../common/exceptions/rag.exceptions';
import { withTimeout } from '../../../common/utils/async.util';
import { errorMessage } from '../../../common/utils/error.util';
import { TEXT_GENERATOR, TextGenerator } from '../interfaces/model-provider.interface';
import { AnswerResult, AssembledContext } from '../types';
import { PromptBuilderService } from './prompt-builder.service';

export const FALLBACK_ANSWER = "I don't have that information in my profile yet.";

/**
 * Answer Generator Service
 *
 * With no context the model is never called and the fixed fallback answer is
 * returned, so retrieval misses cannot turn into invented answers.
 */
@Injectable()
export class AnswerGeneratorService {
    private readonly logger = new Logger(AnswerGeneratorService.name);
    private readonly timeoutMs: number;

    constructor(
        private readonly configService: ConfigService,
        private readonly promptBuilder: PromptBuilderService,
        @Inject(TEXT_GENERATOR) private readonly generator: TextGenerator,
    ) {
        this.timeoutMs = this.configService.getOrThrow<RagSettings>('rag').generationTimeoutMs;
    }

    async generate(question: string, context: AssembledContext): Promise<AnswerResult> {
        if (context.chunks.length === 0) {
            this.logger.log(`🤷 No relevant profile context; returning fallback answer`);
            return { answer: FALLBACK_ANSWER, grounded: false, sources: [] };
        }

        const request = this.promptBuilder.buildGenerationRequest(question, context.text);

        let reply: string;
        try {
            reply = await withTimeout((signal) => this.generator.generate(request, signal), this.timeoutMs, 'Answer generation');
        } catch (error) {
            this.logger.error(`❌ Failed to generate answer: ${errorMessage(error)}`);
            throw new GenerationUnavailableException(errorMessage(error), error);
        }

        const answer = reply.trim();
        if (answer.length === 0) {
            this.logger.error(`❌ Model returned an empty completion`);
            throw new GenerationUnavailableException('Model returned an empty completion');
        }

        return { answer, grounded: true, sources: context.chunks };
    }
}
