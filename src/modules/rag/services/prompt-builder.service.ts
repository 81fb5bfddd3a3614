import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagSettings } from '../../../config/rag.config';
import { GenerationRequest } from '../types';

/**
 * Prompt Builder Service - prompt templates for the profile assistant
 */
@Injectable()
export class PromptBuilderService {
    private readonly profileOwner: string;

    constructor(private readonly configService: ConfigService) {
        this.profileOwner = this.configService.getOrThrow<RagSettings>('rag').profileOwner;
    }

    /**
     * Build system prompt for RAG response generation
     */
    buildRagSystemPrompt(): string {
        return `You are the portfolio assistant of ${this.profileOwner}. You answer questions from recruiters and visitors about ${this.profileOwner}'s professional profile.

Your responsibilities:
1. Answer strictly from the provided profile context
2. Be professional, confident and concise
3. Highlight concrete roles, dates, technologies and measurable impact when the context has them
4. Use short lists when they make the answer easier to scan

Constraints:
- Do not invent facts that are not in the context
- If the context does not answer the question, say that the profile does not cover it
- Never mention "context", "chunks" or "documents" in the answer; just answer naturally`;
    }

    /**
     * Build user prompt for RAG query
     */
    buildRagUserPrompt(question: string, context: string): string {
        return `### PROFILE CONTEXT:
${context}

### QUESTION:
${question}

### ANSWER:`;
    }

    buildGenerationRequest(question: string, context: string): GenerationRequest {
        return {
            systemPrompt: this.buildRagSystemPrompt(),
            userPrompt: this.buildRagUserPrompt(question, context),
        };
    }
}
