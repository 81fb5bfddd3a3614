import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagSettings } from '../../../config/rag.config';
import { AssembledContext, Chunk, RetrievedChunk } from '../types';

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

/**
 * Turns retrieval results into the bounded context handed to the generator.
 */
@Injectable()
export class ContextAssemblerService {
    private readonly logger = new Logger(ContextAssemblerService.name);
    private readonly maxContextLength: number;
    private readonly dedupeOverlap: number;

    constructor(private readonly configService: ConfigService) {
        const settings = this.configService.getOrThrow<RagSettings>('rag');
        this.maxContextLength = settings.maxContextLength;
        this.dedupeOverlap = settings.dedupeOverlap;
    }

    /**
     * Highest score first (document order on ties). Near-duplicates are skipped;
     * the first chunk that would overflow the budget ends the context, whole.
     */
    assemble(results: RetrievedChunk[]): AssembledContext {
        const ordered = [...results].sort(
            (a, b) => b.score - a.score || a.chunk.startIndex - b.chunk.startIndex,
        );

        const selected: RetrievedChunk[] = [];
        let totalLength = 0;

        for (const result of ordered) {
            const duplicate = selected.find((s) => overlapRatio(s.chunk, result.chunk) > this.dedupeOverlap);
            if (duplicate) {
                this.logger.debug(`♻️ Skipping ${result.chunk.id}: overlaps ${duplicate.chunk.id}`);
                continue;
            }

            const added = (selected.length > 0 ? CONTEXT_SEPARATOR.length : 0) + result.chunk.text.length;
            if (totalLength + added > this.maxContextLength) {
                this.logger.debug(`⚠️ Context length limit reached (${totalLength} chars)`);
                break;
            }

            selected.push(result);
            totalLength += added;
        }

        this.logger.debug(`✅ Built context from ${selected.length} chunks (${totalLength} chars)`);
        return {
            chunks: selected,
            text: selected.map((r) => r.chunk.text).join(CONTEXT_SEPARATOR),
            length: totalLength,
        };
    }
}

/**
 * Shared characters as a fraction of the shorter chunk
 */
export function overlapRatio(a: Chunk, b: Chunk): number {
    const shared = Math.min(a.endIndex, b.endIndex) - Math.max(a.startIndex, b.startIndex);
    const shorter = Math.min(a.endIndex - a.startIndex, b.endIndex - b.startIndex);
    return shared > 0 && shorter > 0 ? shared / shorter : 0;
}
