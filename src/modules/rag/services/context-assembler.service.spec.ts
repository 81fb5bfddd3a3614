import { createConfigService } from '../../../../test/fakes/settings';
import { Chunk, RetrievedChunk } from '../types';
import { CONTEXT_SEPARATOR, ContextAssemblerService, overlapRatio } from './context-assembler.service';

function chunk(id: string, startIndex: number, length: number): Chunk {
    return {
        id,
        text: id.repeat(length).slice(0, length),
        startIndex,
        endIndex: startIndex + length,
        metadata: { chunkIndex: 0, totalChunks: 1 },
    };
}

function result(c: Chunk, score: number, rank = 0): RetrievedChunk {
    return { chunk: c, score, rank };
}

describe('ContextAssemblerService', () => {
    function assembler(maxContextLength = 4000, dedupeOverlap = 0.5): ContextAssemblerService {
        return new ContextAssemblerService(createConfigService({ maxContextLength, dedupeOverlap }));
    }

    it('orders by score, then by document position', () => {
        const a = chunk('a', 0, 10);
        const b = chunk('b', 200, 10);
        const c = chunk('c', 100, 10);

        const context = assembler().assemble([result(b, 0.5), result(a, 0.9), result(c, 0.5)]);

        expect(context.chunks.map((r) => r.chunk.id)).toEqual(['a', 'c', 'b']);
        expect(context.text).toBe(['aaaaaaaaaa', 'cccccccccc', 'bbbbbbbbbb'].join(CONTEXT_SEPARATOR));
        expect(context.length).toBe(30 + 2 * CONTEXT_SEPARATOR.length);
        expect(context.length).toBe(context.text.length);
    });

    it('skips chunks that mostly repeat an already selected one', () => {
        const a = chunk('a', 0, 100);
        const overlapping = chunk('o', 40, 100);
        const neighbour = chunk('n', 80, 100);

        const context = assembler().assemble([result(a, 0.9), result(overlapping, 0.8), result(neighbour, 0.7)]);

        expect(context.chunks.map((r) => r.chunk.id)).toEqual(['a', 'n']);
    });

    it('stops at the first chunk that would overflow the budget', () => {
        const context = assembler(50).assemble([
            result(chunk('a', 0, 30), 0.9),
            result(chunk('b', 100, 30), 0.8),
            result(chunk('c', 200, 5), 0.7),
        ]);

        expect(context.chunks.map((r) => r.chunk.id)).toEqual(['a']);
        expect(context.length).toBe(30);
    });

    it('returns an empty context when nothing fits', () => {
        expect(assembler(20).assemble([result(chunk('a', 0, 30), 0.9)])).toEqual({ chunks: [], text: '', length: 0 });
        expect(assembler().assemble([])).toEqual({ chunks: [], text: '', length: 0 });
    });

    it('measures overlap against the shorter chunk', () => {
        expect(overlapRatio(chunk('a', 0, 100), chunk('b', 90, 20))).toBeCloseTo(0.5);
        expect(overlapRatio(chunk('a', 0, 10), chunk('b', 10, 10))).toBe(0);
    });
});
