import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagSettings } from '../../../config/rag.config';
import { Chunk, ChunkingOptions } from '../types';

interface Span {
    start: number;
    end: number;
}

interface Section extends Span {
    headings: string[];
}

const HEADING_LINE = /^(#{1,6})[ \t]+(.+?)[ \t#]*$/gm;
const PARAGRAPH_BREAK = /\n[ \t]*\n/g;
const WHITESPACE = /\s/;

/**
 * Text Chunker Service
 *
 * Splits the profile document at Markdown headings first, then packs the
 * paragraphs of oversized sections into overlapping windows. Offsets always
 * point into the original document, so `text === document.slice(startIndex, endIndex)`.
 */
@Injectable()
export class ChunkerService {
    private readonly logger = new Logger(ChunkerService.name);
    private readonly defaults: ChunkingOptions;

    constructor(private readonly configService: ConfigService) {
        const settings = this.configService.getOrThrow<RagSettings>('rag');
        this.defaults = { chunkSize: settings.chunkSize, overlap: settings.chunkOverlap };
    }

    getDefaultOptions(): ChunkingOptions {
        return { ...this.defaults };
    }

    /**
     * Chunk a document. Whitespace-only input yields an empty list.
     */
    chunkDocument(text: string, options: ChunkingOptions = this.defaults): Chunk[] {
        const { chunkSize, overlap } = options;
        if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
            throw new Error(`chunkSize must be a positive integer, got ${chunkSize}`);
        }
        if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
            throw new Error(`overlap must be an integer in [0, ${chunkSize}), got ${overlap}`);
        }

        this.logger.debug(`📄 Chunking text (${text.length} chars) with size=${chunkSize}, overlap=${overlap}`);

        const spans: Array<Span & { heading?: string }> = [];
        for (const section of this.splitSections(text)) {
            const trimmed = trimSpan(text, section.start, section.end);
            if (!trimmed) {
                continue;
            }
            const heading = section.headings.length > 0 ? section.headings.join(' > ') : undefined;
            const windows =
                trimmed.end - trimmed.start <= chunkSize
                    ? [trimmed]
                    : this.splitLongSection(text, trimmed, chunkSize, overlap);
            for (const window of windows) {
                spans.push({ ...window, heading });
            }
        }

        const chunks = spans.map(
            (span, index): Chunk => ({
                id: `chunk_${index}`,
                text: text.slice(span.start, span.end),
                startIndex: span.start,
                endIndex: span.end,
                metadata: {
                    chunkIndex: index,
                    totalChunks: spans.length,
                    ...(span.heading !== undefined ? { heading: span.heading } : {}),
                },
            }),
        );

        if (chunks.length > 0) {
            this.logger.log(`✅ Created ${chunks.length} chunks`);
            this.logger.debug(
                `📊 Chunk sizes: min=${Math.min(...chunks.map((c) => c.text.length))}, max=${Math.max(...chunks.map((c) => c.text.length))}`,
            );
        }
        return chunks;
    }

    /**
     * Sections start at heading lines. A section holding nothing but headings
     * is folded into the next one.
     */
    private splitSections(text: string): Section[] {
        const headings = Array.from(text.matchAll(HEADING_LINE), (match) => ({
            index: match.index ?? 0,
            title: match[2].trim(),
        }));

        const raw: Section[] = [];
        const firstHeading = headings.length > 0 ? headings[0].index : text.length;
        if (firstHeading > 0) {
            raw.push({ start: 0, end: firstHeading, headings: [] });
        }
        headings.forEach((heading, i) => {
            const end = i + 1 < headings.length ? headings[i + 1].index : text.length;
            raw.push({ start: heading.index, end, headings: [heading.title] });
        });

        const sections: Section[] = [];
        let pending: Section | undefined;
        for (const section of raw) {
            const current: Section = pending
                ? { start: pending.start, end: section.end, headings: [...pending.headings, ...section.headings] }
                : section;
            pending = undefined;
            const body = text.slice(current.start, current.end).replace(HEADING_LINE, '');
            if (current.headings.length > 0 && body.trim().length === 0) {
                pending = current;
                continue;
            }
            sections.push(current);
        }
        if (pending) {
            sections.push(pending);
        }
        return sections;
    }

    private splitLongSection(text: string, section: Span, chunkSize: number, overlap: number): Span[] {
        const pieces = this.paragraphs(text, section).flatMap((paragraph) =>
            paragraph.end - paragraph.start > chunkSize
                ? this.splitByCharCount(text, paragraph, chunkSize, overlap)
                : [paragraph],
        );

        const windows: Span[] = [];
        let windowStart = pieces[0].start;
        let windowEnd = pieces[0].end;

        for (const piece of pieces.slice(1)) {
            if (piece.end - windowStart <= chunkSize) {
                windowEnd = piece.end;
                continue;
            }
            windows.push({ start: windowStart, end: windowEnd });

            // Carry the tail of the previous window when the next piece still fits.
            const carry = overlapStart(text, windowStart, windowEnd, overlap);
            windowStart = carry !== undefined && piece.end - carry <= chunkSize ? carry : piece.start;
            windowEnd = piece.end;
        }
        windows.push({ start: windowStart, end: windowEnd });

        return windows;
    }

    private paragraphs(text: string, section: Span): Span[] {
        const segment = text.slice(section.start, section.end);
        const spans: Span[] = [];
        let cursor = 0;

        for (const match of segment.matchAll(PARAGRAPH_BREAK)) {
            const index = match.index ?? 0;
            const span = trimSpan(text, section.start + cursor, section.start + index);
            if (span) {
                spans.push(span);
            }
            cursor = index + match[0].length;
        }
        const last = trimSpan(text, section.start + cursor, section.end);
        if (last) {
            spans.push(last);
        }
        return spans;
    }

    /**
     * Fixed windows over a single oversized paragraph
     */
    private splitByCharCount(text: string, span: Span, chunkSize: number, overlap: number): Span[] {
        const step = chunkSize - overlap;
        const windows: Span[] = [];

        for (let start = span.start; ; start += step) {
            const end = Math.min(start + chunkSize, span.end);
            const window = trimSpan(text, start, end);
            if (window) {
                windows.push(window);
            }
            if (end >= span.end) {
                break;
            }
        }
        return windows;
    }
}

function trimSpan(text: string, start: number, end: number): Span | undefined {
    let s = start;
    let e = end;
    while (s < e && WHITESPACE.test(text[s])) s++;
    while (e > s && WHITESPACE.test(text[e - 1])) e--;
    return s < e ? { start: s, end: e } : undefined;
}

/**
 * Start of the last `overlap` characters of a window, moved forward to the
 * next word so the carried text does not begin mid-word.
 */
function overlapStart(text: string, start: number, end: number, overlap: number): number | undefined {
    if (overlap <= 0 || end - start <= overlap) {
        return undefined;
    }
    let pos = end - overlap;
    if (!WHITESPACE.test(text[pos - 1])) {
        while (pos < end && !WHITESPACE.test(text[pos])) pos++;
    }
    while (pos < end && WHITESPACE.test(text[pos])) pos++;
    return pos < end ? pos : undefined;
}
