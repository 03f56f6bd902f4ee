import type { TextChunk } from '../../types/analysis_types';

export interface ChunkOptions {
    chunkSize: number;
    overlap: number;
}

const SENTENCE_END = /[.!?]/;
const SENTENCE_LOOKBACK = 100;

/**
 * Splits text into overlapping chunks of at most `chunkSize` characters.
 * A chunk is cut just after a sentence end when one falls within the last
 * 100 characters of the window.
 */
export function chunkText(text: string, { chunkSize, overlap }: ChunkOptions): TextChunk[] {
    if (chunkSize <= 0) throw new RangeError('chunkSize must be positive');
    const step = Math.min(Math.max(overlap, 0), chunkSize - 1);

    const chunks: TextChunk[] = [];
    let start = 0;

    while (start < text.length) {
        let end = Math.min(start + chunkSize, text.length);

        if (end < text.length) {
            const floor = Math.max(start + chunkSize - SENTENCE_LOOKBACK, start);
            for (let i = end - 1; i > floor; i--) {
                if (SENTENCE_END.test(text[i])) {
                    end = i + 1;
                    break;
                }
            }
        }

        const slice = text.slice(start, end).trim();
        if (slice) {
            chunks.push({ index: chunks.length, text: slice });
        }

        if (end >= text.length) break;
        start = Math.max(end - step, start + 1);
    }

    return chunks;
}
