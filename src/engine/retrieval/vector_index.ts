import { v4 as uuidv4 } from 'uuid';
import { ServiceError } from '../../errors';
import type { TextChunk } from '../../types/analysis_types';
import { withTimeout, type CallOptions } from '../../utils/timeout';
import type { Embedder } from './embedding_engine';

export interface IndexHandle {
    readonly id: string;
    readonly size: number;
}

/**
 * Request-scoped similarity search. Every handle must be released by its creator.
 */
export interface SimilaritySearch {
    index(chunks: string[], options?: CallOptions): Promise<IndexHandle>;
    query(handle: IndexHandle, question: string, k: number, options?: CallOptions): Promise<string[]>;
    release(handle: IndexHandle): void;
}

export interface SearchHit {
    chunk: TextChunk;
    score: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new ServiceError(`Embedding dimensions differ (${a.length} vs ${b.length})`, 'similarity');
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * In-memory cosine-similarity index over embedder vectors. Entries live under
 * their handle only and are dropped on release.
 */
export class VectorIndex implements SimilaritySearch {
    private readonly entries = new Map<string, TextChunk[]>();

    constructor(
        private readonly embedder: Embedder,
        private readonly timeouts: { embeddingMs: number; retrievalMs: number },
    ) { }

    get openHandles(): number {
        return this.entries.size;
    }

    async index(chunks: string[], options: CallOptions = {}): Promise<IndexHandle> {
        const vectors = await withTimeout('embedding', this.timeouts.embeddingMs, options.signal, signal =>
            this.embedder.embed(chunks, { timeoutMs: this.timeouts.embeddingMs, signal }),
        );

        const handle: IndexHandle = { id: uuidv4(), size: chunks.length };
        this.entries.set(handle.id, chunks.map((text, index) => ({ index, text, embedding: vectors[index] })));
        console.log(`[VectorIndex] Indexed ${chunks.length} chunks under ${handle.id}.`);
        return handle;
    }

    async query(handle: IndexHandle, question: string, k: number, options: CallOptions = {}): Promise<string[]> {
        return (await this.search(handle, question, k, options)).map(hit => hit.chunk.text);
    }

    async search(handle: IndexHandle, question: string, k: number, options: CallOptions = {}): Promise<SearchHit[]> {
        const chunks = this.entries.get(handle.id);
        if (!chunks) {
            throw new ServiceError(`Index ${handle.id} is not open`, 'similarity');
        }

        const [questionVector] = await withTimeout('retrieval', this.timeouts.retrievalMs, options.signal, signal =>
            this.embedder.embed([question], { timeoutMs: this.timeouts.retrievalMs, signal }),
        );
        if (!questionVector) {
            throw new ServiceError('Embedder returned no vector for the question', 'retrieval');
        }

        const hits: SearchHit[] = [];
        for (const chunk of chunks) {
            if (!chunk.embedding) continue;
            hits.push({ chunk, score: cosineSimilarity(questionVector, chunk.embedding) });
        }

        // Ties keep document order.
        hits.sort((a, b) => b.score - a.score || a.chunk.index - b.chunk.index);
        return hits.slice(0, Math.max(0, k));
    }

    release(handle: IndexHandle): void {
        if (this.entries.delete(handle.id)) {
            console.log(`[VectorIndex] Released ${handle.id}.`);
        }
    }
}
