import OpenAI from 'openai';
import { ServiceError } from '../../errors';
import { mapOpenAIError } from '../llm_engine';

export interface EmbedOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface Embedder {
    embed(texts: string[], options: EmbedOptions): Promise<number[][]>;
}

export interface OpenAIEmbedderOptions {
    apiKey?: string;
    model: string;
    client?: OpenAI;
}

export class OpenAIEmbedder implements Embedder {
    private readonly client: OpenAI | null;
    private readonly model: string;

    constructor(options: OpenAIEmbedderOptions) {
        this.model = options.model;
        this.client = options.client ?? (options.apiKey ? new OpenAI({ apiKey: options.apiKey }) : null);
    }

    get configured(): boolean {
        return this.client !== null;
    }

    /**
     * Converts each text into an embedding vector, preserving input order.
     */
    async embed(texts: string[], options: EmbedOptions): Promise<number[][]> {
        if (!this.client) {
            throw new ServiceError('OPENAI_API_KEY is not configured', 'embedding');
        }
        if (texts.length === 0) return [];

        try {
            const response = await this.client.embeddings.create(
                {
                    model: this.model,
                    input: texts,
                    encoding_format: 'float',
                },
                { timeout: options.timeoutMs, signal: options.signal, maxRetries: 0 },
            );

            const vectors = [...response.data]
                .sort((a, b) => a.index - b.index)
                .map(item => item.embedding);

            if (vectors.length !== texts.length) {
                throw new ServiceError(`Expected ${texts.length} embeddings, received ${vectors.length}`, 'embedding');
            }
            return vectors;
        } catch (error) {
            throw mapOpenAIError(error, 'embedding', options.timeoutMs);
        }
    }
}
