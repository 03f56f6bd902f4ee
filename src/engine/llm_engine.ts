import OpenAI, { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import { CancelledAnalysisError, ServiceError, TimeoutError } from '../errors';
import { withTimeout } from '../utils/timeout';

export interface CompletionOptions {
    timeoutMs: number;
    signal?: AbortSignal;
    system?: string;
}

/**
 * Prompt in, text out. Implementations reject with ServiceError or TimeoutError.
 */
export interface TextCompletion {
    complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface OpenAICompletionOptions {
    apiKey?: string;
    model: string;
    client?: OpenAI;
}

const DEFAULT_SYSTEM_PROMPT = 'You are an experienced venture capital analyst. Answer precisely and only from the material provided.';

export class OpenAICompletion implements TextCompletion {
    private readonly client: OpenAI | null;
    private readonly model: string;

    constructor(options: OpenAICompletionOptions) {
        this.model = options.model;
        this.client = options.client ?? (options.apiKey ? new OpenAI({ apiKey: options.apiKey }) : null);
    }

    get configured(): boolean {
        return this.client !== null;
    }

    async complete(prompt: string, options: CompletionOptions): Promise<string> {
        if (!this.client) {
            throw new ServiceError('OPENAI_API_KEY is not configured', 'completion');
        }

        try {
            const completion = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: options.system ?? DEFAULT_SYSTEM_PROMPT },
                        { role: 'user', content: prompt },
                    ],
                },
                { timeout: options.timeoutMs, signal: options.signal, maxRetries: 0 },
            );

            const text = completion.choices[0]?.message.content?.trim() ?? '';
            if (!text) {
                throw new ServiceError('Completion returned no text', 'completion');
            }
            return text;
        } catch (error) {
            throw mapOpenAIError(error, 'completion', options.timeoutMs);
        }
    }
}

/**
 * Calls the completion capability under its own deadline, linked to the caller's signal.
 */
export async function completeWithTimeout(
    completion: TextCompletion,
    prompt: string,
    timeoutMs: number,
    signal?: AbortSignal,
): Promise<string> {
    const text = await withTimeout('completion', timeoutMs, signal, callSignal =>
        completion.complete(prompt, { timeoutMs, signal: callSignal }),
    );
    if (!text.trim()) {
        throw new ServiceError('Completion returned no text', 'completion');
    }
    return text.trim();
}

export function mapOpenAIError(error: unknown, service: string, timeoutMs: number): Error {
    if (error instanceof ServiceError || error instanceof CancelledAnalysisError) return error;
    if (error instanceof APIConnectionTimeoutError) return new TimeoutError(service, timeoutMs);
    if (error instanceof APIUserAbortError) return new CancelledAnalysisError();

    const detail = error instanceof Error ? error.message : String(error);
    console.error(`[LLMEngine] ${service} call failed:`, detail);
    return new ServiceError(`${service} call failed: ${detail}`, service, error);
}
