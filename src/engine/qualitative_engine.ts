import type { AnalystConfig } from '../config/analyst_config';
import { BranchExhaustedError, ValidationError, describeError } from '../errors';
import type { QualitativeResult } from '../types/analysis_types';
import { throwIfCancelled, type CallOptions } from '../utils/timeout';
import { completeWithTimeout, type TextCompletion } from './llm_engine';
import {
    ANALYTICAL_QUESTIONS,
    buildDirectMemoPrompt,
    buildRetrievalPrompt,
    type RetrievedContext,
} from './prompts';
import { chunkText } from './retrieval/chunker';
import type { SimilaritySearch } from './retrieval/vector_index';

export function validateMemo(memoText: string): string {
    if (typeof memoText !== 'string' || memoText.trim() === '') {
        throw new ValidationError('Memo text is empty');
    }
    return memoText;
}

/**
 * Qualitative branch: retrieval-augmented summary, then a direct summary of the
 * truncated memo, then a literal excerpt.
 */
export class QualitativeEngine {
    constructor(
        private readonly completion: TextCompletion,
        private readonly search: SimilaritySearch,
        private readonly config: AnalystConfig,
    ) { }

    async analyze(memoText: string, options: CallOptions = {}): Promise<QualitativeResult> {
        const memo = validateMemo(memoText);
        const { signal } = options;
        const failures: string[] = [];

        try {
            const summary = await this.summarizeWithRetrieval(memo, signal);
            console.log('[Qualitative] Retrieval-augmented summary generated.');
            return { summary, source: 'model-generated', method: 'retrieval' };
        } catch (error) {
            throwIfCancelled(error, signal);
            failures.push(`retrieval: ${describeError(error)}`);
            console.warn('[Qualitative] Retrieval tier failed, summarizing memo directly:', describeError(error));
        }

        try {
            const summary = await this.summarizeDirectly(memo, signal);
            console.log('[Qualitative] Direct memo summary generated.');
            return { summary, source: 'model-generated', method: 'direct' };
        } catch (error) {
            throwIfCancelled(error, signal);
            failures.push(`direct: ${describeError(error)}`);
            console.warn('[Qualitative] Direct tier failed:', describeError(error));
        }

        if (!this.config.staticFallbacks) {
            throw new BranchExhaustedError('qualitative', failures);
        }

        console.warn('[Qualitative] Falling back to a literal memo excerpt.');
        return { summary: this.excerpt(memo), source: 'fallback', method: 'excerpt' };
    }

    excerpt(memo: string): string {
        const text = memo.trim();
        const limit = this.config.qualitative.excerptChars;
        const excerpt = text.length > limit ? `${text.slice(0, limit).trimEnd()}...` : text;
        return `Memo excerpt: ${excerpt}`;
    }

    private async summarizeWithRetrieval(memo: string, signal?: AbortSignal): Promise<string> {
        // Tier-local controller: a failed query stops its sibling lookups before the next tier starts.
        const controller = new AbortController();
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });
        if (signal?.aborted) controller.abort();
        const tierOptions = { signal: controller.signal };

        try {
            const chunks = chunkText(memo, this.config.chunking);
            const handle = await this.search.index(chunks.map(c => c.text), tierOptions);

            try {
                const topK = Math.min(this.config.chunking.topK, handle.size);
                const contexts: RetrievedContext[] = await Promise.all(
                    ANALYTICAL_QUESTIONS.map(async question => ({
                        question,
                        passages: await this.search.query(handle, question.question, topK, tierOptions),
                    })),
                );

                const prompt = buildRetrievalPrompt(contexts);
                return await completeWithTimeout(this.completion, prompt, this.config.timeouts.completionMs, controller.signal);
            } finally {
                this.search.release(handle);
            }
        } finally {
            controller.abort();
            signal?.removeEventListener('abort', onAbort);
        }
    }

    private summarizeDirectly(memo: string, signal?: AbortSignal): Promise<string> {
        const truncated = memo.slice(0, this.config.qualitative.maxMemoChars);
        return completeWithTimeout(
            this.completion,
            buildDirectMemoPrompt(truncated),
            this.config.timeouts.completionMs,
            signal,
        );
    }
}
