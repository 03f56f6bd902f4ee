import { describe, it, expect } from 'vitest';
import { QualitativeEngine } from '../src/engine/qualitative_engine';
import { VectorIndex, type IndexHandle, type SimilaritySearch } from '../src/engine/retrieval/vector_index';
import type { Embedder } from '../src/engine/retrieval/embedding_engine';
import { BranchExhaustedError, CancelledAnalysisError, ServiceError, ValidationError } from '../src/errors';
import type { CallOptions } from '../src/utils/timeout';
import {
    FailingEmbedder,
    FakeCompletion,
    KeywordEmbedder,
    SAMPLE_MEMO,
    failWith,
    respondAfter,
    routeByPrompt,
    testConfig,
} from './helpers/fakes';

function setup(completion: FakeCompletion, embedder: Embedder = new KeywordEmbedder(), config = testConfig()) {
    const search = new VectorIndex(embedder, config.timeouts);
    return { engine: new QualitativeEngine(completion, search, config), search };
}

describe('QualitativeEngine', () => {
    it('summarizes through retrieval when every capability answers', async () => {
        const completion = new FakeCompletion(routeByPrompt({ retrieval: () => 'Retrieval summary' }));
        const { engine, search } = setup(completion);

        const result = await engine.analyze(SAMPLE_MEMO);

        expect(result).toEqual({ summary: 'Retrieval summary', source: 'model-generated', method: 'retrieval' });
        expect(completion.prompts).toHaveLength(1);
        expect(completion.prompts[0]).toContain('QUESTION (team)');
        expect(completion.prompts[0]).toContain('QUESTION (traction)');
        expect(search.openHandles).toBe(0);
    });

    it('summarizes the memo directly when embedding fails', async () => {
        const completion = new FakeCompletion(routeByPrompt({ direct: () => 'Direct summary' }));
        const { engine } = setup(completion, new FailingEmbedder());

        const result = await engine.analyze(SAMPLE_MEMO);

        expect(result).toEqual({ summary: 'Direct summary', source: 'model-generated', method: 'direct' });
        expect(completion.prompts[0]).toContain(SAMPLE_MEMO);
    });

    it('releases the index when the retrieval completion fails', async () => {
        const completion = new FakeCompletion(routeByPrompt({ direct: () => 'Direct summary' }));
        const { engine, search } = setup(completion);

        const result = await engine.analyze(SAMPLE_MEMO);

        expect(result.method).toBe('direct');
        expect(completion.prompts).toHaveLength(2);
        expect(search.openHandles).toBe(0);
    });

    it('stops the remaining lookups when one retrieval query fails', async () => {
        let stopped = 0;
        let released = 0;
        const search: SimilaritySearch = {
            index: async chunks => ({ id: 'handle-1', size: chunks.length }),
            query: (_handle: IndexHandle, question: string, _k: number, options?: CallOptions) => {
                if (question.includes('team')) {
                    return Promise.reject(new ServiceError('embedding quota exceeded', 'embedding'));
                }
                return new Promise<string[]>((_resolve, reject) => {
                    options?.signal?.addEventListener('abort', () => {
                        stopped += 1;
                        reject(new CancelledAnalysisError());
                    });
                });
            },
            release: () => {
                released += 1;
            },
        };
        const completion = new FakeCompletion(routeByPrompt({ direct: () => 'Direct summary' }));
        const engine = new QualitativeEngine(completion, search, testConfig());

        const result = await engine.analyze(SAMPLE_MEMO);

        expect(result.method).toBe('direct');
        expect(stopped).toBe(3);
        expect(released).toBe(1);
    });

    it('truncates the memo for the direct tier', async () => {
        const completion = new FakeCompletion(routeByPrompt({ direct: () => 'Direct summary' }));
        const { engine } = setup(completion, new FailingEmbedder(), testConfig({
            qualitative: { maxMemoChars: 30, excerptChars: 40 },
        }));

        await engine.analyze(SAMPLE_MEMO);

        expect(completion.prompts[0].endsWith(`MEMO:\n${SAMPLE_MEMO.slice(0, 30)}`)).toBe(true);
    });

    it('falls back to a literal excerpt when no model is reachable', async () => {
        const completion = new FakeCompletion(failWith());
        const { engine } = setup(completion, new FailingEmbedder());

        const result = await engine.analyze(SAMPLE_MEMO);

        expect(result).toEqual({
            summary: 'Memo excerpt: The founding team has deep retail experi...',
            source: 'fallback',
            method: 'excerpt',
        });
    });

    it('raises BranchExhaustedError when static fallbacks are disabled', async () => {
        const completion = new FakeCompletion(failWith());
        const { engine } = setup(completion, new FailingEmbedder(), testConfig({ staticFallbacks: false }));

        const failure = await engine.analyze(SAMPLE_MEMO).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(BranchExhaustedError);
        expect(failure).toMatchObject({ branch: 'qualitative' });
        if (failure instanceof BranchExhaustedError) {
            expect(failure.reasons).toHaveLength(2);
            expect(failure.reasons[0]).toBe('retrieval: ServiceError: embedding service down');
            expect(failure.reasons[1]).toBe('direct: ServiceError: upstream unavailable');
        }
    });

    it('moves on to the next tier after a timeout', async () => {
        const completion = new FakeCompletion(routeByPrompt({
            retrieval: respondAfter(500, 'too late'),
            direct: () => 'Direct summary',
        }));
        const config = testConfig({ timeouts: { completionMs: 20, embeddingMs: 1_000, retrievalMs: 1_000 } });
        const { engine } = setup(completion, new KeywordEmbedder(), config);

        const result = await engine.analyze(SAMPLE_MEMO);

        expect(result.method).toBe('direct');
    });

    it('rejects an empty memo', async () => {
        const { engine } = setup(new FakeCompletion(failWith()));
        await expect(engine.analyze('   ')).rejects.toThrow(new ValidationError('Memo text is empty'));
    });

    it('does not degrade a cancelled request into a fallback', async () => {
        const controller = new AbortController();
        controller.abort();
        const { engine } = setup(new FakeCompletion(routeByPrompt({ direct: () => 'Direct summary' })));

        await expect(engine.analyze(SAMPLE_MEMO, { signal: controller.signal }))
            .rejects.toBeInstanceOf(CancelledAnalysisError);
    });
});
