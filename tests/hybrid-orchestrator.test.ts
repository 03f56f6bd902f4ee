import { describe, it, expect } from 'vitest';
import { CancelledAnalysisError, TerminalPipelineError, ValidationError } from '../src/errors';
import {
    DECLINING_REVENUE,
    FailingEmbedder,
    FakeCompletion,
    GROWING_REVENUE,
    KeywordEmbedder,
    SAMPLE_MEMO,
    buildOrchestrator,
    failWith,
    monthlySeries,
    respondAfter,
    routeByPrompt,
    testConfig,
} from './helpers/fakes';

const CLEAN_MEMO = 'Strong team, 95% retention, no major risks';

describe('HybridOrchestrator', () => {
    it('runs both branches concurrently', async () => {
        const completion = new FakeCompletion(routeByPrompt({
            retrieval: respondAfter(150, 'Qualitative view'),
            quantitative: respondAfter(150, 'Quantitative view'),
            synthesis: () => 'DECISION: Invest\nJUSTIFICATION: Both views are positive.',
        }));
        const { orchestrator } = buildOrchestrator(completion, new KeywordEmbedder(), testConfig());

        const started = Date.now();
        const result = await orchestrator.analyze({ memoText: SAMPLE_MEMO, series: monthlySeries(GROWING_REVENUE) });
        const elapsed = Date.now() - started;

        expect(result.qualitative).toEqual({ summary: 'Qualitative view', source: 'model-generated', method: 'retrieval' });
        expect(result.quantitative).toEqual({ summary: 'Quantitative view', source: 'model-generated', method: 'narrative' });
        expect(result.recommendation).toEqual({
            decision: 'Invest',
            justification: 'Both views are positive.',
            source: 'model-generated',
        });
        expect(elapsed).toBeLessThan(280);
    });

    it('recommends Invest from fallbacks alone for clean growth', async () => {
        const { orchestrator, search } = buildOrchestrator(
            new FakeCompletion(failWith()),
            new FailingEmbedder(),
            testConfig(),
        );

        const result = await orchestrator.analyze({ memoText: CLEAN_MEMO, series: monthlySeries(GROWING_REVENUE) });

        expect(result.qualitative).toMatchObject({ source: 'fallback', method: 'excerpt' });
        expect(result.quantitative).toMatchObject({ source: 'fallback', method: 'template' });
        expect(result.metrics.trend).toBe('growing');
        expect(result.recommendation).toMatchObject({ decision: 'Invest', source: 'rule-based-fallback' });
        expect(search.openHandles).toBe(0);
    });

    it('recommends Pass from fallbacks alone for declining revenue', async () => {
        const { orchestrator } = buildOrchestrator(new FakeCompletion(failWith()), new FailingEmbedder(), testConfig());

        const result = await orchestrator.analyze({ memoText: CLEAN_MEMO, series: monthlySeries(DECLINING_REVENUE) });

        expect(result.recommendation).toMatchObject({ decision: 'Pass', source: 'rule-based-fallback' });
    });

    it('keeps going with one branch exhausted', async () => {
        const completion = new FakeCompletion(routeByPrompt({
            quantitative: () => 'Revenue grew steadily.',
            synthesis: () => 'DECISION: Monitor\nJUSTIFICATION: Limited qualitative data.',
        }));
        const { orchestrator } = buildOrchestrator(completion, new FailingEmbedder(), testConfig({ staticFallbacks: false }));

        const result = await orchestrator.analyze({ memoText: SAMPLE_MEMO, series: monthlySeries(GROWING_REVENUE) });

        expect(result.qualitative.method).toBe('unavailable');
        expect(result.qualitative.source).toBe('fallback');
        expect(result.qualitative.confidence).toBe(0);
        expect(result.qualitative.summary).toBe(
            'Qualitative analysis unavailable: retrieval: ServiceError: embedding service down; direct: ServiceError: upstream unavailable',
        );
        expect(result.quantitative.method).toBe('narrative');
        expect(result.recommendation).toEqual({
            decision: 'Monitor',
            justification: 'Limited qualitative data.',
            source: 'model-generated',
        });
    });

    it('fails the request only when both branches are exhausted', async () => {
        const { orchestrator } = buildOrchestrator(
            new FakeCompletion(failWith()),
            new FailingEmbedder(),
            testConfig({ staticFallbacks: false }),
        );

        const failure = await orchestrator
            .analyze({ memoText: SAMPLE_MEMO, series: monthlySeries(GROWING_REVENUE) })
            .catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(TerminalPipelineError);
        expect(failure).toMatchObject({
            quantitativeReason: 'BranchExhaustedError: quantitative analysis exhausted all tiers: narrative: ServiceError: upstream unavailable',
        });
    });

    it('validates the submission before any external call', async () => {
        const completion = new FakeCompletion(failWith());
        const { orchestrator } = buildOrchestrator(completion, new KeywordEmbedder(), testConfig());

        await expect(orchestrator.analyze({ memoText: '', series: monthlySeries(GROWING_REVENUE) }))
            .rejects.toThrow(new ValidationError('Memo text is empty'));
        await expect(orchestrator.analyze({ memoText: SAMPLE_MEMO, series: [] }))
            .rejects.toThrow(new ValidationError('no data'));
        expect(completion.prompts).toHaveLength(0);
    });

    it('aborts both branches when the caller cancels', async () => {
        const completion = new FakeCompletion(routeByPrompt({
            retrieval: respondAfter(500, 'Qualitative view'),
            quantitative: respondAfter(500, 'Quantitative view'),
        }));
        const { orchestrator, search } = buildOrchestrator(completion, new KeywordEmbedder(), testConfig());
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 30);

        const started = Date.now();
        await expect(
            orchestrator.analyze(
                { memoText: SAMPLE_MEMO, series: monthlySeries(GROWING_REVENUE) },
                { signal: controller.signal },
            ),
        ).rejects.toBeInstanceOf(CancelledAnalysisError);

        expect(Date.now() - started).toBeLessThan(400);
        expect(search.openHandles).toBe(0);
        expect(completion.prompts).toHaveLength(2);
    });

    it('reports degraded components without an API key', () => {
        const config = testConfig({ openai: { model: 'test-model', embeddingModel: 'test-embedding' } });
        const { orchestrator } = buildOrchestrator(new FakeCompletion(failWith()), new KeywordEmbedder(), config);

        const status = orchestrator.getStatus();

        expect(status.qualitative_analyzer).toMatchObject({ status: 'degraded', mode: 'memo excerpt' });
        expect(status.quantitative_analyzer).toMatchObject({ status: 'operational', mode: 'templated summary' });
        expect(status.synthesis_engine).toMatchObject({ status: 'operational', mode: 'rule-based' });
    });
});
