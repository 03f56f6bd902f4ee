import { v4 as uuidv4 } from 'uuid';
import type { AnalystConfig } from '../config/analyst_config';
import { BranchExhaustedError, CancelledAnalysisError, TerminalPipelineError, describeError } from '../errors';
import type {
    AnalysisResult,
    ComponentStatus,
    HybridAnalysis,
    QualitativeResult,
    QuantitativeResult,
    StartupSubmission,
} from '../types/analysis_types';
import type { CallOptions } from '../utils/timeout';
import { financialMetricsEngine } from './financial_metrics_engine';
import { OpenAICompletion } from './llm_engine';
import { QualitativeEngine, validateMemo } from './qualitative_engine';
import { QuantitativeEngine } from './quantitative_engine';
import { OpenAIEmbedder } from './retrieval/embedding_engine';
import { VectorIndex } from './retrieval/vector_index';
import { SynthesisEngine } from './synthesis_engine';

export interface HybridOrchestratorDeps {
    qualitative: QualitativeEngine;
    quantitative: QuantitativeEngine;
    synthesis: SynthesisEngine;
    config: AnalystConfig;
}

function unavailable(branch: string, reason: unknown): AnalysisResult<'unavailable'> {
    const detail = reason instanceof BranchExhaustedError ? reason.reasons.join('; ') : describeError(reason);
    return {
        summary: `${branch} analysis unavailable: ${detail}`,
        source: 'fallback',
        method: 'unavailable',
        confidence: 0,
    };
}

export class HybridOrchestrator {
    private readonly qualitative: QualitativeEngine;
    private readonly quantitative: QuantitativeEngine;
    private readonly synthesis: SynthesisEngine;
    private readonly config: AnalystConfig;

    constructor(deps: HybridOrchestratorDeps) {
        this.qualitative = deps.qualitative;
        this.quantitative = deps.quantitative;
        this.synthesis = deps.synthesis;
        this.config = deps.config;
    }

    /**
     * Validates the submission, runs both analysis branches concurrently and
     * synthesizes a recommendation.
     * @throws ValidationError for a bad memo or revenue series
     * @throws TerminalPipelineError when both branches fail
     * @throws CancelledAnalysisError when the caller's signal fires
     */
    async analyze(submission: StartupSubmission, options: CallOptions = {}): Promise<HybridAnalysis> {
        const requestId = uuidv4();
        const started = Date.now();

        const memo = validateMemo(submission.memoText);
        const metrics = financialMetricsEngine.compute(submission.series, this.config.trend);
        console.log(`[Orchestrator] ${requestId}: ${metrics.monthCount} months, trend ${metrics.trend}. Starting branches.`);

        // Branch-local controller: cancelling the request aborts both branches.
        const controller = new AbortController();
        const onAbort = () => controller.abort();
        options.signal?.addEventListener('abort', onAbort, { once: true });
        if (options.signal?.aborted) controller.abort();

        try {
            const branchOptions = { signal: controller.signal };
            const [qualitativeOutcome, quantitativeOutcome] = await Promise.allSettled([
                this.qualitative.analyze(memo, branchOptions),
                this.quantitative.analyze(metrics, branchOptions),
            ]);

            if (controller.signal.aborted) {
                throw new CancelledAnalysisError();
            }

            if (qualitativeOutcome.status === 'rejected' && quantitativeOutcome.status === 'rejected') {
                console.error(`[Orchestrator] ${requestId}: both branches failed.`);
                throw new TerminalPipelineError(
                    describeError(qualitativeOutcome.reason),
                    describeError(quantitativeOutcome.reason),
                );
            }

            const qualitative = this.settleQualitative(requestId, qualitativeOutcome);
            const quantitative = this.settleQuantitative(requestId, quantitativeOutcome);

            const recommendation = await this.synthesis.synthesize(qualitative, quantitative, metrics, branchOptions);
            const durationMs = Date.now() - started;
            console.log(`[Orchestrator] ${requestId}: ${recommendation.decision} (${recommendation.source}) in ${durationMs}ms.`);

            return { requestId, qualitative, quantitative, metrics, recommendation, durationMs };
        } finally {
            options.signal?.removeEventListener('abort', onAbort);
        }
    }

    getStatus(): Record<'qualitative_analyzer' | 'quantitative_analyzer' | 'synthesis_engine', ComponentStatus> {
        const llm = this.config.openai.apiKey ? this.config.openai.model : 'fallback mode (no API key)';
        const status = this.config.openai.apiKey ? 'operational' : 'degraded';

        return {
            qualitative_analyzer: {
                status,
                mode: this.config.openai.apiKey ? 'retrieval-augmented' : 'memo excerpt',
                details: {
                    llm,
                    embedding_model: this.config.openai.embeddingModel,
                    vector_store: 'in-memory (request-scoped)',
                    chunk_size: this.config.chunking.chunkSize,
                    top_k: this.config.chunking.topK,
                },
            },
            quantitative_analyzer: {
                status: 'operational',
                mode: this.config.openai.apiKey ? 'narrative' : 'templated summary',
                details: {
                    llm,
                    growing_above: this.config.trend.growingAbove,
                    declining_below: this.config.trend.decliningBelow,
                },
            },
            synthesis_engine: {
                status: 'operational',
                mode: this.config.openai.apiKey ? 'model with rule-based fallback' : 'rule-based',
                details: {
                    llm,
                    max_invest_volatility: this.config.synthesis.maxInvestVolatility,
                },
            },
        };
    }

    private settleQualitative(requestId: string, outcome: PromiseSettledResult<QualitativeResult>): QualitativeResult {
        if (outcome.status === 'fulfilled') return outcome.value;
        console.error(`[Orchestrator] ${requestId}: qualitative branch failed:`, describeError(outcome.reason));
        return unavailable('Qualitative', outcome.reason);
    }

    private settleQuantitative(requestId: string, outcome: PromiseSettledResult<QuantitativeResult>): QuantitativeResult {
        if (outcome.status === 'fulfilled') return outcome.value;
        console.error(`[Orchestrator] ${requestId}: quantitative branch failed:`, describeError(outcome.reason));
        return unavailable('Quantitative', outcome.reason);
    }
}

/**
 * Wires the OpenAI-backed capabilities into a ready orchestrator.
 */
export function createHybridOrchestrator(config: AnalystConfig): HybridOrchestrator {
    const completion = new OpenAICompletion({ apiKey: config.openai.apiKey, model: config.openai.model });
    const embedder = new OpenAIEmbedder({ apiKey: config.openai.apiKey, model: config.openai.embeddingModel });
    const search = new VectorIndex(embedder, config.timeouts);

    return new HybridOrchestrator({
        qualitative: new QualitativeEngine(completion, search, config),
        quantitative: new QuantitativeEngine(completion, config),
        synthesis: new SynthesisEngine(completion, config),
        config,
    });
}
