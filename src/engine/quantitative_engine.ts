import type { AnalystConfig } from '../config/analyst_config';
import { BranchExhaustedError, describeError } from '../errors';
import type { FinancialMetrics, QuantitativeResult } from '../types/analysis_types';
import { throwIfCancelled, type CallOptions } from '../utils/timeout';
import { completeWithTimeout, type TextCompletion } from './llm_engine';
import { buildQuantitativePrompt } from './prompts';

const usd = new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
});

const CONSISTENT_SHARE = 0.8;

function percent(value: number | null): string {
    return value === null ? 'n/a' : `${(value * 100).toFixed(1)}%`;
}

/**
 * Deterministic narrative built only from the metrics. Same metrics, same text.
 */
export function buildTemplatedSummary(metrics: FinancialMetrics): string {
    const months = `${metrics.monthCount} ${metrics.monthCount === 1 ? 'month' : 'months'}`;
    const parts = [
        `Total revenue of ${usd.format(metrics.totalRevenue)} over ${months} (average ${usd.format(metrics.averageMonthlyRevenue)} per month).`,
    ];

    if (metrics.trend === 'insufficient_data') {
        parts.push('Growth analysis: insufficient data; the revenue trend cannot be classified.');
    } else {
        parts.push(
            `Month-over-month growth averaged ${percent(metrics.averageGrowth)} with the latest month at ${percent(metrics.latestGrowth)} and volatility of ${percent(metrics.volatility)}; the revenue trend is ${metrics.trend}.`,
        );
    }

    if (metrics.growthConsistency !== null) {
        const stream = metrics.growthConsistency >= CONSISTENT_SHARE ? 'consistent' : 'inconsistent';
        parts.push(`Revenue grew in ${percent(metrics.growthConsistency)} of months with defined growth, so the revenue stream is ${stream}.`);
    }
    if (metrics.trendSlope !== null) {
        parts.push(`The least-squares trend changes revenue by ${usd.format(metrics.trendSlope)} per month.`);
    }
    if (metrics.recentVsEarlyRatio !== null) {
        parts.push(`Recent months average ${metrics.recentVsEarlyRatio.toFixed(2)}x the revenue of early months.`);
    }

    if (metrics.undefinedGrowthMonths.length > 0) {
        parts.push(`Growth is undefined for ${metrics.undefinedGrowthMonths.join(', ')} (prior month had zero revenue).`);
    }

    return parts.join(' ');
}

/**
 * Quantitative branch: model-written narrative over the metrics, else the template.
 */
export class QuantitativeEngine {
    constructor(
        private readonly completion: TextCompletion,
        private readonly config: AnalystConfig,
    ) { }

    async analyze(metrics: FinancialMetrics, options: CallOptions = {}): Promise<QuantitativeResult> {
        const { signal } = options;

        try {
            const summary = await completeWithTimeout(
                this.completion,
                buildQuantitativePrompt(metrics),
                this.config.timeouts.completionMs,
                signal,
            );
            console.log('[Quantitative] Narrative summary generated.');
            return { summary, source: 'model-generated', method: 'narrative' };
        } catch (error) {
            throwIfCancelled(error, signal);
            console.warn('[Quantitative] Narrative call failed, using templated summary:', describeError(error));

            if (!this.config.staticFallbacks) {
                throw new BranchExhaustedError('quantitative', [`narrative: ${describeError(error)}`]);
            }
        }

        return { summary: buildTemplatedSummary(metrics), source: 'fallback', method: 'template' };
    }
}
