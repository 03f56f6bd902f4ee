import type { AnalystConfig, SynthesisRules } from '../config/analyst_config';
import { SynthesisParseError, describeError } from '../errors';
import {
    DECISIONS,
    type Decision,
    type FinancialMetrics,
    type QualitativeResult,
    type QuantitativeResult,
    type Recommendation,
} from '../types/analysis_types';
import { throwIfCancelled, type CallOptions } from '../utils/timeout';
import { completeWithTimeout, type TextCompletion } from './llm_engine';
import { buildSynthesisPrompt } from './prompts';

const DECISION_LINE = /DECISION\s*:\s*[*"'[\s]*(invest|pass|monitor)\b/i;
const JUSTIFICATION_MARKER = /JUSTIFICATION\s*:\s*\**/i;

function toDecision(word: string): Decision | undefined {
    return DECISIONS.find(d => d.toLowerCase() === word.toLowerCase());
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function percent(value: number | null): string {
    return value === null ? 'n/a' : `${(value * 100).toFixed(1)}%`;
}

/**
 * Maps free-form model output onto the closed decision set.
 * A "DECISION:" line wins; otherwise exactly one decision word must appear.
 * @throws SynthesisParseError when no single decision can be identified
 */
export function parseRecommendation(output: string): { decision: Decision; justification: string } {
    let decision: Decision | undefined;

    const line = output.match(DECISION_LINE);
    if (line) {
        decision = toDecision(line[1]);
    } else {
        const mentioned = DECISIONS.filter(d => new RegExp(`\\b${d}\\b`, 'i').test(output));
        if (mentioned.length === 1) decision = mentioned[0];
    }

    if (!decision) {
        throw new SynthesisParseError('Model output does not name exactly one of Invest, Pass or Monitor', output);
    }

    const marker = JUSTIFICATION_MARKER.exec(output);
    const justification = marker
        ? output.slice(marker.index + marker[0].length).trim()
        : output.replace(/^.*DECISION\s*:.*$/im, '').trim();

    return {
        decision,
        justification: justification || `The model selected ${decision} without further justification.`,
    };
}

/**
 * Regex source for a keyword phrase whose last word may appear in plural form
 * ("lawsuit" → "lawsuits", "data breach" → "data breaches", "bankruptcy" → "bankruptcies").
 */
function keywordPattern(keyword: string): string {
    const words = keyword.trim().split(/\s+/);
    const last = words.pop() ?? '';
    const inflected = /[^aeiou]y$/i.test(last)
        ? `${escapeRegExp(last.slice(0, -1))}(?:y|ies)`
        : `${escapeRegExp(last)}(?:s|es)?`;
    return [...words.map(escapeRegExp), inflected].join('\\s+');
}

export function findRiskKeywords(summary: string, keywords: readonly string[]): string[] {
    return keywords.filter(keyword => new RegExp(`\\b${keywordPattern(keyword)}\\b`, 'i').test(summary));
}

/**
 * Deterministic decision over the metrics and the qualitative summary:
 * declining → Pass; growing with volatility under the ceiling and no
 * high-severity risk keyword → Invest; anything else → Monitor.
 */
export function decideByRules(
    metrics: FinancialMetrics,
    qualitativeSummary: string,
    rules: SynthesisRules,
): { decision: Decision; justification: string; flaggedRisks: string[] } {
    const flaggedRisks = findRiskKeywords(qualitativeSummary, rules.highSeverityRiskKeywords);
    const growth = `average MoM growth ${percent(metrics.averageGrowth)}`;

    if (metrics.trend === 'declining') {
        return {
            decision: 'Pass',
            justification: `Rule-based decision: revenue trend is declining (${growth}), which rules out an investment regardless of qualitative signals.`,
            flaggedRisks,
        };
    }

    const volatilityOk = metrics.volatility < rules.maxInvestVolatility;
    if (metrics.trend === 'growing' && volatilityOk && flaggedRisks.length === 0) {
        return {
            decision: 'Invest',
            justification: `Rule-based decision: revenue trend is growing (${growth}) with volatility of ${percent(metrics.volatility)}, below the ${percent(rules.maxInvestVolatility)} ceiling, and the qualitative summary raises no high-severity risk.`,
            flaggedRisks,
        };
    }

    const concerns: string[] = [];
    if (metrics.trend === 'flat') concerns.push(`revenue trend is flat (${growth})`);
    if (metrics.trend === 'insufficient_data') concerns.push('there is not enough revenue history to establish growth');
    if (metrics.trend === 'growing') concerns.push(`revenue trend is growing (${growth})`);
    if (!volatilityOk) concerns.push(`growth volatility of ${percent(metrics.volatility)} is at or above the ${percent(rules.maxInvestVolatility)} ceiling`);
    if (flaggedRisks.length > 0) concerns.push(`the qualitative summary flags high-severity risk (${flaggedRisks.join(', ')})`);

    return {
        decision: 'Monitor',
        justification: `Rule-based decision: ${concerns.join('; ')}.`,
        flaggedRisks,
    };
}

export class SynthesisEngine {
    constructor(
        private readonly completion: TextCompletion,
        private readonly config: AnalystConfig,
    ) { }

    async synthesize(
        qualitative: QualitativeResult,
        quantitative: QuantitativeResult,
        metrics: FinancialMetrics,
        options: CallOptions = {},
    ): Promise<Recommendation> {
        const { signal } = options;

        try {
            const output = await completeWithTimeout(
                this.completion,
                buildSynthesisPrompt(qualitative, quantitative),
                this.config.timeouts.completionMs,
                signal,
            );
            const parsed = parseRecommendation(output);
            console.log(`[Synthesis] Model recommendation: ${parsed.decision}.`);
            return { ...parsed, source: 'model-generated' };
        } catch (error) {
            throwIfCancelled(error, signal);
            console.warn('[Synthesis] Falling back to rule-based decision:', describeError(error));
        }

        const { decision, justification } = decideByRules(metrics, qualitative.summary, this.config.synthesis);
        console.log(`[Synthesis] Rule-based recommendation: ${decision}.`);
        return { decision, justification, source: 'rule-based-fallback' };
    }
}
