import type { Env } from './env';
import riskKeywords from './risk_keywords.json';

export interface TrendThresholds {
    /** Average MoM growth strictly above this is "growing". */
    growingAbove: number;
    /** Average MoM growth strictly below this is "declining". */
    decliningBelow: number;
}

export interface SynthesisRules {
    /** Growing companies only qualify for Invest with volatility below this. */
    maxInvestVolatility: number;
    highSeverityRiskKeywords: readonly string[];
}

export interface AnalystConfig {
    readonly openai: {
        apiKey?: string;
        model: string;
        embeddingModel: string;
    };
    readonly timeouts: {
        completionMs: number;
        embeddingMs: number;
        retrievalMs: number;
    };
    readonly chunking: {
        chunkSize: number;
        overlap: number;
        topK: number;
    };
    readonly qualitative: {
        maxMemoChars: number;
        excerptChars: number;
    };
    readonly trend: TrendThresholds;
    readonly synthesis: SynthesisRules;
    /** When false, the deterministic last-resort tiers (memo excerpt, templated summary) are disabled. */
    readonly staticFallbacks: boolean;
}

export const DEFAULT_TREND_THRESHOLDS: TrendThresholds = {
    growingAbove: 0.05,
    decliningBelow: -0.05,
};

export const DEFAULT_SYNTHESIS_RULES: SynthesisRules = {
    maxInvestVolatility: 0.15,
    highSeverityRiskKeywords: riskKeywords.highSeverity,
};

export function buildAnalystConfig(env: Env): AnalystConfig {
    if (env.TREND_DECLINING_BELOW > env.TREND_GROWING_ABOVE) {
        throw new Error('TREND_DECLINING_BELOW must not exceed TREND_GROWING_ABOVE');
    }

    return Object.freeze({
        openai: {
            apiKey: env.OPENAI_API_KEY || undefined,
            model: env.OPENAI_MODEL,
            embeddingModel: env.EMBEDDING_MODEL,
        },
        timeouts: {
            completionMs: env.COMPLETION_TIMEOUT_MS,
            embeddingMs: env.EMBEDDING_TIMEOUT_MS,
            retrievalMs: env.RETRIEVAL_TIMEOUT_MS,
        },
        chunking: {
            chunkSize: env.CHUNK_SIZE,
            overlap: Math.min(env.CHUNK_OVERLAP, env.CHUNK_SIZE - 1),
            topK: env.RETRIEVAL_TOP_K,
        },
        qualitative: {
            maxMemoChars: env.MAX_MEMO_CHARS,
            excerptChars: env.EXCERPT_CHARS,
        },
        trend: {
            growingAbove: env.TREND_GROWING_ABOVE,
            decliningBelow: env.TREND_DECLINING_BELOW,
        },
        synthesis: {
            ...DEFAULT_SYNTHESIS_RULES,
            maxInvestVolatility: env.MAX_INVEST_VOLATILITY,
        },
        staticFallbacks: env.STATIC_FALLBACKS,
    });
}
