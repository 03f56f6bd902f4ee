export interface MonthlyRecord {
    month: string;
    revenue: number;
}

export type FinancialSeries = MonthlyRecord[];

export type Trend = 'growing' | 'declining' | 'flat' | 'insufficient_data';

export interface FinancialMetrics {
    monthCount: number;
    totalRevenue: number;
    averageMonthlyRevenue: number;
    /** One entry per month after the first; null where the prior month had zero revenue. */
    growthRates: ReadonlyArray<number | null>;
    undefinedGrowthMonths: readonly string[];
    definedGrowthCount: number;
    averageGrowth: number | null;
    latestGrowth: number | null;
    /** Population standard deviation of the defined growth rates. */
    volatility: number;
    /** Share of defined growth rates above zero. */
    growthConsistency: number | null;
    trendSlope: number | null;
    recentVsEarlyRatio: number | null;
    trend: Trend;
}

export interface TextChunk {
    index: number;
    text: string;
    embedding?: number[];
}

export type AnalysisSource = 'model-generated' | 'fallback';

export type QualitativeMethod = 'retrieval' | 'direct' | 'excerpt' | 'unavailable';
export type QuantitativeMethod = 'narrative' | 'template' | 'unavailable';

export interface AnalysisResult<M extends string = string> {
    summary: string;
    source: AnalysisSource;
    method: M;
    confidence?: number;
}

export type QualitativeResult = AnalysisResult<QualitativeMethod>;
export type QuantitativeResult = AnalysisResult<QuantitativeMethod>;

export const DECISIONS = ['Invest', 'Pass', 'Monitor'] as const;
export type Decision = typeof DECISIONS[number];

export type RecommendationSource = 'model-generated' | 'rule-based-fallback';

export interface Recommendation {
    decision: Decision;
    justification: string;
    source: RecommendationSource;
}

export interface StartupSubmission {
    memoText: string;
    series: FinancialSeries;
}

export interface HybridAnalysis {
    requestId: string;
    qualitative: QualitativeResult;
    quantitative: QuantitativeResult;
    metrics: FinancialMetrics;
    recommendation: Recommendation;
    durationMs: number;
}

export interface ComponentStatus {
    status: 'operational' | 'degraded';
    mode: string;
    details?: Record<string, string | number | boolean>;
}
