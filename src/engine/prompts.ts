import type { FinancialMetrics, QualitativeResult, QuantitativeResult } from '../types/analysis_types';

export interface AnalyticalQuestion {
    id: 'team' | 'market' | 'risks' | 'traction';
    question: string;
}

export const ANALYTICAL_QUESTIONS: readonly AnalyticalQuestion[] = [
    { id: 'team', question: 'How strong and experienced is the founding and leadership team?' },
    { id: 'market', question: 'What is the market opportunity, its size, and the competitive landscape?' },
    { id: 'risks', question: 'What are the key risks, challenges and uncertainties facing the company?' },
    { id: 'traction', question: 'What traction has the company shown: customers, revenue, retention, growth?' },
];

export interface RetrievedContext {
    question: AnalyticalQuestion;
    passages: string[];
}

export function buildRetrievalPrompt(contexts: RetrievedContext[]): string {
    const sections = contexts.map(({ question, passages }) => {
        const body = passages.length > 0
            ? passages.map((p, i) => `[${i + 1}] ${p}`).join('\n')
            : 'No relevant passages found.';
        return `QUESTION (${question.id}): ${question.question}\nRELEVANT MEMO PASSAGES:\n${body}`;
    });

    return `Analyze the startup described in the memo passages below for an investment committee.

${sections.join('\n\n')}

Answer each question from the passages only, then give an overall assessment of the company's potential.
Call out any severe risk explicitly. Keep the summary to 2-3 concise paragraphs.`;
}

export function buildDirectMemoPrompt(memo: string): string {
    return `Summarize the following startup memo for an investment committee. Cover the team, market opportunity, risks and traction in 2-3 concise paragraphs.

MEMO:
${memo}`;
}

export function describeMetrics(metrics: FinancialMetrics): string {
    const pct = (value: number | null) => value === null ? 'n/a' : `${(value * 100).toFixed(1)}%`;
    return [
        `Months of data: ${metrics.monthCount}`,
        `Total revenue: ${metrics.totalRevenue}`,
        `Average monthly revenue: ${metrics.averageMonthlyRevenue.toFixed(2)}`,
        `Month-over-month growth rates: ${metrics.growthRates.map(pct).join(', ') || 'n/a'}`,
        `Average MoM growth: ${pct(metrics.averageGrowth)}`,
        `Latest MoM growth: ${pct(metrics.latestGrowth)}`,
        `Growth volatility (std dev): ${pct(metrics.volatility)}`,
        `Share of months with positive growth: ${pct(metrics.growthConsistency)}`,
        `Least-squares revenue slope per month: ${metrics.trendSlope === null ? 'n/a' : metrics.trendSlope.toFixed(2)}`,
        `Recent vs early average revenue ratio: ${metrics.recentVsEarlyRatio === null ? 'n/a' : metrics.recentVsEarlyRatio.toFixed(2)}`,
        `Months with undefined growth (prior month zero): ${metrics.undefinedGrowthMonths.join(', ') || 'none'}`,
        `Trend: ${metrics.trend}`,
    ].join('\n');
}

export function buildQuantitativePrompt(metrics: FinancialMetrics): string {
    return `You are reviewing a startup's monthly revenue history. The computed metrics are:

${describeMetrics(metrics)}

Write a short narrative summary (3-4 sentences) of the company's financial performance: scale, growth, consistency and trend. Do not invent figures that are not listed.`;
}

export function buildSynthesisPrompt(qualitative: QualitativeResult, quantitative: QuantitativeResult): string {
    return `Given the following qualitative and quantitative summaries of a startup, provide a final investment recommendation.
State whether you would Invest, Pass, or Monitor, and justify the decision in 2-3 sentences referencing both analyses.

QUALITATIVE SUMMARY:
${qualitative.summary}

QUANTITATIVE SUMMARY:
${quantitative.summary}

Respond in exactly this format:
DECISION: <Invest | Pass | Monitor>
JUSTIFICATION: <2-3 sentences>`;
}
