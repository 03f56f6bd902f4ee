import { DEFAULT_TREND_THRESHOLDS, type TrendThresholds } from '../config/analyst_config';
import { ValidationError } from '../errors';
import type { FinancialMetrics, FinancialSeries, Trend } from '../types/analysis_types';

function mean(values: readonly number[]): number {
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function populationStdDev(values: readonly number[]): number {
    if (values.length < 2) return 0;
    const avg = mean(values);
    return Math.sqrt(mean(values.map(v => (v - avg) ** 2)));
}

function leastSquaresSlope(values: readonly number[]): number {
    const xMean = (values.length - 1) / 2;
    const yMean = mean(values);
    let numerator = 0;
    let denominator = 0;
    values.forEach((y, x) => {
        numerator += (x - xMean) * (y - yMean);
        denominator += (x - xMean) ** 2;
    });
    return denominator === 0 ? 0 : numerator / denominator;
}

export const financialMetricsEngine = {
    validate(series: FinancialSeries): void {
        if (series.length === 0) {
            throw new ValidationError('no data');
        }

        series.forEach((record, index) => {
            if (typeof record.month !== 'string' || record.month.trim() === '') {
                throw new ValidationError(`Row ${index}: month label is missing`, index);
            }
            if (typeof record.revenue !== 'number' || !Number.isFinite(record.revenue)) {
                throw new ValidationError(`Row ${index} (${record.month}): revenue is missing or not numeric`, index);
            }
            if (record.revenue < 0) {
                throw new ValidationError(`Row ${index} (${record.month}): revenue must be non-negative`, index);
            }
        });
    },

    classifyTrend(averageGrowth: number | null, thresholds: TrendThresholds = DEFAULT_TREND_THRESHOLDS): Trend {
        if (averageGrowth === null) return 'insufficient_data';
        if (averageGrowth > thresholds.growingAbove) return 'growing';
        if (averageGrowth < thresholds.decliningBelow) return 'declining';
        return 'flat';
    },

    /**
     * Derives growth, volatility and trend from a chronologically ordered series.
     * Growth into a month whose predecessor had zero revenue is undefined (null) and
     * left out of every aggregate.
     */
    compute(series: FinancialSeries, thresholds: TrendThresholds = DEFAULT_TREND_THRESHOLDS): FinancialMetrics {
        this.validate(series);

        const revenues = series.map(r => r.revenue);
        const totalRevenue = revenues.reduce((sum, v) => sum + v, 0);

        const growthRates: Array<number | null> = [];
        const undefinedGrowthMonths: string[] = [];
        for (let i = 1; i < series.length; i++) {
            const previous = revenues[i - 1];
            if (previous === 0) {
                growthRates.push(null);
                undefinedGrowthMonths.push(series[i].month);
            } else {
                growthRates.push((revenues[i] - previous) / previous);
            }
        }

        const defined = growthRates.filter((g): g is number => g !== null);
        const averageGrowth = defined.length > 0 ? mean(defined) : null;

        let recentVsEarlyRatio: number | null = null;
        if (series.length >= 3) {
            const midpoint = Math.floor(series.length / 2);
            const earlyAverage = mean(revenues.slice(0, midpoint));
            recentVsEarlyRatio = earlyAverage > 0 ? mean(revenues.slice(midpoint)) / earlyAverage : null;
        }

        return Object.freeze({
            monthCount: series.length,
            totalRevenue,
            averageMonthlyRevenue: totalRevenue / series.length,
            growthRates: Object.freeze(growthRates),
            undefinedGrowthMonths: Object.freeze(undefinedGrowthMonths),
            definedGrowthCount: defined.length,
            averageGrowth,
            latestGrowth: growthRates.length > 0 ? growthRates[growthRates.length - 1] : null,
            volatility: populationStdDev(defined),
            growthConsistency: defined.length > 0 ? defined.filter(g => g > 0).length / defined.length : null,
            trendSlope: series.length >= 3 ? leastSquaresSlope(revenues) : null,
            recentVsEarlyRatio,
            trend: this.classifyTrend(averageGrowth, thresholds),
        });
    },
};
