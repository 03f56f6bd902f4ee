import express from 'express';
import type { RequestHandler, Response } from 'express';
import multer from 'multer';
import { CancelledAnalysisError, TerminalPipelineError, ValidationError, describeError } from '../errors';
import type { HybridOrchestrator } from '../engine/hybrid_orchestrator';
import type { FinancialMetrics, HybridAnalysis } from '../types/analysis_types';
import { parseFinancialCsv } from '../utils/financial_csv';

const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES, files: 2 },
});

function uploadedFile(files: Express.Request['files'], field: string): Express.Multer.File | undefined {
    if (!files || Array.isArray(files)) return undefined;
    return files[field]?.[0];
}

function metricsBody(metrics: FinancialMetrics) {
    return {
        month_count: metrics.monthCount,
        total_revenue: metrics.totalRevenue,
        average_monthly_revenue: metrics.averageMonthlyRevenue,
        growth_rates: metrics.growthRates,
        undefined_growth_months: metrics.undefinedGrowthMonths,
        average_growth: metrics.averageGrowth,
        latest_growth: metrics.latestGrowth,
        volatility: metrics.volatility,
        growth_consistency: metrics.growthConsistency,
        trend_slope: metrics.trendSlope,
        recent_vs_early_ratio: metrics.recentVsEarlyRatio,
        trend: metrics.trend,
    };
}

export function toVetResponse(analysis: HybridAnalysis) {
    return {
        request_id: analysis.requestId,
        qualitative_summary: analysis.qualitative.summary,
        quantitative_summary: analysis.quantitative.summary,
        final_recommendation: {
            decision: analysis.recommendation.decision,
            justification: analysis.recommendation.justification,
            source: analysis.recommendation.source,
        },
        sources: {
            qualitative_summary: analysis.qualitative.source,
            quantitative_summary: analysis.quantitative.source,
        },
        metrics: metricsBody(analysis.metrics),
    };
}

export function statusCodeFor(error: unknown): number {
    if (error instanceof ValidationError || error instanceof multer.MulterError) return 400;
    if (error instanceof TerminalPipelineError) return 502;
    return 500;
}

function sendError(res: Response, error: unknown): void {
    const status = statusCodeFor(error);
    if (status === 500) {
        console.error('[Analysis] Unexpected error:', error);
        res.status(500).json({ error: 'Internal Server Error' });
        return;
    }
    res.status(status).json({ error: error instanceof Error ? error.message : String(error) });
}

/**
 * Upload parsing plus the analysis handler, shared by both mount points of
 * the vet-startup endpoint.
 */
export function vetStartupHandlers(orchestrator: HybridOrchestrator): RequestHandler[] {
    const receiveFiles = upload.fields([
        { name: 'memo_file', maxCount: 1 },
        { name: 'financial_data', maxCount: 1 },
    ]);

    const analyze: RequestHandler = async (req, res) => {
        const memoFile = uploadedFile(req.files, 'memo_file');
        const financialFile = uploadedFile(req.files, 'financial_data');

        if (!memoFile || !financialFile) {
            return res.status(400).json({ error: "Both 'memo_file' (.txt) and 'financial_data' (.csv) are required." });
        }
        if (!memoFile.originalname.toLowerCase().endsWith('.txt')) {
            return res.status(400).json({ error: 'Memo file must be a .txt file' });
        }
        if (!financialFile.originalname.toLowerCase().endsWith('.csv')) {
            return res.status(400).json({ error: 'Financial data must be a .csv file' });
        }

        console.log(`[Analysis] Received ${memoFile.originalname} (${memoFile.size} bytes) and ${financialFile.originalname} (${financialFile.size} bytes).`);

        // A client that goes away before the answer is written cancels the pipeline.
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) controller.abort();
        });

        try {
            const series = parseFinancialCsv(financialFile.buffer.toString('utf8'));
            const analysis = await orchestrator.analyze(
                { memoText: memoFile.buffer.toString('utf8'), series },
                { signal: controller.signal },
            );
            res.json(toVetResponse(analysis));
        } catch (error) {
            if (error instanceof CancelledAnalysisError) {
                console.warn('[Analysis] Client disconnected; analysis cancelled.');
                return;
            }
            if (!(error instanceof ValidationError)) {
                console.error('[Analysis] Request failed:', describeError(error));
            }
            sendError(res, error);
        }
    };

    return [receiveFiles, analyze];
}

export function createAnalysisRouter(orchestrator: HybridOrchestrator): express.Router {
    const router = express.Router();

    router.get('/status', (req, res) => {
        res.json({
            status: 'operational',
            components: orchestrator.getStatus(),
            timestamp: new Date().toISOString(),
        });
    });

    router.post('/vet_startup', ...vetStartupHandlers(orchestrator));

    return router;
}
