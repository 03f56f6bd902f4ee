import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import type { AnalystConfig } from './config/analyst_config';
import type { HybridOrchestrator } from './engine/hybrid_orchestrator';
import { createAnalysisRouter, statusCodeFor, vetStartupHandlers } from './routes/analysis';

export interface AppOptions {
    corsOrigin: string;
    nodeEnv: string;
    /** Skips request logging; tests set this. */
    quiet?: boolean;
}

function corsOptions(corsOrigin: string): cors.CorsOptions {
    if (corsOrigin === '*') return { origin: '*' };

    const allowedOrigins = corsOrigin.split(',').map(o => o.trim()).filter(Boolean);
    return {
        origin: (origin, callback) => {
            // Allow curl and server-to-server callers (no origin)
            if (!origin) return callback(null, true);
            if (allowedOrigins.includes(origin)) {
                callback(null, true);
            } else {
                console.warn(`Blocked CORS origin: ${origin}`);
                callback(new Error('Not allowed by CORS'));
            }
        },
    };
}

export function createApp(orchestrator: HybridOrchestrator, config: AnalystConfig, options: AppOptions): express.Express {
    const app = express();

    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: 100,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
    });

    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    if (!options.quiet) app.use(morgan('dev'));
    app.use(cors(corsOptions(options.corsOrigin)));
    app.use(limiter);

    app.get('/', (req, res) => {
        res.json({ message: 'Hybrid Startup Analyst - startup vetting service' });
    });

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            env: options.nodeEnv,
            ai_connectivity: Boolean(config.openai.apiKey),
            timestamp: new Date().toISOString(),
        });
    });

    app.use('/api/analysis', createAnalysisRouter(orchestrator));
    app.post('/vet_startup', ...vetStartupHandlers(orchestrator));

    // Error Handling
    app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) return next(err);

        const status = statusCodeFor(err);
        if (status === 500) {
            console.error(err instanceof Error ? err.stack : err);
            return res.status(500).json({ error: 'Internal Server Error' });
        }
        res.status(status).json({ error: err instanceof Error ? err.message : String(err) });
    });

    return app;
}
