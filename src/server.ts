import { buildAnalystConfig } from './config/analyst_config';
import { env } from './config/env';
import { createApp } from './app';
import { createHybridOrchestrator } from './engine/hybrid_orchestrator';

const config = buildAnalystConfig(env);

if (env.NODE_ENV === 'production') {
    if (!env.OPENAI_API_KEY) {
        console.warn('WARNING: OPENAI_API_KEY is missing in production. Every stage will run on its fallback.');
    }
    if (env.CORS_ORIGIN === '*') {
        console.warn('WARNING: CORS_ORIGIN allows every origin in production.');
    }
}

const orchestrator = createHybridOrchestrator(config);
const app = createApp(orchestrator, config, { corsOrigin: env.CORS_ORIGIN, nodeEnv: env.NODE_ENV });

app.listen(Number(env.PORT), () => {
    console.log(`Hybrid Startup Analyst running on port ${env.PORT}`);
    console.log(`Environment: ${env.NODE_ENV}`);
    console.log(`CORS Policy: ${env.CORS_ORIGIN}`);
    console.log(`AI connectivity: ${env.OPENAI_API_KEY ? config.openai.model : 'none (fallback mode)'}`);
});
