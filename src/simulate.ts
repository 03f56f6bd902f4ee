import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { buildAnalystConfig } from './config/analyst_config';
import { env } from './config/env';
import { createHybridOrchestrator } from './engine/hybrid_orchestrator';
import { parseFinancialCsv } from './utils/financial_csv';

// Usage: node dist/src/simulate.js [memo.txt] [financials.csv]
async function simulateVetting(memoPath: string, csvPath: string) {
    console.log('--- Hybrid Analysis Simulation Start ---');

    const config = buildAnalystConfig(env);
    if (!config.openai.apiKey) {
        console.warn('OPENAI_API_KEY not set. Every stage will use its fallback.');
    }

    const orchestrator = createHybridOrchestrator(config);
    for (const [component, status] of Object.entries(orchestrator.getStatus())) {
        console.log(`   ${component}: ${status.status} (${status.mode})`);
    }

    const [memoText, csvText] = await Promise.all([readFile(memoPath, 'utf8'), readFile(csvPath, 'utf8')]);
    const result = await orchestrator.analyze({ memoText, series: parseFinancialCsv(csvText) });

    console.log('\nQualitative Summary:');
    console.log(`[${result.qualitative.source} / ${result.qualitative.method}] ${result.qualitative.summary}`);

    console.log('\nQuantitative Summary:');
    console.log(`[${result.quantitative.source} / ${result.quantitative.method}] ${result.quantitative.summary}`);

    console.log('\nFinal Recommendation:');
    console.log(`   Decision: ${result.recommendation.decision} (${result.recommendation.source})`);
    console.log(`   Justification: ${result.recommendation.justification}`);

    console.log(`--- Simulation Complete in ${result.durationMs}ms ---`);
}

const sampleDir = path.resolve(process.cwd(), 'sample_data');
const [memoArg, csvArg] = process.argv.slice(2);

simulateVetting(
    memoArg ?? path.join(sampleDir, 'company_memo.txt'),
    csvArg ?? path.join(sampleDir, 'financial_data.csv'),
).catch(error => {
    console.error('Simulation Failed:', error);
    process.exitCode = 1;
});
