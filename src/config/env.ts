import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z.enum(['true', 'false']).default('true').transform(value => value === 'true');

// setTimeout fires immediately for delays above 2^31 - 1 ms.
const timeoutMs = z.coerce.number().int().positive().max(2_147_483_647);

export const envSchema = z.object({
    PORT: z.string().default('8000'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CORS_ORIGIN: z.string().default('*'),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    COMPLETION_TIMEOUT_MS: timeoutMs.default(30_000),
    EMBEDDING_TIMEOUT_MS: timeoutMs.default(15_000),
    RETRIEVAL_TIMEOUT_MS: timeoutMs.default(15_000),
    CHUNK_SIZE: z.coerce.number().int().positive().default(500),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
    RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
    MAX_MEMO_CHARS: z.coerce.number().int().positive().default(12_000),
    EXCERPT_CHARS: z.coerce.number().int().positive().default(600),
    TREND_GROWING_ABOVE: z.coerce.number().default(0.05),
    TREND_DECLINING_BELOW: z.coerce.number().default(-0.05),
    MAX_INVEST_VOLATILITY: z.coerce.number().nonnegative().default(0.15),
    STATIC_FALLBACKS: booleanFlag,
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
