/**
 * Environment configuration
 *
 * Parsed once from process.env (after dotenv) through a zod schema.
 * `parseEnv` is exported separately so tests can feed their own source.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const boolFlag = z
  .enum(['0', '1', 'true', 'false'])
  .default('0')
  .transform((v) => v === '1' || v === 'true');

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(4100),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    CORS_ORIGINS: z.string().default('*'),

    MONGO_URL: z.string().min(1).default('mongodb://localhost:27017'),
    MONGO_DB: z.string().min(1).default('motor_fault_telemetry'),
    VERDICTS_COLLECTION: z.string().min(1).default('verdicts'),
    VERDICT_STORE: z.enum(['mongo', 'memory']).default('mongo'),

    VERDICT_CACHE_TTL_MS: z.coerce.number().int().positive().default(10_000),
    REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),

    GENERATOR_INTERVAL_SEC: z.coerce.number().positive().default(60),
    GENERATOR_LOCATION: z.string().min(1).optional(),
    SYNTH_CONFIDENCE_FLOOR: z.coerce.number().min(0).max(1).default(0.75),
    CORPUS_DIR: z.string().min(1).default('backend/data/corpus'),
    EMBEDDED_GENERATOR: boolFlag,
  })
  .refine((e) => e.VERDICT_CACHE_TTL_MS > e.REFRESH_INTERVAL_MS, {
    message: 'VERDICT_CACHE_TTL_MS must be longer than REFRESH_INTERVAL_MS, otherwise every refresh reads the store',
    path: ['VERDICT_CACHE_TTL_MS'],
  });

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

let cached: Env | null = null;

export function loadEnv(): Env {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}
