// ──────────────────────────────────────────
// Environment configuration
// ──────────────────────────────────────────

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  PORT: z.coerce.number().int().positive().default(3000),
  AGGREGATION_INTERVAL_MS: z.coerce.number().int().positive().default(3_600_000),
  AGGREGATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(2),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
});

export type AppConfig = z.infer<typeof envSchema>;

let config: AppConfig | undefined;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration — ${issues}`);
  }
  return parsed.data;
}

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}
