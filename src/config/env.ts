/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a variable is malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';

const envSchema = z.object({
  // ── Runtime ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ── Pipeline ──
  PIPELINE_CONFIG: z.string().min(1).default('config/pipeline.json').describe('Path to the estates/regions JSON file'),
  PERCENT_DECIMALS: z.coerce.number().int().min(0).max(12).default(4),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment.
 * Exposed separately from `env` so tests can feed their own variables.
 */
export function parseEnv(raw: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Environment validation failed: ${details.join('; ')}`);
  }
  return result.data;
}

function loadEnv(): Env {
  try {
    return parseEnv({ ...process.env });
  } catch (err) {
    console.error('❌ Environment validation failed:');
    console.error(`   ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

export const env = loadEnv();
