/**
 * Runtime configuration, read from the environment (.env is loaded by the entry point).
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const configSchema = z.object({
  API_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  API_HOST: z.string().min(1).default('0.0.0.0'),

  DEFAULT_BANKROLL: z.coerce.number().positive().default(10_000),
  KELLY_FRACTION: z.coerce.number().positive().max(1).default(0.25),

  MC_SIMULATIONS: z.coerce.number().int().positive().max(1_000_000).default(10_000),
  MC_CRYPTO_DRIFT: z.enum(['zero', 'inferred']).default('zero'),

  SCAN_ENABLED: booleanFlag,
  SCAN_INTERVAL_MS: z.coerce.number().int().min(1_000).default(300_000),
  SCAN_MARKET_LIMIT: z.coerce.number().int().positive().max(500).default(20),
  SCAN_MIN_CONFIDENCE: z.coerce.number().min(0).max(100).default(50),

  WHALE_MIN_TRADE_USD: z.coerce.number().nonnegative().default(500),
  WHALE_SIGNIFICANT_VOLUME_USD: z.coerce.number().nonnegative().default(10_000),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration. Throws with every offending key listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
