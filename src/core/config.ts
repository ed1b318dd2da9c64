import { z } from 'zod';

/**
 * Runtime configuration.
 *
 * Environment variables are validated once at startup; CLI flags
 * override the dataset path and loop interval per run.
 */

export const DEFAULT_DATA_FILE = 'nse_insider_trading_data.csv';
export const DEFAULT_INTERVAL_MINUTES = 15;

/** The API refuses ranges that reach further back than this */
export const MAX_LOOKBACK_DAYS = 30;
/** Start of the first window when there is no usable checkpoint */
export const DEFAULT_LOOKBACK_DAYS = 7;

/** Where a non-JSON API answer (usually a challenge page) is saved */
export const DEBUG_RESPONSE_FILE = 'nse_response_debug.html';

export const LISTING_PATH = '/companies-listing/corporate-filings-insider-trading';
export const API_PATH = '/api/corporates-pit';

const intFromEnv = (fallback: string) =>
  z.string().default(fallback).transform((val) => parseInt(val, 10)).pipe(z.number().int().positive());

export const EnvConfigSchema = z.object({
  NSE_BASE_URL: z.string().url('NSE_BASE_URL must be an absolute URL').default('https://www.nseindia.com'),
  NSE_LOG_FILE: z.string().min(1).default('nse_scraper.log'),
  NSE_REQUEST_TIMEOUT_MS: intFromEnv('30000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Validate the process environment.
 * Throws with every offending variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}
