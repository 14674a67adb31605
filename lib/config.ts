/**
 * Environment configuration, parsed once with zod.
 * Scripts load `.env` through dotenv before calling loadConfig().
 */

import { z } from 'zod';
import { ScanSyncError } from './errors';
import { formatZodError } from './validation';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  SCAN_API_BASE_URL: z.string().url().optional(),
  SCAN_API_TOKEN: z.string().min(1).optional(),
  SCAN_POLL_INTERVAL_MS: positiveInt(30_000),
  SCAN_PROBE_DELAY_MS: positiveInt(5_000),
  SCAN_MAX_READINESS_RETRIES: z.coerce.number().int().min(0).default(24),
  SCAN_RECENT_ERRORS_CAP: positiveInt(5),
  SCAN_SYNC_CONCURRENCY: positiveInt(2),
  SCAN_DOWNLOADS_DIR: z.string().min(1).default('./Downloads'),
  SCAN_AUTO_SYNC_DEFAULT: z.enum(['true', 'false']).default('true').transform(value => value === 'true'),
  SCAN_STATE_BUCKET: z.string().min(1).optional(),
  AWS_REGION: z.string().min(1).default('us-west-2'),
  AWS_ACCESS_KEY_ID: z.string().min(1).optional(),
  AWS_SECRET_ACCESS_KEY: z.string().min(1).optional(),
});

export interface ScanEngineConfig {
  api: { baseUrl?: string; token?: string };
  pollIntervalMs: number;
  probeDelayMs: number;
  maxReadinessRetries: number;
  recentErrorsCap: number;
  syncConcurrency: number;
  downloadsDir: string;
  autoSyncDefault: boolean;
  /** Present when scan records and settings should persist to S3. */
  s3?: { bucket: string; region: string; accessKeyId?: string; secretAccessKey?: string };
}

/** Treat empty strings as unset, like an unfilled line in a .env file. */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') result[key] = value.trim();
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScanEngineConfig {
  const parsed = envSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    throw new ScanSyncError('validation', `Invalid configuration: ${formatZodError(parsed.error)}`);
  }
  const vars = parsed.data;

  return {
    api: { baseUrl: vars.SCAN_API_BASE_URL, token: vars.SCAN_API_TOKEN },
    pollIntervalMs: vars.SCAN_POLL_INTERVAL_MS,
    probeDelayMs: vars.SCAN_PROBE_DELAY_MS,
    maxReadinessRetries: vars.SCAN_MAX_READINESS_RETRIES,
    recentErrorsCap: vars.SCAN_RECENT_ERRORS_CAP,
    syncConcurrency: vars.SCAN_SYNC_CONCURRENCY,
    downloadsDir: vars.SCAN_DOWNLOADS_DIR,
    autoSyncDefault: vars.SCAN_AUTO_SYNC_DEFAULT,
    s3: vars.SCAN_STATE_BUCKET
      ? {
          bucket: vars.SCAN_STATE_BUCKET,
          region: vars.AWS_REGION,
          accessKeyId: vars.AWS_ACCESS_KEY_ID,
          secretAccessKey: vars.AWS_SECRET_ACCESS_KEY,
        }
      : undefined,
  };
}
