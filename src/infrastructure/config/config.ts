import { z } from 'zod';
import { ConfigurationError } from '../../application/errors.js';
import { MAX_TIMER_DELAY_MS } from '../../application/scheduler.js';

/**
 * Runtime configuration, read from environment variables.
 */
export interface FlagSyncConfig {
  apiKey: string;
  apiBaseUrl: string;
  pollingIntervalMs: number;
  flushIntervalMs: number;
  flushBatchSize: number;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  host: string;
  port: number;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Defaults for everything except the API key, which has none. */
export const DEFAULT_CONFIG: Omit<FlagSyncConfig, 'apiKey'> = {
  apiBaseUrl: 'https://api.flagsync.dev/v1',
  pollingIntervalMs: 60_000,
  flushIntervalMs: 60_000,
  flushBatchSize: 500,
  requestTimeoutMs: 10_000,
  logLevel: 'info',
  host: '0.0.0.0',
  port: 3000,
};

const positiveInt = z.coerce.number().int().positive();
const delayMs = positiveInt.max(MAX_TIMER_DELAY_MS);

const envSchema = z.object({
  FLAGSYNC_API_KEY: z.string().min(1, 'FLAGSYNC_API_KEY is required'),
  FLAGSYNC_API_URL: z.string().url().default(DEFAULT_CONFIG.apiBaseUrl),
  FLAGSYNC_POLLING_INTERVAL_MS: delayMs.default(DEFAULT_CONFIG.pollingIntervalMs),
  FLAGSYNC_FLUSH_INTERVAL_MS: delayMs.default(DEFAULT_CONFIG.flushIntervalMs),
  FLAGSYNC_FLUSH_BATCH_SIZE: positiveInt.default(DEFAULT_CONFIG.flushBatchSize),
  FLAGSYNC_REQUEST_TIMEOUT_MS: delayMs.default(DEFAULT_CONFIG.requestTimeoutMs),
  LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_CONFIG.logLevel),
  HOST: z.string().min(1).default(DEFAULT_CONFIG.host),
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_CONFIG.port),
});

/**
 * Loads configuration from `env` (defaults to `process.env`).
 *
 * Unset variables take their default. Blank strings count as unset.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): FlagSyncConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    apiKey: vars.FLAGSYNC_API_KEY,
    apiBaseUrl: vars.FLAGSYNC_API_URL.replace(/\/+$/, ''),
    pollingIntervalMs: vars.FLAGSYNC_POLLING_INTERVAL_MS,
    flushIntervalMs: vars.FLAGSYNC_FLUSH_INTERVAL_MS,
    flushBatchSize: vars.FLAGSYNC_FLUSH_BATCH_SIZE,
    requestTimeoutMs: vars.FLAGSYNC_REQUEST_TIMEOUT_MS,
    logLevel: vars.LOG_LEVEL,
    host: vars.HOST,
    port: vars.PORT,
  };
}
