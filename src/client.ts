import pino from 'pino';
import type { Logger } from 'pino';
import { Coordinator } from './application/coordinator.js';
import { DefaultValueEvaluator } from './application/default-evaluator.js';
import type { Evaluator, Transport } from './application/ports.js';
import { DEFAULT_CONFIG, HttpTransport } from './infrastructure/index.js';

export interface FlagClientOptions {
  apiKey: string;
  log?: Logger | undefined;
  /** Defaults to HttpTransport against `apiBaseUrl`. */
  transport?: Transport | undefined;
  /** Defaults to DefaultValueEvaluator. */
  evaluator?: Evaluator | undefined;
  apiBaseUrl?: string | undefined;
  requestTimeoutMs?: number | undefined;
  pollingIntervalMs?: number | undefined;
  flushIntervalMs?: number | undefined;
  flushBatchSize?: number | undefined;
}

/**
 * Builds a coordinator, runs the initial sync and starts the schedulers.
 *
 * Rejects with InitializationError when the initial spec download fails.
 */
export async function createFlagClient(options: FlagClientOptions): Promise<Coordinator> {
  const log = options.log ?? pino({ level: 'info' });

  const transport = options.transport ?? new HttpTransport({
    baseUrl: options.apiBaseUrl ?? DEFAULT_CONFIG.apiBaseUrl,
    timeoutMs: options.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    log: log.child({ component: 'transport' }),
  });

  const client = new Coordinator({
    apiKey: options.apiKey,
    transport,
    evaluator: options.evaluator ?? new DefaultValueEvaluator(),
    log: log.child({ component: 'coordinator' }),
    pollingIntervalMs: options.pollingIntervalMs,
    flushIntervalMs: options.flushIntervalMs,
    flushBatchSize: options.flushBatchSize,
  });

  await client.initialize();
  return client;
}

export { Coordinator } from './application/coordinator.js';
export type { CoordinatorPhase, CoordinatorStatus } from './application/coordinator.js';
export type { ConfigResult } from './application/evaluation-gateway.js';
export type { Endpoint, Evaluator, EvaluationResult, Transport } from './application/ports.js';
export { DefaultValueEvaluator } from './application/default-evaluator.js';
export { InitializationError, CoordinatorStateError, ConfigurationError } from './application/errors.js';
export { HttpTransport } from './infrastructure/index.js';
export type * from './domain/index.js';
