#!/usr/bin/env node
import pino from 'pino';
import { createFlagClient } from './client.js';
import { loadConfig } from './infrastructure/config/index.js';
import { buildServer } from './interfaces/http/index.js';

/**
 * Flag sidecar process.
 *
 * Order:
 * 1) Load and validate configuration
 * 2) Initial spec sync (fatal on failure)
 * 3) HTTP routes
 * 4) Register shutdown signals
 * 5) listen()
 *
 * On SIGINT / SIGTERM the server closes, which shuts the client down with
 * one final flush. Events still undelivered after that flush are dropped.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  const client = await createFlagClient({
    apiKey: config.apiKey,
    log,
    apiBaseUrl: config.apiBaseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    pollingIntervalMs: config.pollingIntervalMs,
    flushIntervalMs: config.flushIntervalMs,
    flushBatchSize: config.flushBatchSize,
  });

  const fastify = await buildServer(client, { logger: { level: config.logLevel } });

  let closing = false;
  const shutdown = (signal: string): void => {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'Shutting down...');

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({ host: config.host, port: config.port });
}

main().catch((err: unknown) => {
  pino().fatal({ err }, 'Fatal: failed to start flag sidecar');
  process.exit(1);
});
