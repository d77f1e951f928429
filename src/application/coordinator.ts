import type { Logger } from 'pino';
import type { BufferedEvent, EventMetadata, EventValue, User } from '../domain/index.js';
import { CoordinatorStateError, InitializationError } from './errors.js';
import { DEFAULT_FLUSH_BATCH_SIZE, EventBuffer, deliverBatches, partition } from './event-buffer.js';
import type { ConfigResult } from './evaluation-gateway.js';
import { EvaluationGateway } from './evaluation-gateway.js';
import { Mailbox } from './mailbox.js';
import type { Evaluator, Transport } from './ports.js';
import type { RepeatingTask } from './scheduler.js';
import {
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_POLLING_INTERVAL_MS,
  createFlushScheduler,
  createSyncScheduler,
} from './scheduler.js';
import { parseSpecDocument } from './spec-schema.js';
import { SpecStore } from './spec-store.js';

export type CoordinatorPhase = 'initializing' | 'running' | 'shutting_down' | 'stopped';

export interface CoordinatorOptions {
  apiKey: string;
  transport: Transport;
  evaluator: Evaluator;
  log: Logger;
  pollingIntervalMs?: number | undefined;
  flushIntervalMs?: number | undefined;
  flushBatchSize?: number | undefined;
  /** Clock for event timestamps. Injectable for tests. */
  nowFn?: (() => number) | undefined;
}

export interface CoordinatorStatus {
  phase: CoordinatorPhase;
  lastSyncTime: number;
  pendingEvents: number;
  specCount: number;
}

/** Everything the coordinator owns, in one record. */
interface CoordinatorState {
  phase: CoordinatorPhase;
  readonly apiKey: string;
  lastSyncTime: number;
  readonly store: SpecStore;
  readonly pendingEvents: EventBuffer;
}

/**
 * Single owner of the spec cache, the telemetry buffer and the sync cursor.
 *
 * Every operation (evaluations, logs, flushes, scheduled syncs, shutdown)
 * goes through one Mailbox and runs to completion before the next starts.
 * Network calls run inside the mailbox too, so an evaluation posted while a
 * sync fetch or a delivery is in flight waits for it to finish.
 *
 * Lifecycle:
 *   initializing --initialize() ok--> running --shutdown()--> shutting_down --> stopped
 *   initializing --initial fetch failed--> stopped
 */
export class Coordinator {
  private readonly state: CoordinatorState;
  private readonly transport: Transport;
  private readonly log: Logger;
  private readonly gateway: EvaluationGateway;
  private readonly mailbox = new Mailbox();
  private readonly syncScheduler: RepeatingTask;
  private readonly flushScheduler: RepeatingTask;
  private readonly flushBatchSize: number;
  private initializeCalled = false;

  constructor(options: CoordinatorOptions) {
    const store = new SpecStore();
    const pendingEvents = new EventBuffer();

    this.state = {
      phase: 'initializing',
      apiKey: options.apiKey,
      lastSyncTime: 0,
      store,
      pendingEvents,
    };
    this.transport = options.transport;
    this.log = options.log;
    this.flushBatchSize = options.flushBatchSize ?? DEFAULT_FLUSH_BATCH_SIZE;
    if (!Number.isInteger(this.flushBatchSize) || this.flushBatchSize <= 0) {
      throw new RangeError(`flushBatchSize must be a positive integer, got ${this.flushBatchSize}`);
    }
    this.gateway = new EvaluationGateway(store, pendingEvents, options.evaluator, options.nowFn);

    this.syncScheduler = createSyncScheduler(
      () => this.mailbox.post(() => this.syncSpecs()),
      this.log,
      options.pollingIntervalMs ?? DEFAULT_POLLING_INTERVAL_MS,
    );
    this.flushScheduler = createFlushScheduler(
      () => this.mailbox.post(() => this.flushPending()),
      this.log,
      options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS,
    );
  }

  /**
   * Performs the initial full sync and starts both schedulers.
   *
   * Rejects with InitializationError when the transport fails, and with
   * CoordinatorStateError when shutdown() began before the fetch returned. A body that
   * does not parse is not fatal: the cache stays empty and the next
   * scheduled sync asks for everything again.
   */
  async initialize(): Promise<void> {
    if (this.initializeCalled) {
      throw new CoordinatorStateError('initialize', this.state.phase);
    }
    this.initializeCalled = true;

    await this.mailbox.post(async () => {
      const body = await this.fetchSpecs(0);
      if (body === null) {
        this.state.phase = 'stopped';
        throw new InitializationError('Initial download_config_specs request failed');
      }

      this.applySpecBody(body);
      // shutdown() may have been called while the initial fetch was in flight
      if (this.state.phase === 'initializing') this.state.phase = 'running';
    });

    if (this.state.phase !== 'running') {
      throw new CoordinatorStateError('initialize', this.state.phase);
    }

    this.syncScheduler.start();
    this.flushScheduler.start();

    this.log.info(
      { lastSyncTime: this.state.lastSyncTime, specCount: this.state.store.size },
      'Flag client initialized',
    );
  }

  checkGate(user: User, name: string): Promise<boolean> {
    return this.dispatch('check gate', () => this.gateway.evaluateGate(user, name));
  }

  getConfig(user: User, name: string): Promise<ConfigResult> {
    return this.dispatch('get config', () => this.gateway.evaluateConfig(user, name));
  }

  logEvent(
    user: User,
    eventName: string,
    value?: EventValue,
    metadata?: EventMetadata | null,
  ): Promise<void> {
    return this.dispatch('log event', () => this.gateway.logEvent(user, eventName, value, metadata));
  }

  /** Flushes now and resolves to the number of events still pending. */
  flush(): Promise<number> {
    return this.dispatch('flush', () => this.flushPending());
  }

  /** Queues a flush without waiting for it. Failures are logged. */
  requestFlush(): void {
    this.flush().catch((err: unknown) => {
      this.log.warn({ err }, 'Requested flush did not run');
    });
  }

  /**
   * Stops the schedulers, lets queued work finish and makes one final
   * delivery attempt. Events that still fail are dropped.
   *
   * @returns How many events were dropped.
   */
  async shutdown(): Promise<number> {
    if (this.state.phase === 'shutting_down' || this.state.phase === 'stopped') {
      return 0;
    }

    this.state.phase = 'shutting_down';
    this.syncScheduler.stop();
    this.flushScheduler.stop();

    const dropped = await this.mailbox.post(async () => {
      const remaining = await this.flushPending();
      this.state.pendingEvents.drain();
      return remaining;
    });

    this.state.phase = 'stopped';
    if (dropped > 0) {
      this.log.warn({ dropped }, 'Shutdown flush left undelivered events; discarding them');
    } else {
      this.log.info('Flag client stopped');
    }
    return dropped;
  }

  status(): CoordinatorStatus {
    return {
      phase: this.state.phase,
      lastSyncTime: this.state.lastSyncTime,
      pendingEvents: this.state.pendingEvents.size,
      specCount: this.state.store.size,
    };
  }

  /** Queues `task` if the coordinator accepts work. */
  private dispatch<T>(operation: string, task: () => T | Promise<T>): Promise<T> {
    if (this.state.phase !== 'running') {
      return Promise.reject(new CoordinatorStateError(operation, this.state.phase));
    }
    return this.mailbox.post(task);
  }

  private async fetchSpecs(sinceTime: number): Promise<string | null> {
    try {
      return await this.transport.request(this.state.apiKey, 'download_config_specs', { sinceTime });
    } catch (err: unknown) {
      this.log.warn({ err }, 'Transport rejected download_config_specs');
      return null;
    }
  }

  /** Scheduled sync: incremental fetch from the current cursor. */
  private async syncSpecs(): Promise<void> {
    const sinceTime = this.state.lastSyncTime;
    const body = await this.fetchSpecs(sinceTime);

    if (body === null) {
      this.log.warn({ sinceTime }, 'Spec sync failed, keeping cached specs');
      return;
    }

    this.applySpecBody(body);
  }

  /**
   * Merges a `download_config_specs` body into the store.
   * A body that does not parse leaves the store as it is and resets the
   * cursor to 0 so the next sync is a full one.
   */
  private applySpecBody(body: string): void {
    const parsed = parseSpecDocument(body);

    if (!parsed.success) {
      this.state.lastSyncTime = 0;
      this.log.warn({ err: parsed.error }, 'Malformed spec document, next sync will be a full resync');
      return;
    }

    const { feature_gates, dynamic_configs, time } = parsed.document;
    const gates = this.state.store.replaceAll('feature_gate', feature_gates);
    const configs = this.state.store.replaceAll('dynamic_config', dynamic_configs);
    this.state.lastSyncTime = time;

    this.log.debug({ gates, configs, lastSyncTime: time }, 'Specs synced');
  }

  /** Delivers pending events in batches and restores the ones that failed. */
  private async flushPending(): Promise<number> {
    const events = this.state.pendingEvents.drain();
    if (events.length === 0) return 0;

    const batches = partition(events, this.flushBatchSize);
    const unsent = await deliverBatches(batches, (batch) => this.deliver(batch));
    this.state.pendingEvents.restore(unsent);

    const remaining = this.state.pendingEvents.size;
    if (unsent.length > 0) {
      const level = remaining > this.flushBatchSize ? 'warn' : 'info';
      this.log[level](
        { sent: events.length - unsent.length, unsent: unsent.length, remaining },
        'Event flush incomplete, undelivered batches re-queued',
      );
    } else {
      this.log.debug({ sent: events.length, batches: batches.length }, 'Events flushed');
    }
    return remaining;
  }

  private async deliver(batch: readonly BufferedEvent[]): Promise<boolean> {
    try {
      const body = await this.transport.request(this.state.apiKey, 'rgstr', { events: batch });
      return body !== null;
    } catch (err: unknown) {
      this.log.warn({ err, size: batch.length }, 'Transport rejected rgstr');
      return false;
    }
  }
}
