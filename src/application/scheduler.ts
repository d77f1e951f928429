import type { Logger } from 'pino';

export const DEFAULT_POLLING_INTERVAL_MS = 60_000;
export const DEFAULT_FLUSH_INTERVAL_MS = 60_000;

/** Largest delay `setTimeout` honours; longer delays fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Timer that runs `handler` every `intervalMs`, re-arming only after the
 * previous run has settled. Runs never overlap; a slow run pushes the next
 * one back by the same amount.
 *
 * Handler failures are logged and the timer keeps going.
 * Timers are unref'd so an idle scheduler does not keep the process alive.
 */
export class RepeatingTask {
  readonly name: string;
  private readonly intervalMs: number;
  private readonly handler: () => Promise<unknown>;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private active = false;

  constructor(name: string, intervalMs: number, handler: () => Promise<unknown>, log: Logger) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`${name} interval must be a positive number, got ${intervalMs}`);
    }
    if (intervalMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`${name} interval must be at most ${MAX_TIMER_DELAY_MS} ms, got ${intervalMs}`);
    }
    this.name = name;
    this.intervalMs = intervalMs;
    this.handler = handler;
    this.log = log;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.arm();
    this.log.debug({ task: this.name, intervalMs: this.intervalMs }, 'Scheduled task started');
  }

  /** Cancels the pending firing. A run already in progress finishes but is not re-armed. */
  stop(): void {
    this.active = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.active;
  }

  private arm(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.fire();
    }, this.intervalMs);
    this.timer.unref();
  }

  private async fire(): Promise<void> {
    try {
      await this.handler();
    } catch (err: unknown) {
      this.log.error({ err, task: this.name }, 'Scheduled task failed');
    } finally {
      // start() after a stop() during this run has already armed a timer
      if (this.active && this.timer === null) this.arm();
    }
  }
}

/** Periodic trigger for `download_config_specs`. */
export function createSyncScheduler(
  tick: () => Promise<unknown>,
  log: Logger,
  intervalMs: number = DEFAULT_POLLING_INTERVAL_MS,
): RepeatingTask {
  return new RepeatingTask('sync', intervalMs, tick, log);
}

/** Periodic trigger for telemetry delivery. */
export function createFlushScheduler(
  tick: () => Promise<unknown>,
  log: Logger,
  intervalMs: number = DEFAULT_FLUSH_INTERVAL_MS,
): RepeatingTask {
  return new RepeatingTask('flush', intervalMs, tick, log);
}
