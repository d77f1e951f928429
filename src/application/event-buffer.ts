import type { BufferedEvent } from '../domain/index.js';

export const DEFAULT_FLUSH_BATCH_SIZE = 500;

/**
 * Splits `items` into consecutive batches of `size`, preserving order.
 * The last batch holds the remainder.
 */
export function partition<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Attempts delivery of every batch in order and collects the ones that failed.
 *
 * A failed batch does not stop the remaining ones from being attempted.
 * `deliver` resolves to `true` when the batch was accepted.
 *
 * @returns Events of the failed batches, in their original order.
 */
export async function deliverBatches<T>(
  batches: readonly (readonly T[])[],
  deliver: (batch: readonly T[]) => Promise<boolean>,
): Promise<T[]> {
  const unsent: T[] = [];
  for (const batch of batches) {
    const delivered = await deliver(batch);
    if (!delivered) unsent.push(...batch);
  }
  return unsent;
}

/**
 * Pending telemetry, oldest first.
 *
 * There is no size cap. If delivery keeps failing the buffer keeps growing;
 * the coordinator logs the backlog so the condition is visible.
 */
export class EventBuffer {
  private events: BufferedEvent[] = [];

  append(event: BufferedEvent): void {
    this.events.push(event);
  }

  /** Removes and returns everything pending. */
  drain(): BufferedEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  /**
   * Puts undelivered events back. They go ahead of anything appended since
   * the drain so the buffer stays in creation order.
   */
  restore(events: readonly BufferedEvent[]): void {
    if (events.length === 0) return;
    this.events = [...events, ...this.events];
  }

  /** Snapshot of pending events, oldest first. */
  peek(): readonly BufferedEvent[] {
    return this.events;
  }

  get size(): number {
    return this.events.length;
  }
}
