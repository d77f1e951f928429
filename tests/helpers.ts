import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Endpoint, Transport } from '../src/application/ports.js';
import type { BufferedEvent, User } from '../src/domain/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

export interface TransportCall {
  apiKey: string;
  endpoint: Endpoint;
  payload: Record<string, unknown>;
}

type Scripted = string | null | Promise<string | null>;

/**
 * In-process transport.
 *
 * Responses are taken from the per-endpoint queues in order; once a queue is
 * empty the endpoint's default answer is used.
 */
export class FakeTransport implements Transport {
  readonly calls: TransportCall[] = [];
  readonly specResponses: Scripted[] = [];
  readonly rgstrResponses: Scripted[] = [];
  defaultSpecBody: string | null = '{"time":0}';
  defaultRgstrBody: string | null = '{"success":true}';

  async request(apiKey: string, endpoint: Endpoint, payload: Record<string, unknown>): Promise<string | null> {
    this.calls.push({ apiKey, endpoint, payload });

    if (endpoint === 'download_config_specs') {
      const next = this.specResponses.shift();
      return next === undefined ? this.defaultSpecBody : await next;
    }

    const next = this.rgstrResponses.shift();
    return next === undefined ? this.defaultRgstrBody : await next;
  }

  callsTo(endpoint: Endpoint): TransportCall[] {
    return this.calls.filter((call) => call.endpoint === endpoint);
  }

  /** Event names of every batch posted to `rgstr`, one array per call. */
  deliveredNames(): string[][] {
    return this.callsTo('rgstr').map((call) => {
      const events = call.payload['events'] as BufferedEvent[];
      return events.map((event) => event.eventName);
    });
  }
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function specBody(doc: Record<string, unknown>): string {
  return JSON.stringify(doc);
}

export const testUser: User = { userID: 'user-1', email: 'user-1@example.com' };
