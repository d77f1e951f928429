import type { Logger } from 'pino';
import type { Endpoint, Transport } from '../../application/ports.js';

export const API_KEY_HEADER = 'x-flagsync-api-key';

export interface HttpTransportOptions {
  baseUrl: string;
  timeoutMs: number;
  log: Logger;
  /** Defaults to the global fetch. */
  fetchFn?: typeof fetch | undefined;
}

/**
 * Transport over HTTPS using fetch.
 *
 * POSTs the JSON payload to `{baseUrl}/{endpoint}`. Every failure mode
 * (non-2xx status, network error, timeout) resolves to `null` and is logged;
 * the promise never rejects.
 */
export class HttpTransport implements Transport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.log = options.log;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async request(
    apiKey: string,
    endpoint: Endpoint,
    payload: Record<string, unknown>,
  ): Promise<string | null> {
    const url = `${this.baseUrl}/${endpoint}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          [API_KEY_HEADER]: apiKey,
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        this.log.warn({ status: response.status, endpoint }, 'Request returned non-OK status');
        return null;
      }

      return await response.text();
    } catch (err: unknown) {
      if (controller.signal.aborted) {
        this.log.warn({ endpoint, timeoutMs: this.timeoutMs }, 'Request timed out');
      } else {
        this.log.warn({ err, endpoint }, 'Request failed');
      }
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
