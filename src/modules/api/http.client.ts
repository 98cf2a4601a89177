import { EventEmitter } from 'node:events';
import type { z } from 'zod';
import { API_KEY_PARAM } from '../../config/api.js';
import baseLogger, { type Logger } from '../../plugins/logger.js';
import {
  ClientClosedError,
  NetworkError,
  RequestTimeoutError,
  ResponseValidationError,
  httpErrorFor,
  toErrorInfo,
} from '../../shared/errors.js';
import { maskParams } from '../../shared/utils.js';

export type HttpClientOptions = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  logger?: Logger;
};

export type QueryParams = Record<string, string | number | undefined>;

/**
 * Session shared by every request a client makes. Requests may run
 * concurrently; each gets its own abort controller, linked to the session so
 * that `close()` cancels everything still in flight.
 */
export class HttpClient {
  private readonly session = new AbortController();
  private readonly log: Logger;

  constructor(private readonly options: HttpClientOptions) {
    this.log = (options.logger ?? baseLogger).child({ module: 'http' });
    // One abort listener per in-flight request; a wide window fans out past the default of 10
    EventEmitter.setMaxListeners(0, this.session.signal);
  }

  get closed(): boolean {
    return this.session.signal.aborted;
  }

  // Aborts when the client is closed
  get signal(): AbortSignal {
    return this.session.signal;
  }

  buildUrl(path: string, params?: QueryParams): URL {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    const url = new URL(`${base}${path}`);
    for (const [name, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(name, String(value));
    }
    url.searchParams.set(API_KEY_PARAM, this.options.apiKey);
    return url;
  }

  async get<T>(path: string, schema: z.ZodType<T>, params?: QueryParams): Promise<T> {
    if (this.closed) throw new ClientClosedError();

    const url = this.buildUrl(path, params);
    const urlForLog = maskParams(url, [API_KEY_PARAM]);
    this.log.debug({ url: urlForLog }, 'request');

    const data = await this.request(url, urlForLog);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const err = new ResponseValidationError(urlForLog, parsed.error.issues);
      this.log.warn(toErrorInfo(err), 'response did not match schema');
      throw err;
    }
    return parsed.data;
  }

  close(): void {
    if (this.closed) return;
    this.session.abort();
    this.log.debug('session closed');
  }

  private async request(url: URL, urlForLog: string): Promise<unknown> {
    const controller = new AbortController();
    const onClose = () => controller.abort();
    this.session.signal.addEventListener('abort', onClose, { once: true });
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    const transportError = (cause: unknown) => {
      if (this.closed) return new ClientClosedError();
      if (timedOut) return new RequestTimeoutError(urlForLog, this.options.timeoutMs);
      return new NetworkError(urlForLog, cause);
    };

    try {
      let res: Response;
      try {
        res = await fetch(url, { headers: { Accept: 'application/json' }, signal: controller.signal });
      } catch (e) {
        throw transportError(e);
      }
      if (!res.ok) {
        await res.body?.cancel();
        throw httpErrorFor(res.status, urlForLog, res.statusText);
      }
      let text: string;
      try {
        text = await res.text();
      } catch (e) {
        throw transportError(e);
      }
      try {
        return JSON.parse(text);
      } catch (e) {
        throw new ResponseValidationError(urlForLog, e instanceof Error ? e.message : String(e));
      }
    } catch (e) {
      this.log.warn(toErrorInfo(e), 'request failed');
      throw e;
    } finally {
      clearTimeout(timer);
      this.session.signal.removeEventListener('abort', onClose);
    }
  }
}
