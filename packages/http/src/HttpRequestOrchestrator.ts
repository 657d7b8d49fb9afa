import {
  DecodeError,
  HttpStatusError,
  RequestTimeoutError,
  TransportError,
  serializeError,
  silentLogger,
  type QueryParams,
  type RequestOptions,
  type RequestOrchestrator,
  type RuntimeLogger
} from '@frontdesk/core';
import { fetch as undiciFetch } from 'undici';

export const DEFAULT_API_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRY_ATTEMPTS = 3;
const BACKOFF_BASE_MS = 1000;

export interface HttpRequestOrchestratorOptions {
  baseUrl?: string;
  timeoutMs?: number;
  retryAttempts?: number;
  fetchImpl?: typeof fetch;
  defaultHeaders?: Record<string, string>;
  logger?: RuntimeLogger;
}

export class HttpRequestOrchestrator implements RequestOrchestrator {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;
  private readonly logger: RuntimeLogger;

  constructor(options: HttpRequestOrchestratorOptions = {}) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_API_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new Error('timeoutMs must be a positive number');
    }
    const retryAttempts = options.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS;
    if (!Number.isInteger(retryAttempts) || retryAttempts < 0) {
      throw new Error('retryAttempts must be a non-negative integer');
    }

    this.baseUrl = (options.baseUrl ?? '').replace(/\/$/, '');
    this.timeoutMs = timeoutMs;
    this.retryAttempts = retryAttempts;
    this.fetchImpl =
      options.fetchImpl ??
      (typeof fetch === 'function' ? fetch : undefined) ??
      ((undiciFetch as unknown) as typeof fetch);
    this.defaultHeaders = {
      'Content-Type': 'application/json',
      ...options.defaultHeaders
    };
    this.logger = options.logger ?? silentLogger;
  }

  async request(target: string, options: RequestOptions = {}): Promise<unknown> {
    const url = this.resolveUrl(target);
    const callerSignal = options.signal;
    if (callerSignal?.aborted) {
      throw new TransportError(url, callerSignal.reason ?? new Error('Request aborted'));
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const forwardAbort = () => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', forwardAbort, { once: true });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: options.method ?? 'GET',
        headers: this.mergeHeaders(options.headers),
        body: options.body,
        signal: controller.signal
      });
    } catch (error) {
      if (timedOut) {
        throw new RequestTimeoutError(url, this.timeoutMs);
      }
      throw new TransportError(url, error);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', forwardAbort);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => undefined);
      throw new HttpStatusError(url, response.status, response.statusText, body);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError(url, error);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new DecodeError(url, error);
    }
  }

  async get(target: string, params: QueryParams = {}): Promise<unknown> {
    return this.request(appendQuery(target, params));
  }

  async post(target: string, body: unknown = {}): Promise<unknown> {
    return this.request(target, {
      method: 'POST',
      body: JSON.stringify(body)
    });
  }

  /**
   * Up to `maxRetries + 1` attempts with a 1s, 2s, 4s... pause between them.
   * Every failure kind is retried; the last one is rethrown as-is.
   */
  async requestWithRetry(
    target: string,
    options: RequestOptions = {},
    maxRetries: number = this.retryAttempts
  ): Promise<unknown> {
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError('maxRetries must be a non-negative integer');
    }
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await this.request(target, options);
      } catch (error) {
        lastError = error;
        if (attempt < maxRetries) {
          const delayMs = 2 ** attempt * BACKOFF_BASE_MS;
          this.logger.warn('Request failed; retrying', {
            target,
            attempt,
            delayMs,
            error: serializeError(error)
          });
          await sleep(delayMs);
        }
      }
    }

    throw lastError;
  }

  private resolveUrl(target: string): string {
    if (/^https?:\/\//i.test(target) || !this.baseUrl) {
      return target;
    }
    return `${this.baseUrl}${target.startsWith('/') ? '' : '/'}${target}`;
  }

  private mergeHeaders(headers: Record<string, string> = {}): Record<string, string> {
    const merged: Record<string, string> = { ...this.defaultHeaders };
    for (const [name, value] of Object.entries(headers)) {
      for (const existing of Object.keys(merged)) {
        if (existing.toLowerCase() === name.toLowerCase()) {
          delete merged[existing];
        }
      }
      merged[name] = value;
    }
    return merged;
  }
}

export function appendQuery(target: string, params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (item !== null && item !== undefined) {
        search.append(key, String(item));
      }
    }
  }

  const query = search.toString();
  if (!query) {
    return target;
  }
  return `${target}${target.includes('?') ? '&' : '?'}${query}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, ms);
  });
}
