export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue | QueryValue[]>;

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  /** Sent as-is; use `post` to have a value JSON-encoded. */
  body?: string;
  signal?: AbortSignal;
}

/**
 * Every method resolves with the parsed JSON body or rejects with a
 * `RequestError` (timeout, http_status, transport or decode).
 */
export interface RequestOrchestrator {
  request(target: string, options?: RequestOptions): Promise<unknown>;
  get(target: string, params?: QueryParams): Promise<unknown>;
  post(target: string, body?: unknown): Promise<unknown>;
  requestWithRetry(target: string, options?: RequestOptions, maxRetries?: number): Promise<unknown>;
}
