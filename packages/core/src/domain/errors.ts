export type RequestErrorKind = 'timeout' | 'http_status' | 'transport' | 'decode';

export class RequestError extends Error {
  constructor(
    message: string,
    readonly kind: RequestErrorKind,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RequestError';
  }
}

export class RequestTimeoutError extends RequestError {
  constructor(
    url: string,
    readonly timeoutMs: number
  ) {
    super('Request timed out', 'timeout', url);
    this.name = 'RequestTimeoutError';
  }
}

export class HttpStatusError extends RequestError {
  constructor(
    url: string,
    readonly status: number,
    readonly statusText: string,
    readonly body?: string
  ) {
    super(`HTTP ${status}: ${statusText}`, 'http_status', url);
    this.name = 'HttpStatusError';
  }
}

export class TransportError extends RequestError {
  constructor(url: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), 'transport', url, { cause });
    this.name = 'TransportError';
  }
}

export class DecodeError extends RequestError {
  constructor(url: string, cause: unknown) {
    super(`Response from ${url} is not valid JSON`, 'decode', url, { cause });
    this.name = 'DecodeError';
  }
}

export function isRequestError(error: unknown): error is RequestError {
  return error instanceof RequestError;
}

export function describeRequestError(error: unknown): string {
  if (!isRequestError(error)) {
    return 'Something went wrong. Please try again.';
  }

  switch (error.kind) {
    case 'timeout':
      return 'The server took too long to respond. Please try again.';
    case 'http_status':
      return error instanceof HttpStatusError && error.status >= 500
        ? 'The server ran into a problem. Please try again later.'
        : 'The request was rejected by the server.';
    case 'transport':
      return 'Could not reach the server. Check your connection.';
    case 'decode':
      return 'The server sent a response that could not be read.';
  }
}

export function serializeError(error: unknown): Record<string, unknown> {
  const base: Record<string, unknown> = { message: 'Unknown error' };
  if (error instanceof Error) {
    base.message = error.message;
    base.name = error.name;
    base.stack = error.stack;
    if ('cause' in error && error.cause) {
      base.cause = error.cause instanceof Error ? error.cause.message : error.cause;
    }
  } else if (error !== undefined) {
    base.message = String(error);
  }
  return base;
}
