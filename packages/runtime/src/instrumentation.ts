import type { Logger } from '@aws-lambda-powertools/logger';
import { MetricUnit, type Metrics } from '@aws-lambda-powertools/metrics';
import {
  serializeError,
  type QueryParams,
  type RequestOptions,
  type RequestOrchestrator,
  type RuntimeLogger
} from '@frontdesk/core';

export function toRuntimeLogger(logger: Logger): RuntimeLogger {
  return {
    debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message)),
    info: (message, context) => (context ? logger.info(message, context) : logger.info(message)),
    warn: (message, context) => (context ? logger.warn(message, context) : logger.warn(message)),
    error: (message, context) => (context ? logger.error(message, context) : logger.error(message))
  };
}

export class InstrumentedRequestOrchestrator implements RequestOrchestrator {
  constructor(
    private readonly inner: RequestOrchestrator,
    private readonly logger: RuntimeLogger,
    private readonly metrics: Metrics
  ) {}

  request(target: string, options?: RequestOptions) {
    return this.track('request', target, () => this.inner.request(target, options));
  }

  get(target: string, params?: QueryParams) {
    return this.track('get', target, () => this.inner.get(target, params));
  }

  post(target: string, body?: unknown) {
    return this.track('post', target, () => this.inner.post(target, body));
  }

  requestWithRetry(target: string, options?: RequestOptions, maxRetries?: number) {
    return this.track('requestWithRetry', target, () =>
      this.inner.requestWithRetry(target, options, maxRetries)
    );
  }

  private async track(
    operation: string,
    target: string,
    call: () => Promise<unknown>
  ): Promise<unknown> {
    try {
      const result = await call();
      this.metrics.addMetric('request_success', MetricUnit.Count, 1);
      return result;
    } catch (error) {
      this.metrics.addMetric('request_failure', MetricUnit.Count, 1);
      this.logger.warn('Request failed', { operation, target, error: serializeError(error) });
      throw error;
    }
  }
}
