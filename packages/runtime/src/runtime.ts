import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics, MetricUnit } from '@aws-lambda-powertools/metrics';
import {
  NotificationCenter,
  ShortcutDispatcher,
  copyToClipboard,
  debounce,
  describeRequestError,
  type ClipboardWriter,
  type Debounced,
  type GlobalErrorSource,
  type KeyEventSource,
  type KeyValueMedium,
  type NotificationView,
  type RequestOrchestrator,
  type RuntimeLogger
} from '@frontdesk/core';
import { HttpRequestOrchestrator } from '@frontdesk/http';
import { ExpiringStore, MemoryKeyValueMedium } from '@frontdesk/persistence-local';
import { loadConfig, type LoadConfigOptions, type RuntimeConfig } from './env';
import { installGlobalErrorHandlers } from './global-errors';
import { InstrumentedRequestOrchestrator, toRuntimeLogger } from './instrumentation';

export const HELP_SHORTCUT = 'ctrl+/';

/** What the host page provides. Anything omitted gets an in-process default or is skipped. */
export interface HostEnvironment {
  keyEvents?: KeyEventSource;
  storage?: KeyValueMedium;
  errors?: GlobalErrorSource;
  fetch?: typeof fetch;
  notificationView?: NotificationView;
  clipboard?: ClipboardWriter;
  /** Tried when `clipboard` is missing or rejects. */
  clipboardFallback?: ClipboardWriter;
}

export interface Runtime {
  config: RuntimeConfig;
  logger: RuntimeLogger;
  api: RequestOrchestrator;
  notifications: NotificationCenter;
  shortcuts: ShortcutDispatcher;
  store: ExpiringStore;
  /** Shows `error` as an error notification and returns its id. */
  notifyFailure(error: unknown): string;
  /** Debounces `fn` by the configured delay. */
  debounce<Args extends unknown[]>(fn: (...args: Args) => void): Debounced<Args>;
  copyToClipboard(text: string): Promise<boolean>;
  flushMetrics(): void;
  /** Detaches host listeners. Only needed when the host rebuilds the runtime without a reload. */
  dispose(): void;
}

/**
 * Composition root. Call once per page view and keep the returned instance;
 * every component in it is owned by that instance alone.
 */
export function createRuntime(host: HostEnvironment = {}, options: LoadConfigOptions = {}): Runtime {
  const config = loadConfig(options);
  const powertoolsLogger = new Logger({
    serviceName: config.serviceName,
    logLevel: config.logLevel
  });
  const metrics = new Metrics({
    namespace: config.serviceName,
    serviceName: config.serviceName
  });
  const logger = toRuntimeLogger(powertoolsLogger);

  const api = new InstrumentedRequestOrchestrator(
    new HttpRequestOrchestrator({
      baseUrl: config.baseUrl,
      timeoutMs: config.apiTimeoutMs,
      retryAttempts: config.retryAttempts,
      fetchImpl: host.fetch,
      logger
    }),
    logger,
    metrics
  );

  const notifications = new NotificationCenter({
    view: host.notificationView,
    defaultDurationMs: config.notificationDurationMs,
    removalGraceMs: config.notificationGraceMs,
    logger
  });

  const shortcuts = new ShortcutDispatcher(host.keyEvents, logger);
  shortcuts.register(
    HELP_SHORTCUT,
    () => {
      logger.info('Available shortcuts', { shortcuts: shortcuts.getShortcuts() });
    },
    'Show keyboard shortcuts'
  );

  const store = new ExpiringStore({
    medium: host.storage ?? new MemoryKeyValueMedium(),
    logger
  });

  const clipboardWriters = [host.clipboard, host.clipboardFallback].filter(
    (writer): writer is ClipboardWriter => writer !== undefined
  );

  const uninstallErrorHandlers = host.errors
    ? installGlobalErrorHandlers({
        source: host.errors,
        notifications,
        logger,
        onReport: kind => metrics.addMetric(kind, MetricUnit.Count, 1)
      })
    : undefined;

  logger.info('Runtime initialized', {
    baseUrl: config.baseUrl,
    apiTimeoutMs: config.apiTimeoutMs,
    retryAttempts: config.retryAttempts
  });

  return {
    config,
    logger,
    api,
    notifications,
    shortcuts,
    store,
    notifyFailure: error => notifications.show(describeRequestError(error), 'error'),
    debounce: <Args extends unknown[]>(fn: (...args: Args) => void) =>
      debounce(fn, config.debounceDelayMs),
    copyToClipboard: text => copyToClipboard(text, clipboardWriters, logger),
    flushMetrics: () => metrics.publishStoredMetrics(),
    dispose: () => {
      shortcuts.detach();
      uninstallErrorHandlers?.();
    }
  };
}
