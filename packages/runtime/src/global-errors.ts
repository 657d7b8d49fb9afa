import {
  serializeError,
  type GlobalErrorSource,
  type NotificationCenter,
  type RuntimeLogger,
  type UncaughtErrorEvent,
  type UnhandledRejectionEvent
} from '@frontdesk/core';

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred';
export const REJECTION_MESSAGE = 'Request handling failed';

export type GlobalErrorKind = 'uncaught_error' | 'unhandled_rejection';

export interface GlobalErrorHandlerOptions {
  source: GlobalErrorSource;
  notifications: NotificationCenter;
  logger: RuntimeLogger;
  onReport?: (kind: GlobalErrorKind) => void;
}

/**
 * Routes uncaught errors and unhandled rejections on the host into error
 * notifications. Returns a function that removes both listeners.
 */
export function installGlobalErrorHandlers(options: GlobalErrorHandlerOptions): () => void {
  const { source, notifications, logger, onReport } = options;

  const onError = (event: UncaughtErrorEvent): void => {
    logger.error('Uncaught error', {
      error: serializeError(event.error ?? event.message)
    });
    onReport?.('uncaught_error');
    notifications.show(UNEXPECTED_ERROR_MESSAGE, 'error');
  };

  const onRejection = (event: UnhandledRejectionEvent): void => {
    logger.error('Unhandled promise rejection', { error: serializeError(event.reason) });
    onReport?.('unhandled_rejection');
    notifications.show(REJECTION_MESSAGE, 'error');
  };

  source.addEventListener('error', onError);
  source.addEventListener('unhandledrejection', onRejection);

  return () => {
    source.removeEventListener('error', onError);
    source.removeEventListener('unhandledrejection', onRejection);
  };
}
