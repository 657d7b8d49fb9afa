export * from './domain/errors';
export * from './domain/models';
export * from './app/NotificationCenter';
export * from './app/ShortcutDispatcher';
export * from './app/copyToClipboard';
export * from './ports/ClipboardWriter';
export * from './ports/GlobalErrorSource';
export * from './ports/KeyEventSource';
export * from './ports/KeyValueMedium';
export * from './ports/NotificationView';
export * from './ports/RequestOrchestrator';
export * from './ports/RuntimeLogger';
export * from './utils/time';
