export interface UncaughtErrorEvent {
  error?: unknown;
  message?: string;
}

export interface UnhandledRejectionEvent {
  reason: unknown;
}

export interface GlobalErrorEventMap {
  error: UncaughtErrorEvent;
  unhandledrejection: UnhandledRejectionEvent;
}

export interface GlobalErrorSource {
  addEventListener<K extends keyof GlobalErrorEventMap>(
    type: K,
    listener: (event: GlobalErrorEventMap[K]) => void
  ): void;
  removeEventListener<K extends keyof GlobalErrorEventMap>(
    type: K,
    listener: (event: GlobalErrorEventMap[K]) => void
  ): void;
}
