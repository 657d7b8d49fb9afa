export { createRuntime, HELP_SHORTCUT, type HostEnvironment, type Runtime } from './runtime';
export * from './env';
export * from './global-errors';
export { InstrumentedRequestOrchestrator, toRuntimeLogger } from './instrumentation';
