export * from './HttpRequestOrchestrator';
