export * from './ExpiringStore';
export * from './MemoryKeyValueMedium';
