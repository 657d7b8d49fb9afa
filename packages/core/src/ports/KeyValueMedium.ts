/**
 * Durable string-keyed storage shared with the rest of the host page
 * (the Web Storage shape). Any method may throw, e.g. when a quota is exceeded.
 */
export interface KeyValueMedium {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
  clear(): void;
}
