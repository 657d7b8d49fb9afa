import type { KeyValueMedium } from '@frontdesk/core';

export class QuotaExceededError extends Error {
  constructor(
    readonly key: string,
    readonly quotaBytes: number
  ) {
    super(`Storing "${key}" would exceed the quota of ${quotaBytes} bytes`);
    this.name = 'QuotaExceededError';
  }
}

export interface MemoryKeyValueMediumOptions {
  /** Upper bound on the summed length of keys and values, like a Web Storage quota. */
  quotaBytes?: number;
}

/**
 * In-process medium for hosts without Web Storage. Iteration follows
 * insertion order.
 */
export class MemoryKeyValueMedium implements KeyValueMedium {
  private readonly items = new Map<string, string>();
  private readonly quotaBytes?: number;

  constructor(options: MemoryKeyValueMediumOptions = {}) {
    this.quotaBytes = options.quotaBytes;
  }

  get length(): number {
    return this.items.size;
  }

  key(index: number): string | null {
    return Array.from(this.items.keys())[index] ?? null;
  }

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    if (this.quotaBytes !== undefined) {
      const previous = this.items.get(key);
      const used = this.usedBytes() - (previous === undefined ? 0 : key.length + previous.length);
      if (used + key.length + value.length > this.quotaBytes) {
        throw new QuotaExceededError(key, this.quotaBytes);
      }
    }
    this.items.set(key, String(value));
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }

  clear(): void {
    this.items.clear();
  }

  private usedBytes(): number {
    let total = 0;
    for (const [key, value] of this.items) {
      total += key.length + value.length;
    }
    return total;
  }
}
