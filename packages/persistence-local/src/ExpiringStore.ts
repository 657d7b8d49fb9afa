import {
  StoredEntrySchema,
  serializeError,
  silentLogger,
  type KeyValueMedium,
  type RuntimeLogger,
  type StoredEntry
} from '@frontdesk/core';
import type { ZodType, ZodTypeDef } from 'zod';

export interface ExpiringStoreOptions {
  medium: KeyValueMedium;
  clock?: () => number;
  logger?: RuntimeLogger;
}

/**
 * Key-value store with optional per-entry expiry. Expired entries are removed
 * lazily when read; nothing sweeps them in the background. No method throws.
 */
export class ExpiringStore {
  private readonly medium: KeyValueMedium;
  private readonly clock: () => number;
  private readonly logger: RuntimeLogger;

  constructor(options: ExpiringStoreOptions) {
    this.medium = options.medium;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * `expireInMs` of null or 0 stores the value without expiry. A negative
   * value stores an entry that is already expired.
   */
  set(key: string, value: unknown, expireInMs: number | null = null): boolean {
    const expireAt =
      expireInMs !== null && Number.isFinite(expireInMs) && expireInMs !== 0
        ? this.clock() + expireInMs
        : null;
    const entry: StoredEntry = { value, expireAt };

    try {
      this.medium.setItem(key, JSON.stringify(entry));
      return true;
    } catch (error) {
      this.logger.warn('Failed to write stored entry', { key, error: serializeError(error) });
      return false;
    }
  }

  get(key: string, defaultValue: unknown = null): unknown {
    const entry = this.readEntry(key);
    return entry ? entry.value : defaultValue;
  }

  /** Like `get`, but returns `defaultValue` when the stored value does not match `schema`. */
  getParsed<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>, defaultValue: T): T {
    const entry = this.readEntry(key);
    if (!entry) {
      return defaultValue;
    }

    const parsed = schema.safeParse(entry.value);
    if (!parsed.success) {
      this.logger.debug('Stored value does not match the expected shape', {
        key,
        issues: parsed.error.issues.map(issue => issue.message)
      });
      return defaultValue;
    }
    return parsed.data;
  }

  remove(key: string): boolean {
    try {
      this.medium.removeItem(key);
      return true;
    } catch (error) {
      this.logger.warn('Failed to remove stored entry', { key, error: serializeError(error) });
      return false;
    }
  }

  clear(): boolean {
    try {
      this.medium.clear();
      return true;
    } catch (error) {
      this.logger.warn('Failed to clear storage', { error: serializeError(error) });
      return false;
    }
  }

  private readEntry(key: string): StoredEntry | null {
    let raw: string | null;
    let candidate: unknown;
    try {
      raw = this.medium.getItem(key);
      if (!raw) {
        return null;
      }
      candidate = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Failed to read stored entry', { key, error: serializeError(error) });
      return null;
    }

    const parsed = StoredEntrySchema.safeParse(candidate);
    if (!parsed.success) {
      this.logger.debug('Ignoring malformed stored entry', { key });
      return null;
    }

    const entry = parsed.data;
    if (entry.expireAt !== null && this.clock() >= entry.expireAt) {
      this.remove(key);
      return null;
    }
    return entry;
  }
}
