import {
  ICacheBackend,
  CacheKey,
  CacheValue,
  CacheEntries,
  SetOptions,
  StoreError,
} from '../types';

/**
 * Argument checks shared by every backend. Holds no state: each backend owns
 * its storage and its tag index outright.
 */
export abstract class BaseStore implements ICacheBackend {
  protected validateKey(key: CacheKey): void {
    if (!key || typeof key !== 'string') {
      throw new StoreError('Cache key must be a non-empty string', this.constructor.name);
    }
  }

  protected validateTag(tag: string): void {
    if (!tag || typeof tag !== 'string') {
      throw new StoreError('Tag must be a non-empty string', this.constructor.name);
    }
  }

  protected validateValue(value: CacheValue): void {
    if (value === undefined) {
      throw new StoreError('Cache value cannot be undefined', this.constructor.name);
    }
  }

  protected validateTTL(ttl: number | undefined): void {
    if (ttl !== undefined && (!Number.isInteger(ttl) || ttl <= 0)) {
      throw new StoreError('TTL must be a positive whole number of seconds', this.constructor.name);
    }
  }

  /** Validates and deduplicates the tags of a `set` call. */
  protected normalizeTags(tags: string[] | undefined): Set<string> {
    const unique = new Set<string>();
    for (const tag of tags ?? []) {
      this.validateTag(tag);
      unique.add(tag);
    }
    return unique;
  }

  abstract get(key: CacheKey): Promise<CacheValue | null>;
  abstract getByTag(tag: string): Promise<CacheEntries>;
  abstract getAll(): Promise<CacheEntries>;
  abstract set(key: CacheKey, value: CacheValue, options?: SetOptions): Promise<void>;
  abstract delete(key: CacheKey): Promise<boolean>;
  abstract deleteByTag(tag: string): Promise<number>;
  abstract exists(key: CacheKey): Promise<boolean>;
  abstract clear(): Promise<void>;
  abstract close(): Promise<void>;
}
