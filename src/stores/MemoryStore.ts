import { BaseStore } from './BaseStore';
import { CacheKey, CacheValue, CacheEntries, SetOptions, Logger } from '../types';

/**
 * In-process backend. Every mutation of the primary map and both tag indexes
 * runs synchronously, so no caller can observe a half-applied `set` or
 * `delete`. Entries never expire.
 */
export class MemoryStore extends BaseStore {
  private cache = new Map<CacheKey, CacheValue>();
  private tagIndex = new Map<string, Set<CacheKey>>();
  private keyTags = new Map<CacheKey, Set<string>>();

  constructor(private logger: Logger = console) {
    super();
  }

  async get(key: CacheKey): Promise<CacheValue | null> {
    this.validateKey(key);
    const value = this.cache.get(key);
    return value === undefined ? null : value;
  }

  async getByTag(tag: string): Promise<CacheEntries> {
    this.validateTag(tag);
    const result: CacheEntries = new Map();
    const keys = this.tagIndex.get(tag);
    if (!keys) {
      return result;
    }

    for (const key of keys) {
      if (this.cache.has(key)) {
        result.set(key, this.cache.get(key) ?? null);
      }
    }
    return result;
  }

  async getAll(): Promise<CacheEntries> {
    return new Map(this.cache);
  }

  async set(key: CacheKey, value: CacheValue, options?: SetOptions): Promise<void> {
    this.validateKey(key);
    this.validateValue(value);
    this.validateTTL(options?.ttl);
    const tags = this.normalizeTags(options?.tags);

    if (options?.ttl !== undefined) {
      this.logger.debug(`MemoryStore ignores ttl for key "${key}"`);
    }

    this.detachFromTags(key);
    this.cache.set(key, value);

    if (tags.size === 0) {
      return;
    }

    this.keyTags.set(key, tags);
    for (const tag of tags) {
      let keys = this.tagIndex.get(tag);
      if (!keys) {
        keys = new Set();
        this.tagIndex.set(tag, keys);
      }
      keys.add(key);
    }
  }

  async delete(key: CacheKey): Promise<boolean> {
    this.validateKey(key);
    if (!this.cache.delete(key)) {
      return false;
    }
    this.detachFromTags(key);
    return true;
  }

  async deleteByTag(tag: string): Promise<number> {
    this.validateTag(tag);
    const keys = this.tagIndex.get(tag);
    if (!keys) {
      return 0;
    }

    let count = 0;
    // Copy first: each delete prunes the set being walked.
    for (const key of Array.from(keys)) {
      if (await this.delete(key)) {
        count++;
      }
    }
    return count;
  }

  async exists(key: CacheKey): Promise<boolean> {
    this.validateKey(key);
    return this.cache.has(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
    this.tagIndex.clear();
    this.keyTags.clear();
  }

  async close(): Promise<void> {
    await this.clear();
  }

  getTagCount(): number {
    return this.tagIndex.size;
  }

  private detachFromTags(key: CacheKey): void {
    const tags = this.keyTags.get(key);
    if (!tags) {
      return;
    }

    for (const tag of tags) {
      const keys = this.tagIndex.get(tag);
      if (keys) {
        keys.delete(key);
        if (keys.size === 0) {
          this.tagIndex.delete(tag);
        }
      }
    }
    this.keyTags.delete(key);
  }
}
