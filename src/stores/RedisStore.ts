import { BaseStore } from './BaseStore';
import { JsonSerializer } from '../serializers/JsonSerializer';
import {
  CacheKey,
  CacheValue,
  CacheEntries,
  ConnectionError,
  IConnectionProvider,
  IRemoteConnection,
  ISerializer,
  SetOptions,
} from '../types';

export interface RedisStoreOptions {
  prefix?: string;
  serializer?: ISerializer;
}

/**
 * Backend for a remote Redis medium. The tag index lives next to the data as
 * two families of sets:
 *
 *   <prefix>tag:<tag>       keys carrying the tag (no TTL, pruned when empty)
 *   <prefix>key_tags:<key>  tags of one key (same TTL as the key)
 *
 * Nothing here is transactional. Readers skip members whose value is gone,
 * and every set/delete rebuilds the index of its key from `key_tags`.
 * Concurrent writers of the same key can interleave; the last value write
 * wins and the tag sets may hold a mix of both callers' tags.
 *
 * Each primitive goes through the provider, which may resolve a different
 * connection per call (see DiscoveryConnectionProvider).
 */
export class RedisStore extends BaseStore {
  private prefix: string;
  private tagPrefix: string;
  private keyTagsPrefix: string;
  private serializer: ISerializer;

  constructor(private provider: IConnectionProvider, options: RedisStoreOptions = {}) {
    super();
    this.prefix = options.prefix ?? 'cache:';
    this.tagPrefix = `${this.prefix}tag:`;
    this.keyTagsPrefix = `${this.prefix}key_tags:`;
    this.serializer = options.serializer ?? new JsonSerializer();
  }

  /** Fails when the provider cannot hand out a primary connection. */
  async connect(): Promise<void> {
    try {
      await this.provider.verify();
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(`Unable to resolve a primary connection: ${message}`, error);
    }
  }

  async get(key: CacheKey): Promise<CacheValue | null> {
    this.validateKey(key);
    const data = await this.onReader((redis) => redis.get(this.dataKey(key)));
    return data === null ? null : this.decode(data);
  }

  async getByTag(tag: string): Promise<CacheEntries> {
    this.validateTag(tag);
    const result: CacheEntries = new Map();
    const members = await this.onReader((redis) => redis.setMembers(this.tagKey(tag)));

    for (const key of members) {
      const data = await this.onReader((redis) => redis.get(this.dataKey(key)));
      if (data !== null) {
        result.set(key, this.decode(data));
      }
    }
    return result;
  }

  async getAll(): Promise<CacheEntries> {
    const result: CacheEntries = new Map();
    const keys = await this.onReader((redis) => redis.keysMatchingPrefix(this.prefix));

    for (const storageKey of keys) {
      if (this.isIndexKey(storageKey)) {
        continue;
      }
      const data = await this.onReader((redis) => redis.get(storageKey));
      if (data !== null) {
        result.set(storageKey.slice(this.prefix.length), this.decode(data));
      }
    }
    return result;
  }

  async set(key: CacheKey, value: CacheValue, options?: SetOptions): Promise<void> {
    this.validateKey(key);
    this.validateValue(value);
    this.validateTTL(options?.ttl);
    const tags = this.normalizeTags(options?.tags);
    const ttl = options?.ttl;
    const payload = this.encode(value);

    await this.detachFromTags(key);

    if (ttl !== undefined) {
      await this.onWriter((redis) => redis.setWithTTL(this.dataKey(key), payload, ttl));
    } else {
      await this.onWriter((redis) => redis.set(this.dataKey(key), payload));
    }

    if (tags.size === 0) {
      return;
    }

    const keyTagsKey = this.keyTagsKey(key);
    await this.onWriter((redis) => redis.setAdd(keyTagsKey, ...tags));
    if (ttl !== undefined) {
      await this.onWriter((redis) => redis.expire(keyTagsKey, ttl));
    }
    for (const tag of tags) {
      await this.onWriter((redis) => redis.setAdd(this.tagKey(tag), key));
    }
  }

  async delete(key: CacheKey): Promise<boolean> {
    this.validateKey(key);
    await this.detachFromTags(key);
    return this.onWriter((redis) => redis.delete(this.dataKey(key)));
  }

  async deleteByTag(tag: string): Promise<number> {
    this.validateTag(tag);
    const tagKey = this.tagKey(tag);
    const members = await this.onReader((redis) => redis.setMembers(tagKey));

    let count = 0;
    const stale: CacheKey[] = [];
    for (const key of members) {
      if (await this.delete(key)) {
        count++;
      } else {
        stale.push(key);
      }
    }

    // Expired keys lose their key_tags set with them, so delete() could not
    // unlink them from this tag.
    if (stale.length > 0) {
      for (const key of stale) {
        await this.onWriter((redis) => redis.setRemove(tagKey, key));
      }
      await this.pruneTag(tagKey);
    }
    return count;
  }

  async exists(key: CacheKey): Promise<boolean> {
    this.validateKey(key);
    return this.onReader((redis) => redis.exists(this.dataKey(key)));
  }

  async clear(): Promise<void> {
    const keys = await this.onWriter((redis) => redis.keysMatchingPrefix(this.prefix));
    for (const storageKey of keys) {
      await this.onWriter((redis) => redis.delete(storageKey));
    }
  }

  async close(): Promise<void> {
    await this.provider.close();
  }

  getPrefix(): string {
    return this.prefix;
  }

  /** Unlinks a key from every tag recorded in its key_tags set, then drops that set. */
  private async detachFromTags(key: CacheKey): Promise<void> {
    const keyTagsKey = this.keyTagsKey(key);
    const tags = await this.onWriter((redis) => redis.setMembers(keyTagsKey));

    for (const tag of tags) {
      const tagKey = this.tagKey(tag);
      await this.onWriter((redis) => redis.setRemove(tagKey, key));
      await this.pruneTag(tagKey);
    }

    await this.onWriter((redis) => redis.delete(keyTagsKey));
  }

  private async pruneTag(tagKey: string): Promise<void> {
    const remaining = await this.onWriter((redis) => redis.setCardinality(tagKey));
    if (remaining === 0) {
      await this.onWriter((redis) => redis.delete(tagKey));
    }
  }

  private async onReader<T>(operation: (redis: IRemoteConnection) => Promise<T>): Promise<T> {
    return operation(await this.provider.reader());
  }

  private async onWriter<T>(operation: (redis: IRemoteConnection) => Promise<T>): Promise<T> {
    return operation(await this.provider.writer());
  }

  private encode(value: CacheValue): Buffer {
    const serialized = this.serializer.serialize(value);
    return Buffer.isBuffer(serialized) ? serialized : Buffer.from(serialized, 'utf8');
  }

  private decode(data: Buffer): CacheValue {
    return this.serializer.deserialize(data);
  }

  private isIndexKey(storageKey: string): boolean {
    return storageKey.startsWith(this.tagPrefix) || storageKey.startsWith(this.keyTagsPrefix);
  }

  private dataKey(key: CacheKey): string {
    return `${this.prefix}${key}`;
  }

  private tagKey(tag: string): string {
    return `${this.tagPrefix}${tag}`;
  }

  private keyTagsKey(key: CacheKey): string {
    return `${this.keyTagsPrefix}${key}`;
  }
}
