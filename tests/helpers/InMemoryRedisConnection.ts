import { IRemoteConnection } from '../../src/types';

export interface StoredValue {
  value: Buffer | Set<string>;
  expiresAt?: number;
}

/**
 * In-process stand-in for a Redis server, enough for the remote backends:
 * strings, sets, TTL against Date.now(), and empty sets vanishing like they
 * do on a real server.
 */
export class InMemoryRedisConnection implements IRemoteConnection {
  readonly commands: string[] = [];

  constructor(private data = new Map<string, StoredValue>()) {}

  /** Another connection onto the same keyspace, with its own command log. */
  replica(): InMemoryRedisConnection {
    return new InMemoryRedisConnection(this.data);
  }

  async get(key: string): Promise<Buffer | null> {
    this.commands.push(`get ${key}`);
    const entry = this.live(key);
    return entry && Buffer.isBuffer(entry.value) ? entry.value : null;
  }

  async set(key: string, value: Buffer): Promise<void> {
    this.commands.push(`set ${key}`);
    this.data.set(key, { value });
  }

  async setWithTTL(key: string, value: Buffer, seconds: number): Promise<void> {
    this.commands.push(`setWithTTL ${key} ${seconds}`);
    this.data.set(key, { value, expiresAt: Date.now() + seconds * 1000 });
  }

  async delete(key: string): Promise<boolean> {
    this.commands.push(`delete ${key}`);
    const existed = this.live(key) !== undefined;
    this.data.delete(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    this.commands.push(`exists ${key}`);
    return this.live(key) !== undefined;
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    this.commands.push(`expire ${key} ${seconds}`);
    const entry = this.live(key);
    if (!entry) {
      return false;
    }
    entry.expiresAt = Date.now() + seconds * 1000;
    return true;
  }

  async keysMatchingPrefix(prefix: string): Promise<string[]> {
    this.commands.push(`keysMatchingPrefix ${prefix}`);
    return Array.from(this.data.keys()).filter(
      (key) => key.startsWith(prefix) && this.live(key) !== undefined
    );
  }

  async setAdd(setKey: string, ...members: string[]): Promise<number> {
    this.commands.push(`setAdd ${setKey} ${members.join(',')}`);
    let entry = this.live(setKey);
    if (!entry) {
      entry = { value: new Set<string>() };
      this.data.set(setKey, entry);
    }
    const set = this.asSet(entry);
    let added = 0;
    for (const member of members) {
      if (!set.has(member)) {
        set.add(member);
        added++;
      }
    }
    return added;
  }

  async setRemove(setKey: string, member: string): Promise<boolean> {
    this.commands.push(`setRemove ${setKey} ${member}`);
    const entry = this.live(setKey);
    if (!entry) {
      return false;
    }
    const set = this.asSet(entry);
    const removed = set.delete(member);
    if (set.size === 0) {
      this.data.delete(setKey);
    }
    return removed;
  }

  async setMembers(setKey: string): Promise<string[]> {
    this.commands.push(`setMembers ${setKey}`);
    const entry = this.live(setKey);
    return entry ? Array.from(this.asSet(entry)) : [];
  }

  async setCardinality(setKey: string): Promise<number> {
    this.commands.push(`setCardinality ${setKey}`);
    const entry = this.live(setKey);
    return entry ? this.asSet(entry).size : 0;
  }

  async close(): Promise<void> {
    this.commands.push('close');
  }

  /** Raw view of the keyspace, for asserting on index bookkeeping. */
  storedKeys(): string[] {
    return Array.from(this.data.keys())
      .filter((key) => this.live(key) !== undefined)
      .sort();
  }

  rawMembers(setKey: string): string[] {
    const entry = this.live(setKey);
    return entry ? Array.from(this.asSet(entry)).sort() : [];
  }

  private live(key: string): StoredValue | undefined {
    const entry = this.data.get(key);
    if (entry?.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
      this.data.delete(key);
      return undefined;
    }
    return entry;
  }

  private asSet(entry: StoredValue): Set<string> {
    if (Buffer.isBuffer(entry.value)) {
      throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
    }
    return entry.value;
  }
}
