import Redis, { RedisOptions } from 'ioredis';
import { CommandError, ConnectionError, IRemoteConnection, Logger, RedisStoreConfig } from '../types';

const SCAN_BATCH_SIZE = 100;

export function createRedisClient(options: RedisOptions, logger: Logger = console): Redis {
  const client = new Redis({
    enableReadyCheck: true,
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    keepAlive: 30000,
    family: 4,
    ...options,
  });

  client.on('error', (err: unknown) => {
    logger.error(`Redis connection error (${options.host ?? 'localhost'}:${options.port ?? 6379}):`, err);
  });

  return client;
}

export function redisOptionsFromConfig(config: RedisStoreConfig): RedisOptions {
  return {
    host: config.host ?? 'localhost',
    port: config.port ?? 6379,
    db: config.db ?? 0,
    password: config.password,
    ...config.redisOptions,
  };
}

/** Escapes the glob metacharacters SCAN MATCH understands. */
export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

/**
 * Adapts an ioredis client to the primitive interface. Every failure of the
 * underlying client comes out as a ConnectionError.
 */
export class IoRedisConnection implements IRemoteConnection {
  constructor(private client: Redis, private name = 'redis') {}

  async get(key: string): Promise<Buffer | null> {
    return this.run('GET', () => this.client.getBuffer(key));
  }

  async set(key: string, value: Buffer): Promise<void> {
    await this.run('SET', () => this.client.set(key, value));
  }

  async setWithTTL(key: string, value: Buffer, seconds: number): Promise<void> {
    await this.run('SET EX', () => this.client.set(key, value, 'EX', seconds));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.run('DEL', () => this.client.del(key));
    return removed > 0;
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.run('EXISTS', () => this.client.exists(key));
    return count > 0;
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    const result = await this.run('EXPIRE', () => this.client.expire(key, seconds));
    return result === 1;
  }

  async keysMatchingPrefix(prefix: string): Promise<string[]> {
    const pattern = `${escapeGlob(prefix)}*`;
    const keys = new Set<string>();
    let cursor = '0';

    do {
      const [nextCursor, batch] = await this.run('SCAN', () =>
        this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_BATCH_SIZE)
      );
      cursor = nextCursor;
      for (const key of batch) {
        keys.add(key);
      }
    } while (cursor !== '0');

    return Array.from(keys);
  }

  async setAdd(setKey: string, ...members: string[]): Promise<number> {
    if (members.length === 0) {
      return 0;
    }
    return this.run('SADD', () => this.client.sadd(setKey, ...members));
  }

  async setRemove(setKey: string, member: string): Promise<boolean> {
    const removed = await this.run('SREM', () => this.client.srem(setKey, member));
    return removed > 0;
  }

  async setMembers(setKey: string): Promise<string[]> {
    return this.run('SMEMBERS', () => this.client.smembers(setKey));
  }

  async setCardinality(setKey: string): Promise<number> {
    return this.run('SCARD', () => this.client.scard(setKey));
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch {
      this.client.disconnect();
    }
  }

  private async run<T>(command: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // ioredis names server error replies ReplyError; anything else is transport.
      if (error instanceof Error && error.name === 'ReplyError') {
        throw new CommandError(`${command} on ${this.name} was rejected: ${message}`, error);
      }
      throw new ConnectionError(`${command} on ${this.name} failed: ${message}`, error);
    }
  }
}
