import type { RedisOptions } from 'ioredis';

export interface SetOptions {
  tags?: string[];
  ttl?: number;
}

export interface SentinelAddress {
  host: string;
  port: number;
}

export interface MemoryStoreConfig {
  type: 'memory';
}

export interface RedisStoreConfig {
  type: 'redis';
  host?: string;
  port?: number;
  db?: number;
  password?: string;
  prefix?: string;
  redisOptions?: RedisOptions;
}

export interface SentinelStoreConfig {
  type: 'redis-sentinel';
  sentinels: SentinelAddress[];
  serviceName: string;
  db?: number;
  password?: string;
  sentinelPassword?: string;
  prefix?: string;
  /** Per-command timeout in milliseconds. */
  socketTimeout?: number;
  connectTimeout?: number;
  /** Initial delay of TCP keep-alive probes, in milliseconds. */
  keepAlive?: number;
}

export type StoreConfig = MemoryStoreConfig | RedisStoreConfig | SentinelStoreConfig;

export type StoreType = StoreConfig['type'];

export interface CacheManagerConfig {
  store: StoreConfig;
  serializer?: SerializerType;
  logger?: Logger;
  metrics?: {
    enabled: boolean;
  };
}

export interface CacheMetrics {
  hits: number;
  misses: number;
  hitRate: number;
  avgResponseTime: number;
  operations: number;
  errors: number;
}

export type CacheValue =
  | string
  | number
  | boolean
  | null
  | CacheValue[]
  | { [key: string]: CacheValue };

export type CacheKey = string;

export type CacheEntries = Map<CacheKey, CacheValue>;

export type SerializerType = 'json' | 'msgpack';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export interface ISerializer {
  serialize(value: CacheValue): Buffer | string;
  deserialize(data: Buffer | string): CacheValue;
  canSerialize(value: unknown): boolean;
  getContentType(): string;
  getName(): SerializerType;
}

/**
 * Uniform contract every backend implements. Missing keys and unknown tags
 * are normal results, never errors.
 */
export interface ICacheBackend {
  get(key: CacheKey): Promise<CacheValue | null>;
  getByTag(tag: string): Promise<CacheEntries>;
  getAll(): Promise<CacheEntries>;
  set(key: CacheKey, value: CacheValue, options?: SetOptions): Promise<void>;
  delete(key: CacheKey): Promise<boolean>;
  deleteByTag(tag: string): Promise<number>;
  exists(key: CacheKey): Promise<boolean>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

/**
 * The handful of primitives the remote backends need from a key-value server.
 */
export interface IRemoteConnection {
  get(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer): Promise<void>;
  setWithTTL(key: string, value: Buffer, seconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  expire(key: string, seconds: number): Promise<boolean>;
  keysMatchingPrefix(prefix: string): Promise<string[]>;
  setAdd(setKey: string, ...members: string[]): Promise<number>;
  setRemove(setKey: string, member: string): Promise<boolean>;
  setMembers(setKey: string): Promise<string[]>;
  setCardinality(setKey: string): Promise<number>;
  close(): Promise<void>;
}

export interface IDiscovery {
  resolvePrimary(serviceName: string): Promise<IRemoteConnection>;
  resolveReplica(serviceName: string): Promise<IRemoteConnection>;
  close(): Promise<void>;
}

/**
 * Hands out the connection for each primitive call. Implementations may return
 * a different connection on every call.
 */
export interface IConnectionProvider {
  writer(): Promise<IRemoteConnection>;
  reader(): Promise<IRemoteConnection>;
  verify(): Promise<void>;
  close(): Promise<void>;
}

export interface IMetricsCollector {
  recordHit(): void;
  recordMiss(): void;
  recordOperation(duration: number): void;
  recordError(): void;
  getMetrics(): CacheMetrics;
  reset(): void;
}

export class CacheError extends Error {
  constructor(message: string, public code?: string, public store?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CacheError';
  }
}

export class ConfigurationError extends CacheError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ConnectionError extends CacheError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONNECTION_ERROR', undefined, cause);
    this.name = 'ConnectionError';
  }
}

/** The server answered the command with an error reply (WRONGTYPE, READONLY, NOAUTH...). */
export class CommandError extends CacheError {
  constructor(message: string, cause?: unknown) {
    super(message, 'COMMAND_ERROR', undefined, cause);
    this.name = 'CommandError';
  }
}

export class SerializationError extends CacheError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SERIALIZATION_ERROR', undefined, cause);
    this.name = 'SerializationError';
  }
}

export class StoreError extends CacheError {
  constructor(message: string, store: string) {
    super(message, 'STORE_ERROR', store);
    this.name = 'StoreError';
  }
}
