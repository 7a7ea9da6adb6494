import {
  CacheManagerConfig,
  CacheKey,
  CacheValue,
  CacheEntries,
  CacheMetrics,
  ConfigurationError,
  ICacheBackend,
  ISerializer,
  Logger,
  SetOptions,
  StoreConfig,
} from './types';

import { MemoryStore } from './stores/MemoryStore';
import { RedisStore } from './stores/RedisStore';
import { DirectConnectionProvider, DiscoveryConnectionProvider } from './connections/ConnectionProvider';
import { createRedisClient, IoRedisConnection, redisOptionsFromConfig } from './connections/IoRedisConnection';
import { SentinelDiscovery } from './connections/SentinelDiscovery';
import { MetricsCollector } from './metrics/MetricsCollector';
import { SerializerFactory } from './serializers/SerializerFactory';

/**
 * Entry point of the library: builds the backend named by `config.store.type`
 * and forwards every call to it unchanged, recording metrics on the way.
 *
 * Prefer {@link CacheManager.create}, which also checks that a remote primary
 * can be reached. The constructor alone connects lazily.
 */
export class CacheManager implements ICacheBackend {
  private backend: ICacheBackend;
  private serializer: ISerializer;
  private logger: Logger;
  private metricsCollector: MetricsCollector;

  constructor(config: CacheManagerConfig) {
    if (!config || !config.store) {
      throw new ConfigurationError('A store configuration is required');
    }
    this.logger = config.logger ?? console;
    this.serializer = SerializerFactory.getSerializer(config.serializer ?? 'json');
    this.metricsCollector = new MetricsCollector(config.metrics?.enabled ?? true);
    this.backend = this.initializeStore(config.store);
  }

  static async create(config: CacheManagerConfig): Promise<CacheManager> {
    const manager = new CacheManager(config);
    await manager.connect();
    return manager;
  }

  async connect(): Promise<void> {
    if (this.backend instanceof RedisStore) {
      await this.backend.connect();
    }
  }

  async get(key: CacheKey): Promise<CacheValue | null> {
    return this.metricsCollector.withMetrics(async () => {
      const result = await this.backend.get(key);
      if (result !== null) {
        this.metricsCollector.recordHit();
      } else {
        this.metricsCollector.recordMiss();
      }
      return result;
    });
  }

  async getByTag(tag: string): Promise<CacheEntries> {
    return this.metricsCollector.withMetrics(async () => {
      const result = await this.backend.getByTag(tag);
      if (result.size > 0) {
        this.metricsCollector.recordHit();
      } else {
        this.metricsCollector.recordMiss();
      }
      return result;
    });
  }

  async getAll(): Promise<CacheEntries> {
    return this.metricsCollector.withMetrics(() => this.backend.getAll());
  }

  async set(key: CacheKey, value: CacheValue, options?: SetOptions): Promise<void> {
    return this.metricsCollector.withMetrics(() => this.backend.set(key, value, options));
  }

  async delete(key: CacheKey): Promise<boolean> {
    return this.metricsCollector.withMetrics(() => this.backend.delete(key));
  }

  async deleteByTag(tag: string): Promise<number> {
    return this.metricsCollector.withMetrics(() => this.backend.deleteByTag(tag));
  }

  async exists(key: CacheKey): Promise<boolean> {
    return this.metricsCollector.withMetrics(() => this.backend.exists(key));
  }

  async clear(): Promise<void> {
    return this.metricsCollector.withMetrics(() => this.backend.clear());
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  async getMetrics(): Promise<CacheMetrics> {
    return this.metricsCollector.getMetrics();
  }

  resetMetrics(): void {
    this.metricsCollector.reset();
  }

  getBackend(): ICacheBackend {
    return this.backend;
  }

  getSerializer(): ISerializer {
    return this.serializer;
  }

  private initializeStore(config: StoreConfig): ICacheBackend {
    this.logger.debug(`Initializing ${config.type} cache store`);

    switch (config.type) {
      case 'memory':
        return new MemoryStore(this.logger);
      case 'redis': {
        const client = createRedisClient(redisOptionsFromConfig(config), this.logger);
        const provider = new DirectConnectionProvider(new IoRedisConnection(client));
        return new RedisStore(provider, { prefix: config.prefix, serializer: this.serializer });
      }
      case 'redis-sentinel': {
        const discovery = new SentinelDiscovery(config, this.logger);
        const provider = new DiscoveryConnectionProvider(discovery, config.serviceName);
        return new RedisStore(provider, { prefix: config.prefix, serializer: this.serializer });
      }
      default:
        throw new ConfigurationError(`Unsupported store type: ${String(Reflect.get(config, 'type'))}`);
    }
  }
}
