const mockCall = jest.fn();

jest.mock('ioredis', () =>
  jest.fn().mockImplementation(() => ({
    call: mockCall,
    on: jest.fn(),
    quit: jest.fn().mockResolvedValue('OK'),
    disconnect: jest.fn(),
  }))
);

import { CacheManager } from '../src/CacheManager';
import { MemoryStore } from '../src/stores/MemoryStore';
import { RedisStore } from '../src/stores/RedisStore';
import { MessagePackSerializer } from '../src/serializers/MessagePackSerializer';
import {
  CacheManagerConfig,
  ConfigurationError,
  ConnectionError,
  Logger,
  StoreConfig,
} from '../src/types';

const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };

describe('CacheManager', () => {
  let cacheManager: CacheManager;

  beforeEach(() => {
    jest.clearAllMocks();
    const config: CacheManagerConfig = {
      store: { type: 'memory' },
      logger,
    };

    cacheManager = new CacheManager(config);
  });

  afterEach(async () => {
    await cacheManager.close();
  });

  describe('Basic Operations', () => {
    test('should set and get a value', async () => {
      await cacheManager.set('test-key', 'test-value');

      expect(await cacheManager.get('test-key')).toBe('test-value');
    });

    test('should return null for non-existent key', async () => {
      expect(await cacheManager.get('non-existent-key')).toBeNull();
    });

    test('should delete a key', async () => {
      await cacheManager.set('test-key', 'test-value', { tags: ['t'] });

      expect(await cacheManager.delete('test-key')).toBe(true);
      expect(await cacheManager.get('test-key')).toBeNull();
      expect(await cacheManager.exists('test-key')).toBe(false);
      expect(await cacheManager.getByTag('t')).toEqual(new Map());
    });

    test('should list every entry', async () => {
      await cacheManager.set('a', 1);
      await cacheManager.set('b', { deep: { list: [true, null] } });

      expect(await cacheManager.getAll()).toEqual(
        new Map<string, unknown>([
          ['a', 1],
          ['b', { deep: { list: [true, null] } }],
        ])
      );
    });

    test('should clear the backend', async () => {
      await cacheManager.set('a', 1, { tags: ['t'] });

      await cacheManager.clear();

      expect(await cacheManager.getAll()).toEqual(new Map());
    });
  });

  describe('Tags', () => {
    test('should look up and invalidate by tag', async () => {
      await cacheManager.set('k1', 'v1', { tags: ['t1', 't2'] });
      await cacheManager.set('k2', 'v2', { tags: ['t1', 't3'] });
      await cacheManager.set('k3', 'v3', { tags: ['t2', 't3'] });

      expect(await cacheManager.getByTag('t1')).toEqual(
        new Map([
          ['k1', 'v1'],
          ['k2', 'v2'],
        ])
      );
      expect(await cacheManager.deleteByTag('t1')).toBe(2);
      expect(await cacheManager.exists('k1')).toBe(false);
      expect(await cacheManager.exists('k3')).toBe(true);
      expect(await cacheManager.getByTag('t2')).toEqual(new Map([['k3', 'v3']]));
    });

    test('should replace tags when a key is written again', async () => {
      await cacheManager.set('k', 'v1', { tags: ['old'] });
      await cacheManager.set('k', 'v2', { tags: ['new'] });

      expect(await cacheManager.getByTag('old')).toEqual(new Map());
      expect(await cacheManager.getByTag('new')).toEqual(new Map([['k', 'v2']]));
    });
  });

  describe('Metrics', () => {
    test('should track hits and misses', async () => {
      await cacheManager.set('key1', 'value1', { tags: ['t'] });
      await cacheManager.get('key1');
      await cacheManager.get('missing');
      await cacheManager.getByTag('t');

      const metrics = await cacheManager.getMetrics();
      expect(metrics.hits).toBe(2);
      expect(metrics.misses).toBe(1);
      expect(metrics.operations).toBe(4);
    });

    test('should count failed operations as errors', async () => {
      await expect(cacheManager.set('', 'v')).rejects.toThrow('Cache key must be a non-empty string');

      expect((await cacheManager.getMetrics()).errors).toBe(1);
    });

    test('should reset metrics', async () => {
      await cacheManager.get('missing');
      cacheManager.resetMetrics();

      expect((await cacheManager.getMetrics()).misses).toBe(0);
    });

    test('should not record when metrics are disabled', async () => {
      const quiet = new CacheManager({ store: { type: 'memory' }, logger, metrics: { enabled: false } });
      await quiet.get('missing');

      expect((await quiet.getMetrics()).operations).toBe(0);
    });
  });

  describe('Configuration', () => {
    test('should build a memory store by default config', () => {
      expect(cacheManager.getBackend()).toBeInstanceOf(MemoryStore);
      expect(logger.debug).toHaveBeenCalledWith('Initializing memory cache store');
    });

    test('should build a redis store with the chosen prefix and serializer', () => {
      const manager = new CacheManager({
        store: { type: 'redis', host: 'redis.local', prefix: 'app:' },
        serializer: 'msgpack',
        logger,
      });
      const backend = manager.getBackend();

      expect(backend).toBeInstanceOf(RedisStore);
      expect(backend instanceof RedisStore && backend.getPrefix()).toBe('app:');
      expect(manager.getSerializer()).toBeInstanceOf(MessagePackSerializer);
    });

    test('should reject an unknown store type', () => {
      const store: StoreConfig = JSON.parse('{"type":"memcached"}');

      expect(() => new CacheManager({ store, logger })).toThrow(ConfigurationError);
      expect(() => new CacheManager({ store, logger })).toThrow('Unsupported store type: memcached');
    });

    test('should reject a sentinel store without sentinels', () => {
      expect(
        () =>
          new CacheManager({
            store: { type: 'redis-sentinel', sentinels: [], serviceName: 'mymaster' },
            logger,
          })
      ).toThrow(ConfigurationError);
    });

    test('should fail fast when the sentinel primary cannot be resolved', async () => {
      mockCall.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(
        CacheManager.create({
          store: {
            type: 'redis-sentinel',
            sentinels: [{ host: 'sentinel.local', port: 26379 }],
            serviceName: 'mymaster',
          },
          logger,
        })
      ).rejects.toThrow(ConnectionError);
      mockCall.mockReset();
    });

    test('should create a memory cache without connecting anywhere', async () => {
      const manager = await CacheManager.create({ store: { type: 'memory' }, logger });

      await manager.set('k', 'v');
      expect(await manager.get('k')).toBe('v');
    });
  });
});
