export { CacheManager } from './CacheManager';

export { BaseStore } from './stores/BaseStore';
export { MemoryStore } from './stores/MemoryStore';
export { RedisStore } from './stores/RedisStore';
export type { RedisStoreOptions } from './stores/RedisStore';

export { IoRedisConnection, createRedisClient, redisOptionsFromConfig } from './connections/IoRedisConnection';
export { DirectConnectionProvider, DiscoveryConnectionProvider } from './connections/ConnectionProvider';
export { SentinelDiscovery, validateSentinelConfig } from './connections/SentinelDiscovery';

export { MetricsCollector } from './metrics/MetricsCollector';

export { JsonSerializer } from './serializers/JsonSerializer';
export { MessagePackSerializer } from './serializers/MessagePackSerializer';
export { SerializerFactory } from './serializers/SerializerFactory';

export * from './types';

import { CacheManager } from './CacheManager';
export default CacheManager;
