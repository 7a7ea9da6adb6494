import Redis from 'ioredis';
import { createRedisClient, IoRedisConnection } from './IoRedisConnection';
import {
  ConfigurationError,
  ConnectionError,
  IDiscovery,
  IRemoteConnection,
  Logger,
  SentinelAddress,
  SentinelStoreConfig,
} from '../types';

const DEFAULT_SOCKET_TIMEOUT = 100;
const DEFAULT_CONNECT_TIMEOUT = 100;
const DEFAULT_KEEP_ALIVE = 30000;
const UNHEALTHY_REPLICA_FLAGS = ['s_down', 'o_down', 'disconnected'];

interface ReplicaInfo extends SentinelAddress {
  flags: string[];
}

export function validateSentinelConfig(config: SentinelStoreConfig): void {
  if (!Array.isArray(config.sentinels) || config.sentinels.length === 0) {
    throw new ConfigurationError('redis-sentinel store requires at least one sentinel address');
  }
  for (const sentinel of config.sentinels) {
    if (!sentinel.host || !Number.isInteger(sentinel.port) || sentinel.port <= 0) {
      throw new ConfigurationError(`Invalid sentinel address: ${JSON.stringify(sentinel)}`);
    }
  }
  if (!config.serviceName) {
    throw new ConfigurationError('redis-sentinel store requires a serviceName');
  }
}

function parseAddress(reply: unknown): SentinelAddress | null {
  if (!Array.isArray(reply) || reply.length < 2) {
    return null;
  }
  const [host, port] = reply;
  const parsedPort = Number(port);
  if (typeof host !== 'string' || !Number.isInteger(parsedPort)) {
    return null;
  }
  return { host, port: parsedPort };
}

/** `SENTINEL replicas` answers with one flat field/value list per replica. */
function parseReplicas(reply: unknown): ReplicaInfo[] {
  if (!Array.isArray(reply)) {
    return [];
  }

  const replicas: ReplicaInfo[] = [];
  for (const entry of reply) {
    if (!Array.isArray(entry)) {
      continue;
    }
    const fields = new Map<string, string>();
    for (let i = 0; i + 1 < entry.length; i += 2) {
      fields.set(String(entry[i]), String(entry[i + 1]));
    }
    const host = fields.get('ip');
    const port = Number(fields.get('port'));
    if (!host || !Number.isInteger(port)) {
      continue;
    }
    replicas.push({ host, port, flags: (fields.get('flags') ?? '').split(',') });
  }
  return replicas;
}

/**
 * Locates the current primary and replicas of a service by asking Redis
 * Sentinel. Sentinels are tried in configuration order until one answers.
 */
export class SentinelDiscovery implements IDiscovery {
  private sentinels: Array<{ address: SentinelAddress; client: Redis }>;
  private nodes = new Map<string, IoRedisConnection>();

  constructor(private config: SentinelStoreConfig, private logger: Logger = console) {
    validateSentinelConfig(config);

    this.sentinels = config.sentinels.map((address) => ({
      address,
      client: createRedisClient(
        {
          host: address.host,
          port: address.port,
          password: config.sentinelPassword,
          commandTimeout: config.socketTimeout ?? DEFAULT_SOCKET_TIMEOUT,
          connectTimeout: config.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
          keepAlive: config.keepAlive ?? DEFAULT_KEEP_ALIVE,
          maxRetriesPerRequest: 1,
        },
        logger
      ),
    }));
  }

  async resolvePrimary(serviceName: string): Promise<IRemoteConnection> {
    const address = await this.askSentinels(`primary of "${serviceName}"`, async (client) =>
      parseAddress(await client.call('SENTINEL', 'get-master-addr-by-name', serviceName))
    );
    return this.connectionFor(address);
  }

  async resolveReplica(serviceName: string): Promise<IRemoteConnection> {
    const replicas = await this.askSentinels(`replicas of "${serviceName}"`, async (client) =>
      parseReplicas(await client.call('SENTINEL', 'replicas', serviceName))
    );
    const healthy = replicas.filter(
      (replica) => !replica.flags.some((flag) => UNHEALTHY_REPLICA_FLAGS.includes(flag))
    );

    if (healthy.length === 0) {
      this.logger.warn(`No healthy replica for "${serviceName}", reading from the primary`);
      return this.resolvePrimary(serviceName);
    }

    const replica = healthy[Math.floor(Math.random() * healthy.length)];
    return this.connectionFor(replica);
  }

  async close(): Promise<void> {
    const closing: Array<Promise<unknown>> = Array.from(this.nodes.values()).map((node) => node.close());
    for (const { client } of this.sentinels) {
      closing.push(client.quit().catch(() => client.disconnect()));
    }
    await Promise.all(closing);
    this.nodes.clear();
  }

  private async askSentinels<T>(
    what: string,
    query: (client: Redis) => Promise<T | null>
  ): Promise<T> {
    let lastError: unknown;

    for (const { address, client } of this.sentinels) {
      try {
        const answer = await query(client);
        if (answer !== null) {
          return answer;
        }
        this.logger.warn(`Sentinel ${address.host}:${address.port} does not know the ${what}`);
      } catch (error) {
        lastError = error;
        this.logger.warn(`Sentinel ${address.host}:${address.port} failed to resolve the ${what}:`, error);
      }
    }

    throw new ConnectionError(`No sentinel could resolve the ${what}`, lastError);
  }

  /** Clients are reused per address; the address itself is looked up on every call. */
  private connectionFor(address: SentinelAddress): IRemoteConnection {
    const id = `${address.host}:${address.port}`;
    let node = this.nodes.get(id);
    if (!node) {
      const client = createRedisClient(
        {
          host: address.host,
          port: address.port,
          db: this.config.db ?? 0,
          password: this.config.password,
          commandTimeout: this.config.socketTimeout ?? DEFAULT_SOCKET_TIMEOUT,
          connectTimeout: this.config.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
          keepAlive: this.config.keepAlive ?? DEFAULT_KEEP_ALIVE,
        },
        this.logger
      );
      node = new IoRedisConnection(client, id);
      this.nodes.set(id, node);
    }
    return node;
  }
}
