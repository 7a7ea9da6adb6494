import { IConnectionProvider, IDiscovery, IRemoteConnection } from '../types';

/** A single server: reads and writes share one connection. */
export class DirectConnectionProvider implements IConnectionProvider {
  constructor(private connection: IRemoteConnection) {}

  async writer(): Promise<IRemoteConnection> {
    return this.connection;
  }

  async reader(): Promise<IRemoteConnection> {
    return this.connection;
  }

  async verify(): Promise<void> {
    // ioredis connects lazily on the first command
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}

/**
 * Resolves the primary (writes) or a replica (reads) through discovery on
 * every call. Nothing is cached here, so a failover between two calls of the
 * same logical operation is picked up by the next call.
 */
export class DiscoveryConnectionProvider implements IConnectionProvider {
  constructor(private discovery: IDiscovery, private serviceName: string) {}

  async writer(): Promise<IRemoteConnection> {
    return this.discovery.resolvePrimary(this.serviceName);
  }

  async reader(): Promise<IRemoteConnection> {
    return this.discovery.resolveReplica(this.serviceName);
  }

  async verify(): Promise<void> {
    await this.discovery.resolvePrimary(this.serviceName);
  }

  async close(): Promise<void> {
    await this.discovery.close();
  }
}
