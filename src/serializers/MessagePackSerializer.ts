import msgpack5 from 'msgpack5';
import { CacheValue, ISerializer, SerializationError, SerializerType } from '../types';

export class MessagePackSerializer implements ISerializer {
  private msgpack = msgpack5();

  serialize(value: CacheValue): Buffer {
    try {
      if (value === undefined) {
        throw new SerializationError('Cannot serialize undefined value');
      }

      return this.msgpack.encode(value).slice();
    } catch (error) {
      if (error instanceof SerializationError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : 'Unknown serialization error';
      throw new SerializationError(`MessagePack serialization failed: ${message}`, error);
    }
  }

  deserialize(data: Buffer | string): CacheValue {
    try {
      const buffer = Buffer.isBuffer(data) ? data : Buffer.from(data, 'binary');

      if (buffer.length === 0) {
        throw new SerializationError('Cannot deserialize empty or null buffer');
      }

      return this.msgpack.decode(buffer);
    } catch (error) {
      if (error instanceof SerializationError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : 'Unknown deserialization error';
      throw new SerializationError(`MessagePack deserialization failed: ${message}`, error);
    }
  }

  canSerialize(value: unknown): boolean {
    if (value === undefined) {
      return false;
    }
    try {
      this.msgpack.encode(value);
      return true;
    } catch {
      return false;
    }
  }

  getContentType(): string {
    return 'application/msgpack';
  }

  getName(): SerializerType {
    return 'msgpack';
  }
}
