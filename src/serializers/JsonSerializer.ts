import { CacheValue, ISerializer, SerializationError, SerializerType } from '../types';

/** JSON has no literal for NaN or the infinities; stringify would write null. */
function rejectNonFinite(key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    const path = key === '' ? 'value' : `property "${key}"`;
    throw new SerializationError(`Cannot serialize non-finite number ${value} at ${path}`);
  }
  return value;
}

export class JsonSerializer implements ISerializer {
  serialize(value: CacheValue): string {
    try {
      if (value === undefined) {
        throw new SerializationError('Cannot serialize undefined value');
      }

      return JSON.stringify(value, rejectNonFinite);
    } catch (error) {
      if (error instanceof SerializationError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : 'Unknown serialization error';
      throw new SerializationError(`JSON serialization failed: ${message}`, error);
    }
  }

  deserialize(data: Buffer | string): CacheValue {
    try {
      const jsonString = Buffer.isBuffer(data) ? data.toString('utf8') : data;

      if (!jsonString || jsonString.trim() === '') {
        throw new SerializationError('Cannot deserialize empty or null data');
      }

      return JSON.parse(jsonString);
    } catch (error) {
      if (error instanceof SerializationError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : 'Unknown deserialization error';
      throw new SerializationError(`JSON deserialization failed: ${message}`, error);
    }
  }

  canSerialize(value: unknown): boolean {
    try {
      return value !== undefined && JSON.stringify(value, rejectNonFinite) !== undefined;
    } catch {
      return false;
    }
  }

  getContentType(): string {
    return 'application/json';
  }

  getName(): SerializerType {
    return 'json';
  }
}
