import { ConfigurationError, ISerializer, SerializerType } from '../types';
import { JsonSerializer } from './JsonSerializer';
import { MessagePackSerializer } from './MessagePackSerializer';

export class SerializerFactory {
  private static serializers: Map<SerializerType, ISerializer> = new Map();

  static {
    SerializerFactory.serializers.set('json', new JsonSerializer());
    SerializerFactory.serializers.set('msgpack', new MessagePackSerializer());
  }

  static getSerializer(type: SerializerType): ISerializer {
    const serializer = SerializerFactory.serializers.get(type);

    if (!serializer) {
      throw new ConfigurationError(`Unsupported serializer type: ${String(type)}`);
    }

    return serializer;
  }

  static getSupportedTypes(): SerializerType[] {
    return Array.from(SerializerFactory.serializers.keys());
  }
}
