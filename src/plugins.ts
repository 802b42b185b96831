import { AsyncApiParser, AsyncApiSpec } from "./asyncapi.js";
import { ChannelExecutor, RestExecutor } from "./executors.js";
import { OpenApiParser, OpenApiSpec } from "./openapi.js";
import { AmqpTransport } from "./protocols/amqp.js";
import { HttpAdapter } from "./protocols/http.js";
import { KafkaTransport } from "./protocols/kafka.js";
import { MqttTransport } from "./protocols/mqtt.js";
import { NatsTransport } from "./protocols/nats.js";
import { PubSubAdapter } from "./protocols/pubsub.js";
import type { PubSubTransport } from "./protocols/pubsub.js";
import { WebSocketTransport } from "./protocols/websocket.js";
import { Registry } from "./registry.js";
import type { ProtocolAdapterFactory } from "./types.js";

/** Factory wrapping a broker transport in the shared pub/sub adapter. */
export function pubSubFactory(createTransport: () => PubSubTransport): ProtocolAdapterFactory {
  return (options) =>
    new PubSubAdapter(createTransport(), {
      logger: options.logger,
      connectTimeoutMs: options.connectTimeoutMs,
      clientId: options.clientId,
    });
}

/**
 * Registry with the built-in families ("rest", "pubsub") and transports.
 */
export function createDefaultRegistry(): Registry {
  const registry = new Registry();

  registry.registerSpecFamily("rest", OpenApiSpec, new OpenApiParser(), new RestExecutor());
  registry.registerSpecFamily("pubsub", AsyncApiSpec, new AsyncApiParser(), new ChannelExecutor());

  registry.registerProtocol("http", (options) => new HttpAdapter(options));
  registry.registerProtocol("websocket", pubSubFactory(() => new WebSocketTransport()));
  registry.registerProtocol("mqtt", pubSubFactory(() => new MqttTransport()));
  registry.registerProtocol("amqp", pubSubFactory(() => new AmqpTransport()));
  registry.registerProtocol("kafka", pubSubFactory(() => new KafkaTransport()));
  registry.registerProtocol("nats", pubSubFactory(() => new NatsTransport()));

  return registry;
}
