import { Kafka, logLevel } from "kafkajs";
import type { Producer, SASLOptions } from "kafkajs";
import type { PubSubTransport, RawMessage, TransportConnection, TransportSubscription } from "./pubsub.js";
import type { ServerCredentials, ServerTarget } from "../types.js";

/**
 * Kafka transport. One producer per connection; every subscription runs its
 * own consumer group so each subscriber sees every message.
 */
export class KafkaTransport implements PubSubTransport {
  readonly protocol = "kafka";

  async open(server: ServerTarget, options: { timeoutMs: number; clientId: string }): Promise<TransportConnection> {
    const kafka = new Kafka({
      clientId: options.clientId,
      brokers: brokerList(server.url),
      connectionTimeout: options.timeoutMs,
      logLevel: logLevel.NOTHING,
      sasl: saslOptions(server.credentials),
    });
    const producer = kafka.producer();
    await producer.connect();
    return new KafkaConnection(kafka, producer, options.clientId);
  }
}

class KafkaConnection implements TransportConnection {
  private consumers = 0;

  constructor(private kafka: Kafka, private producer: Producer, private clientId: string) {}

  onClose(listener: (err?: Error) => void) {
    this.producer.on(this.producer.events.DISCONNECT, () => listener());
  }

  async publish(topic: string, data: string): Promise<void> {
    await this.producer.send({ topic, messages: [{ value: data }] });
  }

  async subscribe(topic: string, onMessage: (data: RawMessage) => void): Promise<TransportSubscription> {
    const consumer = this.kafka.consumer({ groupId: `${this.clientId}-${topic}-${++this.consumers}-${Date.now()}` });
    await consumer.connect();
    await consumer.subscribe({ topic, fromBeginning: false });
    await consumer.run({
      eachMessage: async ({ message }) => {
        if (message.value) onMessage(message.value);
      },
    });
    return {
      close: () => consumer.disconnect(),
    };
  }

  close(): Promise<void> {
    return this.producer.disconnect();
  }
}

export function saslOptions(credentials?: ServerCredentials): SASLOptions | undefined {
  if (credentials?.username !== undefined) {
    return { mechanism: "plain", username: credentials.username, password: credentials.password ?? "" };
  }
  const token = credentials?.token;
  if (token) {
    return { mechanism: "oauthbearer", oauthBearerProvider: async () => ({ value: token }) };
  }
  return undefined;
}

/** `kafka://a:9092,b:9092` → ["a:9092", "b:9092"] */
export function brokerList(url: string): string[] {
  return url
    .replace(/^[a-z][a-z\d+.-]*:\/\//i, "")
    .replace(/\/.*$/, "")
    .split(",")
    .map((b) => b.trim())
    .filter(Boolean);
}
