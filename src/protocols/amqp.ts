import amqp from "amqplib";
import type { PubSubTransport, RawMessage, TransportConnection, TransportSubscription } from "./pubsub.js";
import type { ServerCredentials, ServerTarget } from "../types.js";

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;
type AmqpChannel = Awaited<ReturnType<AmqpConnection["createChannel"]>>;

/**
 * AMQP 0-9-1 transport. A channel name is used as a (non-durable) queue
 * name on the default exchange.
 */
export class AmqpTransport implements PubSubTransport {
  readonly protocol = "amqp";

  async open(server: ServerTarget, options: { timeoutMs: number }): Promise<TransportConnection> {
    const connection = await amqp.connect(server.url, {
      timeout: options.timeoutMs,
      credentials: plainLogin(server.credentials),
    });
    const channel = await connection.createChannel();
    return new AmqpTransportConnection(connection, channel);
  }
}

// Without explicit credentials amqplib falls back to the user info in the URL
function plainLogin(credentials?: ServerCredentials) {
  if (credentials?.username !== undefined) return amqp.credentials.plain(credentials.username, credentials.password ?? "");
  // OAuth2-enabled brokers take the token as the password
  if (credentials?.token) return amqp.credentials.plain("", credentials.token);
  return undefined;
}

class AmqpTransportConnection implements TransportConnection {
  private declared = new Set<string>();
  private lastError?: Error;

  constructor(private connection: AmqpConnection, private channel: AmqpChannel) {
    connection.on("error", (err: Error) => {
      this.lastError = err;
    });
  }

  onClose(listener: (err?: Error) => void) {
    this.connection.once("close", (err?: Error) => listener(err ?? this.lastError));
  }

  async publish(queue: string, data: string): Promise<void> {
    await this.declare(queue);
    this.channel.sendToQueue(queue, Buffer.from(data), { contentType: "application/json" });
  }

  async subscribe(queue: string, onMessage: (data: RawMessage) => void): Promise<TransportSubscription> {
    await this.declare(queue);
    const { consumerTag } = await this.channel.consume(
      queue,
      (msg) => {
        if (msg) onMessage(msg.content);
      },
      { noAck: true },
    );
    return {
      close: async () => {
        await this.channel.cancel(consumerTag);
      },
    };
  }

  async close(): Promise<void> {
    await this.channel.close();
    await this.connection.close();
  }

  private async declare(queue: string) {
    if (this.declared.has(queue)) return;
    await this.channel.assertQueue(queue, { durable: false });
    this.declared.add(queue);
  }
}
