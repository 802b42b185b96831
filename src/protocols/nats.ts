import { connect } from "nats";
import type { NatsConnection } from "nats";
import type { PubSubTransport, RawMessage, TransportConnection, TransportSubscription } from "./pubsub.js";
import type { ServerTarget } from "../types.js";

export class NatsTransport implements PubSubTransport {
  readonly protocol = "nats";

  async open(server: ServerTarget, options: { timeoutMs: number; clientId: string }): Promise<TransportConnection> {
    const { credentials } = server;
    const nc = await connect({
      servers: server.url,
      timeout: options.timeoutMs,
      name: options.clientId,
      user: credentials?.username,
      pass: credentials?.password,
      token: credentials?.token,
    });
    return new NatsTransportConnection(nc);
  }
}

class NatsTransportConnection implements TransportConnection {
  constructor(private nc: NatsConnection) {}

  onClose(listener: (err?: Error) => void) {
    // closed() resolves with the error that ended the connection, if any
    void this.nc.closed().then((err) => listener(err instanceof Error ? err : undefined));
  }

  async publish(subject: string, data: string): Promise<void> {
    this.nc.publish(subject, Buffer.from(data));
    await this.nc.flush();
  }

  async subscribe(subject: string, onMessage: (data: RawMessage) => void): Promise<TransportSubscription> {
    const sub = this.nc.subscribe(subject, {
      callback: (err, msg) => {
        if (!err) onMessage(msg.data);
      },
    });
    await this.nc.flush();
    return {
      close: async () => {
        sub.unsubscribe();
      },
    };
  }

  async close(): Promise<void> {
    await this.nc.drain();
  }
}
