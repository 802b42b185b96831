import { randomUUID } from "crypto";
import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import type { PubSubTransport, RawMessage, TransportConnection, TransportSubscription } from "./pubsub.js";
import type { ServerTarget } from "../types.js";

export class MqttTransport implements PubSubTransport {
  readonly protocol = "mqtt";

  open(server: ServerTarget, options: { timeoutMs: number; clientId: string }): Promise<TransportConnection> {
    const opts: IClientOptions = {
      clientId: `${options.clientId}-${randomUUID().slice(0, 8)}`,
      connectTimeout: options.timeoutMs,
      reconnectPeriod: 0, // reconnects are the caller's decision
    };
    const { credentials } = server;
    if (credentials?.username !== undefined) {
      opts.username = credentials.username;
      opts.password = credentials.password;
    } else if (credentials?.token) {
      // Token-auth brokers read the token from the password field
      opts.username = "";
      opts.password = credentials.token;
    }

    return new Promise((resolve, reject) => {
      const client = mqtt.connect(server.url, opts);

      const onError = (err: Error) => {
        client.end(true);
        reject(err);
      };
      client.once("error", onError);
      client.once("connect", () => {
        client.off("error", onError);
        resolve(new MqttConnection(client));
      });
    });
  }
}

class MqttConnection implements TransportConnection {
  private routes = new Map<(topic: string, payload: Buffer) => void, string>();
  private lastError?: Error;

  constructor(private client: MqttClient) {
    client.on("error", (err: Error) => {
      this.lastError = err;
    });
  }

  // With reconnects off, "close" is final
  onClose(listener: (err?: Error) => void) {
    this.client.once("close", () => listener(this.lastError));
  }

  publish(channel: string, data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.publish(channel, data, (err?: Error | null) => (err ? reject(err) : resolve()));
    });
  }

  async subscribe(channel: string, onMessage: (data: RawMessage) => void): Promise<TransportSubscription> {
    await new Promise<void>((resolve, reject) => {
      this.client.subscribe(channel, (err?: Error | null) => (err ? reject(err) : resolve()));
    });

    const listener = (topic: string, payload: Buffer) => {
      if (topicMatches(channel, topic)) onMessage(payload);
    };
    this.routes.set(listener, channel);
    this.client.on("message", listener);

    return {
      close: () => {
        this.client.off("message", listener);
        this.routes.delete(listener);
        // Other subscriptions may still use the same filter
        if ([...this.routes.values()].includes(channel)) return Promise.resolve();
        return new Promise<void>((resolve, reject) => {
          this.client.unsubscribe(channel, (err?: Error | null) => (err ? reject(err) : resolve()));
        });
      },
    };
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.client.end(false, {}, () => resolve());
    });
  }
}

/**
 * MQTT topic filter match: `+` is one level, a trailing `#` is any remainder.
 */
export function topicMatches(filter: string, topic: string): boolean {
  if (filter === topic) return true;
  const f = filter.split("/");
  const t = topic.split("/");
  for (let i = 0; i < f.length; i++) {
    if (f[i] === "#") return i === f.length - 1;
    if (i >= t.length) return false;
    if (f[i] !== "+" && f[i] !== t[i]) return false;
  }
  return f.length === t.length;
}
