import WebSocket from "ws";
import { isRecord } from "../spec.js";
import type { PubSubTransport, RawMessage, TransportConnection, TransportSubscription } from "./pubsub.js";
import type { ServerCredentials, ServerTarget } from "../types.js";

/**
 * WebSocket transport. Channels are multiplexed over one socket: control
 * frames `{type: "subscribe" | "unsubscribe", channel}` go out, and inbound
 * frames are routed by their `channel` field.
 */
export class WebSocketTransport implements PubSubTransport {
  readonly protocol = "websocket";

  async open(server: ServerTarget, options: { timeoutMs: number }): Promise<TransportConnection> {
    const socket = new WebSocket(server.url, {
      handshakeTimeout: options.timeoutMs,
      headers: handshakeHeaders(server.credentials),
    });
    await new Promise<void>((resolve, reject) => {
      socket.once("open", () => {
        socket.off("error", reject);
        resolve();
      });
      socket.once("error", reject);
    });
    return new WebSocketConnection(socket);
  }
}

/** Credentials as upgrade-request headers. */
export function handshakeHeaders(credentials?: ServerCredentials): Record<string, string> {
  if (!credentials) return {};
  const headers: Record<string, string> = { ...credentials.headers };
  if (credentials.token) {
    headers.Authorization = `Bearer ${credentials.token}`;
  } else if (credentials.username !== undefined) {
    const basic = Buffer.from(`${credentials.username}:${credentials.password ?? ""}`).toString("base64");
    headers.Authorization = `Basic ${basic}`;
  }
  return headers;
}

class WebSocketConnection implements TransportConnection {
  private lastError?: Error;

  constructor(private socket: WebSocket) {
    // ws emits "error" on the socket after open; without a listener it would throw
    socket.on("error", (err) => {
      this.lastError = err;
    });
  }

  onClose(listener: (err?: Error) => void) {
    this.socket.once("close", (code: number) => {
      listener(this.lastError ?? new Error(`socket closed with code ${code}`));
    });
  }

  publish(_channel: string, data: string): Promise<void> {
    return this.send(data);
  }

  async subscribe(channel: string, onMessage: (data: RawMessage) => void): Promise<TransportSubscription> {
    const listener = (data: WebSocket.RawData) => {
      const text = rawDataToString(data);
      if (frameChannel(text) === channel) onMessage(text);
    };
    this.socket.on("message", listener);
    await this.send(JSON.stringify({ type: "subscribe", channel }));

    return {
      close: async () => {
        this.socket.off("message", listener);
        if (this.socket.readyState === WebSocket.OPEN) {
          await this.send(JSON.stringify({ type: "unsubscribe", channel }));
        }
      },
    };
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.close();
    });
  }

  private send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, (err) => (err ? reject(err) : resolve()));
    });
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
}

function frameChannel(text: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) && typeof parsed.channel === "string" ? parsed.channel : undefined;
  } catch {
    return undefined;
  }
}
