/**
 * Shared pub/sub machinery. Each broker client only has to implement the
 * small PubSubTransport contract; PubSubAdapter adds connection caching,
 * message envelopes, async handler dispatch and ordered teardown.
 */

import { createHash, randomUUID } from "crypto";
import {
  GatewayError,
  TransportConnectionError,
  TransportTimeoutError,
  classifyConnectionFailure,
  errorMessage,
} from "../errors.js";
import type { Logger } from "../middleware.js";
import { isRecord } from "../spec.js";
import type {
  ChannelOperation,
  ConnectionHandle,
  InboundMessage,
  MessageEnvelope,
  MessageHandler,
  OutboundMessage,
  PubSubProtocolAdapter,
  ServerTarget,
  SubscriptionHandle,
} from "../types.js";

export type RawMessage = string | Buffer | Uint8Array;

export interface TransportSubscription {
  close(): Promise<void>;
}

export interface TransportConnection {
  publish(channel: string, data: string): Promise<void>;
  /** `onMessage` is called from the client library's receive path; it must not block. */
  subscribe(channel: string, onMessage: (data: RawMessage) => void): Promise<TransportSubscription>;
  /** Register for the client library reporting the connection lost. */
  onClose(listener: (err?: Error) => void): void;
  close(): Promise<void>;
}

export interface PubSubTransport {
  readonly protocol: string;
  open(server: ServerTarget, options: { timeoutMs: number; clientId: string }): Promise<TransportConnection>;
}

export interface PubSubAdapterOptions {
  logger: Logger;
  connectTimeoutMs: number;
  clientId: string;
}

// ---- Free helpers ----

export function createEnvelope(
  channel: string,
  operation: ChannelOperation,
  message: OutboundMessage,
): MessageEnvelope {
  return {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    channel,
    operation,
    headers: message.headers,
    payload: message.payload,
  };
}

export function isEnvelope(value: unknown): value is MessageEnvelope {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.channel === "string" &&
    "payload" in value
  );
}

/** Decode an inbound frame; envelopes are unwrapped, other JSON passed as payload. */
export function decodeInbound(channel: string, data: RawMessage): InboundMessage {
  const raw = typeof data === "string" ? data : Buffer.from(data).toString("utf-8");
  const receivedAt = new Date().toISOString();
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { channel, payload: raw, raw, receivedAt };
  }
  if (isEnvelope(parsed)) {
    return { channel, payload: parsed.payload, envelope: parsed, raw, receivedAt };
  }
  return { channel, payload: parsed, raw, receivedAt };
}

/**
 * Race `promise` against a timer; the timer rejects with TransportTimeoutError.
 * `onLate` receives a value that arrives after the timer won, so the caller
 * can release it.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  target: string,
  onLate?: (value: T) => void,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new TransportTimeoutError(target, timeoutMs));
    }, timeoutMs);
  });
  if (onLate) {
    void promise.then(
      (value) => {
        if (timedOut) onLate(value);
      },
      // a rejection is reported through the race below
      () => undefined,
    );
  }
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Single-consumer work queue. Producers push from the network receive path;
 * a worker drains on a later tick so slow handlers never stall the client.
 */
export class MessageQueue<T> {
  private items: T[] = [];
  private running = false;
  private closed = false;

  constructor(
    private handler: (item: T) => void | Promise<void>,
    private onError: (err: unknown, item: T) => void,
  ) {}

  push(item: T) {
    if (this.closed) return;
    this.items.push(item);
    if (!this.running) {
      this.running = true;
      setImmediate(() => {
        this.drain().catch((err: unknown) => this.onError(err, item));
      });
    }
  }

  get size(): number {
    return this.items.length;
  }

  close() {
    this.closed = true;
    this.items = [];
  }

  private async drain() {
    try {
      while (this.items.length && !this.closed) {
        const item = this.items.shift();
        if (item === undefined) break;
        try {
          await this.handler(item);
        } catch (err) {
          this.onError(err, item);
        }
      }
    } finally {
      this.running = false;
    }
  }
}

// ---- Adapter ----

interface ManagedConnection {
  handle: ConnectionHandle;
  transport: TransportConnection;
  subscriptions: Set<string>;
}

interface ManagedSubscription {
  handle: SubscriptionHandle;
  transport: TransportSubscription;
  queue: MessageQueue<InboundMessage>;
}

/** `protocol|url`, plus a fingerprint of the credentials when there are any. */
export function connectionKey(server: ServerTarget): string {
  const key = `${server.protocol}|${server.url}`;
  if (!server.credentials) return key;
  const fingerprint = createHash("sha256").update(JSON.stringify(server.credentials)).digest("hex").slice(0, 16);
  return `${key}|${fingerprint}`;
}

export class PubSubAdapter implements PubSubProtocolAdapter {
  readonly kind = "pubsub";

  private connections = new Map<string, Promise<ManagedConnection>>();
  private byId = new Map<string, ManagedConnection>();
  private subscriptions = new Map<string, ManagedSubscription>();
  private logger: Logger;

  constructor(private transport: PubSubTransport, private options: PubSubAdapterOptions) {
    this.logger = options.logger.child({ protocol: transport.protocol });
  }

  get protocol(): string {
    return this.transport.protocol;
  }

  /**
   * Connect to `server`, reusing a live (or in-flight) connection for the same key.
   */
  async connect(server: ServerTarget): Promise<ConnectionHandle> {
    const key = connectionKey(server);
    let pending = this.connections.get(key);
    if (!pending) {
      pending = this.open(server, key);
      this.connections.set(key, pending);
      // Failed attempts are not cached
      void pending.catch(() => this.connections.delete(key));
    }
    return (await pending).handle;
  }

  async publish(connection: ConnectionHandle, channel: string, message: OutboundMessage): Promise<MessageEnvelope> {
    const managed = this.managed(connection);
    const envelope = createEnvelope(channel, "publish", message);
    try {
      await withTimeout(managed.transport.publish(channel, JSON.stringify(envelope)), this.options.connectTimeoutMs, connection.url);
    } catch (err) {
      throw this.failed(managed, err);
    }
    this.logger.debug("published", { channel, messageId: envelope.id });
    return envelope;
  }

  async subscribe(connection: ConnectionHandle, channel: string, handler: MessageHandler): Promise<SubscriptionHandle> {
    const managed = this.managed(connection);
    const handle: SubscriptionHandle = {
      id: randomUUID(),
      connectionId: connection.id,
      protocol: this.protocol,
      channel,
      createdAt: new Date().toISOString(),
    };

    const queue = new MessageQueue<InboundMessage>(handler, (err) => {
      this.logger.error("message handler failed", { subscriptionId: handle.id, channel, error: errorMessage(err) });
    });

    let transport: TransportSubscription;
    try {
      transport = await withTimeout(
        managed.transport.subscribe(channel, (data) => queue.push(decodeInbound(channel, data))),
        this.options.connectTimeoutMs,
        connection.url,
        (late) => this.release(late, "subscription", connection.url),
      );
    } catch (err) {
      queue.close();
      throw this.failed(managed, err);
    }

    managed.subscriptions.add(handle.id);
    this.subscriptions.set(handle.id, { handle, transport, queue });
    this.logger.info("subscribed", { subscriptionId: handle.id, channel });
    return handle;
  }

  async unsubscribe(subscription: SubscriptionHandle | string): Promise<void> {
    const id = typeof subscription === "string" ? subscription : subscription.id;
    const managed = this.subscriptions.get(id);
    if (!managed) return;

    this.subscriptions.delete(id);
    this.byId.get(managed.handle.connectionId)?.subscriptions.delete(id);
    managed.queue.close();
    try {
      await managed.transport.close();
    } catch (err) {
      this.logger.warn("unsubscribe failed", { subscriptionId: id, error: errorMessage(err) });
    }
    this.logger.info("unsubscribed", { subscriptionId: id, channel: managed.handle.channel });
  }

  /**
   * Tear down the connection's subscriptions, then the connection itself.
   */
  async disconnect(connection: ConnectionHandle): Promise<void> {
    const managed = this.byId.get(connection.id);
    if (!managed) return;

    for (const id of [...managed.subscriptions]) {
      await this.unsubscribe(id);
    }
    this.byId.delete(connection.id);
    this.connections.delete(connection.key);
    try {
      await managed.transport.close();
    } catch (err) {
      this.logger.warn("disconnect failed", { url: connection.url, error: errorMessage(err) });
    }
    this.logger.info("disconnected", { url: connection.url });
  }

  listSubscriptions(): SubscriptionHandle[] {
    return [...this.subscriptions.values()].map((s) => s.handle);
  }

  listConnections(): ConnectionHandle[] {
    return [...this.byId.values()].map((c) => c.handle);
  }

  async close(): Promise<void> {
    for (const managed of [...this.byId.values()]) {
      await this.disconnect(managed.handle);
    }
  }

  private async open(server: ServerTarget, key: string): Promise<ManagedConnection> {
    const { connectTimeoutMs, clientId } = this.options;
    let transport: TransportConnection;
    try {
      transport = await withTimeout(
        this.transport.open(server, { timeoutMs: connectTimeoutMs, clientId }),
        connectTimeoutMs,
        server.url,
        (late) => this.release(late, "connection", server.url),
      );
    } catch (err) {
      this.logger.error("connect failed", { url: server.url, error: errorMessage(err) });
      throw this.transportError(err, server.url);
    }

    const managed: ManagedConnection = {
      handle: { id: randomUUID(), key, protocol: this.protocol, url: server.url },
      transport,
      subscriptions: new Set(),
    };
    this.byId.set(managed.handle.id, managed);
    transport.onClose((err) => {
      void this.evict(managed, err).catch((e: unknown) => {
        this.logger.error("connection cleanup failed", { url: server.url, error: errorMessage(e) });
      });
    });
    this.logger.info("connected", { url: server.url });
    return managed;
  }

  /**
   * Forget a connection the broker dropped: the next connect() opens a new
   * one, and its subscriptions are closed.
   */
  private async evict(managed: ManagedConnection, err?: unknown): Promise<void> {
    const { handle } = managed;
    // Already disconnected or evicted
    if (this.byId.get(handle.id) !== managed) return;

    this.byId.delete(handle.id);
    this.connections.delete(handle.key);
    this.logger.warn("connection lost", { url: handle.url, error: err === undefined ? undefined : errorMessage(err) });

    for (const id of [...managed.subscriptions]) {
      await this.unsubscribe(id);
    }
    try {
      await managed.transport.close();
    } catch (closeErr) {
      this.logger.warn("disconnect failed", { url: handle.url, error: errorMessage(closeErr) });
    }
  }

  // A refused or reset socket means the cached connection is dead
  private failed(managed: ManagedConnection, err: unknown): GatewayError {
    const error = this.transportError(err, managed.handle.url);
    if (error instanceof TransportConnectionError && error.reason !== "other") {
      void this.evict(managed, err).catch((e: unknown) => {
        this.logger.error("connection cleanup failed", { url: managed.handle.url, error: errorMessage(e) });
      });
    }
    return error;
  }

  private release(late: TransportConnection | TransportSubscription, what: string, url: string) {
    this.logger.warn(`closing ${what} that completed after the timeout`, { url });
    void late.close().catch((err: unknown) => {
      this.logger.warn(`closing late ${what} failed`, { url, error: errorMessage(err) });
    });
  }

  private managed(connection: ConnectionHandle): ManagedConnection {
    const managed = this.byId.get(connection.id);
    if (!managed) {
      throw new TransportConnectionError(connection.url, "other", "connection is closed");
    }
    return managed;
  }

  private transportError(err: unknown, target: string): GatewayError {
    if (err instanceof GatewayError) return err;
    return new TransportConnectionError(target, classifyConnectionFailure(err), errorMessage(err), err);
  }
}
