import { describe, it, expect, vi, afterEach } from "vitest";
import {
  MessageQueue,
  PubSubAdapter,
  connectionKey,
  decodeInbound,
  isEnvelope,
  withTimeout,
} from "../protocols/pubsub.js";
import type { PubSubTransport, RawMessage, TransportConnection, TransportSubscription } from "../protocols/pubsub.js";
import { Logger } from "../middleware.js";
import { TransportConnectionError, TransportTimeoutError } from "../errors.js";
import type { InboundMessage, ServerTarget } from "../types.js";

/** In-process broker: one shared topic table, every connection sees every publish. */
class FakeBroker implements PubSubTransport {
  readonly protocol = "fake";
  opened = 0;
  events: string[] = [];
  failNext = false;
  resetPublishes = false;
  openDelayMs = 0;
  subscribeDelayMs = 0;
  targets: ServerTarget[] = [];
  published: { channel: string; data: string }[] = [];
  private listeners = new Map<string, Set<(data: RawMessage) => void>>();
  private dropListeners: ((err?: Error) => void)[] = [];

  async open(server: ServerTarget): Promise<TransportConnection> {
    if (this.failNext) {
      this.failNext = false;
      throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    }
    if (this.openDelayMs) await sleep(this.openDelayMs);
    this.opened++;
    this.targets.push(server);
    const broker = this;
    return {
      async publish(channel: string, data: string) {
        if (broker.resetPublishes) throw Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" });
        broker.published.push({ channel, data });
        for (const listener of broker.listeners.get(channel) ?? []) listener(data);
      },
      async subscribe(channel: string, onMessage: (data: RawMessage) => void): Promise<TransportSubscription> {
        if (broker.subscribeDelayMs) await sleep(broker.subscribeDelayMs);
        const set = broker.listeners.get(channel) ?? new Set<(data: RawMessage) => void>();
        set.add(onMessage);
        broker.listeners.set(channel, set);
        return {
          async close() {
            set.delete(onMessage);
            broker.events.push(`unsubscribe ${channel}`);
          },
        };
      },
      onClose(listener: (err?: Error) => void) {
        broker.dropListeners.push(listener);
      },
      async close() {
        broker.events.push(`close ${server.url}`);
      },
    };
  }

  deliver(channel: string, data: RawMessage) {
    for (const listener of this.listeners.get(channel) ?? []) listener(data);
  }

  /** Report every open connection lost, as a client library would. */
  drop(err: Error) {
    const listeners = this.dropListeners;
    this.dropListeners = [];
    for (const listener of listeners) listener(err);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const server: ServerTarget = { protocol: "fake", url: "fake://broker:1" };

function setup(connectTimeoutMs = 500) {
  const broker = new FakeBroker();
  const logger = new Logger("error");
  const adapter = new PubSubAdapter(broker, { logger, connectTimeoutMs, clientId: "test" });
  return { broker, adapter, logger };
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("PubSubAdapter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reuses one connection per protocol and URL", async () => {
    const { broker, adapter } = setup();
    const [a, b] = await Promise.all([adapter.connect(server), adapter.connect(server)]);
    expect(a.id).toBe(b.id);
    expect(a.key).toBe("fake|fake://broker:1");
    expect(broker.opened).toBe(1);

    await adapter.connect({ protocol: "fake", url: "fake://broker:2" });
    expect(broker.opened).toBe(2);
  });

  it("does not cache a failed connect", async () => {
    const { broker, adapter } = setup();
    broker.failNext = true;
    const err: unknown = await adapter.connect(server).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportConnectionError);
    expect(err instanceof TransportConnectionError && err.reason).toBe("refused");

    await nextTick();
    await adapter.connect(server);
    expect(broker.opened).toBe(1);
  });

  it("publishes an envelope and returns it", async () => {
    const { broker, adapter } = setup();
    const conn = await adapter.connect(server);
    const envelope = await adapter.publish(conn, "orders", { payload: { id: 1 }, headers: { source: "test" } });

    expect(envelope).toMatchObject({ channel: "orders", operation: "publish", headers: { source: "test" }, payload: { id: 1 } });
    expect(broker.published).toHaveLength(1);
    expect(JSON.parse(broker.published[0].data)).toEqual(envelope);
  });

  it("dispatches inbound messages to the handler off the receive path", async () => {
    const { broker, adapter } = setup();
    const conn = await adapter.connect(server);
    const received: InboundMessage[] = [];
    await adapter.subscribe(conn, "orders", (m) => {
      received.push(m);
    });

    broker.deliver("orders", '{"plain":true}');
    expect(received).toHaveLength(0);
    await nextTick();
    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ channel: "orders", payload: { plain: true } });

    const envelope = await adapter.publish(conn, "orders", { payload: "hello", headers: {} });
    await nextTick();
    expect(received[1].payload).toBe("hello");
    expect(received[1].envelope?.id).toBe(envelope.id);
  });

  it("logs handler failures and keeps delivering", async () => {
    const { broker, adapter } = setup();
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const conn = await adapter.connect(server);
    const seen: unknown[] = [];
    const sub = await adapter.subscribe(conn, "orders", (m) => {
      if (m.payload === "bad") throw new Error("handler broke");
      seen.push(m.payload);
    });

    broker.deliver("orders", "bad");
    broker.deliver("orders", "good");
    await nextTick();
    await nextTick();

    expect(seen).toEqual(["good"]);
    expect(errors).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(errors.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: "error", msg: "message handler failed", subscriptionId: sub.id, channel: "orders", error: "handler broke",
    });
  });

  it("tears down subscriptions before the connection", async () => {
    const { broker, adapter } = setup();
    const conn = await adapter.connect(server);
    await adapter.subscribe(conn, "a", () => undefined);
    await adapter.subscribe(conn, "b", () => undefined);
    expect(adapter.listSubscriptions().map((s) => s.channel)).toEqual(["a", "b"]);

    await adapter.disconnect(conn);
    expect(broker.events).toEqual(["unsubscribe a", "unsubscribe b", "close fake://broker:1"]);
    expect(adapter.listSubscriptions()).toEqual([]);
    expect(adapter.listConnections()).toEqual([]);

    await expect(adapter.publish(conn, "a", { payload: 1, headers: {} })).rejects.toThrow("connection is closed");
    await adapter.connect(server);
    expect(broker.opened).toBe(2);
  });

  it("stops delivery after unsubscribe", async () => {
    const { broker, adapter } = setup();
    const conn = await adapter.connect(server);
    const seen: unknown[] = [];
    const sub = await adapter.subscribe(conn, "orders", (m) => {
      seen.push(m.payload);
    });
    await adapter.unsubscribe(sub.id);
    await adapter.unsubscribe(sub.id);

    broker.deliver("orders", "late");
    await nextTick();
    expect(seen).toEqual([]);
    expect(broker.events).toEqual(["unsubscribe orders"]);
  });

  it("reopens a connection the broker dropped", async () => {
    const { broker, adapter } = setup();
    const first = await adapter.connect(server);
    await adapter.subscribe(first, "orders", () => undefined);

    broker.drop(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }));
    await vi.waitFor(() => expect(broker.events).toEqual(["unsubscribe orders", "close fake://broker:1"]));
    expect(adapter.listSubscriptions()).toEqual([]);
    expect(adapter.listConnections()).toEqual([]);

    const second = await adapter.connect(server);
    expect(second.id).not.toBe(first.id);
    expect(broker.opened).toBe(2);
    await adapter.publish(second, "orders", { payload: 1, headers: {} });
    expect(broker.published).toHaveLength(1);
  });

  it("forgets a connection whose publish was reset", async () => {
    const { broker, adapter } = setup();
    const first = await adapter.connect(server);
    broker.resetPublishes = true;

    const err: unknown = await adapter.publish(first, "orders", { payload: 1, headers: {} }).catch((e: unknown) => e);
    expect(err instanceof TransportConnectionError && err.reason).toBe("reset");

    broker.resetPublishes = false;
    const second = await adapter.connect(server);
    expect(broker.opened).toBe(2);
    await adapter.publish(second, "orders", { payload: 2, headers: {} });
    expect(broker.published).toHaveLength(1);
    expect(JSON.parse(broker.published[0].data)).toMatchObject({ payload: 2 });
  });

  it("closes a connection that opens after the timeout", async () => {
    const { broker, adapter } = setup(20);
    broker.openDelayMs = 60;
    await expect(adapter.connect(server)).rejects.toThrow(new TransportTimeoutError("fake://broker:1", 20));
    await vi.waitFor(() => expect(broker.events).toEqual(["close fake://broker:1"]));
    expect(adapter.listConnections()).toEqual([]);
  });

  it("closes a subscription that completes after the timeout", async () => {
    const { broker, adapter } = setup(20);
    const conn = await adapter.connect(server);
    broker.subscribeDelayMs = 60;
    await expect(adapter.subscribe(conn, "orders", () => undefined)).rejects.toThrow(TransportTimeoutError);
    await vi.waitFor(() => expect(broker.events).toEqual(["unsubscribe orders"]));
    expect(adapter.listSubscriptions()).toEqual([]);
  });

  it("opens separate connections per credential set", async () => {
    const { broker, adapter } = setup();
    const alice = await adapter.connect({ ...server, credentials: { username: "alice", password: "test-password" } });
    const again = await adapter.connect({ ...server, credentials: { username: "alice", password: "test-password" } });
    const token = await adapter.connect({ ...server, credentials: { token: "test-token" } });

    expect(again.id).toBe(alice.id);
    expect(token.id).not.toBe(alice.id);
    expect(broker.targets.map((t) => t.credentials)).toEqual([
      { username: "alice", password: "test-password" },
      { token: "test-token" },
    ]);
  });

  it("closes every connection", async () => {
    const { broker, adapter } = setup();
    await adapter.connect(server);
    await adapter.connect({ protocol: "fake", url: "fake://broker:2" });
    await adapter.close();
    expect(broker.events).toEqual(["close fake://broker:1", "close fake://broker:2"]);
  });
});

describe("helpers", () => {
  it("keys connections by protocol and URL", () => {
    expect(connectionKey({ protocol: "mqtt", url: "mqtt://h:1883" })).toBe("mqtt|mqtt://h:1883");
  });

  it("adds a credential fingerprint without the secret itself", () => {
    const key = connectionKey({ protocol: "mqtt", url: "mqtt://h:1883", credentials: { token: "test-token" } });
    expect(key).toMatch(/^mqtt\|mqtt:\/\/h:1883\|[0-9a-f]{16}$/);
    expect(key).not.toContain("test-token");
  });

  it("hands a value that arrives after the timeout to onLate", async () => {
    const late: number[] = [];
    const slow = new Promise<number>((resolve) => setTimeout(() => resolve(7), 40));
    await expect(withTimeout(slow, 10, "fake://slow", (v) => late.push(v))).rejects.toThrow(TransportTimeoutError);
    await vi.waitFor(() => expect(late).toEqual([7]));

    const onTime: number[] = [];
    await withTimeout(Promise.resolve(1), 20, "fake://fast", (v) => onTime.push(v));
    await nextTick();
    expect(onTime).toEqual([]);
  });

  it("decodes inbound frames", () => {
    expect(decodeInbound("c", "not json")).toMatchObject({ channel: "c", payload: "not json", raw: "not json" });
    expect(decodeInbound("c", Buffer.from("[1,2]")).payload).toEqual([1, 2]);
    const envelope = { id: "m1", timestamp: "2026-01-01T00:00:00.000Z", channel: "c", operation: "publish", headers: {}, payload: 5 };
    const decoded = decodeInbound("c", JSON.stringify(envelope));
    expect(decoded.payload).toBe(5);
    expect(decoded.envelope).toEqual(envelope);
    expect(isEnvelope({ id: "x" })).toBe(false);
  });

  it("times out slow operations", async () => {
    const never = new Promise<never>(() => undefined);
    await expect(withTimeout(never, 20, "fake://slow")).rejects.toThrow(new TransportTimeoutError("fake://slow", 20));
    await expect(withTimeout(Promise.resolve(3), 20, "fake://fast")).resolves.toBe(3);
  });
});

describe("MessageQueue", () => {
  it("processes items in order, one at a time", async () => {
    const order: string[] = [];
    const queue = new MessageQueue<number>(async (n) => {
      order.push(`start ${n}`);
      await nextTick();
      order.push(`end ${n}`);
    }, () => undefined);

    queue.push(1);
    queue.push(2);
    expect(queue.size).toBe(2);
    for (let i = 0; i < 5; i++) await nextTick();
    expect(order).toEqual(["start 1", "end 1", "start 2", "end 2"]);
  });

  it("drops items after close", async () => {
    const seen: number[] = [];
    const queue = new MessageQueue<number>((n) => {
      seen.push(n);
    }, () => undefined);
    queue.push(1);
    queue.close();
    queue.push(2);
    await nextTick();
    expect(seen).toEqual([]);
    expect(queue.size).toBe(0);
  });
});
