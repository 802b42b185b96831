import { describe, it, expect, vi, afterEach } from "vitest";
import { RequestTracker, Logger, isLogLevel } from "../middleware.js";
import { GatewayError, TransportTimeoutError } from "../errors.js";

describe("RequestTracker", () => {
  it("tracks active requests", () => {
    const tracker = new RequestTracker();
    const ctx1 = tracker.start(5000, "http://a");
    const ctx2 = tracker.start(5000, "http://b");
    expect(tracker.activeCount).toBe(2);
    tracker.complete(ctx1.requestId);
    expect(tracker.activeCount).toBe(1);
    tracker.complete(ctx2.requestId);
    expect(tracker.activeCount).toBe(0);
    expect(ctx1.abortController.signal.aborted).toBe(false);
  });

  it("aborts with a timeout error once the deadline passes", async () => {
    const tracker = new RequestTracker();
    const ctx = tracker.start(50, "http://slow");
    expect(ctx.abortController.signal.aborted).toBe(false);
    await new Promise((r) => setTimeout(r, 100));
    expect(ctx.abortController.signal.aborted).toBe(true);
    const reason: unknown = ctx.abortController.signal.reason;
    expect(reason).toBeInstanceOf(TransportTimeoutError);
    expect(reason instanceof TransportTimeoutError && reason.kind).toBe("TransportTimeoutError");
    expect(tracker.activeCount).toBe(0);
  });

  it("drains active requests and refuses new ones", async () => {
    const tracker = new RequestTracker();
    const ctx = tracker.start(60000);
    tracker.start(60000);
    expect(tracker.activeCount).toBe(2);
    await tracker.drain(200);
    expect(tracker.activeCount).toBe(0);
    expect(tracker.isDraining).toBe(true);
    expect(ctx.abortController.signal.aborted).toBe(true);
    expect(() => tracker.start(1000)).toThrow(GatewayError);
  });
});

describe("Logger", () => {
  afterEach(() => vi.restoreAllMocks());

  it("writes one JSON line with bindings and metadata", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("debug").child({ component: "test" });
    logger.info("hello", { key: "value" });

    expect(spy).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "info", msg: "hello", component: "test", key: "value" });
  });

  it("drops lines below the configured level", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger("warn");
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    expect(err).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("logs failed calls as warnings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    new Logger("info").call({ endpointId: "e1", protocol: "http", status: "error", latencyMs: 3, error: "boom" });
    const line: unknown = JSON.parse(String(warn.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "warn", msg: "call", endpointId: "e1", error: "boom" });
  });

  it("recognizes log levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
