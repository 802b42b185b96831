/**
 * Call middleware: outbound timeout enforcement, in-flight tracking for
 * graceful shutdown, and structured logging.
 */

import { randomUUID } from "crypto";
import { TransportTimeoutError, GatewayError } from "./errors.js";
import type { LogLevel } from "./types.js";

export interface CallContext {
  requestId: string;
  startTime: number;
  target: string;
  timeoutMs: number;
  abortController: AbortController;
}

interface TrackedCall {
  ctx: CallContext;
  timer: NodeJS.Timeout;
}

export class RequestTracker {
  private active = new Map<string, TrackedCall>();
  private draining = false;

  /**
   * Start tracking an outbound call. The signal aborts with a
   * TransportTimeoutError once `timeoutMs` elapses.
   */
  start(timeoutMs = 30000, target = "unknown"): CallContext {
    if (this.draining) {
      throw new GatewayError("InternalError", "Gateway is shutting down");
    }

    const ctx: CallContext = {
      requestId: randomUUID(),
      startTime: Date.now(),
      target,
      timeoutMs,
      abortController: new AbortController(),
    };

    const timer = setTimeout(() => {
      this.active.delete(ctx.requestId);
      ctx.abortController.abort(new TransportTimeoutError(target, timeoutMs));
    }, timeoutMs);

    this.active.set(ctx.requestId, { ctx, timer });
    return ctx;
  }

  /**
   * Mark a call as complete. Clears the timer; the signal stays un-aborted.
   */
  complete(requestId: string) {
    const tracked = this.active.get(requestId);
    if (tracked) {
      clearTimeout(tracked.timer);
      this.active.delete(requestId);
    }
  }

  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Start draining: refuse new calls, wait for active ones, abort the rest.
   */
  async drain(maxWaitMs = 30000): Promise<void> {
    this.draining = true;
    const start = Date.now();

    while (this.active.size > 0 && Date.now() - start < maxWaitMs) {
      await new Promise((r) => setTimeout(r, 50));
    }

    for (const { ctx, timer } of this.active.values()) {
      clearTimeout(timer);
      ctx.abortController.abort(new GatewayError("InternalError", "Gateway shut down before the call completed"));
    }
    this.active.clear();
  }

  get isDraining(): boolean {
    return this.draining;
  }
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((l) => l === value);
}

export type LogMeta = Record<string, unknown>;

/**
 * Structured JSON logger for gateway events.
 */
export class Logger {
  constructor(
    private level: LogLevel = "info",
    private bindings: LogMeta = {},
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, msg: string, meta?: LogMeta) {
    if (!this.shouldLog(level)) return;
    const entry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...this.bindings,
      ...meta,
    };
    // stdout carries the MCP stdio stream, so every level goes to stderr
    const fn = level === "warn" ? console.warn : console.error;
    fn(JSON.stringify(entry));
  }

  debug(msg: string, meta?: LogMeta) { this.log("debug", msg, meta); }
  info(msg: string, meta?: LogMeta) { this.log("info", msg, meta); }
  warn(msg: string, meta?: LogMeta) { this.log("warn", msg, meta); }
  error(msg: string, meta?: LogMeta) { this.log("error", msg, meta); }

  /**
   * Logger that stamps `bindings` on every line.
   */
  child(bindings: LogMeta): Logger {
    return new Logger(this.level, { ...this.bindings, ...bindings });
  }

  /**
   * Log a completed endpoint call.
   */
  call(entry: { endpointId: string; protocol: string; status: string; latencyMs: number; statusCode?: number; error?: string }) {
    if (entry.status === "error") {
      this.warn("call", entry);
    } else {
      this.info("call", entry);
    }
  }
}
