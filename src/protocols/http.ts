/**
 * HTTP adapter. Any status code is a completed call; only transport
 * failures (timeout, refused, DNS, reset) raise.
 */

import { TransportConnectionError, TransportTimeoutError, classifyConnectionFailure, errorMessage } from "../errors.js";
import type { Logger, RequestTracker } from "../middleware.js";
import { getHeader } from "../request.js";
import type { ProtocolAdapterOptions, RequestResponseAdapter, WireRequest, WireResponse } from "../types.js";

const BODYLESS = new Set(["get", "head"]);

export class HttpAdapter implements RequestResponseAdapter {
  readonly kind = "request-response";
  readonly protocol = "http";

  private fetchImpl: typeof fetch;
  private tracker: RequestTracker;
  private logger: Logger;

  constructor(options: Pick<ProtocolAdapterOptions, "logger" | "tracker" | "fetch">) {
    this.fetchImpl = options.fetch ?? fetch;
    this.tracker = options.tracker;
    this.logger = options.logger.child({ protocol: "http" });
  }

  async execute(request: WireRequest): Promise<WireResponse> {
    const url = buildUrl(request);
    const ctx = this.tracker.start(request.timeoutMs, url);
    const method = request.operationKind.toUpperCase();

    const headers: Record<string, string> = { ...request.headers };
    const cookie = serializeCookies(request.cookies);
    if (cookie) {
      const existing = getHeader(headers, "cookie");
      headers.cookie = existing ? `${existing}; ${cookie}` : cookie;
    }

    const init: RequestInit = { method, headers, signal: ctx.abortController.signal };
    if (request.body !== undefined && !BODYLESS.has(request.operationKind)) {
      init.body = encodeBody(request.body, getHeader(headers, "content-type"));
    }

    this.logger.debug("request", { requestId: ctx.requestId, method, url });

    try {
      const res = await this.fetchImpl(url, init);
      const text = await res.text();
      const responseHeaders: Record<string, string> = {};
      res.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });
      return {
        status: res.status,
        statusText: res.statusText,
        headers: responseHeaders,
        body: decodeBody(text, res.headers.get("content-type")),
        url,
      };
    } catch (err) {
      const reason: unknown = ctx.abortController.signal.reason;
      if (ctx.abortController.signal.aborted && reason instanceof Error) throw reason;
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new TransportTimeoutError(url, request.timeoutMs);
      }
      throw new TransportConnectionError(url, classifyConnectionFailure(err), errorMessage(err), err);
    } finally {
      this.tracker.complete(ctx.requestId);
    }
  }

  async close(): Promise<void> {
    // fetch keeps no per-adapter connections
  }
}

export function buildUrl(request: WireRequest): string {
  const url = new URL(request.url);
  for (const [name, value] of Object.entries(request.query)) {
    for (const v of Array.isArray(value) ? value : [value]) url.searchParams.append(name, v);
  }
  return url.toString();
}

function serializeCookies(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${encodeURIComponent(value)}`)
    .join("; ");
}

function encodeBody(body: unknown, contentType: string | undefined): string | Uint8Array {
  if (typeof body === "string" || body instanceof Uint8Array) return body;
  if (contentType?.includes("application/x-www-form-urlencoded") && body && typeof body === "object") {
    const form = new URLSearchParams();
    for (const [k, v] of Object.entries(body)) form.append(k, typeof v === "string" ? v : JSON.stringify(v));
    return form.toString();
  }
  return JSON.stringify(body);
}

/** JSON when the content type says so (and it parses), raw text otherwise. */
export function decodeBody(text: string, contentType: string | null): unknown {
  if (!text) return text;
  if (contentType && /[/+]json\b/i.test(contentType)) {
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
  return text;
}
