/**
 * Secret redaction for call logs and error payloads.
 *
 * Covers:
 * - credential headers (Authorization, Cookie, API-key headers)
 * - API-key query/cookie parameters named by a document's auth configs
 * - token and secret fields anywhere in JSON bodies
 */

import { isRecord } from "./spec.js";
import type { JsonObject, WireRequest } from "./types.js";

export const REDACTED = "[REDACTED]";

export const MAX_LOGGED_BODY = 10000;

/**
 * Bodies whose JSON text exceeds `limit` are replaced by a marker holding a
 * prefix of that text, so the logged entry stays parseable.
 */
export function clipForLog(value: unknown, limit = MAX_LOGGED_BODY): unknown {
  const text = typeof value === "string" ? value : JSON.stringify(value) ?? "";
  if (text.length <= limit) return value;
  return { truncated: true, length: text.length, preview: text.slice(0, limit) };
}

export const DEFAULT_SECRET_HEADERS = ["authorization", "proxy-authorization", "cookie", "set-cookie", "x-api-key"];
export const DEFAULT_SECRET_FIELDS = [
  "access_token",
  "refresh_token",
  "id_token",
  "client_secret",
  "code_verifier",
  "password",
  "token",
  "secret",
];

export interface RedactionConfig {
  headers: string[];
  fields: string[];
}

export class Redactor {
  private headers: Set<string>;
  private fields: Set<string>;

  constructor(config: Partial<RedactionConfig> = {}) {
    this.headers = lowerSet([...DEFAULT_SECRET_HEADERS, ...(config.headers ?? [])]);
    this.fields = lowerSet([...DEFAULT_SECRET_FIELDS, ...(config.fields ?? [])]);
  }

  /**
   * Copy of `headers` with credential values replaced. `extra` names
   * (e.g. an API-key header) are redacted too.
   */
  redactHeaders(headers: Record<string, string>, extra: string[] = []): Record<string, string> {
    const names = new Set([...this.headers, ...extra.map((n) => n.toLowerCase())]);
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      out[key] = names.has(key.toLowerCase()) ? REDACTED : value;
    }
    return out;
  }

  redactParams<V>(params: Record<string, V>, names: string[]): Record<string, V | string> {
    const secret = lowerSet([...names, ...this.fields]);
    const out: Record<string, V | string> = {};
    for (const [key, value] of Object.entries(params)) {
      out[key] = secret.has(key.toLowerCase()) ? REDACTED : value;
    }
    return out;
  }

  /**
   * Deep copy of a JSON-like value with secret fields replaced.
   */
  redactValue(value: unknown): unknown {
    if (Array.isArray(value)) return value.map((v) => this.redactValue(v));
    if (!isRecord(value)) return value;
    const out: JsonObject = {};
    for (const [key, v] of Object.entries(value)) {
      out[key] = this.fields.has(key.toLowerCase()) ? REDACTED : this.redactValue(v);
    }
    return out;
  }

  /**
   * Loggable view of a wire request. `secretNames` are the API-key names
   * configured for the request's document.
   */
  redactRequest(request: WireRequest, secretNames: string[] = []): JsonObject {
    return {
      protocol: request.protocol,
      operationKind: request.operationKind,
      url: request.url,
      address: request.address,
      headers: this.redactHeaders(request.headers, secretNames),
      query: this.redactParams(request.query, secretNames),
      channelParams: request.channelParams,
      cookies: this.redactParams(request.cookies, [...secretNames, ...Object.keys(request.cookies)]),
      body: clipForLog(this.redactValue(request.body)),
    };
  }
}

function lowerSet(names: string[]): Set<string> {
  return new Set(names.map((n) => n.toLowerCase()));
}
