/**
 * Turns an endpoint plus caller-supplied params/headers/body into a
 * concrete WireRequest, and matches concrete addresses back to patterns.
 */

import { InvalidConfigurationError, MissingRequiredParameterError, TypeMismatchError } from "./errors.js";
import { isRecord, stringField } from "./spec.js";
import type { AuthDispatcher } from "./auth.js";
import type { ApiDocument, Endpoint, JsonObject, Parameter, ServerTarget, WireRequest } from "./types.js";

export interface RequestBuilderOptions {
  userAgent: string;
  timeoutMs: number;
  auth?: AuthDispatcher;
}

export interface BuildContext {
  userId?: string;
}

type ParamValue = string | string[];

const TOKEN = /\{([^}]+)\}/g;

export class RequestBuilder {
  constructor(private options: RequestBuilderOptions) {}

  build(
    endpoint: Endpoint,
    document: ApiDocument,
    callerParams: Record<string, unknown> = {},
    callerHeaders: Record<string, string> = {},
    callerBody?: unknown,
    context: BuildContext = {},
  ): WireRequest {
    const isRest = endpoint.protocol === "http";
    const declared = new Map<string, Parameter>();
    for (const p of endpoint.parameters) declared.set(p.name, p);

    const remaining = new Map<string, unknown>();
    for (const [name, value] of Object.entries(callerParams)) {
      if (value !== undefined && value !== null) remaining.set(name, value);
    }

    // 1. Address substitution; substituted params are consumed
    const substituted = new Set<string>();
    const address = endpoint.addressPattern.replace(TOKEN, (_token, name: string) => {
      if (!remaining.has(name)) throw new MissingRequiredParameterError(name);
      const value = flatten(coerceParameter(name, remaining.get(name), declared.get(name)?.schema));
      remaining.delete(name);
      substituted.add(name);
      return isRest ? encodeURIComponent(value) : value;
    });

    // 2. Declared header and cookie params
    const headers: Record<string, string> = { ...callerHeaders };
    const cookies: Record<string, string> = {};

    for (const param of endpoint.parameters) {
      if (param.location === "header") {
        const key = findKey(remaining, param.name);
        if (key !== undefined) {
          setHeader(headers, param.name, flatten(coerceParameter(param.name, remaining.get(key), param.schema)));
          remaining.delete(key);
        } else if (getHeader(headers, param.name) === undefined && param.required) {
          throw new MissingRequiredParameterError(param.name);
        }
      } else if (param.location === "cookie") {
        if (remaining.has(param.name)) {
          cookies[param.name] = flatten(coerceParameter(param.name, remaining.get(param.name), param.schema));
          remaining.delete(param.name);
        } else if (param.required) {
          throw new MissingRequiredParameterError(param.name);
        }
      } else if (param.required && !substituted.has(param.name) && !remaining.has(param.name)) {
        throw new MissingRequiredParameterError(param.name);
      }
    }

    // 3. Leftovers become query (REST) or channel (pub/sub) params
    const query: Record<string, ParamValue> = {};
    const channelParams: Record<string, string> = {};
    for (const [name, value] of remaining) {
      const coerced = coerceParameter(name, value, declared.get(name)?.schema);
      if (isRest) query[name] = coerced;
      else channelParams[name] = flatten(coerced);
    }

    // 4. Defaults only fill gaps
    if (callerBody !== undefined && getHeader(headers, "content-type") === undefined) {
      const contentType = endpoint.requestSchema ? stringField(endpoint.requestSchema, "contentType") : undefined;
      setHeader(headers, "content-type", contentType ?? "application/json");
    }
    if (getHeader(headers, "user-agent") === undefined) {
      setHeader(headers, "user-agent", this.options.userAgent);
    }

    const request: WireRequest = {
      protocol: endpoint.protocol,
      operationKind: endpoint.operationKind,
      url: isRest ? joinUrl(document.baseAddress, address) : selectServer(document, endpoint.protocol).url,
      address,
      headers,
      query,
      channelParams,
      cookies,
      timeoutMs: this.options.timeoutMs,
    };
    if (callerBody !== undefined) request.body = callerBody;

    // 5. Auth last so defaults never overwrite credentials
    if (this.options.auth) {
      this.options.auth.apply(request, endpoint, context.userId);
    }

    return request;
  }
}

// ---- Coercion ----

/**
 * Check `value` against the declared schema type by attempting conversion.
 * Arrays come back as string[]; everything else as a string.
 */
export function coerceParameter(name: string, value: unknown, schema?: JsonObject): ParamValue {
  const type = schema ? stringField(schema, "type") : undefined;

  switch (type) {
    case "integer": {
      if (typeof value === "number" && Number.isInteger(value)) return String(value);
      if (typeof value === "string" && /^[-+]?\d+$/.test(value.trim())) return value.trim();
      throw new TypeMismatchError(name, "integer");
    }
    case "number": {
      if (typeof value === "number" && Number.isFinite(value)) return String(value);
      if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return value.trim();
      throw new TypeMismatchError(name, "number");
    }
    case "boolean": {
      if (typeof value === "boolean") return String(value);
      const text = typeof value === "string" || typeof value === "number" ? String(value).trim().toLowerCase() : "";
      if (text === "true" || text === "1") return "true";
      if (text === "false" || text === "0") return "false";
      throw new TypeMismatchError(name, "boolean");
    }
    case "array": {
      if (Array.isArray(value)) return value.map(scalarText);
      if (typeof value === "string") return value === "" ? [] : value.split(",").map((s) => s.trim());
      throw new TypeMismatchError(name, "array");
    }
    case "object": {
      if (isRecord(value)) return JSON.stringify(value);
      if (typeof value === "string") {
        try {
          const parsed: unknown = JSON.parse(value);
          if (isRecord(parsed)) return value;
        } catch {
          throw new TypeMismatchError(name, "object");
        }
      }
      throw new TypeMismatchError(name, "object");
    }
    default:
      return Array.isArray(value) ? value.map(scalarText) : scalarText(value);
  }
}

function scalarText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value);
}

function flatten(value: ParamValue): string {
  return Array.isArray(value) ? value.join(",") : value;
}

// ---- Headers ----

function findKey(map: Map<string, unknown>, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const key of map.keys()) {
    if (key.toLowerCase() === lower) return key;
  }
  return undefined;
}

export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

/** Set a header, replacing any existing spelling of the same name. */
export function setHeader(headers: Record<string, string>, name: string, value: string) {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) delete headers[key];
  }
  headers[name] = value;
}

// ---- Addresses ----

/**
 * Resolve `relative` against `base` per RFC 3986: a relative address that
 * starts with "/" replaces the base's path, otherwise it is resolved
 * against the base's last "/". Absolute addresses pass through.
 */
export function joinUrl(base: string, relative: string): string {
  if (/^[a-z][a-z\d+.-]*:\/\//i.test(relative)) return relative;
  if (!base) {
    throw new InvalidConfigurationError(`No base address to resolve "${relative}" against`);
  }
  try {
    return new URL(relative, base).toString();
  } catch {
    throw new InvalidConfigurationError(`Invalid base address "${base}"`, { baseAddress: base });
  }
}

export interface AddressMatcher {
  pattern: string;
  regex: RegExp;
  names: string[];
  literalLength: number;
  match(address: string): Record<string, string> | null;
}

/**
 * Compile `/pets/{petId}` into an anchored regex; each token matches one
 * non-empty segment.
 */
export function compileAddressPattern(pattern: string): AddressMatcher {
  const names: string[] = [];
  let source = "^";
  let literalLength = 0;
  let last = 0;

  for (const m of pattern.matchAll(TOKEN)) {
    const index = m.index ?? 0;
    const literal = pattern.slice(last, index);
    source += escapeRegex(literal) + "([^/]+)";
    literalLength += literal.length;
    names.push(m[1]);
    last = index + m[0].length;
  }
  const tail = pattern.slice(last);
  source += escapeRegex(tail) + "$";
  literalLength += tail.length;

  const regex = new RegExp(source);
  return {
    pattern,
    regex,
    names,
    literalLength,
    match(address: string) {
      const m = regex.exec(address);
      if (!m) return null;
      const params: Record<string, string> = {};
      names.forEach((name, i) => {
        params[name] = safeDecode(m[i + 1]);
      });
      return params;
    },
  };
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

// ---- Pub/sub servers ----

/** Server `protocol` / URL scheme → adapter protocol. */
export const SCHEME_PROTOCOLS: Record<string, string> = {
  ws: "websocket",
  wss: "websocket",
  websocket: "websocket",
  mqtt: "mqtt",
  mqtts: "mqtt",
  amqp: "amqp",
  amqps: "amqp",
  kafka: "kafka",
  "kafka-secure": "kafka",
  nats: "nats",
  "nats-secure": "nats",
};

const URL_SCHEMES: Record<string, string> = {
  websocket: "ws",
  "kafka-secure": "kafka",
  "nats-secure": "tls",
};

/**
 * First document server speaking `protocol`, falling back to the base address.
 */
export function selectServer(document: ApiDocument, protocol: string): ServerTarget {
  for (const server of document.servers) {
    const declared = (server.protocol ?? schemeOf(server.url) ?? "").toLowerCase();
    if (SCHEME_PROTOCOLS[declared] === protocol) {
      return { protocol, url: withScheme(server.url, declared), name: server.name };
    }
  }
  if (document.baseAddress) {
    return { protocol, url: withScheme(document.baseAddress, protocol) };
  }
  throw new InvalidConfigurationError(`Document "${document.name}" declares no server for protocol "${protocol}"`, {
    protocol,
  });
}

function schemeOf(url: string): string | undefined {
  return /^([a-z][a-z\d+.-]*):\/\//i.exec(url)?.[1];
}

function withScheme(url: string, declared: string): string {
  if (schemeOf(url)) return url;
  return `${URL_SCHEMES[declared] ?? declared}://${url}`;
}
