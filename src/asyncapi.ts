/**
 * Pub/sub spec family: AsyncAPI 2.x documents.
 */

import { InvalidSpecificationError } from "./errors.js";
import { parseSecurity, stringList } from "./openapi.js";
import { applyServerVariables, isRecord, recordField, stringField } from "./spec.js";
import type {
  ChannelOperation,
  EndpointDefinition,
  JsonObject,
  Parameter,
  SecurityRequirement,
  ServerInfo,
  SpecModel,
  SpecParser,
} from "./types.js";

/** Binding key → adapter protocol, in lookup order. */
export const BINDING_PROTOCOLS: ReadonlyArray<[binding: string, protocol: string]> = [
  ["websockets", "websocket"],
  ["mqtt", "mqtt"],
  ["amqp", "amqp"],
  ["kafka", "kafka"],
  ["nats", "nats"],
];

const OPERATIONS: readonly ChannelOperation[] = ["publish", "subscribe"];

export class AsyncApiSpec implements SpecModel {
  readonly family = "pubsub";

  static detect(document: JsonObject): boolean {
    return typeof document.asyncapi === "string";
  }

  constructor(readonly document: JsonObject) {}

  validate(): void {
    const marker = this.document.asyncapi;
    if (typeof marker !== "string") {
      throw new InvalidSpecificationError("asyncapi", "missing version marker");
    }
    if (!/^2\.\d+(\.\d+)?/.test(marker)) {
      throw new InvalidSpecificationError("asyncapi", `unsupported version "${marker}" (expected 2.x)`);
    }
    const info = this.document.info;
    if (!isRecord(info)) {
      throw new InvalidSpecificationError("info", "missing or not an object");
    }
    if (typeof info.title !== "string" || !info.title.trim()) {
      throw new InvalidSpecificationError("info.title", "missing or empty");
    }
    if (!isRecord(this.document.channels)) {
      throw new InvalidSpecificationError("channels", "missing or not an object");
    }
  }

  title(): string {
    const info = recordField(this.document, "info");
    return (info && stringField(info, "title")) ?? "";
  }

  version(): string {
    const info = recordField(this.document, "info");
    return (info && stringField(info, "version")) ?? "1.0.0";
  }

  // AsyncAPI 2 declares servers as a map keyed by name
  servers(): ServerInfo[] {
    const out: ServerInfo[] = [];
    for (const [name, s] of Object.entries(recordField(this.document, "servers") ?? {})) {
      if (!isRecord(s) || typeof s.url !== "string") continue;
      out.push({
        name,
        url: applyServerVariables(s.url, recordField(s, "variables")),
        protocol: stringField(s, "protocol"),
        description: stringField(s, "description"),
      });
    }
    return out;
  }

  securitySchemes(): Record<string, JsonObject> {
    const schemes = recordField(recordField(this.document, "components") ?? {}, "securitySchemes") ?? {};
    const out: Record<string, JsonObject> = {};
    for (const [name, scheme] of Object.entries(schemes)) {
      if (isRecord(scheme)) out[name] = scheme;
    }
    return out;
  }

  channels(): Record<string, JsonObject> {
    const out: Record<string, JsonObject> = {};
    for (const [name, channel] of Object.entries(recordField(this.document, "channels") ?? {})) {
      if (isRecord(channel)) out[name] = channel;
    }
    return out;
  }

  /** Union of the security requirements declared on servers. */
  serverSecurity(): SecurityRequirement[] {
    const schemes = this.securitySchemes();
    const seen = new Map<string, SecurityRequirement>();
    for (const s of Object.values(recordField(this.document, "servers") ?? {})) {
      if (!isRecord(s)) continue;
      for (const req of parseSecurity(s.security, schemes)) {
        if (!seen.has(req.scheme)) seen.set(req.scheme, req);
      }
    }
    return [...seen.values()];
  }
}

export class AsyncApiParser implements SpecParser {
  extractEndpoints(model: SpecModel): EndpointDefinition[] {
    if (!(model instanceof AsyncApiSpec)) {
      throw new InvalidSpecificationError("asyncapi", "pub/sub parser received a non-AsyncAPI model");
    }

    const security = model.serverSecurity();
    const endpoints: EndpointDefinition[] = [];

    for (const [name, channel] of Object.entries(model.channels())) {
      const parameters = channelParameters(channel);

      for (const kind of OPERATIONS) {
        const operation = channel[kind];
        if (!isRecord(operation)) continue;

        const message = messageSchema(operation.message);
        endpoints.push({
          addressPattern: name,
          protocol: bindingProtocol(channel, operation),
          operationKind: kind,
          operationId: stringField(operation, "operationId"),
          description:
            stringField(operation, "summary") ??
            stringField(operation, "description") ??
            stringField(channel, "description") ??
            "",
          parameters,
          requestSchema: kind === "publish" ? message : undefined,
          responseSchema: kind === "subscribe" ? message : undefined,
          securityRequirements: security,
          tags: tagNames(operation.tags),
        });
      }
    }

    return endpoints;
  }
}

/**
 * Protocol from channel bindings, then operation bindings; "unknown" when neither declares one.
 */
export function bindingProtocol(channel: JsonObject, operation?: JsonObject): string {
  for (const source of [recordField(channel, "bindings"), operation && recordField(operation, "bindings")]) {
    if (!source) continue;
    for (const [binding, protocol] of BINDING_PROTOCOLS) {
      if (binding in source) return protocol;
    }
  }
  return "unknown";
}

function channelParameters(channel: JsonObject): Parameter[] {
  const out: Parameter[] = [];
  for (const [name, p] of Object.entries(recordField(channel, "parameters") ?? {})) {
    if (!isRecord(p)) continue;
    out.push({
      name,
      location: "channel",
      required: true,
      schema: recordField(p, "schema"),
      description: stringField(p, "description"),
    });
  }
  return out;
}

function messageSchema(message: unknown): JsonObject | undefined {
  if (!isRecord(message)) return undefined;
  const oneOf = message.oneOf;
  if (Array.isArray(oneOf)) {
    return { oneOf: oneOf.filter(isRecord).map(summarizeMessage) };
  }
  return summarizeMessage(message);
}

function summarizeMessage(message: JsonObject): JsonObject {
  return {
    name: stringField(message, "name"),
    contentType: stringField(message, "contentType") ?? "application/json",
    payload: message.payload ?? {},
    headers: message.headers ?? {},
  };
}

function tagNames(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const names = value.map((t) => (isRecord(t) ? t.name : t));
  return stringList(names);
}
