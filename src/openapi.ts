/**
 * REST spec family: OpenAPI 3.x documents.
 */

import { InvalidSpecificationError } from "./errors.js";
import { applyServerVariables, isRecord, recordField, stringField } from "./spec.js";
import type {
  EndpointDefinition,
  HttpMethod,
  JsonObject,
  Parameter,
  ParameterLocation,
  SecurityRequirement,
  ServerInfo,
  SpecModel,
  SpecParser,
} from "./types.js";

export const HTTP_METHODS: readonly HttpMethod[] = ["get", "post", "put", "delete", "patch", "head", "options", "trace"];

const PARAM_LOCATIONS: readonly ParameterLocation[] = ["path", "query", "header", "cookie"];

export class OpenApiSpec implements SpecModel {
  readonly family = "rest";

  static detect(document: JsonObject): boolean {
    return typeof document.openapi === "string";
  }

  constructor(readonly document: JsonObject) {}

  validate(): void {
    const marker = this.document.openapi;
    if (typeof marker !== "string") {
      throw new InvalidSpecificationError("openapi", "missing version marker");
    }
    if (!/^3\.\d+(\.\d+)?/.test(marker)) {
      throw new InvalidSpecificationError("openapi", `unsupported version "${marker}" (expected 3.x)`);
    }
    const info = this.document.info;
    if (!isRecord(info)) {
      throw new InvalidSpecificationError("info", "missing or not an object");
    }
    if (typeof info.title !== "string" || !info.title.trim()) {
      throw new InvalidSpecificationError("info.title", "missing or empty");
    }
    if (!isRecord(this.document.paths)) {
      throw new InvalidSpecificationError("paths", "missing or not an object");
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

  servers(): ServerInfo[] {
    const servers = this.document.servers;
    if (!Array.isArray(servers)) return [];
    const out: ServerInfo[] = [];
    for (const s of servers) {
      if (!isRecord(s) || typeof s.url !== "string") continue;
      out.push({
        url: applyServerVariables(s.url, recordField(s, "variables")),
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

  paths(): Record<string, JsonObject> {
    const out: Record<string, JsonObject> = {};
    for (const [path, item] of Object.entries(recordField(this.document, "paths") ?? {})) {
      if (isRecord(item)) out[path] = item;
    }
    return out;
  }

  globalSecurity(): unknown {
    return this.document.security;
  }
}

export class OpenApiParser implements SpecParser {
  extractEndpoints(model: SpecModel): EndpointDefinition[] {
    if (!(model instanceof OpenApiSpec)) {
      throw new InvalidSpecificationError("openapi", "REST parser received a non-OpenAPI model");
    }

    const schemes = model.securitySchemes();
    const endpoints: EndpointDefinition[] = [];

    for (const [path, item] of Object.entries(model.paths())) {
      const pathParams = parseParameters(item.parameters);

      for (const method of HTTP_METHODS) {
        const operation = item[method];
        if (!isRecord(operation)) continue;

        // Operation-level parameters override path-level ones by name
        const merged = new Map<string, Parameter>();
        for (const p of pathParams) merged.set(p.name, p);
        for (const p of parseParameters(operation.parameters)) merged.set(p.name, p);

        const security = operation.security !== undefined ? operation.security : model.globalSecurity();

        endpoints.push({
          addressPattern: path,
          protocol: "http",
          operationKind: method,
          operationId: stringField(operation, "operationId"),
          description: stringField(operation, "summary") ?? stringField(operation, "description") ?? "",
          parameters: [...merged.values()],
          requestSchema: requestSchema(operation),
          responseSchema: responseSchema(operation),
          securityRequirements: parseSecurity(security, schemes),
          tags: stringList(operation.tags),
        });
      }
    }

    return endpoints;
  }
}

function parseParameters(value: unknown): Parameter[] {
  if (!Array.isArray(value)) return [];
  const out: Parameter[] = [];
  for (const p of value) {
    if (!isRecord(p) || typeof p.name !== "string") continue;
    const location = PARAM_LOCATIONS.find((l) => l === p.in);
    if (!location) continue;
    out.push({
      name: p.name,
      location,
      required: p.required === true || location === "path",
      schema: recordField(p, "schema"),
      description: stringField(p, "description"),
    });
  }
  return out;
}

function requestSchema(operation: JsonObject): JsonObject | undefined {
  const body = recordField(operation, "requestBody");
  if (!body) return undefined;
  const content = recordField(body, "content") ?? {};
  const [contentType] = Object.keys(content);
  const media = contentType ? recordField(content, contentType) : undefined;
  return {
    required: body.required === true,
    contentType: contentType ?? "application/json",
    schema: media?.schema ?? {},
  };
}

function responseSchema(operation: JsonObject): JsonObject | undefined {
  const responses = recordField(operation, "responses");
  if (!responses) return undefined;
  const out: JsonObject = {};
  for (const [status, response] of Object.entries(responses)) {
    if (!isRecord(response)) continue;
    const content = recordField(response, "content") ?? {};
    const [contentType] = Object.keys(content);
    const media = contentType ? recordField(content, contentType) : undefined;
    out[status] = {
      description: stringField(response, "description") ?? "",
      ...(contentType ? { contentType, schema: media?.schema ?? {} } : {}),
    };
  }
  return out;
}

/**
 * Flatten `[{ schemeName: [scopes] }, ...]` into one entry per scheme.
 */
export function parseSecurity(value: unknown, schemes: Record<string, JsonObject>): SecurityRequirement[] {
  if (!Array.isArray(value)) return [];
  const out: SecurityRequirement[] = [];
  for (const requirement of value) {
    if (!isRecord(requirement)) continue;
    for (const [scheme, scopes] of Object.entries(requirement)) {
      out.push({ scheme, type: stringField(schemes[scheme] ?? {}, "type"), scopes: stringList(scopes) });
    }
  }
  return out;
}

export function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}
