/**
 * Raw document handling shared by every spec family.
 */

import { parse as parseYaml } from "yaml";
import { InvalidSpecificationError, errorMessage } from "./errors.js";
import type { JsonObject } from "./types.js";

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringField(obj: JsonObject, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" ? v : undefined;
}

export function recordField(obj: JsonObject, key: string): JsonObject | undefined {
  const v = obj[key];
  return isRecord(v) ? v : undefined;
}

/**
 * Parse JSON or YAML spec content into a plain object tree.
 * Already-parsed objects are deep-copied so callers can't mutate stored input.
 */
export function parseDocument(raw: string | JsonObject): JsonObject {
  if (typeof raw !== "string") return structuredClone(raw);

  const text = raw.trim();
  if (!text) throw new InvalidSpecificationError("<document>", "empty content");

  let parsed: unknown;
  try {
    parsed = text.startsWith("{") || text.startsWith("[") ? JSON.parse(text) : parseYaml(text);
  } catch (err) {
    throw new InvalidSpecificationError("<document>", `not valid JSON or YAML (${errorMessage(err)})`);
  }

  if (!isRecord(parsed)) {
    throw new InvalidSpecificationError("<document>", "top level must be an object");
  }
  return parsed;
}

/** Canonical text form persisted as a Specification's raw content. */
export function serializeRaw(raw: string | JsonObject): string {
  return typeof raw === "string" ? raw : JSON.stringify(raw);
}

/**
 * Fill `{var}` tokens in a server URL from its declared variable defaults.
 */
export function applyServerVariables(url: string, variables: JsonObject | undefined): string {
  if (!variables) return url;
  return url.replace(/\{([^}]+)\}/g, (token, name: string) => {
    const v = variables[name];
    if (isRecord(v) && v.default !== undefined) return String(v.default);
    return token;
  });
}
