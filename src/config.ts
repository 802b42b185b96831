/**
 * Config loader. Looks for gateway.yaml / .yml / .json (or an explicit
 * path) and merges it over the defaults section by section.
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { InvalidConfigurationError, errorMessage } from "./errors.js";
import { isLogLevel } from "./middleware.js";
import { isRecord } from "./spec.js";
import type { GatewayConfig, JsonObject } from "./types.js";

export const VERSION = "0.1.0";

export const DEFAULT_CONFIG: GatewayConfig = {
  storage: { path: "./gateway.db" },
  http: { timeoutMs: 30000, userAgent: `dynamic-api-gateway/${VERSION}` },
  pubsub: { connectTimeoutMs: 30000, clientId: "api-gateway" },
  oauth: { stateTtlMinutes: 10, tokenTimeoutMs: 30000 },
  logging: { level: "info" },
  redaction: { headers: [], fields: [] },
};

export function loadConfig(customPath?: string): { config: GatewayConfig; path: string | null } {
  const paths = [
    customPath,
    process.env.API_GATEWAY_CONFIG,
    "./gateway.yaml",
    "./gateway.yml",
    "./gateway.json",
  ].filter((p): p is string => Boolean(p));

  for (const p of paths) {
    if (existsSync(p)) {
      const raw = readFileSync(p, "utf-8");
      let parsed: unknown;
      try {
        parsed = p.endsWith(".json") ? JSON.parse(raw) : parseYaml(raw);
      } catch (err) {
        throw new InvalidConfigurationError(`Cannot parse ${p}: ${errorMessage(err)}`);
      }
      return { config: mergeConfig(isRecord(parsed) ? parsed : {}), path: p };
    }
  }

  return { config: mergeConfig({}), path: null };
}

/**
 * Overlay a partial config file onto DEFAULT_CONFIG. Unknown keys are ignored.
 */
export function mergeConfig(overrides: JsonObject): GatewayConfig {
  const section = (name: string): JsonObject => {
    const v = overrides[name];
    return isRecord(v) ? v : {};
  };
  const storage = section("storage");
  const http = section("http");
  const pubsub = section("pubsub");
  const oauth = section("oauth");
  const logging = section("logging");
  const redaction = section("redaction");
  const d = DEFAULT_CONFIG;

  return {
    storage: { path: str(storage.path, d.storage.path) },
    http: {
      timeoutMs: num(http.timeoutMs, d.http.timeoutMs),
      userAgent: str(http.userAgent, d.http.userAgent),
    },
    pubsub: {
      connectTimeoutMs: num(pubsub.connectTimeoutMs, d.pubsub.connectTimeoutMs),
      clientId: str(pubsub.clientId, d.pubsub.clientId),
    },
    oauth: {
      stateTtlMinutes: num(oauth.stateTtlMinutes, d.oauth.stateTtlMinutes),
      tokenTimeoutMs: num(oauth.tokenTimeoutMs, d.oauth.tokenTimeoutMs),
    },
    logging: { level: isLogLevel(logging.level) ? logging.level : d.logging.level },
    redaction: {
      headers: strings(redaction.headers),
      fields: strings(redaction.fields),
    },
  };
}

function str(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

// Non-numeric values are kept as NaN so validateConfig reports them
function num(value: unknown, fallback: number): number {
  if (value === undefined || value === null) return fallback;
  return typeof value === "number" ? value : Number(value);
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

/**
 * Validate a gateway config. Returns list of errors.
 */
export function validateConfig(config: GatewayConfig): string[] {
  const errors: string[] = [];

  if (!config.storage.path.trim()) errors.push("storage.path is required");
  if (!config.http.userAgent.trim()) errors.push("http.userAgent must not be empty");
  if (!config.pubsub.clientId.trim()) errors.push("pubsub.clientId must not be empty");
  if (!isLogLevel(config.logging.level)) errors.push(`logging.level "${config.logging.level}" is not a known level`);

  const positive: [string, number][] = [
    ["http.timeoutMs", config.http.timeoutMs],
    ["pubsub.connectTimeoutMs", config.pubsub.connectTimeoutMs],
    ["oauth.stateTtlMinutes", config.oauth.stateTtlMinutes],
    ["oauth.tokenTimeoutMs", config.oauth.tokenTimeoutMs],
  ];
  for (const [name, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) errors.push(`${name} must be a positive number`);
  }

  return errors;
}
