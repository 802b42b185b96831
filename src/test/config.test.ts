import { describe, it, expect, afterEach } from "vitest";
import { existsSync, unlinkSync, writeFileSync } from "fs";
import { DEFAULT_CONFIG, loadConfig, mergeConfig, validateConfig } from "../config.js";
import { InvalidConfigurationError } from "../errors.js";

const TEST_CONFIG = "./test-gateway-config.yaml";

describe("mergeConfig", () => {
  it("returns the defaults for an empty file", () => {
    expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("overlays individual keys without dropping sibling defaults", () => {
    const config = mergeConfig({ http: { timeoutMs: 5000 }, logging: { level: "debug" } });
    expect(config.http).toEqual({ timeoutMs: 5000, userAgent: DEFAULT_CONFIG.http.userAgent });
    expect(config.logging.level).toBe("debug");
    expect(config.pubsub).toEqual(DEFAULT_CONFIG.pubsub);
  });

  it("ignores unknown log levels and non-string redaction names", () => {
    const config = mergeConfig({ logging: { level: "loud" }, redaction: { headers: ["x-token", 7] } });
    expect(config.logging.level).toBe("info");
    expect(config.redaction.headers).toEqual(["x-token"]);
  });
});

describe("validateConfig", () => {
  it("passes the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
  });

  it("reports non-positive and non-numeric timeouts", () => {
    const config = mergeConfig({ http: { timeoutMs: 0 }, oauth: { tokenTimeoutMs: "soon" } });
    expect(validateConfig(config)).toEqual([
      "http.timeoutMs must be a positive number",
      "oauth.tokenTimeoutMs must be a positive number",
    ]);
  });

  it("reports an empty storage path", () => {
    const config = mergeConfig({ storage: { path: " " } });
    expect(validateConfig(config)).toEqual(["storage.path is required"]);
  });
});

describe("loadConfig", () => {
  afterEach(() => {
    if (existsSync(TEST_CONFIG)) unlinkSync(TEST_CONFIG);
  });

  it("reads a YAML file from an explicit path", () => {
    writeFileSync(TEST_CONFIG, "storage:\n  path: ':memory:'\npubsub:\n  clientId: tests\n");
    const { config, path } = loadConfig(TEST_CONFIG);
    expect(path).toBe(TEST_CONFIG);
    expect(config.storage.path).toBe(":memory:");
    expect(config.pubsub.clientId).toBe("tests");
    expect(config.http.timeoutMs).toBe(30000);
  });

  it("rejects a file that does not parse", () => {
    writeFileSync(TEST_CONFIG, "storage: [unclosed\n");
    expect(() => loadConfig(TEST_CONFIG)).toThrow(InvalidConfigurationError);
  });
});
