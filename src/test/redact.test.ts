import { describe, it, expect } from "vitest";
import { MAX_LOGGED_BODY, REDACTED, Redactor, clipForLog } from "../redact.js";
import type { WireRequest } from "../types.js";

describe("Redactor", () => {
  const redactor = new Redactor({ headers: ["X-Internal-Token"], fields: ["session_key"] });

  it("redacts credential headers case-insensitively", () => {
    const out = redactor.redactHeaders({ Authorization: "Bearer test-token", Accept: "application/json" });
    expect(out).toEqual({ Authorization: REDACTED, Accept: "application/json" });
  });

  it("redacts configured and extra header names", () => {
    const out = redactor.redactHeaders({ "x-internal-token": "a", "X-Custom-Key": "b", host: "c" }, ["x-custom-key"]);
    expect(out).toEqual({ "x-internal-token": REDACTED, "X-Custom-Key": REDACTED, host: "c" });
  });

  it("redacts secret fields at any depth", () => {
    const out = redactor.redactValue({
      user: "alice",
      auth: { access_token: "test-token", nested: [{ password: "test-password", keep: 1 }] },
      session_key: "k",
    });
    expect(out).toEqual({
      user: "alice",
      auth: { access_token: REDACTED, nested: [{ password: REDACTED, keep: 1 }] },
      session_key: REDACTED,
    });
  });

  it("leaves scalars untouched", () => {
    expect(redactor.redactValue("plain")).toBe("plain");
    expect(redactor.redactValue(null)).toBeNull();
  });

  it("builds a loggable request view", () => {
    const request: WireRequest = {
      protocol: "http",
      operationKind: "get",
      url: "https://api.example.com/pets",
      address: "/pets",
      headers: { authorization: "Basic dGVzdDp0ZXN0", "user-agent": "ua" },
      query: { api_key: "test-key", limit: "10" },
      channelParams: {},
      cookies: { session: "test-cookie" },
      timeoutMs: 1000,
    };
    const view = redactor.redactRequest(request, ["api_key"]);
    expect(view.headers).toEqual({ authorization: REDACTED, "user-agent": "ua" });
    expect(view.query).toEqual({ api_key: REDACTED, limit: "10" });
    expect(view.cookies).toEqual({ session: REDACTED });
    expect(view.body).toBeUndefined();
  });
});

describe("clipForLog", () => {
  it("keeps bodies within the limit", () => {
    expect(clipForLog({ a: 1 })).toEqual({ a: 1 });
    expect(clipForLog("x".repeat(MAX_LOGGED_BODY))).toHaveLength(MAX_LOGGED_BODY);
  });

  it("replaces longer bodies with a prefix of their JSON text", () => {
    expect(clipForLog("abcdef", 4)).toEqual({ truncated: true, length: 6, preview: "abcd" });
    expect(clipForLog({ a: "xyz" }, 5)).toEqual({ truncated: true, length: 11, preview: '{"a":' });
  });
});
