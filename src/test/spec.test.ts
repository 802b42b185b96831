import { describe, it, expect } from "vitest";
import { applyServerVariables, parseDocument, serializeRaw } from "../spec.js";
import { InvalidSpecificationError } from "../errors.js";

describe("parseDocument", () => {
  it("parses JSON text", () => {
    expect(parseDocument('{"openapi":"3.0.0","paths":{}}')).toEqual({ openapi: "3.0.0", paths: {} });
  });

  it("parses YAML text", () => {
    const doc = parseDocument("asyncapi: 2.6.0\ninfo:\n  title: Events\nchannels: {}\n");
    expect(doc).toEqual({ asyncapi: "2.6.0", info: { title: "Events" }, channels: {} });
  });

  it("copies object input", () => {
    const input = { openapi: "3.0.0", info: { title: "T" } };
    const doc = parseDocument(input);
    expect(doc).toEqual(input);
    expect(doc).not.toBe(input);
    expect(doc.info).not.toBe(input.info);
  });

  it("rejects empty, unparseable and non-object content", () => {
    expect(() => parseDocument("   ")).toThrow(InvalidSpecificationError);
    expect(() => parseDocument("{ not json")).toThrow(InvalidSpecificationError);
    expect(() => parseDocument("[1, 2]")).toThrow("top level must be an object");
    expect(() => parseDocument("just a string")).toThrow("top level must be an object");
  });
});

describe("serializeRaw", () => {
  it("keeps text as given and serializes objects", () => {
    expect(serializeRaw("openapi: 3.0.0")).toBe("openapi: 3.0.0");
    expect(serializeRaw({ a: 1 })).toBe('{"a":1}');
  });
});

describe("applyServerVariables", () => {
  it("fills defaults and leaves unknown tokens alone", () => {
    expect(applyServerVariables("https://{env}.example.com/{other}", { env: { default: "staging" } })).toBe(
      "https://staging.example.com/{other}",
    );
    expect(applyServerVariables("https://example.com", undefined)).toBe("https://example.com");
  });
});
