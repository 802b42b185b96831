import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createMcpServer } from "../mcp.js";
import { Gateway } from "../gateway.js";
import { mergeConfig } from "../config.js";
import { Logger } from "../middleware.js";
import { isRecord } from "../spec.js";

const spec = JSON.stringify({
  openapi: "3.0.3",
  info: { title: "Pets", version: "1.0.0" },
  servers: [{ url: "https://api.example.com" }],
  paths: {
    "/pets/{petId}": {
      get: { operationId: "getPet", parameters: [{ name: "petId", in: "path", required: true, schema: { type: "integer" } }] },
    },
  },
});

interface ToolOutput {
  isError: boolean;
  value: unknown;
}

/** First text block of a tool result, parsed as JSON. */
function read(result: unknown): ToolOutput {
  if (!isRecord(result) || !Array.isArray(result.content)) throw new Error("tool result has no content");
  const [block]: unknown[] = result.content;
  if (!isRecord(block) || block.type !== "text" || typeof block.text !== "string") {
    throw new Error("tool result has no text block");
  }
  return { isError: result.isError === true, value: JSON.parse(block.text) };
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

describe("MCP server", () => {
  let gateway: Gateway;
  let client: Client;
  let requested: string[];

  beforeEach(async () => {
    requested = [];
    gateway = new Gateway(mergeConfig({ storage: { path: ":memory:" } }), {
      logger: new Logger("error"),
      fetch: async (input) => {
        requested.push(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
        return new Response(JSON.stringify({ name: "Rex" }), { status: 200, headers: { "content-type": "application/json" } });
      },
    });
    const server = createMcpServer(gateway);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "1.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await gateway.stop();
  });

  async function register(): Promise<{ documentId: string; endpointId: string }> {
    const out = read(await client.callTool({ name: "register_specification", arguments: { name: "Pets", content: spec } }));
    const documentId = field(out.value, "documentId");
    const endpoints = field(out.value, "endpoints");
    const endpointId = Array.isArray(endpoints) ? field(endpoints[0], "id") : undefined;
    if (typeof documentId !== "string" || typeof endpointId !== "string") throw new Error("registration failed");
    return { documentId, endpointId };
  }

  it("lists every gateway tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "add_auth_config",
      "begin_authorization",
      "call_by_address",
      "call_endpoint",
      "call_logs",
      "complete_authorization",
      "list_documents",
      "list_endpoints",
      "list_subscriptions",
      "refresh_authorization",
      "register_specification",
      "unsubscribe",
    ]);
  });

  it("registers a specification and summarizes its endpoints", async () => {
    const out = read(await client.callTool({ name: "register_specification", arguments: { name: "Pets", content: spec } }));
    expect(out.isError).toBe(false);
    expect(field(out.value, "family")).toBe("rest");
    expect(field(out.value, "endpoints")).toEqual([
      { id: expect.any(String), operationKind: "get", addressPattern: "/pets/{petId}", protocol: "http" },
    ]);

    const docs = read(await client.callTool({ name: "list_documents", arguments: {} }));
    expect(Array.isArray(docs.value) && docs.value.map((d) => field(d, "name"))).toEqual(["Pets"]);
  });

  it("returns registration errors as tool errors", async () => {
    const out = read(await client.callTool({ name: "register_specification", arguments: { name: "Bad", content: "[1]" } }));
    expect(out.isError).toBe(true);
    expect(out.value).toEqual({
      kind: "InvalidSpecificationError",
      message: 'Invalid specification at "<document>": top level must be an object',
      details: { field: "<document>" },
    });
  });

  it("calls endpoints by id and by address", async () => {
    const { documentId, endpointId } = await register();

    const byId = read(await client.callTool({ name: "call_endpoint", arguments: { endpointId, params: { petId: 1 } } }));
    expect(byId.isError).toBe(false);
    expect(field(byId.value, "success")).toBe(true);

    const byAddress = read(await client.callTool({
      name: "call_by_address",
      arguments: { documentId, address: "/pets/2", operation: "get" },
    }));
    expect(field(byAddress.value, "endpointId")).toBe(endpointId);
    expect(requested).toEqual(["https://api.example.com/pets/1", "https://api.example.com/pets/2"]);

    const logs = read(await client.callTool({ name: "call_logs", arguments: { documentId } }));
    expect(Array.isArray(logs.value) && logs.value.length).toBe(2);
  });

  it("flags failed calls as errors", async () => {
    const { endpointId } = await register();
    const out = read(await client.callTool({ name: "call_endpoint", arguments: { endpointId } }));
    expect(out.isError).toBe(true);
    expect(field(field(out.value, "error"), "kind")).toBe("MissingRequiredParameterError");
  });

  it("validates auth configs", async () => {
    const { documentId } = await register();
    const bad = read(await client.callTool({
      name: "add_auth_config",
      arguments: { documentId, scheme: "bearer", config: {} },
    }));
    expect(bad.isError).toBe(true);
    expect(field(bad.value, "kind")).toBe("InvalidConfigurationError");

    const good = read(await client.callTool({
      name: "add_auth_config",
      arguments: { documentId, scheme: "bearer", config: { token: "test-token" }, priority: 3 },
    }));
    expect(good.isError).toBe(false);
    expect(field(good.value, "priority")).toBe(3);
  });
});
