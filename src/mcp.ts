/**
 * MCP front-end: exposes one Gateway as a set of tools.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { VERSION } from "./config.js";
import { toGatewayError } from "./errors.js";
import type { Gateway } from "./gateway.js";

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

const OPERATION_KINDS = [
  "get", "post", "put", "delete", "patch", "head", "options", "trace", "publish", "subscribe",
] as const;

function text(value: unknown, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

async function guarded(fn: () => unknown): Promise<ToolResult> {
  try {
    return text(await fn());
  } catch (err) {
    return text(toGatewayError(err).toResponse(), true);
  }
}

const callShape = {
  params: z.record(z.unknown()).default({}).describe("Path, query, header, cookie or channel parameters"),
  headers: z.record(z.string()).default({}),
  body: z.unknown().optional().describe("Request body or message payload"),
  userId: z.string().optional().describe("User whose OAuth2 authorization should be used"),
};

export function createMcpServer(gateway: Gateway): McpServer {
  const server = new McpServer({ name: "api-gateway", version: VERSION });

  server.tool(
    "register_specification",
    "Register an OpenAPI 3.x or AsyncAPI 2.x document (JSON or YAML) and extract its endpoints.",
    {
      name: z.string().min(1),
      content: z.string().min(1).describe("Specification text"),
      family: z.string().optional().describe("Spec family, e.g. rest or pubsub; detected when omitted"),
      baseAddress: z.string().optional().describe("Overrides the document's first server URL"),
    },
    async ({ name, content, family, baseAddress }) =>
      guarded(async () => {
        const result = await gateway.registerSpecification(name, content, family, { baseAddress });
        return {
          documentId: result.documentId,
          specId: result.specId,
          family: result.family,
          endpoints: result.endpoints.map((e) => ({
            id: e.id,
            operationKind: e.operationKind,
            addressPattern: e.addressPattern,
            protocol: e.protocol,
          })),
        };
      }),
  );

  server.tool("list_documents", "List registered API documents.", {}, async () =>
    guarded(() => gateway.listDocuments()),
  );

  server.tool(
    "list_endpoints",
    "List endpoints, optionally for one document, with their call statistics.",
    { documentId: z.string().optional() },
    async ({ documentId }) => guarded(() => gateway.listEndpoints(documentId)),
  );

  server.tool(
    "call_endpoint",
    "Call an endpoint by id.",
    { endpointId: z.string(), ...callShape },
    async ({ endpointId, params, headers, body, userId }) => {
      const result = await gateway.callEndpoint(endpointId, params, headers, body, { userId });
      return text(result, !result.success);
    },
  );

  server.tool(
    "call_by_address",
    "Call the endpoint of a document whose address pattern matches a concrete path or channel.",
    {
      documentId: z.string(),
      address: z.string().describe("e.g. /pets/42"),
      operation: z.enum(OPERATION_KINDS),
      ...callShape,
    },
    async ({ documentId, address, operation, params, headers, body, userId }) => {
      const result = await gateway.callByAddress(address, operation, documentId, params, headers, body, { userId });
      return text(result, !result.success);
    },
  );

  server.tool(
    "add_auth_config",
    "Attach credentials to a document. Configs are tried in descending priority.",
    {
      documentId: z.string(),
      scheme: z.enum(["basic", "bearer", "api_key", "oauth2"]),
      config: z.record(z.unknown()).describe("Scheme material, e.g. {token} for bearer"),
      schemeName: z.string().optional().describe("Security scheme this config satisfies"),
      required: z.boolean().optional().describe("When this config cannot be applied, lower priorities are not tried"),
      global: z.boolean().optional(),
      priority: z.number().optional(),
    },
    async ({ documentId, ...input }) =>
      guarded(() => {
        const created = gateway.addAuthConfig(documentId, input);
        return { id: created.id, scheme: created.scheme, priority: created.priority };
      }),
  );

  server.tool(
    "begin_authorization",
    "Start the OAuth2 authorization-code flow for a user and document. Returns the URL to visit.",
    { userId: z.string(), documentId: z.string() },
    async ({ userId, documentId }) => guarded(() => gateway.beginAuthorization(userId, documentId)),
  );

  server.tool(
    "complete_authorization",
    "Finish the OAuth2 flow with the code and state from the provider's redirect.",
    { stateId: z.string(), code: z.string(), state: z.string() },
    async ({ stateId, code, state }) =>
      guarded(async () => {
        const authorization = await gateway.completeAuthorization(stateId, code, state);
        return {
          userId: authorization.userId,
          documentId: authorization.apiDocumentId,
          expiresAt: authorization.expiresAt,
          scope: authorization.scope,
        };
      }),
  );

  server.tool(
    "refresh_authorization",
    "Exchange the stored refresh token for new OAuth2 tokens.",
    { userId: z.string(), documentId: z.string() },
    async ({ userId, documentId }) =>
      guarded(async () => {
        const authorization = await gateway.refreshAuthorization(userId, documentId);
        return { userId: authorization.userId, documentId: authorization.apiDocumentId, expiresAt: authorization.expiresAt };
      }),
  );

  server.tool("list_subscriptions", "List live pub/sub subscriptions.", {}, async () =>
    guarded(() => gateway.listSubscriptions()),
  );

  server.tool(
    "unsubscribe",
    "Tear down one pub/sub subscription.",
    { subscriptionId: z.string() },
    async ({ subscriptionId }) => guarded(async () => ({ removed: await gateway.unsubscribe(subscriptionId) })),
  );

  server.tool(
    "call_logs",
    "Query the call log. Credentials are redacted.",
    {
      endpointId: z.string().optional(),
      documentId: z.string().optional(),
      status: z.enum(["success", "error"]).optional(),
      limit: z.number().min(1).max(1000).default(50),
      offset: z.number().min(0).default(0),
    },
    async ({ documentId, ...query }) => guarded(() => gateway.getCallLogs({ ...query, apiDocumentId: documentId })),
  );

  return server;
}
