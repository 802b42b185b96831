// Core domain types for the API gateway

import type { ErrorResponse } from "./errors.js";
import type { Logger, RequestTracker } from "./middleware.js";

export type JsonObject = Record<string, unknown>;

// ---- Configuration ----

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface GatewayConfig {
  storage: { path: string };              // sqlite file or ":memory:"
  http: { timeoutMs: number; userAgent: string };
  pubsub: { connectTimeoutMs: number; clientId: string };
  oauth: { stateTtlMinutes: number; tokenTimeoutMs: number };
  logging: { level: LogLevel };
  redaction: { headers: string[]; fields: string[] }; // extra secret names
}

// ---- Specifications & endpoints ----

export type HttpMethod = "get" | "post" | "put" | "delete" | "patch" | "head" | "options" | "trace";
export type ChannelOperation = "publish" | "subscribe";
export type OperationKind = HttpMethod | ChannelOperation;
export type ParameterLocation = "path" | "query" | "header" | "cookie" | "channel";

export interface Parameter {
  name: string;
  location: ParameterLocation;
  required: boolean;
  schema?: JsonObject;
  description?: string;
}

export interface ServerInfo {
  name?: string;
  url: string;
  protocol?: string;     // pub/sub documents declare one per server
  description?: string;
}

export interface Specification {
  id: string;
  name: string;
  family: string;          // "rest" | "pubsub" | any registered family
  rawContent: string;
  resolvedContent: JsonObject;
  version: string;
  servers: ServerInfo[];
  createdAt: string;
}

export interface ApiDocument {
  id: string;
  specId: string;
  name: string;
  version: string;
  family: string;
  baseAddress: string;
  servers: ServerInfo[];
  createdAt: string;
}

export interface SecurityRequirement {
  scheme: string;          // name under components.securitySchemes
  type?: string;           // declared scheme type, when known
  scopes: string[];
}

export interface EndpointStats {
  callCount: number;
  successCount: number;
  errorCount: number;
  avgLatencyMs: number;
  lastCalledAt?: string;
}

/** What an extractor produces; identity and stats are assigned at registration. */
export interface EndpointDefinition {
  addressPattern: string;
  protocol: string;
  operationKind: OperationKind;
  operationId?: string;
  description: string;
  parameters: Parameter[];
  requestSchema?: JsonObject;
  responseSchema?: JsonObject;
  securityRequirements: SecurityRequirement[];
  tags: string[];
}

export interface Endpoint extends EndpointDefinition {
  id: string;
  apiDocumentId: string;
  stats: EndpointStats;
}

export interface RegistrationResult {
  documentId: string;
  specId: string;
  family: string;
  endpoints: Endpoint[];
}

// ---- Authentication ----

export type AuthScheme = "basic" | "bearer" | "api_key" | "oauth2";

export interface AuthConfig {
  id: string;
  apiDocumentId: string;
  scheme: AuthScheme;
  schemeName?: string;     // security scheme this config satisfies
  config: JsonObject;      // scheme-specific secret material
  required: boolean;
  global: boolean;         // applies to every endpoint of the document
  priority: number;        // higher is tried first
  createdAt: string;
}

export interface AuthConfigInput {
  scheme: AuthScheme;
  config: JsonObject;
  schemeName?: string;
  required?: boolean;
  global?: boolean;
  priority?: number;
}

export interface OAuth2AuthState {
  id: string;
  authConfigId: string;
  userId: string;
  apiDocumentId: string;
  stateNonce: string;
  codeVerifier: string;
  codeChallenge: string;
  redirectUri: string;
  scope: string;
  expiresAt: string;
  createdAt: string;
  consumedAt?: string;
}

export interface UserAuthorization {
  id: string;
  userId: string;
  apiDocumentId: string;
  authConfigId: string;
  accessToken: string;
  refreshToken?: string;
  tokenType: string;
  scope?: string;
  expiresAt?: string;
  providerSubject?: string;
  createdAt: string;
  updatedAt: string;
}

export interface AuthorizationStart {
  stateId: string;
  authorizationUrl: string;
  expiresAt: string;
}

// ---- Wire level ----

export interface WireRequest {
  protocol: string;
  operationKind: OperationKind;
  url: string;                                   // full URL (REST) or server URL (pub/sub)
  address: string;                               // substituted path or channel name
  headers: Record<string, string>;
  query: Record<string, string | string[]>;
  channelParams: Record<string, string>;
  cookies: Record<string, string>;
  credentials?: ServerCredentials;               // pub/sub only: sent when connecting, never in messages
  body?: unknown;
  timeoutMs: number;
}

export interface WireResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: unknown;          // decoded JSON when the content type says so, else text
  url: string;
}

export interface MessageEnvelope {
  id: string;
  timestamp: string;
  channel: string;
  operation: ChannelOperation;
  headers: Record<string, string>;
  payload: unknown;
}

export interface InboundMessage {
  channel: string;
  payload: unknown;
  envelope?: MessageEnvelope;
  raw: string;
  receivedAt: string;
}

export type MessageHandler = (message: InboundMessage) => void | Promise<void>;

/**
 * Credentials a broker client presents when it connects. `headers` only
 * travel on the WebSocket upgrade request.
 */
export interface ServerCredentials {
  username?: string;
  password?: string;
  token?: string;
  headers?: Record<string, string>;
}

export interface ServerTarget {
  protocol: string;
  url: string;
  name?: string;
  credentials?: ServerCredentials;
}

export interface ConnectionHandle {
  id: string;
  key: string;            // protocol|url, plus a credential fingerprint
  protocol: string;
  url: string;
}

export interface SubscriptionHandle {
  id: string;
  connectionId: string;
  protocol: string;
  channel: string;
  createdAt: string;
}

export interface OutboundMessage {
  payload: unknown;
  headers: Record<string, string>;
}

// ---- Plugin contracts ----

export interface RequestResponseAdapter {
  readonly kind: "request-response";
  readonly protocol: string;
  execute(request: WireRequest): Promise<WireResponse>;
  close(): Promise<void>;
}

export interface PubSubProtocolAdapter {
  readonly kind: "pubsub";
  readonly protocol: string;
  connect(server: ServerTarget): Promise<ConnectionHandle>;
  publish(connection: ConnectionHandle, channel: string, message: OutboundMessage): Promise<MessageEnvelope>;
  subscribe(connection: ConnectionHandle, channel: string, handler: MessageHandler): Promise<SubscriptionHandle>;
  unsubscribe(subscription: SubscriptionHandle | string): Promise<void>;
  disconnect(connection: ConnectionHandle): Promise<void>;
  listSubscriptions(): SubscriptionHandle[];
  close(): Promise<void>;
}

export type ProtocolAdapter = RequestResponseAdapter | PubSubProtocolAdapter;

export interface ProtocolAdapterOptions {
  logger: Logger;
  tracker: RequestTracker;
  timeoutMs: number;
  connectTimeoutMs: number;
  clientId: string;
  fetch?: typeof fetch;
}

export type ProtocolAdapterFactory = (options: ProtocolAdapterOptions) => ProtocolAdapter;

export interface SpecModel {
  readonly family: string;
  readonly document: JsonObject;
  /** Throws InvalidSpecificationError naming the first bad field. */
  validate(): void;
  title(): string;
  version(): string;
  servers(): ServerInfo[];
  securitySchemes(): Record<string, JsonObject>;
}

export interface SpecModelConstructor {
  new (document: JsonObject): SpecModel;
  /** True when the document's family marker belongs to this model. */
  detect(document: JsonObject): boolean;
}

export interface SpecParser {
  extractEndpoints(model: SpecModel): EndpointDefinition[];
}

export interface ExecutionContext {
  endpoint: Endpoint;
  document: ApiDocument;
  request: WireRequest;
  adapter: ProtocolAdapter;
  logger: Logger;
  onMessage?: MessageHandler;
}

export type CallOutput =
  | { kind: "response"; response: WireResponse }
  | { kind: "published"; envelope: MessageEnvelope }
  | { kind: "subscribed"; subscription: SubscriptionHandle };

export interface SpecExecutor {
  execute(ctx: ExecutionContext): Promise<CallOutput>;
}

// ---- Calls ----

export interface CallOptions {
  userId?: string;
  onMessage?: MessageHandler;
}

export type CallResult =
  | { success: true; endpointId: string; output: CallOutput; latencyMs: number }
  | { success: false; endpointId?: string; error: ErrorResponse; latencyMs: number };

export interface CallLogEntry {
  id: string;
  endpointId: string;
  apiDocumentId: string;
  protocol: string;
  operationKind: OperationKind;
  request: string;          // redacted JSON
  response?: string;
  status: "success" | "error";
  statusCode?: number;
  error?: string;
  errorKind?: string;
  latencyMs: number;
  timestamp: string;
}

export interface CallLogQuery {
  endpointId?: string;
  apiDocumentId?: string;
  status?: "success" | "error";
  limit?: number;
  offset?: number;
}
