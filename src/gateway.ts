import { randomUUID } from "crypto";
import { AuthDispatcher, validateAuthConfig } from "./auth.js";
import {
  EndpointNotFoundError,
  GatewayError,
  InvalidConfigurationError,
  UnsupportedFamilyError,
  UnsupportedProtocolError,
  errorMessage,
  toGatewayError,
} from "./errors.js";
import { Logger, RequestTracker } from "./middleware.js";
import { OAuth2Flow } from "./oauth.js";
import { createDefaultRegistry } from "./plugins.js";
import { Redactor, clipForLog } from "./redact.js";
import { RefResolver } from "./refs.js";
import type { DocumentFetcher } from "./refs.js";
import type { Registry } from "./registry.js";
import { RequestBuilder, compileAddressPattern } from "./request.js";
import { parseDocument, serializeRaw, stringField } from "./spec.js";
import { SqliteStorage } from "./storage.js";
import type { AuthConfigPatch, DocumentPatch, GatewayStore } from "./storage.js";
import type {
  ApiDocument,
  AuthConfig,
  AuthConfigInput,
  AuthorizationStart,
  CallLogEntry,
  CallLogQuery,
  CallOptions,
  CallOutput,
  CallResult,
  Endpoint,
  EndpointDefinition,
  EndpointStats,
  GatewayConfig,
  JsonObject,
  OperationKind,
  ProtocolAdapter,
  RegistrationResult,
  ServerInfo,
  Specification,
  SubscriptionHandle,
  UserAuthorization,
  WireRequest,
} from "./types.js";

export interface GatewayDeps {
  store?: GatewayStore;
  registry?: Registry;
  logger?: Logger;
  /** Used by the HTTP adapter and the OAuth2 token exchange. */
  fetch?: typeof fetch;
  /** Loader for external `$ref` documents. */
  fetchDocument?: DocumentFetcher;
  now?: () => Date;
}

export interface DocumentOptions {
  baseAddress?: string;
  version?: string;
}

type CallOutcome =
  | { ok: true; output: CallOutput }
  | { ok: false; error: GatewayError };

/**
 * Composition root. Owns the plugin registry, the store and every
 * per-protocol adapter; front-ends hold a reference to one instance.
 */
export class Gateway {
  readonly registry: Registry;
  readonly store: GatewayStore;
  readonly logger: Logger;
  readonly tracker = new RequestTracker();

  private auth: AuthDispatcher;
  private oauth: OAuth2Flow;
  private builder: RequestBuilder;
  private redactor: Redactor;
  private resolver: RefResolver;
  private adapters = new Map<string, ProtocolAdapter>();
  private now: () => Date;
  private stopped = false;

  constructor(private config: GatewayConfig, private deps: GatewayDeps = {}) {
    this.registry = deps.registry ?? createDefaultRegistry();
    this.store = deps.store ?? new SqliteStorage(config.storage.path);
    this.logger = deps.logger ?? new Logger(config.logging.level);
    this.now = deps.now ?? (() => new Date());

    this.auth = new AuthDispatcher(this.store, { logger: this.logger.child({ component: "auth" }), now: this.now });
    this.oauth = new OAuth2Flow(this.store, {
      logger: this.logger,
      tracker: this.tracker,
      stateTtlMinutes: config.oauth.stateTtlMinutes,
      timeoutMs: config.oauth.tokenTimeoutMs,
      fetch: deps.fetch,
      now: this.now,
    });
    this.builder = new RequestBuilder({
      userAgent: config.http.userAgent,
      timeoutMs: config.http.timeoutMs,
      auth: this.auth,
    });
    this.redactor = new Redactor(config.redaction);
    this.resolver = new RefResolver({ fetchDocument: deps.fetchDocument, timeoutMs: config.http.timeoutMs });
  }

  // ---- Registration ----

  /**
   * Parse, resolve, validate and extract a specification, then persist the
   * specification, one document and its endpoints in a single transaction.
   */
  async registerSpecification(
    name: string,
    raw: string | JsonObject,
    familyHint?: string,
    options: DocumentOptions = {},
  ): Promise<RegistrationResult> {
    const document = parseDocument(raw);
    const family = this.registry.detectFamily(document, familyHint);
    const resolved = await this.resolver.resolve(document);
    const { version, servers, definitions } = this.extract(family, resolved);

    const spec: Specification = {
      id: randomUUID(),
      name,
      family,
      rawContent: serializeRaw(raw),
      resolvedContent: resolved,
      version,
      servers,
      createdAt: this.now().toISOString(),
    };

    const result = this.store.transaction(() => {
      this.store.insertSpecification(spec);
      return this.persistDocument(spec, name, definitions, options);
    });

    this.logger.info("specification registered", {
      specId: spec.id,
      documentId: result.documentId,
      family,
      endpoints: result.endpoints.length,
    });
    return result;
  }

  /**
   * Register another document from an already stored specification.
   */
  instantiateSpecification(specId: string, name: string, options: DocumentOptions = {}): RegistrationResult {
    const spec = this.store.getSpecification(specId);
    if (!spec) throw new EndpointNotFoundError(`specification ${specId}`);

    const { definitions } = this.extract(spec.family, spec.resolvedContent);
    const result = this.store.transaction(() => this.persistDocument(spec, name, definitions, options));
    this.logger.info("specification instantiated", { specId, documentId: result.documentId });
    return result;
  }

  private extract(family: string, resolved: JsonObject) {
    const Model = this.registry.getSpecModel(family);
    const parser = this.registry.getParser(family);
    if (!Model || !parser) throw new UnsupportedFamilyError(family);

    const model = new Model(resolved);
    model.validate();
    const definitions = parser.extractEndpoints(model);

    for (const def of definitions) {
      if (!this.registry.hasProtocol(def.protocol)) {
        throw new UnsupportedProtocolError(def.protocol, `${def.operationKind} ${def.addressPattern}`);
      }
    }
    return { version: model.version(), servers: model.servers(), definitions };
  }

  private persistDocument(
    spec: Specification,
    name: string,
    definitions: EndpointDefinition[],
    options: DocumentOptions,
  ): RegistrationResult {
    const document: ApiDocument = {
      id: randomUUID(),
      specId: spec.id,
      name,
      version: options.version ?? spec.version,
      family: spec.family,
      baseAddress: options.baseAddress ?? defaultBaseAddress(spec.servers),
      servers: spec.servers,
      createdAt: this.now().toISOString(),
    };
    const endpoints: Endpoint[] = definitions.map((def) => ({
      ...def,
      id: randomUUID(),
      apiDocumentId: document.id,
      stats: { callCount: 0, successCount: 0, errorCount: 0, avgLatencyMs: 0 },
    }));

    this.store.insertApiDocument(document);
    this.store.insertEndpoints(endpoints);
    return { documentId: document.id, specId: spec.id, family: spec.family, endpoints };
  }

  // ---- Documents & endpoints ----

  listDocuments(): ApiDocument[] {
    return this.store.listApiDocuments();
  }

  getDocument(documentId: string): ApiDocument | undefined {
    return this.store.getApiDocument(documentId);
  }

  updateDocument(documentId: string, patch: DocumentPatch): ApiDocument {
    const updated = this.store.updateApiDocument(documentId, patch);
    if (!updated) throw new EndpointNotFoundError(`document ${documentId}`);
    return updated;
  }

  deleteDocument(documentId: string): boolean {
    const deleted = this.store.deleteApiDocument(documentId);
    if (deleted) this.logger.info("document deleted", { documentId });
    return deleted;
  }

  listEndpoints(documentId?: string): Endpoint[] {
    return this.store.listEndpoints(documentId);
  }

  getEndpoint(endpointId: string): Endpoint | undefined {
    return this.store.getEndpoint(endpointId);
  }

  getEndpointStats(endpointId: string): EndpointStats | undefined {
    return this.store.getEndpoint(endpointId)?.stats;
  }

  // ---- Auth configs ----

  addAuthConfig(documentId: string, input: AuthConfigInput): AuthConfig {
    this.requireDocument(documentId);
    const valid = validateAuthConfig(input);
    const config: AuthConfig = {
      id: randomUUID(),
      apiDocumentId: documentId,
      scheme: valid.scheme,
      schemeName: valid.schemeName,
      config: valid.config,
      required: valid.required ?? false,
      global: valid.global ?? true,
      priority: valid.priority ?? 0,
      createdAt: this.now().toISOString(),
    };
    this.store.insertAuthConfig(config);
    this.logger.info("auth config added", { documentId, configId: config.id, scheme: config.scheme });
    return config;
  }

  listAuthConfigs(documentId: string): AuthConfig[] {
    return this.store.listAuthConfigs(documentId);
  }

  updateAuthConfig(configId: string, patch: AuthConfigPatch): AuthConfig {
    const existing = this.store.getAuthConfig(configId);
    if (!existing) throw new InvalidConfigurationError(`Auth config ${configId} does not exist`, { configId });
    validateAuthConfig({
      scheme: existing.scheme,
      config: patch.config ?? existing.config,
      priority: patch.priority,
    });
    const updated = this.store.updateAuthConfig(configId, patch);
    if (!updated) throw new InvalidConfigurationError(`Auth config ${configId} does not exist`, { configId });
    return updated;
  }

  removeAuthConfig(configId: string): boolean {
    return this.store.deleteAuthConfig(configId);
  }

  // ---- Calls ----

  /**
   * Build, authenticate and execute one call. Never throws: failures come
   * back as `{ success: false, error }` and are logged like successes.
   */
  async callEndpoint(
    endpointId: string,
    params: Record<string, unknown> = {},
    headers: Record<string, string> = {},
    body?: unknown,
    options: CallOptions = {},
  ): Promise<CallResult> {
    const started = Date.now();
    const endpoint = this.store.getEndpoint(endpointId);
    if (!endpoint) {
      const error = new EndpointNotFoundError(endpointId);
      return { success: false, endpointId, error: error.toResponse(), latencyMs: Date.now() - started };
    }

    let request: WireRequest | undefined;
    let outcome: CallOutcome;
    try {
      const document = this.requireDocument(endpoint.apiDocumentId);
      request = this.builder.build(endpoint, document, params, headers, body, { userId: options.userId });
      const executor = this.registry.getExecutor(document.family);
      if (!executor) throw new UnsupportedFamilyError(document.family);

      const output = await executor.execute({
        endpoint,
        document,
        request,
        adapter: this.adapter(endpoint.protocol),
        logger: this.logger.child({ endpointId }),
        onMessage: options.onMessage,
      });
      outcome = { ok: true, output };
    } catch (err) {
      outcome = { ok: false, error: toGatewayError(err) };
    }

    const latencyMs = Date.now() - started;
    this.record(endpoint, params, request, outcome, latencyMs);

    if (outcome.ok) return { success: true, endpointId, output: outcome.output, latencyMs };
    return { success: false, endpointId, error: outcome.error.toResponse(), latencyMs };
  }

  /**
   * Call the document endpoint whose address pattern matches `address`.
   * A literal match wins; otherwise the pattern with the most literal text.
   */
  async callByAddress(
    address: string,
    operationKind: OperationKind,
    documentId: string,
    params: Record<string, unknown> = {},
    headers: Record<string, string> = {},
    body?: unknown,
    options: CallOptions = {},
  ): Promise<CallResult> {
    const match = this.matchAddress(address, operationKind, documentId);
    if (!match) {
      const error = new EndpointNotFoundError(`${operationKind.toUpperCase()} ${address} in document ${documentId}`);
      return { success: false, error: error.toResponse(), latencyMs: 0 };
    }
    return this.callEndpoint(match.endpoint.id, { ...match.values, ...params }, headers, body, options);
  }

  matchAddress(
    address: string,
    operationKind: OperationKind,
    documentId: string,
  ): { endpoint: Endpoint; values: Record<string, string> } | undefined {
    let best: { endpoint: Endpoint; values: Record<string, string>; exact: boolean; literal: number } | undefined;

    for (const endpoint of this.store.listEndpoints(documentId)) {
      if (endpoint.operationKind !== operationKind) continue;
      const matcher = compileAddressPattern(endpoint.addressPattern);
      const values = matcher.match(address);
      if (!values) continue;

      const candidate = { endpoint, values, exact: matcher.names.length === 0, literal: matcher.literalLength };
      if (
        !best ||
        (candidate.exact && !best.exact) ||
        (candidate.exact === best.exact && candidate.literal > best.literal)
      ) {
        best = candidate;
      }
    }
    return best && { endpoint: best.endpoint, values: best.values };
  }

  private record(
    endpoint: Endpoint,
    params: Record<string, unknown>,
    request: WireRequest | undefined,
    outcome: CallOutcome,
    latencyMs: number,
  ) {
    const timestamp = this.now().toISOString();
    const secretNames = this.apiKeyNames(endpoint.apiDocumentId);
    const loggedRequest = request
      ? this.redactor.redactRequest(request, secretNames)
      : { params: this.redactor.redactParams(params, secretNames) };

    const entry: CallLogEntry = {
      id: randomUUID(),
      endpointId: endpoint.id,
      apiDocumentId: endpoint.apiDocumentId,
      protocol: endpoint.protocol,
      operationKind: endpoint.operationKind,
      request: JSON.stringify(loggedRequest),
      status: outcome.ok ? "success" : "error",
      latencyMs,
      timestamp,
    };
    if (outcome.ok) {
      entry.response = JSON.stringify(this.describeOutput(outcome.output, secretNames));
      if (outcome.output.kind === "response") entry.statusCode = outcome.output.response.status;
    } else {
      entry.error = outcome.error.message;
      entry.errorKind = outcome.error.kind;
    }

    // Log write failures are reported here, never returned to the caller
    try {
      this.store.recordCallStats(endpoint.id, outcome.ok, latencyMs, timestamp);
      this.store.appendCallLog(entry);
    } catch (err) {
      this.logger.error("call log write failed", { endpointId: endpoint.id, error: errorMessage(err) });
    }

    this.logger.call({
      endpointId: endpoint.id,
      protocol: endpoint.protocol,
      status: entry.status,
      latencyMs,
      statusCode: entry.statusCode,
      error: entry.error,
    });
  }

  private describeOutput(output: CallOutput, secretNames: string[]): unknown {
    switch (output.kind) {
      case "response":
        return {
          status: output.response.status,
          headers: this.redactor.redactHeaders(output.response.headers),
          body: clipForLog(this.redactor.redactValue(output.response.body)),
        };
      case "published": {
        const { headers, payload, ...envelope } = output.envelope;
        return {
          envelope: {
            ...envelope,
            headers: this.redactor.redactHeaders(headers, secretNames),
            payload: clipForLog(this.redactor.redactValue(payload)),
          },
        };
      }
      case "subscribed":
        return { subscription: output.subscription };
    }
  }

  private apiKeyNames(documentId: string): string[] {
    return this.store
      .listAuthConfigs(documentId)
      .filter((c) => c.scheme === "api_key")
      .map((c) => stringField(c.config, "name"))
      .filter((n): n is string => n !== undefined);
  }

  getCallLogs(query: CallLogQuery = {}): CallLogEntry[] {
    return this.store.queryCallLogs(query);
  }

  // ---- OAuth2 ----

  beginAuthorization(userId: string, documentId: string): AuthorizationStart {
    this.requireDocument(documentId);
    return this.oauth.initiateAuthorization(userId, documentId);
  }

  completeAuthorization(stateId: string, code: string, state: string): Promise<UserAuthorization> {
    return this.oauth.handleCallback(stateId, code, state);
  }

  refreshAuthorization(userId: string, documentId: string): Promise<UserAuthorization> {
    return this.oauth.refreshAuthorization(userId, documentId);
  }

  // ---- Subscriptions ----

  listSubscriptions(): SubscriptionHandle[] {
    const out: SubscriptionHandle[] = [];
    for (const adapter of this.adapters.values()) {
      if (adapter.kind === "pubsub") out.push(...adapter.listSubscriptions());
    }
    return out;
  }

  async unsubscribe(subscriptionId: string): Promise<boolean> {
    for (const adapter of this.adapters.values()) {
      if (adapter.kind !== "pubsub") continue;
      if (adapter.listSubscriptions().some((s) => s.id === subscriptionId)) {
        await adapter.unsubscribe(subscriptionId);
        return true;
      }
    }
    return false;
  }

  // ---- Lifecycle ----

  /**
   * Drain in-flight calls, close every adapter (subscriptions before
   * connections), then close the store.
   */
  async stop(maxWaitMs = 10000): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    await this.tracker.drain(maxWaitMs);

    for (const [protocol, adapter] of this.adapters) {
      try {
        await adapter.close();
      } catch (err) {
        this.logger.warn("adapter close failed", { protocol, error: errorMessage(err) });
      }
    }
    this.adapters.clear();
    this.store.close();
    this.logger.info("gateway stopped");
  }

  private adapter(protocol: string): ProtocolAdapter {
    let adapter = this.adapters.get(protocol);
    if (!adapter) {
      adapter = this.registry.createAdapter(protocol, {
        logger: this.logger,
        tracker: this.tracker,
        timeoutMs: this.config.http.timeoutMs,
        connectTimeoutMs: this.config.pubsub.connectTimeoutMs,
        clientId: this.config.pubsub.clientId,
        fetch: this.deps.fetch,
      });
      this.adapters.set(protocol, adapter);
    }
    return adapter;
  }

  private requireDocument(documentId: string): ApiDocument {
    const document = this.store.getApiDocument(documentId);
    if (!document) throw new EndpointNotFoundError(`document ${documentId}`);
    return document;
  }
}

function defaultBaseAddress(servers: ServerInfo[]): string {
  return servers[0]?.url ?? "";
}
