/**
 * Persistence for specifications, documents, endpoints, auth material and
 * the call log. SQLite via better-sqlite3; every operation is synchronous,
 * so single statements (stats increments, state consumption) are atomic.
 */

import Database from "better-sqlite3";
import { isAuthScheme } from "./auth.js";
import { HTTP_METHODS } from "./openapi.js";
import type {
  ApiDocument,
  AuthConfig,
  CallLogEntry,
  CallLogQuery,
  Endpoint,
  OAuth2AuthState,
  OperationKind,
  Specification,
  UserAuthorization,
} from "./types.js";

// ---- Storage Interface ----

export type AuthConfigPatch = Partial<Pick<AuthConfig, "config" | "schemeName" | "required" | "global" | "priority">>;
export type DocumentPatch = Partial<Pick<ApiDocument, "name" | "version" | "baseAddress">>;

export interface GatewayStore {
  transaction<T>(fn: () => T): T;

  insertSpecification(spec: Specification): void;
  getSpecification(id: string): Specification | undefined;
  listSpecifications(): Specification[];

  insertApiDocument(doc: ApiDocument): void;
  getApiDocument(id: string): ApiDocument | undefined;
  listApiDocuments(): ApiDocument[];
  updateApiDocument(id: string, patch: DocumentPatch): ApiDocument | undefined;
  deleteApiDocument(id: string): boolean;

  insertEndpoints(endpoints: Endpoint[]): void;
  getEndpoint(id: string): Endpoint | undefined;
  listEndpoints(apiDocumentId?: string): Endpoint[];
  recordCallStats(endpointId: string, success: boolean, latencyMs: number, at: string): void;

  insertAuthConfig(config: AuthConfig): void;
  getAuthConfig(id: string): AuthConfig | undefined;
  listAuthConfigs(apiDocumentId: string): AuthConfig[];
  updateAuthConfig(id: string, patch: AuthConfigPatch): AuthConfig | undefined;
  deleteAuthConfig(id: string): boolean;

  insertAuthState(state: OAuth2AuthState): void;
  getAuthState(id: string): OAuth2AuthState | undefined;
  /** Marks the state consumed; false when it already was. */
  consumeAuthState(id: string, at: string): boolean;

  saveUserAuthorization(authorization: UserAuthorization): UserAuthorization;
  getUserAuthorization(userId: string, apiDocumentId: string): UserAuthorization | undefined;
  listUserAuthorizations(userId: string): UserAuthorization[];

  appendCallLog(entry: CallLogEntry): void;
  queryCallLogs(query?: CallLogQuery): CallLogEntry[];

  close(): void;
}

// ---- Row shapes ----

interface SpecRow {
  id: string; name: string; family: string; raw_content: string; resolved_content: string;
  version: string; servers: string; created_at: string;
}

interface DocumentRow {
  id: string; spec_id: string; name: string; version: string; family: string;
  base_address: string; servers: string; created_at: string;
}

interface EndpointRow {
  id: string; api_document_id: string; address_pattern: string; protocol: string; operation_kind: string;
  operation_id: string | null; description: string; parameters: string; request_schema: string | null;
  response_schema: string | null; security_requirements: string; tags: string;
  call_count: number; success_count: number; error_count: number; avg_latency_ms: number; last_called_at: string | null;
}

interface AuthConfigRow {
  id: string; api_document_id: string; scheme: string; scheme_name: string | null; config: string;
  required: number; global: number; priority: number; created_at: string;
}

interface AuthStateRow {
  id: string; auth_config_id: string; user_id: string; api_document_id: string; state_nonce: string;
  code_verifier: string; code_challenge: string; redirect_uri: string; scope: string;
  expires_at: string; created_at: string; consumed_at: string | null;
}

interface UserAuthorizationRow {
  id: string; user_id: string; api_document_id: string; auth_config_id: string; access_token: string;
  refresh_token: string | null; token_type: string; scope: string | null; expires_at: string | null;
  provider_subject: string | null; created_at: string; updated_at: string;
}

interface CallLogRow {
  id: string; endpoint_id: string; api_document_id: string; protocol: string; operation_kind: string;
  request: string; response: string | null; status: string; status_code: number | null; error: string | null;
  error_kind: string | null; latency_ms: number; timestamp: string;
}

// ---- SQLite Implementation ----

export class SqliteStorage implements GatewayStore {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS api_specifications (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        family TEXT NOT NULL,
        raw_content TEXT NOT NULL,
        resolved_content TEXT NOT NULL,
        version TEXT NOT NULL,
        servers TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS api_documents (
        id TEXT PRIMARY KEY,
        spec_id TEXT NOT NULL,
        name TEXT NOT NULL,
        version TEXT NOT NULL,
        family TEXT NOT NULL,
        base_address TEXT NOT NULL,
        servers TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS api_endpoints (
        id TEXT PRIMARY KEY,
        api_document_id TEXT NOT NULL,
        address_pattern TEXT NOT NULL,
        protocol TEXT NOT NULL,
        operation_kind TEXT NOT NULL,
        operation_id TEXT,
        description TEXT NOT NULL,
        parameters TEXT NOT NULL,
        request_schema TEXT,
        response_schema TEXT,
        security_requirements TEXT NOT NULL,
        tags TEXT NOT NULL,
        call_count INTEGER NOT NULL DEFAULT 0,
        success_count INTEGER NOT NULL DEFAULT 0,
        error_count INTEGER NOT NULL DEFAULT 0,
        avg_latency_ms REAL NOT NULL DEFAULT 0,
        last_called_at TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_endpoints_document ON api_endpoints(api_document_id);
      CREATE TABLE IF NOT EXISTS api_auth_configs (
        id TEXT PRIMARY KEY,
        api_document_id TEXT NOT NULL,
        scheme TEXT NOT NULL,
        scheme_name TEXT,
        config TEXT NOT NULL,
        required INTEGER NOT NULL,
        global INTEGER NOT NULL,
        priority INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_auth_configs_document ON api_auth_configs(api_document_id);
      CREATE TABLE IF NOT EXISTS oauth2_auth_states (
        id TEXT PRIMARY KEY,
        auth_config_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        api_document_id TEXT NOT NULL,
        state_nonce TEXT NOT NULL UNIQUE,
        code_verifier TEXT NOT NULL,
        code_challenge TEXT NOT NULL,
        redirect_uri TEXT NOT NULL,
        scope TEXT NOT NULL,
        expires_at TEXT NOT NULL,
        created_at TEXT NOT NULL,
        consumed_at TEXT
      );
      CREATE TABLE IF NOT EXISTS user_authorizations (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        api_document_id TEXT NOT NULL,
        auth_config_id TEXT NOT NULL,
        access_token TEXT NOT NULL,
        refresh_token TEXT,
        token_type TEXT NOT NULL,
        scope TEXT,
        expires_at TEXT,
        provider_subject TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE (user_id, api_document_id)
      );
      CREATE TABLE IF NOT EXISTS api_call_logs (
        id TEXT PRIMARY KEY,
        endpoint_id TEXT NOT NULL,
        api_document_id TEXT NOT NULL,
        protocol TEXT NOT NULL,
        operation_kind TEXT NOT NULL,
        request TEXT NOT NULL,
        response TEXT,
        status TEXT NOT NULL,
        status_code INTEGER,
        error TEXT,
        error_kind TEXT,
        latency_ms INTEGER NOT NULL,
        timestamp TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_call_logs_ts ON api_call_logs(timestamp);
      CREATE INDEX IF NOT EXISTS idx_call_logs_endpoint ON api_call_logs(endpoint_id);
    `);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ---- Specifications & documents ----

  insertSpecification(spec: Specification) {
    this.db.prepare(`
      INSERT INTO api_specifications (id, name, family, raw_content, resolved_content, version, servers, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      spec.id, spec.name, spec.family, spec.rawContent, JSON.stringify(spec.resolvedContent),
      spec.version, JSON.stringify(spec.servers), spec.createdAt,
    );
  }

  getSpecification(id: string): Specification | undefined {
    const row = this.db.prepare<[string], SpecRow>("SELECT * FROM api_specifications WHERE id = ?").get(id);
    return row && rowToSpecification(row);
  }

  listSpecifications(): Specification[] {
    return this.db.prepare<[], SpecRow>("SELECT * FROM api_specifications ORDER BY created_at, rowid").all().map(rowToSpecification);
  }

  insertApiDocument(doc: ApiDocument) {
    this.db.prepare(`
      INSERT INTO api_documents (id, spec_id, name, version, family, base_address, servers, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(doc.id, doc.specId, doc.name, doc.version, doc.family, doc.baseAddress, JSON.stringify(doc.servers), doc.createdAt);
  }

  getApiDocument(id: string): ApiDocument | undefined {
    const row = this.db.prepare<[string], DocumentRow>("SELECT * FROM api_documents WHERE id = ?").get(id);
    return row && rowToDocument(row);
  }

  listApiDocuments(): ApiDocument[] {
    return this.db.prepare<[], DocumentRow>("SELECT * FROM api_documents ORDER BY created_at, rowid").all().map(rowToDocument);
  }

  updateApiDocument(id: string, patch: DocumentPatch): ApiDocument | undefined {
    const current = this.getApiDocument(id);
    if (!current) return undefined;
    const next = { ...current, ...patch };
    this.db.prepare("UPDATE api_documents SET name = ?, version = ?, base_address = ? WHERE id = ?")
      .run(next.name, next.version, next.baseAddress, id);
    return next;
  }

  deleteApiDocument(id: string): boolean {
    return this.transaction(() => {
      this.db.prepare("DELETE FROM api_endpoints WHERE api_document_id = ?").run(id);
      this.db.prepare("DELETE FROM api_auth_configs WHERE api_document_id = ?").run(id);
      this.db.prepare("DELETE FROM oauth2_auth_states WHERE api_document_id = ?").run(id);
      this.db.prepare("DELETE FROM user_authorizations WHERE api_document_id = ?").run(id);
      return this.db.prepare("DELETE FROM api_documents WHERE id = ?").run(id).changes > 0;
    });
  }

  // ---- Endpoints ----

  insertEndpoints(endpoints: Endpoint[]) {
    const stmt = this.db.prepare(`
      INSERT INTO api_endpoints (id, api_document_id, address_pattern, protocol, operation_kind, operation_id, description,
        parameters, request_schema, response_schema, security_requirements, tags,
        call_count, success_count, error_count, avg_latency_ms, last_called_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    for (const e of endpoints) {
      stmt.run(
        e.id, e.apiDocumentId, e.addressPattern, e.protocol, e.operationKind, e.operationId ?? null, e.description,
        JSON.stringify(e.parameters), jsonOrNull(e.requestSchema), jsonOrNull(e.responseSchema),
        JSON.stringify(e.securityRequirements), JSON.stringify(e.tags),
        e.stats.callCount, e.stats.successCount, e.stats.errorCount, e.stats.avgLatencyMs, e.stats.lastCalledAt ?? null,
      );
    }
  }

  getEndpoint(id: string): Endpoint | undefined {
    const row = this.db.prepare<[string], EndpointRow>("SELECT * FROM api_endpoints WHERE id = ?").get(id);
    return row && rowToEndpoint(row);
  }

  listEndpoints(apiDocumentId?: string): Endpoint[] {
    if (apiDocumentId) {
      return this.db
        .prepare<[string], EndpointRow>("SELECT * FROM api_endpoints WHERE api_document_id = ? ORDER BY rowid")
        .all(apiDocumentId)
        .map(rowToEndpoint);
    }
    return this.db.prepare<[], EndpointRow>("SELECT * FROM api_endpoints ORDER BY rowid").all().map(rowToEndpoint);
  }

  recordCallStats(endpointId: string, success: boolean, latencyMs: number, at: string) {
    // SET expressions read pre-update values, so the running mean uses the old count
    this.db.prepare(`
      UPDATE api_endpoints SET
        call_count = call_count + 1,
        success_count = success_count + ?,
        error_count = error_count + ?,
        avg_latency_ms = (avg_latency_ms * call_count + ?) / (call_count + 1),
        last_called_at = ?
      WHERE id = ?
    `).run(success ? 1 : 0, success ? 0 : 1, latencyMs, at, endpointId);
  }

  // ---- Auth configs ----

  insertAuthConfig(c: AuthConfig) {
    this.db.prepare(`
      INSERT INTO api_auth_configs (id, api_document_id, scheme, scheme_name, config, required, global, priority, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      c.id, c.apiDocumentId, c.scheme, c.schemeName ?? null, JSON.stringify(c.config),
      c.required ? 1 : 0, c.global ? 1 : 0, c.priority, c.createdAt,
    );
  }

  getAuthConfig(id: string): AuthConfig | undefined {
    const row = this.db.prepare<[string], AuthConfigRow>("SELECT * FROM api_auth_configs WHERE id = ?").get(id);
    return row && rowToAuthConfig(row);
  }

  listAuthConfigs(apiDocumentId: string): AuthConfig[] {
    return this.db
      .prepare<[string], AuthConfigRow>("SELECT * FROM api_auth_configs WHERE api_document_id = ? ORDER BY created_at, rowid")
      .all(apiDocumentId)
      .map(rowToAuthConfig);
  }

  updateAuthConfig(id: string, patch: AuthConfigPatch): AuthConfig | undefined {
    const current = this.getAuthConfig(id);
    if (!current) return undefined;
    const next: AuthConfig = { ...current, ...patch };
    this.db.prepare(`
      UPDATE api_auth_configs SET scheme_name = ?, config = ?, required = ?, global = ?, priority = ? WHERE id = ?
    `).run(next.schemeName ?? null, JSON.stringify(next.config), next.required ? 1 : 0, next.global ? 1 : 0, next.priority, id);
    return next;
  }

  deleteAuthConfig(id: string): boolean {
    return this.db.prepare("DELETE FROM api_auth_configs WHERE id = ?").run(id).changes > 0;
  }

  // ---- OAuth2 ----

  insertAuthState(s: OAuth2AuthState) {
    this.db.prepare(`
      INSERT INTO oauth2_auth_states (id, auth_config_id, user_id, api_document_id, state_nonce, code_verifier,
        code_challenge, redirect_uri, scope, expires_at, created_at, consumed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      s.id, s.authConfigId, s.userId, s.apiDocumentId, s.stateNonce, s.codeVerifier,
      s.codeChallenge, s.redirectUri, s.scope, s.expiresAt, s.createdAt, s.consumedAt ?? null,
    );
  }

  getAuthState(id: string): OAuth2AuthState | undefined {
    const row = this.db.prepare<[string], AuthStateRow>("SELECT * FROM oauth2_auth_states WHERE id = ?").get(id);
    return row && rowToAuthState(row);
  }

  consumeAuthState(id: string, at: string): boolean {
    return this.db.prepare("UPDATE oauth2_auth_states SET consumed_at = ? WHERE id = ? AND consumed_at IS NULL")
      .run(at, id).changes === 1;
  }

  saveUserAuthorization(a: UserAuthorization): UserAuthorization {
    this.db.prepare(`
      INSERT INTO user_authorizations (id, user_id, api_document_id, auth_config_id, access_token, refresh_token,
        token_type, scope, expires_at, provider_subject, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (user_id, api_document_id) DO UPDATE SET
        auth_config_id = excluded.auth_config_id,
        access_token = excluded.access_token,
        refresh_token = excluded.refresh_token,
        token_type = excluded.token_type,
        scope = excluded.scope,
        expires_at = excluded.expires_at,
        provider_subject = excluded.provider_subject,
        updated_at = excluded.updated_at
    `).run(
      a.id, a.userId, a.apiDocumentId, a.authConfigId, a.accessToken, a.refreshToken ?? null,
      a.tokenType, a.scope ?? null, a.expiresAt ?? null, a.providerSubject ?? null, a.createdAt, a.updatedAt,
    );
    return this.getUserAuthorization(a.userId, a.apiDocumentId) ?? a;
  }

  getUserAuthorization(userId: string, apiDocumentId: string): UserAuthorization | undefined {
    const row = this.db
      .prepare<[string, string], UserAuthorizationRow>("SELECT * FROM user_authorizations WHERE user_id = ? AND api_document_id = ?")
      .get(userId, apiDocumentId);
    return row && rowToUserAuthorization(row);
  }

  listUserAuthorizations(userId: string): UserAuthorization[] {
    return this.db
      .prepare<[string], UserAuthorizationRow>("SELECT * FROM user_authorizations WHERE user_id = ? ORDER BY created_at, rowid")
      .all(userId)
      .map(rowToUserAuthorization);
  }

  // ---- Call log ----

  appendCallLog(e: CallLogEntry) {
    this.db.prepare(`
      INSERT INTO api_call_logs (id, endpoint_id, api_document_id, protocol, operation_kind, request, response,
        status, status_code, error, error_kind, latency_ms, timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      e.id, e.endpointId, e.apiDocumentId, e.protocol, e.operationKind, e.request, e.response ?? null,
      e.status, e.statusCode ?? null, e.error ?? null, e.errorKind ?? null, Math.round(e.latencyMs), e.timestamp,
    );
  }

  queryCallLogs(query: CallLogQuery = {}): CallLogEntry[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (query.endpointId) { conditions.push("endpoint_id = ?"); params.push(query.endpointId); }
    if (query.apiDocumentId) { conditions.push("api_document_id = ?"); params.push(query.apiDocumentId); }
    if (query.status) { conditions.push("status = ?"); params.push(query.status); }

    const where = conditions.length ? `WHERE ${conditions.join(" AND ")}` : "";
    return this.db
      .prepare<(string | number)[], CallLogRow>(
        `SELECT * FROM api_call_logs ${where} ORDER BY timestamp DESC, rowid DESC LIMIT ? OFFSET ?`,
      )
      .all(...params, query.limit ?? 100, query.offset ?? 0)
      .map(rowToCallLog);
  }

  close() {
    this.db.close();
  }
}

// ---- Helpers ----

function jsonOrNull(value: unknown): string | null {
  return value === undefined ? null : JSON.stringify(value);
}

function toOperationKind(value: string): OperationKind {
  if (value === "publish" || value === "subscribe") return value;
  const method = HTTP_METHODS.find((m) => m === value);
  if (!method) throw new Error(`Corrupt endpoint row: unknown operation kind "${value}"`);
  return method;
}

function rowToSpecification(r: SpecRow): Specification {
  return {
    id: r.id, name: r.name, family: r.family, rawContent: r.raw_content,
    resolvedContent: JSON.parse(r.resolved_content), version: r.version,
    servers: JSON.parse(r.servers), createdAt: r.created_at,
  };
}

function rowToDocument(r: DocumentRow): ApiDocument {
  return {
    id: r.id, specId: r.spec_id, name: r.name, version: r.version, family: r.family,
    baseAddress: r.base_address, servers: JSON.parse(r.servers), createdAt: r.created_at,
  };
}

function rowToEndpoint(r: EndpointRow): Endpoint {
  return {
    id: r.id,
    apiDocumentId: r.api_document_id,
    addressPattern: r.address_pattern,
    protocol: r.protocol,
    operationKind: toOperationKind(r.operation_kind),
    operationId: r.operation_id ?? undefined,
    description: r.description,
    parameters: JSON.parse(r.parameters),
    requestSchema: r.request_schema ? JSON.parse(r.request_schema) : undefined,
    responseSchema: r.response_schema ? JSON.parse(r.response_schema) : undefined,
    securityRequirements: JSON.parse(r.security_requirements),
    tags: JSON.parse(r.tags),
    stats: {
      callCount: r.call_count,
      successCount: r.success_count,
      errorCount: r.error_count,
      avgLatencyMs: r.avg_latency_ms,
      lastCalledAt: r.last_called_at ?? undefined,
    },
  };
}

function rowToAuthConfig(r: AuthConfigRow): AuthConfig {
  if (!isAuthScheme(r.scheme)) throw new Error(`Corrupt auth config row: unknown scheme "${r.scheme}"`);
  return {
    id: r.id, apiDocumentId: r.api_document_id, scheme: r.scheme, schemeName: r.scheme_name ?? undefined,
    config: JSON.parse(r.config), required: r.required === 1, global: r.global === 1,
    priority: r.priority, createdAt: r.created_at,
  };
}

function rowToAuthState(r: AuthStateRow): OAuth2AuthState {
  return {
    id: r.id, authConfigId: r.auth_config_id, userId: r.user_id, apiDocumentId: r.api_document_id,
    stateNonce: r.state_nonce, codeVerifier: r.code_verifier, codeChallenge: r.code_challenge,
    redirectUri: r.redirect_uri, scope: r.scope, expiresAt: r.expires_at, createdAt: r.created_at,
    consumedAt: r.consumed_at ?? undefined,
  };
}

function rowToUserAuthorization(r: UserAuthorizationRow): UserAuthorization {
  return {
    id: r.id, userId: r.user_id, apiDocumentId: r.api_document_id, authConfigId: r.auth_config_id,
    accessToken: r.access_token, refreshToken: r.refresh_token ?? undefined, tokenType: r.token_type,
    scope: r.scope ?? undefined, expiresAt: r.expires_at ?? undefined,
    providerSubject: r.provider_subject ?? undefined, createdAt: r.created_at, updatedAt: r.updated_at,
  };
}

function rowToCallLog(r: CallLogRow): CallLogEntry {
  return {
    id: r.id, endpointId: r.endpoint_id, apiDocumentId: r.api_document_id, protocol: r.protocol,
    operationKind: toOperationKind(r.operation_kind), request: r.request, response: r.response ?? undefined,
    status: r.status === "success" ? "success" : "error", statusCode: r.status_code ?? undefined,
    error: r.error ?? undefined, errorKind: r.error_kind ?? undefined, latencyMs: r.latency_ms, timestamp: r.timestamp,
  };
}
