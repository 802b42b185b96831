import { z } from "zod";
import { AuthenticationFailedError, AuthorizationExpiredError, InvalidConfigurationError } from "./errors.js";
import type { AuthAttempt } from "./errors.js";
import type { Logger } from "./middleware.js";
import { setHeader } from "./request.js";
import type { GatewayStore } from "./storage.js";
import type { AuthConfig, AuthConfigInput, AuthScheme, Endpoint, JsonObject, WireRequest } from "./types.js";

// ---- Scheme material ----

export const basicSchema = z.object({
  username: z.string().min(1),
  password: z.string(),
});

export const bearerSchema = z.object({
  token: z.string().min(1),
});

export const apiKeySchema = z.object({
  location: z.enum(["header", "query", "cookie"]),
  name: z.string().min(1),
  value: z.string().min(1),
});

export const oauth2Schema = z.object({
  authorization_url: z.string().url(),
  token_url: z.string().url(),
  client_id: z.string().min(1),
  client_secret: z.string().optional(),
  redirect_uri: z.string().url(),
  scope: z.string().default(""),
  userinfo_url: z.string().url().optional(),
});

export type OAuth2Settings = z.infer<typeof oauth2Schema>;

const SCHEMAS = {
  basic: basicSchema,
  bearer: bearerSchema,
  api_key: apiKeySchema,
  oauth2: oauth2Schema,
} satisfies Record<AuthScheme, z.ZodTypeAny>;

export const AUTH_SCHEMES = Object.keys(SCHEMAS);

export function isAuthScheme(value: unknown): value is AuthScheme {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SCHEMAS, value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
}

/**
 * Check an auth config's scheme and material before it is stored.
 */
export function validateAuthConfig(input: AuthConfigInput): AuthConfigInput {
  if (!isAuthScheme(input.scheme)) {
    throw new InvalidConfigurationError(`Unsupported auth scheme "${String(input.scheme)}"`, {
      supported: AUTH_SCHEMES,
    });
  }
  const result = SCHEMAS[input.scheme].safeParse(input.config);
  if (!result.success) {
    throw new InvalidConfigurationError(`Invalid ${input.scheme} config: ${describeIssues(result.error)}`);
  }
  if (input.priority !== undefined && !Number.isFinite(input.priority)) {
    throw new InvalidConfigurationError("priority must be a finite number");
  }
  return input;
}

export function parseOAuth2Settings(config: JsonObject): OAuth2Settings {
  const result = oauth2Schema.safeParse(config);
  if (!result.success) {
    throw new InvalidConfigurationError(`Invalid oauth2 config: ${describeIssues(result.error)}`);
  }
  return result.data;
}

// ---- Dispatch ----

export interface AuthOutcome {
  applied?: AuthConfig;
  attempts: AuthAttempt[];
}

export interface AuthDispatcherOptions {
  logger: Logger;
  now?: () => Date;
}

type AuthStore = Pick<GatewayStore, "listAuthConfigs" | "getUserAuthorization">;

/**
 * Applies the highest-priority satisfiable credentials of a document to a request.
 */
export class AuthDispatcher {
  private now: () => Date;

  constructor(private store: AuthStore, private options: AuthDispatcherOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Try each applicable config in descending priority; the first whose
   * inputs are satisfiable is applied to `request`. When configs apply
   * but none can be satisfied the call fails; a failing `required` config
   * fails it at once, before lower priorities are tried.
   */
  apply(request: WireRequest, endpoint: Endpoint, userId?: string): AuthOutcome {
    const configs = this.store
      .listAuthConfigs(endpoint.apiDocumentId)
      .filter((c) => appliesTo(c, endpoint))
      .sort((a, b) => b.priority - a.priority);

    const attempts: AuthAttempt[] = [];
    if (!configs.length) return { attempts };

    for (const config of configs) {
      const reason = this.attempt(request, endpoint, config, userId);
      attempts.push({ configId: config.id, scheme: config.scheme, priority: config.priority, ok: !reason, reason });
      if (!reason) {
        this.options.logger.debug("auth applied", { endpointId: endpoint.id, scheme: config.scheme, priority: config.priority });
        return { applied: config, attempts };
      }
      if (config.required) {
        throw new AuthenticationFailedError(
          `Required ${config.scheme} credentials could not be applied: ${summarize(attempts)}`,
          attempts,
        );
      }
    }

    throw new AuthenticationFailedError(`No credentials could be applied: ${summarize(attempts)}`, attempts);
  }

  // Returns the failure reason, or undefined once the request carries credentials.
  // Channel endpoints take credentials at connect time instead of in headers.
  private attempt(request: WireRequest, endpoint: Endpoint, config: AuthConfig, userId?: string): string | undefined {
    const channel = endpoint.protocol !== "http";
    switch (config.scheme) {
      case "basic": {
        const parsed = basicSchema.safeParse(config.config);
        if (!parsed.success) return describeIssues(parsed.error);
        const { username, password } = parsed.data;
        if (channel) request.credentials = { username, password };
        else setHeader(request.headers, "Authorization", `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`);
        return undefined;
      }
      case "bearer": {
        const parsed = bearerSchema.safeParse(config.config);
        if (!parsed.success) return describeIssues(parsed.error);
        presentToken(request, channel, parsed.data.token);
        return undefined;
      }
      case "api_key": {
        const parsed = apiKeySchema.safeParse(config.config);
        if (!parsed.success) return describeIssues(parsed.error);
        const { location, name, value } = parsed.data;
        if (channel) {
          // Only the WebSocket upgrade request has headers to carry a key
          if (location !== "header" || endpoint.protocol !== "websocket") {
            return `api_key in ${location} cannot be sent over ${endpoint.protocol}`;
          }
          request.credentials = { headers: { [name]: value } };
        } else if (location === "header") setHeader(request.headers, name, value);
        else if (location === "query") request.query[name] = value;
        else request.cookies[name] = value;
        return undefined;
      }
      case "oauth2": {
        if (!userId) return "no user context for OAuth2";
        const authorization = this.store.getUserAuthorization(userId, config.apiDocumentId);
        if (!authorization) return "user has not authorized this API";
        if (authorization.expiresAt && Date.parse(authorization.expiresAt) <= this.now().getTime()) {
          throw new AuthorizationExpiredError(userId, config.apiDocumentId);
        }
        presentToken(request, channel, authorization.accessToken);
        return undefined;
      }
    }
  }
}

function presentToken(request: WireRequest, channel: boolean, token: string) {
  if (channel) request.credentials = { token };
  else setHeader(request.headers, "Authorization", `Bearer ${token}`);
}

function summarize(attempts: AuthAttempt[]): string {
  return attempts.map((a) => `${a.scheme}(priority ${a.priority}): ${a.reason}`).join("; ");
}

function appliesTo(config: AuthConfig, endpoint: Endpoint): boolean {
  if (config.global) return true;
  return config.schemeName !== undefined && endpoint.securityRequirements.some((r) => r.scheme === config.schemeName);
}
