/**
 * OAuth2 authorization-code flow with PKCE (S256).
 *
 *   NO_AUTHORIZATION --initiateAuthorization--> AWAITING_CALLBACK
 *   AWAITING_CALLBACK --handleCallback--> AUTHORIZED
 *   AUTHORIZED --(expires_at passes, detected at call time)--> EXPIRED
 *
 * States are single use: the row is marked consumed before the code is
 * exchanged, so a replayed callback fails even if the first is in flight.
 */

import { createHash, randomBytes, randomUUID, timingSafeEqual } from "crypto";
import { z } from "zod";
import { parseOAuth2Settings } from "./auth.js";
import type { OAuth2Settings } from "./auth.js";
import {
  AuthenticationFailedError,
  ExpiredStateError,
  InvalidConfigurationError,
  InvalidStateError,
  TransportConnectionError,
  classifyConnectionFailure,
  errorMessage,
} from "./errors.js";
import type { Logger, RequestTracker } from "./middleware.js";
import { isRecord } from "./spec.js";
import type { GatewayStore } from "./storage.js";
import type { AuthConfig, AuthorizationStart, UserAuthorization } from "./types.js";

export const DEFAULT_STATE_TTL_MINUTES = 10;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  expires_in: z.coerce.number().positive().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  sub: z.string().optional(),
  user_id: z.union([z.string(), z.number()]).optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

export interface PkcePair {
  verifier: string;
  challenge: string;
}

/** base64url SHA-256 of the verifier, unpadded. */
export function pkceChallenge(verifier: string): string {
  return createHash("sha256").update(verifier).digest("base64url");
}

export function generatePkcePair(): PkcePair {
  const verifier = randomBytes(32).toString("base64url");
  return { verifier, challenge: pkceChallenge(verifier) };
}

type OAuthStore = Pick<
  GatewayStore,
  | "listAuthConfigs"
  | "getAuthConfig"
  | "insertAuthState"
  | "getAuthState"
  | "consumeAuthState"
  | "saveUserAuthorization"
  | "getUserAuthorization"
>;

export interface OAuth2FlowOptions {
  logger: Logger;
  tracker: RequestTracker;
  stateTtlMinutes?: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
  now?: () => Date;
}

export class OAuth2Flow {
  private fetchImpl: typeof fetch;
  private now: () => Date;
  private ttlMs: number;
  private timeoutMs: number;
  private logger: Logger;

  constructor(private store: OAuthStore, private options: OAuth2FlowOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.ttlMs = (options.stateTtlMinutes ?? DEFAULT_STATE_TTL_MINUTES) * 60_000;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger.child({ component: "oauth2" });
  }

  /**
   * Start authorization for (user, document): persist a PKCE state and
   * return the provider URL the user should visit.
   */
  initiateAuthorization(userId: string, documentId: string): AuthorizationStart {
    const config = this.oauthConfig(documentId);
    const settings = parseOAuth2Settings(config.config);
    const { verifier, challenge } = generatePkcePair();
    const now = this.now();
    const expiresAt = new Date(now.getTime() + this.ttlMs).toISOString();
    const stateId = randomUUID();
    const stateNonce = randomBytes(24).toString("base64url");

    this.store.insertAuthState({
      id: stateId,
      authConfigId: config.id,
      userId,
      apiDocumentId: documentId,
      stateNonce,
      codeVerifier: verifier,
      codeChallenge: challenge,
      redirectUri: settings.redirect_uri,
      scope: settings.scope,
      expiresAt,
      createdAt: now.toISOString(),
    });

    const url = new URL(settings.authorization_url);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("client_id", settings.client_id);
    url.searchParams.set("redirect_uri", settings.redirect_uri);
    url.searchParams.set("scope", settings.scope);
    url.searchParams.set("state", stateNonce);
    url.searchParams.set("code_challenge", challenge);
    url.searchParams.set("code_challenge_method", "S256");

    this.logger.info("authorization started", { stateId, userId, documentId });
    return { stateId, authorizationUrl: url.toString(), expiresAt };
  }

  /**
   * Complete the flow: check and consume the state, exchange the code,
   * persist the user's tokens.
   */
  async handleCallback(stateId: string, code: string, state: string): Promise<UserAuthorization> {
    const stored = this.store.getAuthState(stateId);
    if (!stored) throw new InvalidStateError("unknown state");
    if (stored.consumedAt) throw new InvalidStateError("state already consumed");
    if (!sameSecret(stored.stateNonce, state)) throw new InvalidStateError("state parameter does not match");

    const now = this.now();
    if (Date.parse(stored.expiresAt) <= now.getTime()) throw new ExpiredStateError(stateId);
    if (!this.store.consumeAuthState(stateId, now.toISOString())) {
      throw new InvalidStateError("state already consumed");
    }

    const config = this.store.getAuthConfig(stored.authConfigId);
    if (!config) throw new InvalidStateError("auth config for this state no longer exists");
    const settings = parseOAuth2Settings(config.config);

    const form: Record<string, string> = {
      grant_type: "authorization_code",
      code,
      redirect_uri: stored.redirectUri,
      client_id: settings.client_id,
      code_verifier: stored.codeVerifier,
    };
    if (settings.client_secret) form.client_secret = settings.client_secret;

    const tokens = await this.tokenRequest(settings, form);
    const subject = await this.providerSubject(settings, tokens);

    const authorization = this.store.saveUserAuthorization({
      id: randomUUID(),
      userId: stored.userId,
      apiDocumentId: stored.apiDocumentId,
      authConfigId: config.id,
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token,
      tokenType: tokens.token_type,
      scope: tokens.scope ?? (stored.scope || undefined),
      expiresAt: this.expiry(tokens),
      providerSubject: subject,
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    });

    this.logger.info("authorization completed", { stateId, userId: stored.userId, documentId: stored.apiDocumentId });
    return authorization;
  }

  /**
   * Explicit refresh-token exchange. Never triggered automatically.
   */
  async refreshAuthorization(userId: string, documentId: string): Promise<UserAuthorization> {
    const existing = this.store.getUserAuthorization(userId, documentId);
    if (!existing) throw new AuthenticationFailedError("No authorization to refresh for this user and document");
    if (!existing.refreshToken) throw new AuthenticationFailedError("Authorization has no refresh token; re-authorize");

    const config = this.store.getAuthConfig(existing.authConfigId);
    if (!config) throw new AuthenticationFailedError("Auth config for this authorization no longer exists");
    const settings = parseOAuth2Settings(config.config);

    const form: Record<string, string> = {
      grant_type: "refresh_token",
      refresh_token: existing.refreshToken,
      client_id: settings.client_id,
    };
    if (settings.client_secret) form.client_secret = settings.client_secret;

    const tokens = await this.tokenRequest(settings, form);
    const refreshed = this.store.saveUserAuthorization({
      ...existing,
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token ?? existing.refreshToken,
      tokenType: tokens.token_type,
      scope: tokens.scope ?? existing.scope,
      expiresAt: this.expiry(tokens),
      updatedAt: this.now().toISOString(),
    });

    this.logger.info("authorization refreshed", { userId, documentId });
    return refreshed;
  }

  private oauthConfig(documentId: string): AuthConfig {
    const config = this.store
      .listAuthConfigs(documentId)
      .filter((c) => c.scheme === "oauth2")
      .sort((a, b) => b.priority - a.priority)[0];
    if (!config) {
      throw new InvalidConfigurationError("Document has no oauth2 auth config", { documentId });
    }
    return config;
  }

  private expiry(tokens: TokenResponse): string | undefined {
    if (tokens.expires_in === undefined) return undefined;
    return new Date(this.now().getTime() + tokens.expires_in * 1000).toISOString();
  }

  private async tokenRequest(settings: OAuth2Settings, form: Record<string, string>): Promise<TokenResponse> {
    const body = await this.send(settings.token_url, {
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded", accept: "application/json" },
      body: new URLSearchParams(form).toString(),
    });

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthenticationFailedError("Token endpoint returned an invalid token response");
    }
    return parsed.data;
  }

  private async providerSubject(settings: OAuth2Settings, tokens: TokenResponse): Promise<string | undefined> {
    if (settings.userinfo_url) {
      const info = await this.send(settings.userinfo_url, {
        method: "GET",
        headers: { authorization: `Bearer ${tokens.access_token}`, accept: "application/json" },
      });
      if (isRecord(info)) {
        const id = info.sub ?? info.id;
        if (typeof id === "string" || typeof id === "number") return String(id);
      }
    }
    if (tokens.sub) return tokens.sub;
    return tokens.user_id === undefined ? undefined : String(tokens.user_id);
  }

  // Error messages carry the provider's status and error code only; the
  // request form (verifier, secret) never appears in them.
  private async send(url: string, init: RequestInit): Promise<unknown> {
    const ctx = this.options.tracker.start(this.timeoutMs, url);
    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(url, { ...init, signal: ctx.abortController.signal });
      text = await res.text();
    } catch (err) {
      const reason: unknown = ctx.abortController.signal.reason;
      if (ctx.abortController.signal.aborted && reason instanceof Error) throw reason;
      throw new TransportConnectionError(url, classifyConnectionFailure(err), errorMessage(err));
    } finally {
      this.options.tracker.complete(ctx.requestId);
    }

    let body: unknown = text;
    try {
      body = text ? JSON.parse(text) : {};
    } catch {
      body = text;
    }

    if (!res.ok) {
      const providerError = isRecord(body) && typeof body.error === "string" ? `: ${body.error}` : "";
      throw new AuthenticationFailedError(`OAuth2 provider returned HTTP ${res.status}${providerError}`);
    }
    return body;
  }
}

function sameSecret(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}
