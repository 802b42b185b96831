/**
 * Structured error taxonomy. Every failure the gateway reports carries a
 * `kind` so front-ends can map it (to an HTTP status, an MCP error, ...)
 * without string matching.
 */

export type GatewayErrorKind =
  | "MalformedReferenceError"
  | "UnsupportedReferenceError"
  | "InvalidSpecificationError"
  | "UnsupportedFamilyError"
  | "UnsupportedProtocolError"
  | "MissingRequiredParameterError"
  | "TypeMismatchError"
  | "EndpointNotFoundError"
  | "AuthenticationFailedError"
  | "InvalidStateError"
  | "ExpiredStateError"
  | "AuthorizationExpiredError"
  | "TransportTimeoutError"
  | "TransportConnectionError"
  | "InvalidConfigurationError"
  | "InternalError";

export interface ErrorResponse {
  kind: GatewayErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: GatewayErrorKind,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.details = options.details;
  }

  toResponse(): ErrorResponse {
    const res: ErrorResponse = { kind: this.kind, message: this.message };
    if (this.details) res.details = this.details;
    return res;
  }
}

// ---- Specification / registration ----

export class MalformedReferenceError extends GatewayError {
  constructor(readonly ref: string, reason: string) {
    super("MalformedReferenceError", `Cannot resolve $ref "${ref}": ${reason}`, { details: { ref } });
  }
}

export class UnsupportedReferenceError extends GatewayError {
  constructor(readonly ref: string) {
    super("UnsupportedReferenceError", `Unsupported $ref form "${ref}" (only "#/..." and http(s) URLs are resolved)`, {
      details: { ref },
    });
  }
}

export class InvalidSpecificationError extends GatewayError {
  constructor(readonly field: string, reason: string) {
    super("InvalidSpecificationError", `Invalid specification at "${field}": ${reason}`, { details: { field } });
  }
}

export class UnsupportedFamilyError extends GatewayError {
  constructor(hint?: string) {
    super(
      "UnsupportedFamilyError",
      hint ? `No registered spec family named "${hint}"` : "No registered spec family can parse this document",
      hint ? { details: { family: hint } } : {},
    );
  }
}

export class UnsupportedProtocolError extends GatewayError {
  constructor(readonly protocol: string, where?: string) {
    super(
      "UnsupportedProtocolError",
      where ? `No adapter for protocol "${protocol}" (${where})` : `No adapter for protocol "${protocol}"`,
      { details: { protocol } },
    );
  }
}

// ---- Request building ----

export class MissingRequiredParameterError extends GatewayError {
  constructor(readonly parameter: string) {
    super("MissingRequiredParameterError", `Missing required parameter "${parameter}"`, { details: { parameter } });
  }
}

export class TypeMismatchError extends GatewayError {
  constructor(readonly parameter: string, readonly expected: string) {
    super("TypeMismatchError", `Parameter "${parameter}" cannot be coerced to ${expected}`, {
      details: { parameter, expected },
    });
  }
}

export class EndpointNotFoundError extends GatewayError {
  constructor(what: string) {
    super("EndpointNotFoundError", `Endpoint not found: ${what}`);
  }
}

// ---- Authentication ----

export interface AuthAttempt {
  configId: string;
  scheme: string;
  priority: number;
  ok: boolean;
  reason?: string;
}

export class AuthenticationFailedError extends GatewayError {
  constructor(message: string, readonly attempts: AuthAttempt[] = []) {
    super("AuthenticationFailedError", message, attempts.length ? { details: { attempts } } : {});
  }
}

export class InvalidStateError extends GatewayError {
  constructor(reason: string) {
    super("InvalidStateError", `Invalid OAuth2 state: ${reason}`);
  }
}

export class ExpiredStateError extends GatewayError {
  constructor(stateId: string) {
    super("ExpiredStateError", "OAuth2 authorization state has expired", { details: { stateId } });
  }
}

export class AuthorizationExpiredError extends GatewayError {
  constructor(userId: string, documentId: string) {
    super("AuthorizationExpiredError", "OAuth2 authorization expired; re-authorize or refresh", {
      details: { userId, documentId },
    });
  }
}

// ---- Transport ----

export class TransportTimeoutError extends GatewayError {
  constructor(readonly target: string, readonly timeoutMs: number) {
    super("TransportTimeoutError", `Timed out after ${timeoutMs}ms: ${target}`, { details: { target, timeoutMs } });
  }
}

export type ConnectionFailure = "refused" | "dns" | "reset" | "other";

export class TransportConnectionError extends GatewayError {
  constructor(readonly target: string, readonly reason: ConnectionFailure, message: string, cause?: unknown) {
    super("TransportConnectionError", `Connection failed (${reason}) to ${target}: ${message}`, {
      details: { target, reason },
      cause,
    });
  }
}

export class InvalidConfigurationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("InvalidConfigurationError", message, details ? { details } : {});
  }
}

// ---- Helpers ----

const REFUSED = new Set(["ECONNREFUSED"]);
const DNS = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_NODATA"]);
const RESET = new Set(["ECONNRESET", "EPIPE", "ECONNABORTED", "UND_ERR_SOCKET"]);

/** Walk an error's cause chain (and AggregateError members) for a system error code. */
export function errorCode(err: unknown, depth = 0): string | undefined {
  if (depth > 5 || typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if (err instanceof AggregateError) {
    for (const inner of err.errors) {
      const code = errorCode(inner, depth + 1);
      if (code) return code;
    }
  }
  if ("cause" in err) return errorCode(err.cause, depth + 1);
  return undefined;
}

export function classifyConnectionFailure(err: unknown): ConnectionFailure {
  const code = errorCode(err);
  if (!code) return "other";
  if (REFUSED.has(code)) return "refused";
  if (DNS.has(code)) return "dns";
  if (RESET.has(code)) return "reset";
  return "other";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalize anything thrown into a GatewayError. */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  return new GatewayError("InternalError", errorMessage(err), { cause: err });
}
