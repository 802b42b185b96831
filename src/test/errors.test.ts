import { describe, it, expect } from "vitest";
import {
  AuthenticationFailedError,
  GatewayError,
  InvalidSpecificationError,
  MissingRequiredParameterError,
  TransportConnectionError,
  classifyConnectionFailure,
  errorCode,
  toGatewayError,
} from "../errors.js";

function systemError(code: string): Error {
  return Object.assign(new Error(code), { code });
}

describe("GatewayError", () => {
  it("serializes kind, message and details", () => {
    const err = new MissingRequiredParameterError("petId");
    expect(err).toBeInstanceOf(GatewayError);
    expect(err.name).toBe("MissingRequiredParameterError");
    expect(err.toResponse()).toEqual({
      kind: "MissingRequiredParameterError",
      message: 'Missing required parameter "petId"',
      details: { parameter: "petId" },
    });
  });

  it("names the offending field of a specification", () => {
    const err = new InvalidSpecificationError("info.title", "missing or empty");
    expect(err.field).toBe("info.title");
    expect(err.message).toBe('Invalid specification at "info.title": missing or empty');
  });

  it("omits details when there are none", () => {
    expect(new AuthenticationFailedError("no credentials").toResponse()).toEqual({
      kind: "AuthenticationFailedError",
      message: "no credentials",
    });
  });

  it("includes the transport message", () => {
    const err = new TransportConnectionError("http://127.0.0.1:1", "refused", "connect ECONNREFUSED");
    expect(err.message).toBe("Connection failed (refused) to http://127.0.0.1:1: connect ECONNREFUSED");
    expect(err.details).toEqual({ target: "http://127.0.0.1:1", reason: "refused" });
  });
});

describe("connection failure classification", () => {
  it("finds codes on the error, its cause and aggregate members", () => {
    expect(errorCode(systemError("ECONNREFUSED"))).toBe("ECONNREFUSED");
    expect(errorCode(new TypeError("fetch failed", { cause: systemError("ENOTFOUND") }))).toBe("ENOTFOUND");
    expect(errorCode(new AggregateError([new Error("x"), systemError("ECONNRESET")]))).toBe("ECONNRESET");
    expect(errorCode("plain")).toBeUndefined();
  });

  it("maps codes to failure reasons", () => {
    expect(classifyConnectionFailure(systemError("ECONNREFUSED"))).toBe("refused");
    expect(classifyConnectionFailure(systemError("EAI_AGAIN"))).toBe("dns");
    expect(classifyConnectionFailure(systemError("EPIPE"))).toBe("reset");
    expect(classifyConnectionFailure(systemError("EACCES"))).toBe("other");
    expect(classifyConnectionFailure(new Error("no code"))).toBe("other");
  });
});

describe("toGatewayError", () => {
  it("passes gateway errors through and wraps everything else", () => {
    const original = new MissingRequiredParameterError("x");
    expect(toGatewayError(original)).toBe(original);

    const wrapped = toGatewayError(new RangeError("bad"));
    expect(wrapped.kind).toBe("InternalError");
    expect(wrapped.message).toBe("bad");
    expect(toGatewayError("text").message).toBe("text");
  });
});
