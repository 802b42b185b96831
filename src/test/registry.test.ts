import { describe, it, expect } from "vitest";
import { Registry } from "../registry.js";
import { createDefaultRegistry } from "../plugins.js";
import { OpenApiParser, OpenApiSpec } from "../openapi.js";
import { RestExecutor } from "../executors.js";
import { UnsupportedFamilyError, UnsupportedProtocolError } from "../errors.js";
import { Logger, RequestTracker } from "../middleware.js";
import type { ProtocolAdapterOptions } from "../types.js";

const options: ProtocolAdapterOptions = {
  logger: new Logger("error"),
  tracker: new RequestTracker(),
  timeoutMs: 1000,
  connectTimeoutMs: 1000,
  clientId: "test",
};

describe("Registry", () => {
  it("reports which roles a family is missing", () => {
    const registry = new Registry();
    registry.registerSpecModel("rest", OpenApiSpec);
    registry.registerParser("rest", new OpenApiParser());

    expect(registry.validateCompleteness("rest")).toEqual({
      family: "rest", hasModel: true, hasParser: true, hasExecutor: false, complete: false,
    });
    registry.registerExecutor("rest", new RestExecutor());
    expect(registry.validateCompleteness("rest").complete).toBe(true);
    expect(registry.validateCompleteness("graphql").complete).toBe(false);
  });

  it("only detects complete families", () => {
    const registry = new Registry();
    registry.registerSpecModel("rest", OpenApiSpec);
    expect(() => registry.detectFamily({ openapi: "3.0.0" })).toThrow(UnsupportedFamilyError);

    registry.registerSpecFamily("rest", OpenApiSpec, new OpenApiParser(), new RestExecutor());
    expect(registry.detectFamily({ openapi: "3.0.0" })).toBe("rest");
  });

  it("honours a family hint and rejects unknown hints", () => {
    const registry = createDefaultRegistry();
    expect(registry.detectFamily({ anything: true }, "pubsub")).toBe("pubsub");
    expect(() => registry.detectFamily({ openapi: "3.0.0" }, "soap")).toThrow(UnsupportedFamilyError);
  });

  it("replaces registrations with the same name", () => {
    const registry = new Registry();
    let built = "";
    registry.registerProtocol("http", () => {
      built = "first";
      return createDefaultRegistry().createAdapter("http", options);
    });
    registry.registerProtocol("http", () => {
      built = "second";
      return createDefaultRegistry().createAdapter("http", options);
    });
    registry.createAdapter("http", options);
    expect(built).toBe("second");
    expect(registry.listProtocols()).toEqual(["http"]);
  });

  it("rejects protocols without an adapter", () => {
    expect(() => new Registry().createAdapter("smtp", options)).toThrow(UnsupportedProtocolError);
  });
});

describe("createDefaultRegistry", () => {
  const registry = createDefaultRegistry();

  it("registers both families and every transport", () => {
    expect(registry.listFamilies()).toEqual(["rest", "pubsub"]);
    expect(registry.listProtocols()).toEqual(["http", "websocket", "mqtt", "amqp", "kafka", "nats"]);
  });

  it("detects families from their markers", () => {
    expect(registry.detectFamily({ openapi: "3.0.3" })).toBe("rest");
    expect(registry.detectFamily({ asyncapi: "2.6.0" })).toBe("pubsub");
    expect(() => registry.detectFamily({ swagger: "2.0" })).toThrow(UnsupportedFamilyError);
  });

  it("builds adapters of the right kind", () => {
    expect(registry.createAdapter("http", options).kind).toBe("request-response");
    const mqtt = registry.createAdapter("mqtt", options);
    expect(mqtt.kind).toBe("pubsub");
    expect(mqtt.protocol).toBe("mqtt");
  });
});
