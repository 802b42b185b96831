import { describe, it, expect } from "vitest";
import { AsyncApiParser, AsyncApiSpec, bindingProtocol } from "../asyncapi.js";
import { InvalidSpecificationError } from "../errors.js";
import type { JsonObject } from "../types.js";

const message = { name: "UserSignedUp", payload: { type: "object" } };

function document(): JsonObject {
  return {
    asyncapi: "2.6.0",
    info: { title: "Events", version: "2.1.0" },
    servers: {
      production: { url: "broker.example.com:1883", protocol: "mqtt", security: [{ creds: [] }] },
    },
    components: { securitySchemes: { creds: { type: "userPassword" } } },
    channels: {
      "users/{userId}/signedup": {
        parameters: { userId: { schema: { type: "string" }, description: "User id" } },
        bindings: { mqtt: { qos: 1 } },
        publish: { operationId: "publishSignup", message, tags: [{ name: "users" }] },
        subscribe: { operationId: "onSignup", message },
      },
      "audit": {
        description: "Audit stream",
        subscribe: { bindings: { kafka: { groupId: "g" } }, message: { oneOf: [message] } },
      },
    },
  };
}

describe("AsyncApiSpec", () => {
  it("validates the marker, title and channels", () => {
    expect(() => new AsyncApiSpec(document()).validate()).not.toThrow();
    expect(() => new AsyncApiSpec({ asyncapi: "3.0.0", info: { title: "T" }, channels: {} }).validate()).toThrow(
      InvalidSpecificationError,
    );
    expect(() => new AsyncApiSpec({ asyncapi: "2.0.0", info: { title: "T" } }).validate()).toThrow(
      'Invalid specification at "channels"',
    );
  });

  it("reads servers from the named map", () => {
    expect(new AsyncApiSpec(document()).servers()).toEqual([
      { name: "production", url: "broker.example.com:1883", protocol: "mqtt", description: undefined },
    ]);
  });
});

describe("AsyncApiParser", () => {
  const model = new AsyncApiSpec(document());
  const endpoints = new AsyncApiParser().extractEndpoints(model);

  it("creates one endpoint per channel operation", () => {
    expect(endpoints.map((e) => `${e.operationKind} ${e.addressPattern} ${e.protocol}`)).toEqual([
      "publish users/{userId}/signedup mqtt",
      "subscribe users/{userId}/signedup mqtt",
      "subscribe audit kafka",
    ]);
  });

  it("maps channel parameters as required channel params", () => {
    expect(endpoints[0].parameters).toEqual([
      { name: "userId", location: "channel", required: true, schema: { type: "string" }, description: "User id" },
    ]);
  });

  it("places the message on the request or response side", () => {
    const summary = { name: "UserSignedUp", contentType: "application/json", payload: { type: "object" }, headers: {} };
    expect(endpoints[0].requestSchema).toEqual(summary);
    expect(endpoints[0].responseSchema).toBeUndefined();
    expect(endpoints[1].responseSchema).toEqual(summary);
    expect(endpoints[2].responseSchema).toEqual({ oneOf: [summary] });
  });

  it("carries server security, tags and channel descriptions", () => {
    expect(endpoints[0].securityRequirements).toEqual([{ scheme: "creds", type: "userPassword", scopes: [] }]);
    expect(endpoints[0].tags).toEqual(["users"]);
    expect(endpoints[2].description).toBe("Audit stream");
  });
});

describe("bindingProtocol", () => {
  it("maps binding keys to adapter protocols", () => {
    expect(bindingProtocol({ bindings: { websockets: {} } })).toBe("websocket");
    expect(bindingProtocol({ bindings: { amqp: {} } })).toBe("amqp");
    expect(bindingProtocol({}, { bindings: { nats: {} } })).toBe("nats");
  });

  it("prefers channel bindings over operation bindings", () => {
    expect(bindingProtocol({ bindings: { mqtt: {} } }, { bindings: { kafka: {} } })).toBe("mqtt");
  });

  it("reports unknown when nothing is bound", () => {
    expect(bindingProtocol({ bindings: { http: {} } })).toBe("unknown");
    expect(bindingProtocol({})).toBe("unknown");
  });
});
