/**
 * Per-family executors: run a built WireRequest through the protocol adapter.
 */

import { UnsupportedProtocolError } from "./errors.js";
import type { CallOutput, ExecutionContext, InboundMessage, MessageHandler, SpecExecutor } from "./types.js";
import type { Logger } from "./middleware.js";

export class RestExecutor implements SpecExecutor {
  async execute(ctx: ExecutionContext): Promise<CallOutput> {
    const { adapter, request } = ctx;
    if (adapter.kind !== "request-response") {
      throw new UnsupportedProtocolError(adapter.protocol, "REST endpoints need a request/response adapter");
    }
    const response = await adapter.execute(request);
    return { kind: "response", response };
  }
}

export class ChannelExecutor implements SpecExecutor {
  async execute(ctx: ExecutionContext): Promise<CallOutput> {
    const { adapter, request, endpoint } = ctx;
    if (adapter.kind !== "pubsub") {
      throw new UnsupportedProtocolError(adapter.protocol, "channel endpoints need a pub/sub adapter");
    }

    // request.url is the document server already chosen for this protocol
    const connection = await adapter.connect({
      protocol: request.protocol,
      url: request.url,
      credentials: request.credentials,
    });

    if (request.operationKind === "subscribe") {
      const handler = ctx.onMessage ?? loggingHandler(ctx.logger, endpoint.id);
      const subscription = await adapter.subscribe(connection, request.address, handler);
      return { kind: "subscribed", subscription };
    }

    // Credentials went to the broker at connect time; subscribers only see caller headers
    const envelope = await adapter.publish(connection, request.address, {
      payload: request.body ?? null,
      headers: { ...request.headers, ...request.channelParams },
    });
    return { kind: "published", envelope };
  }
}

/** Default subscriber: log each inbound message. */
export function loggingHandler(logger: Logger, endpointId: string): MessageHandler {
  return (message: InboundMessage) => {
    logger.info("message received", {
      endpointId,
      channel: message.channel,
      messageId: message.envelope?.id,
      receivedAt: message.receivedAt,
    });
  };
}
