#!/usr/bin/env node

/**
 * Dynamic API gateway.
 *
 * Registers OpenAPI / AsyncAPI documents and calls their endpoints over
 * HTTP, WebSocket, MQTT, AMQP, Kafka or NATS, with credential injection
 * and the OAuth2 authorization-code flow. Served to agents as an MCP
 * server over stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, validateConfig } from "./config.js";
import { Gateway } from "./gateway.js";
import { createMcpServer } from "./mcp.js";
import { Logger } from "./middleware.js";

async function main() {
  const { config, path } = loadConfig(process.argv[2]);
  const logger = new Logger(config.logging.level);

  const errors = validateConfig(config);
  if (errors.length) {
    for (const e of errors) logger.error("invalid config", { path, error: e });
    process.exit(1);
  }

  const gateway = new Gateway(config, { logger });
  const server = createMcpServer(gateway);
  await server.connect(new StdioServerTransport());
  logger.info("gateway ready", { config: path ?? "defaults", storage: config.storage.path });

  const shutdown = (signal: string) => {
    logger.info("shutting down", { signal });
    gateway
      .stop()
      .then(() => server.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("shutdown failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("Fatal:", err);
  process.exit(1);
});
