#!/usr/bin/env node

/**
 * BoPi MCP Server
 *
 * Exposes a BoPi pH/redox monitoring box as MCP (Model Context Protocol) tools
 * so that AI assistants can read its sensors.
 *
 * Configuration via environment variables (or a .env file):
 *   BOPI_HOST             – Device hostname or IP (required)
 *   BOPI_PORT             – HTTP port (default: 80)
 *   BOPI_REQUEST_TIMEOUT  – Request timeout in seconds (default: 10)
 *   LOG_LEVEL             – winston level, logged to stderr (default: info)
 */

import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BoPiClient } from "./client.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./log.js";
import { registerTools } from "./tools.js";
import { registerResources } from "./resources.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const client = new BoPiClient(config.device);

  const server = new McpServer({
    name: "bopi",
    version: "1.0.0",
  });

  registerTools(server, () => client, logger);
  registerResources(server, () => client);

  const shutdown = async (signal: string) => {
    logger.info("Received %s, shutting down", signal);
    await server.close();
    await client.close();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error("Shutdown failed", err);
          process.exit(1);
        },
      );
    });
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("BoPi MCP server ready for %s", client.baseUrl);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
