import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { BoPiClient } from "./client.js";
import { isBoPiError } from "./errors.js";
import type { Logger } from "./log.js";

function text(value: string): CallToolResult {
  return { content: [{ type: "text", text: value }] };
}

/**
 * Register all BoPi tools on the given MCP server instance.
 *
 * Client errors are returned as MCP error results so the assistant sees the
 * device's message; anything else propagates to the SDK.
 */
export function registerTools(
  server: McpServer,
  getClient: () => BoPiClient,
  logger: Logger,
) {
  async function run(tool: string, fn: () => Promise<string>): Promise<CallToolResult> {
    try {
      return text(await fn());
    } catch (err) {
      if (!isBoPiError(err)) throw err;
      logger.warn("%s failed: %s", tool, err.message);
      return { ...text(err.message), isError: true };
    }
  }

  // ─── Sensors ────────────────────────────────────────────────────────

  server.tool(
    "get_sensors_state",
    "Get all sensor readings: pH, redox (mV), water temperature, box temperature and humidity, uptime. Disconnected probes are null. Equivalent to /allsensorsv2.",
    {},
    async () =>
      run("get_sensors_state", async () => {
        const state = await getClient().getSensorsState();
        return JSON.stringify(state, null, 2);
      }),
  );

  server.tool(
    "get_ph_value",
    "Get the current pH reading only.",
    {},
    async () =>
      run("get_ph_value", async () => {
        const { phValue } = await getClient().getSensorsState();
        return phValue === null ? "pH sensor disconnected" : `pH: ${phValue}`;
      }),
  );

  // ─── Raw access ─────────────────────────────────────────────────────

  server.tool(
    "request",
    "Send a raw request to the BoPi HTTP API and return the decoded response. Plain-text responses come back as {\"message\": ...}.",
    {
      path: z.string()
        .startsWith("/")
        .refine((p) => !p.startsWith("//"), "path must not start with //")
        .describe("Request path, e.g. '/allsensorsv2'"),
      method: z.enum(["GET", "POST"]).optional().describe("HTTP method (default GET)"),
      query: z.record(z.string(), z.union([z.string(), z.number()])).optional().describe("Query string parameters"),
    },
    async (args) =>
      run("request", async () => {
        const data = await getClient().request(args.path, {
          method: args.method,
          query: args.query,
        });
        return JSON.stringify(data, null, 2);
      }),
  );
}
