import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { BoPiClient } from "./client.js";
import { SENSORS_PATH } from "./sensors.js";

/**
 * Register MCP resources describing the device and its live readings.
 */
export function registerResources(server: McpServer, getClient: () => BoPiClient) {
  server.resource(
    "sensors",
    "bopi://sensors",
    {
      description: "Current readings of every BoPi sensor",
      mimeType: "application/json",
    },
    async (uri) => {
      const state = await getClient().getSensorsState();
      return {
        contents: [
          { uri: uri.href, mimeType: "application/json", text: JSON.stringify(state, null, 2) },
        ],
      };
    },
  );

  server.resource(
    "device",
    "bopi://device",
    {
      description: "Address of the BoPi device this server talks to",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify({ baseUrl: getClient().baseUrl, sensorsPath: SENSORS_PATH }, null, 2),
        },
      ],
    }),
  );
}
