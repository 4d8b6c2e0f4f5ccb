import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as android from "../platforms/android.js";
import { errorResponse } from "../utils/format-response.js";
import { deviceId } from "./schemas.js";

export function registerGetCurrentAppTool(server: McpServer) {
  server.tool(
    "get_current_app",
    `Get the name of the focused app, or "${android.HOME_APP_NAME}" when it is not a known app`,
    { device_id: deviceId },
    async ({ device_id }) => {
      try {
        const app = await android.getCurrentApp(device_id);
        return {
          content: [{ type: "text" as const, text: app }],
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
