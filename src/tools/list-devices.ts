import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as android from "../platforms/android.js";
import { errorResponse } from "../utils/format-response.js";

export function registerListDevicesTool(server: McpServer) {
  server.tool(
    "list_devices",
    "List connected Android devices and emulators",
    async () => {
      try {
        const devices = await android.listDevices();
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(devices, null, 2),
            },
          ],
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
