import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { getScreenResolution, getTouchInfo } from "../platforms/device-info.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { deviceId } from "./schemas.js";

export function registerGetScreenInfoTool(server: McpServer) {
  server.tool(
    "get_screen_info",
    "Get the screen resolution of a device",
    { device_id: deviceId },
    async ({ device_id }) => {
      try {
        const resolution = await getScreenResolution(device_id);
        return {
          content: buildResponseContent(
            `Screen resolution: ${resolution.width}x${resolution.height}`,
            resolution,
          ),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}

export function registerGetTouchInfoTool(server: McpServer) {
  server.tool(
    "get_touch_info",
    "Report root status, screen resolution, the touch input device with its ranges, and the recommended tap method",
    { device_id: deviceId },
    async ({ device_id }) => {
      try {
        const info = await getTouchInfo(device_id);
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(info, null, 2),
            },
          ],
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
