import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as android from "../platforms/android.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { coordinate, delayMs, deviceId } from "./schemas.js";

export function registerDoubleTapTool(server: McpServer) {
  server.tool(
    "double_tap",
    "Double-tap at a specific coordinate on the device screen",
    {
      device_id: deviceId,
      x: coordinate.describe("X coordinate to double-tap"),
      y: coordinate.describe("Y coordinate to double-tap"),
      delay_ms: delayMs,
    },
    async ({ device_id, x, y, delay_ms }) => {
      try {
        await android.doubleTap(x, y, { deviceId: device_id, delayMs: delay_ms });
        return {
          content: buildResponseContent(`Double-tapped at (${x}, ${y})`),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
