import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { realTap } from "../platforms/real-tap.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { coordinate, deviceId } from "./schemas.js";

export function registerRealTapTool(server: McpServer) {
  server.tool(
    "real_tap",
    "Tap with randomized position, pressure and timing so the touch resembles a finger. Uses sendevent on rooted devices and a short swipe otherwise.",
    {
      device_id: deviceId,
      x: coordinate.describe("X coordinate to tap"),
      y: coordinate.describe("Y coordinate to tap"),
      method: z
        .enum(["auto", "sendevent", "swipe"])
        .optional()
        .describe("Force a tap method. Default: auto"),
      humanize: z
        .boolean()
        .optional()
        .describe("Add human-like variations. Default: true"),
    },
    async ({ device_id, x, y, method, humanize }) => {
      try {
        const result = await realTap(x, y, { deviceId: device_id, method, humanize });
        if (!result.success) {
          return {
            content: buildResponseContent(`Tap at (${x}, ${y}) failed using ${result.method}`),
            isError: true,
          };
        }
        return {
          content: buildResponseContent(`Tapped at (${x}, ${y}) using ${result.method}`),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
