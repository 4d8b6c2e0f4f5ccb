import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import * as android from "../platforms/android.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { coordinate, delayMs, deviceId } from "./schemas.js";

export function registerTapTool(server: McpServer) {
  server.tool(
    "tap",
    "Tap at a coordinate. Rooted devices get a humanized sendevent tap; others use input tap.",
    {
      device_id: deviceId,
      x: coordinate.describe("X coordinate to tap"),
      y: coordinate.describe("Y coordinate to tap"),
      use_sendevent: z
        .boolean()
        .optional()
        .describe("Try a humanized sendevent tap on rooted devices. Default: true"),
      delay_ms: delayMs,
    },
    async ({ device_id, x, y, use_sendevent, delay_ms }) => {
      try {
        const method = await android.tap(x, y, {
          deviceId: device_id,
          useSendevent: use_sendevent,
          delayMs: delay_ms,
        });
        return {
          content: buildResponseContent(`Tapped at (${x}, ${y}) using ${method}`),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
