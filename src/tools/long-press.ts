import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import * as android from "../platforms/android.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { coordinate, delayMs, deviceId } from "./schemas.js";

export function registerLongPressTool(server: McpServer) {
  server.tool(
    "long_press",
    "Long-press at a specific coordinate on the device screen",
    {
      device_id: deviceId,
      x: coordinate.describe("X coordinate to press"),
      y: coordinate.describe("Y coordinate to press"),
      duration_ms: z
        .number()
        .int()
        .positive()
        .optional()
        .describe("Press duration in milliseconds. Default: 3000"),
      delay_ms: delayMs,
    },
    async ({ device_id, x, y, duration_ms, delay_ms }) => {
      const duration = duration_ms ?? 3000;
      try {
        await android.longPress(x, y, duration, { deviceId: device_id, delayMs: delay_ms });
        return {
          content: buildResponseContent(`Long-pressed at (${x}, ${y}) for ${duration}ms`),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
