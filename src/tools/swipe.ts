import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import * as android from "../platforms/android.js";
import { getScreenResolution } from "../platforms/device-info.js";
import type { ScreenResolution } from "../types.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { coordinate, delayMs, deviceId } from "./schemas.js";

type Direction = "up" | "down" | "left" | "right";

// Swipes 30% of the screen each way from the center.
function directionSwipe(
  direction: Direction,
  screen: ScreenResolution,
): [number, number, number, number] {
  const cx = Math.round(screen.width / 2);
  const cy = Math.round(screen.height / 2);
  const distX = Math.round(screen.width * 0.3);
  const distY = Math.round(screen.height * 0.3);

  switch (direction) {
    case "up":
      return [cx, cy + distY, cx, cy - distY];
    case "down":
      return [cx, cy - distY, cx, cy + distY];
    case "left":
      return [cx + distX, cy, cx - distX, cy];
    case "right":
      return [cx - distX, cy, cx + distX, cy];
  }
}

export function registerSwipeTool(server: McpServer) {
  server.tool(
    "swipe",
    "Swipe on the device screen. Provide explicit coordinates or a direction (up/down/left/right) to auto-compute from screen center.",
    {
      device_id: deviceId,
      start_x: coordinate
        .optional()
        .describe("Start X coordinate. Required if direction is not set."),
      start_y: coordinate
        .optional()
        .describe("Start Y coordinate. Required if direction is not set."),
      end_x: coordinate
        .optional()
        .describe("End X coordinate. Required if direction is not set."),
      end_y: coordinate
        .optional()
        .describe("End Y coordinate. Required if direction is not set."),
      direction: z
        .enum(["up", "down", "left", "right"])
        .optional()
        .describe(
          "Swipe direction. Auto-computes coordinates from screen center. Overrides explicit coordinates.",
        ),
      duration_ms: z
        .number()
        .int()
        .positive()
        .optional()
        .describe("Duration of the swipe in milliseconds. Default: derived from distance, 1000-2000"),
      delay_ms: delayMs,
    },
    async ({
      device_id,
      start_x,
      start_y,
      end_x,
      end_y,
      direction,
      duration_ms,
      delay_ms,
    }) => {
      try {
        let sx: number, sy: number, ex: number, ey: number;

        if (direction) {
          const screen = await getScreenResolution(device_id);
          [sx, sy, ex, ey] = directionSwipe(direction, screen);
        } else {
          if (
            start_x === undefined ||
            start_y === undefined ||
            end_x === undefined ||
            end_y === undefined
          ) {
            return {
              content: [
                {
                  type: "text" as const,
                  text: "Error: Provide either direction or all four coordinates (start_x, start_y, end_x, end_y).",
                },
              ],
              isError: true,
            };
          }
          sx = start_x;
          sy = start_y;
          ex = end_x;
          ey = end_y;
        }

        const duration = await android.swipe(sx, sy, ex, ey, duration_ms, {
          deviceId: device_id,
          delayMs: delay_ms,
        });

        return {
          content: buildResponseContent(
            `Swiped from (${sx}, ${sy}) to (${ex}, ${ey}) over ${duration}ms`,
          ),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
