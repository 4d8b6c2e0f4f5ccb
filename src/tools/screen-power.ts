import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import * as android from "../platforms/android.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { deviceId } from "./schemas.js";

export function registerScreenPowerTools(server: McpServer) {
  server.tool(
    "wake_screen",
    "Wake the screen if it is off",
    { device_id: deviceId },
    async ({ device_id }) => {
      try {
        const changed = await android.wakeScreen(device_id);
        return {
          content: buildResponseContent(changed ? "Screen woken up" : "Screen is already on"),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );

  server.tool(
    "sleep_screen",
    "Turn the screen off if it is on",
    { device_id: deviceId },
    async ({ device_id }) => {
      try {
        const changed = await android.sleepScreen(device_id);
        return {
          content: buildResponseContent(changed ? "Screen turned off" : "Screen is already off"),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );

  server.tool(
    "unlock_screen",
    "Wake the device and swipe away a swipe-only lock screen. PIN, pattern and password locks need manual input.",
    {
      device_id: deviceId,
      swipe_up: z
        .boolean()
        .optional()
        .describe("Swipe up to unlock; false swipes left to right. Default: true"),
    },
    async ({ device_id, swipe_up }) => {
      try {
        const swiped = await android.unlockScreen({ deviceId: device_id, swipeUp: swipe_up });
        return {
          content: buildResponseContent(
            swiped ? "Unlock swipe performed" : "Screen is already unlocked",
          ),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
