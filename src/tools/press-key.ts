import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import * as android from "../platforms/android.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { delayMs, deviceId } from "./schemas.js";

const KEY_NAMES = [
  "home",
  "back",
  "enter",
  "delete",
  "volume_up",
  "volume_down",
  "power",
  "tab",
  "recent_apps",
  "sleep",
  "wakeup",
] as const satisfies readonly android.KeyName[];

export function registerPressKeyTool(server: McpServer) {
  server.tool(
    "press_key",
    `Press a hardware or navigation key on the device (${KEY_NAMES.join(", ")})`,
    {
      device_id: deviceId,
      key: z.enum(KEY_NAMES).describe("Key to press"),
      delay_ms: delayMs,
    },
    async ({ device_id, key, delay_ms }) => {
      try {
        // back and home keep their own post-action pauses
        if (key === "back") {
          await android.back({ deviceId: device_id, delayMs: delay_ms });
        } else if (key === "home") {
          await android.home({ deviceId: device_id, delayMs: delay_ms });
        } else {
          await android.pressKey(key, { deviceId: device_id, delayMs: delay_ms });
        }
        return {
          content: buildResponseContent(`Pressed "${key}"`),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}
