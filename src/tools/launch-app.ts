import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import * as android from "../platforms/android.js";
import { listApps } from "../config/apps.js";
import { buildResponseContent, errorResponse } from "../utils/format-response.js";
import { delayMs, deviceId } from "./schemas.js";

export function registerLaunchAppTool(server: McpServer) {
  server.tool(
    "launch_app",
    "Launch an app by its display name (see list_apps)",
    {
      device_id: deviceId,
      app_name: z.string().describe("App display name, e.g. Settings or Chrome"),
      delay_ms: delayMs,
    },
    async ({ device_id, app_name, delay_ms }) => {
      try {
        const launched = await android.launchApp(app_name, {
          deviceId: device_id,
          delayMs: delay_ms,
        });
        if (!launched) {
          return {
            content: buildResponseContent(
              `Unknown app "${app_name}". Use list_apps to see supported names.`,
            ),
            isError: true,
          };
        }
        return {
          content: buildResponseContent(`Launched ${app_name}`),
        };
      } catch (error) {
        return errorResponse(error);
      }
    },
  );
}

export function registerListAppsTool(server: McpServer) {
  server.tool(
    "list_apps",
    "List the app names launch_app and get_current_app know about, with their package names",
    async () => ({
      content: [
        {
          type: "text" as const,
          text: JSON.stringify(listApps(), null, 2),
        },
      ],
    }),
  );
}
