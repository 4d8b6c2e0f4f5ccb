import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerListDevicesTool } from "./tools/list-devices.js";
import { registerTapTool } from "./tools/tap.js";
import { registerRealTapTool } from "./tools/real-tap.js";
import { registerDoubleTapTool } from "./tools/double-tap.js";
import { registerLongPressTool } from "./tools/long-press.js";
import { registerSwipeTool } from "./tools/swipe.js";
import { registerPressKeyTool } from "./tools/press-key.js";
import { registerLaunchAppTool, registerListAppsTool } from "./tools/launch-app.js";
import { registerGetCurrentAppTool } from "./tools/get-current-app.js";
import { registerScreenPowerTools } from "./tools/screen-power.js";
import { registerGetScreenInfoTool, registerGetTouchInfoTool } from "./tools/get-screen-info.js";

export const SERVER_NAME = "mcp-android-touch";

export function createServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: "1.0.0",
  });

  registerListDevicesTool(server);
  registerTapTool(server);
  registerRealTapTool(server);
  registerDoubleTapTool(server);
  registerLongPressTool(server);
  registerSwipeTool(server);
  registerPressKeyTool(server);
  registerLaunchAppTool(server);
  registerListAppsTool(server);
  registerGetCurrentAppTool(server);
  registerScreenPowerTools(server);
  registerGetScreenInfoTool(server);
  registerGetTouchInfoTool(server);

  return server;
}
