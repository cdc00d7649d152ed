import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerGreeting } from "@/resources/greeting";
import { createTradingTools, registerTools } from "@/tools";
import type { SmartApiClient } from "@/client";
import type { Logger } from "@/utils";

export const SERVER_NAME = "smartapi-mcp";
export const SERVER_VERSION = "0.1.0";

export function createServer(client: SmartApiClient, log: Logger): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  registerTools(server, createTradingTools(client, log.child({ module: "tools" })));
  registerGreeting(server);

  return server;
}
