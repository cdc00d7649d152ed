#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SmartApiClient } from "@/client";
import { loadConfig } from "@/config";
import { createServer, SERVER_NAME, SERVER_VERSION } from "@/server";
import { logger } from "@/utils";

async function main(): Promise<void> {
  const config = loadConfig();
  const client = new SmartApiClient({ ...config, logger });
  const server = createServer(client, logger);

  await server.connect(new StdioServerTransport());
  logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Fatal error");
  process.exit(1);
});
