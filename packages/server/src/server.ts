#!/usr/bin/env node

/**
 * MCP server for shelter records
 * Exposes record queries, mutations, analytics and account management via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadServerConfig } from "./config.js";
import { createMcpServer } from "./mcp.js";
import { createShelterService } from "./service/shelter.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // Override console methods to prevent accidental stdout pollution
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  if (process.env.SHELTER_MCP_ENABLED === "false") {
    console.error("Shelter records MCP server is disabled (SHELTER_MCP_ENABLED=false)");
    return;
  }

  const config = loadServerConfig(process.env);
  const service = await createShelterService(config);
  const server = createMcpServer(service, {
    readOnly: config.readOnly,
    toolTimeoutMs: config.toolTimeoutMs,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    store_mode: service.mode,
    data_file: config.dataFile,
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", {});
    try {
      await service.close();
      await server.close();
    } finally {
      process.exit(0);
    }
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
