#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, createSentinel, errorMessage, loadConfig } from "@market-sentinel/agents";
import { createServer } from "./server.js";

const config = loadConfig();
const logger = createLogger("McpServer", config.logLevel);
const sentinel = createSentinel(config);
await sentinel.open();

const server = createServer(sentinel, logger);

async function shutdown(signal: string) {
  logger.info("Shutting down", { signal });
  try {
    await server.close();
    await sentinel.close();
  } catch (err) {
    logger.error("Shutdown failed", { error: errorMessage(err) });
  }
  process.exit(0);
}

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info("MCP server ready on stdio", { tools: sentinel.tools.length + 1 });
