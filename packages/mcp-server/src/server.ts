import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createLogger, type Logger, type Sentinel } from "@market-sentinel/agents";
import { registerAgentTools } from "./tools/agents.js";
import { registerAnalysisTools } from "./tools/analysis.js";

export const SERVER_NAME = "market-sentinel-mcp";
export const SERVER_VERSION = "0.1.0";

export function createServer(
  sentinel: Pick<Sentinel, "tools" | "controller">,
  logger: Logger = createLogger("McpServer")
): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerAgentTools(server, sentinel.tools, logger);
  registerAnalysisTools(server, sentinel.controller, logger);

  return server;
}
