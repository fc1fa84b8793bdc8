import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ProgressBus, type AgentTool, type Logger } from "@market-sentinel/agents";
import { AgentToolInputSchema } from "../schemas/analysis.js";
import { wrapResponse } from "../formatters/response.js";

/** One MCP tool per sub-agent, named by its agent id */
export function registerAgentTools(server: McpServer, tools: AgentTool[], logger: Logger) {
  for (const tool of tools) {
    server.tool(
      tool.id,
      `${tool.description}. Runs the ${tool.name} alone and returns its structured result.`,
      AgentToolInputSchema.shape,
      async (params) => {
        const bus = new ProgressBus(undefined, logger);
        const outcome = await tool.invoke({ subject: params.symbol, days: params.days }, bus);
        if (outcome.status === "error") {
          return wrapResponse(new Error(outcome.message));
        }
        return wrapResponse(outcome.result);
      }
    );
  }
}
