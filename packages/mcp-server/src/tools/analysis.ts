import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, type AnalysisRunner, type Logger } from "@market-sentinel/agents";
import { AnalyzeAssetSchema } from "../schemas/analysis.js";
import { wrapResponse } from "../formatters/response.js";

export function registerAnalysisTools(server: McpServer, runner: AnalysisRunner, logger: Logger) {
  server.tool(
    "analyze_asset",
    "Full multi-agent analysis of a crypto asset. An orchestrator decides which of the news sentiment, technical analysis and quantitative metrics agents to run, then synthesizes a recommendation (strong_buy to strong_sell), a confidence in [0, 1], a risk level (low to extreme), the per-agent results and the reasoning trace.",
    AnalyzeAssetSchema.shape,
    async (params) => {
      try {
        const analysis = await runner.run({
          subject: params.symbol,
          days: params.days,
          includeNews: params.include_news,
          includeTechnical: params.include_technical,
          includeQuant: params.include_quant,
        });
        return wrapResponse(analysis);
      } catch (err) {
        logger.warn("analyze_asset rejected", { symbol: params.symbol, error: errorMessage(err) });
        return wrapResponse(err instanceof Error ? err : new Error(errorMessage(err)));
      }
    }
  );
}
