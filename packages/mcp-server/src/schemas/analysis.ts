import { z } from "zod";

export const SymbolSchema = z
  .string()
  .trim()
  .min(1)
  .max(20)
  .describe("Crypto asset symbol, e.g. BTC, ETH, SOL");

export const LookbackDaysSchema = z.coerce
  .number()
  .int()
  .min(7)
  .max(365)
  .default(30)
  .describe("Lookback window in days (7-365)");

export const AgentToolInputSchema = z.object({
  symbol: SymbolSchema,
  days: LookbackDaysSchema,
});

export const AnalyzeAssetSchema = z.object({
  symbol: SymbolSchema,
  days: LookbackDaysSchema,
  include_news: z
    .boolean()
    .default(true)
    .describe("Run the news sentiment agent"),
  include_technical: z
    .boolean()
    .default(true)
    .describe("Run the technical analysis agent"),
  include_quant: z
    .boolean()
    .default(true)
    .describe("Run the quantitative metrics agent"),
});
