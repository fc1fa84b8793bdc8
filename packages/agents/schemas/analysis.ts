import { z } from 'zod';
import {
  HEADLINE_SENTIMENTS, LEVEL_STRENGTHS, MARKET_SENTIMENTS, RECOMMENDATIONS,
  RISK_LEVELS, SIGNALS, TRENDS,
} from '../types/analysis.js';

// ── Request ─────────────────────────────────────────────────────────

export const AnalysisRequestSchema = z.object({
  subject: z.string().trim().min(1).max(20).toUpperCase().default('BTC')
    .describe('Asset symbol to analyze (e.g., BTC, ETH)'),
  days: z.number().int().min(7).max(365).default(30).describe('Lookback window in days'),
  includeNews: z.boolean().default(true).describe('Run the news sentiment agent'),
  includeTechnical: z.boolean().default(true).describe('Run the technical analysis agent'),
  includeQuant: z.boolean().default(true).describe('Run the quantitative metrics agent'),
});

export type AnalysisRequest = Readonly<z.infer<typeof AnalysisRequestSchema>>;
export type AnalysisRequestInput = z.input<typeof AnalysisRequestSchema>;

/** Validate and freeze a request at the boundary */
export function acceptRequest(input: unknown): AnalysisRequest {
  return Object.freeze(AnalysisRequestSchema.parse(input));
}

export const AgentToolArgsSchema = z.object({
  subject: z.string().trim().min(1).max(20).toUpperCase().describe('Asset symbol (e.g., BTC)'),
  days: z.number().int().min(7).max(365).default(30).describe('Lookback window in days'),
});

export type AgentToolArgs = z.infer<typeof AgentToolArgsSchema>;

// ── News ────────────────────────────────────────────────────────────

const UnitScore = z.number().min(-1).max(1);
const Confidence = z.number().min(0).max(1);

export const NewsEventSchema = z.object({
  title: z.string(),
  sentiment: z.enum(HEADLINE_SENTIMENTS),
  sentimentScore: UnitScore,
  source: z.string().nullable(),
  publishedAt: z.string().nullable(),
});

export const NewsAnalysisSchema = z.object({
  agent: z.literal('news_sentiment'),
  summary: z.string(),
  overallSentiment: z.enum(MARKET_SENTIMENTS),
  avgSentimentScore: UnitScore,
  topEvents: z.array(NewsEventSchema),
  newsCount: z.number().int().nonnegative(),
});

export type NewsEvent = z.infer<typeof NewsEventSchema>;
export type NewsAnalysis = z.infer<typeof NewsAnalysisSchema>;

// ── Technical ───────────────────────────────────────────────────────

export const IndicatorSignalSchema = z.object({
  indicator: z.string(),
  value: z.number(),
  signal: z.enum(SIGNALS),
  description: z.string(),
});

export const KeyLevelSchema = z.object({
  levelType: z.enum(['support', 'resistance']),
  price: z.number(),
  strength: z.enum(LEVEL_STRENGTHS),
});

export const TechnicalAnalysisSchema = z.object({
  agent: z.literal('technical_analysis'),
  summary: z.string(),
  overallTrend: z.enum(TRENDS),
  indicatorSignals: z.array(IndicatorSignalSchema),
  keyLevels: z.array(KeyLevelSchema),
  currentPrice: z.number().nonnegative(),
  priceChangePct: z.number(),
  confidence: Confidence,
});

export type IndicatorSignal = z.infer<typeof IndicatorSignalSchema>;
export type KeyLevel = z.infer<typeof KeyLevelSchema>;
export type TechnicalAnalysis = z.infer<typeof TechnicalAnalysisSchema>;

// ── Quantitative ────────────────────────────────────────────────────

/** Percentages (5.2 = 5.2%) */
export const ReturnMetricsSchema = z.object({
  totalReturn: z.number(),
  annualizedReturn: z.number(),
  dailyAvgReturn: z.number(),
  bestDay: z.number(),
  worstDay: z.number(),
});

/** Volatility, drawdown and VaR in percent; ratios as-is */
export const RiskMetricsSchema = z.object({
  volatility: z.number(),
  sharpeRatio: z.number(),
  sortinoRatio: z.number(),
  maxDrawdown: z.number(),
  var95: z.number(),
  cvar95: z.number(),
});

export const QuantAnalysisSchema = z.object({
  agent: z.literal('quantitative_metrics'),
  summary: z.string(),
  riskLevel: z.enum(RISK_LEVELS),
  returnMetrics: ReturnMetricsSchema,
  riskMetrics: RiskMetricsSchema,
  riskRewardAssessment: z.string(),
  confidence: Confidence,
});

export type ReturnMetrics = z.infer<typeof ReturnMetricsSchema>;
export type RiskMetrics = z.infer<typeof RiskMetricsSchema>;
export type QuantAnalysis = z.infer<typeof QuantAnalysisSchema>;

export const AgentResultSchema = z.discriminatedUnion('agent', [
  NewsAnalysisSchema,
  TechnicalAnalysisSchema,
  QuantAnalysisSchema,
]);

export type AgentResult = z.infer<typeof AgentResultSchema>;

// ── Final analysis ──────────────────────────────────────────────────

export const ThoughtSchema = z.object({
  agent: z.string(),
  content: z.string(),
  timestamp: z.string(),
});

export const FinalAnalysisSchema = z.object({
  narrative: z.string(),
  recommendation: z.enum(RECOMMENDATIONS),
  confidence: Confidence,
  riskLevel: z.enum(RISK_LEVELS),
  newsAnalysis: NewsAnalysisSchema.nullable(),
  technicalAnalysis: TechnicalAnalysisSchema.nullable(),
  quantAnalysis: QuantAnalysisSchema.nullable(),
  thoughtProcess: z.array(ThoughtSchema),
  subject: z.string(),
  completedAt: z.string(),
});

export type FinalAnalysis = z.infer<typeof FinalAnalysisSchema>;
