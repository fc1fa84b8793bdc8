// Quantitative Metrics Agent: converts return/risk statistics into a risk level

import type { Fetched, QuantMetrics } from '@market-sentinel/market-data';
import {
  QuantAnalysisSchema, type QuantAnalysis, type ReturnMetrics, type RiskMetrics,
} from '../schemas/analysis.js';
import type { ClassificationThresholds } from '../config/thresholds.js';
import type { RiskLevel } from '../types/analysis.js';
import type { QuantDataSource } from '../types/collaborators.js';
import { clamp, finiteOr, round } from '../utils/numbers.js';
import { BaseAgent, type AgentDeps, type AgentInput } from './base-agent.js';
import { QUANT_AGENT_SYSTEM_PROMPT } from './prompts.js';

export interface QuantFeatures {
  returnMetrics: ReturnMetrics;
  riskMetrics: RiskMetrics;
  riskLevel: RiskLevel;
  confidence: number;
}

export const NO_ASSESSMENT = 'See risk summary above.';

export class QuantAgent extends BaseAgent<QuantMetrics, QuantFeatures, QuantAnalysis> {
  readonly id = 'quantitative_metrics' as const;
  protected readonly schema = QuantAnalysisSchema;
  protected readonly systemPrompt = QUANT_AGENT_SYSTEM_PROMPT;
  protected readonly emptyReason = 'No quantitative metrics available';

  constructor(
    private readonly source: QuantDataSource,
    deps: AgentDeps,
  ) {
    super(deps);
  }

  protected fetch(input: AgentInput): Promise<Fetched<QuantMetrics>> {
    return this.source.fetchQuantMetrics(input.subject, input.days);
  }

  protected isEmpty(): boolean {
    return false;
  }

  protected fetchingMessage(input: AgentInput): string {
    return `Fetching quantitative metrics for ${input.subject}...`;
  }

  protected retrievedMessage(): string {
    return 'Retrieved quantitative metrics';
  }

  protected classify(raw: QuantMetrics): QuantFeatures {
    const pct = (v: number, digits = 2) => round(finiteOr(v, 0) * 100, digits);

    const returnMetrics: ReturnMetrics = {
      totalReturn: pct(raw.performance.totalReturn),
      annualizedReturn: pct(raw.returns.annualizedReturn),
      dailyAvgReturn: pct(raw.returns.dailyMean, 4),
      bestDay: pct(raw.performance.bestDay),
      worstDay: pct(raw.performance.worstDay),
    };

    const riskMetrics: RiskMetrics = {
      volatility: pct(raw.returns.annualizedVolatility),
      sharpeRatio: round(finiteOr(raw.risk.sharpeRatio, 0), 2),
      sortinoRatio: round(finiteOr(raw.risk.sortinoRatio, 0), 2),
      maxDrawdown: pct(raw.risk.maxDrawdown),
      var95: pct(raw.risk.var95),
      cvar95: pct(raw.risk.cvar95),
    };

    return {
      returnMetrics,
      riskMetrics,
      riskLevel: classifyRisk(raw.returns.annualizedVolatility, raw.risk.maxDrawdown, this.thresholds),
      confidence: metricCoverage(raw),
    };
  }

  protected buildContext(features: QuantFeatures, input: AgentInput): string {
    const r = features.returnMetrics;
    const k = features.riskMetrics;
    const signed = (v: number) => `${v >= 0 ? '+' : ''}${v.toFixed(2)}%`;

    return `Quantitative metrics for ${input.subject}:

Return Metrics:
- Total Return (${input.days}d): ${signed(r.totalReturn)}
- Annualized Return: ${signed(r.annualizedReturn)}
- Best Day: ${signed(r.bestDay)}
- Worst Day: ${signed(r.worstDay)}

Risk Metrics:
- Annualized Volatility: ${k.volatility.toFixed(2)}%
- Sharpe Ratio: ${k.sharpeRatio.toFixed(2)}
- Sortino Ratio: ${k.sortinoRatio.toFixed(2)}
- Max Drawdown: ${k.maxDrawdown.toFixed(2)}%
- VaR (95%): ${k.var95.toFixed(2)}%
- CVaR (95%): ${k.cvar95.toFixed(2)}%

Risk Level: ${features.riskLevel.toUpperCase()}`;
  }

  protected fallbackNarrative(features: QuantFeatures, input: AgentInput): string {
    return `${input.subject} carries ${features.riskLevel} risk with ${features.riskMetrics.volatility.toFixed(2)}% annualized volatility and a ${features.riskMetrics.maxDrawdown.toFixed(2)}% max drawdown.`;
  }

  protected assemble(features: QuantFeatures, narrative: string): QuantAnalysis {
    const { summary, assessment } = splitNarrative(narrative);
    return {
      agent: 'quantitative_metrics',
      summary,
      riskLevel: features.riskLevel,
      returnMetrics: features.returnMetrics,
      riskMetrics: features.riskMetrics,
      riskRewardAssessment: assessment,
      confidence: clamp(features.confidence, 0, 1),
    };
  }

  defaultResult(reason: string): QuantAnalysis {
    return {
      agent: 'quantitative_metrics',
      summary: `Unable to fetch quant metrics: ${reason}`,
      riskLevel: 'moderate',
      returnMetrics: { totalReturn: 0, annualizedReturn: 0, dailyAvgReturn: 0, bestDay: 0, worstDay: 0 },
      riskMetrics: { volatility: 0, sharpeRatio: 0, sortinoRatio: 0, maxDrawdown: 0, var95: 0, cvar95: 0 },
      riskRewardAssessment: 'Unable to assess risk/reward',
      confidence: 0,
    };
  }

  describe(result: QuantAnalysis): string {
    return `Risk level: ${result.riskLevel}, Sharpe: ${result.riskMetrics.sharpeRatio.toFixed(2)}`;
  }

  protected completionData(result: QuantAnalysis): Record<string, unknown> {
    return { riskLevel: result.riskLevel, sharpe: result.riskMetrics.sharpeRatio };
  }
}

/**
 * Tiers are checked from most to least severe; a metric that is not finite
 * is ignored, and with neither available the level is moderate.
 */
export function classifyRisk(
  volatility: number,
  maxDrawdown: number,
  thresholds: Pick<ClassificationThresholds, 'riskExtreme' | 'riskHigh' | 'riskModerate'>,
): RiskLevel {
  const vol = Number.isFinite(volatility) ? volatility : undefined;
  const dd = Number.isFinite(maxDrawdown) ? Math.abs(maxDrawdown) : undefined;
  if (vol === undefined && dd === undefined) return 'moderate';

  const exceeds = (tier: { volatility: number; drawdown: number }) =>
    (vol !== undefined && vol > tier.volatility) || (dd !== undefined && dd > tier.drawdown);

  if (exceeds(thresholds.riskExtreme)) return 'extreme';
  if (exceeds(thresholds.riskHigh)) return 'high';
  if (exceeds(thresholds.riskModerate)) return 'moderate';
  return 'low';
}

/** Share of metric values that are finite numbers */
export function metricCoverage(metrics: QuantMetrics): number {
  const values = [
    ...Object.values(metrics.returns),
    ...Object.values(metrics.risk),
    ...Object.values(metrics.performance),
  ];
  if (values.length === 0) return 0;
  return round(values.filter(v => Number.isFinite(v)).length / values.length, 4);
}

/** First paragraph is the summary, the second the risk/reward assessment */
export function splitNarrative(text: string): { summary: string; assessment: string } {
  const parts = text.trim().split(/\n\s*\n/).map(p => p.trim()).filter(p => p.length > 0);
  return {
    summary: parts[0] ?? text.trim(),
    assessment: parts[1] ?? NO_ASSESSMENT,
  };
}
