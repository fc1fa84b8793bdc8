// Technical Analysis Agent: reads the latest indicator values into signals and a trend

import type { Fetched, TechnicalSnapshot } from '@market-sentinel/market-data';
import {
  TechnicalAnalysisSchema, type IndicatorSignal, type KeyLevel, type TechnicalAnalysis,
} from '../schemas/analysis.js';
import type { Trend } from '../types/analysis.js';
import type { TechnicalDataSource } from '../types/collaborators.js';
import { clamp, latest, round } from '../utils/numbers.js';
import { BaseAgent, type AgentDeps, type AgentInput } from './base-agent.js';
import { TECHNICAL_AGENT_SYSTEM_PROMPT } from './prompts.js';

export interface TechnicalFeatures {
  signals: IndicatorSignal[];
  trend: Trend;
  keyLevels: KeyLevel[];
  currentPrice: number;
  priceChangePct: number;
  confidence: number;
}

export class TechnicalAgent extends BaseAgent<TechnicalSnapshot, TechnicalFeatures, TechnicalAnalysis> {
  readonly id = 'technical_analysis' as const;
  protected readonly schema = TechnicalAnalysisSchema;
  protected readonly systemPrompt = TECHNICAL_AGENT_SYSTEM_PROMPT;
  protected readonly emptyReason = 'No OHLCV data available';

  constructor(
    private readonly source: TechnicalDataSource,
    deps: AgentDeps,
  ) {
    super(deps);
  }

  protected fetch(input: AgentInput): Promise<Fetched<TechnicalSnapshot>> {
    return this.source.fetchTechnicals(input.subject, input.days);
  }

  protected isEmpty(raw: TechnicalSnapshot): boolean {
    return raw.bars.length === 0;
  }

  protected fetchingMessage(input: AgentInput): string {
    return `Fetching ${input.days}-day price data and indicators for ${input.subject}...`;
  }

  protected retrievedMessage(raw: TechnicalSnapshot): string {
    return `Retrieved ${raw.bars.length} price bars with indicators`;
  }

  protected classify(raw: TechnicalSnapshot): TechnicalFeatures {
    const signals = this.readSignals(raw);
    const trend = classifyTrend(signals, this.thresholds.trendMargin);

    const closes = raw.bars.map(b => b.close);
    const first = closes[0];
    const last = closes[closes.length - 1];
    const priceChangePct = first !== 0 ? round(((last - first) / first) * 100, 2) : 0;

    return {
      signals,
      trend,
      keyLevels: this.keyLevels(raw),
      currentPrice: last,
      priceChangePct: Number.isFinite(priceChangePct) ? priceChangePct : 0,
      confidence: signalAgreement(signals, trend),
    };
  }

  /** Signals whose inputs are missing or NaN are skipped */
  private readSignals(raw: TechnicalSnapshot): IndicatorSignal[] {
    const { indicators } = raw;
    const signals: IndicatorSignal[] = [];

    const rsi = latest(indicators.rsi);
    if (rsi !== undefined) {
      if (rsi > this.thresholds.rsiOverbought) {
        signals.push({ indicator: 'RSI', value: round(rsi, 2), signal: 'bearish', description: `RSI overbought at ${rsi.toFixed(1)}` });
      } else if (rsi < this.thresholds.rsiOversold) {
        signals.push({ indicator: 'RSI', value: round(rsi, 2), signal: 'bullish', description: `RSI oversold at ${rsi.toFixed(1)}` });
      } else {
        signals.push({ indicator: 'RSI', value: round(rsi, 2), signal: 'neutral', description: `RSI at neutral level ${rsi.toFixed(1)}` });
      }
    }

    const macdLine = latest(indicators.macd.macd);
    const signalLine = latest(indicators.macd.signal);
    if (macdLine !== undefined && signalLine !== undefined) {
      const hist = latest(indicators.macd.hist) ?? macdLine - signalLine;
      const above = macdLine > signalLine;
      signals.push({
        indicator: 'MACD',
        value: round(hist, 4),
        signal: above ? 'bullish' : 'bearish',
        description: above ? 'MACD line above signal line' : 'MACD line below signal line',
      });
    }

    const ema20 = latest(indicators.ema['20']);
    const ema50 = latest(indicators.ema['50']);
    if (ema20 !== undefined && ema50 !== undefined) {
      const above = ema20 > ema50;
      signals.push({
        indicator: 'EMA Cross',
        value: round(ema20 - ema50, 4),
        signal: above ? 'bullish' : 'bearish',
        description: above ? 'EMA20 above EMA50' : 'EMA20 below EMA50',
      });
    }

    const close = raw.bars[raw.bars.length - 1]?.close;
    const upper = latest(indicators.bbands.upper);
    const lower = latest(indicators.bbands.lower);
    if (close !== undefined && upper !== undefined && lower !== undefined) {
      if (close > upper) {
        signals.push({ indicator: 'Bollinger Bands', value: close, signal: 'bearish', description: 'Price above upper band' });
      } else if (close < lower) {
        signals.push({ indicator: 'Bollinger Bands', value: close, signal: 'bullish', description: 'Price below lower band' });
      } else {
        signals.push({ indicator: 'Bollinger Bands', value: close, signal: 'neutral', description: 'Price within bands' });
      }
    }

    return signals;
  }

  private keyLevels(raw: TechnicalSnapshot): KeyLevel[] {
    const recent = raw.bars.slice(-this.thresholds.keyLevelWindow);
    if (recent.length === 0) return [];
    return [
      { levelType: 'support', price: Math.min(...recent.map(b => b.low)), strength: 'moderate' },
      { levelType: 'resistance', price: Math.max(...recent.map(b => b.high)), strength: 'moderate' },
    ];
  }

  protected buildContext(features: TechnicalFeatures, input: AgentInput): string {
    const signals = features.signals
      .map(s => `- ${s.indicator}: ${s.signal.toUpperCase()} (${s.description}, value ${s.value})`)
      .join('\n');
    const levels = features.keyLevels
      .map(l => `- ${l.levelType}: ${l.price.toFixed(2)} (${l.strength})`)
      .join('\n');

    return `Technical picture for ${input.subject} over ${input.days} days:
Current price: ${features.currentPrice.toFixed(2)}
Price change: ${features.priceChangePct >= 0 ? '+' : ''}${features.priceChangePct.toFixed(2)}%

Indicator signals:
${signals || '- none available'}

Key levels:
${levels || '- none available'}

Overall trend: ${features.trend.toUpperCase()}`;
  }

  protected fallbackNarrative(features: TechnicalFeatures, input: AgentInput): string {
    return `${input.subject} shows a ${features.trend} technical trend with ${features.signals.length} indicator signals; price changed ${features.priceChangePct.toFixed(2)}% over ${input.days} days.`;
  }

  protected assemble(features: TechnicalFeatures, narrative: string): TechnicalAnalysis {
    return {
      agent: 'technical_analysis',
      summary: narrative,
      overallTrend: features.trend,
      indicatorSignals: features.signals,
      keyLevels: features.keyLevels,
      currentPrice: features.currentPrice,
      priceChangePct: features.priceChangePct,
      confidence: clamp(features.confidence, 0, 1),
    };
  }

  defaultResult(reason: string): TechnicalAnalysis {
    return {
      agent: 'technical_analysis',
      summary: `Unable to compute technical analysis: ${reason}`,
      overallTrend: 'neutral',
      indicatorSignals: [],
      keyLevels: [],
      currentPrice: 0,
      priceChangePct: 0,
      confidence: 0,
    };
  }

  describe(result: TechnicalAnalysis): string {
    return `Overall trend: ${result.overallTrend}, Price: ${result.currentPrice.toFixed(2)}`;
  }

  protected completionData(result: TechnicalAnalysis): Record<string, unknown> {
    return { trend: result.overallTrend, price: result.currentPrice, signals: result.indicatorSignals.length };
  }
}

/**
 * One side must lead the other by more than `margin` directional signals;
 * no directional signal at all is neutral, anything else is mixed.
 */
export function classifyTrend(signals: IndicatorSignal[], margin = 1): Trend {
  const bull = signals.filter(s => s.signal === 'bullish').length;
  const bear = signals.filter(s => s.signal === 'bearish').length;
  if (bull > bear + margin) return 'bullish';
  if (bear > bull + margin) return 'bearish';
  if (bull === 0 && bear === 0) return 'neutral';
  return 'mixed';
}

/** Share of directional signals agreeing with the trend (the larger side when mixed) */
export function signalAgreement(signals: IndicatorSignal[], trend: Trend): number {
  const bull = signals.filter(s => s.signal === 'bullish').length;
  const bear = signals.filter(s => s.signal === 'bearish').length;
  const directional = bull + bear;
  if (directional === 0 || trend === 'neutral') return 0;
  const agreeing = trend === 'bullish' ? bull : trend === 'bearish' ? bear : Math.max(bull, bear);
  return round(agreeing / directional, 4);
}
