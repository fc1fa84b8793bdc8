// Synthesis: one language-model call that merges the gathered agent results
// into a recommendation. The reply is treated as untrusted text.

import type { AnalysisRequest, QuantAnalysis } from '../schemas/analysis.js';
import {
  DEFAULT_RECOMMENDATION, DEFAULT_RISK_LEVEL, FALLBACK_CONFIDENCE,
  RECOMMENDATIONS, RISK_LEVELS, type Recommendation, type RiskLevel,
} from '../types/analysis.js';
import { clamp } from '../utils/numbers.js';
import { SYNTHESIS_RULES } from './prompts.js';
import type { GatheredResults } from './session.js';

export interface SynthesisVerdict {
  narrative: string;
  recommendation: Recommendation;
  confidence: number;
  riskLevel: RiskLevel;
}

const signed = (v: number) => `${v >= 0 ? '+' : ''}${v.toFixed(2)}%`;

// ── Prompt ──────────────────────────────────────────────────────────

export function buildSynthesisPrompt(request: AnalysisRequest, gathered: GatheredResults): string {
  const sections: string[] = [];
  const { news, technical, quant } = gathered;

  if (news) {
    const events = news.topEvents
      .slice(0, 3)
      .map(e => `  - ${e.title} (${e.sentiment}, ${e.sentimentScore.toFixed(2)})`)
      .join('\n');
    sections.push(`NEWS SENTIMENT ANALYSIS:
- Overall Sentiment: ${news.overallSentiment}
- Sentiment Score: ${news.avgSentimentScore.toFixed(2)}
- Articles Analyzed: ${news.newsCount}
- Summary: ${news.summary}
Top Events:
${events || '  - none'}`);
  }

  if (technical) {
    const signals = technical.indicatorSignals
      .map(s => `  - ${s.indicator}: ${s.signal.toUpperCase()} (${s.description})`)
      .join('\n');
    const levels = technical.keyLevels
      .map(l => `  - ${l.levelType}: ${l.price.toFixed(2)} (${l.strength})`)
      .join('\n');
    sections.push(`TECHNICAL ANALYSIS:
- Overall Trend: ${technical.overallTrend}
- Current Price: ${technical.currentPrice.toFixed(2)}
- Price Change: ${signed(technical.priceChangePct)}
- Summary: ${technical.summary}
Indicator Signals:
${signals || '  - none'}
Key Levels:
${levels || '  - none'}`);
  }

  if (quant) {
    const r = quant.returnMetrics;
    const k = quant.riskMetrics;
    sections.push(`QUANTITATIVE ANALYSIS:
- Risk Level: ${quant.riskLevel}
- Summary: ${quant.summary}
Return Metrics:
  - Total Return: ${signed(r.totalReturn)}
  - Annualized Return: ${signed(r.annualizedReturn)}
  - Best Day: ${signed(r.bestDay)}
  - Worst Day: ${signed(r.worstDay)}
Risk Metrics:
  - Volatility: ${k.volatility.toFixed(2)}%
  - Sharpe Ratio: ${k.sharpeRatio.toFixed(2)}
  - Sortino Ratio: ${k.sortinoRatio.toFixed(2)}
  - Max Drawdown: ${k.maxDrawdown.toFixed(2)}%
  - VaR (95%): ${k.var95.toFixed(2)}%
Risk/Reward Assessment: ${quant.riskRewardAssessment}`);
  }

  const context = sections.length > 0
    ? sections.join('\n\n')
    : 'No agent results are available. Say so, and keep the recommendation neutral.';

  return `Based on the following analysis from specialized agents, provide a comprehensive final analysis for ${request.subject}.

${context}

${SYNTHESIS_RULES}`;
}

// ── Reply parsing ───────────────────────────────────────────────────

/** Remove a wrapping ``` fence: the first and last fence lines */
export function stripCodeFence(text: string): string {
  const lines = text.trim().split('\n');
  if (lines.length >= 2 && lines[0].trim().startsWith('```') && lines[lines.length - 1].trim().startsWith('```')) {
    return lines.slice(1, -1).join('\n').trim();
  }
  return text.trim();
}

/** "Strong Buy!!" → "strong_buy" */
export function canonicalize(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
    .replace(/[^a-z_]/g, '')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

function isRecommendation(value: string): value is Recommendation {
  return RECOMMENDATIONS.some(r => r === value);
}

function isRiskLevel(value: string): value is RiskLevel {
  return RISK_LEVELS.some(r => r === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfidence(value: unknown): number | undefined {
  const n = typeof value === 'number' ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value)
      : Number.NaN;
  return Number.isFinite(n) ? clamp(n, 0, 1) : undefined;
}

/**
 * Parse the synthesis reply. Unparseable replies become the narrative as
 * received, with default values; an invalid or missing risk level defers to
 * the quant result.
 */
export function parseSynthesis(reply: string, quant: QuantAnalysis | null): SynthesisVerdict {
  const text = stripCodeFence(reply);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = undefined;
  }

  let narrative = reply;
  let recommendation: Recommendation = DEFAULT_RECOMMENDATION;
  let confidence = FALLBACK_CONFIDENCE;
  let riskLevel: RiskLevel | undefined;

  if (isRecord(parsed)) {
    const body = typeof parsed.narrative === 'string' ? parsed.narrative
      : typeof parsed.final_analysis === 'string' ? parsed.final_analysis
        : undefined;
    if (body !== undefined && body.trim() !== '') narrative = body.trim();

    if (typeof parsed.recommendation === 'string') {
      const rec = canonicalize(parsed.recommendation);
      if (isRecommendation(rec)) recommendation = rec;
    }

    confidence = readConfidence(parsed.confidence) ?? FALLBACK_CONFIDENCE;

    if (typeof parsed.risk_level === 'string') {
      const risk = canonicalize(parsed.risk_level);
      if (isRiskLevel(risk)) riskLevel = risk;
    }
  }

  return {
    narrative,
    recommendation,
    confidence,
    riskLevel: riskLevel ?? quant?.riskLevel ?? DEFAULT_RISK_LEVEL,
  };
}
