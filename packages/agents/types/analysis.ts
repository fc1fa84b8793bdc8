// Fixed output vocabularies. Nothing outside these lists ever leaves the orchestrator.

export const RECOMMENDATIONS = ['strong_buy', 'buy', 'hold', 'sell', 'strong_sell'] as const;
export type Recommendation = (typeof RECOMMENDATIONS)[number];

export const RISK_LEVELS = ['low', 'moderate', 'high', 'extreme'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const MARKET_SENTIMENTS = ['bullish', 'bearish', 'neutral'] as const;
export type MarketSentiment = (typeof MARKET_SENTIMENTS)[number];

export const TRENDS = ['bullish', 'bearish', 'neutral', 'mixed'] as const;
export type Trend = (typeof TRENDS)[number];

export const SIGNALS = ['bullish', 'bearish', 'neutral'] as const;
export type Signal = (typeof SIGNALS)[number];

export const HEADLINE_SENTIMENTS = ['positive', 'negative', 'neutral'] as const;

export const LEVEL_STRENGTHS = ['strong', 'moderate', 'weak'] as const;

/** Orchestration controller lifecycle */
export type ControllerState = 'PLANNING' | 'ITERATING' | 'SYNTHESIZING' | 'DONE' | 'FAILED';

export const DEFAULT_RECOMMENDATION: Recommendation = 'hold';
export const DEFAULT_RISK_LEVEL: RiskLevel = 'moderate';
/** Used when the synthesis reply cannot be parsed */
export const FALLBACK_CONFIDENCE = 0.5;
/** Used when the orchestration itself fails */
export const FAILED_CONFIDENCE = 0;
