// Classification policy constants. Stable for a given input, overridable through config.

export interface RiskTier {
  volatility: number;  // annualized, as a fraction
  drawdown: number;    // absolute max drawdown, as a fraction
}

export interface ClassificationThresholds {
  sentimentBullish: number;   // mean headline score above this is bullish
  sentimentBearish: number;   // mean headline score below this is bearish
  rsiOverbought: number;
  rsiOversold: number;
  trendMargin: number;        // directional signals one side must lead by
  riskExtreme: RiskTier;
  riskHigh: RiskTier;
  riskModerate: RiskTier;
  newsLimit: number;          // headlines requested from the feed
  newsContextSize: number;    // headlines given to the language model
  topEvents: number;          // headlines kept in the result, by |score|
  keyLevelWindow: number;     // bars scanned for support / resistance
}

export const DEFAULT_THRESHOLDS: Readonly<ClassificationThresholds> = {
  sentimentBullish: 0.15,
  sentimentBearish: -0.15,
  rsiOverbought: 70,
  rsiOversold: 30,
  trendMargin: 1,
  riskExtreme: { volatility: 1.0, drawdown: 0.5 },
  riskHigh: { volatility: 0.6, drawdown: 0.3 },
  riskModerate: { volatility: 0.3, drawdown: 0.15 },
  newsLimit: 20,
  newsContextSize: 15,
  topEvents: 5,
  keyLevelWindow: 20,
};
