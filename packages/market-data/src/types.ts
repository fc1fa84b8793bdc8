// Shapes returned by the market data collaborators.
// Numeric series keep `null` where an indicator is still warming up.

export interface DataError {
  error: string;
}

/** Either the payload or a `{ error }` describing why it is unavailable */
export type Fetched<T> = T | DataError;

export function isDataError(value: unknown): value is DataError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'string'
  );
}

export interface OhlcvBar {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number | null;
}

export type Series = Array<number | null>;

export interface IndicatorSet {
  ema: Record<string, Series>;
  macd: { macd: Series; signal: Series; hist: Series };
  rsi: Series;
  bbands: { mid: Series; upper: Series; lower: Series };
}

export interface TechnicalSnapshot {
  symbol: string;
  coinId: string;
  bars: OhlcvBar[];
  indicators: IndicatorSet;
}

export interface ReturnStats {
  dailyMean: number;
  dailyStd: number;
  annualizedReturn: number;
  annualizedVolatility: number;
}

export interface RiskStats {
  sharpeRatio: number;
  sortinoRatio: number;
  maxDrawdown: number;
  calmarRatio: number;
  var95: number;
  cvar95: number;
}

export interface PerformanceStats {
  totalReturn: number;
  bestDay: number;
  worstDay: number;
  positiveDaysPct: number;
}

/** Fractions (0.05 = 5%), except positiveDaysPct which is already a percentage */
export interface QuantMetrics {
  symbol: string;
  returns: ReturnStats;
  risk: RiskStats;
  performance: PerformanceStats;
}

export type HeadlineSentiment = 'positive' | 'negative' | 'neutral';

export interface NewsArticle {
  id: string;
  title: string;
  url: string;
  publishedAt: string | null;
  content: string;
  source: string | null;
  sentiment: HeadlineSentiment;
  sentimentScore: number;
}
