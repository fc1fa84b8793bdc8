// Technical indicators over a close-price series.
// Outputs are aligned with the input; entries without enough history are null.

import type { IndicatorSet, OhlcvBar, Series } from './types.js';

export interface IndicatorParams {
  emaPeriods: number[];
  macd: { fast: number; slow: number; signal: number };
  rsiPeriod: number;
  bbWindow: number;
  bbStd: number;
}

export const DEFAULT_INDICATOR_PARAMS: IndicatorParams = {
  emaPeriods: [20, 50, 100, 200],
  macd: { fast: 12, slow: 26, signal: 9 },
  rsiPeriod: 14,
  bbWindow: 20,
  bbStd: 2,
};

/** Exponential moving average seeded with the first value (alpha = 2 / (span + 1)) */
export function ema(values: number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  for (const [i, v] of values.entries()) {
    out.push(i === 0 ? v : alpha * v + (1 - alpha) * out[i - 1]);
  }
  return out;
}

export function macd(
  values: number[],
  fast = 12,
  slow = 26,
  signal = 9,
): { macd: number[]; signal: number[]; hist: number[] } {
  const fastEma = ema(values, fast);
  const slowEma = ema(values, slow);
  const line = fastEma.map((f, i) => f - slowEma[i]);
  const signalLine = ema(line, signal);
  return {
    macd: line,
    signal: signalLine,
    hist: line.map((m, i) => m - signalLine[i]),
  };
}

/** Wilder RSI (smoothing alpha = 1 / period). The first entry is always null. */
export function rsi(values: number[], period = 14): Series {
  const alpha = 1 / period;
  const out: Series = values.length > 0 ? [null] : [];
  let avgUp = 0;
  let avgDown = 0;

  for (let i = 1; i < values.length; i++) {
    const delta = values[i] - values[i - 1];
    const up = Math.max(delta, 0);
    const down = Math.max(-delta, 0);
    if (i === 1) {
      avgUp = up;
      avgDown = down;
    } else {
      avgUp = alpha * up + (1 - alpha) * avgUp;
      avgDown = alpha * down + (1 - alpha) * avgDown;
    }

    if (avgDown === 0) {
      out.push(avgUp === 0 ? null : 100);
    } else {
      out.push(100 - 100 / (1 + avgUp / avgDown));
    }
  }
  return out;
}

/** Rolling mean +/- numStd sample standard deviations */
export function bollingerBands(
  values: number[],
  window = 20,
  numStd = 2,
): { mid: Series; upper: Series; lower: Series } {
  const mid: Series = [];
  const upper: Series = [];
  const lower: Series = [];

  for (let i = 0; i < values.length; i++) {
    if (i + 1 < window || window < 2) {
      mid.push(null);
      upper.push(null);
      lower.push(null);
      continue;
    }
    const slice = values.slice(i + 1 - window, i + 1);
    const mean = slice.reduce((a, b) => a + b, 0) / window;
    const variance = slice.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (window - 1);
    const std = Math.sqrt(variance);
    mid.push(mean);
    upper.push(mean + std * numStd);
    lower.push(mean - std * numStd);
  }
  return { mid, upper, lower };
}

export function computeIndicators(
  bars: OhlcvBar[],
  params: IndicatorParams = DEFAULT_INDICATOR_PARAMS,
): IndicatorSet {
  const close = bars.map(b => b.close);

  const emaSeries: Record<string, Series> = {};
  for (const period of params.emaPeriods) {
    emaSeries[String(period)] = ema(close, period);
  }

  return {
    ema: emaSeries,
    macd: macd(close, params.macd.fast, params.macd.slow, params.macd.signal),
    rsi: rsi(close, params.rsiPeriod),
    bbands: bollingerBands(close, params.bbWindow, params.bbStd),
  };
}
