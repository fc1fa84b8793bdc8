// Risk / return statistics over daily closes (252 trading days per year)

import type { Fetched, OhlcvBar, QuantMetrics } from './types.js';

export const TRADING_DAYS = 252;
export const MIN_RETURNS = 10;

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Sample standard deviation (n - 1); NaN below two observations */
export function sampleStd(values: number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  return Math.sqrt(values.reduce((acc, v) => acc + (v - m) ** 2, 0) / (values.length - 1));
}

/** Percentile with linear interpolation between closest ranks */
export function percentile(values: number[], p: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

export function dailyReturns(closes: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    if (closes[i - 1] !== 0) out.push(closes[i] / closes[i - 1] - 1);
  }
  return out;
}

/** Largest peak-to-trough decline of the compounded return path, as a negative fraction */
export function maxDrawdown(returns: number[]): number {
  let cumulative = 1;
  let peak = 1;
  let worst = 0;
  for (const r of returns) {
    cumulative *= 1 + r;
    peak = Math.max(peak, cumulative);
    worst = Math.min(worst, (cumulative - peak) / peak);
  }
  return worst;
}

export function computeQuantMetrics(
  symbol: string,
  bars: OhlcvBar[],
  riskFreeRate = 0.05,
): Fetched<QuantMetrics> {
  if (bars.length < 2) {
    return { error: 'Insufficient data for quant metrics' };
  }

  const closes = [...bars].sort((a, b) => a.timestamp - b.timestamp).map(b => b.close);
  const returns = dailyReturns(closes);
  if (returns.length < MIN_RETURNS) {
    return { error: 'Insufficient return data' };
  }

  const dailyMean = mean(returns);
  const dailyStd = sampleStd(returns);
  const annualizedReturn = dailyMean * TRADING_DAYS;
  const annualizedVolatility = dailyStd * Math.sqrt(TRADING_DAYS);

  const dailyRf = riskFreeRate / TRADING_DAYS;
  const excess = returns.map(r => r - dailyRf);
  const excessStd = sampleStd(excess);
  const sharpe = excessStd > 0 ? (mean(excess) / excessStd) * Math.sqrt(TRADING_DAYS) : 0;

  const downside = returns.filter(r => r < 0);
  const downsideStd = downside.length === 0 ? 0.001 : sampleStd(downside);
  const sortino = downsideStd > 0 ? ((dailyMean - dailyRf) / downsideStd) * Math.sqrt(TRADING_DAYS) : 0;

  const drawdown = maxDrawdown(returns);
  const calmar = drawdown !== 0 ? annualizedReturn / Math.abs(drawdown) : 0;

  const var95 = percentile(returns, 5);
  const tail = returns.filter(r => r <= var95);
  const cvar95 = tail.length > 0 ? mean(tail) : var95;

  const totalReturn = closes[0] !== 0 ? closes[closes.length - 1] / closes[0] - 1 : 0;

  return {
    symbol,
    returns: {
      dailyMean: round(dailyMean, 6),
      dailyStd: round(dailyStd, 6),
      annualizedReturn: round(annualizedReturn, 4),
      annualizedVolatility: round(annualizedVolatility, 4),
    },
    risk: {
      sharpeRatio: round(sharpe, 4),
      sortinoRatio: round(sortino, 4),
      maxDrawdown: round(drawdown, 4),
      calmarRatio: round(calmar, 4),
      var95: round(var95, 4),
      cvar95: round(cvar95, 4),
    },
    performance: {
      totalReturn: round(totalReturn, 4),
      bestDay: round(Math.max(...returns), 4),
      worstDay: round(Math.min(...returns), 4),
      positiveDaysPct: round((returns.filter(r => r > 0).length / returns.length) * 100, 2),
    },
  };
}
