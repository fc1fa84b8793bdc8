import { describe, it, expect } from 'vitest';
import { bollingerBands, computeIndicators, ema, macd, rsi } from '../src/indicators.js';

describe('ema', () => {
  it('seeds with the first value and smooths with 2 / (span + 1)', () => {
    expect(ema([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
  });

  it('returns an empty series for empty input', () => {
    expect(ema([], 10)).toEqual([]);
  });
});

describe('macd', () => {
  it('is flat for a constant series', () => {
    const result = macd([5, 5, 5, 5]);
    expect(result.macd).toEqual([0, 0, 0, 0]);
    expect(result.hist).toEqual([0, 0, 0, 0]);
  });
});

describe('rsi', () => {
  it('leaves the first entry and flat stretches undefined', () => {
    expect(rsi([5, 5, 5])).toEqual([null, null, null]);
  });

  it('is 100 when there are no losses', () => {
    expect(rsi([1, 2, 3])).toEqual([null, 100, 100]);
  });

  it('applies Wilder smoothing', () => {
    expect(rsi([10, 11, 10], 2)).toEqual([null, 100, 50]);
  });
});

describe('bollingerBands', () => {
  it('uses a rolling mean and sample standard deviation', () => {
    const bands = bollingerBands([1, 2, 3, 4], 3, 2);

    expect(bands.mid).toEqual([null, null, 2, 3]);
    expect(bands.upper).toEqual([null, null, 4, 5]);
    expect(bands.lower).toEqual([null, null, 0, 1]);
  });
});

describe('computeIndicators', () => {
  it('computes every indicator aligned with the bars', () => {
    const bars = Array.from({ length: 30 }, (_, i) => ({
      timestamp: i, open: 100 + i, high: 101 + i, low: 99 + i, close: 100 + i, volume: null,
    }));

    const set = computeIndicators(bars);

    expect(Object.keys(set.ema)).toEqual(['20', '50', '100', '200']);
    expect(set.ema['20']).toHaveLength(30);
    expect(set.rsi[29]).toBe(100);
    expect(set.bbands.mid[18]).toBeNull();
    expect(set.bbands.mid[19]).toBe(109.5);
  });
});
