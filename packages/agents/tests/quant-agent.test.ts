import { describe, it, expect, beforeEach } from 'vitest';
import {
  NO_ASSESSMENT, QuantAgent, classifyRisk, metricCoverage, splitNarrative,
} from '../agents/quant-agent.js';
import { ProgressBus } from '../collaboration/progress-bus.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import { FakeMarketData, StubModel, quantMetrics, silentLogger } from './helpers/fakes.js';

const input = { subject: 'BTC', days: 30 };

describe('QuantAgent', () => {
  let bus: ProgressBus;

  beforeEach(() => {
    bus = new ProgressBus(undefined, silentLogger);
  });

  it('converts fractions to percentages and classifies risk', async () => {
    const llm = new StubModel(() => 'Volatility is elevated but drawdowns are contained.\n\nReward justifies a measured position.');
    const agent = new QuantAgent(new FakeMarketData(), { llm, logger: silentLogger });

    const result = await agent.run(input, bus);

    expect(result.returnMetrics).toEqual({
      totalReturn: 12,
      annualizedReturn: 50,
      dailyAvgReturn: 0.2,
      bestDay: 8,
      worstDay: -7,
    });
    expect(result.riskMetrics).toEqual({
      volatility: 45,
      sharpeRatio: 1.23,
      sortinoRatio: 1.8,
      maxDrawdown: -20,
      var95: -4.5,
      cvar95: -6,
    });
    expect(result.riskLevel).toBe('moderate');
    expect(result.confidence).toBe(1);
    expect(result.summary).toBe('Volatility is elevated but drawdowns are contained.');
    expect(result.riskRewardAssessment).toBe('Reward justifies a measured position.');
  });

  it('uses a placeholder assessment for a single-paragraph reply', async () => {
    const agent = new QuantAgent(new FakeMarketData(), { llm: new StubModel(() => 'One paragraph only.'), logger: silentLogger });
    const result = await agent.run(input, bus);
    expect(result.summary).toBe('One paragraph only.');
    expect(result.riskRewardAssessment).toBe(NO_ASSESSMENT);
  });

  it('includes the metrics and risk level in the model context', async () => {
    const llm = new StubModel(() => 'ok');
    const agent = new QuantAgent(new FakeMarketData(), { llm, logger: silentLogger });
    await agent.run(input, bus);

    const context = llm.calls[0][1].content;
    expect(context).toContain('- Total Return (30d): +12.00%');
    expect(context).toContain('- Max Drawdown: -20.00%');
    expect(context).toContain('Risk Level: MODERATE');
  });

  it('returns the moderate default when metrics are unavailable', async () => {
    const events: string[] = [];
    const observed = new ProgressBus(event => events.push(`${event.type}:${event.message}`), silentLogger);
    const agent = new QuantAgent(
      new FakeMarketData({ quant: { error: 'Insufficient return data' } }),
      { llm: new StubModel(() => 'unused'), logger: silentLogger },
    );

    const result = await agent.run(input, observed);

    expect(result).toEqual({
      agent: 'quantitative_metrics',
      summary: 'Unable to fetch quant metrics: Insufficient return data',
      riskLevel: 'moderate',
      returnMetrics: { totalReturn: 0, annualizedReturn: 0, dailyAvgReturn: 0, bestDay: 0, worstDay: 0 },
      riskMetrics: { volatility: 0, sharpeRatio: 0, sortinoRatio: 0, maxDrawdown: 0, var95: 0, cvar95: 0 },
      riskRewardAssessment: 'Unable to assess risk/reward',
      confidence: 0,
    });
    expect(events).toEqual([
      'thinking:Fetching quantitative metrics for BTC...',
      'error:Error: Insufficient return data',
    ]);
  });

  it('treats non-finite metrics as unavailable', async () => {
    const metrics = quantMetrics({ annualizedVolatility: Number.NaN, maxDrawdown: -0.35 });
    const agent = new QuantAgent(new FakeMarketData({ quant: metrics }), { llm: new StubModel(() => 'ok'), logger: silentLogger });

    const result = await agent.run(input, bus);
    expect(result.riskLevel).toBe('high');
    expect(result.riskMetrics.volatility).toBe(0);
    expect(result.confidence).toBe(0.9286);
  });

  it('describes its result in one line', async () => {
    const agent = new QuantAgent(new FakeMarketData(), { llm: new StubModel(() => 'ok'), logger: silentLogger });
    expect(agent.describe(await agent.run(input, bus))).toBe('Risk level: moderate, Sharpe: 1.23');
  });
});

describe('classifyRisk', () => {
  it('checks tiers from most to least severe', () => {
    expect(classifyRisk(1.2, -0.1, DEFAULT_THRESHOLDS)).toBe('extreme');
    expect(classifyRisk(0.2, -0.55, DEFAULT_THRESHOLDS)).toBe('extreme');
    expect(classifyRisk(0.7, -0.1, DEFAULT_THRESHOLDS)).toBe('high');
    expect(classifyRisk(0.2, -0.2, DEFAULT_THRESHOLDS)).toBe('moderate');
    expect(classifyRisk(0.1, -0.05, DEFAULT_THRESHOLDS)).toBe('low');
  });

  it('falls back to moderate when both inputs are missing', () => {
    expect(classifyRisk(Number.NaN, Number.POSITIVE_INFINITY, DEFAULT_THRESHOLDS)).toBe('moderate');
    expect(classifyRisk(Number.NaN, -0.05, DEFAULT_THRESHOLDS)).toBe('low');
  });
});

describe('metricCoverage', () => {
  it('is the share of finite metric values', () => {
    expect(metricCoverage(quantMetrics())).toBe(1);
    expect(metricCoverage(quantMetrics({ annualizedVolatility: Number.NaN, maxDrawdown: Number.NaN }))).toBe(0.8571);
  });
});

describe('splitNarrative', () => {
  it('splits on blank lines, ignoring extra whitespace', () => {
    expect(splitNarrative('  First.\n  \n\nSecond.\n\nThird.')).toEqual({ summary: 'First.', assessment: 'Second.' });
    expect(splitNarrative('Only one.')).toEqual({ summary: 'Only one.', assessment: NO_ASSESSMENT });
  });
});
