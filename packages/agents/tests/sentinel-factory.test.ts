import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config/index.js';
import { createLanguageModel, createSentinel } from '../orchestrator/sentinel-factory.js';
import type { ProgressEvent } from '../types/events.js';
import { FakeMarketData, scriptedModel } from './helpers/fakes.js';

const config = { ...loadConfig({ LOG_LEVEL: 'error' }), pollIntervalMs: 5 };

describe('createLanguageModel', () => {
  it('requires an API key', () => {
    expect(() => createLanguageModel(config)).toThrow('ANTHROPIC_API_KEY environment variable is not set');
  });

  it('builds a model when a key is configured', () => {
    expect(createLanguageModel({ ...config, anthropicApiKey: 'test-secret' })).toBeDefined();
  });
});

describe('createSentinel', () => {
  it('registers one tool per agent', () => {
    const sentinel = createSentinel(config, { llm: scriptedModel({ plan: [] }), marketData: new FakeMarketData() });
    expect(sentinel.tools.map(t => t.id)).toEqual(['news_sentiment', 'technical_analysis', 'quantitative_metrics']);
  });

  it('streams an end-to-end analysis over the injected collaborators', async () => {
    const feed = new FakeMarketData();
    const llm = scriptedModel({
      plan: ['Action: news_sentiment', 'Action: technical_analysis', 'Action: quantitative_metrics', 'Action: STOP'],
      synthesis: '{"narrative":"Constructive.","recommendation":"buy","confidence":0.72}',
    });
    const sentinel = createSentinel(config, { llm, marketData: feed });
    await sentinel.open();

    const sent: ProgressEvent[] = [];
    const terminal = await sentinel.bridge.stream({ subject: 'btc' }, event => { sent.push(event); });
    await sentinel.close();

    expect(feed.calls).toEqual({ news: 1, technicals: 1, quant: 1 });
    expect(terminal.type).toBe('complete');
    expect(terminal.data).toMatchObject({
      subject: 'BTC', recommendation: 'buy', confidence: 0.72, riskLevel: 'moderate', narrative: 'Constructive.',
    });
    expect(sent.filter(e => e.type === 'complete')).toHaveLength(1);
    expect(sent[sent.length - 1]).toBe(terminal);
  });
});
