import { describe, it, expect } from 'vitest';
import { parseAction, resolveAgentId } from '../orchestrator/action-parser.js';

describe('parseAction', () => {
  it('reads the agent named on the Action line', () => {
    expect(parseAction('Thought: I need sentiment first.\nAction: news_sentiment')).toEqual({
      kind: 'call', token: 'news_sentiment', target: 'news_sentiment',
    });
  });

  it('ignores case and padding around the label', () => {
    expect(parseAction('  action :  Technical Analysis  ')).toEqual({
      kind: 'call', token: 'Technical Analysis', target: 'technical_analysis',
    });
  });

  it('uses the first Action line when several are present', () => {
    const reply = 'Thought: two things\nAction: quant\nAction: news_sentiment';
    expect(parseAction(reply)).toMatchObject({ kind: 'call', target: 'quantitative_metrics' });
  });

  it('stops explicitly on a STOP token', () => {
    expect(parseAction('Thought: enough\nAction: STOP')).toEqual({ kind: 'stop', implicit: false });
    expect(parseAction('Action: stop_analysis')).toEqual({ kind: 'stop', implicit: false });
  });

  it('stops implicitly when no Action line is present', () => {
    expect(parseAction('I believe the picture is clear now.')).toEqual({ kind: 'stop', implicit: true });
    expect(parseAction('Action:')).toEqual({ kind: 'stop', implicit: true });
    expect(parseAction('')).toEqual({ kind: 'stop', implicit: true });
  });

  it('keeps unresolvable tokens as unknown calls', () => {
    expect(parseAction('Action: weather_forecast')).toEqual({
      kind: 'call', token: 'weather_forecast', target: 'unknown',
    });
  });
});

describe('resolveAgentId', () => {
  it.each([
    ['news_sentiment', 'news_sentiment'],
    ['news_sentiment("BTC")', 'news_sentiment'],
    ['News Sentiment Agent', 'news_sentiment'],
    ['news-sentiment', 'news_sentiment'],
    ['`technical_analysis`', 'technical_analysis'],
    ['TA', 'technical_analysis'],
    ['quant.', 'quantitative_metrics'],
    ['**Quantitative Metrics**', 'quantitative_metrics'],
    ['quantitative metrics please', 'quantitative_metrics'],
  ])('resolves %s', (token, expected) => {
    expect(resolveAgentId(token)).toBe(expected);
  });

  it('does not resolve inherited object keys', () => {
    expect(resolveAgentId('constructor')).toBe('unknown');
    expect(resolveAgentId('toString')).toBe('unknown');
  });

  it('falls back to unknown for unrelated tokens', () => {
    expect(resolveAgentId('on_chain_flows')).toBe('unknown');
  });
});
