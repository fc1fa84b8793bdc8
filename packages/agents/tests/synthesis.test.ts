import { describe, it, expect } from 'vitest';
import { NewsAgent } from '../agents/news-agent.js';
import { QuantAgent } from '../agents/quant-agent.js';
import { SYNTHESIS_RULES } from '../orchestrator/prompts.js';
import {
  buildSynthesisPrompt, canonicalize, parseSynthesis, stripCodeFence,
} from '../orchestrator/synthesis.js';
import { acceptRequest, type QuantAnalysis } from '../schemas/analysis.js';
import { FakeMarketData, StubModel, silentLogger } from './helpers/fakes.js';

const llm = new StubModel(() => 'ok');

function quantWith(riskLevel: QuantAnalysis['riskLevel']): QuantAnalysis {
  const agent = new QuantAgent(new FakeMarketData(), { llm, logger: silentLogger });
  return { ...agent.defaultResult('n/a'), riskLevel };
}

describe('canonicalize', () => {
  it('lowercases, joins words and drops punctuation', () => {
    expect(canonicalize('Strong Buy!!')).toBe('strong_buy');
    expect(canonicalize(' SELL ')).toBe('sell');
    expect(canonicalize('strong-sell')).toBe('strong_sell');
    expect(canonicalize('_hold_')).toBe('hold');
  });
});

describe('stripCodeFence', () => {
  it('removes a wrapping fence', () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFence('  plain text \n')).toBe('plain text');
  });
});

describe('parseSynthesis', () => {
  it('reads every field of a well-formed reply', () => {
    const reply = '{"narrative":"Upside ahead.","recommendation":"Strong Buy","confidence":0.8,"risk_level":"High"}';
    expect(parseSynthesis(reply, null)).toEqual({
      narrative: 'Upside ahead.',
      recommendation: 'strong_buy',
      confidence: 0.8,
      riskLevel: 'high',
    });
  });

  it('accepts a fenced reply and the final_analysis field', () => {
    const reply = '```json\n{"final_analysis":"Sideways.","recommendation":"sell","confidence":"0.7"}\n```';
    expect(parseSynthesis(reply, null)).toEqual({
      narrative: 'Sideways.',
      recommendation: 'sell',
      confidence: 0.7,
      riskLevel: 'moderate',
    });
  });

  it('clamps confidence into the unit interval', () => {
    expect(parseSynthesis('{"confidence":1.4}', null).confidence).toBe(1);
    expect(parseSynthesis('{"confidence":-2}', null).confidence).toBe(0);
    expect(parseSynthesis('{"confidence":"very"}', null).confidence).toBe(0.5);
  });

  it('falls back to hold for an unknown recommendation', () => {
    expect(parseSynthesis('{"recommendation":"accumulate"}', null).recommendation).toBe('hold');
  });

  it('uses prose replies verbatim with default values', () => {
    const prose = 'Momentum is fading while sentiment holds up.';
    expect(parseSynthesis(prose, null)).toEqual({
      narrative: prose,
      recommendation: 'hold',
      confidence: 0.5,
      riskLevel: 'moderate',
    });
  });

  it('defers to the quant risk level when none is validly supplied', () => {
    expect(parseSynthesis('No JSON here.', quantWith('high')).riskLevel).toBe('high');
    expect(parseSynthesis('{"risk_level":"catastrophic"}', quantWith('extreme')).riskLevel).toBe('extreme');
    expect(parseSynthesis('{"risk_level":"low"}', quantWith('extreme')).riskLevel).toBe('low');
  });

  it('keeps the unparsed reply untouched, whitespace included', () => {
    expect(parseSynthesis('Markets look choppy.\n', null).narrative).toBe('Markets look choppy.\n');
    expect(parseSynthesis('```\nnot json\n```', null).narrative).toBe('```\nnot json\n```');
  });

  it('treats a JSON array as prose', () => {
    expect(parseSynthesis('[1, 2]', null).narrative).toBe('[1, 2]');
  });
});

describe('buildSynthesisPrompt', () => {
  const request = acceptRequest({ subject: 'eth' });

  it('opens with the subject and closes with the response rules', () => {
    const prompt = buildSynthesisPrompt(request, { news: null, technical: null, quant: null });
    expect(prompt.startsWith(
      'Based on the following analysis from specialized agents, provide a comprehensive final analysis for ETH.',
    )).toBe(true);
    expect(prompt.endsWith(SYNTHESIS_RULES)).toBe(true);
    expect(prompt).toContain('No agent results are available.');
  });

  it('includes a section per gathered result only', () => {
    const news = new NewsAgent(new FakeMarketData(), { llm, logger: silentLogger }).defaultResult();
    const prompt = buildSynthesisPrompt(request, { news, technical: null, quant: quantWith('low') });

    expect(prompt).toContain('NEWS SENTIMENT ANALYSIS:\n- Overall Sentiment: neutral');
    expect(prompt).toContain('QUANTITATIVE ANALYSIS:\n- Risk Level: low');
    expect(prompt).not.toContain('TECHNICAL ANALYSIS:');
  });
});
