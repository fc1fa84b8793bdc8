// Action extraction from free-text orchestrator replies

import { UNRECOGNIZED_AGENT, type AgentId, type AgentTarget } from '../types/agents.js';

export type ParsedAction =
  | { kind: 'stop'; implicit: boolean }
  | { kind: 'call'; token: string; target: AgentTarget };

const ACTION_LINE = /^[ \t]*Action[ \t]*:[ \t]*(.*\S)[ \t]*$/im;

const AGENT_ALIASES: Readonly<Record<string, AgentId>> = {
  news: 'news_sentiment',
  news_sentiment: 'news_sentiment',
  sentiment: 'news_sentiment',
  news_sentiment_agent: 'news_sentiment',
  technical: 'technical_analysis',
  technicals: 'technical_analysis',
  ta: 'technical_analysis',
  technical_analysis: 'technical_analysis',
  technical_analysis_agent: 'technical_analysis',
  quant: 'quantitative_metrics',
  quantitative: 'quantitative_metrics',
  quant_metrics: 'quantitative_metrics',
  quantitative_metrics: 'quantitative_metrics',
  quantitative_metrics_agent: 'quantitative_metrics',
};

/**
 * The first `Action: <token>` line wins. A reply without one, or whose
 * token mentions "stop", ends the tool loop.
 */
export function parseAction(reply: string): ParsedAction {
  const match = ACTION_LINE.exec(reply);
  if (!match) return { kind: 'stop', implicit: true };

  const token = match[1].trim();
  if (/stop/i.test(token)) return { kind: 'stop', implicit: false };

  return { kind: 'call', token, target: resolveAgentId(token) };
}

/** "Technical Analysis", `news_sentiment("BTC")` and "quant." all resolve */
export function resolveAgentId(token: string): AgentTarget {
  const normalized = token
    .toLowerCase()
    .replace(/\(.*$/, '')
    .replace(/["'`*.,:;!?[\]{}<>]/g, ' ')
    .trim()
    .replace(/[\s-]+/g, '_');

  return lookup(normalized) ?? lookup(normalized.split('_')[0]) ?? UNRECOGNIZED_AGENT;
}

function lookup(alias: string): AgentId | undefined {
  return Object.hasOwn(AGENT_ALIASES, alias) ? AGENT_ALIASES[alias] : undefined;
}
