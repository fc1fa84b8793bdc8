// Sub-agent identities: the closed set the orchestrator dispatches over

export const AGENT_IDS = ['news_sentiment', 'technical_analysis', 'quantitative_metrics'] as const;

export type AgentId = (typeof AGENT_IDS)[number];

/** Any action token that does not resolve to a known agent */
export const UNRECOGNIZED_AGENT = 'unknown';

export type AgentTarget = AgentId | typeof UNRECOGNIZED_AGENT;

export const ORCHESTRATOR_NAME = 'Orchestrator';

export const AGENT_NAMES: Readonly<Record<AgentId, string>> = {
  news_sentiment: 'News Sentiment Agent',
  technical_analysis: 'Technical Analysis Agent',
  quantitative_metrics: 'Quantitative Metrics Agent',
};

export const AGENT_DESCRIPTIONS: Readonly<Record<AgentId, string>> = {
  news_sentiment: 'Analyzes recent crypto news headlines and overall market sentiment',
  technical_analysis: 'Analyzes price action and technical indicators (RSI, MACD, EMA, Bollinger Bands)',
  quantitative_metrics: 'Analyzes return and risk metrics (volatility, Sharpe, Sortino, drawdown, VaR)',
};

/** Request flag that enables each agent */
export type AgentToggle = 'includeNews' | 'includeTechnical' | 'includeQuant';

export const AGENT_TOGGLES: Readonly<Record<AgentId, AgentToggle>> = {
  news_sentiment: 'includeNews',
  technical_analysis: 'includeTechnical',
  quantitative_metrics: 'includeQuant',
};
