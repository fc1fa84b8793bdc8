// Wires configuration, collaborators, agents, tools, controller and bridge.
// Collaborators can be swapped for in-process fakes.

import {
  MarketDataService, NewsStore, TtlCache, marketDataConfigFromEnv, type MarketDataConfig,
} from '@market-sentinel/market-data';
import { NewsAgent } from '../agents/news-agent.js';
import { QuantAgent } from '../agents/quant-agent.js';
import { TechnicalAgent } from '../agents/technical-agent.js';
import type { AgentDeps } from '../agents/base-agent.js';
import { AnthropicLanguageModel } from '../bridge/llm-client.js';
import type { SentinelConfig } from '../config/index.js';
import { StreamingBridge } from '../streaming/streaming-bridge.js';
import { AgentTool } from '../tools/agent-tool.js';
import type { LanguageModel, MarketData } from '../types/collaborators.js';
import { createLogger } from '../utils/logger.js';
import { OrchestrationController } from './controller.js';

export interface SentinelOverrides {
  llm?: LanguageModel;
  /** Replaces the CoinGecko/CryptoPanic-backed service entirely */
  marketData?: MarketData;
  marketDataConfig?: MarketDataConfig;
}

export interface Sentinel {
  controller: OrchestrationController;
  bridge: StreamingBridge;
  agents: {
    news: NewsAgent;
    technical: TechnicalAgent;
    quant: QuantAgent;
  };
  tools: AgentTool[];
  marketData: MarketData;
  /** Load the on-disk news cache */
  open(): Promise<void>;
  /** Flush the news cache and drop in-memory entries */
  close(): Promise<void>;
}

export function createLanguageModel(config: SentinelConfig): LanguageModel {
  if (!config.anthropicApiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is not set');
  }
  return new AnthropicLanguageModel({
    apiKey: config.anthropicApiKey,
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.callTimeoutMs,
  });
}

export function createSentinel(config: SentinelConfig, overrides: SentinelOverrides = {}): Sentinel {
  const logger = (scope: string) => createLogger(scope, config.logLevel);
  const llm = overrides.llm ?? createLanguageModel(config);

  let service: MarketDataService | undefined;
  let marketData: MarketData;
  if (overrides.marketData) {
    marketData = overrides.marketData;
  } else {
    const dataConfig = overrides.marketDataConfig ?? marketDataConfigFromEnv();
    const dataLogger = logger('MarketData');
    service = new MarketDataService({
      config: dataConfig,
      cache: new TtlCache(),
      newsStore: new NewsStore(dataConfig.newsCachePath, (message, data) => dataLogger.warn(message, data)),
      onWarning: (message, data) => dataLogger.warn(message, data),
    });
    marketData = service;
  }

  const deps: AgentDeps = {
    llm,
    thresholds: config.thresholds,
    callTimeoutMs: config.callTimeoutMs,
    logger: logger('Agent'),
  };
  const agents = {
    news: new NewsAgent(marketData, deps),
    technical: new TechnicalAgent(marketData, deps),
    quant: new QuantAgent(marketData, deps),
  };
  const tools: AgentTool[] = [
    new AgentTool(agents.news),
    new AgentTool(agents.technical),
    new AgentTool(agents.quant),
  ];

  const controller = new OrchestrationController({
    llm,
    tools,
    maxIterations: config.maxIterations,
    maxHistoryMessages: config.maxHistoryMessages,
    callTimeoutMs: config.callTimeoutMs,
    logger: logger('Orchestrator'),
  });
  const bridge = new StreamingBridge(controller, {
    pollIntervalMs: config.pollIntervalMs,
    logger: logger('StreamingBridge'),
  });

  return {
    controller,
    bridge,
    agents,
    tools,
    marketData,
    open: async () => {
      await service?.open();
    },
    close: async () => {
      await service?.close();
    },
  };
}
