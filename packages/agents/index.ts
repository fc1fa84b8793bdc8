// Market Sentinel agents
// ReACT orchestrator over news, technical and quantitative sub-agents, with live progress streaming

export { OrchestrationController, DEFAULT_MAX_ITERATIONS, DEFAULT_MAX_HISTORY_MESSAGES } from './orchestrator/controller.js';
export type { AnalysisRunner, ControllerOptions, SessionOutcome } from './orchestrator/controller.js';
export { createSentinel, createLanguageModel } from './orchestrator/sentinel-factory.js';
export type { Sentinel, SentinelOverrides } from './orchestrator/sentinel-factory.js';
export { parseAction, resolveAgentId } from './orchestrator/action-parser.js';
export type { ParsedAction } from './orchestrator/action-parser.js';
export { AnalysisError, AnalysisSession } from './orchestrator/session.js';
export type { GatheredResults } from './orchestrator/session.js';
export { buildSynthesisPrompt, parseSynthesis, canonicalize, stripCodeFence } from './orchestrator/synthesis.js';
export type { SynthesisVerdict } from './orchestrator/synthesis.js';
export { ORCHESTRATOR_SYSTEM_PROMPT, SYNTHESIS_RULES, buildTaskMessage } from './orchestrator/prompts.js';

export { BaseAgent, DEFAULT_CALL_TIMEOUT_MS } from './agents/base-agent.js';
export type { AgentDeps, AgentInput, SubAgent } from './agents/base-agent.js';
export { NewsAgent, NEWS_UNAVAILABLE_SUMMARY } from './agents/news-agent.js';
export { TechnicalAgent, classifyTrend, signalAgreement } from './agents/technical-agent.js';
export { QuantAgent, classifyRisk, metricCoverage, splitNarrative } from './agents/quant-agent.js';

export { AgentTool, toObservation } from './tools/agent-tool.js';
export type { ToolOutcome, ControlObservation, Observation } from './tools/agent-tool.js';

export { ProgressBus } from './collaboration/progress-bus.js';
export type { ProgressFilter } from './collaboration/progress-bus.js';

export { ProgressChannel } from './streaming/progress-channel.js';
export { StreamingBridge, DEFAULT_POLL_INTERVAL_MS } from './streaming/streaming-bridge.js';
export type { SendFn, StreamingBridgeOptions } from './streaming/streaming-bridge.js';
export { AnalysisServer, parseWireRequest, POLICY_VIOLATION } from './streaming/ws-server.js';
export type { AnalysisServerOptions } from './streaming/ws-server.js';

export { AnthropicLanguageModel, toAnthropicRequest } from './bridge/llm-client.js';
export type { AnthropicModelOptions, MessagesClient, MessagesReply } from './bridge/llm-client.js';

export { loadConfig, DEFAULT_ALLOWED_ORIGINS, DEFAULT_THRESHOLDS } from './config/index.js';
export type { SentinelConfig, ClassificationThresholds, RiskTier } from './config/index.js';

export * from './schemas/analysis.js';
export * from './types/agents.js';
export * from './types/analysis.js';
export * from './types/events.js';
export type * from './types/collaborators.js';

export { createLogger, errorMessage } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { withTimeout, TimeoutError } from './utils/timeout.js';
