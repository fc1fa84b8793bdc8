// Orchestration controller: Thought → Action → Observation loop over the
// sub-agent tools, then one synthesis call.
//
// States: PLANNING → ITERATING → SYNTHESIZING → DONE, or FAILED when an
// exception escapes the controller's own logic. Both terminal states yield
// a well-formed FinalAnalysis.

import { ProgressBus } from '../collaboration/progress-bus.js';
import {
  acceptRequest, FinalAnalysisSchema, type AnalysisRequestInput, type FinalAnalysis,
} from '../schemas/analysis.js';
import { toObservation, type AgentTool, type Observation } from '../tools/agent-tool.js';
import {
  DEFAULT_RECOMMENDATION, DEFAULT_RISK_LEVEL, FAILED_CONFIDENCE, type ControllerState,
} from '../types/analysis.js';
import { AGENT_TOGGLES, ORCHESTRATOR_NAME, type AgentId, type AgentTarget } from '../types/agents.js';
import type { ChatMessage, LanguageModel } from '../types/collaborators.js';
import type { ProgressObserver } from '../types/events.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { parseAction } from './action-parser.js';
import { buildTaskMessage, ORCHESTRATOR_SYSTEM_PROMPT } from './prompts.js';
import { AnalysisError, AnalysisSession } from './session.js';
import { buildSynthesisPrompt, parseSynthesis } from './synthesis.js';

export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_MAX_HISTORY_MESSAGES = 12;

export interface ControllerOptions {
  llm: LanguageModel;
  tools: AgentTool[];
  maxIterations?: number;
  maxHistoryMessages?: number;
  /** Bound on each orchestrator language-model call */
  callTimeoutMs?: number;
  logger?: Logger;
}

export interface SessionOutcome {
  analysis: FinalAnalysis;
  state: ControllerState;
  iterations: number;
  /** Observation strings in the order they were appended to the history */
  observations: string[];
}

/** Anything that turns a request into a final analysis while reporting progress */
export interface AnalysisRunner {
  run(request: AnalysisRequestInput, observer?: ProgressObserver): Promise<FinalAnalysis>;
}

export class OrchestrationController implements AnalysisRunner {
  private readonly llm: LanguageModel;
  private readonly tools = new Map<AgentId, AgentTool>();
  private readonly maxIterations: number;
  private readonly maxHistoryMessages: number;
  private readonly callTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ControllerOptions) {
    this.llm = options.llm;
    for (const tool of options.tools) this.tools.set(tool.id, tool);
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.maxHistoryMessages = options.maxHistoryMessages ?? DEFAULT_MAX_HISTORY_MESSAGES;
    this.callTimeoutMs = options.callTimeoutMs ?? 0;
    this.logger = options.logger ?? createLogger(ORCHESTRATOR_NAME);
  }

  async run(request: AnalysisRequestInput, observer?: ProgressObserver): Promise<FinalAnalysis> {
    const outcome = await this.execute(request, observer);
    return outcome.analysis;
  }

  /**
   * Run one analysis session. Invalid requests throw before any work starts;
   * after that the returned promise always resolves.
   */
  async execute(input: AnalysisRequestInput, observer?: ProgressObserver): Promise<SessionOutcome> {
    const request = acceptRequest(input);
    const bus = new ProgressBus(observer, this.logger);
    const session = new AnalysisSession(request, this.maxHistoryMessages);

    try {
      this.note(bus, `Starting analysis for ${request.subject}`);
      session.start(ORCHESTRATOR_SYSTEM_PROMPT, buildTaskMessage(request));
      session.transition('ITERATING');

      await this.iterate(session, bus);

      session.transition('SYNTHESIZING');
      const analysis = await this.synthesize(session, bus);
      session.transition('DONE');
      bus.emit('final', ORCHESTRATOR_NAME, 'Final analysis ready', {
        recommendation: analysis.recommendation,
        confidence: analysis.confidence,
        riskLevel: analysis.riskLevel,
      });
      return this.outcome(session, analysis);
    } catch (err) {
      const stage = err instanceof AnalysisError ? err.stage : session.state;
      session.transition('FAILED');
      const message = errorMessage(err);
      this.logger.error('Analysis failed', { subject: request.subject, stage, error: message });
      bus.think(ORCHESTRATOR_NAME, `Analysis failed during ${stage}: ${message}`);
      bus.emit('error', ORCHESTRATOR_NAME, `Error: ${message}`);
      return this.outcome(session, this.degraded(session, bus, message));
    }
  }

  // ── Loop ──────────────────────────────────────────────────────────

  private async iterate(session: AnalysisSession, bus: ProgressBus): Promise<void> {
    while (session.iterations < this.maxIterations) {
      session.iterations++;

      const reply = await this.callModel(session.messages(), 'ITERATING', 'Orchestrator planning');
      session.addReply(reply);
      bus.think(ORCHESTRATOR_NAME, reply);

      const action = parseAction(reply);
      if (action.kind === 'stop') {
        this.note(bus, action.implicit
          ? 'No action requested; moving to synthesis'
          : 'Enough information gathered; moving to synthesis');
        return;
      }

      const observation = await this.dispatch(action.target, session, bus);
      session.addObservation(toObservation(observation));
    }
    this.note(bus, `Iteration limit (${this.maxIterations}) reached; moving to synthesis`);
  }

  private async dispatch(
    target: AgentTarget,
    session: AnalysisSession,
    bus: ProgressBus,
  ): Promise<Observation> {
    switch (target) {
      case 'news_sentiment':
      case 'technical_analysis':
      case 'quantitative_metrics':
        return this.invokeAgent(target, session, bus);
      case 'unknown':
        return { status: 'error', message: 'unknown agent' };
    }
  }

  private async invokeAgent(
    id: AgentId,
    session: AnalysisSession,
    bus: ProgressBus,
  ): Promise<Observation> {
    if (!session.request[AGENT_TOGGLES[id]]) {
      return { status: 'skipped', agent: id, message: `${id} is disabled for this request` };
    }
    if (session.wasInvoked(id)) {
      return { status: 'already_executed', agent: id, message: `${id} already ran; its outcome is above` };
    }
    const tool = this.tools.get(id);
    if (!tool) {
      return { status: 'error', message: `${id} is not available` };
    }

    session.markInvoked(id);
    bus.emit('tool_call', ORCHESTRATOR_NAME, `Invoking ${tool.name}`, { agent: id });
    const outcome = await tool.invoke({ subject: session.request.subject, days: session.request.days }, bus);

    if (outcome.status === 'success') {
      session.record(outcome.result);
      bus.think(tool.name, tool.agent.describe(outcome.result));
      bus.emit('tool_result', ORCHESTRATOR_NAME, `${tool.name} returned`, { agent: id, status: 'success' });
    } else {
      bus.emit('tool_result', ORCHESTRATOR_NAME, `${tool.name} failed: ${outcome.message}`, { agent: id, status: 'error' });
    }
    return outcome;
  }

  // ── Synthesis ─────────────────────────────────────────────────────

  private async synthesize(session: AnalysisSession, bus: ProgressBus): Promise<FinalAnalysis> {
    this.note(bus, 'Synthesizing findings from all agents...');
    const gathered = session.gathered();

    const reply = await this.callModel(
      [
        { role: 'system', content: ORCHESTRATOR_SYSTEM_PROMPT },
        { role: 'user', content: buildSynthesisPrompt(session.request, gathered) },
      ],
      'SYNTHESIZING',
      'Orchestrator synthesis',
    );

    const verdict = parseSynthesis(reply, gathered.quant);
    this.note(bus, `Recommendation: ${verdict.recommendation} (confidence ${verdict.confidence.toFixed(2)}, ${verdict.riskLevel} risk)`);

    return FinalAnalysisSchema.parse({
      ...verdict,
      newsAnalysis: gathered.news,
      technicalAnalysis: gathered.technical,
      quantAnalysis: gathered.quant,
      thoughtProcess: bus.getThoughts(),
      subject: session.request.subject,
      completedAt: new Date().toISOString(),
    });
  }

  private degraded(session: AnalysisSession, bus: ProgressBus, message: string): FinalAnalysis {
    const gathered = session.gathered();
    return {
      narrative: `Analysis for ${session.request.subject} could not be completed: ${message}`,
      recommendation: DEFAULT_RECOMMENDATION,
      confidence: FAILED_CONFIDENCE,
      riskLevel: gathered.quant?.riskLevel ?? DEFAULT_RISK_LEVEL,
      newsAnalysis: gathered.news,
      technicalAnalysis: gathered.technical,
      quantAnalysis: gathered.quant,
      thoughtProcess: bus.getThoughts(),
      subject: session.request.subject,
      completedAt: new Date().toISOString(),
    };
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private async callModel(messages: ChatMessage[], stage: ControllerState, operation: string): Promise<string> {
    try {
      return await withTimeout(this.llm.invoke(messages), this.callTimeoutMs, operation);
    } catch (err) {
      throw new AnalysisError(errorMessage(err), stage, err);
    }
  }

  /** Orchestrator thought, mirrored as a `thinking` event */
  private note(bus: ProgressBus, content: string): void {
    bus.think(ORCHESTRATOR_NAME, content);
    bus.emit('thinking', ORCHESTRATOR_NAME, content);
  }

  private outcome(session: AnalysisSession, analysis: FinalAnalysis): SessionOutcome {
    return {
      analysis,
      state: session.state,
      iterations: session.iterations,
      observations: [...session.observations],
    };
  }
}
