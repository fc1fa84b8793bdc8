// Per-request controller state. Created fresh for every analysis; never shared.

import type {
  AgentResult, AnalysisRequest, NewsAnalysis, QuantAnalysis, TechnicalAnalysis,
} from '../schemas/analysis.js';
import type { ControllerState } from '../types/analysis.js';
import type { AgentId } from '../types/agents.js';
import type { ChatMessage } from '../types/collaborators.js';

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly stage: ControllerState,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

/** Results gathered so far, one slot per agent */
export interface GatheredResults {
  news: NewsAnalysis | null;
  technical: TechnicalAnalysis | null;
  quant: QuantAnalysis | null;
}

export class AnalysisSession {
  state: ControllerState = 'PLANNING';
  iterations = 0;
  readonly observations: string[] = [];

  private readonly history: ChatMessage[] = [];
  private readonly results = new Map<AgentId, AgentResult>();
  private readonly invoked = new Set<AgentId>();

  constructor(
    readonly request: AnalysisRequest,
    private readonly maxHistoryMessages: number,
  ) {}

  /** System prompt and opening task message; both are kept for the whole session */
  start(systemPrompt: string, taskMessage: string): void {
    this.history.length = 0;
    this.history.push({ role: 'system', content: systemPrompt }, { role: 'user', content: taskMessage });
  }

  transition(next: ControllerState): void {
    this.state = next;
  }

  addReply(content: string): void {
    this.history.push({ role: 'assistant', content });
    this.trim();
  }

  addObservation(observation: string): void {
    this.observations.push(observation);
    this.history.push({ role: 'user', content: `Observation: ${observation}` });
    this.trim();
  }

  messages(): ChatMessage[] {
    return [...this.history];
  }

  /** Marked before the agent runs, so a failed invocation still counts */
  markInvoked(id: AgentId): void {
    this.invoked.add(id);
  }

  wasInvoked(id: AgentId): boolean {
    return this.invoked.has(id);
  }

  hasResult(id: AgentId): boolean {
    return this.results.has(id);
  }

  record(result: AgentResult): void {
    this.results.set(result.agent, result);
  }

  gathered(): GatheredResults {
    const gathered: GatheredResults = { news: null, technical: null, quant: null };
    for (const result of this.results.values()) {
      switch (result.agent) {
        case 'news_sentiment':
          gathered.news = result;
          break;
        case 'technical_analysis':
          gathered.technical = result;
          break;
        case 'quantitative_metrics':
          gathered.quant = result;
          break;
      }
    }
    return gathered;
  }

  /**
   * Keep the system prompt and the opening task message; drop the oldest
   * turns after them, a reply/observation pair at a time.
   */
  private trim(): void {
    const pinned = 2;
    while (this.history.length > this.maxHistoryMessages && this.history.length > pinned) {
      const drop = this.history.length - pinned > 2 ? 2 : 1;
      this.history.splice(pinned, drop);
    }
  }
}
