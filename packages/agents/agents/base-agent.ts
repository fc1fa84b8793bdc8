// Base sub-agent: fetch → classify → narrate → validate.
// All specialist agents extend this class. `run` never throws: every failure
// is converted into the agent's default result plus an `error` progress event.

import type { ZodType, ZodTypeDef } from 'zod';
import { isDataError, type Fetched } from '@market-sentinel/market-data';
import type { ProgressBus } from '../collaboration/progress-bus.js';
import { DEFAULT_THRESHOLDS, type ClassificationThresholds } from '../config/thresholds.js';
import type { AgentResult } from '../schemas/analysis.js';
import { AGENT_NAMES, type AgentId } from '../types/agents.js';
import type { LanguageModel } from '../types/collaborators.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export const DEFAULT_CALL_TIMEOUT_MS = 60_000;

export interface AgentInput {
  subject: string;
  days: number;
}

export interface AgentDeps {
  llm: LanguageModel;
  thresholds?: ClassificationThresholds;
  /** Upper bound for each collaborator call (data fetch, language model) */
  callTimeoutMs?: number;
  logger?: Logger;
}

/** What the tool adapter needs from an executor */
export interface SubAgent<TResult extends AgentResult = AgentResult> {
  readonly id: AgentId;
  readonly name: string;
  run(input: AgentInput, bus: ProgressBus): Promise<TResult>;
  /** One-line summary for the reasoning trace */
  describe(result: TResult): string;
}

export abstract class BaseAgent<TRaw, TFeatures, TResult extends AgentResult> implements SubAgent<TResult> {
  abstract readonly id: AgentId;
  protected abstract readonly schema: ZodType<TResult, ZodTypeDef, unknown>;
  protected abstract readonly systemPrompt: string;
  protected abstract readonly emptyReason: string;

  protected readonly llm: LanguageModel;
  protected readonly thresholds: ClassificationThresholds;
  protected readonly callTimeoutMs: number;
  protected readonly logger: Logger;

  constructor(deps: AgentDeps) {
    this.llm = deps.llm;
    this.thresholds = deps.thresholds ?? DEFAULT_THRESHOLDS;
    this.callTimeoutMs = deps.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.logger = deps.logger ?? createLogger('Agent');
  }

  get name(): string {
    return AGENT_NAMES[this.id];
  }

  async run(input: AgentInput, bus: ProgressBus): Promise<TResult> {
    try {
      bus.emit('thinking', this.name, this.fetchingMessage(input));
      const raw = await withTimeout(this.fetch(input), this.callTimeoutMs, `${this.name} data fetch`);
      if (isDataError(raw)) return this.fallback(bus, raw.error);
      if (this.isEmpty(raw)) return this.fallback(bus, this.emptyReason);

      bus.emit('tool_result', this.name, this.retrievedMessage(raw));

      const features = this.classify(raw, input);

      bus.emit('thinking', this.name, 'Generating summary with language model...');
      const reply = await withTimeout(
        this.llm.invoke([
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: this.buildContext(features, input) },
        ]),
        this.callTimeoutMs,
        `${this.name} narrative`,
      );
      const narrative = reply.trim() || this.fallbackNarrative(features, input);

      const result = this.schema.parse(this.assemble(features, narrative, input));
      bus.emit('agent_complete', this.name, `${this.name} finished`, this.completionData(result));
      return result;
    } catch (err) {
      return this.fallback(bus, errorMessage(err));
    }
  }

  private fallback(bus: ProgressBus, reason: string): TResult {
    this.logger.warn(`${this.name} returned its default result`, { reason });
    bus.think(this.name, `Falling back to default result: ${reason}`);
    bus.emit('error', this.name, `Error: ${reason}`);
    return this.defaultResult(reason);
  }

  // ── Specialization hooks ──────────────────────────────────────────

  protected abstract fetch(input: AgentInput): Promise<Fetched<TRaw>>;

  protected abstract isEmpty(raw: TRaw): boolean;

  protected abstract fetchingMessage(input: AgentInput): string;

  protected abstract retrievedMessage(raw: TRaw): string;

  /** Deterministic, threshold-based classification of the raw data */
  protected abstract classify(raw: TRaw, input: AgentInput): TFeatures;

  /** Bounded text context handed to the language model */
  protected abstract buildContext(features: TFeatures, input: AgentInput): string;

  /** Narrative used when the model replies with nothing */
  protected abstract fallbackNarrative(features: TFeatures, input: AgentInput): string;

  /** Build the result; bounded fields must already be clamped */
  protected abstract assemble(features: TFeatures, narrative: string, input: AgentInput): TResult;

  /** Lowest-information, schema-valid result */
  abstract defaultResult(reason: string): TResult;

  abstract describe(result: TResult): string;

  protected abstract completionData(result: TResult): Record<string, unknown>;
}
