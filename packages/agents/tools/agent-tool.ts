// Tool adapter: exposes a sub-agent to the controller as a callable tool.
// Arguments are validated before the agent runs; failures come back as an
// error outcome instead of an exception.

import type { SubAgent } from '../agents/base-agent.js';
import type { ProgressBus } from '../collaboration/progress-bus.js';
import { AgentToolArgsSchema, type AgentResult } from '../schemas/analysis.js';
import { AGENT_DESCRIPTIONS, type AgentId } from '../types/agents.js';
import { errorMessage } from '../utils/logger.js';

export type ToolOutcome<TResult extends AgentResult = AgentResult> =
  | { status: 'success'; result: TResult }
  | { status: 'error'; message: string };

export class AgentTool<TResult extends AgentResult = AgentResult> {
  readonly argsSchema = AgentToolArgsSchema;

  constructor(readonly agent: SubAgent<TResult>) {}

  get id(): AgentId {
    return this.agent.id;
  }

  get name(): string {
    return this.agent.name;
  }

  get description(): string {
    return AGENT_DESCRIPTIONS[this.agent.id];
  }

  async invoke(args: unknown, bus: ProgressBus): Promise<ToolOutcome<TResult>> {
    const parsed = this.argsSchema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'args'}: ${i.message}`).join('; ');
      return { status: 'error', message: `Invalid arguments: ${issues}` };
    }

    try {
      const result = await this.agent.run(parsed.data, bus);
      return { status: 'success', result };
    } catch (err) {
      return { status: 'error', message: errorMessage(err) };
    }
  }
}

/** Envelopes the controller produces without running a tool */
export type ControlObservation =
  | { status: 'skipped'; agent: AgentId; message: string }
  | { status: 'already_executed'; agent: AgentId; message: string }
  | { status: 'error'; message: string };

export type Observation = ToolOutcome | ControlObservation;

/** Serialized form placed in the controller's history after `Observation:` */
export function toObservation(observation: Observation): string {
  return JSON.stringify(observation);
}
