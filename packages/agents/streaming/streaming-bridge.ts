// Streaming bridge: runs one analysis as an independent task and forwards its
// progress to a transport while it runs. Exactly one terminal message
// (`complete` or `error`) follows the forwarded events.

import type { AnalysisRunner } from '../orchestrator/controller.js';
import type { AnalysisRequestInput, FinalAnalysis } from '../schemas/analysis.js';
import { ORCHESTRATOR_NAME } from '../types/agents.js';
import { makeProgress, type ProgressEvent } from '../types/events.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import { ProgressChannel } from './progress-channel.js';

export const DEFAULT_POLL_INTERVAL_MS = 500;

export type SendFn = (event: ProgressEvent) => void | Promise<void>;

export interface StreamingBridgeOptions {
  pollIntervalMs?: number;
  logger?: Logger;
}

type TaskOutcome =
  | { ok: true; analysis: FinalAnalysis }
  | { ok: false; error: string };

export class StreamingBridge {
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly runner: AnalysisRunner,
    options: StreamingBridgeOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? createLogger('StreamingBridge');
  }

  /**
   * Stream progress for one request through `send`. Resolves with the
   * terminal message once it has been sent.
   */
  async stream(request: AnalysisRequestInput, send: SendFn): Promise<ProgressEvent> {
    const channel = new ProgressChannel<ProgressEvent>();
    let settled = false;

    const task: Promise<TaskOutcome> = this.runner
      .run(request, event => channel.push(event))
      .then(
        (analysis): TaskOutcome => ({ ok: true, analysis }),
        (err: unknown): TaskOutcome => ({ ok: false, error: errorMessage(err) }),
      )
      .finally(() => {
        settled = true;
        channel.close();
      });

    while (!settled) {
      const event = await channel.poll(this.pollIntervalMs);
      if (event) await send(event);
    }

    const outcome = await task;
    for (const event of channel.drain()) {
      await send(event);
    }

    const terminal = outcome.ok
      ? makeProgress('complete', ORCHESTRATOR_NAME, 'Analysis complete', outcome.analysis)
      : makeProgress('error', ORCHESTRATOR_NAME, `Analysis failed: ${outcome.error}`);
    if (!outcome.ok) {
      this.logger.warn('Analysis task failed', { error: outcome.error });
    }
    await send(terminal);
    return terminal;
  }
}
