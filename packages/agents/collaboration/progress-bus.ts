// Per-request progress trace.
// Events and thoughts are appended in emission order and handed to the
// observer synchronously; the bus itself never buffers or reorders.

import type { ProgressEvent, ProgressEventType, ProgressObserver, Thought } from '../types/events.js';
import { makeProgress } from '../types/events.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';

export interface ProgressFilter {
  type?: ProgressEventType;
  agent?: string;
}

export class ProgressBus {
  private readonly events: ProgressEvent[] = [];
  private readonly thoughts: Thought[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly observer?: ProgressObserver,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('ProgressBus');
  }

  /**
   * Record an event and notify the observer. Observer failures are logged
   * and do not interrupt the emitting component.
   */
  emit<T>(type: ProgressEventType, agent: string, message: string, data?: T): ProgressEvent<T> {
    const event = makeProgress(type, agent, message, data);
    this.events.push(event);

    if (this.observer) {
      try {
        this.observer(event);
      } catch (err) {
        this.logger.warn('Progress observer failed', { type, agent, error: errorMessage(err) });
      }
    }
    return event;
  }

  /**
   * Append to the reasoning trace returned with the final analysis.
   */
  think(agent: string, content: string): Thought {
    const thought: Thought = { agent, content, timestamp: new Date().toISOString() };
    this.thoughts.push(thought);
    return thought;
  }

  getEvents(filter?: ProgressFilter): ProgressEvent[] {
    let results = [...this.events];
    if (filter?.type) {
      results = results.filter(e => e.type === filter.type);
    }
    if (filter?.agent) {
      results = results.filter(e => e.agent === filter.agent);
    }
    return results;
  }

  getThoughts(): Thought[] {
    return [...this.thoughts];
  }

  get size(): number {
    return this.events.length;
  }
}
