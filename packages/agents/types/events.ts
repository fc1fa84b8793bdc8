// Progress events streamed to clients while an analysis runs.
// Transient: they live for one request and are never persisted.

export type ProgressEventType =
  | 'thinking'       // before each stage of work
  | 'tool_call'      // orchestrator is about to invoke a sub-agent
  | 'tool_result'    // data retrieved / sub-agent returned
  | 'agent_complete' // sub-agent finished its result
  | 'final'          // synthesis produced the final analysis
  | 'error'          // a failure was caught and absorbed
  | 'complete';      // terminal transport message carrying the final analysis

export interface ProgressEvent<T = unknown> {
  type: ProgressEventType;
  agent: string;
  message: string;
  data?: T;
  timestamp: string; // ISO-8601
}

/** One entry of the reasoning trace returned with the final analysis */
export interface Thought {
  agent: string;
  content: string;
  timestamp: string;
}

export type ProgressObserver = (event: ProgressEvent) => void;

export function makeProgress<T>(
  type: ProgressEventType,
  agent: string,
  message: string,
  data?: T,
): ProgressEvent<T> {
  const event: ProgressEvent<T> = { type, agent, message, timestamp: new Date().toISOString() };
  if (data !== undefined) event.data = data;
  return event;
}
