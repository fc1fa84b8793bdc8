// WebSocket transport: one JSON request in, a stream of progress events out,
// then exactly one terminal `complete` / `error`. Requests on a connection
// are handled one at a time; the connection stays open between them.

import type { IncomingMessage } from 'node:http';
import WebSocket, { WebSocketServer, type RawData } from 'ws';
import { z, ZodError } from 'zod';
import { acceptRequest, type AnalysisRequest } from '../schemas/analysis.js';
import { ORCHESTRATOR_NAME } from '../types/agents.js';
import { makeProgress, type ProgressEvent } from '../types/events.js';
import { createLogger, errorMessage, type Logger } from '../utils/logger.js';
import type { StreamingBridge } from './streaming-bridge.js';

export const POLICY_VIOLATION = 1008;

const WireRequestSchema = z.object({
  coin: z.string().optional(),
  subject: z.string().optional(),
  days: z.number().optional(),
  include_news: z.boolean().optional(),
  include_technical: z.boolean().optional(),
  include_quant: z.boolean().optional(),
  includeNews: z.boolean().optional(),
  includeTechnical: z.boolean().optional(),
  includeQuant: z.boolean().optional(),
});

/** Accepts `coin` or `subject`, and snake_case or camelCase toggles */
export function parseWireRequest(payload: unknown): AnalysisRequest {
  const wire = WireRequestSchema.parse(payload);
  return acceptRequest({
    subject: wire.subject ?? wire.coin,
    days: wire.days,
    includeNews: wire.includeNews ?? wire.include_news,
    includeTechnical: wire.includeTechnical ?? wire.include_technical,
    includeQuant: wire.includeQuant ?? wire.include_quant,
  });
}

function describeInvalid(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map(i => `${i.path.join('.') || 'request'}: ${i.message}`).join('; ');
  }
  return errorMessage(err);
}

function decode(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

export interface AnalysisServerOptions {
  bridge: StreamingBridge;
  port: number;
  host: string;
  allowedOrigins: string[];
  logger?: Logger;
}

export class AnalysisServer {
  private wss: WebSocketServer | undefined;
  private readonly logger: Logger;

  constructor(private readonly options: AnalysisServerOptions) {
    this.logger = options.logger ?? createLogger('WsServer');
  }

  /** Resolves with the bound port (useful when listening on port 0) */
  start(): Promise<number> {
    if (this.wss) return Promise.reject(new Error('Server already started'));

    return new Promise<number>((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.options.port, host: this.options.host });
      this.wss = wss;

      wss.once('error', err => {
        this.wss = undefined;
        reject(err);
      });
      wss.once('listening', () => {
        const address = wss.address();
        const port = typeof address === 'string' ? this.options.port : address.port;
        this.logger.info('Listening', { host: this.options.host, port });
        resolve(port);
      });
      wss.on('connection', (ws, req) => this.onConnection(ws, req));
    });
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    this.wss = undefined;

    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve, reject) => {
      wss.close(err => (err ? reject(err) : resolve()));
    });
  }

  private onConnection(ws: WebSocket, req: IncomingMessage): void {
    const origin = req.headers.origin;
    if (origin && !this.options.allowedOrigins.includes(origin)) {
      this.logger.warn('Rejected connection from disallowed origin', { origin });
      ws.close(POLICY_VIOLATION, 'Origin not allowed');
      return;
    }

    let queue: Promise<void> = Promise.resolve();
    ws.on('message', data => {
      const raw = decode(data);
      queue = queue
        .then(() => this.handle(ws, raw))
        .catch(err => {
          this.logger.error('Request handling failed', { error: errorMessage(err) });
        });
    });
    ws.on('error', err => {
      this.logger.warn('Connection error', { error: err.message });
    });
  }

  private async handle(ws: WebSocket, raw: string): Promise<void> {
    let request: AnalysisRequest;
    try {
      request = parseWireRequest(JSON.parse(raw));
    } catch (err) {
      await this.send(ws, makeProgress('error', ORCHESTRATOR_NAME, `Invalid request: ${describeInvalid(err)}`));
      return;
    }

    this.logger.info('Analysis requested', { subject: request.subject, days: request.days });
    await this.options.bridge.stream(request, event => this.send(ws, event));
  }

  private send(ws: WebSocket, event: ProgressEvent): Promise<void> {
    if (ws.readyState !== WebSocket.OPEN) return Promise.resolve();
    return new Promise<void>(resolve => {
      ws.send(JSON.stringify(event), err => {
        if (err) this.logger.warn('Failed to send event', { type: event.type, error: err.message });
        resolve();
      });
    });
  }
}
