import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import WebSocket from 'ws';
import { StreamingBridge } from '../streaming/streaming-bridge.js';
import { AnalysisServer, POLICY_VIOLATION, parseWireRequest } from '../streaming/ws-server.js';
import { makeProgress } from '../types/events.js';
import { ScriptedRunner, silentLogger } from './helpers/fakes.js';

const ALLOWED = 'http://allowed.test';

interface WireEvent {
  type: string;
  message: string;
  data?: { subject?: string };
}

function connect(port: number, origin = ALLOWED): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`, { origin });
    ws.once('open', () => resolve(ws));
    ws.once('error', reject);
  });
}

/** Collect messages until a terminal `complete` or `error` arrives */
function untilTerminal(ws: WebSocket): Promise<WireEvent[]> {
  return new Promise(resolve => {
    const seen: WireEvent[] = [];
    const onMessage = (data: WebSocket.RawData) => {
      const event: WireEvent = JSON.parse(data.toString());
      seen.push(event);
      if (event.type === 'complete' || event.type === 'error') {
        ws.off('message', onMessage);
        resolve(seen);
      }
    };
    ws.on('message', onMessage);
  });
}

describe('parseWireRequest', () => {
  it('accepts coin and snake_case toggles', () => {
    expect(parseWireRequest({ coin: 'eth', include_news: false })).toEqual({
      subject: 'ETH', days: 30, includeNews: false, includeTechnical: true, includeQuant: true,
    });
  });

  it('prefers subject and camelCase fields', () => {
    const request = parseWireRequest({ coin: 'eth', subject: 'sol', includeQuant: false, include_quant: true, days: 90 });
    expect(request).toMatchObject({ subject: 'SOL', days: 90, includeQuant: false });
  });

  it('defaults to BTC', () => {
    expect(parseWireRequest({}).subject).toBe('BTC');
  });

  it('rejects values outside the request bounds', () => {
    expect(() => parseWireRequest({ coin: 'BTC', days: 1000 })).toThrow();
    expect(() => parseWireRequest({ coin: 42 })).toThrow();
  });
});

describe('AnalysisServer', () => {
  let runner: ScriptedRunner;
  let server: AnalysisServer;
  let port: number;
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    runner = new ScriptedRunner([makeProgress('thinking', 'Orchestrator', 'Starting analysis')]);
    server = new AnalysisServer({
      bridge: new StreamingBridge(runner, { pollIntervalMs: 5, logger: silentLogger }),
      port: 0,
      host: '127.0.0.1',
      allowedOrigins: [ALLOWED],
      logger: silentLogger,
    });
    port = await server.start();
  });

  afterEach(async () => {
    for (const ws of clients.splice(0)) ws.terminate();
    await server.stop();
  });

  async function open(): Promise<WebSocket> {
    const ws = await connect(port);
    clients.push(ws);
    return ws;
  }

  it('streams progress then the final analysis', async () => {
    const ws = await open();
    const done = untilTerminal(ws);
    ws.send(JSON.stringify({ coin: 'eth', include_news: false }));

    const events = await done;
    expect(events.map(e => e.type)).toEqual(['thinking', 'complete']);
    expect(events[1].data?.subject).toBe('ETH');
    expect(runner.requests[0]).toMatchObject({ subject: 'ETH', includeNews: false });
  });

  it('serves several requests on one connection in order', async () => {
    const ws = await open();
    const first = untilTerminal(ws);
    ws.send(JSON.stringify({ coin: 'btc' }));
    await first;

    const second = untilTerminal(ws);
    ws.send(JSON.stringify({ coin: 'sol' }));
    const events = await second;

    expect(events[events.length - 1].data?.subject).toBe('SOL');
    expect(runner.requests.map(r => r.subject)).toEqual(['BTC', 'SOL']);
  });

  it('answers malformed input with an error event and keeps the connection', async () => {
    const ws = await open();
    const invalid = untilTerminal(ws);
    ws.send('not json');

    const [event] = await invalid;
    expect(event.type).toBe('error');
    expect(event.message.startsWith('Invalid request: ')).toBe(true);
    expect(runner.requests).toHaveLength(0);

    const bounded = untilTerminal(ws);
    ws.send(JSON.stringify({ coin: 'BTC', days: 2 }));
    const [boundsError] = await bounded;
    expect(boundsError.message.startsWith('Invalid request: days: ')).toBe(true);
    expect(ws.readyState).toBe(WebSocket.OPEN);
  });

  it('closes connections from origins that are not allowed', async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`, { origin: 'http://elsewhere.test' });
    clients.push(ws);
    const code = await new Promise<number>(resolve => ws.once('close', closeCode => resolve(closeCode)));
    expect(code).toBe(POLICY_VIOLATION);
  });

  it('refuses to start twice', async () => {
    await expect(server.start()).rejects.toThrow('Server already started');
  });
});
