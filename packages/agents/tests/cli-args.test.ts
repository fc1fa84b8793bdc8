import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../src/cli-args.js';

describe('parseCliArgs', () => {
  it('shows help when asked or given nothing', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['analyze', 'BTC', '--help'])).toEqual({ kind: 'help' });
  });

  it('parses an analyze command with options', () => {
    expect(parseCliArgs(['analyze', 'eth', '--days', '90', '--no-news', '--no-quant', '--json'])).toEqual({
      kind: 'analyze',
      request: { subject: 'eth', days: 90, includeNews: false, includeQuant: false },
      json: true,
    });
  });

  it('leaves unset fields to the request defaults', () => {
    expect(parseCliArgs(['analyze', 'SOL'])).toEqual({ kind: 'analyze', request: { subject: 'SOL' }, json: false });
  });

  it('reports analyze mistakes', () => {
    expect(parseCliArgs(['analyze'])).toEqual({ kind: 'invalid', message: 'No symbol provided' });
    expect(parseCliArgs(['analyze', 'BTC', '--days', 'ten'])).toEqual({ kind: 'invalid', message: '--days expects a whole number' });
    expect(parseCliArgs(['analyze', 'BTC', '--days'])).toEqual({ kind: 'invalid', message: '--days expects a whole number' });
    expect(parseCliArgs(['analyze', 'BTC', '--verbose'])).toEqual({ kind: 'invalid', message: 'Unknown option: --verbose' });
    expect(parseCliArgs(['analyze', 'BTC', 'ETH'])).toEqual({ kind: 'invalid', message: 'Unexpected argument: ETH' });
  });

  it('parses serve options', () => {
    expect(parseCliArgs(['serve'])).toEqual({ kind: 'serve' });
    expect(parseCliArgs(['serve', '--port', '9000', '--host', '0.0.0.0'])).toEqual({ kind: 'serve', port: 9000, host: '0.0.0.0' });
    expect(parseCliArgs(['serve', '--port', '70000'])).toEqual({ kind: 'invalid', message: '--port expects a port number' });
    expect(parseCliArgs(['serve', '--tls'])).toEqual({ kind: 'invalid', message: 'Unknown option: --tls' });
  });

  it('rejects unknown commands', () => {
    expect(parseCliArgs(['backtest', 'BTC'])).toEqual({ kind: 'invalid', message: 'Unknown command: backtest' });
  });
});
