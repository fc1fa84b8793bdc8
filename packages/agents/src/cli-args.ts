// Argument parsing for the `sentinel` command

import type { AnalysisRequestInput } from '../schemas/analysis.js';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'analyze'; request: AnalysisRequestInput; json: boolean }
  | { kind: 'serve'; port?: number; host?: string }
  | { kind: 'invalid'; message: string };

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return Number(value);
}

export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }

  const [command, ...rest] = argv;
  switch (command) {
    case 'analyze':
      return parseAnalyze(rest);
    case 'serve':
      return parseServe(rest);
    case 'help':
      return { kind: 'help' };
    default:
      return { kind: 'invalid', message: `Unknown command: ${command}` };
  }
}

function parseAnalyze(args: string[]): CliCommand {
  const request: AnalysisRequestInput = {};
  let json = false;
  let subject: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--days') {
      const days = parseInteger(args[i + 1]);
      if (days === undefined) return { kind: 'invalid', message: '--days expects a whole number' };
      request.days = days;
      i++;
    } else if (arg === '--no-news') {
      request.includeNews = false;
    } else if (arg === '--no-technical') {
      request.includeTechnical = false;
    } else if (arg === '--no-quant') {
      request.includeQuant = false;
    } else if (arg === '--json') {
      json = true;
    } else if (arg.startsWith('-')) {
      return { kind: 'invalid', message: `Unknown option: ${arg}` };
    } else if (subject === undefined) {
      subject = arg;
    } else {
      return { kind: 'invalid', message: `Unexpected argument: ${arg}` };
    }
  }

  if (subject === undefined) return { kind: 'invalid', message: 'No symbol provided' };
  request.subject = subject;
  return { kind: 'analyze', request, json };
}

function parseServe(args: string[]): CliCommand {
  const command: { kind: 'serve'; port?: number; host?: string } = { kind: 'serve' };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--port') {
      const port = parseInteger(args[i + 1]);
      if (port === undefined || port > 65535) return { kind: 'invalid', message: '--port expects a port number' };
      command.port = port;
      i++;
    } else if (arg === '--host' && args[i + 1]) {
      command.host = args[++i];
    } else {
      return { kind: 'invalid', message: `Unknown option: ${arg}` };
    }
  }
  return command;
}
