#!/usr/bin/env node
// Market Sentinel CLI
//
// Usage (from the repository root, `npm run sentinel -- <args>`):
//   sentinel analyze BTC                          # full analysis, progress on stderr
//   sentinel analyze ETH --days 90 --no-news      # skip an agent
//   sentinel analyze SOL --json                   # FinalAnalysis as JSON on stdout
//   sentinel serve --port 8765                    # WebSocket streaming server
//   sentinel --help                               # usage

import 'dotenv/config';
import { loadConfig, type SentinelConfig } from '../config/index.js';
import { createSentinel } from '../orchestrator/sentinel-factory.js';
import type { AnalysisRequestInput, FinalAnalysis } from '../schemas/analysis.js';
import { AnalysisServer } from '../streaming/ws-server.js';
import { ORCHESTRATOR_NAME } from '../types/agents.js';
import type { ProgressEvent } from '../types/events.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { parseCliArgs } from './cli-args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

const EVENT_COLORS: Record<ProgressEvent['type'], keyof typeof ansi> = {
  thinking: 'dim',
  tool_call: 'cyan',
  tool_result: 'green',
  agent_complete: 'green',
  final: 'magenta',
  error: 'red',
  complete: 'magenta',
};

function printEvent(event: ProgressEvent): void {
  const agent = event.agent === ORCHESTRATOR_NAME ? c('magenta', event.agent) : c('cyan', event.agent);
  process.stderr.write(`  ${c(EVENT_COLORS[event.type], `[${event.type}]`)} ${agent}: ${event.message}\n`);
}

function printAnalysis(analysis: FinalAnalysis): void {
  const pct = (v: number) => `${(v * 100).toFixed(0)}%`;
  console.log(`\n  ${c('bold', `${analysis.subject} analysis`)}`);
  console.log(`  ${c('dim', 'Recommendation:')} ${c('bold', analysis.recommendation.toUpperCase())}`);
  console.log(`  ${c('dim', 'Confidence:')}     ${pct(analysis.confidence)}`);
  console.log(`  ${c('dim', 'Risk level:')}     ${analysis.riskLevel}\n`);

  if (analysis.newsAnalysis) {
    console.log(`  ${c('yellow', 'News')}       ${analysis.newsAnalysis.overallSentiment} (${analysis.newsAnalysis.avgSentimentScore.toFixed(2)}, ${analysis.newsAnalysis.newsCount} articles)`);
  }
  if (analysis.technicalAnalysis) {
    console.log(`  ${c('yellow', 'Technical')}  ${analysis.technicalAnalysis.overallTrend} at ${analysis.technicalAnalysis.currentPrice.toFixed(2)} (${analysis.technicalAnalysis.priceChangePct.toFixed(2)}%)`);
  }
  if (analysis.quantAnalysis) {
    console.log(`  ${c('yellow', 'Quant')}      ${analysis.quantAnalysis.riskLevel} risk, Sharpe ${analysis.quantAnalysis.riskMetrics.sharpeRatio.toFixed(2)}`);
  }

  console.log(`\n${analysis.narrative.split('\n').map(line => `  ${line}`).join('\n')}\n`);
}

function printHelp(): void {
  console.log(`
  ${c('bold', 'Market Sentinel')} - multi-agent crypto market analysis

  ${c('bold', 'Usage:')}
    sentinel analyze <SYMBOL> [options]   Run news, technical and quant agents, then synthesize
    sentinel serve [--port N] [--host H]  Start the WebSocket streaming server
    sentinel --help                       Show this help

  ${c('bold', 'Analyze options:')}
    --days <n>        Lookback window, 7-365 (default: 30)
    --no-news         Skip the news sentiment agent
    --no-technical    Skip the technical analysis agent
    --no-quant        Skip the quantitative metrics agent
    --json            Print the final analysis as JSON

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY     Required. Anthropic API key.
    SENTINEL_MODEL        Model override (default: claude-haiku-4-5-20251001).
    CRYPTOPANIC_API_KEY   News feed token; without it the news agent falls back.
    ALLOWED_ORIGINS       Comma-separated WebSocket origins.

  ${c('bold', 'Examples:')}
    sentinel analyze BTC
    sentinel analyze ETH --days 90 --no-news
    sentinel serve --port 8765
`);
}

// ── Subcommands ─────────────────────────────────────────────────────

async function runAnalyze(config: SentinelConfig, request: AnalysisRequestInput, json: boolean): Promise<void> {
  const sentinel = createSentinel(config);
  await sentinel.open();

  if (!json) {
    console.log(`\n  ${c('bold', 'Market Sentinel')} ${c('dim', `- ${config.model}`)}\n`);
  }

  const startTime = Date.now();
  try {
    const analysis = await sentinel.controller.run(request, printEvent);
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);

    if (json) {
      console.log(JSON.stringify(analysis, null, 2));
    } else {
      printAnalysis(analysis);
      console.log(`  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `- ${duration}s`)}\n`);
    }
  } finally {
    await sentinel.close();
  }
}

async function runServe(config: SentinelConfig, port?: number, host?: string): Promise<void> {
  const logger = createLogger('Sentinel', config.logLevel);
  const sentinel = createSentinel(config);
  await sentinel.open();

  const server = new AnalysisServer({
    bridge: sentinel.bridge,
    port: port ?? config.port,
    host: host ?? config.host,
    allowedOrigins: config.allowedOrigins,
    logger: createLogger('WsServer', config.logLevel),
  });
  const boundPort = await server.start();
  console.log(`\n  ${c('bold', 'Market Sentinel')} ${c('dim', `listening on ws://${host ?? config.host}:${boundPort}`)}\n`);

  const shutdown = (): void => {
    logger.info('Shutting down');
    server.stop()
      .then(() => sentinel.close())
      .then(() => process.exit(0))
      .catch(err => {
        logger.error('Shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// ── Entry point ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      printHelp();
      return;
    case 'invalid':
      console.error(`  ${c('red', 'Error:')} ${command.message}. Use "sentinel --help" for usage.\n`);
      process.exit(1);
    case 'analyze':
      await runAnalyze(loadConfig(), command.request, command.json);
      return;
    case 'serve':
      await runServe(loadConfig(), command.port, command.host);
      return;
  }
}

main().catch((err) => {
  console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
  process.exit(1);
});
