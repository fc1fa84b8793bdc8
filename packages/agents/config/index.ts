import { z } from 'zod';
import { DEFAULT_THRESHOLDS, type ClassificationThresholds } from './thresholds.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

export { DEFAULT_THRESHOLDS } from './thresholds.js';
export type { ClassificationThresholds, RiskTier } from './thresholds.js';

export const DEFAULT_ALLOWED_ORIGINS = [
  'http://localhost:3000',
  'http://127.0.0.1:3000',
  'http://localhost:8000',
  'http://127.0.0.1:8000',
];

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  SENTINEL_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  SENTINEL_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.2),
  SENTINEL_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  SENTINEL_MAX_ITERATIONS: z.coerce.number().int().positive().default(10),
  SENTINEL_MAX_HISTORY: z.coerce.number().int().min(2).default(12),
  SENTINEL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  SENTINEL_POLL_MS: z.coerce.number().int().positive().default(500),
  PORT: z.coerce.number().int().min(0).max(65535).default(8765),
  HOST: z.string().min(1).default('127.0.0.1'),
  ALLOWED_ORIGINS: z.string().optional(),
  SENTIMENT_BULLISH_THRESHOLD: z.coerce.number().min(-1).max(1).default(DEFAULT_THRESHOLDS.sentimentBullish),
  SENTIMENT_BEARISH_THRESHOLD: z.coerce.number().min(-1).max(1).default(DEFAULT_THRESHOLDS.sentimentBearish),
  LOG_LEVEL: z.string().default('info'),
});

export interface SentinelConfig {
  anthropicApiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  maxIterations: number;
  maxHistoryMessages: number;
  callTimeoutMs: number;
  pollIntervalMs: number;
  port: number;
  host: string;
  allowedOrigins: string[];
  thresholds: ClassificationThresholds;
  logLevel: LogLevel;
}

/** Build the runtime configuration from environment variables */
export function loadConfig(env: Record<string, string | undefined> = process.env): SentinelConfig {
  const e = EnvSchema.parse(env);
  const logLevel = e.LOG_LEVEL.toLowerCase();
  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY || undefined,
    model: e.SENTINEL_MODEL,
    temperature: e.SENTINEL_TEMPERATURE,
    maxTokens: e.SENTINEL_MAX_TOKENS,
    maxIterations: e.SENTINEL_MAX_ITERATIONS,
    maxHistoryMessages: e.SENTINEL_MAX_HISTORY,
    callTimeoutMs: e.SENTINEL_CALL_TIMEOUT_MS,
    pollIntervalMs: e.SENTINEL_POLL_MS,
    port: e.PORT,
    host: e.HOST,
    allowedOrigins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(',').map(o => o.trim()).filter(Boolean)
      : [...DEFAULT_ALLOWED_ORIGINS],
    thresholds: {
      ...DEFAULT_THRESHOLDS,
      sentimentBullish: e.SENTIMENT_BULLISH_THRESHOLD,
      sentimentBearish: e.SENTIMENT_BEARISH_THRESHOLD,
    },
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}
