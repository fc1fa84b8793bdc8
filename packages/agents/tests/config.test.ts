import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_ALLOWED_ORIGINS, DEFAULT_THRESHOLDS, loadConfig } from '../config/index.js';
import { createLogger } from '../utils/logger.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      anthropicApiKey: undefined,
      model: 'claude-haiku-4-5-20251001',
      temperature: 0.2,
      maxTokens: 2048,
      maxIterations: 10,
      maxHistoryMessages: 12,
      callTimeoutMs: 60_000,
      pollIntervalMs: 500,
      port: 8765,
      host: '127.0.0.1',
      allowedOrigins: DEFAULT_ALLOWED_ORIGINS,
      thresholds: DEFAULT_THRESHOLDS,
      logLevel: 'info',
    });
    expect(config.allowedOrigins).not.toBe(DEFAULT_ALLOWED_ORIGINS);
  });

  it('reads and coerces overrides', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-secret',
      SENTINEL_MAX_ITERATIONS: '5',
      PORT: '9000',
      ALLOWED_ORIGINS: 'http://a.test, ,http://b.test',
      SENTIMENT_BULLISH_THRESHOLD: '0.2',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.anthropicApiKey).toBe('test-secret');
    expect(config.maxIterations).toBe(5);
    expect(config.port).toBe(9000);
    expect(config.allowedOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.thresholds.sentimentBullish).toBe(0.2);
    expect(config.thresholds.sentimentBearish).toBe(-0.15);
    expect(config.logLevel).toBe('debug');
  });

  it('treats an empty API key as unset and an unknown log level as info', () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: '', LOG_LEVEL: 'verbose' });
    expect(config.anthropicApiKey).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ SENTINEL_TEMPERATURE: '3' })).toThrow();
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow();
    expect(() => loadConfig({ SENTINEL_MAX_HISTORY: '1' })).toThrow();
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes scoped lines to stderr and filters by level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('Orchestrator', 'info');

    logger.debug('hidden');
    logger.info('Starting');
    logger.warn('Slow call', { ms: 1200 });

    expect(stderr.mock.calls).toEqual([
      ['[Orchestrator:INFO] Starting'],
      ['[Orchestrator:WARN] Slow call', '{"ms":1200}'],
    ]);
  });
});
