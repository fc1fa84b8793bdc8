// Facade the analysis agents talk to. Every method resolves to data or `{ error }`; nothing throws.

import { CacheTTL, TtlCache } from './cache.js';
import { CoinGeckoClient, resolveCoinId, type ChartInterval } from './client.js';
import type { MarketDataConfig } from './config.js';
import { computeIndicators } from './indicators.js';
import { CryptoPanicClient } from './news.js';
import { NewsStore } from './news-store.js';
import { computeQuantMetrics } from './quant-metrics.js';
import type { Fetched, NewsArticle, OhlcvBar, QuantMetrics, TechnicalSnapshot } from './types.js';

/** Hourly bars are only served for short windows */
const HOURLY_MAX_DAYS = 90;

export interface MarketDataServiceOptions {
  config: MarketDataConfig;
  cache: TtlCache;
  newsStore: NewsStore;
  prices?: CoinGeckoClient;
  news?: CryptoPanicClient;
  riskFreeRate?: number;
  onWarning?: (message: string, data?: Record<string, unknown>) => void;
}

export class MarketDataService {
  private readonly prices: CoinGeckoClient;
  private readonly news: CryptoPanicClient;
  private readonly newsStore: NewsStore;
  private readonly cache: TtlCache;
  private readonly config: MarketDataConfig;
  private readonly riskFreeRate: number;
  private readonly warn: (message: string, data?: Record<string, unknown>) => void;

  constructor(options: MarketDataServiceOptions) {
    this.config = options.config;
    this.cache = options.cache;
    this.newsStore = options.newsStore;
    this.prices = options.prices ?? new CoinGeckoClient(options.config, options.cache);
    this.news = options.news ?? new CryptoPanicClient(options.config);
    this.riskFreeRate = options.riskFreeRate ?? 0.05;
    this.warn = options.onWarning ?? (() => undefined);
  }

  async open(): Promise<void> {
    await this.newsStore.open();
  }

  async close(): Promise<void> {
    await this.newsStore.flush();
    this.cache.clear();
  }

  /**
   * Headlines with per-headline sentiment. Serves the disk cache while fresh,
   * falls back to it when the feed fails or returns nothing.
   */
  async fetchNews(_subject: string, limit = 20): Promise<Fetched<NewsArticle[]>> {
    if (this.newsStore.isFresh(this.config.newsStaleHours)) {
      return this.newsStore.articles(limit);
    }

    let fresh: NewsArticle[];
    try {
      fresh = await this.news.fetchLatest(limit);
    } catch (err) {
      const message = errorMessage(err);
      const cached = this.newsStore.articles(limit);
      if (cached.length > 0) {
        this.warn('News feed failed, serving cached articles', { error: message, count: cached.length });
        return cached;
      }
      return { error: message };
    }

    if (fresh.length === 0) {
      return this.newsStore.articles(limit);
    }
    this.newsStore.save(fresh);
    return fresh.slice(0, limit);
  }

  async fetchTechnicals(subject: string, days: number): Promise<Fetched<TechnicalSnapshot>> {
    const symbol = subject.toUpperCase();
    const key = `TECH::${symbol}::days=${days}`;
    const cached = this.cache.get(key);
    if (isSnapshot(cached)) return cached;

    try {
      const interval: ChartInterval = days <= HOURLY_MAX_DAYS ? 'hourly' : 'daily';
      let bars = await this.prices.fetchOhlcv(symbol, days, interval);
      if (bars.length === 0 && interval === 'hourly') {
        bars = await this.prices.fetchOhlcv(symbol, days, 'daily');
      }
      if (bars.length === 0) {
        return { error: 'No OHLCV data available' };
      }

      const snapshot: TechnicalSnapshot = {
        symbol,
        coinId: resolveCoinId(symbol),
        bars,
        indicators: computeIndicators(bars),
      };
      this.cache.set(key, snapshot, CacheTTL.SHORT);
      return snapshot;
    } catch (err) {
      return { error: errorMessage(err) };
    }
  }

  async fetchQuantMetrics(subject: string, days: number): Promise<Fetched<QuantMetrics>> {
    const symbol = subject.toUpperCase();
    let bars: OhlcvBar[];
    try {
      bars = await this.prices.fetchOhlcv(symbol, days, 'daily');
    } catch (err) {
      return { error: errorMessage(err) };
    }
    return computeQuantMetrics(symbol, bars, this.riskFreeRate);
  }
}

function isSnapshot(value: unknown): value is TechnicalSnapshot {
  return typeof value === 'object' && value !== null && 'bars' in value && 'indicators' in value;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
