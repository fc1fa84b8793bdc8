// CoinGecko API client with caching and rate limiting

import type { ZodType, ZodTypeDef } from 'zod';
import { CacheTTL, TtlCache } from './cache.js';
import type { MarketDataConfig } from './config.js';
import { MarketChartResponseSchema, type MarketChartResponse } from './schemas/market.js';
import type { OhlcvBar } from './types.js';

export class MarketDataError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'MarketDataError';
  }
}

/** Symbols with a known CoinGecko id; anything else is looked up by its lowercased symbol */
export const SUPPORTED_COINS: Readonly<Record<string, string>> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  SOL: 'solana',
  BNB: 'binancecoin',
  XRP: 'ripple',
  ADA: 'cardano',
  DOGE: 'dogecoin',
};

export function resolveCoinId(symbol: string): string {
  const sym = symbol.trim().toUpperCase();
  return SUPPORTED_COINS[sym] ?? sym.toLowerCase();
}

export interface RequestOptions {
  cacheTtl?: number; // seconds, 0 to skip cache
}

export type ChartInterval = 'daily' | 'hourly';

export class CoinGeckoClient {
  private requestTimestamps: number[] = [];

  constructor(
    private readonly config: Pick<MarketDataConfig, 'coingeckoBaseUrl' | 'rateLimitPerMinute' | 'cacheTtlSeconds' | 'requestTimeoutMs'>,
    private readonly cache: TtlCache,
  ) {}

  private isRateLimited(): boolean {
    const now = Date.now();
    this.requestTimestamps = this.requestTimestamps.filter(t => now - t < 60_000);
    return this.requestTimestamps.length >= this.config.rateLimitPerMinute;
  }

  async request<T>(
    endpoint: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    params: Record<string, string | number | boolean | undefined> = {},
    options: RequestOptions = {},
  ): Promise<T> {
    const base = this.config.coingeckoBaseUrl;
    const url = new URL(endpoint, base.endsWith('/') ? base : base + '/');
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    const cacheKey = url.toString();
    const ttl = options.cacheTtl ?? this.config.cacheTtlSeconds;
    if (ttl > 0) {
      const cached = this.cache.get(cacheKey);
      if (cached !== undefined) return schema.parse(cached);
    }

    if (this.isRateLimited()) {
      throw new MarketDataError(
        `CoinGecko rate limit exceeded (${this.config.rateLimitPerMinute} req/min). Try again shortly.`,
        429,
      );
    }
    this.requestTimestamps.push(Date.now());

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      const res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        if (res.status === 404) throw new MarketDataError(`CoinGecko: Unknown coin or endpoint (${endpoint})`, 404);
        if (res.status === 429) throw new MarketDataError('CoinGecko: Rate limited by server', 429);
        throw new MarketDataError(`CoinGecko: HTTP ${res.status} - ${body.slice(0, 200)}`, res.status);
      }

      const data = schema.parse(await res.json());
      if (ttl > 0) this.cache.set(cacheKey, data, ttl);
      return data;
    } finally {
      clearTimeout(timeout);
    }
  }

  async marketChart(coinId: string, days: number, interval: ChartInterval = 'daily'): Promise<MarketChartResponse> {
    return this.request(
      `coins/${encodeURIComponent(coinId)}/market_chart`,
      MarketChartResponseSchema,
      { vs_currency: 'usd', days, interval },
      { cacheTtl: interval === 'hourly' ? CacheTTL.REALTIME : this.config.cacheTtlSeconds },
    );
  }

  /** Price series approximated into bars: open = previous close, high/low = 3-bar rolling max/min */
  async fetchOhlcv(symbol: string, days: number, interval: ChartInterval = 'daily'): Promise<OhlcvBar[]> {
    const chart = await this.marketChart(resolveCoinId(symbol), days, interval);
    return chartToBars(chart);
  }
}

export function chartToBars(chart: MarketChartResponse): OhlcvBar[] {
  const volumes = new Map<number, number | null>(
    chart.total_volumes?.map(([ts, v]): [number, number | null] => [ts, v]) ?? [],
  );
  const points = chart.prices.flatMap(([ts, price]) =>
    price !== null && Number.isFinite(price) ? [{ ts, price }] : [],
  );

  const bars: OhlcvBar[] = [];
  for (let i = 2; i < points.length; i++) {
    const window = [points[i - 2].price, points[i - 1].price, points[i].price];
    bars.push({
      timestamp: points[i].ts,
      open: points[i - 1].price,
      high: Math.max(...window),
      low: Math.min(...window),
      close: points[i].price,
      volume: volumes.get(points[i].ts) ?? null,
    });
  }
  return bars;
}
