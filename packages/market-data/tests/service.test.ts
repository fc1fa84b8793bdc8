import { describe, it, expect, vi, beforeEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { TtlCache } from '../src/cache.js';
import { CoinGeckoClient } from '../src/client.js';
import type { MarketDataConfig } from '../src/config.js';
import { CryptoPanicClient } from '../src/news.js';
import { NewsStore } from '../src/news-store.js';
import { MarketDataService } from '../src/service.js';
import { isDataError, type NewsArticle, type OhlcvBar } from '../src/types.js';

const config: MarketDataConfig = {
  coingeckoBaseUrl: 'https://coingecko.test/api/v3',
  rateLimitPerMinute: 30,
  cacheTtlSeconds: 300,
  cryptopanicBaseUrl: 'https://cryptopanic.test/api/v1',
  cryptopanicApiKey: 'test-secret',
  newsStaleHours: 1,
  newsCachePath: join(tmpdir(), 'unused-news.json'),
  requestTimeoutMs: 1000,
};

function article(id: string, score: number): NewsArticle {
  return {
    id,
    title: `Headline ${id}`,
    url: `https://news.test/${id}`,
    publishedAt: null,
    content: '',
    source: null,
    sentiment: score > 0 ? 'positive' : score < 0 ? 'negative' : 'neutral',
    sentimentScore: score,
  };
}

function bars(count: number): OhlcvBar[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: i, open: 100 + i, high: 101 + i, low: 99 + i, close: 100 + i, volume: null,
  }));
}

describe('MarketDataService', () => {
  let cache: TtlCache;
  let store: NewsStore;
  let prices: CoinGeckoClient;
  let news: CryptoPanicClient;
  let warnings: string[];
  let service: MarketDataService;

  beforeEach(() => {
    cache = new TtlCache();
    store = new NewsStore(config.newsCachePath);
    prices = new CoinGeckoClient(config, cache);
    news = new CryptoPanicClient(config);
    warnings = [];
    service = new MarketDataService({
      config, cache, newsStore: store, prices, news,
      onWarning: (message) => warnings.push(message),
    });
  });

  describe('fetchNews', () => {
    it('serves the store while it is fresh', async () => {
      const spy = vi.spyOn(news, 'fetchLatest');
      store.save([article('a', 0.5), article('b', -0.5)]);

      const result = await service.fetchNews('BTC', 1);

      expect(result).toEqual([article('a', 0.5)]);
      expect(spy).not.toHaveBeenCalled();
    });

    it('saves fresh articles to the store', async () => {
      vi.spyOn(news, 'fetchLatest').mockResolvedValue([article('x', 0.2)]);

      const result = await service.fetchNews('BTC', 20);

      expect(result).toEqual([article('x', 0.2)]);
      expect(store.articles()).toEqual([article('x', 0.2)]);
    });

    it('falls back to stale cached articles when the feed fails', async () => {
      vi.spyOn(news, 'fetchLatest').mockRejectedValue(new Error('feed down'));
      store.save([article('old', 0)], new Date('2020-01-01T00:00:00Z'));

      const result = await service.fetchNews('BTC', 20);

      expect(result).toEqual([article('old', 0)]);
      expect(warnings).toEqual(['News feed failed, serving cached articles']);
    });

    it('returns an error shape when the feed fails and nothing is cached', async () => {
      vi.spyOn(news, 'fetchLatest').mockRejectedValue(new Error('feed down'));

      expect(await service.fetchNews('BTC', 20)).toEqual({ error: 'feed down' });
    });
  });

  describe('fetchTechnicals', () => {
    it('computes indicators and caches the snapshot', async () => {
      const spy = vi.spyOn(prices, 'fetchOhlcv').mockResolvedValue(bars(30));

      const first = await service.fetchTechnicals('btc', 30);
      const second = await service.fetchTechnicals('BTC', 30);

      if (isDataError(first)) throw new Error(first.error);
      expect(first.symbol).toBe('BTC');
      expect(first.coinId).toBe('bitcoin');
      expect(first.indicators.rsi).toHaveLength(30);
      expect(second).toBe(first);
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith('BTC', 30, 'hourly');
    });

    it('retries with daily bars when hourly data is empty', async () => {
      const spy = vi.spyOn(prices, 'fetchOhlcv').mockResolvedValue([]);

      const result = await service.fetchTechnicals('ETH', 30);

      expect(result).toEqual({ error: 'No OHLCV data available' });
      expect(spy.mock.calls.map(c => c[2])).toEqual(['hourly', 'daily']);
    });

    it('uses daily bars for long windows', async () => {
      const spy = vi.spyOn(prices, 'fetchOhlcv').mockResolvedValue(bars(30));

      await service.fetchTechnicals('SOL', 180);

      expect(spy).toHaveBeenCalledWith('SOL', 180, 'daily');
    });

    it('converts client failures into an error shape', async () => {
      vi.spyOn(prices, 'fetchOhlcv').mockRejectedValue(new Error('CoinGecko: Rate limited by server'));

      expect(await service.fetchTechnicals('BTC', 30)).toEqual({ error: 'CoinGecko: Rate limited by server' });
    });
  });

  describe('fetchQuantMetrics', () => {
    it('computes metrics over daily bars', async () => {
      vi.spyOn(prices, 'fetchOhlcv').mockResolvedValue(bars(30));

      const result = await service.fetchQuantMetrics('btc', 30);

      if (isDataError(result)) throw new Error(result.error);
      expect(result.symbol).toBe('BTC');
      expect(result.performance.positiveDaysPct).toBe(100);
    });

    it('passes through insufficient-data errors', async () => {
      vi.spyOn(prices, 'fetchOhlcv').mockResolvedValue(bars(4));

      expect(await service.fetchQuantMetrics('BTC', 30)).toEqual({ error: 'Insufficient return data' });
    });
  });

  it('flushes the news store and clears the cache on close', async () => {
    const flush = vi.spyOn(store, 'flush').mockResolvedValue();
    cache.set('k', 1, 60);

    await service.close();

    expect(flush).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(0);
  });
});
