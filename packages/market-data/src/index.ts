export { TtlCache, CacheTTL } from './cache.js';
export type { TtlCacheOptions } from './cache.js';
export {
  CoinGeckoClient, MarketDataError, SUPPORTED_COINS, resolveCoinId, chartToBars,
} from './client.js';
export type { ChartInterval, RequestOptions } from './client.js';
export { marketDataConfigFromEnv } from './config.js';
export type { MarketDataConfig } from './config.js';
export {
  ema, macd, rsi, bollingerBands, computeIndicators, DEFAULT_INDICATOR_PARAMS,
} from './indicators.js';
export type { IndicatorParams } from './indicators.js';
export { CryptoPanicClient, toArticle } from './news.js';
export { NewsStore } from './news-store.js';
export {
  computeQuantMetrics, dailyReturns, maxDrawdown, percentile, sampleStd, TRADING_DAYS, MIN_RETURNS,
} from './quant-metrics.js';
export { scoreHeadline, loadLexicon } from './sentiment.js';
export type { SentimentLexicon, HeadlineScore } from './sentiment.js';
export { MarketDataService } from './service.js';
export type { MarketDataServiceOptions } from './service.js';
export { MarketChartResponseSchema } from './schemas/market.js';
export { NewsArticleSchema, CryptoPanicResponseSchema } from './schemas/news.js';
export { isDataError } from './types.js';
export type {
  DataError, Fetched, OhlcvBar, Series, IndicatorSet, TechnicalSnapshot,
  ReturnStats, RiskStats, PerformanceStats, QuantMetrics, HeadlineSentiment, NewsArticle,
} from './types.js';
