import { z } from 'zod';

const MarketDataEnvSchema = z.object({
  COINGECKO_BASE_URL: z.string().url().default('https://api.coingecko.com/api/v3'),
  COINGECKO_RATE_LIMIT: z.coerce.number().int().positive().default(30), // requests per minute
  MARKET_CACHE_TTL: z.coerce.number().int().nonnegative().default(300), // seconds
  CRYPTOPANIC_BASE_URL: z.string().url().default('https://cryptopanic.com/api/v1'),
  CRYPTOPANIC_API_KEY: z.string().optional(),
  NEWS_STALE_HOURS: z.coerce.number().positive().default(1),
  NEWS_CACHE_PATH: z.string().min(1).default('.cache/news.json'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
});

export interface MarketDataConfig {
  coingeckoBaseUrl: string;
  rateLimitPerMinute: number;
  cacheTtlSeconds: number;
  cryptopanicBaseUrl: string;
  cryptopanicApiKey?: string;
  newsStaleHours: number;
  newsCachePath: string;
  requestTimeoutMs: number;
}

export function marketDataConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): MarketDataConfig {
  const parsed = MarketDataEnvSchema.parse(env);
  return {
    coingeckoBaseUrl: parsed.COINGECKO_BASE_URL,
    rateLimitPerMinute: parsed.COINGECKO_RATE_LIMIT,
    cacheTtlSeconds: parsed.MARKET_CACHE_TTL,
    cryptopanicBaseUrl: parsed.CRYPTOPANIC_BASE_URL,
    cryptopanicApiKey: parsed.CRYPTOPANIC_API_KEY || undefined,
    newsStaleHours: parsed.NEWS_STALE_HOURS,
    newsCachePath: parsed.NEWS_CACHE_PATH,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
  };
}
