// CryptoPanic headline feed, scored with the keyword sentiment lexicon

import { MarketDataError } from './client.js';
import type { MarketDataConfig } from './config.js';
import { CryptoPanicResponseSchema, type CryptoPanicPost } from './schemas/news.js';
import { scoreHeadline } from './sentiment.js';
import type { NewsArticle } from './types.js';

export class CryptoPanicClient {
  constructor(
    private readonly config: Pick<MarketDataConfig, 'cryptopanicBaseUrl' | 'cryptopanicApiKey' | 'requestTimeoutMs'>,
  ) {}

  get isConfigured(): boolean {
    return Boolean(this.config.cryptopanicApiKey);
  }

  /** Latest public news posts, newest first */
  async fetchLatest(limit = 20): Promise<NewsArticle[]> {
    if (!this.config.cryptopanicApiKey) {
      throw new MarketDataError('CRYPTOPANIC_API_KEY environment variable is not set');
    }

    const base = this.config.cryptopanicBaseUrl;
    const url = new URL('posts/', base.endsWith('/') ? base : base + '/');
    url.searchParams.set('auth_token', this.config.cryptopanicApiKey);
    url.searchParams.set('kind', 'news');
    url.searchParams.set('public', 'true');

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      const res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });
      if (!res.ok) {
        if (res.status === 401 || res.status === 403) {
          throw new MarketDataError('CryptoPanic: Invalid API token', res.status);
        }
        if (res.status === 429) throw new MarketDataError('CryptoPanic: Rate limited by server', 429);
        throw new MarketDataError(`CryptoPanic: HTTP ${res.status}`, res.status);
      }
      const { results } = CryptoPanicResponseSchema.parse(await res.json());
      return results.slice(0, limit).map(toArticle);
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function toArticle(post: CryptoPanicPost): NewsArticle {
  const title = post.title ?? '';
  const content = post.body || title;
  const { sentiment, score } = scoreHeadline(`${title} ${post.body ?? ''}`);
  return {
    id: String(post.id ?? post.url ?? post.published_at ?? title),
    title,
    url: post.url ?? '',
    publishedAt: normalizeTimestamp(post.published_at),
    content,
    source: post.source?.domain ?? null,
    sentiment,
    sentimentScore: score,
  };
}

function normalizeTimestamp(value: string | null | undefined): string | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}
