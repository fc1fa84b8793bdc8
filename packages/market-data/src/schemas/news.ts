import { z } from 'zod';

export const CryptoPanicPostSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  published_at: z.string().nullish(),
  body: z.string().nullish(),
  source: z.object({ domain: z.string().nullish() }).passthrough().nullish(),
}).passthrough();

/** `GET /posts/` */
export const CryptoPanicResponseSchema = z.object({
  results: z.array(CryptoPanicPostSchema).default([]),
});

export type CryptoPanicPost = z.infer<typeof CryptoPanicPostSchema>;

export const NewsArticleSchema = z.object({
  id: z.string(),
  title: z.string(),
  url: z.string(),
  publishedAt: z.string().nullable(),
  content: z.string(),
  source: z.string().nullable(),
  sentiment: z.enum(['positive', 'negative', 'neutral']),
  sentimentScore: z.number().min(-1).max(1),
});

/** On-disk news cache file */
export const NewsStoreFileSchema = z.object({
  lastFetched: z.string().nullable(),
  articles: z.array(NewsArticleSchema),
});

export type NewsStoreFile = z.infer<typeof NewsStoreFileSchema>;

export const SentimentLexiconSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
});
