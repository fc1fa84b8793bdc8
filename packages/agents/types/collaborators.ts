// Interfaces of everything the core calls out to. Implementations live in
// @market-sentinel/market-data and bridge/; tests substitute in-process fakes.

import type { Fetched, NewsArticle, QuantMetrics, TechnicalSnapshot } from '@market-sentinel/market-data';

export interface NewsFeed {
  fetchNews(subject: string, limit: number): Promise<Fetched<NewsArticle[]>>;
}

export interface TechnicalDataSource {
  fetchTechnicals(subject: string, days: number): Promise<Fetched<TechnicalSnapshot>>;
}

export interface QuantDataSource {
  fetchQuantMetrics(subject: string, days: number): Promise<Fetched<QuantMetrics>>;
}

export type MarketData = NewsFeed & TechnicalDataSource & QuantDataSource;

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** Text-generation capability. Replies are free text; callers never assume structure. */
export interface LanguageModel {
  invoke(messages: ChatMessage[]): Promise<string>;
}
