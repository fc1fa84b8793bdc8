// News Sentiment Agent: aggregates headline scores into a market sentiment reading

import type { Fetched, NewsArticle } from '@market-sentinel/market-data';
import { NewsAnalysisSchema, type NewsAnalysis, type NewsEvent } from '../schemas/analysis.js';
import type { MarketSentiment } from '../types/analysis.js';
import type { NewsFeed } from '../types/collaborators.js';
import { clamp, finiteOr, round } from '../utils/numbers.js';
import { BaseAgent, type AgentDeps, type AgentInput } from './base-agent.js';
import { NEWS_AGENT_SYSTEM_PROMPT } from './prompts.js';

export interface NewsFeatures {
  articles: NewsArticle[];
  avgScore: number;
  sentiment: MarketSentiment;
  topEvents: NewsEvent[];
}

export const NEWS_UNAVAILABLE_SUMMARY = 'Unable to fetch news articles. Market sentiment unknown.';

export class NewsAgent extends BaseAgent<NewsArticle[], NewsFeatures, NewsAnalysis> {
  readonly id = 'news_sentiment' as const;
  protected readonly schema = NewsAnalysisSchema;
  protected readonly systemPrompt = NEWS_AGENT_SYSTEM_PROMPT;
  protected readonly emptyReason = 'No news articles available';

  constructor(
    private readonly feed: NewsFeed,
    deps: AgentDeps,
  ) {
    super(deps);
  }

  protected fetch(input: AgentInput): Promise<Fetched<NewsArticle[]>> {
    return this.feed.fetchNews(input.subject, this.thresholds.newsLimit);
  }

  protected isEmpty(raw: NewsArticle[]): boolean {
    return raw.length === 0;
  }

  protected fetchingMessage(input: AgentInput): string {
    return `Fetching latest news for ${input.subject}...`;
  }

  protected retrievedMessage(raw: NewsArticle[]): string {
    return `Retrieved ${raw.length} news articles`;
  }

  protected classify(raw: NewsArticle[]): NewsFeatures {
    const scores = raw.map(a => clamp(finiteOr(a.sentimentScore, 0), -1, 1));
    const avgScore = round(clamp(scores.reduce((a, b) => a + b, 0) / scores.length, -1, 1), 4);

    let sentiment: MarketSentiment = 'neutral';
    if (avgScore > this.thresholds.sentimentBullish) sentiment = 'bullish';
    else if (avgScore < this.thresholds.sentimentBearish) sentiment = 'bearish';

    // Stable sort: ties keep feed order
    const topEvents = raw
      .map((article, i) => ({ article, score: scores[i] }))
      .sort((a, b) => Math.abs(b.score) - Math.abs(a.score))
      .slice(0, this.thresholds.topEvents)
      .map(({ article, score }) => ({
        title: article.title,
        sentiment: article.sentiment,
        sentimentScore: score,
        source: article.source,
        publishedAt: article.publishedAt,
      }));

    return { articles: raw, avgScore, sentiment, topEvents };
  }

  protected buildContext(features: NewsFeatures, input: AgentInput): string {
    const headlines = features.articles
      .slice(0, this.thresholds.newsContextSize)
      .map(a => `- ${a.title} (${a.sentiment}, ${a.sentimentScore.toFixed(2)})`)
      .join('\n');

    return `Recent crypto news relevant to ${input.subject}:

${headlines}

Overall sentiment: ${features.sentiment.toUpperCase()} (average score ${features.avgScore.toFixed(2)} across ${features.articles.length} articles)`;
  }

  protected fallbackNarrative(features: NewsFeatures, input: AgentInput): string {
    return `News sentiment for ${input.subject} is ${features.sentiment} with an average headline score of ${features.avgScore.toFixed(2)} across ${features.articles.length} articles.`;
  }

  protected assemble(features: NewsFeatures, narrative: string): NewsAnalysis {
    return {
      agent: 'news_sentiment',
      summary: narrative,
      overallSentiment: features.sentiment,
      avgSentimentScore: features.avgScore,
      topEvents: features.topEvents,
      newsCount: features.articles.length,
    };
  }

  defaultResult(): NewsAnalysis {
    return {
      agent: 'news_sentiment',
      summary: NEWS_UNAVAILABLE_SUMMARY,
      overallSentiment: 'neutral',
      avgSentimentScore: 0,
      topEvents: [],
      newsCount: 0,
    };
  }

  describe(result: NewsAnalysis): string {
    return `Overall sentiment: ${result.overallSentiment}, Score: ${result.avgSentimentScore.toFixed(2)}`;
  }

  protected completionData(result: NewsAnalysis): Record<string, unknown> {
    return { sentiment: result.overallSentiment, score: result.avgSentimentScore, count: result.newsCount };
  }
}
