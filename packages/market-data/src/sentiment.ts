// Keyword headline sentiment. Lexicon entries are stems matched against word starts.

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { SentimentLexiconSchema } from './schemas/news.js';
import type { HeadlineSentiment } from './types.js';

export interface SentimentLexicon {
  positive: string[];
  negative: string[];
}

export interface HeadlineScore {
  sentiment: HeadlineSentiment;
  score: number;
}

const LEXICON_PATH = fileURLToPath(new URL('./data/sentiment-lexicon.json', import.meta.url));

export function loadLexicon(path: string = LEXICON_PATH): SentimentLexicon {
  return SentimentLexiconSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

let defaultLexicon: SentimentLexicon | undefined;

function lexicon(): SentimentLexicon {
  defaultLexicon ??= loadLexicon();
  return defaultLexicon;
}

function countHits(text: string, stems: string[]): number {
  let hits = 0;
  for (const stem of stems) {
    // Multi-word stems match as phrases, single words at a word start
    const pattern = new RegExp(`(^|[^a-z])${escapeRegExp(stem)}`, 'g');
    hits += text.match(pattern)?.length ?? 0;
  }
  return hits;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Score a headline into [-1, 1]: (pos - neg) / (pos + neg + 1), rounded to 2 decimals.
 */
export function scoreHeadline(text: string, words: SentimentLexicon = lexicon()): HeadlineScore {
  const t = text.toLowerCase();
  const pos = countHits(t, words.positive);
  const neg = countHits(t, words.negative);
  const score = Math.round(((pos - neg) / (pos + neg + 1)) * 100) / 100;
  const sentiment: HeadlineSentiment = score > 0 ? 'positive' : score < 0 ? 'negative' : 'neutral';
  return { sentiment, score };
}
