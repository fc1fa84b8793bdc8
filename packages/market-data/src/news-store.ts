// File-backed news cache. Opened at startup, flushed on shutdown;
// in between, reads and writes touch only the in-memory copy.

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { NewsStoreFileSchema, type NewsStoreFile } from './schemas/news.js';
import type { NewsArticle } from './types.js';

export class NewsStore {
  private state: NewsStoreFile = { lastFetched: null, articles: [] };
  private dirty = false;
  private opened = false;

  constructor(
    private readonly path: string,
    private readonly onWarning: (message: string, data?: Record<string, unknown>) => void = () => undefined,
  ) {}

  /**
   * Load the cache file if present. A missing file starts empty, and so does
   * one that is unreadable JSON or fails the schema; other I/O errors reject.
   */
  async open(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        this.opened = true;
        return;
      }
      throw err;
    }
    this.state = this.decode(raw) ?? { lastFetched: null, articles: [] };
    this.opened = true;
  }

  private decode(raw: string): NewsStoreFile | undefined {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      this.onWarning('News cache is not valid JSON; starting empty', { path: this.path, error: err.message });
      return undefined;
    }
    const parsed = NewsStoreFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'root'}: ${i.message}`).join('; ');
      this.onWarning('News cache failed validation; starting empty', { path: this.path, error: issues });
      return undefined;
    }
    return parsed.data;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  get lastFetched(): Date | null {
    return this.state.lastFetched ? new Date(this.state.lastFetched) : null;
  }

  articles(limit?: number): NewsArticle[] {
    return limit === undefined ? [...this.state.articles] : this.state.articles.slice(0, limit);
  }

  isFresh(staleHours: number, now: Date = new Date()): boolean {
    const last = this.lastFetched;
    if (!last || this.state.articles.length === 0) return false;
    return now.getTime() - last.getTime() < staleHours * 3_600_000;
  }

  save(articles: NewsArticle[], fetchedAt: Date = new Date()): void {
    this.state = { lastFetched: fetchedAt.toISOString(), articles: [...articles] };
    this.dirty = true;
  }

  /** Written to a temp file, then renamed over the cache */
  async flush(): Promise<void> {
    if (!this.dirty) return;
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(this.state), 'utf-8');
    await rename(tmp, this.path);
    this.dirty = false;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
