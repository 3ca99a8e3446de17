import stopWordList from '../data/stopwords.json';
import { Article, UNCATEGORIZED } from '../types/Article';
import { CategoryAggregate, KeywordFrequency, TimeWindow } from '../types/Corpus';
import { logger } from '../utils/logger';

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

export const MIN_TOKEN_LENGTH = 3;

// Short names that are topics in their own right and survive the length cut.
export const SHORT_TECH_TERMS: ReadonlySet<string> = new Set([
  'ai',
  'ar',
  'cd',
  'ci',
  'db',
  'go',
  'js',
  'ml',
  'os',
  'qa',
  'ts',
  'ui',
  'ux',
  'vr',
]);

export interface ArticleSnapshotReader {
  listInWindow(window: TimeWindow): Article[];
}

export function extractKeywords(text: string): string[] {
  return text
    .normalize('NFC')
    .toLowerCase()
    .split(/[^\p{L}\p{M}\p{N}]+/u)
    .filter(
      token =>
        token.length > 0 &&
        !STOP_WORDS.has(token) &&
        (token.length >= MIN_TOKEN_LENGTH || SHORT_TECH_TERMS.has(token))
    );
}

export function rankKeywords(
  titles: readonly string[],
  topN: number
): KeywordFrequency[] {
  const counts = new Map<string, number>();
  for (const title of titles) {
    for (const keyword of extractKeywords(title)) {
      counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .map(([keyword, count]) => ({ keyword, count }))
    .sort((a, b) =>
      b.count !== a.count
        ? b.count - a.count
        : a.keyword < b.keyword
          ? -1
          : a.keyword > b.keyword
            ? 1
            : 0
    )
    .slice(0, Math.max(0, topN));
}

export function aggregateCategories(
  articles: readonly Article[]
): Record<string, CategoryAggregate> {
  const breakdown = new Map<string, CategoryAggregate>();
  for (const article of articles) {
    const label = article.category ?? UNCATEGORIZED;
    const entry = breakdown.get(label) ?? { articleCount: 0, totalEngagement: 0 };
    const { points, comments, reactions } = article.engagement;
    entry.articleCount++;
    entry.totalEngagement += points + comments + reactions;
    breakdown.set(label, entry);
  }
  return Object.fromEntries(breakdown);
}

/**
 * Stateless trend computation over whatever the corpus holds at call time.
 * Each call reads one snapshot of the window and keeps nothing afterwards.
 */
export class TrendAggregator {
  constructor(private readonly reader: ArticleSnapshotReader) {}

  public trendingKeywords(window: TimeWindow, topN: number): KeywordFrequency[] {
    if (!Number.isInteger(topN) || topN < 0) {
      throw new RangeError(`topN must be a non-negative integer, got ${topN}`);
    }
    const articles = this.reader.listInWindow(window);
    const ranked = rankKeywords(
      articles.map(article => article.title),
      topN
    );
    logger.debug(
      `Trending keywords computed over ${articles.length} articles`,
      ranked.slice(0, 5)
    );
    return ranked;
  }

  public categoryBreakdown(window: TimeWindow): Record<string, CategoryAggregate> {
    return aggregateCategories(this.reader.listInWindow(window));
  }
}

/** Window covering the last `days` days up to `now`. */
export function lastDays(days: number, now: Date = new Date()): TimeWindow {
  return { from: new Date(now.getTime() - days * 24 * 60 * 60 * 1000), to: now };
}
