export type ArticleSource = 'hackernews' | 'devto';

export const ARTICLE_SOURCES: readonly ArticleSource[] = ['hackernews', 'devto'];

export function isArticleSource(value: string): value is ArticleSource {
  return ARTICLE_SOURCES.some(source => source === value);
}

export const UNCATEGORIZED = 'Uncategorized';

export interface Engagement {
  points: number;
  comments: number;
  reactions: number;
}

export interface Article {
  identity: string;
  source: ArticleSource;
  title: string;
  url: string;
  author: string | null;
  publishedAt: Date;
  publishedAtApproximate: boolean;
  engagement: Engagement;
  description: string;
  tags: string[];
  readingTimeMinutes: number;
  category: string | null;
  ingestedAt: Date;
}

export interface CategoryRule {
  label: string;
  keywords: string[];
}

// Firebase item record (https://github.com/HackerNews/API)
export interface HackerNewsItem {
  id: number;
  type: string;
  title: string;
  by?: string;
  time?: number;
  url?: string;
  score?: number;
  descendants?: number;
  deleted?: boolean;
  dead?: boolean;
}

export interface DevToArticle {
  id: number;
  title: string;
  url: string;
  description?: string | null;
  published_at?: string | null;
  tag_list?: string[];
  positive_reactions_count?: number;
  public_reactions_count?: number;
  comments_count?: number;
  reading_time_minutes?: number;
  user?: {
    name?: string | null;
    username?: string | null;
  } | null;
}

export type RawItem =
  | { kind: 'hackernews'; item: HackerNewsItem }
  | { kind: 'devto'; article: DevToArticle };

export interface FetchResult {
  source: ArticleSource;
  items: RawItem[];
  skipped: number;
}

export interface SourceAdapter {
  readonly source: ArticleSource;
  fetch(maxItems: number, timeoutMs: number): Promise<FetchResult>;
}
