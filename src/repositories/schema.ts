export const SCHEMA_VERSION = 1;

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS articles (
    identity TEXT PRIMARY KEY,
    source TEXT NOT NULL CHECK (source IN ('hackernews', 'devto')),
    title TEXT NOT NULL CHECK (length(trim(title)) > 0),
    url TEXT NOT NULL DEFAULT '',
    author TEXT,
    description TEXT NOT NULL DEFAULT '',
    published_at TEXT NOT NULL,
    published_at_approximate INTEGER NOT NULL DEFAULT 0,
    points INTEGER NOT NULL DEFAULT 0 CHECK (points >= 0),
    comments INTEGER NOT NULL DEFAULT 0 CHECK (comments >= 0),
    reactions INTEGER NOT NULL DEFAULT 0 CHECK (reactions >= 0),
    tags TEXT NOT NULL DEFAULT '[]',
    reading_time_minutes INTEGER NOT NULL DEFAULT 0,
    category TEXT,
    ingested_at TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_articles_points ON articles (points)',
  'CREATE INDEX IF NOT EXISTS idx_articles_comments ON articles (comments)',
  'CREATE INDEX IF NOT EXISTS idx_articles_reactions ON articles (reactions)',
  'CREATE INDEX IF NOT EXISTS idx_articles_published_at ON articles (published_at)',
  'CREATE INDEX IF NOT EXISTS idx_articles_source ON articles (source)',
  'CREATE INDEX IF NOT EXISTS idx_articles_category ON articles (category)',
  `CREATE TABLE IF NOT EXISTS search_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    query TEXT NOT NULL,
    results_count INTEGER NOT NULL,
    searched_at TEXT NOT NULL
  )`,
];

export interface ArticleRow {
  identity: string;
  source: string;
  title: string;
  url: string;
  author: string | null;
  description: string;
  published_at: string;
  published_at_approximate: number;
  points: number;
  comments: number;
  reactions: number;
  tags: string;
  reading_time_minutes: number;
  category: string | null;
  ingested_at: string;
}

export type ArticleInsertParams = ArticleRow;

export interface SearchHistoryRow {
  query: string;
  results_count: number;
  searched_at: string;
}
