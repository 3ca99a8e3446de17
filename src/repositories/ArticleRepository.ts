import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import {
  Article,
  ArticleSource,
  CategoryRule,
  UNCATEGORIZED,
  isArticleSource,
} from '../types/Article';
import {
  ArticleFilters,
  ArticleSort,
  CorpusStats,
  RecategorizeResult,
  SearchRecord,
  SortField,
  TimeWindow,
  UpsertResult,
} from '../types/Corpus';
import { StorageError } from '../errors';
import { categorizeText } from '../services/Categorizer';
import { logger } from '../utils/logger';
import {
  ArticleInsertParams,
  ArticleRow,
  SCHEMA_STATEMENTS,
  SCHEMA_VERSION,
  SearchHistoryRow,
} from './schema';

const SORT_COLUMNS: Record<SortField, string> = {
  points: 'points',
  comments: 'comments',
  reactions: 'reactions',
  publishedAt: 'published_at',
};

const CORRUPTION_CODES = ['SQLITE_CORRUPT', 'SQLITE_NOTADB'];
const DUPLICATE_CODES = ['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE'];

export const DEFAULT_SORT: ArticleSort = { field: 'publishedAt', direction: 'desc' };

function sqliteCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

export function toStorageError(error: unknown, context: string): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  const code = sqliteCode(error);
  const message = `${context}: ${error instanceof Error ? error.message : String(error)}`;

  if (code && CORRUPTION_CODES.some(prefix => code.startsWith(prefix))) {
    return new StorageError('corruption', message, code);
  }
  if (code?.startsWith('SQLITE_CONSTRAINT')) {
    return new StorageError('constraint-violation', message, code);
  }
  return new StorageError('io', message, code);
}

function parseTags(identity: string, raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = undefined;
  }
  if (!Array.isArray(parsed) || !parsed.every(tag => typeof tag === 'string')) {
    throw new StorageError('corruption', `Row ${identity} has unreadable tags`);
  }
  return parsed;
}

function parseTimestamp(identity: string, column: string, raw: string): Date {
  const date = new Date(raw);
  if (isNaN(date.getTime())) {
    throw new StorageError('corruption', `Row ${identity} has an invalid ${column}`);
  }
  return date;
}

export function rowToArticle(row: ArticleRow): Article {
  if (!isArticleSource(row.source)) {
    throw new StorageError('corruption', `Row ${row.identity} has unknown source ${row.source}`);
  }
  return {
    identity: row.identity,
    source: row.source,
    title: row.title,
    url: row.url,
    author: row.author,
    publishedAt: parseTimestamp(row.identity, 'published_at', row.published_at),
    publishedAtApproximate: row.published_at_approximate === 1,
    engagement: {
      points: row.points,
      comments: row.comments,
      reactions: row.reactions,
    },
    description: row.description,
    tags: parseTags(row.identity, row.tags),
    readingTimeMinutes: row.reading_time_minutes,
    category: row.category,
    ingestedAt: parseTimestamp(row.identity, 'ingested_at', row.ingested_at),
  };
}

function articleToParams(article: Article): ArticleInsertParams {
  return {
    identity: article.identity,
    source: article.source,
    title: article.title,
    url: article.url,
    author: article.author,
    description: article.description,
    published_at: article.publishedAt.toISOString(),
    published_at_approximate: article.publishedAtApproximate ? 1 : 0,
    points: article.engagement.points,
    comments: article.engagement.comments,
    reactions: article.engagement.reactions,
    tags: JSON.stringify(article.tags),
    reading_time_minutes: article.readingTimeMinutes,
    category: article.category,
    ingested_at: article.ingestedAt.toISOString(),
  };
}

function foldCase(value: string): string {
  return value.normalize('NFC').toLowerCase();
}

const END_OF_TIME = '9999-12-31T23:59:59.999Z';

// ISO-8601 strings from toISOString() sort in time order, so the window is
// a plain string range over published_at.
function windowParams(window: TimeWindow): { from: string; to: string } {
  return {
    from: window.from ? window.from.toISOString() : '',
    to: window.to ? window.to.toISOString() : END_OF_TIME,
  };
}

/**
 * SQLite-backed corpus. `identity` is the primary key and the only arbiter
 * of duplicates: an existing row is never rewritten by ingestion.
 */
export class ArticleRepository {
  private readonly db: Database.Database;

  constructor(filename: string = ':memory:') {
    this.db = ArticleRepository.open(filename);
    logger.debug('ArticleRepository opened', { filename });
  }

  private static open(filename: string): Database.Database {
    try {
      if (filename !== ':memory:') {
        mkdirSync(dirname(filename), { recursive: true });
      }
      const db = new Database(filename);
      db.pragma('journal_mode = WAL');
      db.pragma('busy_timeout = 5000');
      // SQLite's lower() only folds ASCII
      db.function('fold', { deterministic: true }, (value: unknown) =>
        typeof value === 'string' ? foldCase(value) : value
      );
      db.transaction(() => {
        for (const statement of SCHEMA_STATEMENTS) {
          db.exec(statement);
        }
        db.pragma(`user_version = ${SCHEMA_VERSION}`);
      })();
      return db;
    } catch (error) {
      throw toStorageError(error, `Opening ${filename}`);
    }
  }

  public upsertBatch(articles: readonly Article[]): UpsertResult {
    const result: UpsertResult = { inserted: 0, skippedDuplicate: 0, failed: [] };
    const insert = this.db.prepare<ArticleInsertParams>(
      `INSERT INTO articles (
        identity, source, title, url, author, description, published_at,
        published_at_approximate, points, comments, reactions, tags,
        reading_time_minutes, category, ingested_at
      ) VALUES (
        @identity, @source, @title, @url, @author, @description, @published_at,
        @published_at_approximate, @points, @comments, @reactions, @tags,
        @reading_time_minutes, @category, @ingested_at
      ) ON CONFLICT(identity) DO NOTHING`
    );

    // Each statement commits on its own; a failing article never rolls
    // back the ones before it.
    for (const article of articles) {
      try {
        const { changes } = insert.run(articleToParams(article));
        if (changes > 0) {
          result.inserted++;
        } else {
          result.skippedDuplicate++;
        }
      } catch (error) {
        const code = sqliteCode(error);
        if (code && DUPLICATE_CODES.includes(code)) {
          result.skippedDuplicate++;
          continue;
        }

        const storageError = toStorageError(error, `Inserting ${article.identity}`);
        result.failed.push({
          identity: article.identity,
          cause: storageError.cause,
          error: storageError.message,
        });
        logger.warn(`Article ${article.identity} was not stored`, storageError);
      }
    }

    logger.info(
      `Upsert finished: ${result.inserted} inserted, ` +
        `${result.skippedDuplicate} duplicates, ${result.failed.length} failed`
    );
    return result;
  }

  public query(
    filters: ArticleFilters = {},
    sort: ArticleSort = DEFAULT_SORT,
    limit = 50,
    offset = 0
  ): Article[] {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`offset must be a non-negative integer, got ${offset}`);
    }

    const conditions: string[] = [];
    const params: Record<string, string | number> = { limit, offset };

    if (filters.source !== undefined) {
      conditions.push('source = @source');
      params.source = filters.source;
    }
    if (filters.category === null) {
      conditions.push('category IS NULL');
    } else if (filters.category !== undefined) {
      conditions.push('category = @category');
      params.category = filters.category;
    }
    const textSearch = filters.textSearch?.trim();
    if (textSearch) {
      conditions.push(
        '(instr(fold(title), @text) > 0 OR instr(fold(description), @text) > 0)'
      );
      params.text = foldCase(textSearch);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const direction = sort.direction === 'asc' ? 'ASC' : 'DESC';
    const sql =
      `SELECT * FROM articles ${where} ` +
      `ORDER BY ${SORT_COLUMNS[sort.field]} ${direction}, identity ASC ` +
      'LIMIT @limit OFFSET @offset';

    let articles: Article[];
    try {
      articles = this.db
        .prepare<Record<string, string | number>, ArticleRow>(sql)
        .all(params)
        .map(rowToArticle);
    } catch (error) {
      throw toStorageError(error, 'Querying articles');
    }

    if (textSearch) {
      this.recordSearch(textSearch, articles.length);
    }

    return articles;
  }

  public stats(): CorpusStats {
    const read = this.db.transaction((): CorpusStats => {
      const totals = this.db
        .prepare<
          [],
          {
            total: number;
            earliest: string | null;
            latest: string | null;
            avg_points: number | null;
            avg_comments: number | null;
            avg_reactions: number | null;
            total_points: number | null;
            total_comments: number | null;
            total_reactions: number | null;
          }
        >(
          `SELECT COUNT(*) AS total,
                  MIN(published_at) AS earliest,
                  MAX(published_at) AS latest,
                  AVG(points) AS avg_points,
                  AVG(comments) AS avg_comments,
                  AVG(reactions) AS avg_reactions,
                  SUM(points) AS total_points,
                  SUM(comments) AS total_comments,
                  SUM(reactions) AS total_reactions
           FROM articles`
        )
        .get();

      const bySource = this.db
        .prepare<[], { source: string; count: number }>(
          'SELECT source, COUNT(*) AS count FROM articles GROUP BY source'
        )
        .all();

      const byCategory = this.db
        .prepare<{ uncategorized: string }, { category: string; count: number }>(
          `SELECT COALESCE(category, @uncategorized) AS category, COUNT(*) AS count
           FROM articles GROUP BY COALESCE(category, @uncategorized) ORDER BY category`
        )
        .all({ uncategorized: UNCATEGORIZED });

      const countBySource: Record<ArticleSource, number> = { hackernews: 0, devto: 0 };
      for (const row of bySource) {
        if (!isArticleSource(row.source)) {
          throw new StorageError('corruption', `Unknown source ${row.source} in corpus`);
        }
        countBySource[row.source] = row.count;
      }

      const countByCategory = Object.fromEntries(
        byCategory.map(row => [row.category, row.count] as const)
      );

      return {
        totalCount: totals?.total ?? 0,
        countBySource,
        countByCategory,
        earliestPublishedAt: totals?.earliest ? new Date(totals.earliest) : null,
        latestPublishedAt: totals?.latest ? new Date(totals.latest) : null,
        engagement: {
          avgPoints: totals?.avg_points ?? 0,
          avgComments: totals?.avg_comments ?? 0,
          avgReactions: totals?.avg_reactions ?? 0,
          totalPoints: totals?.total_points ?? 0,
          totalComments: totals?.total_comments ?? 0,
          totalReactions: totals?.total_reactions ?? 0,
        },
      };
    });

    try {
      return read();
    } catch (error) {
      throw toStorageError(error, 'Reading corpus statistics');
    }
  }

  public listInWindow(window: TimeWindow = {}): Article[] {
    try {
      return this.db
        .prepare<{ from: string; to: string }, ArticleRow>(
          `SELECT * FROM articles
           WHERE published_at >= @from AND published_at <= @to
           ORDER BY published_at ASC, identity ASC`
        )
        .all(windowParams(window))
        .map(rowToArticle);
    } catch (error) {
      throw toStorageError(error, 'Reading articles in window');
    }
  }

  /**
   * Re-runs categorization against `rules` and overwrites `category` only.
   * Runs as one transaction, so a failure leaves every category unchanged.
   */
  public recategorize(rules: readonly CategoryRule[]): RecategorizeResult {
    const run = this.db.transaction((): RecategorizeResult => {
      const rows = this.db
        .prepare<[], Pick<ArticleRow, 'identity' | 'title' | 'description' | 'category'>>(
          'SELECT identity, title, description, category FROM articles'
        )
        .all();
      const update = this.db.prepare<[string | null, string]>(
        'UPDATE articles SET category = ? WHERE identity = ?'
      );

      let updated = 0;
      for (const row of rows) {
        const category = categorizeText(`${row.title} ${row.description}`, rules);
        if (category !== row.category) {
          update.run(category, row.identity);
          updated++;
        }
      }
      return { examined: rows.length, updated };
    });

    try {
      const result = run();
      logger.info(
        `Re-categorization finished: ${result.updated} of ${result.examined} articles changed`
      );
      return result;
    } catch (error) {
      throw toStorageError(error, 'Re-categorizing articles');
    }
  }

  public recordSearch(query: string, resultsCount: number, at: Date = new Date()): void {
    try {
      this.db
        .prepare<[string, number, string]>(
          'INSERT INTO search_history (query, results_count, searched_at) VALUES (?, ?, ?)'
        )
        .run(query, resultsCount, at.toISOString());
    } catch (error) {
      // History is bookkeeping only; the search result is still returned.
      logger.warn('Could not record search history', toStorageError(error, 'Recording search'));
    }
  }

  public searchHistory(limit = 10): SearchRecord[] {
    try {
      return this.db
        .prepare<[number], SearchHistoryRow>(
          `SELECT query, results_count, searched_at FROM search_history
           ORDER BY searched_at DESC, id DESC LIMIT ?`
        )
        .all(limit)
        .map(row => ({
          query: row.query,
          resultsCount: row.results_count,
          searchedAt: new Date(row.searched_at),
        }));
    } catch (error) {
      throw toStorageError(error, 'Reading search history');
    }
  }

  public close(): void {
    this.db.close();
  }
}
