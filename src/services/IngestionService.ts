import { Article, CategoryRule, FetchResult, SourceAdapter } from '../types/Article';
import { IngestionReport, SourceFailure, UpsertResult } from '../types/Corpus';
import { FetchError } from '../errors';
import { logger } from '../utils/logger';
import { categorize } from './Categorizer';
import { normalize } from './Normalizer';

export interface ArticleWriter {
  upsertBatch(articles: readonly Article[]): UpsertResult;
}

export interface IngestionOptions {
  timeoutMs: number | ((adapter: SourceAdapter) => number);
  now?: () => Date;
}

/**
 * One ingestion run: adapters in parallel, then normalize, categorize and
 * store. Source failures end up in the report; nothing here is retried.
 */
export class IngestionService {
  private readonly now: () => Date;

  constructor(
    private readonly adapters: readonly SourceAdapter[],
    private readonly writer: ArticleWriter,
    private readonly rules: readonly CategoryRule[],
    private readonly options: IngestionOptions
  ) {
    this.now = options.now ?? (() => new Date());
    logger.info('IngestionService initialized', {
      sources: adapters.map(adapter => adapter.source),
      categories: rules.map(rule => rule.label),
    });
  }

  public async runIngestion(maxItemsPerSource: number): Promise<IngestionReport> {
    const startedAt = this.now();
    logger.info(`Ingestion run started: up to ${maxItemsPerSource} items per source`);

    const report: IngestionReport = {
      inserted: 0,
      skippedDuplicate: 0,
      skippedMalformed: 0,
      failedSources: [],
      failedArticles: [],
      startedAt,
      finishedAt: startedAt,
    };

    const settled = await Promise.allSettled(
      this.adapters.map(adapter =>
        adapter.fetch(maxItemsPerSource, this.timeoutFor(adapter))
      )
    );

    const fetched: FetchResult[] = [];
    settled.forEach((result, index) => {
      const adapter = this.adapters[index];
      if (!adapter) return;
      if (result.status === 'fulfilled') {
        fetched.push(result.value);
      } else {
        const failure = this.toSourceFailure(adapter, result.reason);
        report.failedSources.push(failure);
        logger.warn(`${adapter.source} fetch failed (${failure.cause})`, failure.error);
      }
    });

    const ingestedAt = this.now();
    const articles: Article[] = [];
    for (const result of fetched) {
      report.skippedMalformed += result.skipped;
      for (const raw of result.items) {
        articles.push(categorize(normalize(raw, ingestedAt), this.rules));
      }
    }

    const stored = this.writer.upsertBatch(articles);
    report.inserted = stored.inserted;
    report.skippedDuplicate = stored.skippedDuplicate;
    report.failedArticles = stored.failed;
    report.finishedAt = this.now();

    logger.info('Ingestion run finished', {
      inserted: report.inserted,
      skippedDuplicate: report.skippedDuplicate,
      skippedMalformed: report.skippedMalformed,
      failedSources: report.failedSources.map(failure => failure.source),
      failedArticles: report.failedArticles.length,
      durationMs: report.finishedAt.getTime() - startedAt.getTime(),
    });

    return report;
  }

  private timeoutFor(adapter: SourceAdapter): number {
    const { timeoutMs } = this.options;
    return typeof timeoutMs === 'function' ? timeoutMs(adapter) : timeoutMs;
  }

  private toSourceFailure(adapter: SourceAdapter, reason: unknown): SourceFailure {
    if (reason instanceof FetchError) {
      return {
        source: adapter.source,
        cause: reason.cause,
        error: reason.message,
        timestamp: this.now(),
      };
    }
    // An adapter that throws anything else is reported as a network failure
    return {
      source: adapter.source,
      cause: 'network',
      error: reason instanceof Error ? reason.message : String(reason),
      timestamp: this.now(),
    };
  }
}
