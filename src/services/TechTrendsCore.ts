import { Article, CategoryRule, SourceAdapter } from '../types/Article';
import { Config } from '../types/Config';
import {
  ArticleFilters,
  ArticleSort,
  CategoryAggregate,
  CorpusStats,
  IngestionReport,
  KeywordFrequency,
  RecategorizeResult,
  SearchRecord,
  TimeWindow,
} from '../types/Corpus';
import { DevToCollector } from '../collectors/DevToCollector';
import { HackerNewsCollector } from '../collectors/HackerNewsCollector';
import { ArticleRepository, DEFAULT_SORT } from '../repositories/ArticleRepository';
import { Clock, systemClock } from '../utils/rateLimiter';
import { logger } from '../utils/logger';
import { IngestionService } from './IngestionService';
import { TrendAggregator } from './TrendAggregator';

export interface TechTrendsCoreDeps {
  adapters: readonly SourceAdapter[];
  repository: ArticleRepository;
  rules: readonly CategoryRule[];
  timeoutMs: number | ((adapter: SourceAdapter) => number);
  now?: () => Date;
}

/**
 * The operations a dashboard, HTTP layer or CLI may call. Callers only read
 * and trigger runs through here; none of them touch the store directly.
 */
export class TechTrendsCore {
  private readonly repository: ArticleRepository;
  private readonly rules: readonly CategoryRule[];
  private readonly ingestion: IngestionService;
  private readonly trends: TrendAggregator;

  constructor(deps: TechTrendsCoreDeps) {
    this.repository = deps.repository;
    this.rules = deps.rules;
    this.ingestion = new IngestionService(deps.adapters, deps.repository, deps.rules, {
      timeoutMs: deps.timeoutMs,
      now: deps.now,
    });
    this.trends = new TrendAggregator(deps.repository);
  }

  public static fromConfig(config: Config, clock: Clock = systemClock): TechTrendsCore {
    const adapters: SourceAdapter[] = [];
    const timeouts = new Map<string, number>();

    if (config.sources.hackernews.enabled) {
      adapters.push(
        new HackerNewsCollector(
          { requestDelayMs: config.sources.hackernews.requestDelayMs },
          clock
        )
      );
      timeouts.set('hackernews', config.sources.hackernews.timeoutMs);
    }

    if (config.sources.devto.enabled) {
      const { tag, apiKey, requestDelayMs, timeoutMs } = config.sources.devto;
      adapters.push(
        new DevToCollector({ tag, requestDelayMs, ...(apiKey ? { apiKey } : {}) }, clock)
      );
      timeouts.set('devto', timeoutMs);
    }

    return new TechTrendsCore({
      adapters,
      repository: new ArticleRepository(config.database.path),
      rules: config.categories,
      timeoutMs: adapter => timeouts.get(adapter.source) ?? 10000,
    });
  }

  public runIngestion(maxItemsPerSource: number): Promise<IngestionReport> {
    return this.ingestion.runIngestion(maxItemsPerSource);
  }

  public query(
    filters: ArticleFilters = {},
    sort: ArticleSort = DEFAULT_SORT,
    limit = 50,
    offset = 0
  ): Article[] {
    return this.repository.query(filters, sort, limit, offset);
  }

  public stats(): CorpusStats {
    return this.repository.stats();
  }

  public trendingKeywords(window: TimeWindow, topN: number): KeywordFrequency[] {
    return this.trends.trendingKeywords(window, topN);
  }

  public categoryBreakdown(window: TimeWindow): Record<string, CategoryAggregate> {
    return this.trends.categoryBreakdown(window);
  }

  /** Applies the current rule set to every stored article. */
  public recategorize(): RecategorizeResult {
    logger.info('Re-categorization requested', {
      categories: this.rules.map(rule => rule.label),
    });
    return this.repository.recategorize(this.rules);
  }

  public searchHistory(limit = 10): SearchRecord[] {
    return this.repository.searchHistory(limit);
  }

  public close(): void {
    this.repository.close();
  }
}
