import { ArticleSource } from './Article';
import { FetchErrorCause, StorageErrorCause } from '../errors';

export type SortField = 'points' | 'comments' | 'reactions' | 'publishedAt';
export type SortDirection = 'asc' | 'desc';

export interface ArticleFilters {
  source?: ArticleSource;
  /** `null` selects uncategorized articles. */
  category?: string | null;
  textSearch?: string;
}

export interface ArticleSort {
  field: SortField;
  direction: SortDirection;
}

export interface TimeWindow {
  from?: Date;
  to?: Date;
}

export interface ArticleFailure {
  identity: string;
  cause: StorageErrorCause;
  error: string;
}

export interface UpsertResult {
  inserted: number;
  skippedDuplicate: number;
  failed: ArticleFailure[];
}

export interface EngagementSummary {
  avgPoints: number;
  avgComments: number;
  avgReactions: number;
  totalPoints: number;
  totalComments: number;
  totalReactions: number;
}

export interface CorpusStats {
  totalCount: number;
  countBySource: Record<ArticleSource, number>;
  countByCategory: Record<string, number>;
  earliestPublishedAt: Date | null;
  latestPublishedAt: Date | null;
  engagement: EngagementSummary;
}

export interface RecategorizeResult {
  examined: number;
  updated: number;
}

export interface SearchRecord {
  query: string;
  resultsCount: number;
  searchedAt: Date;
}

export interface KeywordFrequency {
  keyword: string;
  count: number;
}

export interface CategoryAggregate {
  articleCount: number;
  totalEngagement: number;
}

export interface SourceFailure {
  source: ArticleSource;
  cause: FetchErrorCause;
  error: string;
  timestamp: Date;
}

export interface IngestionReport {
  inserted: number;
  skippedDuplicate: number;
  skippedMalformed: number;
  failedSources: SourceFailure[];
  failedArticles: ArticleFailure[];
  startedAt: Date;
  finishedAt: Date;
}
