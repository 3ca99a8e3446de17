import { ArticleSource } from './types/Article';

export type FetchErrorCause = 'network' | 'parse' | 'rate-limited';
export type StorageErrorCause = 'io' | 'constraint-violation' | 'corruption';

export class TechTrendsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TechTrendsError';
  }
}

/**
 * Raised by a source adapter when the whole call has to be given up.
 * Scoped to one adapter; the ingestion run records it and carries on.
 */
export class FetchError extends TechTrendsError {
  constructor(
    public readonly source: ArticleSource,
    public readonly cause: FetchErrorCause,
    message: string
  ) {
    super(`[${source}] ${cause}: ${message}`);
    this.name = 'FetchError';
  }
}

/** A single raw record that does not match its source schema. */
export class ParseError extends TechTrendsError {
  constructor(
    public readonly source: ArticleSource,
    message: string
  ) {
    super(`[${source}] ${message}`);
    this.name = 'ParseError';
  }
}

export class StorageError extends TechTrendsError {
  constructor(
    public readonly cause: StorageErrorCause,
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

export class ConfigError extends TechTrendsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
