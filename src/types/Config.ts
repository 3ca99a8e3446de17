import { CategoryRule } from './Article';

export interface SourceConfig {
  enabled: boolean;
  requestDelayMs: number;
  timeoutMs: number;
}

export interface Config {
  sources: {
    hackernews: SourceConfig;
    devto: SourceConfig & {
      tag: string;
      apiKey?: string;
    };
  };
  ingestion: {
    maxItemsPerSource: number;
  };
  categories: CategoryRule[];
  database: {
    path: string;
  };
  trends: {
    defaultWindowDays: number;
    defaultTopN: number;
  };
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  backoffMultiplier: number;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LoggerConfig {
  level: LogLevel;
  maskSensitiveData: boolean;
}
