#!/usr/bin/env node

import { ARTICLE_SOURCES, UNCATEGORIZED, isArticleSource } from './types/Article';
import {
  ArticleFilters,
  ArticleSort,
  IngestionReport,
  SortField,
} from './types/Corpus';
import { Config } from './types/Config';
import { TechTrendsCore } from './services/TechTrendsCore';
import { lastDays } from './services/TrendAggregator';
import { ConfigLoader } from './utils/config';
import { logger } from './utils/logger';
import { RetryError, RetryService } from './utils/retry';

export type Command =
  | 'ingest'
  | 'query'
  | 'stats'
  | 'trends'
  | 'categories'
  | 'recategorize'
  | 'history'
  | 'help';

const COMMANDS: Command[] = [
  'ingest',
  'query',
  'stats',
  'trends',
  'categories',
  'recategorize',
  'history',
  'help',
];

const SORT_FIELDS: SortField[] = ['points', 'comments', 'reactions', 'publishedAt'];

export interface ParsedArgs {
  command: Command;
  options: Record<string, string>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Raised so that a caller-side retry can re-run an ingestion where every source failed. */
export class IngestionIncompleteError extends Error {
  constructor(public readonly report: IngestionReport) {
    super(
      'Every source failed: ' +
        report.failedSources.map(failure => `${failure.source} (${failure.cause})`).join(', ')
    );
    this.name = 'IngestionIncompleteError';
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function isSortField(value: string): value is SortField {
  return SORT_FIELDS.some(field => field === value);
}

export function parseCommandLineArgs(argv: string[]): ParsedArgs {
  const [first, ...rest] = argv;
  if (first === undefined || first === '--help' || first === '-h') {
    return { command: 'help', options: {} };
  }
  if (!isCommand(first)) {
    throw new UsageError(`Unknown command "${first}"`);
  }

  const options: Record<string, string> = {};
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === undefined) continue;
    if (arg === '--help' || arg === '-h') {
      return { command: 'help', options: {} };
    }
    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument "${arg}"`);
    }
    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Option ${arg} needs a value`);
    }
    options[arg.slice(2)] = value;
    i++;
  }

  return { command: first, options };
}

function integerOption(
  options: Record<string, string>,
  name: string,
  fallback: number,
  min = 0
): number {
  const raw = options[name];
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new UsageError(`--${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function buildFilters(options: Record<string, string>): ArticleFilters {
  const filters: ArticleFilters = {};
  const { source, category, search } = options;

  if (source !== undefined) {
    if (!isArticleSource(source)) {
      throw new UsageError(`--source must be one of ${ARTICLE_SOURCES.join(', ')}`);
    }
    filters.source = source;
  }
  if (category !== undefined) {
    filters.category = category === UNCATEGORIZED ? null : category;
  }
  if (search !== undefined) {
    filters.textSearch = search;
  }
  return filters;
}

export function buildSort(options: Record<string, string>): ArticleSort {
  const field = options.sort ?? 'publishedAt';
  const direction = options.order ?? 'desc';

  if (!isSortField(field)) {
    throw new UsageError(`--sort must be one of ${SORT_FIELDS.join(', ')}`);
  }
  if (direction !== 'asc' && direction !== 'desc') {
    throw new UsageError('--order must be asc or desc');
  }
  return { field, direction };
}

export async function runIngestionWithRetries(
  core: Pick<TechTrendsCore, 'runIngestion'>,
  maxItemsPerSource: number,
  retries: number,
  sleep?: (ms: number) => Promise<void>
): Promise<IngestionReport> {
  try {
    return await RetryService.withRetryCondition(
      async () => {
        const report = await core.runIngestion(maxItemsPerSource);
        const everySourceFailed =
          report.failedSources.length > 0 &&
          report.inserted === 0 &&
          report.skippedDuplicate === 0 &&
          report.skippedMalformed === 0 &&
          report.failedArticles.length === 0;
        if (retries > 0 && everySourceFailed) {
          throw new IngestionIncompleteError(report);
        }
        return report;
      },
      error =>
        error instanceof IngestionIncompleteError &&
        error.report.failedSources.some(failure => failure.cause !== 'parse'),
      { maxRetries: retries, baseDelay: 2000 },
      'Ingestion run',
      sleep
    );
  } catch (error) {
    if (error instanceof RetryError && error.lastError instanceof IngestionIncompleteError) {
      return error.lastError.report;
    }
    throw error;
  }
}

function printReport(report: IngestionReport): void {
  console.log(
    JSON.stringify(
      {
        inserted: report.inserted,
        skippedDuplicate: report.skippedDuplicate,
        skippedMalformed: report.skippedMalformed,
        failedSources: report.failedSources,
        failedArticles: report.failedArticles,
        durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
      },
      null,
      2
    )
  );
}

export async function execute(
  args: ParsedArgs,
  core: TechTrendsCore,
  config: Config
): Promise<void> {
  const { options } = args;
  const days = integerOption(options, 'days', config.trends.defaultWindowDays, 1);

  switch (args.command) {
    case 'ingest': {
      const max = integerOption(options, 'max', config.ingestion.maxItemsPerSource, 1);
      const retries = integerOption(options, 'retries', 0);
      printReport(await runIngestionWithRetries(core, max, retries));
      return;
    }
    case 'query': {
      const articles = core.query(
        buildFilters(options),
        buildSort(options),
        integerOption(options, 'limit', 20, 1),
        integerOption(options, 'offset', 0)
      );
      for (const article of articles) {
        const { points, comments, reactions } = article.engagement;
        console.log(
          `${article.publishedAt.toISOString().slice(0, 10)}  [${article.source}] ` +
            `${article.title}  (${points}pts ${comments}c ${reactions}r) ` +
            `${article.category ?? UNCATEGORIZED}  ${article.url}`
        );
      }
      return;
    }
    case 'stats':
      console.log(JSON.stringify(core.stats(), null, 2));
      return;
    case 'trends': {
      const topN = integerOption(options, 'top', config.trends.defaultTopN, 1);
      for (const { keyword, count } of core.trendingKeywords(lastDays(days), topN)) {
        console.log(`${String(count).padStart(5)}  ${keyword}`);
      }
      return;
    }
    case 'categories':
      console.log(JSON.stringify(core.categoryBreakdown(lastDays(days)), null, 2));
      return;
    case 'recategorize':
      console.log(JSON.stringify(core.recategorize(), null, 2));
      return;
    case 'history':
      for (const record of core.searchHistory(integerOption(options, 'limit', 10, 1))) {
        console.log(
          `${record.searchedAt.toISOString()}  "${record.query}"  ${record.resultsCount} results`
        );
      }
      return;
    case 'help':
      showHelp();
      return;
  }
}

function showHelp(): void {
  console.log(`
TechTrends: Hacker News and Dev.to trend tracker

Usage:
  techtrends <command> [options]

Commands:
  ingest        Fetch both sources and store new articles
                  --max <n>        items per source
                  --retries <n>    re-run while every source fails (default 0)
  query         List stored articles
                  --source <hackernews|devto>  --category <label|Uncategorized>
                  --search <text>  --sort <points|comments|reactions|publishedAt>
                  --order <asc|desc>  --limit <n>  --offset <n>
  stats         Corpus statistics
  trends        Trending title keywords   --days <n>  --top <n>
  categories    Per-category counts and engagement   --days <n>
  recategorize  Re-apply the configured category rules to stored articles
  history       Recent text searches   --limit <n>
  help          Show this help
`);
}

async function main(argv: string[]): Promise<void> {
  const args = parseCommandLineArgs(argv);
  if (args.command === 'help') {
    showHelp();
    return;
  }

  ConfigLoader.loadEnvironmentFile();
  const config = ConfigLoader.loadConfig();
  const core = TechTrendsCore.fromConfig(config);
  try {
    await execute(args, core, config);
  } finally {
    core.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch(error => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\nRun "techtrends --help" for usage.`);
    } else {
      logger.error('TechTrends command failed', error);
    }
    process.exit(1);
  });
}

export { main };
