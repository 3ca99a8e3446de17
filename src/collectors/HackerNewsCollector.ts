import { FetchResult, RawItem, SourceAdapter } from '../types/Article';
import { FetchError, ParseError } from '../errors';
import { logger } from '../utils/logger';
import { Clock, RateLimiter, systemClock } from '../utils/rateLimiter';
import { describeHttpFailure, getJson, toFetchError } from './http';
import { HackerNewsIdsSchema, parseHackerNewsItem } from './schemas';

interface HackerNewsCollectorConfig {
  apiUrl: string;
  listName: 'topstories' | 'newstories' | 'beststories';
  requestDelayMs: number;
}

export class HackerNewsCollector implements SourceAdapter {
  public readonly source = 'hackernews' as const;
  private config: HackerNewsCollectorConfig;
  private static readonly DEFAULT_CONFIG: HackerNewsCollectorConfig = {
    apiUrl: 'https://hacker-news.firebaseio.com/v0',
    listName: 'topstories',
    requestDelayMs: 1000,
  };

  constructor(
    config: Partial<HackerNewsCollectorConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.config = { ...HackerNewsCollector.DEFAULT_CONFIG, ...config };
    logger.debug('HackerNewsCollector initialized', this.config);
  }

  public async fetch(maxItems: number, timeoutMs: number): Promise<FetchResult> {
    logger.info(`HackerNews fetch started: up to ${maxItems} stories`);

    // Pacing state is scoped to this call
    const limiter = new RateLimiter(this.config.requestDelayMs, this.clock);
    const ids = await this.fetchRankedIds(limiter, timeoutMs);

    const items: RawItem[] = [];
    let skipped = 0;

    for (const id of ids.slice(0, Math.max(0, maxItems))) {
      const outcome = await this.fetchStory(limiter, id, timeoutMs);
      if (outcome) {
        items.push(outcome);
      } else {
        skipped++;
      }
    }

    logger.info(
      `HackerNews fetch finished: ${items.length} stories ` +
        `(skipped: ${skipped})`
    );

    return { source: this.source, items, skipped };
  }

  private async fetchRankedIds(
    limiter: RateLimiter,
    timeoutMs: number
  ): Promise<number[]> {
    const url = `${this.config.apiUrl}/${this.config.listName}.json`;

    let payload: unknown;
    try {
      payload = await limiter.schedule(() => getJson(url, { timeoutMs }));
    } catch (error) {
      throw toFetchError(this.source, error, `GET ${this.config.listName}`);
    }

    const parsed = HackerNewsIdsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FetchError(
        this.source,
        'parse',
        `${this.config.listName} did not return a list of story ids`
      );
    }

    logger.debug(`HackerNews ranked ids received: ${parsed.data.length}`);
    return parsed.data;
  }

  /**
   * Returns `null` for a record that has to be skipped. Rate limiting is
   * the only per-story failure that aborts the whole call.
   */
  private async fetchStory(
    limiter: RateLimiter,
    id: number,
    timeoutMs: number
  ): Promise<RawItem | null> {
    let payload: unknown;
    try {
      payload = await limiter.schedule(() =>
        getJson(`${this.config.apiUrl}/item/${id}.json`, { timeoutMs })
      );
    } catch (error) {
      if (describeHttpFailure(error).status === 429) {
        throw toFetchError(this.source, error, `GET item ${id}`);
      }
      logger.warn(`HackerNews story ${id} could not be fetched, skipping`, error);
      return null;
    }

    const parsed = parseHackerNewsItem(payload);
    if (!parsed.ok) {
      logger.warn(
        'Skipping malformed record',
        new ParseError(this.source, `item ${id}: ${parsed.reason}`)
      );
      return null;
    }

    return { kind: 'hackernews', item: parsed.value };
  }

  public getConfig(): HackerNewsCollectorConfig {
    return { ...this.config };
  }
}
