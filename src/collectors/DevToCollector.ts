import { FetchResult, RawItem, SourceAdapter } from '../types/Article';
import { FetchError, ParseError } from '../errors';
import { logger } from '../utils/logger';
import { Clock, RateLimiter, systemClock } from '../utils/rateLimiter';
import { getJson, toFetchError } from './http';
import { parseDevToArticle } from './schemas';

interface DevToCollectorConfig {
  baseUrl: string;
  tag: string;
  apiKey?: string;
  articlesPerPage: number;
  requestDelayMs: number;
}

export class DevToCollector implements SourceAdapter {
  public readonly source = 'devto' as const;
  private config: DevToCollectorConfig;
  private static readonly DEFAULT_CONFIG: DevToCollectorConfig = {
    baseUrl: 'https://dev.to/api',
    tag: 'programming',
    articlesPerPage: 30,
    requestDelayMs: 300,
  };

  constructor(
    config: Partial<DevToCollectorConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.config = { ...DevToCollector.DEFAULT_CONFIG, ...config };
    logger.debug('DevToCollector initialized', {
      ...this.config,
      apiKey: this.config.apiKey ? '[SET]' : undefined,
    });
  }

  public async fetch(maxItems: number, timeoutMs: number): Promise<FetchResult> {
    logger.info(
      `Dev.to fetch started: tag "${this.config.tag}", up to ${maxItems} articles`
    );

    const limiter = new RateLimiter(this.config.requestDelayMs, this.clock);
    const items: RawItem[] = [];
    let skipped = 0;
    let received = 0;

    for (let page = 1; received < maxItems; page++) {
      const perPage = Math.min(this.config.articlesPerPage, maxItems - received);
      // A failed page fails the whole call, earlier pages included
      const records = await this.fetchPage(limiter, page, perPage, timeoutMs);

      for (const record of records) {
        received++;
        const parsed = parseDevToArticle(record);
        if (parsed.ok) {
          items.push({ kind: 'devto', article: parsed.value });
        } else {
          skipped++;
          logger.warn(
            'Skipping malformed record',
            new ParseError(this.source, `page ${page}: ${parsed.reason}`)
          );
        }
      }

      logger.debug(`Dev.to page ${page}: ${records.length} records`);

      if (records.length < perPage) {
        break;
      }
    }

    logger.info(
      `Dev.to fetch finished: ${items.length} articles (skipped: ${skipped})`
    );

    return { source: this.source, items, skipped };
  }

  private async fetchPage(
    limiter: RateLimiter,
    page: number,
    perPage: number,
    timeoutMs: number
  ): Promise<unknown[]> {
    const headers: Record<string, string> = {};
    if (this.config.apiKey) {
      headers['api-key'] = this.config.apiKey;
    }

    let payload: unknown;
    try {
      payload = await limiter.schedule(() =>
        getJson(`${this.config.baseUrl}/articles`, {
          timeoutMs,
          headers,
          params: { tag: this.config.tag, per_page: perPage, page },
        })
      );
    } catch (error) {
      throw toFetchError(this.source, error, `GET articles page ${page}`);
    }

    if (!Array.isArray(payload)) {
      throw new FetchError(
        this.source,
        'parse',
        `articles page ${page} is not a JSON array`
      );
    }

    return payload;
  }

  public getConfig(): DevToCollectorConfig {
    return { ...this.config };
  }

  public setApiKey(apiKey: string): void {
    this.config.apiKey = apiKey;
    logger.info('Dev.to API key set');
  }
}
