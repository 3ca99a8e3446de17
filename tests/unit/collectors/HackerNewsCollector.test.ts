import axios from 'axios';
import { HackerNewsCollector } from '../../../src/collectors/HackerNewsCollector';
import { FetchError } from '../../../src/errors';
import { FakeClock } from '../../helpers/fixtures';

jest.mock('axios');
const mockedGet = jest.mocked(axios.get);

const API = 'https://hacker-news.firebaseio.com/v0';

function story(id: number, title: string): Record<string, unknown> {
  return {
    id,
    type: 'story',
    title,
    by: 'pg',
    time: 1_700_000_000,
    url: `https://example.com/${id}`,
    score: 10 * id,
    descendants: id,
  };
}

function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    response: { status },
  });
}

function respondWith(routes: Record<string, unknown>): void {
  mockedGet.mockImplementation(async (url: string) => {
    if (!(url in routes)) {
      throw new Error(`unexpected GET ${url}`);
    }
    const response = routes[url];
    if (response instanceof Error) {
      throw response;
    }
    return { data: response, status: 200, headers: {} };
  });
}

describe('HackerNewsCollector', () => {
  let clock: FakeClock;
  let collector: HackerNewsCollector;

  beforeEach(() => {
    jest.clearAllMocks();
    clock = new FakeClock();
    collector = new HackerNewsCollector({ requestDelayMs: 1000 }, clock);
  });

  describe('fetch', () => {
    it('fetches the first maxItems ranked stories', async () => {
      respondWith({
        [`${API}/topstories.json`]: [1, 2, 3],
        [`${API}/item/1.json`]: story(1, 'First'),
        [`${API}/item/2.json`]: story(2, 'Second'),
      });

      const result = await collector.fetch(2, 5000);

      expect(result.source).toBe('hackernews');
      expect(result.skipped).toBe(0);
      expect(result.items).toEqual([
        { kind: 'hackernews', item: story(1, 'First') },
        { kind: 'hackernews', item: story(2, 'Second') },
      ]);
      expect(mockedGet).toHaveBeenCalledTimes(3);
      expect(mockedGet).toHaveBeenCalledWith(
        `${API}/topstories.json`,
        expect.objectContaining({
          timeout: 5000,
          headers: expect.objectContaining({ 'User-Agent': 'TechTrends/1.0' }),
        })
      );
    });

    it('spaces consecutive requests by the configured delay', async () => {
      respondWith({
        [`${API}/topstories.json`]: [1, 2],
        [`${API}/item/1.json`]: story(1, 'First'),
        [`${API}/item/2.json`]: story(2, 'Second'),
      });

      await collector.fetch(2, 5000);

      expect(clock.sleeps).toEqual([1000, 1000]);
    });

    it('skips records that are not live stories', async () => {
      respondWith({
        [`${API}/topstories.json`]: [1, 2, 3, 4],
        [`${API}/item/1.json`]: story(1, 'Kept'),
        [`${API}/item/2.json`]: { id: 2, type: 'comment', text: 'reply' },
        [`${API}/item/3.json`]: null,
        [`${API}/item/4.json`]: { ...story(4, '[deleted]'), deleted: true },
      });

      const result = await collector.fetch(10, 5000);

      expect(result.items).toHaveLength(1);
      expect(result.skipped).toBe(3);
    });

    it('skips a story whose request fails', async () => {
      respondWith({
        [`${API}/topstories.json`]: [1, 2],
        [`${API}/item/1.json`]: httpError(500),
        [`${API}/item/2.json`]: story(2, 'Second'),
      });

      const result = await collector.fetch(2, 5000);

      expect(result.items).toEqual([{ kind: 'hackernews', item: story(2, 'Second') }]);
      expect(result.skipped).toBe(1);
    });

    it('fails with a network error when the ranked list is unreachable', async () => {
      respondWith({ [`${API}/topstories.json`]: new Error('socket hang up') });

      const failure = collector.fetch(5, 5000);

      await expect(failure).rejects.toBeInstanceOf(FetchError);
      await expect(failure).rejects.toMatchObject({
        cause: 'network',
        message: '[hackernews] network: GET topstories: socket hang up',
      });
    });

    it('reports timeouts as network failures', async () => {
      respondWith({
        [`${API}/topstories.json`]: Object.assign(new Error('timeout of 5000ms exceeded'), {
          code: 'ECONNABORTED',
        }),
      });

      await expect(collector.fetch(5, 5000)).rejects.toMatchObject({
        cause: 'network',
        message: '[hackernews] network: GET topstories: timed out (timeout of 5000ms exceeded)',
      });
    });

    it('fails with a parse error when the ranked list is not an id array', async () => {
      respondWith({ [`${API}/topstories.json`]: { error: 'nope' } });

      await expect(collector.fetch(5, 5000)).rejects.toMatchObject({ cause: 'parse' });
    });

    it('gives up as rate-limited on HTTP 429', async () => {
      respondWith({
        [`${API}/topstories.json`]: [1, 2],
        [`${API}/item/1.json`]: httpError(429),
        [`${API}/item/2.json`]: story(2, 'Second'),
      });

      await expect(collector.fetch(2, 5000)).rejects.toMatchObject({
        cause: 'rate-limited',
        message: '[hackernews] rate-limited: GET item 1: HTTP 429',
      });
      expect(mockedGet).toHaveBeenCalledTimes(2);
    });
  });

  it('merges the given config over the defaults', () => {
    expect(collector.getConfig()).toEqual({
      apiUrl: API,
      listName: 'topstories',
      requestDelayMs: 1000,
    });
  });
});
