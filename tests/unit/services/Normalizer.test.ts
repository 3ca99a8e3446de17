import { computeIdentity, normalize } from '../../../src/services/Normalizer';
import { DevToArticle, HackerNewsItem } from '../../../src/types/Article';

const INGESTED_AT = new Date('2024-03-05T08:00:00.000Z');

function hnItem(overrides: Partial<HackerNewsItem> = {}): HackerNewsItem {
  return {
    id: 42,
    type: 'story',
    title: '  Show HN: Rust &amp; Go  ',
    by: 'pg',
    time: 1_700_000_000,
    url: 'https://example.com/a',
    score: 100,
    descendants: 25,
    ...overrides,
  };
}

function devtoArticle(overrides: Partial<DevToArticle> = {}): DevToArticle {
  return {
    id: 7,
    title: 'Hello &quot;world&quot;',
    url: 'https://dev.to/someone/hello',
    description: '<p>An <em>intro</em></p>',
    published_at: '2024-03-01T10:00:00Z',
    tag_list: [' JavaScript ', '', 'webdev'],
    public_reactions_count: 7,
    comments_count: 3,
    reading_time_minutes: 4,
    user: { name: null, username: 'someone' },
    ...overrides,
  };
}

describe('Normalizer', () => {
  describe('computeIdentity', () => {
    it('prefers the native id', () => {
      expect(computeIdentity('hackernews', 42, 'https://example.com')).toBe('hackernews:42');
    });

    it('falls back to the URL when there is no id', () => {
      expect(computeIdentity('devto', null, 'https://x.dev/a')).toBe('devto:url:https://x.dev/a');
      expect(computeIdentity('devto', '  ', 'https://x.dev/a')).toBe('devto:url:https://x.dev/a');
    });
  });

  describe('Hacker News items', () => {
    it('maps every field onto the article', () => {
      expect(normalize({ kind: 'hackernews', item: hnItem() }, INGESTED_AT)).toEqual({
        identity: 'hackernews:42',
        source: 'hackernews',
        title: 'Show HN: Rust & Go',
        url: 'https://example.com/a',
        author: 'pg',
        publishedAt: new Date(1_700_000_000_000),
        publishedAtApproximate: false,
        engagement: { points: 100, comments: 25, reactions: 0 },
        description: '',
        tags: [],
        readingTimeMinutes: 0,
        category: null,
        ingestedAt: INGESTED_AT,
      });
    });

    it('keeps the identity stable across title and whitespace changes', () => {
      const first = normalize({ kind: 'hackernews', item: hnItem() }, INGESTED_AT);
      const second = normalize(
        { kind: 'hackernews', item: hnItem({ title: 'Show HN:   Rust and Go (v2)' }) },
        INGESTED_AT
      );
      expect(second.identity).toBe(first.identity);
    });

    it('uses an empty url for self posts and non-http links', () => {
      const selfPost = hnItem();
      delete selfPost.url;
      expect(normalize({ kind: 'hackernews', item: selfPost }, INGESTED_AT).url).toBe('');
      expect(
        normalize({ kind: 'hackernews', item: hnItem({ url: 'javascript:alert(1)' }) }, INGESTED_AT)
          .url
      ).toBe('');
    });

    it('defaults missing counts and author', () => {
      const article = normalize(
        {
          kind: 'hackernews',
          item: { id: 9, type: 'story', title: 'Bare' },
        },
        INGESTED_AT
      );
      expect(article.engagement).toEqual({ points: 0, comments: 0, reactions: 0 });
      expect(article.author).toBeNull();
    });

    it('falls back to the ingestion time when the item has no timestamp', () => {
      const article = normalize(
        { kind: 'hackernews', item: { id: 9, type: 'story', title: 'Bare' } },
        INGESTED_AT
      );
      expect(article.publishedAt).toEqual(INGESTED_AT);
      expect(article.publishedAt).not.toBe(INGESTED_AT);
      expect(article.publishedAtApproximate).toBe(true);
    });
  });

  describe('Dev.to articles', () => {
    it('maps every field onto the article', () => {
      expect(normalize({ kind: 'devto', article: devtoArticle() }, INGESTED_AT)).toEqual({
        identity: 'devto:7',
        source: 'devto',
        title: 'Hello "world"',
        url: 'https://dev.to/someone/hello',
        author: 'someone',
        publishedAt: new Date('2024-03-01T10:00:00.000Z'),
        publishedAtApproximate: false,
        engagement: { points: 0, comments: 3, reactions: 7 },
        description: 'An intro',
        tags: ['javascript', 'webdev'],
        readingTimeMinutes: 4,
        category: null,
        ingestedAt: INGESTED_AT,
      });
    });

    it('prefers positive reactions and the display name', () => {
      const article = normalize(
        {
          kind: 'devto',
          article: devtoArticle({
            positive_reactions_count: 11,
            user: { name: 'Some One', username: 'someone' },
          }),
        },
        INGESTED_AT
      );
      expect(article.engagement.reactions).toBe(11);
      expect(article.author).toBe('Some One');
    });

    it('marks an unparseable publication date as approximate', () => {
      const article = normalize(
        { kind: 'devto', article: devtoArticle({ published_at: 'not a date' }) },
        INGESTED_AT
      );
      expect(article.publishedAt).toEqual(INGESTED_AT);
      expect(article.publishedAtApproximate).toBe(true);
    });
  });
});
