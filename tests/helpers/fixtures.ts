import { Article, CategoryRule } from '../../src/types/Article';
import { Clock } from '../../src/utils/rateLimiter';

/** Clock whose sleep advances time instantly and remembers what was asked for. */
export class FakeClock implements Clock {
  public readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  public now(): number {
    return this.current;
  }

  public async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  public advance(ms: number): void {
    this.current += ms;
  }
}

export const TEST_RULES: CategoryRule[] = [
  { label: 'Python', keywords: ['python'] },
  { label: 'DevOps', keywords: ['docker', 'kubernetes'] },
  { label: 'Rust', keywords: ['rust'] },
];

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    identity: 'hackernews:1',
    source: 'hackernews',
    title: 'Default title',
    url: 'https://example.com/1',
    author: 'alice',
    publishedAt: new Date('2024-03-01T12:00:00.000Z'),
    publishedAtApproximate: false,
    engagement: { points: 0, comments: 0, reactions: 0 },
    description: '',
    tags: [],
    readingTimeMinutes: 0,
    category: null,
    ingestedAt: new Date('2024-03-02T00:00:00.000Z'),
    ...overrides,
  };
}
