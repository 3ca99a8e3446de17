import {
  Article,
  ArticleSource,
  DevToArticle,
  HackerNewsItem,
  RawItem,
} from '../types/Article';
import { cleanDescription, cleanTitle, cleanUrl } from '../utils/text';

/**
 * Dedup key for a source item. The native id wins; the URL is only used
 * when a source hands over an item without one.
 */
export function computeIdentity(
  source: ArticleSource,
  nativeId: string | number | null | undefined,
  url: string
): string {
  const id = nativeId === null || nativeId === undefined ? '' : String(nativeId).trim();
  if (id) {
    return `${source}:${id}`;
  }
  return `${source}:url:${url.trim()}`;
}

function absoluteUrl(value: string): string {
  if (!value) return '';
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? value : '';
  } catch {
    return '';
  }
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function publishedAtOrFallback(
  candidate: Date | null,
  ingestedAt: Date
): { publishedAt: Date; publishedAtApproximate: boolean } {
  if (candidate && !isNaN(candidate.getTime())) {
    return { publishedAt: candidate, publishedAtApproximate: false };
  }
  return { publishedAt: new Date(ingestedAt.getTime()), publishedAtApproximate: true };
}

function normalizeHackerNews(item: HackerNewsItem, ingestedAt: Date): Article {
  const url = absoluteUrl(cleanUrl(item.url));
  return {
    identity: computeIdentity('hackernews', item.id, url),
    source: 'hackernews',
    title: cleanTitle(item.title),
    url,
    author: optionalText(item.by),
    ...publishedAtOrFallback(
      item.time !== undefined ? new Date(item.time * 1000) : null,
      ingestedAt
    ),
    engagement: {
      points: item.score ?? 0,
      comments: item.descendants ?? 0,
      reactions: 0,
    },
    description: '',
    tags: [],
    readingTimeMinutes: 0,
    category: null,
    ingestedAt,
  };
}

function normalizeDevTo(article: DevToArticle, ingestedAt: Date): Article {
  const url = absoluteUrl(cleanUrl(article.url));
  return {
    identity: computeIdentity('devto', article.id, url),
    source: 'devto',
    title: cleanTitle(article.title),
    url,
    author: optionalText(article.user?.name) ?? optionalText(article.user?.username),
    ...publishedAtOrFallback(
      article.published_at ? new Date(article.published_at) : null,
      ingestedAt
    ),
    engagement: {
      points: 0,
      comments: article.comments_count ?? 0,
      reactions:
        article.positive_reactions_count ?? article.public_reactions_count ?? 0,
    },
    description: cleanDescription(article.description),
    tags: (article.tag_list ?? []).map(tag => tag.trim().toLowerCase()).filter(Boolean),
    readingTimeMinutes: article.reading_time_minutes ?? 0,
    category: null,
    ingestedAt,
  };
}

/** Maps one adapter record onto the canonical Article. Never throws. */
export function normalize(raw: RawItem, ingestedAt: Date = new Date()): Article {
  switch (raw.kind) {
    case 'hackernews':
      return normalizeHackerNews(raw.item, ingestedAt);
    case 'devto':
      return normalizeDevTo(raw.article, ingestedAt);
  }
}
