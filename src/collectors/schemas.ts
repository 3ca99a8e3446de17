import { z } from 'zod';
import { DevToArticle, HackerNewsItem } from '../types/Article';

const nonBlank = z.string().refine(value => value.trim().length > 0, {
  message: 'must not be blank',
});

const count = z.number().int().nonnegative();

export const HackerNewsIdsSchema = z.array(z.number().int().positive());

export const HackerNewsItemSchema = z
  .object({
    id: z.number().int().positive(),
    type: z.literal('story'),
    title: nonBlank,
    by: z.string().optional(),
    time: z.number().int().nonnegative().optional(),
    url: z.string().optional(),
    score: count.optional(),
    descendants: count.optional(),
    deleted: z.literal(false).optional(),
    dead: z.literal(false).optional(),
  })
  .refine(item => item.title !== '[deleted]' && item.title !== '[dead]', {
    message: 'item was removed',
    path: ['title'],
  });

export const DevToArticleSchema = z.object({
  id: z.number().int().positive(),
  title: nonBlank,
  url: z.string().url(),
  description: z.string().nullish(),
  published_at: z.string().nullish(),
  tag_list: z.array(z.string()).optional(),
  positive_reactions_count: count.optional(),
  public_reactions_count: count.optional(),
  comments_count: count.optional(),
  reading_time_minutes: count.optional(),
  user: z
    .object({
      name: z.string().nullish(),
      username: z.string().nullish(),
    })
    .nullish(),
});

export type ParsedRecord<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseHackerNewsItem(input: unknown): ParsedRecord<HackerNewsItem> {
  const result = HackerNewsItemSchema.safeParse(input);
  if (!result.success) {
    return { ok: false, reason: describeIssues(result.error) };
  }
  return { ok: true, value: result.data };
}

export function parseDevToArticle(input: unknown): ParsedRecord<DevToArticle> {
  const result = DevToArticleSchema.safeParse(input);
  if (!result.success) {
    return { ok: false, reason: describeIssues(result.error) };
  }
  return { ok: true, value: result.data };
}
