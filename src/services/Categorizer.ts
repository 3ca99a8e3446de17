import { Article, CategoryRule } from '../types/Article';

/**
 * First-match-wins keyword lookup. Rules are scanned in the order given and
 * the first rule with any keyword occurring as a substring of `text` wins,
 * even when a later rule would match more keywords.
 */
export function categorizeText(
  text: string,
  rules: readonly CategoryRule[]
): string | null {
  const haystack = text.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some(keyword => keyword && haystack.includes(keyword.toLowerCase()))) {
      return rule.label;
    }
  }
  return null;
}

export function categorize(
  article: Article,
  rules: readonly CategoryRule[]
): Article {
  return {
    ...article,
    category: categorizeText(`${article.title} ${article.description}`, rules),
  };
}
