const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function fromCodePoint(code: number, original: string): string {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) {
    return original;
  }
  return String.fromCodePoint(code);
}

/**
 * Decodes the entities Hacker News and Dev.to actually emit in titles and
 * descriptions. Unknown named entities are left as they are.
 */
export function unescapeHtml(value: string): string {
  return value.replace(
    /&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi,
    (match, entity: string) => {
      if (entity[0] === '#') {
        const hex = entity[1] === 'x' || entity[1] === 'X';
        const code = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
        return fromCodePoint(code, match);
      }
      return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
    }
  );
}

export function stripTags(value: string): string {
  return value.replace(/<[^>]*>/g, ' ');
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function cleanTitle(title: string): string {
  return collapseWhitespace(unescapeHtml(title.trim()));
}

export function cleanUrl(url: string | undefined | null): string {
  return url ? unescapeHtml(url.trim()) : '';
}

export function cleanDescription(description: string | undefined | null): string {
  if (!description) return '';
  return collapseWhitespace(unescapeHtml(stripTags(description)));
}
