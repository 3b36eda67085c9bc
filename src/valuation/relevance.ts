import { tokenize } from './text.js';

// Words too common to say anything about which item a title is for
export const QUERY_STOPWORDS: ReadonlySet<string> = new Set([
  'for',
  'the',
  'a',
  'an',
  'and',
  'or',
  'new',
  'brand',
]);

export function importantTokens(query: string): string[] {
  return tokenize(query).filter((t) => !QUERY_STOPWORDS.has(t));
}

/**
 * Exact-model match: every important query token must appear as a whole
 * token of the title. "iphone 11" needs both "iphone" and "11".
 */
export function titleMatches(title: string, query: string): boolean {
  const titleTokens = new Set(tokenize(title));
  const required = importantTokens(query);
  if (required.length === 0) return true;
  return required.every((t) => titleTokens.has(t));
}
