import { HASHTAG_POOLS } from './pools';

const WORD_PATTERN = /\b[a-z]{3,}\b/g;
const MIN_KEYWORD_LENGTH = 4;
const MAX_KEYWORDS = 15;

/**
 * Most frequent content words across the texts, ties in first-seen order
 */
export function extractContentKeywords(
  texts: readonly string[],
  stopWords: readonly string[] = HASHTAG_POOLS.stopWords
): string[] {
  const stop = new Set(stopWords);
  const words = texts.join(' ').toLowerCase().match(WORD_PATTERN) ?? [];
  const frequency = new Map<string, number>();

  for (const word of words) {
    if (stop.has(word) || word.length < MIN_KEYWORD_LENGTH) continue;
    frequency.set(word, (frequency.get(word) ?? 0) + 1);
  }

  return [...frequency.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_KEYWORDS)
    .map(([word]) => word);
}

export function cleanTag(tag: string): string {
  return tag.replaceAll('#', '').toLowerCase();
}

/**
 * One point per keyword contained in the tag, or containing it; a bare `#` scores 0
 */
export function scoreHashtag(tag: string, keywords: readonly string[]): number {
  const clean = cleanTag(tag).trim();
  if (clean.length === 0) return 0;
  return keywords.filter((keyword) => clean.includes(keyword) || keyword.includes(clean)).length;
}

export function toHashtag(value: string): string {
  const trimmed = value.trim().replace(/\s+/g, '');
  return trimmed.startsWith('#') ? trimmed : `#${trimmed}`;
}

/**
 * Drop case-insensitive repeats, keeping the first occurrence
 */
export function dedupeTags<T>(items: readonly T[], tagOf: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const key = tagOf(item).toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
