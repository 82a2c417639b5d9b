/**
 * Keyword rule tables
 *
 * Classification throughout the planner is substring membership against ordered
 * (category -> keywords) tables. Matching is case-insensitive.
 */

export interface KeywordRule<C extends string> {
  category: C;
  keywords: readonly string[];
}

export type KeywordRuleTable<C extends string> = readonly KeywordRule<C>[];

/**
 * True when the text contains any of the keywords
 */
export function containsAny(text: string, keywords: readonly string[]): boolean {
  const haystack = text.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

/**
 * Every category whose keywords appear in the text, in table order
 */
export function matchAll<C extends string>(text: string, table: KeywordRuleTable<C>): C[] {
  return table.filter((rule) => containsAny(text, rule.keywords)).map((rule) => rule.category);
}

/**
 * First category whose keywords appear in the text, or the fallback
 */
export function matchFirst<C extends string, F extends string = C>(
  text: string,
  table: KeywordRuleTable<C>,
  fallback: F
): C | F {
  const rule = table.find((candidate) => containsAny(text, candidate.keywords));
  return rule ? rule.category : fallback;
}

/**
 * Look up a value keyed by a substring of the text (e.g. industry names)
 */
export function lookupBySubstring<V>(
  text: string,
  entries: readonly (readonly [string, V])[]
): V | undefined {
  const haystack = text.toLowerCase();
  const entry = entries.find(([key]) => haystack.includes(key.toLowerCase()));
  return entry?.[1];
}

/**
 * Count how many of the keywords appear in the text
 */
export function countMatches(text: string, keywords: readonly string[]): number {
  const haystack = text.toLowerCase();
  return keywords.filter((keyword) => haystack.includes(keyword.toLowerCase())).length;
}
