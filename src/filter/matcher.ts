/**
 * Keyword Matcher
 *
 * Case-insensitive substring matching of topic keywords against article
 * titles and summaries
 */

import type { Article } from '../types/index.js';

/**
 * Count non-overlapping, case-insensitive occurrences of a keyword.
 * No word boundaries: "oil" matches inside "turmoil".
 */
export function countOccurrences(text: string, keyword: string): number {
  const needle = keyword.toLowerCase();
  if (!needle || !text) {
    return 0;
  }

  const haystack = text.toLowerCase();
  let count = 0;
  let from = haystack.indexOf(needle);

  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }

  return count;
}

/**
 * Keyword hits in title plus keyword hits in summary, summed over keywords.
 * Each keyword is counted on its own, even where matches of two keywords overlap.
 */
export function keywordScore(article: Article, keywords: readonly string[]): number {
  let score = 0;

  for (const keyword of keywords) {
    score += countOccurrences(article.title, keyword);
    score += countOccurrences(article.summary, keyword);
  }

  return score;
}

export function matchesAnyKeyword(article: Article, keywords: readonly string[]): boolean {
  return keywords.some(
    (keyword) =>
      countOccurrences(article.title, keyword) > 0 || countOccurrences(article.summary, keyword) > 0
  );
}

/**
 * Articles mentioning at least one keyword, in their original order
 */
export function filterByKeywords<T extends Article>(articles: readonly T[], keywords: readonly string[]): T[] {
  return articles.filter((article) => matchesAnyKeyword(article, keywords));
}
