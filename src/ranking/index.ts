/**
 * Ranking
 *
 * Recency ordering and the "hotness" trending score:
 *   hotness = recencyScore * keywordScore
 * where recencyScore is the timestamp scaled linearly between the oldest
 * (0.0) and newest (1.0) article of the batch. A raw hit count multiplies the
 * recency, so an older article with many keyword hits can beat a newer one
 * with few.
 */

import { keywordScore } from '../filter/index.js';
import type { Article, RankedArticle, TopicMap } from '../types/index.js';

/**
 * Linear recency of each article, same order as the input
 */
export function recencyScores(articles: readonly Article[]): number[] {
  if (articles.length === 0) {
    return [];
  }

  const times = articles.map((article) => article.timestamp.getTime());
  const earliest = times.reduce((min, time) => Math.min(min, time));
  const latest = times.reduce((max, time) => Math.max(max, time));
  const totalSpan = latest - earliest;

  return times.map((time) => (totalSpan === 0 ? 1.0 : (time - earliest) / totalSpan));
}

export function scoreArticles<T extends Article>(
  articles: readonly T[],
  keywords: readonly string[]
): Array<T & RankedArticle> {
  const recency = recencyScores(articles);

  return articles.map((article, index) => {
    const recencyScore = recency[index] ?? 0;
    const hits = keywordScore(article, keywords);

    return {
      ...article,
      recencyScore,
      keywordScore: hits,
      hotness: recencyScore * hits,
    };
  });
}

/**
 * Newest first, at most n. Equal timestamps keep their input order.
 */
export function rankByRecency<T extends Article>(articles: readonly T[], n: number): T[] {
  return [...articles]
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
    .slice(0, Math.max(0, n));
}

/**
 * Hottest first, at most n. Zero-hotness articles are dropped and ties keep
 * their input order.
 */
export function rankByHotness<T extends Article>(
  articles: readonly T[],
  keywords: readonly string[],
  n: number
): Array<T & RankedArticle> {
  if (articles.length === 0) {
    return [];
  }

  return scoreArticles(articles, keywords)
    .filter((article) => article.hotness > 0)
    .sort((a, b) => b.hotness - a.hotness)
    .slice(0, Math.max(0, n));
}

/**
 * Every topic's keywords, in topic order
 */
export function collectKeywords(topics: TopicMap): string[] {
  return [...topics.values()].flat();
}
