/**
 * Digest sections shared by the HTML and text renderers
 */

import { filterByKeywords } from '../filter/index.js';
import { collectKeywords, rankByHotness, rankByRecency } from '../ranking/index.js';
import { EmptyDigestError } from '../utils/errors.js';
import type { Article, RankedArticle, TopicMap } from '../types/index.js';

export interface TopicSection {
  topic: string;
  label: string;
  articles: Article[];
}

export interface DigestSections {
  latest: Article[];
  hottest: RankedArticle[];
  topics: TopicSection[];
}

export interface RenderOptions {
  origin?: string;
  timeZone?: string;
  generatedAt?: Date;
  topN?: number;
}

/**
 * Capitalize the first letter of every word and lower-case the rest
 */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

export function topicLabel(topic: string, count: number): string {
  return `${titleCase(topic)} (${count} article${count !== 1 ? 's' : ''})`;
}

/**
 * Rank and group a snapshot of articles. Throws EmptyDigestError when there
 * is nothing to rank or nothing to group by.
 */
export function buildDigestSections(
  articles: readonly Article[],
  topics: TopicMap,
  topN: number
): DigestSections {
  if (articles.length === 0) {
    throw new EmptyDigestError('no-articles');
  }
  if (topics.size === 0) {
    throw new EmptyDigestError('no-topics');
  }

  const sections: TopicSection[] = [];
  for (const [topic, keywords] of topics) {
    const matches = filterByKeywords(articles, keywords);
    if (matches.length > 0) {
      sections.push({ topic, label: topicLabel(topic, matches.length), articles: matches });
    }
  }

  return {
    latest: rankByRecency(articles, topN),
    hottest: rankByHotness(articles, collectKeywords(topics), topN),
    topics: sections,
  };
}
