/**
 * Plain-text digest renderer
 */

import { config } from '../config/index.js';
import { resolveArticleUrl } from '../scraper/extractor.js';
import { formatLongDate, formatTimeLabel } from '../utils/format.js';
import { buildDigestSections, type RenderOptions } from './sections.js';
import type { Article, TopicMap } from '../types/index.js';

function renderEntry(article: Article, origin: string, timeZone: string): string[] {
  const lines = [
    `- [${formatTimeLabel(article.timestamp, timeZone)}] ${article.title.trim()}`,
    `  ${resolveArticleUrl(article.url.trim(), origin)}`,
  ];
  const summary = article.summary.trim();
  if (summary) {
    lines.push(`  ${summary}`);
  }
  return lines;
}

export function renderDigestText(
  articles: readonly Article[],
  topics: TopicMap,
  options: RenderOptions = {}
): string {
  const {
    origin = config.source.origin,
    timeZone = config.digest.timeZone,
    generatedAt = new Date(),
    topN = config.digest.topN,
  } = options;

  const sections = buildDigestSections(articles, topics, topN);
  const blocks: string[][] = [[`Daily News Digest — ${formatLongDate(generatedAt, timeZone)}`]];

  if (sections.latest.length > 0) {
    blocks.push([
      `Top ${topN} Trending Articles`,
      ...sections.latest.flatMap((article) => renderEntry(article, origin, timeZone)),
    ]);
  }

  if (sections.hottest.length > 0) {
    blocks.push([
      `Top ${topN} Trending Articles (By Hotness Score)`,
      ...sections.hottest.flatMap((article) => renderEntry(article, origin, timeZone)),
    ]);
  }

  for (const section of sections.topics) {
    blocks.push([section.label, ...section.articles.flatMap((article) => renderEntry(article, origin, timeZone))]);
  }

  return `${blocks.map((block) => block.join('\n')).join('\n\n')}\n`;
}
