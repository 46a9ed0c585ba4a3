/**
 * HTML digest renderer
 */

import { config } from '../config/index.js';
import { resolveArticleUrl } from '../scraper/extractor.js';
import { formatLongDate, formatTimeLabel } from '../utils/format.js';
import { buildDigestSections, type RenderOptions } from './sections.js';
import type { Article, TopicMap } from '../types/index.js';

export interface HtmlRenderOptions extends RenderOptions {
  stylesheet?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function renderEntry(article: Article, origin: string, timeZone: string): string[] {
  const time = formatTimeLabel(article.timestamp, timeZone);
  const title = escapeHtml(article.title.trim());
  const url = escapeHtml(resolveArticleUrl(article.url.trim(), origin));
  const summary = escapeHtml(article.summary.trim());

  const lines = [
    `<li><p class='time'>[${time}]</p> <a href='${url}' target='_blank' rel='noopener noreferrer'>${title}</a>`,
  ];
  if (summary) {
    lines.push(`<p class='summary'>${summary}</p>`);
  }
  lines.push('</li>');

  return lines;
}

function renderList(articles: readonly Article[], origin: string, timeZone: string, attrs = ''): string[] {
  return [`<ul${attrs}>`, ...articles.flatMap((article) => renderEntry(article, origin, timeZone)), '</ul>'];
}

/**
 * Render the digest as a standalone HTML page. The stylesheet text is
 * embedded verbatim.
 */
export function renderDigestHtml(
  articles: readonly Article[],
  topics: TopicMap,
  options: HtmlRenderOptions = {}
): string {
  const {
    origin = config.source.origin,
    timeZone = config.digest.timeZone,
    generatedAt = new Date(),
    topN = config.digest.topN,
    stylesheet = '',
  } = options;

  const sections = buildDigestSections(articles, topics, topN);
  const today = formatLongDate(generatedAt, timeZone);

  const lines = [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    "<meta charset='UTF-8'>",
    `<title>Daily News Digest — ${today}</title>`,
    '<style>',
    stylesheet,
    '</style>',
    '</head>',
    '<body>',
    `<h1>📊 Daily News Digest — ${today}</h1>`,
  ];

  if (sections.latest.length > 0) {
    lines.push(`<h2>🔥 Top ${topN} Trending Articles</h2>`);
    lines.push(...renderList(sections.latest, origin, timeZone));
  }

  if (sections.hottest.length > 0) {
    lines.push(`<h2>🔥 Top ${topN} Trending Articles (By Hotness Score)</h2>`);
    lines.push(...renderList(sections.hottest, origin, timeZone));
  }

  for (const section of sections.topics) {
    lines.push('<details>');
    lines.push(`<summary>${escapeHtml(section.label)}</summary>`);
    lines.push(...renderList(section.articles, origin, timeZone, " style='margin-top: 10px;'"));
    lines.push('</details>');
  }

  lines.push('</body>', '</html>');

  return lines.join('\n');
}
