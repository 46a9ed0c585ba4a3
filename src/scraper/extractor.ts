/**
 * Story Card Extractor
 *
 * Turns the source front page markup into article records
 */

import * as cheerio from 'cheerio';
import { config } from '../config/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { normalizeTimestamp } from './timestamp.js';
import type { Article, ExtractionDiagnostic, ExtractionResult } from '../types/index.js';

/**
 * Selectors for the story card convention used by the source page
 */
export const STORY_CARD_SELECTORS = {
  card: 'li[class*="story-card"]',
  title: 'span[data-testid="TitleHeading"]',
  link: 'a[data-testid="TitleLink"]',
  time: 'time',
  summary: 'p[data-testid="Description"]',
} as const;

export interface ExtractOptions {
  origin?: string;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Prefix site-relative links with the origin, leave everything else as is
 */
export function resolveArticleUrl(href: string, origin: string = config.source.origin): string {
  return href.startsWith('/') ? `${origin.replace(/\/+$/, '')}${href}` : href;
}

/**
 * Extract every well-formed story card, in document order.
 * Malformed cards are reported in `skipped` instead of raising.
 */
export function extractArticles(markup: string, options: ExtractOptions = {}): ExtractionResult {
  const {
    origin = config.source.origin,
    now = () => new Date(),
    logger = defaultLogger,
  } = options;

  const $ = cheerio.load(markup);
  const articles: Article[] = [];
  const skipped: ExtractionDiagnostic[] = [];

  $(STORY_CARD_SELECTORS.card).each((cardIndex, element) => {
    const card = $(element);
    const titleEl = card.find(STORY_CARD_SELECTORS.title).first();
    const linkEl = card.find(STORY_CARD_SELECTORS.link).first();

    const title = titleEl.text().trim();
    if (!title) {
      skipped.push({ cardIndex, reason: 'missing-title' });
      return;
    }

    const href = linkEl.attr('href')?.trim();
    if (!href) {
      skipped.push({ cardIndex, reason: 'missing-link', detail: title });
      return;
    }

    let timestamp: Date;
    const datetime = card.find(STORY_CARD_SELECTORS.time).first().attr('datetime');

    if (datetime) {
      const parsed = normalizeTimestamp(datetime);
      if (!parsed.ok) {
        logger.warn({ cardIndex, datetime, title: title.slice(0, 80) }, 'Could not parse timestamp, skipping card');
        skipped.push({ cardIndex, reason: 'invalid-timestamp', detail: datetime });
        return;
      }
      timestamp = parsed.value;
    } else {
      // No timestamp on the card: stamped with the crawl time
      timestamp = now();
    }

    const summaryEl = card.find(STORY_CARD_SELECTORS.summary).first();

    articles.push({
      timestamp,
      title,
      url: resolveArticleUrl(href, origin),
      summary: summaryEl.length > 0 ? summaryEl.text().trim() : '',
    });
  });

  logger.debug(
    { extracted: articles.length, skipped: skipped.length },
    'Story cards extracted'
  );

  return { articles, skipped };
}
