/**
 * Crawl Pipeline
 *
 * 1. Fetch the source front page
 * 2. Extract story cards
 * 3. Append the articles to the CSV store
 */

import { config } from './config/index.js';
import { fetchPage, extractArticles } from './scraper/index.js';
import { appendArticles } from './store/csv-store.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';
import type { CrawlResult } from './types/index.js';

/**
 * Pipeline options
 */
export interface CrawlOptions {
  sourceUrl?: string;
  articlesFile?: string;
  origin?: string;
  dryRun?: boolean;
  fetcher?: (url: string) => Promise<string>;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Run one crawl. A fetch failure aborts before anything is written.
 */
export async function runCrawl(options: CrawlOptions = {}): Promise<CrawlResult> {
  const {
    sourceUrl = config.source.url,
    articlesFile = config.store.articlesFile,
    origin = config.source.origin,
    dryRun = false,
    fetcher = fetchPage,
    now,
    logger = defaultLogger,
  } = options;

  const startTime = Date.now();

  logger.info({ sourceUrl, articlesFile, dryRun }, 'Started crawler');

  const html = await fetcher(sourceUrl);
  const { articles, skipped } = extractArticles(html, { origin, now, logger });

  logger.info({ found: articles.length, skipped: skipped.length }, `Found ${articles.length} articles.`);
  for (const article of articles) {
    logger.debug({ timestamp: article.timestamp.toISOString(), title: article.title }, 'Article found');
  }
  for (const diagnostic of skipped) {
    logger.debug({ ...diagnostic }, 'Story card skipped');
  }

  let saved = 0;
  if (!dryRun) {
    const result = await appendArticles(articlesFile, articles, { logger });
    saved = result.written;
  }

  const crawlResult: CrawlResult = {
    found: articles.length,
    saved,
    skipped: skipped.length,
    durationMs: Date.now() - startTime,
  };

  logger.info(crawlResult, 'Crawl completed');

  return crawlResult;
}
