/**
 * Daily Digest Module
 *
 * Loads the article store and topic map, ranks the snapshot and writes the
 * digest document
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, extname, resolve } from 'path';
import { config, loadTopics } from '../config/index.js';
import { readArticles } from '../store/csv-store.js';
import { EmptyDigestError, errorMessage, isNotFoundError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { renderDigestHtml } from './html.js';
import { renderDigestText } from './text.js';
import type { DigestFormat, DigestResult } from '../types/index.js';

export interface DigestOptions {
  articlesFile?: string;
  topicsFile?: string;
  stylesheetFile?: string;
  outputFile?: string;
  format?: DigestFormat;
  origin?: string;
  timeZone?: string;
  topN?: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * ".txt" outputs are plain text, anything else is HTML
 */
export function inferFormat(outputFile: string): DigestFormat {
  return extname(outputFile).toLowerCase() === '.txt' ? 'text' : 'html';
}

/**
 * Read the stylesheet text; a missing file leaves the page unstyled
 */
export async function loadStylesheet(path: string, logger: Logger = defaultLogger): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      logger.warn({ path }, 'Stylesheet not found, rendering without styles');
      return '';
    }
    throw error;
  }
}

/**
 * Write the digest and return its absolute path
 */
export async function saveDigest(text: string, outputFile: string, logger: Logger = defaultLogger): Promise<string> {
  const outputPath = resolve(outputFile);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, text, 'utf-8');
  logger.info({ path: outputPath }, `Digest saved to ${outputPath}`);
  return outputPath;
}

/**
 * Generate and save the digest (convenience function)
 */
export async function runDigest(options: DigestOptions = {}): Promise<DigestResult> {
  const {
    articlesFile = config.store.articlesFile,
    topicsFile = config.digest.topicsFile,
    stylesheetFile = config.digest.stylesheetFile,
    outputFile = config.digest.outputFile,
    origin = config.source.origin,
    timeZone = config.digest.timeZone,
    topN = config.digest.topN,
    now = () => new Date(),
    logger = defaultLogger,
  } = options;
  const format = options.format ?? inferFormat(outputFile);

  logger.info({ articlesFile, topicsFile, format }, 'Started digest');

  try {
    const { articles } = await readArticles(articlesFile, { logger });
    const topics = await loadTopics(topicsFile, { logger });

    if (articles.length === 0 || topics.size === 0) {
      const reason = new EmptyDigestError(articles.length === 0 ? 'no-articles' : 'no-topics');
      logger.warn({ articles: articles.length, topics: topics.size }, 'No articles or topics to process.');
      return { success: false, error: reason.message };
    }

    const renderOptions = { origin, timeZone, topN, generatedAt: now() };
    const document =
      format === 'text'
        ? renderDigestText(articles, topics, renderOptions)
        : renderDigestHtml(articles, topics, {
            ...renderOptions,
            stylesheet: await loadStylesheet(stylesheetFile, logger),
          });

    const outputPath = await saveDigest(document, outputFile, logger);

    return { success: true, outputPath, articleCount: articles.length };
  } catch (error) {
    logger.error({ error }, 'Daily digest failed');
    return { success: false, error: errorMessage(error) };
  }
}

export { renderDigestHtml, escapeHtml } from './html.js';
export { renderDigestText } from './text.js';
export { buildDigestSections, titleCase, type DigestSections, type TopicSection } from './sections.js';
