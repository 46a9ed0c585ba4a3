/**
 * Scraper Module
 *
 * Fetches the source front page and turns its story cards into articles
 */

export { fetchPage, type FetchOptions } from './fetcher.js';

export {
  extractArticles,
  resolveArticleUrl,
  STORY_CARD_SELECTORS,
  type ExtractOptions,
} from './extractor.js';

export {
  normalizeTimestamp,
  padFractionalSeconds,
  parseTimestamp,
  type TimestampResult,
} from './timestamp.js';
