/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'newswire-digest',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  source: {
    url: env.SOURCE_URL,
    origin: env.SITE_ORIGIN,
    userAgent: env.USER_AGENT,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
  },

  store: {
    articlesFile: env.ARTICLES_FILE,
  },

  digest: {
    topicsFile: env.TOPICS_FILE,
    stylesheetFile: env.STYLESHEET_FILE,
    outputFile: env.DIGEST_OUTPUT,
    timeZone: env.DISPLAY_TIMEZONE,
    topN: 3,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
    maxBytes: env.LOG_MAX_BYTES,
  },

  scheduler: {
    crawlExpression: env.CRAWL_SCHEDULE,
    digestExpression: env.DIGEST_SCHEDULE,
    timezone: env.SCHEDULE_TIMEZONE,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { loadTopics } from './topics.js';
