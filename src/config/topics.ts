/**
 * Topic keywords configuration
 *
 * A JSON object mapping each topic to its keywords, e.g.
 *   { "energy": ["oil", "opec"], "markets": ["stocks", "bond"] }
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage, isNotFoundError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { TopicMap } from '../types/index.js';

const topicsSchema = z.record(z.string(), z.array(z.string()));

/**
 * Load the topic map in declaration order. A missing file yields an empty map.
 */
export async function loadTopics(
  path: string,
  options: { logger?: Logger } = {}
): Promise<TopicMap> {
  const { logger = defaultLogger } = options;

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      logger.warn({ path }, 'Topic file not found');
      return new Map();
    }
    throw new ConfigError(`Cannot read topic file: ${errorMessage(error)}`, path, error);
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Topic file is not valid JSON: ${errorMessage(error)}`, path, error);
  }

  const result = topicsSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(
      `Topic file must map topic names to keyword lists:\n${JSON.stringify(result.error.format(), null, 2)}`,
      path
    );
  }

  const topics = new Map(Object.entries(result.data));
  logger.debug({ path, topics: topics.size }, 'Topics loaded');

  return topics;
}
