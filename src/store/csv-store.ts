/**
 * CSV Article Store
 *
 * Append-only file with the header written once. Rows are validated when
 * the store is read back, not when they are written.
 */

import { appendFile, mkdir, open, readFile, type FileHandle } from 'fs/promises';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { config } from '../config/index.js';
import { normalizeTimestamp } from '../scraper/timestamp.js';
import { StoreIOError, errorMessage, isNotFoundError } from '../utils/errors.js';
import { formatStoreTime } from '../utils/format.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { Article } from '../types/index.js';

export const STORE_COLUMNS = ['timestamp', 'formatted_time', 'title', 'url', 'summary'] as const;

const HEADER_TEXT = STORE_COLUMNS.join(',');

export interface StoreOptions {
  timeZone?: string;
  logger?: Logger;
}

export interface AppendResult {
  written: number;
  headerWritten: boolean;
}

export interface DroppedRow {
  record: number;
  reason: string;
}

export interface StoreSnapshot {
  articles: Article[];
  dropped: DroppedRow[];
}

const storedRowSchema = z.object({
  timestamp: z.string().transform((raw, ctx) => {
    const result = normalizeTimestamp(raw);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
      return z.NEVER;
    }
    return result.value;
  }),
  formatted_time: z.string().optional(),
  title: z.string().trim().min(1, 'title is empty'),
  url: z.string().trim().min(1, 'url is empty'),
  summary: z
    .string()
    .optional()
    .transform((value) => value?.trim() ?? ''),
});

const csvRecordsSchema = z.array(z.array(z.string()));

/**
 * Whether the first line of the file already carries the column header
 */
export async function hasHeader(path: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw new StoreIOError(`Cannot open store: ${errorMessage(error)}`, path, error);
  }

  try {
    const buffer = Buffer.alloc(1024);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
    const firstLine = buffer.toString('utf-8', 0, bytesRead).split(/\r?\n/)[0] ?? '';
    return firstLine.trim().toLowerCase().includes(HEADER_TEXT);
  } catch (error) {
    throw new StoreIOError(`Cannot read store header: ${errorMessage(error)}`, path, error);
  } finally {
    await handle.close();
  }
}

function toRow(article: Article, timeZone: string): string[] {
  return [
    article.timestamp.toISOString(),
    formatStoreTime(article.timestamp, timeZone),
    article.title,
    article.url,
    article.summary,
  ];
}

/**
 * Append articles, writing the header first when the file lacks one.
 * Header and rows go out in one write.
 */
export async function appendArticles(
  path: string,
  articles: readonly Article[],
  options: StoreOptions = {}
): Promise<AppendResult> {
  const { timeZone = config.digest.timeZone, logger = defaultLogger } = options;

  const headerWritten = !(await hasHeader(path));
  const rows: string[][] = [];

  if (headerWritten) {
    rows.push([...STORE_COLUMNS]);
  }
  for (const article of articles) {
    rows.push(toRow(article, timeZone));
  }

  if (rows.length === 0) {
    return { written: 0, headerWritten: false };
  }

  try {
    await mkdir(dirname(path), { recursive: true });
    await appendFile(path, stringify(rows), 'utf-8');
  } catch (error) {
    logger.error({ error, path, rows: articles.length }, 'Error writing to CSV');
    throw new StoreIOError(`Error writing to CSV: ${errorMessage(error)}`, path, error);
  }

  logger.info({ path, written: articles.length, headerWritten }, 'Articles appended to store');

  return { written: articles.length, headerWritten };
}

function isHeaderRow(row: readonly string[]): boolean {
  return row[0]?.trim().toLowerCase() === STORE_COLUMNS[0];
}

/**
 * Read every stored article. Rows whose timestamp (or title/url) does not
 * validate are dropped and reported. A missing file reads as empty.
 */
export async function readArticles(path: string, options: StoreOptions = {}): Promise<StoreSnapshot> {
  const { logger = defaultLogger } = options;

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      logger.warn({ path }, 'Article store not found');
      return { articles: [], dropped: [] };
    }
    throw new StoreIOError(`Cannot read store: ${errorMessage(error)}`, path, error);
  }

  let records: string[][];
  try {
    const parsed: unknown = parse(content, {
      relax_column_count: true,
      skip_empty_lines: true,
    });
    records = csvRecordsSchema.parse(parsed);
  } catch (error) {
    throw new StoreIOError(`Malformed CSV: ${errorMessage(error)}`, path, error);
  }

  const articles: Article[] = [];
  const dropped: DroppedRow[] = [];

  records.forEach((row, index) => {
    if (isHeaderRow(row)) {
      return;
    }

    const result = storedRowSchema.safeParse(
      Object.fromEntries(STORE_COLUMNS.map((column, i) => [column, row[i]]))
    );

    if (!result.success) {
      const reason = result.error.issues.map((issue) => issue.message).join('; ');
      dropped.push({ record: index + 1, reason });
      return;
    }

    const { timestamp, title, url, summary } = result.data;
    articles.push({ timestamp, title, url, summary });
  });

  if (dropped.length > 0) {
    logger.warn({ path, dropped: dropped.length }, 'Dropped store rows with invalid data');
  }
  logger.info({ path, articles: articles.length }, 'Article store loaded');

  return { articles, dropped };
}
