/**
 * Core types for the news harvester and digest
 */

export interface Article {
  timestamp: Date;
  title: string;
  url: string;
  summary: string;
}

export interface RankedArticle extends Article {
  recencyScore: number;
  keywordScore: number;
  hotness: number;
}

/**
 * Topic name -> keywords, in the order they were declared
 */
export type TopicMap = ReadonlyMap<string, readonly string[]>;

export type SkipReason = 'missing-title' | 'missing-link' | 'invalid-timestamp';

export interface ExtractionDiagnostic {
  cardIndex: number;
  reason: SkipReason;
  detail?: string;
}

export interface ExtractionResult {
  articles: Article[];
  skipped: ExtractionDiagnostic[];
}

export interface CrawlResult {
  found: number;
  saved: number;
  skipped: number;
  durationMs: number;
}

export type DigestFormat = 'html' | 'text';

export interface DigestResult {
  success: boolean;
  outputPath?: string;
  articleCount?: number;
  error?: string;
}
