#!/usr/bin/env node
/**
 * Newswire Digest
 *
 * Harvests story cards from a news front page into a CSV store and renders a
 * ranked daily digest.
 *
 * Usage:
 *   node dist/index.js --crawl                      - Crawl the source page once
 *   node dist/index.js --digest [--text] [--out f]  - Render the digest once
 *   node dist/index.js --service                    - Run crawls and digests on cron schedules
 *   node dist/index.js                              - Default: service mode
 */

import { config } from './config/index.js';
import { runDigest } from './digest/index.js';
import { runCrawl } from './pipeline.js';
import { startScheduler, stopScheduler } from './scheduler.js';
import { logger } from './utils/logger.js';
import type { DigestFormat } from './types/index.js';

// Parse command line arguments
const args = process.argv.slice(2);
const isCrawl = args.includes('--crawl');
const isDigest = args.includes('--digest');
const isService = args.includes('--service') || (!isCrawl && !isDigest);
const outIndex = args.indexOf('--out');
const outputFile = outIndex !== -1 ? args[outIndex + 1] : undefined;
const format: DigestFormat | undefined = args.includes('--text') ? 'text' : undefined;

async function main(): Promise<void> {
  logger.info(
    { env: config.app.env, mode: isService ? 'service' : [isCrawl && 'crawl', isDigest && 'digest'].filter(Boolean) },
    'Starting application'
  );

  if (isCrawl) {
    const result = await runCrawl();
    logger.info(`Articles saved to CSV: ${result.saved} (${result.skipped} cards skipped)`);
  }

  if (isDigest) {
    const result = await runDigest({
      outputFile: outputFile ?? (format === 'text' ? 'daily_digest.txt' : config.digest.outputFile),
      format,
    });
    if (!result.success) {
      logger.warn({ reason: result.error }, 'Digest not generated');
      process.exitCode = 1;
    }
  }

  if (isService) {
    const shutdown = (): void => {
      logger.info('Shutting down...');
      stopScheduler();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    startScheduler();
    logger.info('Scheduler running. Press Ctrl+C to stop.');
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
