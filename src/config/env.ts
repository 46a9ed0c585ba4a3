/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  // Source
  SOURCE_URL: z.string().url().default('https://www.reuters.com'),
  SITE_ORIGIN: z.string().url().default('https://www.reuters.com'),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Safari/537.36'
    ),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // Files
  ARTICLES_FILE: z.string().default('./data/articles.csv'),
  TOPICS_FILE: z.string().default('./topics.json'),
  STYLESHEET_FILE: z.string().default('./assets/digest.css'),
  DIGEST_OUTPUT: z.string().default('./daily_digest.html'),

  // Display
  DISPLAY_TIMEZONE: z.string().default('UTC'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FILE: z.string().default('./logs/app.log'),
  LOG_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),

  // Scheduling
  CRAWL_SCHEDULE: z.string().default('0 * * * *'),
  DIGEST_SCHEDULE: z.string().default('0 18 * * *'),
  SCHEDULE_TIMEZONE: z.string().default('UTC'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
