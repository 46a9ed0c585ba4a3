/**
 * Source page fetcher
 *
 * One GET per crawl, no retries
 */

import axios, { type AxiosResponse } from 'axios';
import { config } from '../config/index.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface FetchOptions {
  timeoutMs?: number;
  userAgent?: string;
}

function browserHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept-Encoding': 'gzip, deflate, br',
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    Connection: 'keep-alive',
  };
}

/**
 * Fetch the page body, failing with FetchError on transport errors or any
 * status other than 200
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<string> {
  const { timeoutMs = config.source.timeoutMs, userAgent = config.source.userAgent } = options;

  logger.info({ url, timeoutMs }, 'Fetching source page');

  let response: AxiosResponse<string>;
  try {
    response = await axios.get<string>(url, {
      headers: browserHeaders(userAgent),
      timeout: timeoutMs,
      responseType: 'text',
      validateStatus: () => true,
    });
  } catch (error) {
    throw new FetchError(`Request error: ${errorMessage(error)}`, url, { cause: error });
  }

  if (response.status !== 200) {
    throw new FetchError(`Failed to fetch URL: ${url} | Status code: ${response.status}`, url, {
      status: response.status,
    });
  }

  logger.debug({ url, bytes: response.data.length }, 'Source page fetched');

  return response.data;
}
