/**
 * HTTP helpers shared by the feed and listing parsers
 */

import pRetry from 'p-retry';
import { logger } from './logger';

export const USER_AGENT = 'Mozilla/5.0 (compatible; NewsdeskBot/1.0; feed aggregator)';

export interface FetchOptions {
  timeoutMs: number;
  retries: number;
  accept?: string;
}

export const DEFAULT_FETCH_OPTIONS: FetchOptions = {
  timeoutMs: 15000,
  retries: 2
};

export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}: ${statusText} (${url})`);
    this.name = 'HttpError';
  }
}

async function fetchOnce(url: string, options: FetchOptions): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': options.accept ?? 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'vi-VN,vi;q=0.9,en-US;q=0.8,en;q=0.5'
      }
    });

    if (!response) {
      throw new Error('No response from fetch');
    }

    if (!response.ok) {
      const error = new HttpError(url, response.status, response.statusText);
      // Client errors will not change on retry
      if (response.status >= 400 && response.status < 500 && response.status !== 429) {
        throw new pRetry.AbortError(error);
      }
      throw error;
    }

    return await response.text();
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * GET a URL as text with a per-request deadline and bounded retries.
 * @throws HttpError for non-2xx responses once retries are exhausted
 */
export async function fetchText(url: string, options: FetchOptions = DEFAULT_FETCH_OPTIONS): Promise<string> {
  return pRetry(() => fetchOnce(url, options), {
    retries: options.retries,
    factor: 2,
    minTimeout: 500,
    maxTimeout: 4000,
    onFailedAttempt: error => {
      if (error.retriesLeft > 0) {
        logger.debug(`Retrying ${url}`, { attempt: error.attemptNumber, reason: error.message });
      }
    }
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
