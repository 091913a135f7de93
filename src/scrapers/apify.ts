import axios from 'axios';
import type { Platform } from '../analysis/engine';
import { logger } from '../utils/logger';

const APIFY_BASE_URL = 'https://api.apify.com/v2/acts';

const ACTORS: Record<Platform, string> = {
  instagram: 'apify~instagram-reel-scraper',
  twitter: 'apidojo~tweet-scraper',
};

export class DataSourceError extends Error {
  constructor(
    public readonly competitorHandle: string,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DataSourceError';
  }
}

export interface ScrapeOptions {
  platform: Platform;
  apifyToken: string;
  limit: number;
  timeoutMs?: number;
}

function buildActorInput(platform: Platform, handle: string, limit: number): Record<string, unknown> {
  if (platform === 'twitter') {
    return { twitterHandles: [handle], maxItems: limit, sort: 'Latest' };
  }
  return { username: [handle], resultsLimit: limit };
}

/**
 * Run the platform's Apify actor synchronously and return its dataset items
 * untouched. Shape differences between actors are the normalizer's problem.
 */
export async function scrapeCompetitorPosts(handle: string, options: ScrapeOptions): Promise<unknown[]> {
  const actor = ACTORS[options.platform];
  logger.info(`[Apify] Scraping ${options.platform}: @${handle} (limit: ${options.limit})`);

  try {
    const response = await axios.post<unknown>(
      `${APIFY_BASE_URL}/${actor}/run-sync-get-dataset-items`,
      buildActorInput(options.platform, handle, options.limit),
      {
        params: { token: options.apifyToken },
        timeout: options.timeoutMs ?? 300000,
      }
    );

    if (!Array.isArray(response.data)) {
      throw new DataSourceError(handle, `Unexpected Apify response for @${handle}: expected an array of items`);
    }

    logger.success(`Scraped ${response.data.length} posts from @${handle}`);
    return response.data;
  } catch (error) {
    if (error instanceof DataSourceError) throw error;
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      throw new DataSourceError(
        handle,
        `Failed to scrape @${handle}: ${status ? `HTTP ${status}` : error.message}`,
        error
      );
    }
    throw error;
  }
}
