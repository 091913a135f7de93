import type { Platform } from '../analysis/engine';
import { requireCredential } from '../config';
import { Cache } from '../utils/cache';
import { logger as defaultLogger, type Logger } from '../utils/logger';
import { RateLimiter } from '../utils/rateLimiter';
import { DataSourceError, scrapeCompetitorPosts } from './apify';

export interface CollectOptions {
  platform: Platform;
  apifyToken: string | undefined;
  reelsPerCompetitor: number;
  cache: Cache;
  rateLimiter: RateLimiter;
  refresh?: boolean;
  logger?: Logger;
}

function isPostsByCompetitor(value: unknown): value is Record<string, unknown[]> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((records) => Array.isArray(records))
  );
}

export function competitorCacheKey(platform: Platform, reelsPerCompetitor: number, competitors: readonly string[]): string {
  return `${platform}_${reelsPerCompetitor}_${competitors.join('_')}`;
}

/**
 * Raw posts per competitor, from cache when fresh. A failed scrape leaves
 * that competitor empty for this run, and a run with any failure is not
 * cached so the next run tries again.
 */
export async function collectCompetitorPosts(
  competitors: readonly string[],
  options: CollectOptions
): Promise<Record<string, unknown[]>> {
  const log = options.logger ?? defaultLogger;
  const cacheKey = competitorCacheKey(options.platform, options.reelsPerCompetitor, competitors);
  if (options.refresh) options.cache.clear(cacheKey);

  const cached = options.cache.get(cacheKey);
  if (isPostsByCompetitor(cached)) {
    log.info('Using cached competitor data');
    return cached;
  }

  const apifyToken = requireCredential(options.apifyToken, 'APIFY_TOKEN');
  const postsByCompetitor: Record<string, unknown[]> = {};
  const failed: string[] = [];

  for (const handle of competitors) {
    await options.rateLimiter.wait();
    try {
      postsByCompetitor[handle] = await scrapeCompetitorPosts(handle, {
        platform: options.platform,
        apifyToken,
        // over-fetch so ranking has something to choose from
        limit: options.reelsPerCompetitor * 2,
      });
    } catch (error) {
      if (!(error instanceof DataSourceError)) throw error;
      log.error(`[Apify] ${error.message}`);
      postsByCompetitor[handle] = [];
      failed.push(handle);
    }
  }

  if (failed.length > 0) {
    log.warn(`[Cache] Not caching this run: scraping failed for ${failed.map((handle) => `@${handle}`).join(', ')}`);
  } else {
    options.cache.set(cacheKey, postsByCompetitor);
  }
  return postsByCompetitor;
}
