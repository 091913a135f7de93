import fs from 'fs';
import path from 'path';
import { logger } from './logger';

interface CacheEntry<T> {
  timestamp: number;
  expiresAt: number;
  data: T;
}

function isCacheEntry(value: unknown): value is CacheEntry<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    'expiresAt' in value &&
    'data' in value &&
    typeof value.timestamp === 'number' &&
    typeof value.expiresAt === 'number'
  );
}

/**
 * File cache for scraped records, one JSON file per key. Entries carry their
 * own expiry so a changed CACHE_HOURS only affects new writes.
 */
export class Cache {
  constructor(
    private cacheHours: number,
    private cacheDir: string
  ) {}

  private getCachePath(key: string): string {
    const safeKey = key.replace(/[^a-z0-9_-]/gi, '_').toLowerCase();
    return path.join(this.cacheDir, `${safeKey}.json`);
  }

  get(key: string): unknown | null {
    const cachePath = this.getCachePath(key);

    if (!fs.existsSync(cachePath)) {
      logger.info(`[Cache] Miss: ${key}`);
      return null;
    }

    try {
      const entry: unknown = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
      if (!isCacheEntry(entry)) {
        logger.warn(`[Cache] Ignoring unreadable entry: ${key}`);
        return null;
      }

      if (Date.now() > entry.expiresAt) {
        logger.info(`[Cache] Expired: ${key}`);
        fs.unlinkSync(cachePath);
        return null;
      }

      const ageHours = ((Date.now() - entry.timestamp) / (1000 * 60 * 60)).toFixed(1);
      logger.success(`Cache hit: ${key} (${ageHours}h old)`);
      return entry.data;
    } catch (error) {
      logger.warn(`[Cache] Read error: ${key}`, error);
      return null;
    }
  }

  set<T>(key: string, data: T): void {
    if (this.cacheHours <= 0) return;

    fs.mkdirSync(this.cacheDir, { recursive: true });
    const entry: CacheEntry<T> = {
      timestamp: Date.now(),
      expiresAt: Date.now() + this.cacheHours * 60 * 60 * 1000,
      data,
    };

    fs.writeFileSync(this.getCachePath(key), JSON.stringify(entry, null, 2));
    logger.info(`[Cache] Saved: ${key} (expires in ${this.cacheHours}h)`);
  }

  clear(key: string): void {
    const cachePath = this.getCachePath(key);
    if (fs.existsSync(cachePath)) {
      fs.unlinkSync(cachePath);
      logger.info(`[Cache] Cleared: ${key}`);
    }
  }
}
