/**
 * Post Record Normalizer
 *
 * Single boundary between scraper output (Instagram reels, tweets, CSV
 * uploads...) and the typed engine. Field names vary per source, so each
 * canonical field is looked up through a list of known aliases.
 */

import type { MalformedRecord } from './errors';
import type { PostRecord, PostTimestamp } from './types';

export interface NormalizationResult {
  records: readonly PostRecord[];
  skipped: number;
  issues: readonly MalformedRecord[];
}

type RawRecord = Record<string, unknown>;

const FIELD_ALIASES = {
  id: ['id', 'shortcode', 'shortCode', 'code', 'postId', 'externalId', 'pk'],
  caption: ['caption_text', 'captionText', 'caption', 'text', 'full_text', 'fullText', 'description'],
  hashtags: ['hashtags', 'hashTags', 'tags'],
  postedAt: ['posted_at', 'postedAt', 'timestamp', 'taken_at', 'takenAt', 'created_at', 'createdAt', 'date'],
  duration: ['duration_seconds', 'durationSeconds', 'duration', 'videoDuration', 'video_duration'],
  likes: ['like_count', 'likeCount', 'likes', 'likesCount', 'favorite_count', 'favoriteCount'],
  comments: ['comment_count', 'commentCount', 'comments', 'commentsCount', 'replies', 'replyCount', 'reply_count'],
  shares: ['share_count', 'shareCount', 'shares', 'sharesCount', 'retweets', 'retweetCount', 'retweet_count'],
  views: [
    'view_count',
    'viewCount',
    'views',
    'viewsCount',
    'videoViewCount',
    'videoPlayCount',
    'playsCount',
    'plays',
    'impressions',
  ],
  url: ['url', 'permalink', 'link'],
} as const;

const MAGNITUDE_SUFFIX: Record<string, number> = { k: 1e3, m: 1e6, b: 1e9 };
const ISO_OFFSET_PATTERN = /(Z|[+-]\d{2}:?\d{2})$/i;
const LEGACY_DATE_OFFSET = /\s([+-]\d{4})\s+\d{4}$/;
const HASHTAG_IN_TEXT = /#[\p{L}\p{N}_]+/gu;

function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First alias whose value coerces to something usable. A present but
 * unusable value (an array of comment objects, "unknown" as a date) does not
 * hide a later alias.
 */
function pick<T>(record: RawRecord, aliases: readonly string[], coerce: (value: unknown) => T | null): T | null {
  for (const key of aliases) {
    const value = record[key];
    if (value === undefined || value === null) continue;
    const coerced = coerce(value);
    if (coerced !== null) return coerced;
  }
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Coerce a scraped counter to a non-negative number. Accepts "1,234" and
 * abbreviated "1.2K" / "3M" strings; everything unusable becomes 0.
 */
export function coerceCount(value: unknown): number {
  return parseCount(value) ?? 0;
}

function parseCount(value: unknown): number | null {
  let numeric: number;

  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string') {
    const match = value.trim().replace(/,/g, '').match(/^(-?\d+(?:\.\d+)?)\s*([kmb])?$/i);
    if (!match) return null;
    const multiplier = match[2] ? MAGNITUDE_SUFFIX[match[2].toLowerCase()] : 1;
    numeric = parseFloat(match[1]) * multiplier;
  } else {
    return null;
  }

  if (!Number.isFinite(numeric) || numeric < 0) return null;
  return Math.floor(numeric);
}

function coerceDuration(value: unknown): number | null {
  const numeric = typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
  if (!Number.isFinite(numeric) || numeric < 0) return null;
  return numeric;
}

function parseOffsetMinutes(designator: string): number {
  if (designator.toUpperCase() === 'Z') return 0;
  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = parseInt(digits.slice(2, 4), 10);
  return sign * (hours * 60 + minutes);
}

function fromEpochMs(epochMs: number): PostTimestamp | null {
  if (!Number.isFinite(epochMs)) return null;
  const date = new Date(epochMs);
  if (Number.isNaN(date.getTime())) return null;
  return { epochMs, utcOffsetMinutes: 0, iso: date.toISOString() };
}

/**
 * Parse a timestamp while keeping the offset it was written with. Strings
 * without an offset are read as UTC rather than host-local time.
 */
export function parseTimestamp(value: unknown): PostTimestamp | null {
  if (value instanceof Date) {
    return fromEpochMs(value.getTime());
  }

  if (typeof value === 'number') {
    return fromEpochMs(value < 1e12 ? value * 1000 : value);
  }

  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (!text) return null;

  if (/^\d+$/.test(text)) {
    return parseTimestamp(Number(text));
  }

  // Twitter's created_at: "Tue Mar 04 14:20:00 +0000 2025"
  const legacyOffset = text.match(LEGACY_DATE_OFFSET);
  if (legacyOffset) {
    const epochMs = Date.parse(text);
    if (Number.isNaN(epochMs)) return null;
    return { epochMs, utcOffsetMinutes: parseOffsetMinutes(legacyOffset[1]), iso: text };
  }

  const offsetMatch = text.match(ISO_OFFSET_PATTERN);
  const hasTime = /\d{2}:\d{2}/.test(text);
  const epochMs = Date.parse(offsetMatch ? text : hasTime ? `${text}Z` : `${text}T00:00:00Z`);
  if (Number.isNaN(epochMs)) return null;

  return {
    epochMs,
    utcOffsetMinutes: offsetMatch ? parseOffsetMinutes(offsetMatch[1]) : 0,
    iso: text,
  };
}

function toHashtag(token: string): string {
  const cleaned = token.trim().replace(/^#+/, '');
  return cleaned ? `#${cleaned}` : '';
}

function toHashtagTokens(value: unknown): string[] | null {
  if (Array.isArray(value)) return value.filter((entry): entry is string => typeof entry === 'string');
  if (typeof value === 'string') return value.split(/[\s,]+/);
  return null;
}

function normalizeHashtags(tokens: string[] | null, caption: string): string[] {
  const unique: string[] = [];
  for (const token of tokens ?? caption.match(HASHTAG_IN_TEXT) ?? []) {
    const tag = toHashtag(token);
    if (tag && !unique.includes(tag)) unique.push(tag);
  }
  return unique;
}

function freezeRecord(record: PostRecord): PostRecord {
  Object.freeze(record.hashtags);
  if (record.postedAt) Object.freeze(record.postedAt);
  return Object.freeze(record);
}

/**
 * Normalize one competitor's raw records. Records without a caption and
 * without an id are skipped and counted, never thrown.
 */
export function normalizeRecords(competitorHandle: string, rawRecords: readonly unknown[]): NormalizationResult {
  const records: PostRecord[] = [];
  const issues: MalformedRecord[] = [];
  const seenIds = new Set<string>();

  rawRecords.forEach((raw, index) => {
    if (!isRawRecord(raw)) {
      issues.push({ competitorHandle, index, reason: 'not_an_object' });
      return;
    }

    const rawId = pick(raw, FIELD_ALIASES.id, toText);
    const captionText = pick(raw, FIELD_ALIASES.caption, toText) ?? '';

    if (!rawId && !captionText) {
      issues.push({ competitorHandle, index, reason: 'missing_identity' });
      return;
    }

    const id = rawId || `${competitorHandle}-${index}`;
    if (seenIds.has(id)) {
      issues.push({ competitorHandle, index, reason: 'duplicate_id' });
      return;
    }
    seenIds.add(id);

    records.push(
      freezeRecord({
        id,
        competitorHandle,
        captionText,
        hashtags: normalizeHashtags(pick(raw, FIELD_ALIASES.hashtags, toHashtagTokens), captionText),
        postedAt: pick(raw, FIELD_ALIASES.postedAt, parseTimestamp),
        durationSeconds: pick(raw, FIELD_ALIASES.duration, coerceDuration),
        likeCount: pick(raw, FIELD_ALIASES.likes, parseCount) ?? 0,
        commentCount: pick(raw, FIELD_ALIASES.comments, parseCount) ?? 0,
        shareCount: pick(raw, FIELD_ALIASES.shares, parseCount) ?? 0,
        viewCount: pick(raw, FIELD_ALIASES.views, parseCount) ?? 0,
        url: pick(raw, FIELD_ALIASES.url, toText),
      })
    );
  });

  return Object.freeze({
    records: Object.freeze(records),
    skipped: issues.length,
    issues: Object.freeze(issues),
  });
}
