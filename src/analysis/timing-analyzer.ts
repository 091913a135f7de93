/**
 * Timing Analyzer
 *
 * Buckets posts by local day of week and hour (the offset the timestamp was
 * published with, UTC when it had none) and by video duration range.
 * Undated posts are left out of the time buckets and posts without a duration
 * are left out of the duration buckets; both still count everywhere else.
 */

import { buildBucketReport, mergeBucketReports, tallyBuckets } from './buckets';
import type { BucketReport, DayOfWeek, DurationBucket, PostingTimeDistribution, ScoredPost } from './types';

export const DEFAULT_MIN_SAMPLE_SIZE = 3;

export const DAYS_OF_WEEK: readonly DayOfWeek[] = Object.freeze([
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
]);

export const HOURS_OF_DAY: readonly number[] = Object.freeze(Array.from({ length: 24 }, (_, hour) => hour));

export const DURATION_BUCKETS: readonly DurationBucket[] = Object.freeze(['<15s', '15-30s', '30-60s', '>60s']);

// Date#getUTCDay() starts the week on Sunday
const UTC_DAY_TO_NAME: readonly DayOfWeek[] = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

function localClock(post: ScoredPost): Date | null {
  if (!post.postedAt) return null;
  return new Date(post.postedAt.epochMs + post.postedAt.utcOffsetMinutes * 60_000);
}

export function dayOfWeekOf(post: ScoredPost): DayOfWeek | null {
  const local = localClock(post);
  return local ? UTC_DAY_TO_NAME[local.getUTCDay()] : null;
}

export function hourOf(post: ScoredPost): number | null {
  const local = localClock(post);
  return local ? local.getUTCHours() : null;
}

export function durationBucketOf(durationSeconds: number | null): DurationBucket | null {
  if (durationSeconds === null) return null;
  if (durationSeconds < 15) return '<15s';
  if (durationSeconds < 30) return '15-30s';
  if (durationSeconds <= 60) return '30-60s';
  return '>60s';
}

export function analyzePostingTimes(
  posts: readonly ScoredPost[],
  minSampleSize: number = DEFAULT_MIN_SAMPLE_SIZE
): PostingTimeDistribution {
  const engagement = (post: ScoredPost) => post.engagementRate;

  return Object.freeze({
    byDay: buildBucketReport(tallyBuckets(posts, dayOfWeekOf, engagement), minSampleSize, DAYS_OF_WEEK),
    byHour: buildBucketReport(tallyBuckets(posts, hourOf, engagement), minSampleSize, HOURS_OF_DAY),
  });
}

export function analyzeDurations(
  posts: readonly ScoredPost[],
  minSampleSize: number = DEFAULT_MIN_SAMPLE_SIZE
): BucketReport<DurationBucket> {
  return buildBucketReport(
    tallyBuckets(posts, (post) => durationBucketOf(post.durationSeconds), (post) => post.engagementRate),
    minSampleSize,
    DURATION_BUCKETS
  );
}

export function mergePostingTimes(
  distributions: readonly PostingTimeDistribution[],
  minSampleSize: number
): PostingTimeDistribution {
  return Object.freeze({
    byDay: mergeBucketReports(
      distributions.map((distribution) => distribution.byDay),
      minSampleSize,
      DAYS_OF_WEEK
    ),
    byHour: mergeBucketReports(
      distributions.map((distribution) => distribution.byHour),
      minSampleSize,
      HOURS_OF_DAY
    ),
  });
}

export function mergeDurations(
  reports: readonly BucketReport<DurationBucket>[],
  minSampleSize: number
): BucketReport<DurationBucket> {
  return mergeBucketReports(reports, minSampleSize, DURATION_BUCKETS);
}
