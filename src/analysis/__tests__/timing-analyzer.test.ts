import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  analyzeDurations,
  analyzePostingTimes,
  dayOfWeekOf,
  durationBucketOf,
  hourOf,
  mergeDurations,
  mergePostingTimes,
} from '../timing-analyzer';
import type { PostTimestamp, ScoredPost } from '../types';
import { makePost, utc } from './helpers';

function at(iso: string, utcOffsetMinutes = 0): PostTimestamp {
  return { ...utc(iso), utcOffsetMinutes };
}

// 2025-03-03 is a Monday
const MONDAY_9AM = '2025-03-03T09:00:00Z';
const MONDAY_6PM = '2025-03-03T18:00:00Z';
const TUESDAY_9AM = '2025-03-04T09:00:00Z';

function postAt(id: string, iso: string, engagementRate: number): ScoredPost {
  return makePost({ id, postedAt: at(iso), engagementRate });
}

describe('dayOfWeekOf / hourOf', () => {
  it('reads the clock in the offset the post was published with', () => {
    const post = makePost({ id: 'late', postedAt: at('2025-03-03T23:30:00Z', 120) });
    assert.equal(dayOfWeekOf(post), 'Tuesday');
    assert.equal(hourOf(post), 1);
  });

  it('handles negative offsets', () => {
    const post = makePost({ id: 'early', postedAt: at('2025-03-04T03:00:00Z', -300) });
    assert.equal(dayOfWeekOf(post), 'Monday');
    assert.equal(hourOf(post), 22);
  });

  it('returns null for undated posts', () => {
    const post = makePost({ id: 'undated' });
    assert.equal(dayOfWeekOf(post), null);
    assert.equal(hourOf(post), null);
  });
});

describe('durationBucketOf', () => {
  it('uses half-open ranges with 60s inside 30-60s', () => {
    assert.equal(durationBucketOf(0), '<15s');
    assert.equal(durationBucketOf(14.9), '<15s');
    assert.equal(durationBucketOf(15), '15-30s');
    assert.equal(durationBucketOf(29.99), '15-30s');
    assert.equal(durationBucketOf(30), '30-60s');
    assert.equal(durationBucketOf(60), '30-60s');
    assert.equal(durationBucketOf(60.5), '>60s');
    assert.equal(durationBucketOf(null), null);
  });
});

describe('analyzePostingTimes', () => {
  it('prefers confident buckets over a better thin one', () => {
    const distribution = analyzePostingTimes([
      postAt('m1', MONDAY_9AM, 1),
      postAt('m2', MONDAY_9AM, 1),
      postAt('m3', MONDAY_6PM, 1),
      postAt('t1', TUESDAY_9AM, 50),
    ]);

    assert.deepEqual(
      distribution.byDay.buckets.map((bucket) => [bucket.bucket, bucket.count, bucket.lowConfidence]),
      [
        ['Tuesday', 1, true],
        ['Monday', 3, false],
      ]
    );
    assert.deepEqual(
      distribution.byDay.best.map((bucket) => bucket.bucket),
      ['Monday']
    );
    assert.equal(distribution.byDay.bestIsLowConfidence, false);
  });

  it('falls back to thin buckets and flags it when none is confident', () => {
    const distribution = analyzePostingTimes([
      postAt('m1', MONDAY_9AM, 10),
      postAt('m2', MONDAY_6PM, 10),
      postAt('t1', TUESDAY_9AM, 2),
    ]);

    assert.deepEqual(
      distribution.byDay.best.map((bucket) => bucket.bucket),
      ['Monday']
    );
    assert.equal(distribution.byDay.bestIsLowConfidence, true);
    assert.equal(distribution.byDay.minSampleSize, 3);
  });

  it('reports every tied bucket as best, in natural order', () => {
    const distribution = analyzePostingTimes(
      [
        postAt('a', MONDAY_6PM, 4),
        postAt('b', MONDAY_9AM, 4),
      ],
      1
    );

    assert.deepEqual(
      distribution.byHour.best.map((bucket) => bucket.bucket),
      [9, 18]
    );
    assert.equal(distribution.byHour.bestIsLowConfidence, false);
  });

  it('leaves undated posts out of the time buckets', () => {
    const distribution = analyzePostingTimes([makePost({ id: 'undated', engagementRate: 3 })]);
    assert.deepEqual(distribution.byDay.buckets, []);
    assert.deepEqual(distribution.byDay.best, []);
    assert.equal(distribution.byDay.bestIsLowConfidence, false);
  });
});

describe('analyzeDurations', () => {
  it('skips posts without a duration', () => {
    const report = analyzeDurations(
      [
        makePost({ id: 'a', durationSeconds: 12, engagementRate: 2 }),
        makePost({ id: 'b', durationSeconds: 45, engagementRate: 8 }),
        makePost({ id: 'c', durationSeconds: 60, engagementRate: 4 }),
        makePost({ id: 'd', engagementRate: 100 }),
      ],
      1
    );

    assert.deepEqual(
      report.buckets.map((bucket) => [bucket.bucket, bucket.count, bucket.meanEngagementRate]),
      [
        ['30-60s', 2, 6],
        ['<15s', 1, 2],
      ]
    );
  });
});

describe('merging', () => {
  it('weights merged means by post count', () => {
    const first = analyzePostingTimes([postAt('a', MONDAY_9AM, 10)], 1);
    const second = analyzePostingTimes(
      [postAt('b', MONDAY_9AM, 1), postAt('c', MONDAY_9AM, 1), postAt('d', MONDAY_9AM, 1)],
      1
    );

    const merged = mergePostingTimes([first, second], 3);

    assert.equal(merged.byDay.buckets.length, 1);
    assert.equal(merged.byDay.buckets[0].count, 4);
    assert.equal(merged.byDay.buckets[0].meanEngagementRate, 13 / 4);
    assert.equal(merged.byDay.buckets[0].lowConfidence, false);
  });

  it('re-evaluates confidence against the merged counts', () => {
    const one = analyzeDurations([makePost({ id: 'a', durationSeconds: 20, engagementRate: 3 })], 3);
    const two = analyzeDurations(
      [
        makePost({ id: 'b', durationSeconds: 20, engagementRate: 3 }),
        makePost({ id: 'c', durationSeconds: 25, engagementRate: 3 }),
      ],
      3
    );

    assert.equal(one.bestIsLowConfidence, true);
    const merged = mergeDurations([one, two], 3);
    assert.equal(merged.bestIsLowConfidence, false);
    assert.deepEqual(
      merged.best.map((bucket) => [bucket.bucket, bucket.count]),
      [['15-30s', 3]]
    );
  });
});
