import assert from 'node:assert/strict';
import type { PostRecord, PostTimestamp, ScoredPost } from '../types';

export function utc(iso: string): PostTimestamp {
  return { epochMs: Date.parse(iso), utcOffsetMinutes: 0, iso };
}

export function makeRecord(overrides: Partial<PostRecord> & { id: string }): PostRecord {
  return {
    competitorHandle: 'acme',
    captionText: '',
    hashtags: [],
    postedAt: null,
    durationSeconds: null,
    likeCount: 0,
    commentCount: 0,
    shareCount: 0,
    viewCount: 0,
    url: null,
    ...overrides,
  };
}

/** ScoredPost with an explicit engagement rate, bypassing the scorer. */
export function makePost(overrides: Partial<ScoredPost> & { id: string }): ScoredPost {
  return {
    ...makeRecord(overrides),
    engagementRate: 0,
    assumedMinimalReach: false,
    ...overrides,
  };
}

export function assertClose(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= epsilon, `expected ${actual} to be within ${epsilon} of ${expected}`);
}
