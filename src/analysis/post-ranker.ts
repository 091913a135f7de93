/**
 * Post Ranking & Selection
 *
 * "Top performing" here means highest weighted engagement rate. Ties have to
 * resolve the same way on every run, so the comparator is a total order:
 *   1. engagement rate (highest first)
 *   2. posted time (most recent first; undated posts last)
 *   3. post id (lexicographically smallest first)
 */

import type { ScoredPost } from './types';

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareScoredPosts(a: ScoredPost, b: ScoredPost): number {
  if (a.engagementRate !== b.engagementRate) {
    return b.engagementRate - a.engagementRate;
  }

  const aTime = a.postedAt ? a.postedAt.epochMs : Number.NEGATIVE_INFINITY;
  const bTime = b.postedAt ? b.postedAt.epochMs : Number.NEGATIVE_INFINITY;
  if (aTime !== bTime) {
    return aTime > bTime ? -1 : 1;
  }

  return compareIds(a.id, b.id);
}

/**
 * Sort posts into ranked order. Returns a new array; the input is untouched.
 */
export function rankPosts(posts: readonly ScoredPost[]): readonly ScoredPost[] {
  return Object.freeze([...posts].sort(compareScoredPosts));
}

/**
 * Top `count` posts in ranked order. Asking for more than exist returns what
 * exists.
 */
export function selectTopPosts(posts: readonly ScoredPost[], count: number): readonly ScoredPost[] {
  const limit = Math.max(0, Math.min(Math.floor(count), posts.length));
  return Object.freeze(rankPosts(posts).slice(0, limit));
}
