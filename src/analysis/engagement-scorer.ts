/**
 * Engagement Scorer
 *
 *   engagementRate = (likes + comments * Wc + shares * Ws) / max(views, 1) * 100
 *
 * Comments and shares carry a stronger signal than likes, so they are weighted
 * up. Posts with no recorded views are scored against a reach of 1 and
 * flagged with `assumedMinimalReach`; their rate is inflated and callers
 * should surface that flag instead of hiding it.
 */

import type { EngagementWeights, PostRecord, ScoredPost } from './types';
import { DEFAULT_ENGAGEMENT_WEIGHTS } from './run-config';

export function calculateEngagementRate(
  post: Pick<PostRecord, 'likeCount' | 'commentCount' | 'shareCount' | 'viewCount'>,
  weights: EngagementWeights = DEFAULT_ENGAGEMENT_WEIGHTS
): number {
  const weighted = post.likeCount + post.commentCount * weights.commentWeight + post.shareCount * weights.shareWeight;
  return (weighted / Math.max(post.viewCount, 1)) * 100;
}

export function scorePost(post: PostRecord, weights: EngagementWeights = DEFAULT_ENGAGEMENT_WEIGHTS): ScoredPost {
  return Object.freeze({
    ...post,
    engagementRate: calculateEngagementRate(post, weights),
    assumedMinimalReach: post.viewCount <= 0,
  });
}

export function scorePosts(
  posts: readonly PostRecord[],
  weights: EngagementWeights = DEFAULT_ENGAGEMENT_WEIGHTS
): readonly ScoredPost[] {
  return Object.freeze(posts.map((post) => scorePost(post, weights)));
}

export function meanEngagementRate(posts: readonly Pick<ScoredPost, 'engagementRate'>[]): number {
  if (posts.length === 0) return 0;
  return sumEngagement(posts) / posts.length;
}

export function sumEngagement(posts: readonly Pick<ScoredPost, 'engagementRate'>[]): number {
  return posts.reduce((sum, post) => sum + post.engagementRate, 0);
}
