import { buildBucketReport, mergeBucketReports, tallyBuckets } from './buckets';
import { meanEngagementRate } from './engagement-scorer';
import type { BucketReport, CaptionLengthBucket, EngagementInsights, ScoredPost } from './types';

export const CAPTION_LENGTH_BUCKETS: readonly CaptionLengthBucket[] = Object.freeze([
  '0-50 chars',
  '51-100 chars',
  '101-200 chars',
  '200+ chars',
]);

const EMOJI = /\p{Extended_Pictographic}/u;

export function captionLengthBucketOf(caption: string): CaptionLengthBucket {
  const length = caption.length;
  if (length <= 50) return '0-50 chars';
  if (length <= 100) return '51-100 chars';
  if (length <= 200) return '101-200 chars';
  return '200+ chars';
}

export function analyzeCaptionLengths(
  posts: readonly ScoredPost[],
  minSampleSize: number
): BucketReport<CaptionLengthBucket> {
  return buildBucketReport(
    tallyBuckets(posts, (post) => captionLengthBucketOf(post.captionText), (post) => post.engagementRate),
    minSampleSize,
    CAPTION_LENGTH_BUCKETS
  );
}

export function mergeCaptionLengths(
  reports: readonly BucketReport<CaptionLengthBucket>[],
  minSampleSize: number
): BucketReport<CaptionLengthBucket> {
  return mergeBucketReports(reports, minSampleSize, CAPTION_LENGTH_BUCKETS);
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

/**
 * What the above-average posts have in common.
 */
export function analyzeEngagementCharacteristics(posts: readonly ScoredPost[]): EngagementInsights {
  const threshold = meanEngagementRate(posts);
  const high = posts.filter((post) => post.engagementRate > threshold);

  const characteristics: string[] = [];
  if (high.length > 0) {
    if (high.some((post) => post.captionText.includes('?'))) {
      characteristics.push('Questions perform well');
    }
    if (high.filter((post) => EMOJI.test(post.captionText)).length > high.length * 0.3) {
      characteristics.push('Emojis boost engagement');
    }
    if (high.some((post) => post.captionText.toLowerCase().includes('thread'))) {
      characteristics.push('Threads generate discussion');
    }
    if (high.filter((post) => post.captionText.length < 100).length > high.length / 2) {
      characteristics.push('Short captions dominate top performers');
    }
  }

  const likes = high.reduce((sum, post) => sum + post.likeCount, 0);
  const comments = high.reduce((sum, post) => sum + post.commentCount, 0);
  const shares = high.reduce((sum, post) => sum + post.shareCount, 0);

  return Object.freeze({
    highEngagementCount: high.length,
    engagementThreshold: threshold,
    likesToSharesRatio: ratio(likes, shares),
    likesToCommentsRatio: ratio(likes, comments),
    characteristics: Object.freeze(characteristics),
  });
}
