import type { HashtagStat, ScoredPost } from './types';

export const DEFAULT_TOP_HASHTAGS = 10;

export function normalizeHashtag(tag: string): string {
  const cleaned = tag.trim().replace(/^#+/, '').toLowerCase();
  return cleaned ? `#${cleaned}` : '';
}

function toStat(hashtag: string, frequency: number, engagementSum: number): HashtagStat {
  return Object.freeze({
    hashtag,
    frequency,
    engagementSum,
    meanEngagementRate: frequency > 0 ? engagementSum / frequency : 0,
  });
}

/**
 * Count how many posts use each hashtag. Case is folded, so "#FIT" and "#fit"
 * on the same post count once.
 */
export function countHashtags(posts: readonly ScoredPost[]): readonly HashtagStat[] {
  const totals = new Map<string, { frequency: number; engagementSum: number }>();

  for (const post of posts) {
    const tags = new Set(post.hashtags.map(normalizeHashtag).filter(Boolean));
    for (const tag of tags) {
      const current = totals.get(tag) ?? { frequency: 0, engagementSum: 0 };
      current.frequency += 1;
      current.engagementSum += post.engagementRate;
      totals.set(tag, current);
    }
  }

  return Object.freeze(
    [...totals.entries()].map(([tag, total]) => toStat(tag, total.frequency, total.engagementSum))
  );
}

export function compareHashtagStats(a: HashtagStat, b: HashtagStat): number {
  if (a.frequency !== b.frequency) return b.frequency - a.frequency;
  if (a.meanEngagementRate !== b.meanEngagementRate) return b.meanEngagementRate - a.meanEngagementRate;
  return a.hashtag < b.hashtag ? -1 : a.hashtag > b.hashtag ? 1 : 0;
}

/**
 * Frequency ranking with mean engagement as the tie-break, trimmed to `limit`.
 */
export function rankHashtags(stats: readonly HashtagStat[], limit: number = DEFAULT_TOP_HASHTAGS): readonly HashtagStat[] {
  return Object.freeze([...stats].sort(compareHashtagStats).slice(0, Math.max(0, limit)));
}

export function mergeHashtagStats(statLists: readonly (readonly HashtagStat[])[]): readonly HashtagStat[] {
  const totals = new Map<string, { frequency: number; engagementSum: number }>();

  for (const stats of statLists) {
    for (const stat of stats) {
      const current = totals.get(stat.hashtag) ?? { frequency: 0, engagementSum: 0 };
      current.frequency += stat.frequency;
      current.engagementSum += stat.engagementSum;
      totals.set(stat.hashtag, current);
    }
  }

  return Object.freeze(
    [...totals.entries()].map(([tag, total]) => toStat(tag, total.frequency, total.engagementSum))
  );
}
