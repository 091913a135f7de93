/**
 * Aggregator
 *
 * Folds every CompetitorSummary into the single CrossCompetitorAggregate of a
 * run. Summaries are visited in handle order and every mean is rebuilt from
 * counts and sums, so a competitor with 40 reels weighs four times as much as
 * one with 10.
 */

import { analyzeEngagementCharacteristics, mergeCaptionLengths } from './caption-analyzer';
import { mergeHashtagStats, rankHashtags } from './hashtag-analyzer';
import { HOOK_CATEGORY_PRIORITY, combineHookCategoryStats, findCommonHookStarters } from './hook-extractor';
import { compareScoredPosts } from './post-ranker';
import type { RunConfig } from './run-config';
import { mergeDurations, mergePostingTimes } from './timing-analyzer';
import { extractTopicThemes, rankKeywords } from './topic-extractor';
import type { CompetitorSummary, CrossCompetitorAggregate, HookPattern } from './types';

export const TOP_HOOKS_LIMIT = 10;
export const TOP_REELS_OVERALL = 5;
export const TOP_KEYWORDS_LIMIT = 15;

export type AggregateConfig = Pick<RunConfig, 'minBucketSampleSize' | 'topHashtagsLimit' | 'maxThemes'>;

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareHooks(a: HookPattern, b: HookPattern): number {
  if (a.engagementRate !== b.engagementRate) return b.engagementRate - a.engagementRate;
  return compareText(a.competitorHandle, b.competitorHandle) || compareText(a.postId, b.postId);
}

function topHookPerCategory(sortedHooks: readonly HookPattern[]): readonly HookPattern[] {
  const exemplars: HookPattern[] = [];
  for (const category of HOOK_CATEGORY_PRIORITY) {
    const best = sortedHooks.find((hook) => hook.hookCategory === category);
    if (best) exemplars.push(best);
  }
  return Object.freeze(exemplars);
}

export function aggregateCompetitorSummaries(
  summaries: readonly CompetitorSummary[],
  config: AggregateConfig
): CrossCompetitorAggregate {
  const ordered = [...summaries].sort((a, b) => compareText(a.competitorHandle, b.competitorHandle));
  const minSampleSize = config.minBucketSampleSize;

  const totalReels = ordered.reduce((sum, summary) => sum + summary.reelsCount, 0);
  const engagementSum = ordered.reduce((sum, summary) => sum + summary.engagementSum, 0);

  const allPatterns = ordered.flatMap((summary) => summary.hookPatterns.patterns);
  const allReels = ordered.flatMap((summary) => summary.analyzedReels);
  const allDocuments = ordered.flatMap((summary) => summary.topicDocuments);
  const sortedHooks = [...allPatterns].sort(compareHooks);

  return Object.freeze({
    competitorHandles: Object.freeze(ordered.map((summary) => summary.competitorHandle)),
    competitorsAnalyzed: ordered.filter((summary) => summary.reelsCount > 0).length,
    totalReelsAnalyzed: totalReels,
    engagementSum,
    avgEngagementRate: totalReels > 0 ? engagementSum / totalReels : 0,
    topHashtags: rankHashtags(
      mergeHashtagStats(ordered.map((summary) => summary.hashtagStats)),
      config.topHashtagsLimit
    ),
    hookPatterns: Object.freeze({
      totalHooksAnalyzed: allPatterns.length,
      categories: combineHookCategoryStats(ordered.flatMap((summary) => summary.hookPatterns.categories)),
      topPerformingHooks: Object.freeze(sortedHooks.slice(0, TOP_HOOKS_LIMIT)),
      topHookPerCategory: topHookPerCategory(sortedHooks),
      // starters below the per-competitor cut-off can still repeat across competitors
      commonHookStarters: findCommonHookStarters(allPatterns),
    }),
    postingPatterns: mergePostingTimes(
      ordered.map((summary) => summary.postingTimeDistribution),
      minSampleSize
    ),
    optimalDuration: mergeDurations(
      ordered.map((summary) => summary.optimalDurationBucket),
      minSampleSize
    ),
    captionLength: mergeCaptionLengths(
      ordered.map((summary) => summary.captionLength),
      minSampleSize
    ),
    topicThemes: extractTopicThemes(allDocuments, { maxThemes: config.maxThemes }),
    topKeywords: Object.freeze(rankKeywords(allDocuments).slice(0, TOP_KEYWORDS_LIMIT)),
    engagementInsights: analyzeEngagementCharacteristics(allReels),
    topPerformingReels: Object.freeze([...allReels].sort(compareScoredPosts).slice(0, TOP_REELS_OVERALL)),
  });
}
