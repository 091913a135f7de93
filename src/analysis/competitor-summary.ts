/**
 * Competitor Summarizer
 *
 * Runs ranking plus every pattern extractor over one competitor's scored
 * posts. Depends on nothing but its arguments, so competitors can be
 * summarized in any order (or on separate workers) and merged afterwards.
 */

import { analyzeCaptionLengths } from './caption-analyzer';
import { sumEngagement } from './engagement-scorer';
import { countHashtags, rankHashtags } from './hashtag-analyzer';
import { extractHookPatterns, findCommonHookStarters, summarizeHookCategories } from './hook-extractor';
import { selectTopPosts } from './post-ranker';
import type { RunConfig } from './run-config';
import { analyzeDurations, analyzePostingTimes } from './timing-analyzer';
import { buildTopicDocuments, extractTopicThemes } from './topic-extractor';
import type { CompetitorSummary, ScoredPost } from './types';

export type SummaryConfig = Pick<
  RunConfig,
  'reelsPerCompetitor' | 'topReelsPerCompetitor' | 'hookMaxLength' | 'minBucketSampleSize' | 'topHashtagsLimit' | 'maxThemes'
>;

export function summarizeCompetitor(
  competitorHandle: string,
  posts: readonly ScoredPost[],
  config: SummaryConfig
): CompetitorSummary {
  const analyzed = selectTopPosts(posts, config.reelsPerCompetitor);
  const engagementSum = sumEngagement(analyzed);

  const patterns = extractHookPatterns(analyzed, config.hookMaxLength);
  const hashtagStats = countHashtags(analyzed);
  const topicDocuments = buildTopicDocuments(analyzed);

  return Object.freeze({
    competitorHandle,
    reelsCount: analyzed.length,
    engagementSum,
    avgEngagementRate: analyzed.length > 0 ? engagementSum / analyzed.length : 0,
    topPerformingReels: Object.freeze(analyzed.slice(0, config.topReelsPerCompetitor)),
    analyzedReels: analyzed,
    hookPatterns: Object.freeze({
      patterns,
      categories: summarizeHookCategories(patterns),
    }),
    commonHookStarters: findCommonHookStarters(patterns),
    optimalDurationBucket: analyzeDurations(analyzed, config.minBucketSampleSize),
    postingTimeDistribution: analyzePostingTimes(analyzed, config.minBucketSampleSize),
    captionLength: analyzeCaptionLengths(analyzed, config.minBucketSampleSize),
    hashtagStats,
    topHashtags: rankHashtags(hashtagStats, config.topHashtagsLimit),
    topicDocuments,
    topicThemes: extractTopicThemes(topicDocuments, { maxThemes: config.maxThemes }),
  });
}
