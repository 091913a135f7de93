/**
 * Report Builder
 *
 * Serializes summaries and the aggregate into the snake_case document the CLI
 * writes to disk. Only plain JSON values come out of here.
 */

import type { RunWarning } from './errors';
import type {
  BucketReport,
  BucketStat,
  CompetitorSummary,
  CrossCompetitorAggregate,
  HashtagStat,
  ScoredPost,
  TopicTheme,
} from './types';

export interface BucketEntry<K extends string | number> {
  bucket: K;
  count: number;
  avg_engagement_rate: number;
  low_confidence: boolean;
}

export interface BucketReportEntry<K extends string | number> {
  best: K[];
  best_is_low_confidence: boolean;
  buckets: BucketEntry<K>[];
}

export interface ReelEntry {
  id: string;
  url: string | null;
  caption: string;
  hashtags: string[];
  posted_at: string | null;
  duration_seconds: number | null;
  likes: number;
  comments: number;
  shares: number;
  views: number;
  engagement_rate: number;
}

export interface HashtagEntry {
  hashtag: string;
  frequency: number;
  avg_engagement_rate: number;
}

export interface ThemeEntry {
  theme: string;
  keywords: string[];
  post_count: number;
  avg_engagement_rate: number;
}

export interface CategoryEntry {
  category: string;
  count: number;
  avg_engagement_rate: number;
}

export interface WarningEntry {
  code: string;
  scope: string;
  message: string;
  competitor?: string;
}

export interface CompetitorReport {
  reels_count: number;
  avg_engagement_rate: number;
  top_performing_reels: ReelEntry[];
  hook_patterns: { categories: CategoryEntry[] };
  optimal_duration_bucket: BucketReportEntry<string>;
  posting_time_distribution: {
    by_day: BucketEntry<string>[];
    by_hour: BucketEntry<number>[];
  };
  top_hashtags: HashtagEntry[];
  topic_themes: ThemeEntry[];
}

export interface PatternsAnalysis {
  total_reels_analyzed: number;
  avg_engagement_rate: number;
  top_hashtags: HashtagEntry[];
  hook_patterns: {
    total_hooks_analyzed: number;
    categories: CategoryEntry[];
    top_performing_hooks: { hook: string; category: string; engagement_rate: number; competitor: string }[];
    common_hook_starters: { starter: string; count: number; avg_engagement: number; examples: string[] }[];
  };
  optimal_duration: BucketReportEntry<string>;
  posting_patterns: {
    best_days: string[];
    best_hours: number[];
    best_is_low_confidence: boolean;
    by_day: BucketEntry<string>[];
    by_hour: BucketEntry<number>[];
  };
  optimal_caption_length: BucketReportEntry<string>;
  topic_themes: ThemeEntry[];
  top_keywords: { keyword: string; post_count: number }[];
  engagement_insights: {
    high_engagement_count: number;
    engagement_threshold: number;
    likes_to_shares_ratio: number;
    likes_to_comments_ratio: number;
    characteristics: string[];
  };
}

export interface AnalysisReport {
  analysis_summary: {
    competitors_analyzed: number;
    total_reels_analyzed: number;
    skipped_records: number;
    assumed_minimal_reach_posts: string[];
    analysis_date: string;
    platform: string;
    warnings: WarningEntry[];
  };
  competitor_data: Record<string, CompetitorReport>;
  patterns_analysis: PatternsAnalysis;
}

export interface ReportMeta {
  analysisDate: string;
  platform: string;
  skippedRecords: number;
  warnings: readonly RunWarning[];
}

function bucketEntry<K extends string | number>(stat: BucketStat<K>): BucketEntry<K> {
  return {
    bucket: stat.bucket,
    count: stat.count,
    avg_engagement_rate: stat.meanEngagementRate,
    low_confidence: stat.lowConfidence,
  };
}

function bucketReportEntry<K extends string>(report: BucketReport<K>): BucketReportEntry<string> {
  return {
    best: report.best.map((stat) => stat.bucket),
    best_is_low_confidence: report.bestIsLowConfidence,
    buckets: report.buckets.map((stat) => bucketEntry(stat)),
  };
}

function reelEntry(post: ScoredPost): ReelEntry {
  return {
    id: post.id,
    url: post.url,
    caption: post.captionText,
    hashtags: [...post.hashtags],
    posted_at: post.postedAt ? post.postedAt.iso : null,
    duration_seconds: post.durationSeconds,
    likes: post.likeCount,
    comments: post.commentCount,
    shares: post.shareCount,
    views: post.viewCount,
    engagement_rate: post.engagementRate,
  };
}

function hashtagEntry(stat: HashtagStat): HashtagEntry {
  return { hashtag: stat.hashtag, frequency: stat.frequency, avg_engagement_rate: stat.meanEngagementRate };
}

function themeEntry(theme: TopicTheme): ThemeEntry {
  return {
    theme: theme.label,
    keywords: [...theme.keywords],
    post_count: theme.postCount,
    avg_engagement_rate: theme.meanEngagementRate,
  };
}

function warningEntry(warning: RunWarning): WarningEntry {
  return {
    code: warning.code,
    scope: warning.scope,
    message: warning.message,
    ...(warning.competitorHandle ? { competitor: warning.competitorHandle } : {}),
  };
}

function competitorReport(summary: CompetitorSummary): CompetitorReport {
  return {
    reels_count: summary.reelsCount,
    avg_engagement_rate: summary.avgEngagementRate,
    top_performing_reels: summary.topPerformingReels.map(reelEntry),
    hook_patterns: {
      categories: summary.hookPatterns.categories.map((stat) => ({
        category: stat.category,
        count: stat.count,
        avg_engagement_rate: stat.meanEngagementRate,
      })),
    },
    optimal_duration_bucket: bucketReportEntry(summary.optimalDurationBucket),
    posting_time_distribution: {
      by_day: summary.postingTimeDistribution.byDay.buckets.map((stat) => bucketEntry(stat)),
      by_hour: summary.postingTimeDistribution.byHour.buckets.map((stat) => bucketEntry(stat)),
    },
    top_hashtags: summary.topHashtags.map(hashtagEntry),
    topic_themes: summary.topicThemes.map(themeEntry),
  };
}

function patternsAnalysis(aggregate: CrossCompetitorAggregate): PatternsAnalysis {
  const { byDay, byHour } = aggregate.postingPatterns;
  const insights = aggregate.engagementInsights;

  return {
    total_reels_analyzed: aggregate.totalReelsAnalyzed,
    avg_engagement_rate: aggregate.avgEngagementRate,
    top_hashtags: aggregate.topHashtags.map(hashtagEntry),
    hook_patterns: {
      total_hooks_analyzed: aggregate.hookPatterns.totalHooksAnalyzed,
      categories: aggregate.hookPatterns.categories.map((stat) => ({
        category: stat.category,
        count: stat.count,
        avg_engagement_rate: stat.meanEngagementRate,
      })),
      top_performing_hooks: aggregate.hookPatterns.topPerformingHooks.map((hook) => ({
        hook: hook.hookText,
        category: hook.hookCategory,
        engagement_rate: hook.engagementRate,
        competitor: hook.competitorHandle,
      })),
      common_hook_starters: aggregate.hookPatterns.commonHookStarters.map((starter) => ({
        starter: starter.starter,
        count: starter.count,
        avg_engagement: starter.avgEngagementRate,
        examples: [...starter.examples],
      })),
    },
    optimal_duration: bucketReportEntry(aggregate.optimalDuration),
    posting_patterns: {
      best_days: byDay.best.map((stat) => stat.bucket),
      best_hours: byHour.best.map((stat) => stat.bucket),
      best_is_low_confidence: byDay.bestIsLowConfidence || byHour.bestIsLowConfidence,
      by_day: byDay.buckets.map((stat) => bucketEntry(stat)),
      by_hour: byHour.buckets.map((stat) => bucketEntry(stat)),
    },
    optimal_caption_length: bucketReportEntry(aggregate.captionLength),
    topic_themes: aggregate.topicThemes.map(themeEntry),
    top_keywords: aggregate.topKeywords.map((stat) => ({ keyword: stat.keyword, post_count: stat.postCount })),
    engagement_insights: {
      high_engagement_count: insights.highEngagementCount,
      engagement_threshold: insights.engagementThreshold,
      likes_to_shares_ratio: insights.likesToSharesRatio,
      likes_to_comments_ratio: insights.likesToCommentsRatio,
      characteristics: [...insights.characteristics],
    },
  };
}

export function buildReport(
  summaries: readonly CompetitorSummary[],
  aggregate: CrossCompetitorAggregate,
  meta: ReportMeta
): AnalysisReport {
  const competitorData: Record<string, CompetitorReport> = {};
  for (const handle of aggregate.competitorHandles) {
    const summary = summaries.find((candidate) => candidate.competitorHandle === handle);
    if (summary) competitorData[handle] = competitorReport(summary);
  }

  const assumedMinimalReach = aggregate.competitorHandles.flatMap((handle) => {
    const summary = summaries.find((candidate) => candidate.competitorHandle === handle);
    return summary ? summary.analyzedReels.filter((reel) => reel.assumedMinimalReach).map((reel) => reel.id) : [];
  });

  return {
    analysis_summary: {
      competitors_analyzed: aggregate.competitorsAnalyzed,
      total_reels_analyzed: aggregate.totalReelsAnalyzed,
      skipped_records: meta.skippedRecords,
      assumed_minimal_reach_posts: assumedMinimalReach,
      analysis_date: meta.analysisDate,
      platform: meta.platform,
      warnings: meta.warnings.map(warningEntry),
    },
    competitor_data: competitorData,
    patterns_analysis: patternsAnalysis(aggregate),
  };
}
