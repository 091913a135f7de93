/**
 * Insight Formatter
 *
 * Pure data shaping: condenses the aggregate into the payload the content
 * ideas prompt is rendered from. Nothing is generated here and nothing is
 * defaulted. A payload without reels, hooks or competitors would only
 * produce generic ideas, so those gaps raise FormattingError instead.
 */

import { FormattingError } from './errors';
import type {
  CaptionLengthBucket,
  CrossCompetitorAggregate,
  DayOfWeek,
  DurationBucket,
  HookCategory,
} from './types';

export interface InsightPayload {
  analysisSummary: {
    competitorsAnalyzed: number;
    competitorHandles: readonly string[];
    totalReelsAnalyzed: number;
    avgEngagementRate: number;
  };
  patterns: {
    topHashtags: { hashtag: string; frequency: number; avgEngagementRate: number }[];
    hookCategories: { category: HookCategory; count: number; avgEngagementRate: number }[];
    commonHookStarters: { starter: string; count: number; avgEngagementRate: number }[];
    topicThemes: { theme: string; keywords: readonly string[]; avgEngagementRate: number }[];
    bestDays: DayOfWeek[];
    bestHours: number[];
    bestDurations: DurationBucket[];
    bestCaptionLengths: CaptionLengthBucket[];
    lowConfidenceTiming: boolean;
    engagementCharacteristics: readonly string[];
  };
  exemplars: { category: HookCategory; hook: string; engagementRate: number; competitor: string }[];
  topPerformingContent: {
    competitor: string;
    caption: string;
    hashtags: readonly string[];
    engagementRate: number;
    likes: number;
    comments: number;
    shares: number;
    views: number;
  }[];
}

export interface InsightFormatterOptions {
  topContentLimit?: number;
  captionPreviewLength?: number;
}

export const DEFAULT_TOP_CONTENT_LIMIT = 5;
export const DEFAULT_CAPTION_PREVIEW_LENGTH = 200;

export function truncateCaption(caption: string, maxLength: number = DEFAULT_CAPTION_PREVIEW_LENGTH): string {
  return caption.length > maxLength ? `${caption.slice(0, maxLength)}...` : caption;
}

function missingFields(aggregate: CrossCompetitorAggregate): string[] {
  const missing: string[] = [];
  if (aggregate.competitorHandles.length === 0) missing.push('competitorHandles');
  if (aggregate.totalReelsAnalyzed === 0) missing.push('totalReelsAnalyzed');
  if (!Number.isFinite(aggregate.avgEngagementRate)) missing.push('avgEngagementRate');
  if (aggregate.hookPatterns.totalHooksAnalyzed === 0) missing.push('hookPatterns');
  return missing;
}

export function formatInsightPayload(
  aggregate: CrossCompetitorAggregate,
  options: InsightFormatterOptions = {}
): InsightPayload {
  const missing = missingFields(aggregate);
  if (missing.length > 0) {
    throw new FormattingError(missing);
  }

  const topContentLimit = options.topContentLimit ?? DEFAULT_TOP_CONTENT_LIMIT;
  const previewLength = options.captionPreviewLength ?? DEFAULT_CAPTION_PREVIEW_LENGTH;
  const { byDay, byHour } = aggregate.postingPatterns;

  return {
    analysisSummary: {
      competitorsAnalyzed: aggregate.competitorsAnalyzed,
      competitorHandles: aggregate.competitorHandles,
      totalReelsAnalyzed: aggregate.totalReelsAnalyzed,
      avgEngagementRate: aggregate.avgEngagementRate,
    },
    patterns: {
      topHashtags: aggregate.topHashtags.map((stat) => ({
        hashtag: stat.hashtag,
        frequency: stat.frequency,
        avgEngagementRate: stat.meanEngagementRate,
      })),
      hookCategories: aggregate.hookPatterns.categories.map((stat) => ({
        category: stat.category,
        count: stat.count,
        avgEngagementRate: stat.meanEngagementRate,
      })),
      commonHookStarters: aggregate.hookPatterns.commonHookStarters.map((starter) => ({
        starter: starter.starter,
        count: starter.count,
        avgEngagementRate: starter.avgEngagementRate,
      })),
      topicThemes: aggregate.topicThemes.map((theme) => ({
        theme: theme.label,
        keywords: theme.keywords,
        avgEngagementRate: theme.meanEngagementRate,
      })),
      bestDays: byDay.best.map((bucket) => bucket.bucket),
      bestHours: byHour.best.map((bucket) => bucket.bucket),
      bestDurations: aggregate.optimalDuration.best.map((bucket) => bucket.bucket),
      bestCaptionLengths: aggregate.captionLength.best.map((bucket) => bucket.bucket),
      lowConfidenceTiming: byDay.bestIsLowConfidence || byHour.bestIsLowConfidence,
      engagementCharacteristics: aggregate.engagementInsights.characteristics,
    },
    exemplars: aggregate.hookPatterns.topHookPerCategory.map((hook) => ({
      category: hook.hookCategory,
      hook: hook.hookText,
      engagementRate: hook.engagementRate,
      competitor: hook.competitorHandle,
    })),
    topPerformingContent: aggregate.topPerformingReels.slice(0, topContentLimit).map((reel) => ({
      competitor: reel.competitorHandle,
      caption: truncateCaption(reel.captionText, previewLength),
      hashtags: reel.hashtags,
      engagementRate: reel.engagementRate,
      likes: reel.likeCount,
      comments: reel.commentCount,
      shares: reel.shareCount,
      views: reel.viewCount,
    })),
  };
}
