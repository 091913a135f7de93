/**
 * Canonical data model for the pattern engine.
 *
 * Everything past the normalizer is typed against these shapes; raw scraper
 * records never leak further than `normalizer.ts`.
 */

export interface PostTimestamp {
  epochMs: number;
  /** Offset embedded in the source timestamp, 0 when the source had none. */
  utcOffsetMinutes: number;
  iso: string;
}

export interface PostRecord {
  readonly id: string;
  readonly competitorHandle: string;
  readonly captionText: string;
  readonly hashtags: readonly string[];
  readonly postedAt: Readonly<PostTimestamp> | null;
  readonly durationSeconds: number | null;
  readonly likeCount: number;
  readonly commentCount: number;
  readonly shareCount: number;
  readonly viewCount: number;
  readonly url: string | null;
}

export interface ScoredPost extends PostRecord {
  readonly engagementRate: number;
  /** True when the post had no views and was scored against a reach of 1. */
  readonly assumedMinimalReach: boolean;
}

export interface EngagementWeights {
  commentWeight: number;
  shareWeight: number;
}

// ============================================
// HOOKS
// ============================================

export type HookCategory =
  | 'statistic'
  | 'question'
  | 'story-opener'
  | 'how-to'
  | 'listicle'
  | 'bold-claim'
  | 'other';

export interface HookPattern {
  readonly postId: string;
  readonly competitorHandle: string;
  readonly hookText: string;
  readonly hookCategory: HookCategory;
  readonly engagementRate: number;
}

export interface HookCategoryStat {
  readonly category: HookCategory;
  readonly count: number;
  readonly engagementSum: number;
  readonly meanEngagementRate: number;
}

export interface HookStarter {
  readonly starter: string;
  readonly count: number;
  readonly engagementSum: number;
  readonly avgEngagementRate: number;
  readonly examples: readonly string[];
}

// ============================================
// BUCKETS
// ============================================

export type DayOfWeek =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';

export type DurationBucket = '<15s' | '15-30s' | '30-60s' | '>60s';

export type CaptionLengthBucket = '0-50 chars' | '51-100 chars' | '101-200 chars' | '200+ chars';

export interface BucketStat<K extends string | number> {
  readonly bucket: K;
  readonly count: number;
  readonly engagementSum: number;
  readonly meanEngagementRate: number;
  readonly lowConfidence: boolean;
}

export interface BucketReport<K extends string | number> {
  readonly buckets: readonly BucketStat<K>[];
  readonly best: readonly BucketStat<K>[];
  readonly bestIsLowConfidence: boolean;
  readonly minSampleSize: number;
}

export interface PostingTimeDistribution {
  readonly byDay: BucketReport<DayOfWeek>;
  readonly byHour: BucketReport<number>;
}

// ============================================
// HASHTAGS & TOPICS
// ============================================

export interface HashtagStat {
  readonly hashtag: string;
  readonly frequency: number;
  readonly engagementSum: number;
  readonly meanEngagementRate: number;
}

export interface TopicDocument {
  readonly postId: string;
  readonly keywords: readonly string[];
  readonly engagementRate: number;
}

export interface KeywordStat {
  readonly keyword: string;
  readonly postCount: number;
  readonly engagementSum: number;
}

export interface TopicTheme {
  readonly label: string;
  readonly keywords: readonly string[];
  readonly postCount: number;
  readonly meanEngagementRate: number;
}

// ============================================
// ENGAGEMENT INSIGHTS
// ============================================

export interface EngagementInsights {
  readonly highEngagementCount: number;
  readonly engagementThreshold: number;
  readonly likesToSharesRatio: number;
  readonly likesToCommentsRatio: number;
  readonly characteristics: readonly string[];
}

// ============================================
// SUMMARIES
// ============================================

export interface CompetitorSummary {
  readonly competitorHandle: string;
  readonly reelsCount: number;
  readonly engagementSum: number;
  readonly avgEngagementRate: number;
  readonly topPerformingReels: readonly ScoredPost[];
  readonly analyzedReels: readonly ScoredPost[];
  readonly hookPatterns: {
    readonly patterns: readonly HookPattern[];
    readonly categories: readonly HookCategoryStat[];
  };
  readonly commonHookStarters: readonly HookStarter[];
  readonly optimalDurationBucket: BucketReport<DurationBucket>;
  readonly postingTimeDistribution: PostingTimeDistribution;
  readonly captionLength: BucketReport<CaptionLengthBucket>;
  readonly hashtagStats: readonly HashtagStat[];
  readonly topHashtags: readonly HashtagStat[];
  readonly topicDocuments: readonly TopicDocument[];
  readonly topicThemes: readonly TopicTheme[];
}

export interface CrossCompetitorAggregate {
  readonly competitorHandles: readonly string[];
  readonly competitorsAnalyzed: number;
  readonly totalReelsAnalyzed: number;
  readonly engagementSum: number;
  readonly avgEngagementRate: number;
  readonly topHashtags: readonly HashtagStat[];
  readonly hookPatterns: {
    readonly totalHooksAnalyzed: number;
    readonly categories: readonly HookCategoryStat[];
    readonly topPerformingHooks: readonly HookPattern[];
    /** Highest-engagement hook of each category, in category priority order. */
    readonly topHookPerCategory: readonly HookPattern[];
    readonly commonHookStarters: readonly HookStarter[];
  };
  readonly postingPatterns: PostingTimeDistribution;
  readonly optimalDuration: BucketReport<DurationBucket>;
  readonly captionLength: BucketReport<CaptionLengthBucket>;
  readonly topicThemes: readonly TopicTheme[];
  readonly topKeywords: readonly KeywordStat[];
  readonly engagementInsights: EngagementInsights;
  readonly topPerformingReels: readonly ScoredPost[];
}
