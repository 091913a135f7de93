import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { EngagementWeights } from './types';

export const DEFAULT_ENGAGEMENT_WEIGHTS: Readonly<EngagementWeights> = Object.freeze({
  commentWeight: 2,
  shareWeight: 3,
});

const positiveInt = z.number().int().min(1);

export const RunConfigSchema = z
  .object({
    competitorUsernames: z.array(z.string().trim().min(1)).default([]),
    autoDiscoverCompetitors: z.boolean().default(true),
    minCompetitors: positiveInt.default(3),
    reelsPerCompetitor: positiveInt.default(20),
    engagementWeights: z
      .object({
        commentWeight: z.number().finite().min(0),
        shareWeight: z.number().finite().min(0),
      })
      .strict()
      .default({ ...DEFAULT_ENGAGEMENT_WEIGHTS }),
    topHashtagsLimit: positiveInt.default(10),
    hookMaxLength: z.number().int().min(10).default(100),
    minBucketSampleSize: positiveInt.default(3),
    topReelsPerCompetitor: positiveInt.default(5),
    maxThemes: positiveInt.default(5),
  })
  .strict();

export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RunConfig = Readonly<z.output<typeof RunConfigSchema>>;

/**
 * Lower-cases a handle and drops a leading "@" so manual lists and scraper
 * keys line up.
 */
export function normalizeHandle(handle: string): string {
  return handle.trim().replace(/^@+/, '').toLowerCase();
}

/**
 * Validate and freeze a run configuration. Throws ConfigurationError listing
 * every problem before any processing starts.
 */
export function resolveRunConfig(input: RunConfigInput = {}): RunConfig {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigurationError(issues);
  }

  const handles = [...new Set(parsed.data.competitorUsernames.map(normalizeHandle))].filter(Boolean);

  return Object.freeze({
    ...parsed.data,
    competitorUsernames: handles,
    engagementWeights: Object.freeze({ ...parsed.data.engagementWeights }),
  });
}
