/**
 * Pattern Engine
 *
 * One synchronous pass over already-fetched records:
 *   config → normalize → score → summarize (per competitor) → aggregate →
 *   report → insight payload
 *
 * Only ConfigurationError escapes. Thin or malformed data becomes warnings,
 * and a FormattingError only costs the payload.
 */

import { logger as consoleLogger, type Logger } from '../utils/logger';
import { aggregateCompetitorSummaries } from './aggregator';
import { summarizeCompetitor } from './competitor-summary';
import { scorePosts } from './engagement-scorer';
import { FormattingError, isFormattingError, type MalformedRecord, type RunWarning } from './errors';
import { formatInsightPayload, type InsightPayload } from './insight-formatter';
import { normalizeRecords } from './normalizer';
import { buildReport, type AnalysisReport } from './report-builder';
import { normalizeHandle, resolveRunConfig, type RunConfig, type RunConfigInput } from './run-config';
import type { CompetitorSummary, CrossCompetitorAggregate, ScoredPost } from './types';

export type Platform = 'instagram' | 'twitter';

export interface PatternEngineInput {
  config: RunConfigInput;
  postsByCompetitor: Record<string, readonly unknown[]>;
}

export interface PatternEngineOptions {
  /** Stamped into the report; fix it to make runs byte-for-byte repeatable. */
  analysisDate?: Date | string;
  logger?: Logger;
  platform?: Platform;
}

export interface PatternEngineResult {
  config: RunConfig;
  summaries: readonly CompetitorSummary[];
  aggregate: CrossCompetitorAggregate;
  report: AnalysisReport;
  payload: InsightPayload | null;
  formattingError: FormattingError | null;
  warnings: readonly RunWarning[];
  skippedRecords: readonly MalformedRecord[];
}

interface CompetitorInput {
  handle: string;
  rawRecords: unknown[];
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Union of configured handles and handles with supplied data. Two data keys
 * that normalize to the same handle have their records concatenated in key
 * order.
 */
function collectCompetitors(config: RunConfig, postsByCompetitor: Record<string, readonly unknown[]>): CompetitorInput[] {
  const byHandle = new Map<string, unknown[]>();

  for (const handle of config.competitorUsernames) {
    byHandle.set(handle, []);
  }

  for (const key of Object.keys(postsByCompetitor).sort(compareText)) {
    const handle = normalizeHandle(key);
    if (!handle) continue;
    const records = byHandle.get(handle) ?? [];
    records.push(...postsByCompetitor[key]);
    byHandle.set(handle, records);
  }

  return [...byHandle.entries()]
    .map(([handle, rawRecords]) => ({ handle, rawRecords }))
    .sort((a, b) => compareText(a.handle, b.handle));
}

function resolveAnalysisDate(value: Date | string | undefined): string {
  if (value === undefined) return new Date().toISOString();
  return typeof value === 'string' ? value : value.toISOString();
}

export function runPatternEngine(input: PatternEngineInput, options: PatternEngineOptions = {}): PatternEngineResult {
  const log = options.logger ?? consoleLogger;
  const config = resolveRunConfig(input.config);
  const competitors = collectCompetitors(config, input.postsByCompetitor);

  log.info(`[Engine] Analyzing ${competitors.length} competitors`);

  const warnings: RunWarning[] = [];
  const skippedRecords: MalformedRecord[] = [];
  const summaries: CompetitorSummary[] = [];

  for (const { handle, rawRecords } of competitors) {
    const normalized = normalizeRecords(handle, rawRecords);
    const scored: readonly ScoredPost[] = scorePosts(normalized.records, config.engagementWeights);

    if (normalized.skipped > 0) {
      skippedRecords.push(...normalized.issues);
      warnings.push({
        code: 'MALFORMED_RECORDS',
        scope: 'records',
        competitorHandle: handle,
        message: `Skipped ${normalized.skipped} malformed records for @${handle}`,
        actual: normalized.skipped,
      });
    }

    if (scored.length < config.reelsPerCompetitor) {
      warnings.push({
        code: 'INSUFFICIENT_DATA',
        scope: 'posts',
        competitorHandle: handle,
        message: `@${handle} has ${scored.length} eligible posts, ${config.reelsPerCompetitor} requested`,
        expected: config.reelsPerCompetitor,
        actual: scored.length,
      });
    }

    const summary = summarizeCompetitor(handle, scored, config);
    const minimalReach = summary.analyzedReels.filter((reel) => reel.assumedMinimalReach).length;
    if (minimalReach > 0) {
      warnings.push({
        code: 'ASSUMED_MINIMAL_REACH',
        scope: 'posts',
        competitorHandle: handle,
        message: `${minimalReach} posts from @${handle} had no view count and were scored against a reach of 1`,
        actual: minimalReach,
      });
    }

    log.debug(`[Engine] @${handle}: ${summary.reelsCount} reels, avg ${summary.avgEngagementRate.toFixed(2)}%`);
    summaries.push(summary);
  }

  const withPosts = summaries.filter((summary) => summary.reelsCount > 0).length;
  if (withPosts < config.minCompetitors) {
    warnings.unshift({
      code: 'INSUFFICIENT_DATA',
      scope: 'competitors',
      message: `Only ${withPosts} competitors have posts, ${config.minCompetitors} required`,
      expected: config.minCompetitors,
      actual: withPosts,
    });
  }

  for (const warning of warnings) {
    log.warn(`[Engine] ${warning.message}`);
  }

  const aggregate = aggregateCompetitorSummaries(summaries, config);
  const report = buildReport(summaries, aggregate, {
    analysisDate: resolveAnalysisDate(options.analysisDate),
    platform: options.platform ?? 'instagram',
    skippedRecords: skippedRecords.length,
    warnings,
  });

  let payload: InsightPayload | null = null;
  let formattingError: FormattingError | null = null;
  try {
    payload = formatInsightPayload(aggregate);
  } catch (error) {
    if (!isFormattingError(error)) throw error;
    formattingError = error;
    log.warn(`[Engine] ${error.message}`);
  }

  return Object.freeze({
    config,
    summaries: Object.freeze(summaries),
    aggregate,
    report,
    payload,
    formattingError,
    warnings: Object.freeze(warnings),
    skippedRecords: Object.freeze(skippedRecords),
  });
}
