import type { BucketReport, BucketStat } from './types';

export interface BucketTally<K extends string | number> {
  bucket: K;
  count: number;
  engagementSum: number;
}

const TIE_EPSILON = 1e-9;

export function tallyBuckets<T, K extends string | number>(
  items: readonly T[],
  keyOf: (item: T) => K | null,
  engagementOf: (item: T) => number
): BucketTally<K>[] {
  const tallies = new Map<K, BucketTally<K>>();

  for (const item of items) {
    const bucket = keyOf(item);
    if (bucket === null) continue;
    const tally = tallies.get(bucket) ?? { bucket, count: 0, engagementSum: 0 };
    tally.count += 1;
    tally.engagementSum += engagementOf(item);
    tallies.set(bucket, tally);
  }

  return [...tallies.values()];
}

/**
 * Turn raw tallies into a ranked report. Tallies for the same bucket are
 * summed first, so merging reports from several competitors is just building
 * a report over all of their buckets.
 *
 * Buckets under `minSampleSize` stay in the report flagged `lowConfidence`.
 * `best` only considers confident buckets unless there are none.
 */
export function buildBucketReport<K extends string | number>(
  tallies: readonly BucketTally<K>[],
  minSampleSize: number,
  naturalOrder: readonly K[]
): BucketReport<K> {
  const merged = new Map<K, { count: number; engagementSum: number }>();
  for (const tally of tallies) {
    const current = merged.get(tally.bucket) ?? { count: 0, engagementSum: 0 };
    current.count += tally.count;
    current.engagementSum += tally.engagementSum;
    merged.set(tally.bucket, current);
  }

  const buckets: BucketStat<K>[] = [...merged.entries()]
    .filter(([, total]) => total.count > 0)
    .map(([bucket, total]) =>
      Object.freeze({
        bucket,
        count: total.count,
        engagementSum: total.engagementSum,
        meanEngagementRate: total.engagementSum / total.count,
        lowConfidence: total.count < minSampleSize,
      })
    )
    .sort((a, b) => {
      if (a.meanEngagementRate !== b.meanEngagementRate) return b.meanEngagementRate - a.meanEngagementRate;
      if (a.count !== b.count) return b.count - a.count;
      return naturalOrder.indexOf(a.bucket) - naturalOrder.indexOf(b.bucket);
    });

  const confident = buckets.filter((bucket) => !bucket.lowConfidence);
  const pool = confident.length > 0 ? confident : buckets;
  const topMean = pool.length > 0 ? pool[0].meanEngagementRate : 0;
  const best = pool.filter((bucket) => Math.abs(bucket.meanEngagementRate - topMean) <= TIE_EPSILON);

  return Object.freeze({
    buckets: Object.freeze(buckets),
    best: Object.freeze(best),
    bestIsLowConfidence: confident.length === 0 && buckets.length > 0,
    minSampleSize,
  });
}

export function mergeBucketReports<K extends string | number>(
  reports: readonly BucketReport<K>[],
  minSampleSize: number,
  naturalOrder: readonly K[]
): BucketReport<K> {
  const tallies = reports.flatMap((report) =>
    report.buckets.map((bucket) => ({ bucket: bucket.bucket, count: bucket.count, engagementSum: bucket.engagementSum }))
  );
  return buildBucketReport(tallies, minSampleSize, naturalOrder);
}
