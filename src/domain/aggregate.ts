/**
 * Rollups over normalized review records
 * Every row carries a count for each decision kind, zero when absent
 */

import type {
  DailyRollupRow,
  Decision,
  DecisionCounts,
  MonthlyRollupRow,
  ReviewRecord,
  ReviewerRollupRow,
  ReviewerSummary,
  Rollups,
} from './models';
import { formatDay } from './normalize';
import { emptyCounts } from './votes';

/**
 * Count decisions per bucket key, returning buckets in ascending key order
 */
function countByBucket(
  records: readonly ReviewRecord[],
  bucketOf: (record: ReviewRecord) => string,
): Array<[string, DecisionCounts]> {
  const buckets = new Map<string, DecisionCounts>();

  for (const record of records) {
    const key = bucketOf(record);
    let counts = buckets.get(key);
    if (!counts) {
      counts = emptyCounts();
      buckets.set(key, counts);
    }
    counts[record.decision]++;
  }

  return [...buckets.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function buildMonthlyRollup(records: readonly ReviewRecord[]): MonthlyRollupRow[] {
  return countByBucket(records, (r) => r.month).map(([month, counts]) => ({
    month,
    ...counts,
  }));
}

export function buildDailyRollup(records: readonly ReviewRecord[]): DailyRollupRow[] {
  return countByBucket(records, (r) => formatDay(r.decisionDate)).map(([day, counts]) => ({
    day,
    ...counts,
  }));
}

export function buildReviewerRollup(summary: ReviewerSummary): ReviewerRollupRow[] {
  return [...summary.entries()].map(([reviewer, counts]) => ({
    reviewer,
    ...counts,
  }));
}

export function buildRollups(
  records: readonly ReviewRecord[],
  summary: ReviewerSummary,
): Rollups {
  return {
    monthly: buildMonthlyRollup(records),
    daily: buildDailyRollup(records),
    reviewers: buildReviewerRollup(summary),
  };
}

/**
 * Sum one decision column across rollup rows
 */
export function totalFor(rows: readonly DecisionCounts[], decision: Decision): number {
  return rows.reduce((sum, row) => sum + row[decision], 0);
}
