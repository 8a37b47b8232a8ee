/**
 * Review record extraction
 * Walks repository → pull request → reviewer entry and applies the
 * reviewer, vote and date filters in that order
 */

import type {
  DateMode,
  ExtractionResult,
  ExtractionStats,
  RawAuditRecord,
  RepositoryPullRequests,
  ReviewRecord,
  ReviewerSummary,
} from './models';
import { formatMonth, inRange, normalizeIdentity, parseTimestamp } from './normalize';
import { classifyVote, emptyCounts } from './votes';

export interface ExtractionCriteria {
  reviewers: readonly string[];
  startDate: string;
  endDate: string;
  dateMode: DateMode;
}

function emptyStats(): ExtractionStats {
  return {
    totalPullRequests: 0,
    totalReviewerEntries: 0,
    filteredReviewer: 0,
    filteredVote: 0,
    filteredDate: 0,
    rowsAdded: 0,
  };
}

/**
 * Build an empty summary with one row per configured reviewer,
 * so reviewers without hits still show up with zero counts
 */
function initReviewerSummary(reviewers: readonly string[]): ReviewerSummary {
  const summary: ReviewerSummary = new Map();
  for (const reviewer of reviewers) {
    const identity = normalizeIdentity(reviewer);
    if (identity && !summary.has(identity)) {
      summary.set(identity, emptyCounts());
    }
  }
  return summary;
}

/**
 * Turn fetched pull requests into normalized review records plus a raw audit trail.
 *
 * In `review` mode a reviewer entry without a reviewed timestamp is dated by
 * the pull request's creation timestamp instead, which can place a late
 * review in an earlier month when the API omits the field.
 */
export function extractReviewRecords(
  repositories: readonly RepositoryPullRequests[],
  criteria: ExtractionCriteria,
): ExtractionResult {
  const reviewerSummary = initReviewerSummary(criteria.reviewers);
  const records: ReviewRecord[] = [];
  const rawRecords: RawAuditRecord[] = [];
  const stats = emptyStats();

  for (const { repository, pullRequests } of repositories) {
    stats.totalPullRequests += pullRequests.length;

    for (const pr of pullRequests) {
      for (const entry of pr.reviewers) {
        stats.totalReviewerEntries++;

        const reviewer = normalizeIdentity(entry.identity);

        rawRecords.push({
          repository,
          pullRequestId: pr.id,
          reviewer,
          vote: entry.vote,
          reviewedAt: entry.reviewedAt,
          createdAt: pr.createdAt,
        });

        const counts = reviewer ? reviewerSummary.get(reviewer) : undefined;
        if (!counts) {
          stats.filteredReviewer++;
          continue;
        }

        const decision = classifyVote(entry.vote);
        if (!decision) {
          stats.filteredVote++;
          continue;
        }

        const checkDate =
          criteria.dateMode === 'creation'
            ? parseTimestamp(pr.createdAt)
            : parseTimestamp(entry.reviewedAt ?? pr.createdAt);

        if (!checkDate || !inRange(checkDate, criteria.startDate, criteria.endDate)) {
          stats.filteredDate++;
          continue;
        }

        counts[decision]++;
        stats.rowsAdded++;

        records.push({
          repository,
          pullRequestId: pr.id,
          title: pr.title,
          reviewer,
          decision,
          decisionDate: checkDate,
          createdAt: pr.createdAt,
          author: pr.author,
          month: formatMonth(checkDate),
        });
      }
    }
  }

  return { records, rawRecords, reviewerSummary, stats };
}
