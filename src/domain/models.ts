/**
 * Domain models for the review-ledger CLI tool
 */

/**
 * Represents an Azure DevOps Git repository
 */
export interface Repository {
  id: string;
  name: string;
}

/**
 * A reviewer's entry on a pull request, as returned by the API
 */
export interface ReviewerEntry {
  identity: string;
  vote: number;
  reviewedAt: string | null;
}

/**
 * Represents a pull request with its reviewer entries
 */
export interface PullRequest {
  id: number;
  title: string;
  createdAt: string | null;
  author: string;
  reviewers: ReviewerEntry[];
}

/**
 * Pull requests fetched for a single repository, in fetch order
 */
export interface RepositoryPullRequests {
  repository: string;
  pullRequests: PullRequest[];
}

/**
 * Outcome of a recognized vote
 */
export type Decision = 'Approved' | 'Rejected';

/**
 * Which timestamp decides whether a review falls inside the date window
 */
export type DateMode = 'creation' | 'review';

/**
 * A review decision that passed every filter
 */
export interface ReviewRecord {
  repository: string;
  pullRequestId: number;
  title: string;
  reviewer: string;
  decision: Decision;
  decisionDate: Date;
  createdAt: string | null;
  author: string;
  month: string;
}

/**
 * One row per reviewer entry seen, before any filtering
 */
export interface RawAuditRecord {
  repository: string;
  pullRequestId: number;
  reviewer: string;
  vote: number;
  reviewedAt: string | null;
  createdAt: string | null;
}

export type DecisionCounts = Record<Decision, number>;

/**
 * Decision counts per reviewer, in configured order
 */
export type ReviewerSummary = Map<string, DecisionCounts>;

/**
 * Filter funnel counters surfaced in debug mode
 */
export interface ExtractionStats {
  totalPullRequests: number;
  totalReviewerEntries: number;
  filteredReviewer: number;
  filteredVote: number;
  filteredDate: number;
  rowsAdded: number;
}

export interface ExtractionResult {
  records: ReviewRecord[];
  rawRecords: RawAuditRecord[];
  reviewerSummary: ReviewerSummary;
  stats: ExtractionStats;
}

export interface MonthlyRollupRow extends DecisionCounts {
  month: string;
}

export interface DailyRollupRow extends DecisionCounts {
  day: string;
}

export interface ReviewerRollupRow extends DecisionCounts {
  reviewer: string;
}

export interface Rollups {
  monthly: MonthlyRollupRow[];
  daily: DailyRollupRow[];
  reviewers: ReviewerRollupRow[];
}
