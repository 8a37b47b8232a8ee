/**
 * Review report pipeline
 * resolve repositories → fetch pull requests → extract → assemble
 */

import type { PullRequestSource } from './azure/client';
import type { ReportConfig } from './config';
import { extractReviewRecords } from './domain/extract';
import { fetchAllPullRequests, resolveRepositories, type PaginationOptions } from './domain/fetch';
import type { ExtractionResult, ExtractionStats, RepositoryPullRequests } from './domain/models';
import type { Logger } from './logger';
import { assembleReport, type ReportOutcome, type ReportSinks } from './report/assemble';

export interface PipelineDeps {
  source: PullRequestSource;
  sinks: ReportSinks;
  logger: Logger;
  pagination?: Omit<PaginationOptions, 'onPage'>;
}

export interface PipelineResult {
  extraction: ExtractionResult;
  outcome: ReportOutcome;
}

const STAT_LABELS: ReadonlyArray<[keyof ExtractionStats, string]> = [
  ['totalPullRequests', 'total_prs'],
  ['totalReviewerEntries', 'total_reviewer_entries'],
  ['filteredReviewer', 'filtered_reviewer'],
  ['filteredVote', 'filtered_vote'],
  ['filteredDate', 'filtered_date'],
  ['rowsAdded', 'rows_added'],
];

export function formatStats(stats: ExtractionStats): string[] {
  return STAT_LABELS.map(([key, label]) => `${label.padEnd(25)}: ${stats[key]}`);
}

/**
 * Run one report. Repositories are fetched one at a time; any transport
 * error aborts the run before anything is written.
 */
export async function generateReviewReport(
  config: ReportConfig,
  deps: PipelineDeps,
): Promise<PipelineResult> {
  const { source, sinks, logger } = deps;

  const repos = await resolveRepositories(source, config.repositories);
  logger.verbose(`  Matched ${repos.length} repositories: ${repos.map((r) => r.name).join(', ')}`);

  const fetched: RepositoryPullRequests[] = [];
  for (const repo of repos) {
    const pullRequests = await fetchAllPullRequests(source, repo.id, {
      ...deps.pagination,
      onPage: (count) => logger.progress(`\r  ${repo.name}: ${count} PRs...`),
    });
    logger.progress('\n');
    logger.verbose(`    ${repo.name}: ${pullRequests.length} pull requests`);
    fetched.push({ repository: repo.name, pullRequests });
  }

  const extraction = extractReviewRecords(fetched, {
    reviewers: config.reviewers,
    startDate: config.startDate,
    endDate: config.endDate,
    dateMode: config.dateMode,
  });

  if (config.debug) {
    logger.log('');
    logger.log('🐞 DEBUG STATS');
    logger.log('='.repeat(50));
    for (const line of formatStats(extraction.stats)) {
      logger.log(line);
    }
  }

  const outcome = await assembleReport(extraction, sinks);

  if (outcome.status === 'no-data') {
    logger.log('');
    logger.log('⚠️  No PR review data matched the given filters.');
    logger.log('The report will NOT be generated.');
  }

  return { extraction, outcome };
}
