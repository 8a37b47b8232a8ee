/**
 * Report assembly
 * Lays out the report tables and hands them to the output sinks
 */

import { buildRollups } from '../domain/aggregate';
import type { DailyRollupRow, ExtractionResult, Rollups } from '../domain/models';
import { formatTimestamp } from '../domain/normalize';
import { DECISIONS } from '../domain/votes';

export type CellValue = string | number | null;

/**
 * A named table; each row maps every column name to a cell
 */
export interface ReportTable {
  name: string;
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}

/**
 * Writes all report tables together and returns where they went
 */
export interface TabularSink {
  write(tables: ReportTable[]): Promise<string>;
}

/**
 * Renders the per-day rollup and returns where it went
 */
export interface ChartSink {
  write(daily: DailyRollupRow[]): Promise<string>;
}

export interface ReportSinks {
  tabular: TabularSink;
  chart: ChartSink;
}

export type ReportOutcome =
  | { status: 'no-data' }
  | {
      status: 'written';
      workbookPath: string;
      chartPath: string | null;
      rollups: Rollups;
    };

export const SHEET_NAMES = {
  records: 'All PRs',
  monthly: 'Monthly Summary',
  reviewers: 'Reviewer Summary',
  raw: 'Raw API Data',
} as const;

export function buildReportTables(result: ExtractionResult, rollups: Rollups): ReportTable[] {
  return [
    {
      name: SHEET_NAMES.records,
      columns: [
        'Repository',
        'PR ID',
        'Title',
        'Reviewer',
        'Decision',
        'Decision Date',
        'PR Created Date',
        'Created By',
        'Month',
      ],
      rows: result.records.map((r) => ({
        Repository: r.repository,
        'PR ID': r.pullRequestId,
        Title: r.title,
        Reviewer: r.reviewer,
        Decision: r.decision,
        'Decision Date': formatTimestamp(r.decisionDate),
        'PR Created Date': r.createdAt,
        'Created By': r.author,
        Month: r.month,
      })),
    },
    {
      name: SHEET_NAMES.monthly,
      columns: ['Month', ...DECISIONS],
      rows: rollups.monthly.map((row) => ({
        Month: row.month,
        Approved: row.Approved,
        Rejected: row.Rejected,
      })),
    },
    {
      name: SHEET_NAMES.reviewers,
      columns: ['Reviewer', ...DECISIONS],
      rows: rollups.reviewers.map((row) => ({
        Reviewer: row.reviewer,
        Approved: row.Approved,
        Rejected: row.Rejected,
      })),
    },
    {
      name: SHEET_NAMES.raw,
      columns: ['Repository', 'PR ID', 'Reviewer', 'Vote', 'Reviewed Date', 'PR Created Date'],
      rows: result.rawRecords.map((r) => ({
        Repository: r.repository,
        'PR ID': r.pullRequestId,
        Reviewer: r.reviewer,
        Vote: r.vote,
        'Reviewed Date': r.reviewedAt,
        'PR Created Date': r.createdAt,
      })),
    },
  ];
}

/**
 * Write the workbook and, when there are dated decisions, the daily chart.
 * Nothing is written when no record passed the filters.
 */
export async function assembleReport(
  result: ExtractionResult,
  sinks: ReportSinks,
): Promise<ReportOutcome> {
  if (result.records.length === 0) {
    return { status: 'no-data' };
  }

  const rollups = buildRollups(result.records, result.reviewerSummary);
  const workbookPath = await sinks.tabular.write(buildReportTables(result, rollups));
  const chartPath = rollups.daily.length > 0 ? await sinks.chart.write(rollups.daily) : null;

  return { status: 'written', workbookPath, chartPath, rollups };
}
