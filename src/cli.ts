/**
 * CLI command definitions and orchestration
 * Uses commander for argument parsing
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { AzureDevOpsClient, AzureDevOpsClientError } from './azure/client';
import { ConfigError, createReportConfig, isValidDate, loadConfig, type ReportConfig } from './config';
import { totalFor } from './domain/aggregate';
import type { ReviewerRollupRow } from './domain/models';
import { createLogger, type Logger } from './logger';
import { generateReviewReport } from './pipeline';
import { DailyChartSink } from './report/chart';
import { WorkbookSink } from './report/workbook';

/**
 * Parse and validate a date option
 */
function parseDate(value: string, name: string): string {
  if (!isValidDate(value)) {
    throw new InvalidArgumentError(`Invalid date format for ${name}: "${value}". Expected YYYY-MM-DD.`);
  }
  return value;
}

/**
 * Parse comma-separated list
 */
export function parseList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

interface GenerateOptions {
  repos: string[];
  reviewers: string[];
  from: string;
  to: string;
  dateMode: string;
  outDir: string;
  debug?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Create the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('review-ledger')
    .description('Report pull-request review decisions from Azure DevOps')
    .version('1.0.0');

  program
    .command('generate')
    .description('Generate a review decision report for a set of reviewers')
    .requiredOption('-r, --repos <repos>', 'Repositories to scan (comma-separated)', parseList)
    .requiredOption('-u, --reviewers <reviewers>', 'Reviewer unique names (comma-separated)', parseList)
    .requiredOption('-f, --from <date>', 'Start date (YYYY-MM-DD)', (value) => parseDate(value, '--from'))
    .requiredOption('-t, --to <date>', 'End date (YYYY-MM-DD)', (value) => parseDate(value, '--to'))
    .addOption(
      new Option('--date-mode <mode>', 'Date used for filtering: PR creation or review')
        .choices(['creation', 'review'])
        .default('review'),
    )
    .option('-o, --out-dir <dir>', 'Output directory', '.')
    .option('--debug', 'Print filter statistics')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Minimal output')
    .action(async (options: GenerateOptions) => {
      process.exitCode = await runGenerate(options);
    });

  return program;
}

/**
 * Print the reviewer rollup as an aligned table
 */
export function formatReviewerTable(rows: readonly ReviewerRollupRow[]): string[] {
  const width = Math.max('Reviewer'.length, ...rows.map((r) => r.reviewer.length));
  const line = (reviewer: string, approved: string, rejected: string) =>
    `${reviewer.padEnd(width)}  ${approved.padStart(8)}  ${rejected.padStart(8)}`;

  return [
    line('Reviewer', 'Approved', 'Rejected'),
    ...rows.map((r) => line(r.reviewer, String(r.Approved), String(r.Rejected))),
    line('Total', String(totalFor(rows, 'Approved')), String(totalFor(rows, 'Rejected'))),
  ];
}

function printSettings(config: ReportConfig, logger: Logger): void {
  logger.log(`Repositories: ${config.repositories.join(', ')}`);
  logger.log(`Reviewers: ${config.reviewers.join(', ')}`);
  logger.log(`Period: ${config.startDate} to ${config.endDate}`);
  logger.log(`Date mode: ${config.dateMode}`);
  logger.log(`Output: ${config.outDir}`);
  logger.log('');
}

/**
 * Run the generate command and return the process exit code
 */
export async function runGenerate(options: GenerateOptions): Promise<number> {
  const logger = createLogger(options);

  logger.log('');
  logger.log('╔════════════════════════════════════════╗');
  logger.log('║     review-ledger - Review Report      ║');
  logger.log('╚════════════════════════════════════════╝');
  logger.log('');

  try {
    // Fail on configuration before any network call
    const config = loadConfig();
    const reportConfig = createReportConfig({
      repositories: options.repos,
      reviewers: options.reviewers,
      startDate: options.from,
      endDate: options.to,
      dateMode: options.dateMode,
      debug: options.debug,
      outDir: options.outDir,
    });

    logger.log(`Organization: ${config.organization} / ${config.project}`);
    printSettings(reportConfig, logger);

    logger.log('📥 Fetching pull requests from Azure DevOps...');
    const { extraction, outcome } = await generateReviewReport(reportConfig, {
      source: new AzureDevOpsClient(config),
      sinks: {
        tabular: new WorkbookSink(reportConfig.outDir),
        chart: new DailyChartSink(reportConfig.outDir),
      },
      logger,
    });

    if (outcome.status === 'no-data') {
      return 0;
    }

    logger.log(`Matched ${extraction.records.length} review decisions`);
    logger.log('');
    logger.log('📊 REVIEW SUMMARY');
    logger.log('='.repeat(50));
    for (const line of formatReviewerTable(outcome.rollups.reviewers)) {
      logger.log(line);
    }
    logger.log('');
    if (outcome.chartPath) {
      logger.log(`📈 Daily graph saved: ${outcome.chartPath}`);
    }
    logger.log(`📄 Excel report saved at: ${outcome.workbookPath}`);
    logger.log('');
    logger.log('✅ Done!');
    return 0;
  } catch (error) {
    logger.log('');

    if (error instanceof ConfigError) {
      logger.error(`Configuration Error:\n${error.message}`);
      return 1;
    }

    if (error instanceof AzureDevOpsClientError) {
      logger.error(`Azure DevOps API Error: ${error.message}`);
      if (error.statusCode === 401 || error.statusCode === 203) {
        logger.error('  Check that your AZURE_DEVOPS_PAT is valid.');
      } else if (error.statusCode === 403) {
        logger.error('  The token lacks Code (Read) access to this project.');
      } else if (error.statusCode === 404) {
        logger.error('  Check AZURE_DEVOPS_ORG and AZURE_DEVOPS_PROJECT.');
      }
      return 1;
    }

    if (error instanceof Error) {
      logger.error(`Error: ${error.message}`);
    } else {
      logger.error('An unexpected error occurred');
    }

    return 1;
  }
}
