/**
 * Configuration management for review-ledger CLI
 * Loads connection settings from the environment and validates report options
 */

import type { DateMode } from './domain/models';

/**
 * Connection settings for the Azure DevOps API
 */
export interface Config {
  readonly organization: string;
  readonly project: string;
  readonly token: string;
  readonly baseUrl: string;
}

/**
 * Options for a single report run
 */
export interface ReportConfig {
  readonly repositories: readonly string[];
  readonly reviewers: readonly string[];
  readonly startDate: string;
  readonly endDate: string;
  readonly dateMode: DateMode;
  readonly debug: boolean;
  readonly outDir: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_BASE_URL = 'https://dev.azure.com';

const REQUIRED_ENV = ['AZURE_DEVOPS_PAT', 'AZURE_DEVOPS_ORG', 'AZURE_DEVOPS_PROJECT'] as const;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Loads and validates connection settings from environment variables.
 * Every missing variable is reported at once.
 */
export function loadConfig(env: Env = process.env): Config {
  const missingVars = REQUIRED_ENV.filter((name) => !readEnv(env, name));

  if (missingVars.length > 0) {
    throw new ConfigError(
      `Missing required environment variables:\n` +
      missingVars.map((v) => `  - ${v}`).join('\n') +
      `\n\nPlease set these variables before running the command:\n` +
      `  export AZURE_DEVOPS_PAT=your_personal_access_token\n` +
      `  export AZURE_DEVOPS_ORG=your_organization\n` +
      `  export AZURE_DEVOPS_PROJECT=your_project`
    );
  }

  return Object.freeze({
    token: readEnv(env, 'AZURE_DEVOPS_PAT') ?? '',
    organization: readEnv(env, 'AZURE_DEVOPS_ORG') ?? '',
    project: readEnv(env, 'AZURE_DEVOPS_PROJECT') ?? '',
    baseUrl: readEnv(env, 'AZURE_DEVOPS_BASE_URL') ?? DEFAULT_BASE_URL,
  });
}

/**
 * Validate date format (YYYY-MM-DD)
 */
export function isValidDate(dateStr: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateStr);
  if (!match) {
    return false;
  }

  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year ?? 0, (month ?? 0) - 1, day ?? 0));
  return date.getUTCFullYear() === year && date.getUTCMonth() + 1 === month && date.getUTCDate() === day;
}

export function isDateMode(value: string): value is DateMode {
  return value === 'creation' || value === 'review';
}

export interface ReportConfigInput {
  repositories: readonly string[];
  reviewers: readonly string[];
  startDate: string;
  endDate: string;
  dateMode?: string;
  debug?: boolean;
  outDir?: string;
}

/**
 * Build an immutable report configuration, rejecting invalid options
 */
export function createReportConfig(input: ReportConfigInput): ReportConfig {
  const repositories = input.repositories.map((s) => s.trim()).filter((s) => s.length > 0);
  const reviewers = input.reviewers.map((s) => s.trim()).filter((s) => s.length > 0);
  const dateMode = input.dateMode ?? 'review';

  if (repositories.length === 0) {
    throw new ConfigError('At least one repository is required.');
  }
  if (reviewers.length === 0) {
    throw new ConfigError('At least one reviewer is required.');
  }
  if (!isValidDate(input.startDate)) {
    throw new ConfigError(`Invalid start date: "${input.startDate}". Expected YYYY-MM-DD.`);
  }
  if (!isValidDate(input.endDate)) {
    throw new ConfigError(`Invalid end date: "${input.endDate}". Expected YYYY-MM-DD.`);
  }
  if (input.startDate > input.endDate) {
    throw new ConfigError('Start date must not be after end date.');
  }
  if (!isDateMode(dateMode)) {
    throw new ConfigError(`Invalid date mode: "${dateMode}". Expected "creation" or "review".`);
  }

  return Object.freeze({
    repositories: Object.freeze(repositories),
    reviewers: Object.freeze(reviewers),
    startDate: input.startDate,
    endDate: input.endDate,
    dateMode,
    debug: input.debug ?? false,
    outDir: input.outDir ?? '.',
  });
}
