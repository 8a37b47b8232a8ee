import type { PullRequestSource } from '../../src/azure/client';
import type { DailyRollupRow, PullRequest, Repository } from '../../src/domain/models';
import type { ChartSink, ReportTable, TabularSink } from '../../src/report/assemble';

/**
 * In-memory pull request source that serves fixed pages and records every call
 */
export class FakeSource implements PullRequestSource {
  readonly calls: Array<{ repositoryId: string; skip: number; top: number }> = [];

  constructor(
    private readonly repositories: Repository[],
    private readonly pullRequests: Record<string, PullRequest[]> = {},
  ) {}

  async listRepositories(): Promise<Repository[]> {
    return this.repositories;
  }

  async listPullRequests(repositoryId: string, skip: number, top: number): Promise<PullRequest[]> {
    this.calls.push({ repositoryId, skip, top });
    return (this.pullRequests[repositoryId] ?? []).slice(skip, skip + top);
  }
}

export class MemoryTabularSink implements TabularSink {
  readonly writes: ReportTable[][] = [];

  async write(tables: ReportTable[]): Promise<string> {
    this.writes.push(tables);
    return 'memory/report.xlsx';
  }
}

export class MemoryChartSink implements ChartSink {
  readonly writes: DailyRollupRow[][] = [];

  async write(daily: DailyRollupRow[]): Promise<string> {
    this.writes.push(daily);
    return 'memory/chart.svg';
  }
}
