/**
 * Per-day decision chart
 * Declared with vega-lite, rendered headlessly to SVG with vega
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { View, parse } from 'vega';
import { compile, type TopLevelSpec } from 'vega-lite';
import type { DailyRollupRow } from '../domain/models';
import { DECISIONS } from '../domain/votes';
import type { ChartSink } from './assemble';

export const CHART_FILE = 'daily_approval_graph.svg';
export const CHART_TITLE = 'Per-Day PR Approvals / Rejections';

/**
 * Grouped bars: one group per day, one bar per decision kind
 */
export function buildDailyChartSpec(daily: readonly DailyRollupRow[]): TopLevelSpec {
  const values = daily.flatMap((row) =>
    DECISIONS.map((decision) => ({ day: row.day, decision, count: row[decision] })),
  );

  return {
    $schema: 'https://vega.github.io/schema/vega-lite/v5.json',
    title: CHART_TITLE,
    width: Math.max(480, daily.length * 48),
    height: 360,
    data: { values },
    mark: 'bar',
    encoding: {
      x: { field: 'day', type: 'ordinal', title: 'Date', axis: { labelAngle: -45 } },
      xOffset: { field: 'decision', sort: [...DECISIONS] },
      y: { field: 'count', type: 'quantitative', title: 'Count' },
      color: { field: 'decision', type: 'nominal', title: 'Decision', sort: [...DECISIONS] },
    },
  };
}

export async function renderDailyChart(daily: readonly DailyRollupRow[]): Promise<string> {
  const view = new View(parse(compile(buildDailyChartSpec(daily)).spec), { renderer: 'none' });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

export class DailyChartSink implements ChartSink {
  constructor(private readonly outDir: string) {}

  async write(daily: DailyRollupRow[]): Promise<string> {
    await mkdir(this.outDir, { recursive: true });
    const path = join(this.outDir, CHART_FILE);
    await writeFile(path, await renderDailyChart(daily), 'utf8');
    return path;
  }
}
