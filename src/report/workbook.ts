/**
 * Excel workbook output, one worksheet per report table
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import type { ReportTable, TabularSink } from './assemble';

export const WORKBOOK_FILE = 'reviewed_prs_report.xlsx';

/**
 * Build an in-memory workbook from report tables
 */
export function buildWorkbook(tables: readonly ReportTable[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  for (const table of tables) {
    const sheet = workbook.addWorksheet(table.name);
    sheet.columns = table.columns.map((column) => ({
      header: column,
      key: column,
      width: Math.max(12, column.length + 2),
    }));
    sheet.getRow(1).font = { bold: true };

    for (const row of table.rows) {
      sheet.addRow(row);
    }
  }

  return workbook;
}

export class WorkbookSink implements TabularSink {
  constructor(private readonly outDir: string) {}

  async write(tables: ReportTable[]): Promise<string> {
    await mkdir(this.outDir, { recursive: true });
    const path = join(this.outDir, WORKBOOK_FILE);
    await buildWorkbook(tables).xlsx.writeFile(path);
    return path;
  }
}
