/**
 * Renders export rows as a single-sheet XLSX workbook.
 */

import ExcelJS from 'exceljs';
import type { ExportSpec } from '../core/types.js';
import { isTruncatedColumn } from '../processing/columns.js';
import { cellValue, formatCell, resolveHeader } from './format-utils.js';

export const SHEET_NAME = 'Companies';
const MAX_COLUMN_WIDTH = 50;
const MIN_COLUMN_WIDTH = 8;

export async function renderXlsx(spec: ExportSpec): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();
  const sheet = workbook.addWorksheet(SHEET_NAME, {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  const headers = spec.columns.map(key => resolveHeader(spec, key));
  const header = sheet.addRow(headers);
  header.font = { bold: true };

  const widths = headers.map(h => h.length);
  for (const row of spec.companies) {
    const cells = spec.columns.map(key => formatCell(cellValue(row, key)));
    cells.forEach((cell, i) => {
      widths[i] = Math.max(widths[i], cell.length);
    });
    sheet.addRow(cells);
  }

  spec.columns.forEach((key, i) => {
    const column = sheet.getColumn(i + 1);
    column.width = Math.max(MIN_COLUMN_WIDTH, Math.min(widths[i] + 2, MAX_COLUMN_WIDTH));
    if (isTruncatedColumn(key)) {
      column.alignment = { wrapText: false, vertical: 'top' };
    }
  });

  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}
