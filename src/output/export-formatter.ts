/**
 * Export entry point: rejects empty exports and dispatches to a renderer.
 */

import type { ExportFile, ExportFormat, ExportSpec } from '../core/types.js';
import { EmptyExportError } from '../core/errors.js';
import { renderCsv } from './csv-renderer.js';
import { renderXlsx } from './xlsx-renderer.js';

export const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export const EXPORT_FILENAMES: Record<ExportFormat, string> = {
  csv: 'uk_companies.csv',
  xlsx: 'uk_companies.xlsx',
};

export async function formatExport(spec: ExportSpec, format: ExportFormat): Promise<ExportFile> {
  if (spec.companies.length === 0) {
    throw new EmptyExportError();
  }

  const data = format === 'csv'
    ? Buffer.from(renderCsv(spec), 'utf-8')
    : await renderXlsx(spec);

  return {
    data,
    contentType: CONTENT_TYPES[format],
    filename: EXPORT_FILENAMES[format],
  };
}
