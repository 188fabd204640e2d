/**
 * Shared formatting utilities for export and terminal renderers.
 */

import type { CellValue, ExportRow, ExportSpec } from '../core/types.js';
import { getColumnLabel } from '../processing/columns.js';

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const padding = Math.max(0, len - stripped.length);
  return str + ' '.repeat(padding);
}

/** Clip to `max` characters, marking the cut with an ellipsis */
export function truncate(str: string, max: number): string {
  return str.length > max ? str.slice(0, Math.max(0, max - 3)) + '...' : str;
}

/** Escape a value for CSV output (quote if it contains commas, quotes or line breaks) */
export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Render a cell as export text: absent → '', booleans → Yes/No */
export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  return String(value);
}

/** Own-property lookup, so keys like `constructor` never reach Object.prototype */
function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function cellValue(row: ExportRow, key: string): CellValue | undefined {
  return ownValue(row, key);
}

/** Header label: caller-supplied name, then the catalogue label, then the key */
export function resolveHeader(spec: ExportSpec, key: string): string {
  return ownValue(spec.column_names, key) ?? getColumnLabel(key) ?? key;
}
