/**
 * Renders export rows as CSV for spreadsheet import.
 * UTF-8 with a byte-order mark so Excel picks the right encoding.
 */

import type { ExportSpec } from '../core/types.js';
import { cellValue, csvEscape, formatCell, resolveHeader } from './format-utils.js';

const BOM = '\uFEFF';
const EOL = '\r\n';

export function renderCsv(spec: ExportSpec): string {
  const lines: string[] = [];

  lines.push(spec.columns.map(key => csvEscape(resolveHeader(spec, key))).join(','));

  for (const row of spec.companies) {
    lines.push(spec.columns.map(key => csvEscape(formatCell(cellValue(row, key)))).join(','));
  }

  return BOM + lines.join(EOL) + EOL;
}
