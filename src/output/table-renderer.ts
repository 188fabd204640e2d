import chalk from 'chalk';
import type { AggregateResult, CompanyRecord } from '../core/types.js';
import { padRight, truncate } from './format-utils.js';

/**
 * Renders search results as a terminal table.
 */

const NAME_WIDTH = 44;
const STATUS_WIDTH = 12;
const POSTCODE_WIDTH = 10;

function formatStatus(status: string): string {
  if (status.toLowerCase() === 'active') return chalk.green(status);
  if (!status) return chalk.dim('--');
  return chalk.yellow(status);
}

export function renderResultsTable(result: AggregateResult, options: { people?: boolean } = {}): string {
  const lines: string[] = [];
  const header = `${result.count} compan${result.count === 1 ? 'y' : 'ies'} found${result.truncated ? ' (truncated)' : ''}`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  if (result.companies.length === 0) {
    lines.push(chalk.dim('  No companies matched the search criteria.'));
    return lines.join('\n');
  }

  const columns = [
    padRight('Number', 10),
    padRight('Name', NAME_WIDTH),
    padRight('Status', STATUS_WIDTH),
    padRight('Postcode', POSTCODE_WIDTH),
    'SIC Codes',
  ];
  if (options.people) columns.push('  Directors / Owners');
  lines.push(`  ${chalk.underline(columns.join(''))}`);

  for (const c of result.companies) {
    lines.push(`  ${renderRow(c, options.people === true)}`);
  }

  if (result.truncated) {
    lines.push('');
    lines.push(chalk.yellow('  Results were truncated. Narrow the search to see everything.'));
  }

  return lines.join('\n');
}

function renderRow(c: CompanyRecord, people: boolean): string {
  let row =
    padRight(c.company_number, 10) +
    padRight(truncate(c.company_name, NAME_WIDTH - 2), NAME_WIDTH) +
    padRight(formatStatus(c.company_status), STATUS_WIDTH) +
    padRight(c.postal_code || '--', POSTCODE_WIDTH) +
    (c.sic_codes || '--');

  if (people) {
    const directors = c.directors_count === null ? '?' : String(c.directors_count);
    const owners = c.psc_count === null ? '?' : String(c.psc_count);
    row += chalk.dim(`  ${directors} / ${owners}`);
  }
  return row;
}
