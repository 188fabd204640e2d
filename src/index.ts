#!/usr/bin/env node

import { writeFileSync } from 'node:fs';
import { extname } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfigFromEnvironment, requireApiKey } from './core/config.js';
import { CompaniesHouseClient } from './core/registry-client.js';
import { executeSearchCore } from './core/search-engine.js';
import { setLogLevel } from './core/logger.js';
import type { ExportFormat, SearchCriteria } from './core/types.js';
import { renderResultsTable } from './output/table-renderer.js';
import { formatExport } from './output/export-formatter.js';
import { COLUMN_DEFINITIONS, DEFAULT_EXPORT_COLUMNS, PEOPLE_COLUMNS, getColumnLabel } from './processing/columns.js';
import { searchSicCodes } from './processing/sic-codes.js';

interface SearchOptions {
  sic?: string[];
  include?: string[];
  exclude?: string[];
  allStatuses?: boolean;
  includeNi?: boolean;
  people?: boolean;
  columns?: string;
  output?: string;
  json?: boolean;
}

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function exportFormatFor(file: string): ExportFormat {
  const ext = extname(file).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.xlsx') return 'xlsx';
  return fail(`Unsupported output file "${file}". Use a .csv or .xlsx file name.`);
}

function resolveColumns(spec: string | undefined, people: boolean): string[] {
  if (!spec) {
    return people ? [...DEFAULT_EXPORT_COLUMNS, ...PEOPLE_COLUMNS] : [...DEFAULT_EXPORT_COLUMNS];
  }
  if (spec === 'all') return COLUMN_DEFINITIONS.map(c => c.key);

  const columns = spec.split(',').map(c => c.trim()).filter(Boolean);
  const unknown = columns.filter(c => getColumnLabel(c) === null);
  if (unknown.length > 0) {
    fail(`Unknown column${unknown.length === 1 ? '' : 's'}: ${unknown.join(', ')}. Run "company-search columns" to list them.`);
  }
  return columns;
}

async function executeSearch(options: SearchOptions): Promise<void> {
  const config = loadConfigFromEnvironment();
  setLogLevel(config.logLevel);

  try {
    requireApiKey(config);
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
  }

  const criteria: SearchCriteria = {
    sic_codes: options.sic ?? [],
    include_keywords: options.include ?? [],
    exclude_keywords: options.exclude ?? [],
    active_only: !options.allStatuses,
    exclude_northern_ireland: !options.includeNi,
    include_people: options.people === true,
  };

  const badCodes = criteria.sic_codes.filter(code => !/^\d{5}$/.test(code));
  if (badCodes.length > 0) {
    fail(`SIC codes must be 5 digits: ${badCodes.join(', ')}`);
  }

  const format = options.output ? exportFormatFor(options.output) : null;
  const columns = resolveColumns(options.columns, criteria.include_people);

  const client = new CompaniesHouseClient(config.registry);
  const result = await executeSearchCore(criteria, client, {
    deadlineMs: config.search.deadlineMs,
    enrichmentConcurrency: config.search.enrichmentConcurrency,
  });

  if (!result.success) {
    fail(`${result.error.type}: ${result.error.message}`);
  }

  const r = result.result;

  if (options.json) {
    console.log(JSON.stringify({ companies: r.companies, count: r.count, truncated: r.truncated }, null, 2));
  } else {
    console.log(renderResultsTable(r, { people: criteria.include_people }));
  }

  if (options.output && format) {
    if (r.count === 0) {
      console.error(chalk.yellow('Nothing to export: the search returned no companies.'));
      return;
    }
    const file = await formatExport({ companies: r.companies, columns, column_names: {} }, format);
    writeFileSync(options.output, file.data);
    console.error(chalk.green(`Wrote ${r.count} companies to ${options.output}`));
  }
}

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

const program = new Command();

program
  .name('company-search')
  .description('Search the UK Companies House register by SIC code and name keywords')
  .version('1.0.0');

program
  .command('search')
  .description('Search for companies and print or export the results')
  .option('-s, --sic <code>', 'SIC code to match (repeatable)', collect)
  .option('-i, --include <keyword>', 'Company name keyword to include (repeatable)', collect)
  .option('-x, --exclude <keyword>', 'Company name keyword to exclude (repeatable)', collect)
  .option('--all-statuses', 'Include dissolved and inactive companies')
  .option('--include-ni', 'Keep Northern Ireland companies')
  .option('-p, --people', 'Fetch directors and owners for each company (slow)')
  .option('-c, --columns <list>', 'Comma-separated export columns, or "all"')
  .option('-o, --output <file>', 'Write results to a .csv or .xlsx file')
  .option('-j, --json', 'Output as JSON instead of table')
  .action(async (options: SearchOptions) => {
    try {
      await executeSearch(options);
    } catch (err) {
      fail(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
  });

program
  .command('sic-codes')
  .description('List SIC codes, optionally filtered by code prefix or description')
  .argument('[filter]', 'Code prefix or description text')
  .action((filter: string | undefined) => {
    const codes = searchSicCodes(filter ?? '');
    if (codes.length === 0) {
      console.log(chalk.dim(`No SIC codes match "${filter ?? ''}".`));
      return;
    }
    for (const s of codes) {
      console.log(`  ${chalk.cyan(s.code)}  ${s.description}`);
    }
  });

program
  .command('columns')
  .description('List exportable columns')
  .action(() => {
    console.log(chalk.bold('\nExport Columns\n'));
    for (const c of COLUMN_DEFINITIONS) {
      console.log(`  ${chalk.cyan(c.key.padEnd(32))} ${c.label}`);
    }
    console.log('');
  });

await program.parseAsync();
