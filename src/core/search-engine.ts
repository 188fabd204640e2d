/**
 * Search execution engine.
 *
 * Pages through the registry one request at a time, filters each page,
 * optionally enriches the survivors and accumulates records in upstream
 * order. Returns data only; the web routes and the CLI decide how to show it.
 */

import type { RegistryClient, RegistryPage, RegistrySearchQuery } from './registry-client.js';
import type { AggregateResult, CompanyRecord, SearchCriteria } from './types.js';
import {
  AggregationError,
  AuthError,
  DataParseError,
  ValidationError,
} from './errors.js';
import { logInfo, logWarn } from './logger.js';
import { buildUpstreamQueries, matches } from '../processing/filters.js';
import { toCompanyRecord } from '../processing/company-mapper.js';
import { enrichRecords } from '../processing/enrichment.js';

/** Hard cap on records returned by one search. */
export const MAX_RESULTS = 10_000;

/** The registry refuses start_index values at or beyond this. */
export const UPSTREAM_INDEX_CEILING = 10_000;

export interface AggregateOptions {
  maxResults?: number;
  /** Wall-clock budget; once spent, the search returns what it has as truncated. */
  deadlineMs?: number;
  enrichmentConcurrency?: number;
  now?: () => number;
}

export type SearchErrorType =
  | 'validation'
  | 'auth_error'
  | 'upstream_unavailable'
  | 'parse_error';

export interface SearchError {
  type: SearchErrorType;
  message: string;
  pages_fetched?: number;
  records_collected?: number;
}

export type SearchEngineResult =
  | { success: true; result: AggregateResult }
  | { success: false; error: SearchError };

export function validateSearchCriteria(criteria: SearchCriteria): void {
  if (criteria.sic_codes.length === 0 && criteria.include_keywords.length === 0) {
    throw new ValidationError('At least one SIC code or include keyword is required');
  }
}

export async function aggregate(
  criteria: SearchCriteria,
  client: RegistryClient,
  options: AggregateOptions = {}
): Promise<AggregateResult> {
  const maxResults = options.maxResults ?? MAX_RESULTS;
  const now = options.now ?? Date.now;
  const deadline = options.deadlineMs !== undefined ? now() + options.deadlineMs : Infinity;

  const records: CompanyRecord[] = [];
  const seen = new Set<string>();
  let pagesFetched = 0;
  let truncated = false;

  const queries = buildUpstreamQueries(criteria);

  queryLoop:
  for (const query of queries) {
    let startIndex = 0;

    while (true) {
      if (records.length >= maxResults) {
        truncated = true;
        break queryLoop;
      }
      if (now() >= deadline) {
        logWarn(`Search deadline reached after ${pagesFetched} pages; returning ${records.length} records`);
        truncated = true;
        break queryLoop;
      }

      let page: RegistryPage;
      try {
        page = await client.fetchPage(query, startIndex);
      } catch (err) {
        const upstreamError = err instanceof Error ? err : new Error(String(err));
        throw new AggregationError(upstreamError, pagesFetched, records.length);
      }
      pagesFetched++;

      if (page.items.length === 0) break;

      let survivors: CompanyRecord[] = [];
      for (const item of page.items) {
        if (!item.company_number || seen.has(item.company_number)) continue;
        seen.add(item.company_number);
        if (matches(item, criteria)) {
          survivors.push(toCompanyRecord(item));
        }
      }

      const room = maxResults - records.length;
      if (survivors.length > room) {
        survivors = survivors.slice(0, room);
        truncated = true;
      }

      if (criteria.include_people && survivors.length > 0) {
        const enriched = await enrichRecords(client, survivors, {
          concurrency: options.enrichmentConcurrency,
          shouldStop: () => now() >= deadline,
        });
        if (enriched.length < survivors.length) {
          logWarn(
            `Search deadline reached while enriching; kept ${enriched.length} of ${survivors.length} records from this page`
          );
          records.push(...enriched);
          truncated = true;
          break queryLoop;
        }
        survivors = enriched;
      }
      records.push(...survivors);

      startIndex += page.items.length;
      logInfo(`Query ${describeQuery(query)}: fetched ${startIndex}/${page.total}, ${records.length} matched so far`);

      if (startIndex >= page.total) break;
      if (startIndex >= UPSTREAM_INDEX_CEILING) {
        // The registry will not page further; the remaining hits are unreachable
        truncated = true;
        break;
      }
    }
  }

  return { companies: records, count: records.length, truncated, pages_fetched: pagesFetched };
}

function describeQuery(query: RegistrySearchQuery): string {
  return Object.entries(query)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join('&');
}

function toSearchError(err: unknown): SearchError | null {
  if (err instanceof ValidationError) {
    return { type: 'validation', message: err.message };
  }
  if (!(err instanceof AggregationError)) return null;

  const progress = { pages_fetched: err.pagesFetched, records_collected: err.recordsCollected };
  const cause = err.upstreamError;
  if (cause instanceof AuthError) {
    return { type: 'auth_error', message: 'Companies House rejected the configured API key', ...progress };
  }
  if (cause instanceof DataParseError) {
    return { type: 'parse_error', message: err.message, ...progress };
  }
  // Exhausted rate-limit retries arrive here too, as UpstreamUnavailableError
  return { type: 'upstream_unavailable', message: err.message, ...progress };
}

/**
 * Validate, aggregate, and fold known failures into a typed error result.
 * Unexpected errors still throw.
 */
export async function executeSearchCore(
  criteria: SearchCriteria,
  client: RegistryClient,
  options: AggregateOptions = {}
): Promise<SearchEngineResult> {
  try {
    validateSearchCriteria(criteria);
    logInfo(
      `Search: sic=[${criteria.sic_codes.join(',')}] include=[${criteria.include_keywords.join(',')}] ` +
      `exclude=[${criteria.exclude_keywords.join(',')}] active_only=${criteria.active_only} ` +
      `exclude_ni=${criteria.exclude_northern_ireland} people=${criteria.include_people}`
    );
    const result = await aggregate(criteria, client, options);
    logInfo(`Search complete: ${result.count} companies from ${result.pages_fetched} pages${result.truncated ? ' (truncated)' : ''}`);
    return { success: true, result };
  } catch (err) {
    const error = toSearchError(err);
    if (error === null) throw err;
    logWarn(`Search failed (${error.type}): ${error.message}`);
    return { success: false, error };
  }
}
