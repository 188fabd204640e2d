/**
 * Officer and PSC enrichment.
 *
 * Two extra upstream calls per company, so it only runs when a search asks
 * for people data. A failed lookup blanks that company's people fields and
 * the search carries on.
 */

import type { RegistryClient, RegistryOfficer, RegistryPsc } from '../core/registry-client.js';
import type { CompanyRecord, PeopleSummary } from '../core/types.js';
import { logWarn } from '../core/logger.js';
import { EMPTY_PEOPLE_SUMMARY } from './company-mapper.js';

const DIRECTOR_ROLES = new Set([
  'director',
  'corporate-director',
  'nominee-director',
  'corporate-nominee-director',
]);

// Owner names carrying these markers are companies, which suggests a group
const CORPORATE_MARKERS = [
  'ltd', 'limited', 'plc', 'group', 'holdings',
  'llp', 'inc', 'corporation', 'corp', 'partners',
  'capital', 'investments', 'enterprises',
];

const CORPORATE_PATTERN = new RegExp(`\\b(${CORPORATE_MARKERS.join('|')})\\b`, 'i');

export const NAME_SEPARATOR = '; ';

export function summarizeDirectors(officers: readonly RegistryOfficer[]): { count: number; names: string } {
  const active = officers.filter(o => DIRECTOR_ROLES.has(o.officer_role) && !o.resigned_on);
  return {
    count: active.length,
    names: active.map(o => o.name.trim()).filter(Boolean).join(NAME_SEPARATOR),
  };
}

export function summarizePscs(pscs: readonly RegistryPsc[]): { count: number; names: string; control: string } {
  const current = pscs.filter(p => !p.ceased_on && p.ceased !== true);
  const names = current.map(p => (p.name ?? '').trim()).filter(Boolean);
  const control = new Set<string>();
  for (const p of current) {
    for (const nature of p.natures_of_control ?? []) control.add(nature);
  }
  return {
    count: current.length,
    names: names.join(NAME_SEPARATOR),
    control: Array.from(control).join(NAME_SEPARATOR),
  };
}

/** 'Yes' when any owner looks like a company, 'Unknown' with no named owners. */
export function classifyLikelyChain(pscNames: string): string {
  const names = pscNames.split(';').map(n => n.trim()).filter(Boolean);
  if (names.length === 0) return 'Unknown';
  return names.some(n => CORPORATE_PATTERN.test(n)) ? 'Yes' : 'No';
}

export async function enrich(client: RegistryClient, companyNumber: string): Promise<PeopleSummary> {
  const [officers, pscs] = await Promise.all([
    client.getOfficers(companyNumber),
    client.getPersonsWithSignificantControl(companyNumber),
  ]);

  const directors = summarizeDirectors(officers);
  const owners = summarizePscs(pscs);

  return {
    directors_count: directors.count,
    directors_names: directors.names,
    psc_count: owners.count,
    psc_names: owners.names,
    psc_control: owners.control,
    likely_chain: classifyLikelyChain(owners.names),
  };
}

export interface EnrichOptions {
  concurrency?: number;
  /** Checked before each batch; once true, the remaining records are left out. */
  shouldStop?: () => boolean;
}

/**
 * Enrich records in fixed-size batches. Returns new records in input order,
 * possibly fewer than given when `shouldStop` ends the run early.
 */
export async function enrichRecords(
  client: RegistryClient,
  records: readonly CompanyRecord[],
  options: EnrichOptions = {}
): Promise<CompanyRecord[]> {
  const concurrency = Math.max(1, options.concurrency ?? 5);
  const enriched: CompanyRecord[] = [];

  for (let batch = 0; batch < records.length; batch += concurrency) {
    if (options.shouldStop?.()) break;
    const batchRecords = records.slice(batch, batch + concurrency);
    const batchResults = await Promise.all(batchRecords.map(async (record): Promise<CompanyRecord> => {
      try {
        const people = await enrich(client, record.company_number);
        return { ...record, ...people };
      } catch (err) {
        logWarn(
          `Enrichment failed for ${record.company_number}: ${err instanceof Error ? err.message : String(err)}`
        );
        return { ...record, ...EMPTY_PEOPLE_SUMMARY };
      }
    }));
    enriched.push(...batchResults);
  }

  return enriched;
}
