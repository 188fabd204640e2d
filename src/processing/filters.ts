/**
 * Filter engine: pure predicates over raw registry items.
 *
 * Top-level rule: (SIC match OR include-keyword match) AND NOT exclude match,
 * then the status and geography switches. Keyword matching is a
 * case-insensitive substring test against the company name.
 */

import type { RegistryCompanyItem, RegistrySearchQuery } from '../core/registry-client.js';
import type { SearchCriteria } from '../core/types.js';

// Company number prefixes issued by the Northern Ireland registry
const NI_COMPANY_NUMBER_PREFIXES = ['NI', 'R0'];

const NI_JURISDICTIONS = new Set(['northern-ireland', 'northern ireland']);

// BT is the only postcode area covering Northern Ireland; the space is optional
const NI_POSTCODE = /^BT\d{1,2}(\s|\d[A-Z]{2}$|$)/i;

// Counties and principal towns, matched as whole words on locality/region.
// "Down" and "Derry" only count with a county qualifier; Bangor is left out (Wales has one too).
const NI_PLACE_NAMES = [
  'BELFAST', 'ANTRIM', 'ARMAGH', 'FERMANAGH', 'TYRONE', 'LONDONDERRY',
  'COUNTY DOWN', 'CO DOWN', 'CO. DOWN', 'COUNTY DERRY', 'CO DERRY', 'CO. DERRY',
  'LISBURN', 'NEWRY', 'CRAIGAVON', 'BALLYMENA', 'NEWTOWNABBEY',
  'ENNISKILLEN', 'OMAGH', 'COLERAINE', 'PORTADOWN', 'DUNGANNON',
];

const NI_PLACE_PATTERN = new RegExp(
  `(^|[^A-Z])(${NI_PLACE_NAMES.map(escapeRegExp).join('|')})(?![A-Z])`,
);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** True when any keyword is a case-insensitive substring of the name. */
export function nameContainsAny(name: string, keywords: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return keywords.some(k => k.length > 0 && lower.includes(k.toLowerCase()));
}

export function matchesSicCodes(itemCodes: readonly string[] | undefined, wanted: readonly string[]): boolean {
  if (!itemCodes || itemCodes.length === 0) return false;
  const wantedSet = new Set(wanted);
  return itemCodes.some(code => wantedSet.has(code.trim()));
}

export function isActive(item: RegistryCompanyItem): boolean {
  return (item.company_status ?? '').trim().toLowerCase() === 'active';
}

/**
 * Northern Ireland heuristics: registry number prefix, jurisdiction label,
 * BT postcode, or an address that names the province or one of its places.
 */
export function isNorthernIreland(item: RegistryCompanyItem): boolean {
  const companyNumber = item.company_number.trim().toUpperCase();
  if (NI_COMPANY_NUMBER_PREFIXES.some(prefix => companyNumber.startsWith(prefix))) {
    return true;
  }

  if (item.jurisdiction && NI_JURISDICTIONS.has(item.jurisdiction.trim().toLowerCase())) {
    return true;
  }

  const address = item.registered_office_address;
  if (!address) return false;

  if (address.postal_code && NI_POSTCODE.test(address.postal_code.trim())) {
    return true;
  }

  const allParts = [
    address.address_line_1,
    address.address_line_2,
    address.locality,
    address.region,
    address.country,
  ].filter(Boolean).join(' ').toUpperCase();
  if (allParts.includes('NORTHERN IRELAND')) {
    return true;
  }

  const place = [address.locality, address.region].filter(Boolean).join(' ').toUpperCase();
  return NI_PLACE_PATTERN.test(place);
}

export function matches(item: RegistryCompanyItem, criteria: SearchCriteria): boolean {
  const name = item.company_name;
  const hasSic = criteria.sic_codes.length > 0;
  const hasInclude = criteria.include_keywords.length > 0;

  if (hasSic || hasInclude) {
    const sicMatch = hasSic && matchesSicCodes(item.sic_codes, criteria.sic_codes);
    const includeMatch = hasInclude && nameContainsAny(name, criteria.include_keywords);
    if (!sicMatch && !includeMatch) return false;
  }

  if (criteria.exclude_keywords.length > 0 && nameContainsAny(name, criteria.exclude_keywords)) {
    return false;
  }

  if (criteria.active_only && !isActive(item)) {
    return false;
  }

  if (criteria.exclude_northern_ireland && isNorthernIreland(item)) {
    return false;
  }

  return true;
}

/**
 * Upstream queries covering the criteria: one per SIC code, then one per
 * include keyword. Status is pushed upstream too, but `matches` still checks it.
 */
export function buildUpstreamQueries(criteria: SearchCriteria): RegistrySearchQuery[] {
  const status: RegistrySearchQuery = criteria.active_only ? { company_status: 'active' } : {};
  const queries: RegistrySearchQuery[] = [];

  for (const code of criteria.sic_codes) {
    queries.push({ sic_codes: code, ...status });
  }
  for (const keyword of criteria.include_keywords) {
    queries.push({ company_name_includes: keyword, ...status });
  }

  return queries;
}
