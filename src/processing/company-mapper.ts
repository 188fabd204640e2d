/**
 * Flattens a registry search item into a CompanyRecord.
 */

import type { RegistryAddress, RegistryCompanyItem } from '../core/registry-client.js';
import type { CompanyRecord, PeopleSummary } from '../core/types.js';
import { getSicDescription } from './sic-codes.js';

const COMPANY_PAGE_BASE = 'https://find-and-update.company-information.service.gov.uk/company';

export const EMPTY_PEOPLE_SUMMARY: PeopleSummary = {
  directors_count: null,
  directors_names: '',
  psc_count: null,
  psc_names: '',
  psc_control: '',
  likely_chain: '',
};

export function formatAddress(address: RegistryAddress | undefined): string {
  if (!address) return '';
  return [
    address.address_line_1,
    address.address_line_2,
    address.locality,
    address.region,
    address.postal_code,
    address.country,
  ]
    .filter((part): part is string => Boolean(part && part.trim()))
    .join(', ');
}

export function toCompanyRecord(item: RegistryCompanyItem): CompanyRecord {
  const address: RegistryAddress = item.registered_office_address ?? {};
  const sicCodes = item.sic_codes ?? [];
  const accounts = item.accounts;
  const confirmation = item.confirmation_statement;

  return {
    company_number: item.company_number,
    company_name: item.company_name,
    company_status: item.company_status ?? '',
    company_type: item.company_type ?? '',
    date_of_creation: item.date_of_creation ?? '',
    date_of_cessation: item.date_of_cessation ?? '',
    jurisdiction: item.jurisdiction ?? '',
    sic_codes: sicCodes.join(', '),
    sic_descriptions: sicCodes.map(code => getSicDescription(code) ?? 'Unknown').join(', '),
    full_address: formatAddress(address),
    address_line_1: address.address_line_1 ?? '',
    address_line_2: address.address_line_2 ?? '',
    locality: address.locality ?? '',
    region: address.region ?? '',
    postal_code: address.postal_code ?? '',
    country: address.country ?? '',
    accounts_overdue: accounts?.overdue ?? null,
    last_accounts_date: accounts?.last_accounts?.made_up_to ?? '',
    last_accounts_type: accounts?.last_accounts?.type ?? '',
    next_accounts_due: accounts?.next_due ?? accounts?.next_accounts?.due_on ?? '',
    next_accounts_overdue: accounts?.next_accounts?.overdue ?? null,
    confirmation_statement_last: confirmation?.last_made_up_to ?? '',
    confirmation_statement_next_due: confirmation?.next_due ?? '',
    confirmation_statement_overdue: confirmation?.overdue ?? null,
    has_charges: item.has_charges ?? null,
    has_insolvency_history: item.has_insolvency_history ?? null,
    has_been_liquidated: item.has_been_liquidated ?? null,
    is_community_interest_company: item.company_subtype !== undefined
      ? item.company_subtype === 'community-interest-company'
      : null,
    registered_office_in_dispute: item.registered_office_is_in_dispute ?? null,
    undeliverable_address: item.undeliverable_registered_office_address ?? null,
    previous_names: (item.previous_company_names ?? []).map(p => p.name).join('; '),
    companies_house_url: `${COMPANY_PAGE_BASE}/${encodeURIComponent(item.company_number)}`,
    ...EMPTY_PEOPLE_SUMMARY,
  };
}
