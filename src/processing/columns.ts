import type { ColumnDefinition } from '../core/types.js';

/**
 * Exportable company fields, in default display order.
 * `truncate` marks long free-text columns that tables should clip.
 */
export const COLUMN_DEFINITIONS: readonly ColumnDefinition[] = [
  { key: 'company_number', label: 'Company Number', truncate: false },
  { key: 'company_name', label: 'Company Name', truncate: false },
  { key: 'company_status', label: 'Status', truncate: false },
  { key: 'company_type', label: 'Type', truncate: false },
  { key: 'date_of_creation', label: 'Date Created', truncate: false },
  { key: 'date_of_cessation', label: 'Date Ceased', truncate: false },
  { key: 'jurisdiction', label: 'Jurisdiction', truncate: false },
  { key: 'sic_codes', label: 'SIC Codes', truncate: false },
  { key: 'sic_descriptions', label: 'SIC Descriptions', truncate: true },
  { key: 'full_address', label: 'Full Address', truncate: true },
  { key: 'address_line_1', label: 'Address Line 1', truncate: false },
  { key: 'address_line_2', label: 'Address Line 2', truncate: false },
  { key: 'locality', label: 'City/Town', truncate: false },
  { key: 'region', label: 'Region', truncate: false },
  { key: 'postal_code', label: 'Postcode', truncate: false },
  { key: 'country', label: 'Country', truncate: false },
  { key: 'accounts_overdue', label: 'Accounts Overdue', truncate: false },
  { key: 'last_accounts_date', label: 'Last Accounts Date', truncate: false },
  { key: 'last_accounts_type', label: 'Accounts Type', truncate: false },
  { key: 'next_accounts_due', label: 'Next Accounts Due', truncate: false },
  { key: 'next_accounts_overdue', label: 'Next Accounts Overdue', truncate: false },
  { key: 'confirmation_statement_last', label: 'Last Confirmation', truncate: false },
  { key: 'confirmation_statement_next_due', label: 'Next Confirmation Due', truncate: false },
  { key: 'confirmation_statement_overdue', label: 'Confirmation Overdue', truncate: false },
  { key: 'has_charges', label: 'Has Charges', truncate: false },
  { key: 'has_insolvency_history', label: 'Insolvency History', truncate: false },
  { key: 'has_been_liquidated', label: 'Been Liquidated', truncate: false },
  { key: 'is_community_interest_company', label: 'CIC', truncate: false },
  { key: 'registered_office_in_dispute', label: 'Address Disputed', truncate: false },
  { key: 'undeliverable_address', label: 'Undeliverable Address', truncate: false },
  { key: 'previous_names', label: 'Previous Names', truncate: true },
  { key: 'companies_house_url', label: 'Companies House URL', truncate: false },
  { key: 'directors_count', label: 'Directors Count', truncate: false },
  { key: 'directors_names', label: 'Directors Names', truncate: true },
  { key: 'psc_count', label: 'Owners Count', truncate: false },
  { key: 'psc_names', label: 'Owners Names', truncate: true },
  { key: 'psc_control', label: 'Control Type', truncate: true },
  { key: 'likely_chain', label: 'Likely Chain', truncate: false },
];

export const PEOPLE_COLUMNS: readonly string[] = [
  'directors_count', 'directors_names', 'psc_count', 'psc_names', 'psc_control', 'likely_chain',
];

export const DEFAULT_EXPORT_COLUMNS: readonly string[] = [
  'company_number', 'company_name', 'company_status', 'sic_codes', 'full_address', 'postal_code',
];

const LABELS = new Map<string, string>(COLUMN_DEFINITIONS.map(c => [c.key, c.label]));
const TRUNCATED = new Set<string>(COLUMN_DEFINITIONS.filter(c => c.truncate).map(c => c.key));

export function getColumnLabel(key: string): string | null {
  return LABELS.get(key) ?? null;
}

export function isTruncatedColumn(key: string): boolean {
  return TRUNCATED.has(key);
}
