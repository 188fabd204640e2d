/**
 * Core data model.
 *
 * - Records are built once per upstream item and never mutated afterwards
 * - Every field is always present, so exports have a uniform shape
 * - Flags the registry did not report are null, not false
 */

export interface SearchCriteria {
  sic_codes: string[];
  include_keywords: string[];
  exclude_keywords: string[];
  active_only: boolean;
  exclude_northern_ireland: boolean;
  include_people: boolean;
}

export type CellValue = string | number | boolean | null;

// A type alias rather than an interface so records stay assignable to ExportRow.
export type CompanyRecord = Readonly<{
  company_number: string;
  company_name: string;
  company_status: string;
  company_type: string;
  date_of_creation: string;
  date_of_cessation: string;
  jurisdiction: string;
  sic_codes: string;
  sic_descriptions: string;
  full_address: string;
  address_line_1: string;
  address_line_2: string;
  locality: string;
  region: string;
  postal_code: string;
  country: string;
  accounts_overdue: boolean | null;
  last_accounts_date: string;
  last_accounts_type: string;
  next_accounts_due: string;
  next_accounts_overdue: boolean | null;
  confirmation_statement_last: string;
  confirmation_statement_next_due: string;
  confirmation_statement_overdue: boolean | null;
  has_charges: boolean | null;
  has_insolvency_history: boolean | null;
  has_been_liquidated: boolean | null;
  is_community_interest_company: boolean | null;
  registered_office_in_dispute: boolean | null;
  undeliverable_address: boolean | null;
  previous_names: string;
  companies_house_url: string;
  directors_count: number | null;
  directors_names: string;
  psc_count: number | null;
  psc_names: string;
  psc_control: string;
  likely_chain: string;
}>;

export type PeopleSummary = Pick<
  CompanyRecord,
  'directors_count' | 'directors_names' | 'psc_count' | 'psc_names' | 'psc_control' | 'likely_chain'
>;

export type ExportRow = Readonly<Record<string, CellValue | undefined>>;

export interface ExportSpec {
  companies: readonly ExportRow[];
  columns: readonly string[];
  column_names: Readonly<Record<string, string>>;
}

export type ExportFormat = 'csv' | 'xlsx';

export interface ExportFile {
  data: Buffer;
  contentType: string;
  filename: string;
}

export interface AggregateResult {
  companies: CompanyRecord[];
  count: number;
  truncated: boolean;
  pages_fetched: number;
}

export interface ColumnDefinition {
  key: keyof CompanyRecord;
  label: string;
  truncate: boolean;
}
