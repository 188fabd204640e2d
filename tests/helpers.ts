import { vi } from 'vitest';
import type {
  RegistryClient,
  RegistryCompanyItem,
  RegistryOfficer,
  RegistryPage,
  RegistryPsc,
  RegistrySearchQuery,
} from '../src/core/registry-client.js';
import type { SearchCriteria } from '../src/core/types.js';

export function makeItem(overrides: Partial<RegistryCompanyItem> = {}): RegistryCompanyItem {
  return {
    company_number: '01234567',
    company_name: 'EXAMPLE TRADING LTD',
    company_status: 'active',
    company_type: 'ltd',
    sic_codes: ['22110'],
    registered_office_address: {
      address_line_1: '1 High Street',
      locality: 'Leeds',
      postal_code: 'LS1 1AA',
      country: 'England',
    },
    ...overrides,
  };
}

export function makeCriteria(overrides: Partial<SearchCriteria> = {}): SearchCriteria {
  return {
    sic_codes: [],
    include_keywords: [],
    exclude_keywords: [],
    active_only: true,
    exclude_northern_ireland: true,
    include_people: false,
    ...overrides,
  };
}

/**
 * In-memory RegistryClient. Pages are served per query key
 * (the SIC code or name keyword) in order; start_index picks the page.
 */
export class StubRegistryClient implements RegistryClient {
  readonly fetchPage = vi.fn(async (query: RegistrySearchQuery, startIndex: number): Promise<RegistryPage> => {
    const key = query.sic_codes ?? query.company_name_includes ?? '';
    const pages = this.pages.get(key) ?? [];
    const total = pages.reduce((sum, p) => sum + p.length, 0);
    let offset = 0;
    for (const page of pages) {
      if (offset === startIndex) return { items: page, total };
      offset += page.length;
    }
    return { items: [], total };
  });

  readonly getOfficers = vi.fn(async (_companyNumber: string): Promise<RegistryOfficer[]> => []);

  readonly getPersonsWithSignificantControl = vi.fn(async (_companyNumber: string): Promise<RegistryPsc[]> => []);

  constructor(private readonly pages: Map<string, RegistryCompanyItem[][]> = new Map()) {}
}
