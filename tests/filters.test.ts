import { describe, it, expect } from 'vitest';
import {
  buildUpstreamQueries,
  isNorthernIreland,
  matches,
  matchesSicCodes,
  nameContainsAny,
} from '../src/processing/filters.js';
import { makeCriteria, makeItem } from './helpers.js';

describe('nameContainsAny', () => {
  it('matches case-insensitive substrings', () => {
    expect(nameContainsAny('Northern Truck Parts Ltd', ['TRUCK'])).toBe(true);
    expect(nameContainsAny('Northern Truck Parts Ltd', ['van'])).toBe(false);
  });

  it('ignores empty keywords', () => {
    expect(nameContainsAny('Anything Ltd', [''])).toBe(false);
  });
});

describe('matchesSicCodes', () => {
  it('matches when any code is wanted', () => {
    expect(matchesSicCodes(['62012', '22110'], ['22110'])).toBe(true);
    expect(matchesSicCodes(['62012'], ['22110'])).toBe(false);
    expect(matchesSicCodes(undefined, ['22110'])).toBe(false);
  });
});

describe('matches', () => {
  it('keeps truck companies and drops car ones', () => {
    const criteria = makeCriteria({ include_keywords: ['truck'], exclude_keywords: ['car'] });
    expect(matches(makeItem({ company_name: 'ACME TRUCK SERVICES LTD', sic_codes: [] }), criteria)).toBe(true);
    expect(matches(makeItem({ company_name: 'TRUCK AND CAR REPAIRS LTD', sic_codes: [] }), criteria)).toBe(false);
    expect(matches(makeItem({ company_name: 'BUS DEPOT LTD', sic_codes: [] }), criteria)).toBe(false);
  });

  it('excludes by substring, so keywords hit inside longer words', () => {
    const criteria = makeCriteria({ sic_codes: ['22110'], exclude_keywords: ['car'] });
    expect(matches(makeItem({ company_name: 'CARDIFF TYRES LTD' }), criteria)).toBe(false);
  });

  it('accepts a SIC match or a keyword match', () => {
    const criteria = makeCriteria({ sic_codes: ['22110'], include_keywords: ['tyre'] });
    expect(matches(makeItem({ company_name: 'RUBBER GOODS LTD', sic_codes: ['22110'] }), criteria)).toBe(true);
    expect(matches(makeItem({ company_name: 'TYRE WORLD LTD', sic_codes: ['45111'] }), criteria)).toBe(true);
    expect(matches(makeItem({ company_name: 'SOFTWARE LTD', sic_codes: ['62012'] }), criteria)).toBe(false);
  });

  it('lets exclusion win over a SIC match', () => {
    const criteria = makeCriteria({ sic_codes: ['22110'], exclude_keywords: ['dormant'] });
    expect(matches(makeItem({ company_name: 'DORMANT TYRES LTD' }), criteria)).toBe(false);
  });

  it('drops inactive companies only when active_only is set', () => {
    const dissolved = makeItem({ company_status: 'dissolved' });
    expect(matches(dissolved, makeCriteria({ sic_codes: ['22110'] }))).toBe(false);
    expect(matches(dissolved, makeCriteria({ sic_codes: ['22110'], active_only: false }))).toBe(true);
  });

  it('drops Northern Ireland companies only when asked', () => {
    const belfast = makeItem({ company_number: 'NI123456' });
    expect(matches(belfast, makeCriteria({ sic_codes: ['22110'] }))).toBe(false);
    expect(matches(belfast, makeCriteria({ sic_codes: ['22110'], exclude_northern_ireland: false }))).toBe(true);
  });
});

describe('isNorthernIreland', () => {
  it('detects NI company number prefixes', () => {
    expect(isNorthernIreland(makeItem({ company_number: 'NI612345' }))).toBe(true);
    expect(isNorthernIreland(makeItem({ company_number: 'R0000123' }))).toBe(true);
    expect(isNorthernIreland(makeItem({ company_number: 'SC123456' }))).toBe(false);
  });

  it('detects the jurisdiction label', () => {
    expect(isNorthernIreland(makeItem({ jurisdiction: 'northern-ireland' }))).toBe(true);
    expect(isNorthernIreland(makeItem({ jurisdiction: 'england-wales' }))).toBe(false);
  });

  it('detects BT postcodes', () => {
    const item = makeItem({ registered_office_address: { postal_code: 'BT1 5GS', locality: 'Somewhere' } });
    expect(isNorthernIreland(item)).toBe(true);
  });

  it('detects BT postcodes written without a space or as an outward code', () => {
    for (const postal_code of ['BT11AA', 'bt289xy', 'BT7']) {
      const item = makeItem({ registered_office_address: { postal_code, locality: 'Somewhere' } });
      expect(isNorthernIreland(item)).toBe(true);
    }
  });

  it('does not mistake other postcodes for BT ones', () => {
    for (const postal_code of ['BTX 1AA', 'B1 1AA', 'BT1AA']) {
      const item = makeItem({ registered_office_address: { postal_code, locality: 'Somewhere' } });
      expect(isNorthernIreland(item)).toBe(false);
    }
  });

  it('detects the province or a place name in the address', () => {
    expect(isNorthernIreland(makeItem({
      registered_office_address: { address_line_1: '2 Quay Road', country: 'Northern Ireland' },
    }))).toBe(true);
    expect(isNorthernIreland(makeItem({
      registered_office_address: { locality: 'Newry', region: 'County Down' },
    }))).toBe(true);
  });

  it('does not flag Great Britain addresses', () => {
    expect(isNorthernIreland(makeItem())).toBe(false);
    expect(isNorthernIreland(makeItem({
      registered_office_address: { locality: 'Bangor', region: 'Gwynedd', postal_code: 'LL57 1UT' },
    }))).toBe(false);
  });

  it('matches place names as whole words only', () => {
    expect(isNorthernIreland(makeItem({
      registered_office_address: { locality: 'Downham Market', region: 'Norfolk' },
    }))).toBe(false);
  });
});

describe('buildUpstreamQueries', () => {
  it('issues one query per SIC code, then one per keyword', () => {
    const criteria = makeCriteria({ sic_codes: ['22110', '45111'], include_keywords: ['truck'] });
    expect(buildUpstreamQueries(criteria)).toEqual([
      { sic_codes: '22110', company_status: 'active' },
      { sic_codes: '45111', company_status: 'active' },
      { company_name_includes: 'truck', company_status: 'active' },
    ]);
  });

  it('leaves status out when all statuses are wanted', () => {
    const criteria = makeCriteria({ include_keywords: ['truck'], active_only: false });
    expect(buildUpstreamQueries(criteria)).toEqual([{ company_name_includes: 'truck' }]);
  });
});
