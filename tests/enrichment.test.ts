import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  classifyLikelyChain,
  enrich,
  enrichRecords,
  summarizeDirectors,
  summarizePscs,
} from '../src/processing/enrichment.js';
import { toCompanyRecord } from '../src/processing/company-mapper.js';
import { UpstreamUnavailableError } from '../src/core/errors.js';
import { setLogLevel } from '../src/core/logger.js';
import { StubRegistryClient, makeItem } from './helpers.js';

describe('summarizeDirectors', () => {
  it('counts current directors only', () => {
    const summary = summarizeDirectors([
      { name: 'SMITH, Jane', officer_role: 'director' },
      { name: 'JONES, Tom', officer_role: 'director', resigned_on: '2020-01-01' },
      { name: 'BROWN, Ann', officer_role: 'secretary' },
      { name: 'NOMINEES LTD', officer_role: 'corporate-nominee-director' },
    ]);
    expect(summary).toEqual({ count: 2, names: 'SMITH, Jane; NOMINEES LTD' });
  });
});

describe('summarizePscs', () => {
  it('skips ceased owners and dedupes control types', () => {
    const summary = summarizePscs([
      { name: 'Mrs Jane Smith', natures_of_control: ['ownership-of-shares-25-to-50-percent'] },
      { name: 'Mr Tom Jones', natures_of_control: ['ownership-of-shares-25-to-50-percent', 'voting-rights-25-to-50-percent'] },
      { name: 'Old Owner', ceased_on: '2019-05-01', natures_of_control: ['right-to-appoint-and-remove-directors'] },
    ]);
    expect(summary).toEqual({
      count: 2,
      names: 'Mrs Jane Smith; Mr Tom Jones',
      control: 'ownership-of-shares-25-to-50-percent; voting-rights-25-to-50-percent',
    });
  });
});

describe('classifyLikelyChain', () => {
  it('flags corporate owners', () => {
    expect(classifyLikelyChain('Tyre Holdings Limited')).toBe('Yes');
    expect(classifyLikelyChain('Mrs Jane Smith; Mr Tom Jones')).toBe('No');
    expect(classifyLikelyChain('')).toBe('Unknown');
  });

  it('matches markers as whole words', () => {
    expect(classifyLikelyChain('Mr Vincent Corpse')).toBe('No');
  });
});

describe('enrich', () => {
  it('combines officers and owners', async () => {
    const client = new StubRegistryClient();
    client.getOfficers.mockResolvedValue([{ name: 'SMITH, Jane', officer_role: 'director' }]);
    client.getPersonsWithSignificantControl.mockResolvedValue([
      { name: 'Smith Group Ltd', natures_of_control: ['ownership-of-shares-75-to-100-percent'] },
    ]);

    expect(await enrich(client, '00000001')).toEqual({
      directors_count: 1,
      directors_names: 'SMITH, Jane',
      psc_count: 1,
      psc_names: 'Smith Group Ltd',
      psc_control: 'ownership-of-shares-75-to-100-percent',
      likely_chain: 'Yes',
    });
  });
});

describe('enrichRecords', () => {
  afterEach(() => {
    setLogLevel('silent');
    vi.restoreAllMocks();
  });

  it('isolates a failed lookup to its own record', async () => {
    const client = new StubRegistryClient();
    client.getOfficers.mockImplementation(async (companyNumber: string) => {
      if (companyNumber === '00000002') {
        throw new UpstreamUnavailableError('Companies House server error: 503', 503, 'https://example.com');
      }
      return [{ name: `DIRECTOR ${companyNumber}`, officer_role: 'director' }];
    });
    const warn = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');

    const records = ['00000001', '00000002', '00000003'].map(n => toCompanyRecord(makeItem({ company_number: n })));
    const enriched = await enrichRecords(client, records);

    expect(enriched.map(r => r.company_number)).toEqual(['00000001', '00000002', '00000003']);
    expect(enriched.map(r => r.directors_count)).toEqual([1, null, 1]);
    expect(enriched[1].directors_names).toBe('');
    expect(enriched[1].likely_chain).toBe('');
    expect(enriched[2].directors_names).toBe('DIRECTOR 00000003');
    expect(enriched[2].likely_chain).toBe('Unknown');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain(
      'Enrichment failed for 00000002: Companies House server error: 503'
    );
  });

  it('respects the batch size', async () => {
    const client = new StubRegistryClient();
    let inFlight = 0;
    let peak = 0;
    client.getOfficers.mockImplementation(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
      return [];
    });

    const records = Array.from({ length: 7 }, (_, i) => toCompanyRecord(makeItem({ company_number: `0000000${i}` })));
    const enriched = await enrichRecords(client, records, { concurrency: 3 });

    expect(enriched).toHaveLength(7);
    expect(peak).toBe(3);
    expect(client.getOfficers).toHaveBeenCalledTimes(7);
  });

  it('stops before the next batch once told to', async () => {
    const client = new StubRegistryClient();
    let batches = 0;
    const records = Array.from({ length: 6 }, (_, i) => toCompanyRecord(makeItem({ company_number: `0000000${i}` })));

    const enriched = await enrichRecords(client, records, {
      concurrency: 2,
      shouldStop: () => batches++ >= 2,
    });

    expect(enriched.map(r => r.company_number)).toEqual(['00000000', '00000001', '00000002', '00000003']);
    expect(client.getOfficers).toHaveBeenCalledTimes(4);
  });

  it('leaves the input records untouched', async () => {
    const client = new StubRegistryClient();
    const records = [toCompanyRecord(makeItem())];
    const enriched = await enrichRecords(client, records);
    expect(records[0].directors_count).toBeNull();
    expect(enriched[0].directors_count).toBe(0);
    expect(enriched[0]).not.toBe(records[0]);
  });
});
