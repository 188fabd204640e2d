import { z } from 'zod';
import { RateLimiter } from './rate-limiter.js';
import {
  AuthError,
  DataParseError,
  RateLimitError,
  RegistryApiError,
  UpstreamUnavailableError,
} from './errors.js';
import { logDebug, logWarn } from './logger.js';
import type { RegistryConfig } from './config.js';

/**
 * Companies House public data API client.
 *
 * Endpoints used:
 * - /advanced-search/companies for paginated company search
 * - /company/{number}/officers
 * - /company/{number}/persons-with-significant-control
 *
 * Requests share one token bucket (600 req / 5 min by default). 429 responses
 * are retried with backoff, honouring Retry-After; 5xx and network failures
 * are retried with exponential backoff. Nothing is cached.
 */

// ── Upstream response shapes ──────────────────────────────────────────

const addressSchema = z.object({
  address_line_1: z.string().optional(),
  address_line_2: z.string().optional(),
  locality: z.string().optional(),
  region: z.string().optional(),
  postal_code: z.string().optional(),
  country: z.string().optional(),
});

const companyItemSchema = z.object({
  company_number: z.string(),
  company_name: z.string().default(''),
  company_status: z.string().optional(),
  company_type: z.string().optional(),
  company_subtype: z.string().optional(),
  date_of_creation: z.string().optional(),
  date_of_cessation: z.string().optional(),
  jurisdiction: z.string().optional(),
  sic_codes: z.array(z.string()).optional(),
  registered_office_address: addressSchema.optional(),
  accounts: z.object({
    overdue: z.boolean().optional(),
    next_due: z.string().optional(),
    last_accounts: z.object({
      made_up_to: z.string().optional(),
      type: z.string().optional(),
    }).optional(),
    next_accounts: z.object({
      due_on: z.string().optional(),
      overdue: z.boolean().optional(),
    }).optional(),
  }).optional(),
  confirmation_statement: z.object({
    last_made_up_to: z.string().optional(),
    next_due: z.string().optional(),
    overdue: z.boolean().optional(),
  }).optional(),
  has_charges: z.boolean().optional(),
  has_insolvency_history: z.boolean().optional(),
  has_been_liquidated: z.boolean().optional(),
  registered_office_is_in_dispute: z.boolean().optional(),
  undeliverable_registered_office_address: z.boolean().optional(),
  previous_company_names: z.array(z.object({ name: z.string() })).optional(),
});

const searchResponseSchema = z.object({
  hits: z.number().default(0),
  items: z.array(companyItemSchema).default([]),
});

const officerSchema = z.object({
  name: z.string().default(''),
  officer_role: z.string().default(''),
  appointed_on: z.string().optional(),
  resigned_on: z.string().optional(),
});

const officerListSchema = z.object({
  items: z.array(officerSchema).default([]),
});

const pscSchema = z.object({
  name: z.string().optional(),
  kind: z.string().optional(),
  natures_of_control: z.array(z.string()).optional(),
  ceased_on: z.string().optional(),
  ceased: z.boolean().optional(),
});

const pscListSchema = z.object({
  items: z.array(pscSchema).default([]),
});

export type RegistryAddress = z.infer<typeof addressSchema>;
export type RegistryCompanyItem = z.infer<typeof companyItemSchema>;
export type RegistryOfficer = z.infer<typeof officerSchema>;
export type RegistryPsc = z.infer<typeof pscSchema>;

// ── Client interface ──────────────────────────────────────────────────

/** Advanced-search filters sent upstream. Unset keys are omitted. */
export interface RegistrySearchQuery {
  sic_codes?: string;
  company_name_includes?: string;
  company_status?: string;
}

export interface RegistryPage {
  items: RegistryCompanyItem[];
  /** Total hits the upstream reports for the query. */
  total: number;
}

export interface RegistryClient {
  fetchPage(query: RegistrySearchQuery, startIndex: number): Promise<RegistryPage>;
  getOfficers(companyNumber: string): Promise<RegistryOfficer[]>;
  getPersonsWithSignificantControl(companyNumber: string): Promise<RegistryPsc[]>;
}

export interface RegistryClientOptions {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  rateLimiter?: RateLimiter;
}

const PEOPLE_PAGE_SIZE = 100;

export class CompaniesHouseClient implements RegistryClient {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly rateLimiter: RateLimiter;
  private readonly authHeader: string;

  constructor(private readonly config: RegistryConfig, options: RegistryClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(config.rateLimitRequests, config.rateLimitWindowMs);
    // API key goes in as the basic-auth user name with an empty password
    this.authHeader = `Basic ${Buffer.from(`${config.apiKey}:`).toString('base64')}`;
  }

  async fetchPage(query: RegistrySearchQuery, startIndex: number): Promise<RegistryPage> {
    const params: Record<string, string | undefined> = {
      ...query,
      size: String(this.config.pageSize),
      start_index: String(startIndex),
    };
    // 404: no companies match; 416: start_index past the end
    const json = await this.fetchJson('/advanced-search/companies', params, [404, 416]);
    if (json === null) return { items: [], total: 0 };

    const parsed = searchResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new DataParseError(
        `Unexpected search response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        '/advanced-search/companies'
      );
    }
    return { items: parsed.data.items, total: parsed.data.hits };
  }

  async getOfficers(companyNumber: string): Promise<RegistryOfficer[]> {
    const path = `/company/${encodeURIComponent(companyNumber)}/officers`;
    const json = await this.fetchJson(path, { items_per_page: String(PEOPLE_PAGE_SIZE) }, [404]);
    if (json === null) return [];

    const parsed = officerListSchema.safeParse(json);
    if (!parsed.success) {
      throw new DataParseError(`Unexpected officers response for ${companyNumber}`, path);
    }
    return parsed.data.items;
  }

  async getPersonsWithSignificantControl(companyNumber: string): Promise<RegistryPsc[]> {
    const path = `/company/${encodeURIComponent(companyNumber)}/persons-with-significant-control`;
    const json = await this.fetchJson(path, { items_per_page: String(PEOPLE_PAGE_SIZE) }, [404]);
    if (json === null) return [];

    const parsed = pscListSchema.safeParse(json);
    if (!parsed.success) {
      throw new DataParseError(`Unexpected PSC response for ${companyNumber}`, path);
    }
    return parsed.data.items;
  }

  private buildUrl(path: string, params: Record<string, string | undefined>): string {
    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== '') url.searchParams.set(key, value);
    }
    return url.toString();
  }

  /**
   * GET a JSON document. Returns null when the status is one of `emptyStatuses`.
   */
  private async fetchJson(
    path: string,
    params: Record<string, string | undefined>,
    emptyStatuses: number[]
  ): Promise<unknown> {
    const url = this.buildUrl(path, params);
    const maxRetries = this.config.maxRetries;
    let lastError: RegistryApiError | null = null;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const isLastAttempt = attempt === maxRetries - 1;
      await this.rateLimiter.acquire();

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: {
            'Authorization': this.authHeader,
            'Accept': 'application/json',
          },
          signal: AbortSignal.timeout(this.config.requestTimeoutMs),
        });
      } catch (err) {
        lastError = new UpstreamUnavailableError(
          `Network error fetching ${url}: ${err instanceof Error ? err.message : String(err)}`,
          0,
          url
        );
        logWarn(`${lastError.message} (attempt ${attempt + 1}/${maxRetries})`);
        if (!isLastAttempt) await this.sleep(this.backoffMs(attempt));
        continue;
      }

      if (response.ok) {
        const body = await response.text();
        logDebug(`GET ${url} -> ${response.status}`);
        try {
          return JSON.parse(body);
        } catch {
          throw new DataParseError(`Failed to parse Companies House response from ${path}.`, url);
        }
      }

      if (emptyStatuses.includes(response.status)) {
        return null;
      }

      if (response.status === 401 || response.status === 403) {
        throw new AuthError(url, response.status);
      }

      if (response.status === 429) {
        const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
        lastError = new RateLimitError(url, retryAfterMs);
        const waitMs = Math.max(this.backoffMs(attempt), retryAfterMs ?? 0);
        logWarn(`Rate limited by Companies House, waiting ${Math.round(waitMs / 1000)}s (attempt ${attempt + 1}/${maxRetries})`);
        if (!isLastAttempt) await this.sleep(waitMs);
        continue;
      }

      if (response.status >= 500) {
        lastError = new UpstreamUnavailableError(
          `Companies House server error: ${response.status}`,
          response.status,
          url
        );
        logWarn(`${lastError.message} (attempt ${attempt + 1}/${maxRetries})`);
        if (!isLastAttempt) await this.sleep(this.backoffMs(attempt));
        continue;
      }

      throw new UpstreamUnavailableError(
        `Companies House API error: ${response.status} ${response.statusText}`,
        response.status,
        url
      );
    }

    throw new UpstreamUnavailableError(
      `Companies House unavailable after ${maxRetries} attempts: ${lastError?.message ?? 'no response'}`,
      lastError?.statusCode ?? 0,
      url,
      lastError
    );
  }

  /** Exponential backoff with jitter: base, 2x base, 4x base, ... */
  private backoffMs(attempt: number): number {
    const base = this.config.retryBaseDelayMs * Math.pow(2, attempt);
    const jitter = Math.random() * (this.config.retryBaseDelayMs / 2);
    return base + jitter;
  }
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10) * 1000;
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
