import { describe, it, expect } from 'vitest';
import { loadConfig, requireApiKey } from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});
    expect(config.registry).toEqual({
      apiKey: '',
      baseUrl: 'https://api.company-information.service.gov.uk',
      pageSize: 500,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      rateLimitRequests: 600,
      rateLimitWindowMs: 300_000,
      requestTimeoutMs: 30_000,
    });
    expect(config.search).toEqual({ deadlineMs: 120_000, enrichmentConcurrency: 5 });
    expect(config.server.port).toBe(8000);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.server.corsOrigins).toEqual([
      'http://localhost:3000',
      'http://127.0.0.1:3000',
      'http://localhost:8080',
    ]);
    expect(config.logLevel).toBe('info');
  });

  it('reads overrides', () => {
    const config = loadConfig({
      COMPANIES_HOUSE_API_KEY: ' test-secret ',
      COMPANIES_HOUSE_BASE_URL: 'http://localhost:9999/',
      ITEMS_PER_PAGE: '100',
      RETRY_BASE_DELAY_MS: '0',
      PORT: '8080',
      CORS_ORIGINS: 'https://a.example, https://b.example',
      LOG_LEVEL: 'DEBUG',
    });
    expect(config.registry.apiKey).toBe('test-secret');
    expect(config.registry.baseUrl).toBe('http://localhost:9999');
    expect(config.registry.pageSize).toBe(100);
    expect(config.registry.retryBaseDelayMs).toBe(0);
    expect(config.server.port).toBe(8080);
    expect(config.server.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.logLevel).toBe('debug');
  });

  it('falls back to defaults for invalid values', () => {
    const config = loadConfig({ PORT: 'eighty', MAX_RETRIES: '0', LOG_LEVEL: 'verbose' });
    expect(config.server.port).toBe(8000);
    expect(config.registry.maxRetries).toBe(3);
    expect(config.logLevel).toBe('info');
  });

  it('caps page size and enrichment concurrency', () => {
    const config = loadConfig({ ITEMS_PER_PAGE: '9000', ENRICHMENT_CONCURRENCY: '50' });
    expect(config.registry.pageSize).toBe(5000);
    expect(config.search.enrichmentConcurrency).toBe(10);
  });
});

describe('requireApiKey', () => {
  it('returns the key when set', () => {
    expect(requireApiKey(loadConfig({ COMPANIES_HOUSE_API_KEY: 'test-secret' }))).toBe('test-secret');
  });

  it('throws ConfigError when missing', () => {
    expect(() => requireApiKey(loadConfig({}))).toThrow(ConfigError);
  });
});
