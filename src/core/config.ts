import dotenv from 'dotenv';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface RegistryConfig {
  apiKey: string;
  baseUrl: string;
  pageSize: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  rateLimitRequests: number;
  rateLimitWindowMs: number;
  requestTimeoutMs: number;
}

export interface SearchConfig {
  deadlineMs: number;
  enrichmentConcurrency: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
}

export interface AppConfig {
  registry: RegistryConfig;
  search: SearchConfig;
  server: ServerConfig;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const DEFAULT_BASE_URL = 'https://api.company-information.service.gov.uk';
const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://127.0.0.1:3000', 'http://localhost:8080'];

function envInt(env: Env, key: string, fallback: number, min: number = 1): number {
  const val = env[key];
  if (val === undefined || val.trim() === '') return fallback;
  const parsed = Number(val);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

function envList(env: Env, key: string, fallback: string[]): string[] {
  const val = env[key];
  if (val === undefined || val.trim() === '') return fallback;
  return val.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Build the application config from an environment map.
 * Numeric values that fail to parse fall back to their defaults.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() ?? 'info';

  return {
    registry: {
      apiKey: env.COMPANIES_HOUSE_API_KEY?.trim() ?? '',
      baseUrl: (env.COMPANIES_HOUSE_BASE_URL?.trim() || DEFAULT_BASE_URL).replace(/\/+$/, ''),
      pageSize: Math.min(envInt(env, 'ITEMS_PER_PAGE', 500), 5000),
      maxRetries: envInt(env, 'MAX_RETRIES', 3),
      retryBaseDelayMs: envInt(env, 'RETRY_BASE_DELAY_MS', 1000, 0),
      rateLimitRequests: envInt(env, 'RATE_LIMIT_REQUESTS', 600),
      rateLimitWindowMs: envInt(env, 'RATE_LIMIT_WINDOW_MS', 5 * 60 * 1000),
      requestTimeoutMs: envInt(env, 'REQUEST_TIMEOUT_MS', 30_000),
    },
    search: {
      deadlineMs: envInt(env, 'SEARCH_DEADLINE_MS', 120_000),
      enrichmentConcurrency: Math.min(envInt(env, 'ENRICHMENT_CONCURRENCY', 5), 10),
    },
    server: {
      port: envInt(env, 'PORT', 8000),
      host: env.HOST?.trim() || '0.0.0.0',
      corsOrigins: envList(env, 'CORS_ORIGINS', DEFAULT_CORS_ORIGINS),
    },
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}

/** Load `.env` into process.env, then read the config from it. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}

export function requireApiKey(config: AppConfig): string {
  if (!config.registry.apiKey) {
    throw new ConfigError('COMPANIES_HOUSE_API_KEY', 'an API key is required to query Companies House');
  }
  return config.registry.apiKey;
}
