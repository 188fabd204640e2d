/**
 * Shared serialization helpers for the web API layer.
 * Converts engine results to JSON-safe objects and maps error types to HTTP status codes.
 */

import type { AggregateResult } from '../core/types.js';

// ── Error Mapping ─────────────────────────────────────────────────────

const ERROR_STATUS_MAP: Record<string, number> = {
  validation: 400,
  empty_export: 400,
  auth_error: 502,
  parse_error: 502,
  upstream_unavailable: 503,
};

export function errorToHttpStatus(errorType: string): number {
  return ERROR_STATUS_MAP[errorType] ?? 500;
}

export function errorBody(type: string, message: string) {
  return { error: { type, message } };
}

// ── Result Serializers ────────────────────────────────────────────────

export function serializeSearchResult(r: AggregateResult) {
  return {
    companies: r.companies,
    count: r.count,
    truncated: r.truncated,
  };
}
