import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * SIC 2007 reference list, loaded from data/sic-codes.json.
 * In dev (tsx): src/processing → ../../data; in dist: dist/processing → ../../data.
 */

export interface SicCode {
  code: string;
  description: string;
}

const sicCodeListSchema = z.array(z.object({
  code: z.string().regex(/^\d{5}$/),
  description: z.string(),
}));

const SIC_CODES_PATH = new URL('../../data/sic-codes.json', import.meta.url);

let sicCodes: SicCode[] | null = null;
let sicDescriptions: Map<string, string> | null = null;

export function getAllSicCodes(): SicCode[] {
  if (sicCodes === null) {
    const raw: unknown = JSON.parse(readFileSync(SIC_CODES_PATH, 'utf-8'));
    sicCodes = sicCodeListSchema.parse(raw).sort((a, b) => a.code.localeCompare(b.code));
  }
  return sicCodes;
}

export function getSicDescription(code: string): string | null {
  if (sicDescriptions === null) {
    sicDescriptions = new Map(getAllSicCodes().map(s => [s.code, s.description]));
  }
  return sicDescriptions.get(code) ?? null;
}

/** Case-insensitive match on code prefix or description text. */
export function searchSicCodes(query: string): SicCode[] {
  const q = query.trim().toLowerCase();
  if (!q) return getAllSicCodes();
  return getAllSicCodes().filter(s => s.code.startsWith(q) || s.description.toLowerCase().includes(q));
}
