/**
 * Request body schemas for the web API.
 * Parsing applies the wire defaults, so handlers receive complete criteria.
 */

import { z, type ZodError } from 'zod';

const keywordList = z
  .array(z.string())
  .nullish()
  .transform(list => (list ?? []).map(k => k.trim()).filter(k => k.length > 0));

const sicCodeList = z
  .array(z.string().trim().regex(/^\d{5}$/, 'SIC codes must be 5 digits'))
  .nullish()
  .transform(list => Array.from(new Set(list ?? [])));

export const searchRequestSchema = z.object({
  sic_codes: sicCodeList,
  include_keywords: keywordList,
  exclude_keywords: keywordList,
  active_only: z.boolean().default(true),
  exclude_northern_ireland: z.boolean().default(true),
  include_people: z.boolean().default(false),
});

const cellValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const exportRequestSchema = z.object({
  companies: z.array(z.record(z.string(), cellValue.optional())),
  columns: z.array(z.string().min(1)).min(1).optional(),
  column_names: z.record(z.string(), z.string()).default({}),
});

export type SearchRequest = z.infer<typeof searchRequestSchema>;
export type ExportRequest = z.infer<typeof exportRequestSchema>;

export function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`)
    .join('; ');
}
