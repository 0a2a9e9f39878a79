import { z } from 'zod';
import { normalizeAcronym } from '../services/acronyms';
import type { DocumentSource } from '../services/documents';

const booleanParam = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

export const lookupOptionsSchema = z.object({
  keyword: z.string().trim().min(1).max(100).optional(),
  language: z
    .string()
    .trim()
    .regex(/^[a-zA-Z]{2,3}$/, 'Expected a two or three letter language code')
    .optional(),
  domain: z.string().trim().min(1).max(50).optional(),
  strict: booleanParam.optional(),
  limit: z.coerce.number().int().min(1).max(20).optional(),
});

export const extractionOptionsSchema = lookupOptionsSchema.extend({
  includeCommon: booleanParam.optional(),
  web: booleanParam.optional(),
});

export const textDocumentSchema = z.object({
  text: z.string().max(2_000_000).default(''),
  tables: z.array(z.array(z.string())).default([]),
});

export const termSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9][A-Za-z0-9.'’/-]{1,23}$/, 'Not an acronym')
  .transform(normalizeAcronym);

export function toDocumentSource(input: z.infer<typeof textDocumentSchema>): DocumentSource {
  return { fullText: input.text, tableRows: input.tables };
}

/** Request body as a plain record; anything else reads as empty. */
export function bodyFields(body: unknown): Record<string, unknown> {
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
}
