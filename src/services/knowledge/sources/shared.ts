import type { z } from 'zod';
import { failure, success, type Result } from '../../../utils/result';
import type { JsonResult } from '../http';
import type { LookupHints, SourceFailure } from '../knowledge.types';

/** The slice of the HTTP client a source needs; tests supply a scripted one. */
export interface JsonFetcher {
  getJson(url: string, params?: Record<string, string>): Promise<JsonResult>;
}

export const DEFAULT_LANGUAGE = 'en';

export function languageOf(hints: LookupHints): string {
  const language = hints.language?.toLowerCase() ?? '';
  return /^[a-z]{2,3}$/.test(language) ? language : DEFAULT_LANGUAGE;
}

export function searchQuery(term: string, hints: LookupHints): string {
  return hints.keyword ? `${term} ${hints.keyword}` : term;
}

export function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  result: JsonResult
): Result<T, SourceFailure> {
  if (!result.ok) {
    return result;
  }

  const parsed = schema.safeParse(result.value);
  if (!parsed.success) {
    return failure<SourceFailure>({
      kind: 'malformed',
      message: parsed.error.issues[0]?.message ?? 'Unexpected response shape',
    });
  }
  return success(parsed.data);
}
