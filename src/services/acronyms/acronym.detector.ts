/**
 * Acronym detection using regex-based token matching.
 * Handles plurals, possessives and dotted forms (A.I. -> AI).
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { AcronymToken, StoplistPolicy } from './acronym.types';

const ACRONYM_PATTERN = /\b([A-Z][A-Z0-9]{1,9}(?:[-/][A-Z0-9]{2,9})?)s?\b/g;
const DOTTED_PATTERN = /\b((?:[A-Z]\.){2,}[A-Z]?)(?![A-Za-z0-9])/g;
const ACRONYM_CELL_PATTERN = /^([A-Z][A-Z0-9]{1,9}(?:[-/][A-Z0-9]{2,9})?)s?$/;
const POSSESSIVE_SUFFIX = /['’]s$/;
const PLURAL_SUFFIX = /(?<=[A-Z0-9])s$/;

const STOPLIST: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL('../../data/stoplist.json', import.meta.url), 'utf8')))
);

export const FILTER_COMMON_TERMS: StoplistPolicy = { enabled: true };
export const INCLUDE_COMMON_TERMS: StoplistPolicy = { enabled: false };

export function isStoplisted(term: AcronymToken): boolean {
  return STOPLIST.has(term);
}

/**
 * Fold a raw acronym-like token to its canonical form: possessive and a single
 * plural `s` after a capital removed, dots removed, uppercased. Applying it
 * twice changes nothing.
 */
export function normalizeAcronym(raw: string): AcronymToken {
  return raw
    .trim()
    .replace(POSSESSIVE_SUFFIX, '')
    .replace(PLURAL_SUFFIX, '')
    .replace(/\./g, '')
    .toUpperCase();
}

function accepts(term: AcronymToken, policy: StoplistPolicy): boolean {
  if (term.length < 2) return false;
  return !(policy.enabled && isStoplisted(term));
}

/**
 * Find acronyms in text. Returns each acronym once, in order of first appearance.
 */
export function detectAcronyms(
  text: string,
  policy: StoplistPolicy = INCLUDE_COMMON_TERMS
): AcronymToken[] {
  if (!text.trim()) {
    return [];
  }

  const matches: Array<{ index: number; raw: string }> = [];

  for (const match of text.matchAll(ACRONYM_PATTERN)) {
    matches.push({ index: match.index ?? 0, raw: match[1] });
  }
  for (const match of text.matchAll(DOTTED_PATTERN)) {
    matches.push({ index: match.index ?? 0, raw: match[1] });
  }

  matches.sort((a, b) => a.index - b.index);

  const seen = new Set<AcronymToken>();
  const found: AcronymToken[] = [];

  for (const { raw } of matches) {
    const term = normalizeAcronym(raw);
    if (!accepts(term, policy) || seen.has(term)) continue;
    seen.add(term);
    found.push(term);
  }

  return found;
}

/**
 * Normalized acronym when the whole cell is a single acronym-shaped token
 * (`SAR`, `SARs`, `TCP/IP`), otherwise null.
 */
export function matchAcronymCell(
  cell: string,
  policy: StoplistPolicy = INCLUDE_COMMON_TERMS
): AcronymToken | null {
  const match = ACRONYM_CELL_PATTERN.exec(cell.trim());
  if (!match) return null;

  const term = normalizeAcronym(match[1]);
  return accepts(term, policy) ? term : null;
}
