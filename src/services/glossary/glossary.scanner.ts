/**
 * Glossary scanning over tables and free text.
 *
 * Tables: a two-column "ACR | Long form" row (either orientation) or a cell
 * that itself reads "Long form (ACR)". Free text: every "Long form (ACR)" and
 * "ACR (Long form)" in the document, regardless of sentence boundaries.
 */

import {
  bestAlignedSpan,
  matchAcronymCell,
  normalizeAcronym,
  trimPunctuation,
  type AcronymToken,
  type StoplistPolicy,
} from '../acronyms';
import type { DocumentSource } from '../documents/document.types';
import type { GlossaryMap } from './glossary.types';

const LONG_FORM_BEFORE = /\b([A-Z][a-z][\w ,./&'-]+?)\s*\(\s*([A-Z][A-Z0-9]{1,9})\s*\)/g;
const LONG_FORM_AFTER = /\b([A-Z][A-Z0-9]{1,9})\s*\(\s*([A-Z][a-z][\w ,./&'-]+?)\s*\)/g;

const MIN_DEFINITION_LENGTH = 3;
const CELL_SEPARATOR = ' | ';

function record(glossary: GlossaryMap, term: AcronymToken, definition: string): void {
  if (term.length < 2 || !definition || glossary.has(term)) return;
  glossary.set(term, definition);
}

/**
 * Collect "Long form (ACR)" and "ACR (Long form)" pairs across the whole text.
 */
export function scanGlobal(text: string): GlossaryMap {
  const glossary: GlossaryMap = new Map();

  for (const match of text.matchAll(LONG_FORM_BEFORE)) {
    const term = normalizeAcronym(match[2]);
    const { phrase } = bestAlignedSpan(term, trimPunctuation(match[1]), 'end');
    record(glossary, term, phrase);
  }

  for (const match of text.matchAll(LONG_FORM_AFTER)) {
    record(glossary, normalizeAcronym(match[1]), trimPunctuation(match[2]));
  }

  return glossary;
}

function scanColumnPair(
  glossary: GlossaryMap,
  cells: string[],
  policy: StoplistPolicy
): void {
  const [first, second] = cells;

  for (const [acronymCell, definitionCell] of [
    [first, second],
    [second, first],
  ]) {
    const term = matchAcronymCell(acronymCell, policy);
    if (term && definitionCell.length >= MIN_DEFINITION_LENGTH) {
      record(glossary, term, definitionCell);
    }
  }
}

/**
 * Build a glossary from table rows. Column pairs are read before the
 * parenthetical scan of the joined row.
 */
export function scanTables(rows: string[][], policy: StoplistPolicy): GlossaryMap {
  const glossary: GlossaryMap = new Map();

  for (const row of rows) {
    const cells = row.map((cell) => cell.trim()).filter((cell) => cell.length > 0);
    if (cells.length === 0) continue;

    if (cells.length >= 2) {
      scanColumnPair(glossary, cells, policy);
    }

    for (const [term, definition] of scanGlobal(cells.join(CELL_SEPARATOR))) {
      record(glossary, term, definition);
    }
  }

  return glossary;
}

/**
 * Table mappings first, then the free-text scan; an acronym keeps the first
 * expansion found.
 */
export function buildGlossary(document: DocumentSource, policy: StoplistPolicy): GlossaryMap {
  const glossary = scanTables(document.tableRows, policy);

  for (const [term, definition] of scanGlobal(document.fullText)) {
    record(glossary, term, definition);
  }

  return glossary;
}
