/**
 * Initials alignment: how plausibly a phrase expands an acronym.
 *
 * Every resolver validates and ranks expansions through this score, so the
 * matcher, the glossary scanner and the knowledge lookup agree on what
 * "Synthetic Aperture Radar" is worth for `SAR`.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type { AlignedSpan } from './acronym.types';

const PREFIX_WEIGHT = 0.6;
const EDIT_WEIGHT = 0.4;
const VERBOSITY_PENALTY_PER_WORD = 0.02;
const VERBOSITY_PENALTY_CAP = 0.2;

const SURROUNDING_PUNCTUATION = /^[\s.;:,()[\]"'“”‘’–—-]+|[\s.;:,()[\]"'“”‘’–—-]+$/g;

/** First character of each alphanumeric run, uppercased. */
export function initials(phrase: string): string {
  const tokens = phrase.match(/[A-Za-z0-9]+/g) ?? [];
  return tokens.map((token) => token[0].toUpperCase()).join('');
}

export function splitWords(phrase: string): string[] {
  return phrase.split(/\s+/).filter((word) => word.length > 0);
}

export function trimPunctuation(phrase: string): string {
  return phrase.replace(SURROUNDING_PUNCTUATION, '');
}

function levenshteinSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  return maxLen > 0 ? 1 - levenshteinDistance(a, b) / maxLen : 1.0;
}

function leadingMatchCount(a: string, b: string): number {
  const limit = Math.min(a.length, b.length);
  let count = 0;
  while (count < limit && a[count] === b[count]) {
    count++;
  }
  return count;
}

/**
 * Score in [0, 1]: 60% shared leading initials, 40% edit similarity of the
 * initials string, minus a small penalty for phrases much longer than the acronym.
 */
export function initialsAlignmentScore(acronym: string, phrase: string): number {
  const phraseInitials = initials(phrase);
  if (!phraseInitials) return 0;

  const target = acronym.toUpperCase();
  const prefix = leadingMatchCount(target, phraseInitials) / Math.max(1, target.length);
  const edit = levenshteinSimilarity(target, phraseInitials);
  const score = PREFIX_WEIGHT * prefix + EDIT_WEIGHT * edit;

  const surplusWords = splitWords(phrase).length - target.length;
  const penalty = Math.min(
    VERBOSITY_PENALTY_CAP,
    Math.max(0, surplusWords * VERBOSITY_PENALTY_PER_WORD)
  );

  return Math.max(0, Math.min(1, score - penalty));
}

/**
 * Narrow a captured phrase to its best-aligned run of words.
 *
 * `anchor: 'end'` keeps suffixes (long form written before the acronym, where a
 * lazy capture may start too early); `anchor: 'start'` keeps prefixes (long form
 * written after it, where a greedy capture runs on). Longer spans win ties.
 */
export function bestAlignedSpan(
  acronym: string,
  phrase: string,
  anchor: 'start' | 'end'
): AlignedSpan {
  const words = splitWords(phrase);
  let best: AlignedSpan = { phrase: '', score: 0 };

  for (let size = words.length; size >= 1; size--) {
    const span = anchor === 'end' ? words.slice(words.length - size) : words.slice(0, size);
    const candidate = trimPunctuation(span.join(' '));
    if (!candidate) continue;

    const score = initialsAlignmentScore(acronym, candidate);
    if (!best.phrase || score > best.score) {
      best = { phrase: candidate, score };
    }
  }

  return best;
}
