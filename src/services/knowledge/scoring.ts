/**
 * Confidence for web candidates: the source's own base score, a contextual
 * score from initials and shared domain keywords, and a final initials boost.
 */

import {
  BOOSTED_CONFIDENCE_CAP,
  CONTEXT_KEYWORDS,
  CONTEXT_KEYWORD_BONUS,
  CONTEXT_WINDOW_LENGTH,
  EXACT_INITIALS_BOOST,
  PARTIAL_INITIALS_BOOST,
} from '../../config/constants';
import { initials } from '../acronyms';

export type InitialsMatch = 'exact' | 'partial' | 'none';

export function classifyInitials(acronym: string, definition: string): InitialsMatch {
  const target = acronym.toUpperCase();
  const phraseInitials = initials(definition);

  if (!phraseInitials) return 'none';
  if (phraseInitials === target) return 'exact';
  if (phraseInitials.includes(target) || target.includes(phraseInitials)) return 'partial';
  return 'none';
}

const ALIGNMENT_BONUS: Record<InitialsMatch, number> = { exact: 1.0, partial: 0.7, none: 0 };
const FINAL_BOOST: Record<InitialsMatch, number> = {
  exact: EXACT_INITIALS_BOOST,
  partial: PARTIAL_INITIALS_BOOST,
  none: 0,
};

function contextWindow(contextText: string): string {
  return contextText
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .join(' ')
    .slice(0, CONTEXT_WINDOW_LENGTH);
}

/**
 * 0.5 + 0.3 * initials alignment + 0.04 per domain keyword found in both the
 * candidate and the document context, clamped to [0.1, 0.9].
 */
export function contextualScore(acronym: string, definition: string, contextText: string): number {
  const text = definition.trim();
  if (!text) return 0;

  const context = contextWindow(contextText);
  const lowered = text.toLowerCase();
  const sharedKeywords = CONTEXT_KEYWORDS.filter(
    (keyword) => context.includes(keyword) && lowered.includes(keyword)
  ).length;

  const score =
    0.5 + 0.3 * ALIGNMENT_BONUS[classifyInitials(acronym, text)] + CONTEXT_KEYWORD_BONUS * sharedKeywords;
  return Math.max(0.1, Math.min(0.9, score));
}

export function boostConfidence(acronym: string, definition: string, confidence: number): number {
  const boost = FINAL_BOOST[classifyInitials(acronym, definition)];
  return Math.min(BOOSTED_CONFIDENCE_CAP, confidence + boost);
}
