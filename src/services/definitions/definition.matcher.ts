/**
 * In-document definition matching.
 *
 * Looks at the first sentence that mentions the acronym and its neighbours for
 * structural definitions ("Long Form (ACR)", "ACR (Long Form)", "ACR - Long
 * Form", "ACR stands for Long Form"), then falls back to the words that follow
 * the acronym when their initials, taken as a whole, line up.
 */

import {
  DOCUMENT_PATTERN_SCORES,
  FALLBACK_ALIGNMENT_THRESHOLD,
  FALLBACK_BASE_CONFIDENCE,
  FALLBACK_CONFIDENCE_CAP,
  FALLBACK_CONFIDENCE_SLOPE,
  FALLBACK_LOOKAHEAD_SENTENCES,
  FALLBACK_MAX_WORDS,
  PATTERN_ALIGNMENT_THRESHOLD,
  PATTERN_CONFIDENCE_CAP,
  SHORT_ACRONYM_LENGTH,
} from '../../config/constants';
import { bestAlignedSpan, initialsAlignmentScore, splitWords, trimPunctuation } from '../acronyms';
import type { SentenceSequence } from '../sentences';
import type { DefinitionPattern, DocumentMatch } from './definition.types';

// Long forms start with a capitalised word so another acronym is never taken as one
const LONG_FORM_LAZY = "[A-Z][a-z][\\w ,./&'-]+?";
const LONG_FORM_GREEDY = "[A-Z][a-z][\\w ,./&'-]+";

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

function buildPatterns(acronym: string): DefinitionPattern[] {
  const acr = escapeRegExp(acronym);

  return [
    {
      name: 'longFormThenAcronym',
      regex: new RegExp(`\\b(${LONG_FORM_LAZY})\\s*\\(\\s*${acr}\\s*\\)`),
      baseScore: DOCUMENT_PATTERN_SCORES.longFormThenAcronym,
      anchor: 'end',
    },
    {
      name: 'acronymThenLongForm',
      regex: new RegExp(`\\b${acr}\\s*\\(\\s*(${LONG_FORM_LAZY})\\s*\\)`),
      baseScore: DOCUMENT_PATTERN_SCORES.acronymThenLongForm,
      anchor: 'start',
    },
    {
      name: 'acronymDashLongForm',
      regex: new RegExp(`\\b${acr}\\s*[-:–—]\\s*(${LONG_FORM_GREEDY})`),
      baseScore: DOCUMENT_PATTERN_SCORES.acronymDashLongForm,
      anchor: 'start',
    },
    {
      name: 'acronymStandsFor',
      regex: new RegExp(`\\b${acr}\\s*,?\\s*(?:short for|stands for)\\s+(${LONG_FORM_GREEDY})`, 'i'),
      baseScore: DOCUMENT_PATTERN_SCORES.acronymStandsFor,
      anchor: 'start',
    },
  ];
}

function searchWindow(sentences: SentenceSequence, index: number, span: number): string {
  const start = Math.max(0, index - span);
  const end = Math.min(sentences.length, index + span + 1);
  return sentences.slice(start, end).join(' ');
}

function matchPatterns(acronym: string, window: string): DocumentMatch | null {
  for (const pattern of buildPatterns(acronym)) {
    const match = pattern.regex.exec(window);
    if (!match) continue;

    const { phrase, score: alignment } = bestAlignedSpan(
      acronym,
      trimPunctuation(match[1]),
      pattern.anchor
    );
    if (!phrase) continue;

    if (alignment >= PATTERN_ALIGNMENT_THRESHOLD || acronym.length <= SHORT_ACRONYM_LENGTH) {
      return {
        phrase,
        confidence: Math.min(PATTERN_CONFIDENCE_CAP, pattern.baseScore * (0.8 + 0.2 * alignment)),
        excerpt: window,
      };
    }
  }

  return null;
}

function matchFollowingWords(
  acronym: string,
  sentences: SentenceSequence,
  index: number
): DocumentMatch | null {
  const sentence = sentences[index];
  const context = sentences.slice(index, index + 1 + FALLBACK_LOOKAHEAD_SENTENCES).join(' ');
  const position = sentence.indexOf(acronym);
  const tail = trimPunctuation(context.slice(position + acronym.length));
  const words = splitWords(tail).slice(0, FALLBACK_MAX_WORDS);

  if (words.length === 0) {
    return null;
  }

  const phrase = trimPunctuation(words.join(' '));
  const alignment = initialsAlignmentScore(acronym, phrase);
  if (!phrase || alignment < FALLBACK_ALIGNMENT_THRESHOLD) {
    return null;
  }

  return {
    phrase,
    confidence: Math.min(
      FALLBACK_CONFIDENCE_CAP,
      FALLBACK_BASE_CONFIDENCE + FALLBACK_CONFIDENCE_SLOPE * (alignment - FALLBACK_ALIGNMENT_THRESHOLD)
    ),
    excerpt: context.trim(),
  };
}

/**
 * Find a definition for the acronym around its first mention.
 * Only the first sentence containing the acronym is examined.
 */
export function findDefinitionInText(
  acronym: string,
  sentences: SentenceSequence
): DocumentMatch | null {
  const index = sentences.findIndex((sentence) => sentence.includes(acronym));
  if (index === -1) {
    return null;
  }

  return (
    matchPatterns(acronym, searchWindow(sentences, index, 1)) ??
    matchFollowingWords(acronym, sentences, index)
  );
}
