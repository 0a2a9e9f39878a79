/**
 * Turns raw knowledge-source text into a clean expansion phrase.
 *
 * Order: reject disambiguation prose, accept a title whose initials spell the
 * acronym, look for a cue phrase in the first sentence, then search token
 * windows whose initials spell the acronym. An empty string means "drop it".
 */

import {
  NORMALIZED_PHRASE_MAX_WORDS,
  NORMALIZED_PHRASE_MIN_WORDS,
  SLIDING_WINDOW_MAX_TOKENS,
} from '../../config/constants';
import { initials, splitWords, trimPunctuation } from '../acronyms';
import type { KnowledgeSnippet } from './knowledge.types';

const DISAMBIGUATION = /may refer to|list of|disambiguation/i;

const CUE_PATTERNS: readonly RegExp[] = [
  /\bstands for\s+([^.,;:()]+)/i,
  /\b(?:is|was)\s+(?:an?|the)\s+([^.,;:()]+)/i,
  /\b(?:acronym|abbreviation|short)\s+for\s+([^.,;:()]+)/i,
  /\bmeaning\s+([^.,;:()]+)/i,
];

const MAX_WINDOW_SOURCE_TOKENS = 60;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function stripHtml(text: string): string {
  return collapseWhitespace(text.replace(/<[^>]*>/g, ' ').replace(/&quot;/g, '"').replace(/&amp;/g, '&'));
}

export function firstSentence(text: string): string {
  const [sentence] = text.split(/(?<=[.!?])\s+/);
  return sentence ?? '';
}

function isAllCaps(text: string): boolean {
  return /[A-Z]/.test(text) && text === text.toUpperCase();
}

function titleShortcut(acronym: string, title: string | undefined): string {
  if (!title) return '';

  // "Sar (radar)" -> "Sar"
  const cleaned = trimPunctuation(collapseWhitespace(title.replace(/\s*\([^)]*\)\s*$/, '')));
  if (!cleaned || isAllCaps(cleaned)) return '';

  return initials(cleaned) === acronym ? cleaned : '';
}

function cuePhrase(acronym: string, sentence: string): string {
  for (const cue of CUE_PATTERNS) {
    const match = cue.exec(sentence);
    if (!match) continue;

    const phrase = trimPunctuation(collapseWhitespace(match[1]));
    const words = splitWords(phrase).length;
    const phraseInitials = initials(phrase);

    if (
      words >= NORMALIZED_PHRASE_MIN_WORDS &&
      words <= NORMALIZED_PHRASE_MAX_WORDS &&
      phraseInitials.length > 0 &&
      phraseInitials.includes(acronym)
    ) {
      return phrase;
    }
  }

  return '';
}

/**
 * Longest run of at most eight tokens whose initials equal the acronym;
 * ties go to the run with more tokens.
 */
export function slidingWindowPhrase(acronym: string, text: string): string {
  const tokens = splitWords(text)
    .slice(0, MAX_WINDOW_SOURCE_TOKENS)
    .map(trimPunctuation)
    .filter((token) => token.length > 0);

  let best = '';
  let bestTokens = 0;

  for (let start = 0; start < tokens.length; start++) {
    const maxSize = Math.min(SLIDING_WINDOW_MAX_TOKENS, tokens.length - start);
    for (let size = 1; size <= maxSize; size++) {
      const phrase = tokens.slice(start, start + size).join(' ');
      if (initials(phrase) !== acronym) continue;

      if (phrase.length > best.length || (phrase.length === best.length && size > bestTokens)) {
        best = phrase;
        bestTokens = size;
      }
    }
  }

  return best;
}

export function isDisambiguation(snippet: Pick<KnowledgeSnippet, 'text' | 'title'>): boolean {
  return DISAMBIGUATION.test(snippet.text) || (snippet.title ? DISAMBIGUATION.test(snippet.title) : false);
}

export function normalizeDefinition(
  acronym: string,
  snippet: Pick<KnowledgeSnippet, 'text' | 'title'>
): string {
  const target = acronym.toUpperCase();
  const raw = collapseWhitespace(snippet.text);

  if (!raw && !snippet.title) return '';
  if (isDisambiguation(snippet)) return '';

  const fromTitle = titleShortcut(target, snippet.title);
  if (fromTitle) return fromTitle;

  const sentence = firstSentence(raw);
  const fromCue = cuePhrase(target, sentence);
  if (fromCue) return fromCue;

  return slidingWindowPhrase(target, raw);
}
