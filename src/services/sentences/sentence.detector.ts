/**
 * Sentence detection using regex-based splitting.
 * A boundary is terminal punctuation, whitespace, then an uppercase letter.
 */

import type { SentenceSequence } from './sentence.types';

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z])/;

/**
 * Split text into sentences after collapsing all whitespace (line breaks
 * included) to single spaces.
 */
export function splitSentences(text: string): SentenceSequence {
  const normalized = text.replace(/\s+/g, ' ').trim();

  if (!normalized) {
    return [];
  }

  return normalized
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}
