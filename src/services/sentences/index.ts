/**
 * Sentences module - sentence sequences used for proximity search.
 */

export { splitSentences } from './sentence.detector';
export type { SentenceSequence } from './sentence.types';
