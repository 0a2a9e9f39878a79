/**
 * Types for sentence splitting.
 */

/**
 * Ordered, trimmed sentences of one document. Index order defines proximity
 * for definition search; built once per document and never mutated.
 */
export type SentenceSequence = readonly string[];
