/**
 * Types for acronym detection and scoring.
 */

/** Normalized uppercase acronym, e.g. `SAR`, `COVID-19`, `AI` (from `A.I.`). */
export type AcronymToken = string;

/**
 * Whether the common-term stoplist is applied during a run.
 * `enabled: true` drops stoplisted terms such as `JAN` or `PDF`.
 */
export interface StoplistPolicy {
  enabled: boolean;
}

export interface AlignedSpan {
  phrase: string;
  score: number;
}
