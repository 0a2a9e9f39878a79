/**
 * Types shared by the resolution pipeline and its HTTP surface.
 */

import type { AcronymToken } from '../acronyms';

export type LearnedSource = 'learned' | 'user';

export type CandidateSource =
  | 'document'
  | 'canonical'
  | 'none'
  | LearnedSource
  | `pack-${string}`
  | `web:${string}`;

export interface Candidate {
  definition: string;
  /** Confidence in [0, 1] */
  confidence: number;
  source: CandidateSource;
}

/**
 * One acronym's outcome. `candidates` is never empty and
 * `candidates[chosenIndex]` carries the same definition, confidence and source.
 */
export interface ResolutionResult {
  term: AcronymToken;
  definition: string;
  confidence: number;
  source: CandidateSource;
  note?: string;
  excerpt?: string;
  candidates: Candidate[];
  chosenIndex: number;
}

export interface ExtractionResponse {
  acronyms: ResolutionResult[];
}

export function isWebSource(source: CandidateSource): boolean {
  return source.startsWith('web:');
}

export function isLearnedSource(source: CandidateSource): source is LearnedSource {
  return source === 'learned' || source === 'user';
}
