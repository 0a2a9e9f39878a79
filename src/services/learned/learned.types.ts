import type { AcronymToken } from '../acronyms';
import type { LearnedSource } from '../resolution/resolution.types';

export interface LearnedEntry {
  term: AcronymToken;
  definition: string;
  source: LearnedSource;
  confidence: number;
  updatedAt: Date;
}

/**
 * Persistent user-confirmed definitions, one per term. Implementations report
 * failures as `null` / `false` rather than throwing.
 */
export interface LearnedStore {
  get(term: AcronymToken): Promise<LearnedEntry | null>;
  set(
    term: AcronymToken,
    definition: string,
    source: LearnedSource,
    confidence: number
  ): Promise<boolean>;
}
