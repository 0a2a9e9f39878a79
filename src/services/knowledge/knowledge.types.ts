/**
 * Types for external knowledge lookup.
 */

import type { Result } from '../../utils/result';
import type { Candidate, CandidateSource } from '../resolution/resolution.types';

export interface LookupHints {
  /** Extra search term, e.g. "radar" for an ambiguous `SAR` */
  keyword?: string;
  /** Two-letter language code for language-specific sources (default `en`) */
  language?: string;
  /** Restricts glossary packs to the named domain */
  domain?: string;
}

export interface LookupOptions extends LookupHints {
  limit?: number;
  /** Keep only candidates whose initials spell the acronym exactly */
  strict?: boolean;
}

/** Raw text returned by a source before normalization. */
export interface KnowledgeSnippet {
  text: string;
  /** Page or entry title, when the source has one */
  title?: string;
  source: CandidateSource;
  baseScore: number;
}

export type SourceFailureKind = 'timeout' | 'network' | 'rate-limited' | 'http' | 'malformed';

export interface SourceFailure {
  kind: SourceFailureKind;
  status?: number;
  message: string;
}

export type SourceResult = Result<KnowledgeSnippet[], SourceFailure>;

export interface KnowledgeSource {
  readonly name: string;
  query(term: string, hints: LookupHints): Promise<SourceResult>;
}

export interface CachedLookup {
  candidates: Candidate[];
  /** Epoch milliseconds of the write */
  storedAt: number;
}

export interface ResponseCache {
  get(key: string): Promise<CachedLookup | null>;
  set(key: string, candidates: Candidate[]): Promise<void>;
}

/** Anything that can produce ranked web candidates for an acronym. */
export interface CandidateLookup {
  lookup(acronym: string, contextText: string, options?: LookupOptions): Promise<Candidate[]>;
}
