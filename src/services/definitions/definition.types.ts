/**
 * Types for in-document definition matching.
 */

export interface DocumentMatch {
  /** The expansion as written in the document */
  phrase: string;
  /** Confidence in [0, 1] */
  confidence: number;
  /** Surrounding sentences the phrase was found in */
  excerpt: string;
}

export interface DefinitionPattern {
  name: 'longFormThenAcronym' | 'acronymThenLongForm' | 'acronymDashLongForm' | 'acronymStandsFor';
  regex: RegExp;
  baseScore: number;
  /** Which end of the captured long form sits next to the acronym */
  anchor: 'start' | 'end';
}
