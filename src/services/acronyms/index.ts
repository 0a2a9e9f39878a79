/**
 * Acronyms module - detection, normalization and initials alignment.
 */

export {
  detectAcronyms,
  normalizeAcronym,
  matchAcronymCell,
  isStoplisted,
  FILTER_COMMON_TERMS,
  INCLUDE_COMMON_TERMS,
} from './acronym.detector';
export {
  initials,
  initialsAlignmentScore,
  bestAlignedSpan,
  splitWords,
  trimPunctuation,
} from './alignment';
export type { AcronymToken, AlignedSpan, StoplistPolicy } from './acronym.types';
