/**
 * Resolution module - merges evidence per acronym and runs whole extractions.
 */

export {
  ExtractionService,
  type ExtractionDependencies,
  type ExtractionOptions,
  type ExtractionSettings,
} from './extraction.service';
export {
  resolveAcronym,
  chooseIndex,
  dedupeCandidates,
  roundConfidence,
  type ResolutionContext,
  type ResolverDependencies,
} from './resolver';
export { isLearnedSource, isWebSource } from './resolution.types';
export type {
  Candidate,
  CandidateSource,
  ExtractionResponse,
  LearnedSource,
  ResolutionResult,
} from './resolution.types';
