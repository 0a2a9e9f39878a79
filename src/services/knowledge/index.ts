/**
 * Knowledge module - external lookups for acronyms the document leaves open.
 */

export { KnowledgeAggregator, buildCacheKey, type AggregatorOptions } from './aggregator';
export { JsonHttpClient, isTransient, type HttpClientOptions, type JsonResult } from './http';
export { normalizeDefinition, slidingWindowPhrase, isDisambiguation } from './normalizer';
export { contextualScore, boostConfidence, classifyInitials, type InitialsMatch } from './scoring';
export { createDefaultSources, loadGlossaryPacks, GlossaryPackSource } from './sources';
export type {
  CachedLookup,
  CandidateLookup,
  KnowledgeSnippet,
  KnowledgeSource,
  LookupHints,
  LookupOptions,
  ResponseCache,
  SourceFailure,
  SourceFailureKind,
  SourceResult,
} from './knowledge.types';
