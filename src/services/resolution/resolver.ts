/**
 * Merges per-acronym evidence into one ResolutionResult.
 *
 * Evidence tiers, in order: glossary mapping, in-document pattern match,
 * learned store, external lookup. External lookup runs only when the first
 * three tiers found nothing.
 */

import {
  EXCERPT_MAX_LENGTH,
  GLOSSARY_CONFIDENCE,
  NO_DEFINITION_TEXT,
  WEB_MATCH_NOTE,
} from '../../config/constants';
import { logger } from '../../utils/logger';
import type { AcronymToken } from '../acronyms';
import { findDefinitionInText } from '../definitions';
import type { GlossaryMap } from '../glossary';
import type { CandidateLookup, LookupOptions } from '../knowledge';
import type { LearnedStore } from '../learned';
import type { SentenceSequence } from '../sentences';
import type { Candidate, ResolutionResult } from './resolution.types';
import { isLearnedSource, isWebSource } from './resolution.types';

export interface ResolverDependencies {
  learnedStore: LearnedStore;
  lookup: CandidateLookup;
}

export interface ResolutionContext {
  /** Leading slice of the document, used to score external candidates */
  contextText: string;
  web: boolean;
  lookupOptions?: LookupOptions;
}

export function roundConfidence(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function dedupeCandidates(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    const key = candidate.definition.trim().toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Index of the first document candidate, else the first learned/user one,
 * else 0.
 */
export function chooseIndex(candidates: Candidate[]): number {
  const documentIndex = candidates.findIndex((candidate) => candidate.source === 'document');
  if (documentIndex !== -1) return documentIndex;

  const learnedIndex = candidates.findIndex((candidate) => isLearnedSource(candidate.source));
  return learnedIndex === -1 ? 0 : learnedIndex;
}

async function learnedCandidate(
  store: LearnedStore,
  acronym: AcronymToken
): Promise<Candidate | null> {
  try {
    const entry = await store.get(acronym);
    if (!entry || !entry.definition.trim()) return null;
    return {
      definition: entry.definition,
      confidence: roundConfidence(entry.confidence),
      source: entry.source,
    };
  } catch (error) {
    logger.warn({ error, acronym }, 'Learned store lookup failed');
    return null;
  }
}

async function externalCandidates(
  lookup: CandidateLookup,
  acronym: AcronymToken,
  context: ResolutionContext
): Promise<Candidate[]> {
  try {
    const candidates = await lookup.lookup(acronym, context.contextText, context.lookupOptions);
    return candidates.map((candidate) => ({
      ...candidate,
      confidence: roundConfidence(candidate.confidence),
    }));
  } catch (error) {
    logger.warn({ error, acronym }, 'External lookup failed');
    return [];
  }
}

export async function resolveAcronym(
  acronym: AcronymToken,
  glossary: GlossaryMap,
  sentences: SentenceSequence,
  deps: ResolverDependencies,
  context: ResolutionContext
): Promise<ResolutionResult> {
  const collected: Candidate[] = [];
  let excerpt: string | undefined;

  const glossaryDefinition = glossary.get(acronym);
  if (glossaryDefinition) {
    collected.push({
      definition: glossaryDefinition,
      confidence: GLOSSARY_CONFIDENCE,
      source: 'document',
    });
    excerpt = `${acronym} – ${glossaryDefinition} (table)`;
  }

  const match = findDefinitionInText(acronym, sentences);
  if (match) {
    collected.push({
      definition: match.phrase,
      confidence: roundConfidence(match.confidence),
      source: 'document',
    });
    excerpt ??= match.excerpt.slice(0, EXCERPT_MAX_LENGTH);
  }

  const learned = await learnedCandidate(deps.learnedStore, acronym);
  if (learned) {
    collected.push(learned);
  }

  if (collected.length === 0 && context.web) {
    collected.push(...(await externalCandidates(deps.lookup, acronym, context)));
  }

  let candidates = dedupeCandidates(collected);
  if (candidates.length === 0) {
    candidates = [{ definition: NO_DEFINITION_TEXT, confidence: 0, source: 'none' }];
  }

  const chosenIndex = chooseIndex(candidates);
  const chosen = candidates[chosenIndex];

  return {
    term: acronym,
    definition: chosen.definition,
    confidence: chosen.confidence,
    source: chosen.source,
    ...(isWebSource(chosen.source) ? { note: WEB_MATCH_NOTE } : {}),
    ...(excerpt ? { excerpt } : {}),
    candidates,
    chosenIndex,
  };
}
