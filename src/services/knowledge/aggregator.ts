/**
 * External knowledge aggregation.
 *
 * Queries an ordered list of sources until enough distinct expansions are
 * collected, normalizes and scores them, and caches the ranked list per
 * (acronym, hints). A failing source contributes nothing.
 */

import { logger } from '../../utils/logger';
import { failure } from '../../utils/result';
import { initials } from '../acronyms';
import type { Candidate } from '../resolution/resolution.types';
import type {
  CandidateLookup,
  KnowledgeSource,
  LookupHints,
  LookupOptions,
  ResponseCache,
  SourceFailure,
  SourceResult,
} from './knowledge.types';
import { normalizeDefinition } from './normalizer';
import { boostConfidence, contextualScore } from './scoring';

export interface AggregatorOptions {
  defaultLimit?: number;
}

export function buildCacheKey(acronym: string, options: LookupOptions = {}): string {
  return [
    acronym.toUpperCase(),
    (options.keyword ?? '').trim().toLowerCase(),
    (options.language ?? '').trim().toLowerCase(),
    (options.domain ?? '').trim().toLowerCase(),
    options.strict ? 'strict' : 'loose',
  ].join('|');
}

export class KnowledgeAggregator implements CandidateLookup {
  private readonly defaultLimit: number;

  constructor(
    private readonly sources: readonly KnowledgeSource[],
    private readonly cache: ResponseCache,
    options: AggregatorOptions = {}
  ) {
    this.defaultLimit = options.defaultLimit ?? 5;
  }

  async lookup(acronym: string, contextText: string, options: LookupOptions = {}): Promise<Candidate[]> {
    const target = acronym.toUpperCase();
    const limit = Math.max(1, options.limit ?? this.defaultLimit);
    const key = buildCacheKey(target, options);

    const cached = await this.cache.get(key);
    if (cached && cached.candidates.length > 0) {
      logger.debug({ acronym: target, key }, 'Knowledge cache hit');
      return cached.candidates.slice(0, limit);
    }

    const hints: LookupHints = {
      keyword: options.keyword?.trim() || undefined,
      language: options.language?.trim().toLowerCase() || undefined,
      domain: options.domain?.trim().toLowerCase() || undefined,
    };

    const collected: Candidate[] = [];
    const seen = new Set<string>();

    for (const [index, source] of this.sources.entries()) {
      if (index > 0 && collected.length >= limit) break;

      const result = await this.querySource(source, target, hints);
      if (!result.ok) {
        logger.warn(
          { acronym: target, source: source.name, kind: result.error.kind, status: result.error.status },
          'Knowledge source returned no candidates'
        );
        continue;
      }

      for (const snippet of result.value) {
        const definition = normalizeDefinition(target, snippet);
        if (!definition) continue;

        const dedupeKey = definition.trim().toLowerCase();
        if (seen.has(dedupeKey)) continue;
        seen.add(dedupeKey);

        collected.push({
          definition,
          confidence: Math.max(snippet.baseScore, contextualScore(target, definition, contextText)),
          source: snippet.source,
        });
      }
    }

    let ranked = collected.map((candidate) => ({
      ...candidate,
      confidence: boostConfidence(target, candidate.definition, candidate.confidence),
    }));

    if (options.strict) {
      ranked = ranked.filter((candidate) => initials(candidate.definition) === target);
    }

    ranked = ranked.sort((a, b) => b.confidence - a.confidence).slice(0, limit);

    await this.cache.set(key, ranked);

    logger.debug({ acronym: target, count: ranked.length }, 'Knowledge lookup complete');
    return ranked;
  }

  private async querySource(
    source: KnowledgeSource,
    term: string,
    hints: LookupHints
  ): Promise<SourceResult> {
    try {
      return await source.query(term, hints);
    } catch (error) {
      return failure<SourceFailure>({
        kind: 'network',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
