import PQueue from 'p-queue';
import { CONTEXT_TEXT_LENGTH } from '../../config/constants';
import { logger } from '../../utils/logger';
import {
  detectAcronyms,
  FILTER_COMMON_TERMS,
  INCLUDE_COMMON_TERMS,
  normalizeAcronym,
  type AcronymToken,
} from '../acronyms';
import type { DocumentSource } from '../documents/document.types';
import { buildGlossary } from '../glossary';
import type { CandidateLookup, LookupOptions } from '../knowledge';
import type { LearnedEntry, LearnedStore } from '../learned';
import { splitSentences } from '../sentences';
import type {
  Candidate,
  ExtractionResponse,
  LearnedSource,
  ResolutionResult,
} from './resolution.types';
import { resolveAcronym } from './resolver';

export interface ExtractionOptions extends LookupOptions {
  /** Keep day/month abbreviations and other common short forms */
  includeCommon?: boolean;
  /** Allow external lookups for acronyms the document leaves open */
  web?: boolean;
}

export interface ExtractionSettings {
  includeCommonTerms: boolean;
  webLookupEnabled: boolean;
  maxCandidates: number;
  concurrency: number;
}

export interface ExtractionDependencies {
  learnedStore: LearnedStore;
  lookup: CandidateLookup;
}

export class ExtractionService {
  constructor(
    private readonly deps: ExtractionDependencies,
    private readonly settings: ExtractionSettings
  ) {}

  async extract(document: DocumentSource, options: ExtractionOptions = {}): Promise<ExtractionResponse> {
    if (!document.fullText.trim() && document.tableRows.length === 0) {
      return { acronyms: [] };
    }

    const includeCommon = options.includeCommon ?? this.settings.includeCommonTerms;
    const policy = includeCommon ? INCLUDE_COMMON_TERMS : FILTER_COMMON_TERMS;

    const sentences = splitSentences(document.fullText);
    const glossary = buildGlossary(document, policy);
    const acronyms = detectAcronyms(
      `${document.fullText}\n${[...glossary.keys()].join('\n')}`,
      policy
    );

    const context = {
      contextText: document.fullText.slice(0, CONTEXT_TEXT_LENGTH),
      web: options.web ?? this.settings.webLookupEnabled,
      lookupOptions: this.lookupOptions(options),
    };

    const queue = new PQueue({ concurrency: this.settings.concurrency });
    const resolved = await Promise.all(
      acronyms.map((acronym) =>
        queue.add(() => resolveAcronym(acronym, glossary, sentences, this.deps, context))
      )
    );
    const results = resolved.filter((result): result is ResolutionResult => result !== undefined);

    logger.info(
      {
        acronyms: results.length,
        glossaryEntries: glossary.size,
        sentences: sentences.length,
        web: context.web,
      },
      'Extraction complete'
    );

    return { acronyms: results };
  }

  async lookup(term: string, options: LookupOptions = {}): Promise<{ term: AcronymToken; candidates: Candidate[] }> {
    const acronym = normalizeAcronym(term);
    const candidates = await this.deps.lookup.lookup(acronym, '', this.lookupOptions(options));
    return { term: acronym, candidates };
  }

  async getLearned(term: string): Promise<LearnedEntry | null> {
    return this.deps.learnedStore.get(normalizeAcronym(term));
  }

  async learn(
    term: string,
    definition: string,
    source: LearnedSource = 'user',
    confidence = 1
  ): Promise<{ term: AcronymToken; saved: boolean }> {
    const acronym = normalizeAcronym(term);
    const saved = await this.deps.learnedStore.set(acronym, definition.trim(), source, confidence);
    return { term: acronym, saved };
  }

  private lookupOptions(options: LookupOptions): LookupOptions {
    return {
      keyword: options.keyword,
      language: options.language,
      domain: options.domain,
      strict: options.strict,
      limit: options.limit ?? this.settings.maxCandidates,
    };
  }
}
