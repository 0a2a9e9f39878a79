import { vi } from 'vitest';
import type { JsonResult } from '../../services/knowledge';
import type {
  CachedLookup,
  CandidateLookup,
  KnowledgeSnippet,
  KnowledgeSource,
  LookupHints,
  LookupOptions,
  ResponseCache,
  SourceFailure,
  SourceResult,
} from '../../services/knowledge';
import type { JsonFetcher } from '../../services/knowledge/sources';
import type { LearnedEntry, LearnedStore } from '../../services/learned';
import type { Candidate, LearnedSource } from '../../services/resolution';
import { failure, success } from '../../utils/result';

export class InMemoryLearnedStore implements LearnedStore {
  readonly entries = new Map<string, LearnedEntry>();

  async get(term: string): Promise<LearnedEntry | null> {
    return this.entries.get(term) ?? null;
  }

  async set(term: string, definition: string, source: LearnedSource, confidence: number): Promise<boolean> {
    this.entries.set(term, { term, definition, source, confidence, updatedAt: new Date(0) });
    return true;
  }
}

export class FailingLearnedStore implements LearnedStore {
  async get(): Promise<LearnedEntry | null> {
    throw new Error('store offline');
  }

  async set(): Promise<boolean> {
    return false;
  }
}

export class InMemoryResponseCache implements ResponseCache {
  readonly entries = new Map<string, CachedLookup>();

  async get(key: string): Promise<CachedLookup | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, candidates: Candidate[]): Promise<void> {
    this.entries.set(key, { candidates, storedAt: 0 });
  }
}

/** Source that answers every query with the same snippets and records its calls. */
export class ScriptedSource implements KnowledgeSource {
  readonly calls: Array<{ term: string; hints: LookupHints }> = [];

  constructor(
    readonly name: string,
    private readonly result: SourceResult
  ) {}

  static returning(name: string, snippets: KnowledgeSnippet[]): ScriptedSource {
    return new ScriptedSource(name, success(snippets));
  }

  static failing(name: string): ScriptedSource {
    return new ScriptedSource(name, failure<SourceFailure>({ kind: 'timeout', message: 'Timed out after 5000ms' }));
  }

  async query(term: string, hints: LookupHints): Promise<SourceResult> {
    this.calls.push({ term, hints });
    return this.result;
  }
}

export class StubLookup implements CandidateLookup {
  readonly lookup = vi.fn(
    async (_acronym: string, _contextText: string, _options?: LookupOptions): Promise<Candidate[]> =>
      this.candidates
  );

  constructor(private readonly candidates: Candidate[] = []) {}
}

/** JsonFetcher that answers from a queue of canned results and records requests. */
export class FakeFetcher implements JsonFetcher {
  readonly requests: Array<{ url: string; params: Record<string, string> }> = [];

  constructor(private readonly responses: JsonResult[]) {}

  static ok(body: unknown): FakeFetcher {
    return new FakeFetcher([success(body)]);
  }

  async getJson(url: string, params: Record<string, string> = {}): Promise<JsonResult> {
    this.requests.push({ url, params });
    return this.responses.shift() ?? failure<SourceFailure>({ kind: 'network', message: 'No scripted response' });
  }
}

export function webSnippet(text: string, baseScore = 0.55, title?: string): KnowledgeSnippet {
  return { text, title, source: 'web:en.wikipedia.org', baseScore };
}
