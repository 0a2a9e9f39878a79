import { z } from 'zod';
import { success } from '../../../utils/result';
import type { KnowledgeSnippet, KnowledgeSource, LookupHints, SourceResult } from '../knowledge.types';
import { type JsonFetcher, parseResponse } from './shared';

const instantAnswerSchema = z.object({
  AbstractText: z.string().default(''),
  Heading: z.string().default(''),
  RelatedTopics: z.array(z.object({ Text: z.string().optional() }).passthrough()).default([]),
});

const SOURCE = 'web:duckduckgo.com';

/**
 * Instant-answer search. The abstract is used as-is; related topics only when
 * they mention the acronym.
 */
export class DuckDuckGoSource implements KnowledgeSource {
  readonly name = 'duckduckgo';

  constructor(private readonly http: JsonFetcher) {}

  async query(term: string, hints: LookupHints): Promise<SourceResult> {
    const query = hints.keyword ? `${term} ${hints.keyword} stands for` : `${term} stands for`;
    const response = parseResponse(
      instantAnswerSchema,
      await this.http.getJson('https://api.duckduckgo.com/', {
        q: query,
        format: 'json',
        no_html: '1',
        skip_disambig: '1',
      })
    );
    if (!response.ok) return response;

    const { AbstractText, Heading, RelatedTopics } = response.value;
    const snippets: KnowledgeSnippet[] = [];

    if (AbstractText.trim()) {
      snippets.push({ text: AbstractText.trim(), title: Heading || undefined, source: SOURCE, baseScore: 0.5 });
    }

    for (const topic of RelatedTopics) {
      const text = topic.Text?.trim();
      if (text && text.toUpperCase().includes(term.toUpperCase())) {
        snippets.push({ text, source: SOURCE, baseScore: 0.48 });
      }
    }

    return success(snippets);
  }
}
