import { z } from 'zod';
import { success } from '../../../utils/result';
import type { KnowledgeSnippet, KnowledgeSource, LookupHints, SourceResult } from '../knowledge.types';
import { type JsonFetcher, languageOf, parseResponse, searchQuery } from './shared';

const entitySearchSchema = z.object({
  search: z.array(
    z.object({
      label: z.string().default(''),
      description: z.string().default(''),
    })
  ),
});

/**
 * Structured-data source: entity labels and descriptions.
 */
export class WikidataSource implements KnowledgeSource {
  readonly name = 'wikidata';

  constructor(private readonly http: JsonFetcher) {}

  async query(term: string, hints: LookupHints): Promise<SourceResult> {
    const language = languageOf(hints);
    const response = parseResponse(
      entitySearchSchema,
      await this.http.getJson('https://www.wikidata.org/w/api.php', {
        action: 'wbsearchentities',
        search: searchQuery(term, hints),
        language,
        limit: '6',
        format: 'json',
      })
    );
    if (!response.ok) return response;

    const snippets: KnowledgeSnippet[] = [];
    for (const entity of response.value.search) {
      const text = (entity.description || entity.label).trim();
      if (!text) continue;
      snippets.push({
        text,
        title: entity.label || undefined,
        source: 'web:www.wikidata.org',
        baseScore: 0.5,
      });
    }
    return success(snippets);
  }
}
