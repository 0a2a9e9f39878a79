import { success } from '../../../utils/result';
import type { KnowledgeSnippet, KnowledgeSource, LookupHints, SourceResult } from '../knowledge.types';
import { openSearchSchema } from './wikipedia';
import { type JsonFetcher, languageOf, parseResponse, searchQuery } from './shared';

/**
 * Dictionary source: entry titles from the wiktionary open search.
 */
export class WiktionarySource implements KnowledgeSource {
  readonly name = 'wiktionary';

  constructor(private readonly http: JsonFetcher) {}

  async query(term: string, hints: LookupHints): Promise<SourceResult> {
    const language = languageOf(hints);
    const response = parseResponse(
      openSearchSchema,
      await this.http.getJson(`https://${language}.wiktionary.org/w/api.php`, {
        action: 'opensearch',
        search: searchQuery(term, hints),
        limit: '5',
        format: 'json',
      })
    );
    if (!response.ok) return response;

    const [, titles] = response.value;
    return success(
      titles
        .filter((title) => title.trim().length > 0)
        .map(
          (title): KnowledgeSnippet => ({
            text: title,
            title,
            source: `web:${language}.wiktionary.org`,
            baseScore: 0.45,
          })
        )
    );
  }
}
