/**
 * Encyclopedia sources: title search, page summary and open search.
 */

import { z } from 'zod';
import { success } from '../../../utils/result';
import type { KnowledgeSnippet, KnowledgeSource, LookupHints, SourceResult } from '../knowledge.types';
import { stripHtml } from '../normalizer';
import { type JsonFetcher, languageOf, parseResponse, searchQuery } from './shared';

const RESULT_LIMIT = '6';

const titleSearchSchema = z.object({
  query: z.object({
    search: z.array(z.object({ title: z.string(), snippet: z.string().default('') })),
  }),
});

const summarySchema = z.object({
  title: z.string(),
  type: z.string().optional(),
  extract: z.string().optional(),
  description: z.string().optional(),
});

export const openSearchSchema = z
  .tuple([z.string(), z.array(z.string())])
  .rest(z.array(z.string()));

function apiUrl(language: string): string {
  return `https://${language}.wikipedia.org/w/api.php`;
}

function host(language: string): `web:${string}` {
  return `web:${language}.wikipedia.org`;
}

export class WikipediaTitleSearchSource implements KnowledgeSource {
  readonly name = 'wikipedia-title';

  constructor(private readonly http: JsonFetcher) {}

  async query(term: string, hints: LookupHints): Promise<SourceResult> {
    const language = languageOf(hints);
    const response = parseResponse(
      titleSearchSchema,
      await this.http.getJson(apiUrl(language), {
        action: 'query',
        list: 'search',
        srsearch: searchQuery(term, hints),
        srnamespace: '0',
        srlimit: RESULT_LIMIT,
        format: 'json',
      })
    );
    if (!response.ok) return response;

    return success(
      response.value.query.search.map(
        (hit): KnowledgeSnippet => ({
          text: stripHtml(hit.snippet) || hit.title,
          title: hit.title,
          source: host(language),
          baseScore: 0.55,
        })
      )
    );
  }
}

export class WikipediaSummarySource implements KnowledgeSource {
  readonly name = 'wikipedia-summary';

  constructor(private readonly http: JsonFetcher) {}

  async query(term: string, hints: LookupHints): Promise<SourceResult> {
    const language = languageOf(hints);
    const page = hints.keyword ? `${term} (${hints.keyword})` : term;
    const response = parseResponse(
      summarySchema,
      await this.http.getJson(
        `https://${language}.wikipedia.org/api/rest_v1/page/summary/${encodeURIComponent(page.replace(/ /g, '_'))}`
      )
    );
    if (!response.ok) return response;

    const { title, type, extract, description } = response.value;
    const text = (extract || description || '').trim();
    if (type === 'disambiguation' || !text) {
      return success([]);
    }

    return success([{ text, title, source: host(language), baseScore: 0.58 }]);
  }
}

export class WikipediaOpenSearchSource implements KnowledgeSource {
  readonly name = 'wikipedia-opensearch';

  constructor(private readonly http: JsonFetcher) {}

  async query(term: string, hints: LookupHints): Promise<SourceResult> {
    const language = languageOf(hints);
    const response = parseResponse(
      openSearchSchema,
      await this.http.getJson(apiUrl(language), {
        action: 'opensearch',
        search: searchQuery(term, hints),
        limit: RESULT_LIMIT,
        namespace: '0',
        format: 'json',
      })
    );
    if (!response.ok) return response;

    const [, titles, descriptions = []] = response.value;
    const snippets: KnowledgeSnippet[] = [];

    titles.forEach((title, i) => {
      const text = (descriptions[i] || title).trim();
      if (text) {
        snippets.push({ text, title, source: host(language), baseScore: 0.55 });
      }
    });

    return success(snippets);
  }
}
