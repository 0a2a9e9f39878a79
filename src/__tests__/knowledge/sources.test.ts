import { describe, expect, test } from 'vitest';
import type { SourceFailure } from '../../services/knowledge';
import {
  createDefaultSources,
  DuckDuckGoSource,
  GlossaryPackSource,
  loadGlossaryPacks,
  WikidataSource,
  WikipediaOpenSearchSource,
  WikipediaSummarySource,
  WikipediaTitleSearchSource,
  WiktionarySource,
} from '../../services/knowledge/sources';
import { failure } from '../../utils/result';
import { FakeFetcher } from '../helpers/fakes';

describe('WikipediaSummarySource', () => {
  test('returns the page extract', async () => {
    const http = FakeFetcher.ok({
      title: 'Synthetic-aperture radar',
      type: 'standard',
      extract: 'Synthetic-aperture radar is a form of radar.',
    });

    const result = await new WikipediaSummarySource(http).query('SAR', {});

    expect(result).toEqual({
      ok: true,
      value: [
        {
          text: 'Synthetic-aperture radar is a form of radar.',
          title: 'Synthetic-aperture radar',
          source: 'web:en.wikipedia.org',
          baseScore: 0.58,
        },
      ],
    });
    expect(http.requests[0].url).toBe('https://en.wikipedia.org/api/rest_v1/page/summary/SAR');
  });

  test('uses the keyword and language hints in the page address', async () => {
    const http = FakeFetcher.ok({ title: 'SAR', extract: 'Radar.' });

    await new WikipediaSummarySource(http).query('SAR', { keyword: 'radar', language: 'de' });

    expect(http.requests[0].url).toBe('https://de.wikipedia.org/api/rest_v1/page/summary/SAR_(radar)');
  });

  test('skips disambiguation pages', async () => {
    const http = FakeFetcher.ok({ title: 'SAR', type: 'disambiguation', extract: 'SAR may refer to:' });

    expect(await new WikipediaSummarySource(http).query('SAR', {})).toEqual({ ok: true, value: [] });
  });
});

describe('WikipediaTitleSearchSource', () => {
  test('strips markup from search snippets', async () => {
    const http = FakeFetcher.ok({
      query: {
        search: [{ title: 'Synthetic-aperture radar', snippet: '<span class="searchmatch">SAR</span> is a form of radar' }],
      },
    });

    const result = await new WikipediaTitleSearchSource(http).query('SAR', {});

    expect(result.ok && result.value[0].text).toBe('SAR is a form of radar');
    expect(http.requests[0].params.srsearch).toBe('SAR');
  });

  test('reports an unexpected shape as malformed', async () => {
    const result = await new WikipediaTitleSearchSource(FakeFetcher.ok({ unexpected: true })).query('SAR', {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('malformed');
    }
  });

  test('passes transport failures through', async () => {
    const http = new FakeFetcher([
      failure<SourceFailure>({ kind: 'rate-limited', status: 429, message: 'Rate limited' }),
    ]);

    const result = await new WikipediaTitleSearchSource(http).query('SAR', {});

    expect(result).toEqual({
      ok: false,
      error: { kind: 'rate-limited', status: 429, message: 'Rate limited' },
    });
  });
});

describe('WikipediaOpenSearchSource', () => {
  test('pairs titles with descriptions, falling back to the title', async () => {
    const http = FakeFetcher.ok([
      'SAR',
      ['Synthetic-aperture radar', 'Search and rescue'],
      ['', 'Search and rescue is the search for people in distress.'],
    ]);

    const result = await new WikipediaOpenSearchSource(http).query('SAR', { keyword: 'radar' });

    expect(result.ok && result.value.map((snippet) => snippet.text)).toEqual([
      'Synthetic-aperture radar',
      'Search and rescue is the search for people in distress.',
    ]);
    expect(http.requests[0].params.search).toBe('SAR radar');
  });
});

describe('WiktionarySource', () => {
  test('returns entry titles', async () => {
    const http = FakeFetcher.ok(['SAR', ['SAR', 'sar'], []]);

    const result = await new WiktionarySource(http).query('SAR', {});

    expect(result.ok && result.value.map((snippet) => snippet.source)).toEqual([
      'web:en.wiktionary.org',
      'web:en.wiktionary.org',
    ]);
  });
});

describe('WikidataSource', () => {
  test('prefers descriptions over labels', async () => {
    const http = FakeFetcher.ok({
      search: [
        { label: 'Synthetic-aperture radar', description: 'form of radar' },
        { label: 'Search and rescue' },
      ],
    });

    const result = await new WikidataSource(http).query('SAR', {});

    expect(result.ok && result.value.map((snippet) => snippet.text)).toEqual([
      'form of radar',
      'Search and rescue',
    ]);
  });
});

describe('DuckDuckGoSource', () => {
  test('keeps related topics that mention the acronym', async () => {
    const http = FakeFetcher.ok({
      AbstractText: '',
      Heading: '',
      RelatedTopics: [{ Text: 'SAR - Search and rescue' }, { Text: 'Something else' }, { Name: 'Category' }],
    });

    const result = await new DuckDuckGoSource(http).query('SAR', {});

    expect(result).toEqual({
      ok: true,
      value: [{ text: 'SAR - Search and rescue', source: 'web:duckduckgo.com', baseScore: 0.48 }],
    });
    expect(http.requests[0].params.q).toBe('SAR stands for');
  });
});

describe('GlossaryPackSource', () => {
  const packs = loadGlossaryPacks();

  test('loads the bundled packs', () => {
    expect(packs.map((pack) => pack.name)).toEqual(['defense', 'health', 'it']);
  });

  test('returns every expansion of a term', async () => {
    const result = await new GlossaryPackSource(packs).query('sar', {});

    expect(result.ok && result.value.map((snippet) => [snippet.text, snippet.source])).toEqual([
      ['Synthetic Aperture Radar', 'pack-defense'],
      ['Search and Rescue', 'pack-defense'],
    ]);
  });

  test('restricts the lookup to the requested domain', async () => {
    expect(await new GlossaryPackSource(packs).query('SAR', { domain: 'it' })).toEqual({ ok: true, value: [] });
  });
});

describe('createDefaultSources', () => {
  test('orders sources by lookup priority', () => {
    const names = createDefaultSources(FakeFetcher.ok({}), []).map((source) => source.name);

    expect(names).toEqual([
      'wikipedia-title',
      'wikipedia-summary',
      'wikipedia-opensearch',
      'wiktionary',
      'wikidata',
      'glossary-packs',
      'duckduckgo',
    ]);
  });
});
