import { describe, expect, test } from 'vitest';
import { buildCacheKey, KnowledgeAggregator, type KnowledgeSource } from '../../services/knowledge';
import { InMemoryResponseCache, ScriptedSource, webSnippet } from '../helpers/fakes';

const radarSummary = () =>
  ScriptedSource.returning('summary', [
    webSnippet('Synthetic aperture radar is a form of radar.', 0.58, 'Synthetic aperture radar'),
  ]);

const defensePack = () =>
  ScriptedSource.returning('packs', [
    { text: 'Search and Rescue', title: 'Search and Rescue', source: 'pack-defense', baseScore: 0.7 },
  ]);

describe('buildCacheKey', () => {
  test('combines the acronym with normalized hints', () => {
    expect(
      buildCacheKey('sar', { keyword: ' Radar ', language: 'EN', domain: 'Defense', strict: true })
    ).toBe('SAR|radar|en|defense|strict');
    expect(buildCacheKey('SAR')).toBe('SAR||||loose');
  });
});

describe('KnowledgeAggregator', () => {
  test('ranks candidates from every responding source', async () => {
    const failing = ScriptedSource.failing('search');
    const aggregator = new KnowledgeAggregator(
      [radarSummary(), failing, defensePack()],
      new InMemoryResponseCache()
    );

    const candidates = await aggregator.lookup('sar', '', { limit: 5 });

    expect(candidates).toEqual([
      { definition: 'Synthetic aperture radar', confidence: 0.95, source: 'web:en.wikipedia.org' },
      { definition: 'Search and Rescue', confidence: 0.95, source: 'pack-defense' },
    ]);
    expect(failing.calls).toHaveLength(1);
  });

  test('serves a repeated lookup from the cache', async () => {
    const summary = radarSummary();
    const cache = new InMemoryResponseCache();
    const aggregator = new KnowledgeAggregator([summary], cache);

    const first = await aggregator.lookup('SAR', '');
    const second = await aggregator.lookup('SAR', '');

    expect(second).toEqual(first);
    expect(summary.calls).toHaveLength(1);
    expect(cache.entries.get('SAR||||loose')?.candidates).toEqual(first);
  });

  test('treats an empty cached list as a miss', async () => {
    const summary = radarSummary();
    const cache = new InMemoryResponseCache();
    cache.entries.set('SAR||||loose', { candidates: [], storedAt: 0 });

    const candidates = await new KnowledgeAggregator([summary], cache).lookup('SAR', '');

    expect(candidates).toHaveLength(1);
    expect(summary.calls).toHaveLength(1);
  });

  test('stops querying once the limit is reached', async () => {
    const pack = defensePack();
    const aggregator = new KnowledgeAggregator([radarSummary(), pack], new InMemoryResponseCache());

    const candidates = await aggregator.lookup('SAR', '', { limit: 1 });

    expect(candidates.map((candidate) => candidate.definition)).toEqual(['Synthetic aperture radar']);
    expect(pack.calls).toHaveLength(0);
  });

  test('drops duplicate definitions across sources', async () => {
    const aggregator = new KnowledgeAggregator(
      [
        radarSummary(),
        ScriptedSource.returning('packs', [
          { text: 'Synthetic Aperture Radar', title: 'Synthetic Aperture Radar', source: 'pack-defense', baseScore: 0.7 },
        ]),
      ],
      new InMemoryResponseCache()
    );

    const candidates = await aggregator.lookup('SAR', '');

    expect(candidates).toHaveLength(1);
    expect(candidates[0].source).toBe('web:en.wikipedia.org');
  });

  test('strict mode keeps only exact initials', async () => {
    const source = ScriptedSource.returning('search', [
      webSnippet('SAR stands for Special Administrative Region of China'),
      webSnippet('SAR stands for Specific Absorption Rate'),
    ]);
    const aggregator = new KnowledgeAggregator([source], new InMemoryResponseCache());

    const loose = await aggregator.lookup('SAR', '');
    expect(loose.map((candidate) => candidate.definition)).toEqual([
      'Specific Absorption Rate',
      'Special Administrative Region of China',
    ]);
    expect(loose[1].confidence).toBeCloseTo(0.86, 5);

    const strict = await aggregator.lookup('SAR', '', { strict: true });
    expect(strict.map((candidate) => candidate.definition)).toEqual(['Specific Absorption Rate']);
  });

  test('passes trimmed hints to the sources', async () => {
    const summary = radarSummary();
    await new KnowledgeAggregator([summary], new InMemoryResponseCache()).lookup('SAR', '', {
      keyword: ' radar ',
      language: 'DE',
    });

    expect(summary.calls[0]).toEqual({
      term: 'SAR',
      hints: { keyword: 'radar', language: 'de', domain: undefined },
    });
  });

  test('survives a source that throws', async () => {
    const throwing: KnowledgeSource = {
      name: 'broken',
      query: async () => {
        throw new Error('boom');
      },
    };
    const aggregator = new KnowledgeAggregator([throwing, defensePack()], new InMemoryResponseCache());

    const candidates = await aggregator.lookup('SAR', '');

    expect(candidates.map((candidate) => candidate.source)).toEqual(['pack-defense']);
  });

  test('returns an empty list when every source fails', async () => {
    const aggregator = new KnowledgeAggregator(
      [ScriptedSource.failing('a'), ScriptedSource.failing('b')],
      new InMemoryResponseCache()
    );

    expect(await aggregator.lookup('SAR', '')).toEqual([]);
  });
});
