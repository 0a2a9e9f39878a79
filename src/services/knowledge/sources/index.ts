import type { KnowledgeSource } from '../knowledge.types';
import { DuckDuckGoSource } from './duckduckgo';
import type { GlossaryPack } from './glossaryPacks';
import { GlossaryPackSource } from './glossaryPacks';
import type { JsonFetcher } from './shared';
import { WikidataSource } from './wikidata';
import {
  WikipediaOpenSearchSource,
  WikipediaSummarySource,
  WikipediaTitleSearchSource,
} from './wikipedia';
import { WiktionarySource } from './wiktionary';

/**
 * Sources in lookup priority order. New sources are added here.
 */
export function createDefaultSources(http: JsonFetcher, packs: GlossaryPack[]): KnowledgeSource[] {
  return [
    new WikipediaTitleSearchSource(http),
    new WikipediaSummarySource(http),
    new WikipediaOpenSearchSource(http),
    new WiktionarySource(http),
    new WikidataSource(http),
    new GlossaryPackSource(packs),
    new DuckDuckGoSource(http),
  ];
}

export { DuckDuckGoSource } from './duckduckgo';
export {
  GlossaryPackSource,
  loadGlossaryPacks,
  DEFAULT_PACK_DIRECTORY,
  type GlossaryPack,
} from './glossaryPacks';
export type { JsonFetcher } from './shared';
export { WikidataSource } from './wikidata';
export {
  WikipediaOpenSearchSource,
  WikipediaSummarySource,
  WikipediaTitleSearchSource,
} from './wikipedia';
export { WiktionarySource } from './wiktionary';
