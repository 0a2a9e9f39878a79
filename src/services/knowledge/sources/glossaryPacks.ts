/**
 * Domain glossary packs bundled with the service (`src/data/packs/*.json`).
 * No network access; the `domain` hint narrows the lookup to one pack.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { logger } from '../../../utils/logger';
import { success } from '../../../utils/result';
import type { KnowledgeSnippet, KnowledgeSource, LookupHints, SourceResult } from '../knowledge.types';

const packSchema = z.object({
  name: z.string().regex(/^[a-z0-9-]+$/),
  description: z.string().default(''),
  entries: z.record(z.string(), z.array(z.string().min(1))),
});

export type GlossaryPack = z.infer<typeof packSchema>;

export const DEFAULT_PACK_DIRECTORY = new URL('../../../data/packs/', import.meta.url);

const PACK_BASE_SCORE = 0.7;

export function loadGlossaryPacks(directory: URL = DEFAULT_PACK_DIRECTORY): GlossaryPack[] {
  const packs: GlossaryPack[] = [];

  for (const file of readdirSync(directory).filter((name) => name.endsWith('.json')).sort()) {
    const parsed = packSchema.safeParse(JSON.parse(readFileSync(new URL(file, directory), 'utf8')));
    if (!parsed.success) {
      logger.warn({ file, issues: parsed.error.issues.length }, 'Skipping invalid glossary pack');
      continue;
    }
    packs.push(parsed.data);
  }

  logger.debug({ packs: packs.map((pack) => pack.name) }, 'Glossary packs loaded');
  return packs;
}

export class GlossaryPackSource implements KnowledgeSource {
  readonly name = 'glossary-packs';
  private readonly packs: GlossaryPack[];

  constructor(packs: GlossaryPack[]) {
    this.packs = packs.map((pack) => ({
      ...pack,
      entries: Object.fromEntries(
        Object.entries(pack.entries).map(([term, expansions]) => [term.toUpperCase(), expansions])
      ),
    }));
  }

  async query(term: string, hints: LookupHints): Promise<SourceResult> {
    const key = term.toUpperCase();
    const domain = hints.domain?.toLowerCase();
    const snippets: KnowledgeSnippet[] = [];

    for (const pack of this.packs) {
      if (domain && pack.name !== domain) continue;

      for (const expansion of pack.entries[key] ?? []) {
        snippets.push({
          text: expansion,
          title: expansion,
          source: `pack-${pack.name}`,
          baseScore: PACK_BASE_SCORE,
        });
      }
    }

    return success(snippets);
  }
}
