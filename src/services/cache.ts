import { z } from 'zod';
import { logger } from '../utils/logger';
import type { CachedLookup, ResponseCache } from './knowledge';
import type { Candidate } from './resolution/resolution.types';

const candidateSchema = z.object({
  definition: z.string(),
  confidence: z.number(),
  source: z.custom<Candidate['source']>(
    (value) =>
      typeof value === 'string' &&
      /^(document|canonical|none|learned|user|pack-.+|web:.+)$/.test(value)
  ),
});

const cachedLookupSchema = z.object({
  candidates: z.array(candidateSchema),
  storedAt: z.number(),
});

/** Minimal string store the cache needs; an ioredis client satisfies it. */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

/**
 * Knowledge lookup cache. Entries carry their write time; staleness is left to
 * the store's own eviction policy.
 */
export class ResponseCacheService implements ResponseCache {
  constructor(private readonly client: KeyValueClient) {}

  private lookupKey(key: string): string {
    return `acronym:lookup:${key}`;
  }

  async get(key: string): Promise<CachedLookup | null> {
    try {
      const cached = await this.client.get(this.lookupKey(key));
      if (!cached) {
        return null;
      }

      const parsed = cachedLookupSchema.safeParse(JSON.parse(cached));
      if (!parsed.success) {
        logger.warn({ key }, 'Discarding malformed cached lookup');
        return null;
      }

      logger.debug({ key }, 'Cache hit for lookup');
      return parsed.data;
    } catch (error) {
      logger.error({ error, key }, 'Failed to get cached lookup');
      return null;
    }
  }

  async set(key: string, candidates: Candidate[]): Promise<void> {
    try {
      const entry: CachedLookup = { candidates, storedAt: Date.now() };
      await this.client.set(this.lookupKey(key), JSON.stringify(entry));
      logger.debug({ key, count: candidates.length }, 'Cached lookup');
    } catch (error) {
      logger.error({ error, key }, 'Failed to cache lookup');
    }
  }
}

/** Used when no Redis URL is configured: every lookup goes to the sources. */
export const noopResponseCache: ResponseCache = {
  async get() {
    return null;
  },
  async set() {},
};
