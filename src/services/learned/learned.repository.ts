import { eq } from 'drizzle-orm';
import type { Database } from '../../config/database';
import { learnedDefinitions } from '../../models/schema';
import { logger } from '../../utils/logger';
import type { AcronymToken } from '../acronyms';
import type { LearnedSource } from '../resolution/resolution.types';
import type { LearnedEntry, LearnedStore } from './learned.types';

export class DrizzleLearnedStore implements LearnedStore {
  constructor(private readonly db: Database) {}

  async get(term: AcronymToken): Promise<LearnedEntry | null> {
    try {
      const [row] = await this.db
        .select()
        .from(learnedDefinitions)
        .where(eq(learnedDefinitions.term, term))
        .limit(1);

      if (!row) return null;

      return {
        term: row.term,
        definition: row.definition,
        source: row.source,
        confidence: row.confidence,
        updatedAt: row.updatedAt,
      };
    } catch (error) {
      logger.error({ error, term }, 'Failed to read learned definition');
      return null;
    }
  }

  async set(
    term: AcronymToken,
    definition: string,
    source: LearnedSource,
    confidence: number
  ): Promise<boolean> {
    const updatedAt = new Date();
    try {
      await this.db
        .insert(learnedDefinitions)
        .values({ term, definition, source, confidence, updatedAt })
        .onConflictDoUpdate({
          target: learnedDefinitions.term,
          set: { definition, source, confidence, updatedAt },
        });

      logger.info({ term, source }, 'Learned definition saved');
      return true;
    } catch (error) {
      logger.error({ error, term }, 'Failed to save learned definition');
      return false;
    }
  }
}
