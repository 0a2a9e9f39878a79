import { pgEnum, pgTable, real, text, timestamp, varchar } from 'drizzle-orm/pg-core';

export const learnedSourceEnum = pgEnum('learned_source', ['learned', 'user']);

export const learnedDefinitions = pgTable('learned_definitions', {
  term: varchar('term', { length: 32 }).primaryKey(),
  definition: text('definition').notNull(),
  source: learnedSourceEnum('source').default('learned').notNull(),
  confidence: real('confidence').default(0.9).notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
