import { env } from './config/env';
import { closeDatabase, db, testConnection } from './config/database';
import { createApp } from './app';
import { logger } from './utils/logger';
import { noopResponseCache, ResponseCacheService } from './services/cache';
import { createRedisClient } from './services/redis';
import {
  createDefaultSources,
  JsonHttpClient,
  KnowledgeAggregator,
  loadGlossaryPacks,
} from './services/knowledge';
import { DrizzleLearnedStore } from './services/learned';
import { ExtractionService } from './services/resolution';

const redis = env.REDIS_URL ? createRedisClient(env.REDIS_URL) : null;
const cache = redis ? new ResponseCacheService(redis) : noopResponseCache;

const http = new JsonHttpClient({
  timeoutMs: env.WEB_TIMEOUT_MS,
  userAgent: env.WEB_USER_AGENT,
});

const aggregator = new KnowledgeAggregator(createDefaultSources(http, loadGlossaryPacks()), cache, {
  defaultLimit: env.WEB_MAX_CANDIDATES,
});

const extractionService = new ExtractionService(
  { learnedStore: new DrizzleLearnedStore(db), lookup: aggregator },
  {
    includeCommonTerms: env.INCLUDE_COMMON_TERMS,
    webLookupEnabled: env.WEB_LOOKUP_ENABLED,
    maxCandidates: env.WEB_MAX_CANDIDATES,
    concurrency: env.RESOLVE_CONCURRENCY,
  }
);

const app = createApp({
  extractionService,
  maxUploadBytes: env.MAX_UPLOAD_MB * 1024 * 1024,
});

const server = app.listen(env.PORT, '0.0.0.0', () => {
  logger.info(`Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);
  if (!redis) {
    logger.warn('REDIS_URL not set, knowledge lookups are not cached');
  }
  testConnection().catch((error: unknown) => {
    logger.error({ error }, 'Database check failed');
  });
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully`);
  server.close(() => {
    logger.info('Server closed');
  });
  try {
    await Promise.all([closeDatabase(), redis ? redis.quit() : Promise.resolve()]);
  } catch (error) {
    logger.error({ error }, 'Error while closing connections');
  }
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
