import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { env } from './config/env';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/logger';
import { createExtractRouter } from './routes/extract';
import { createLearnedRouter } from './routes/learned';
import { createLookupRouter } from './routes/lookup';
import type { ExtractionService } from './services/resolution';

export interface AppDependencies {
  extractionService: ExtractionService;
  maxUploadBytes: number;
}

export function createApp(deps: AppDependencies) {
  const app = express();

  app.use(helmet());

  app.use(
    cors({
      origin: env.NODE_ENV === 'development' ? ['http://localhost:5173', 'http://localhost:3001'] : [],
    })
  );

  app.use(express.json({ limit: deps.maxUploadBytes }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(requestLogger);

  app.use('/api/extract', createExtractRouter(deps.extractionService, { maxUploadBytes: deps.maxUploadBytes }));
  app.use('/api/lookup', createLookupRouter(deps.extractionService));
  app.use('/api/learned', createLearnedRouter(deps.extractionService));

  app.use(errorHandler);

  return app;
}
