import { Router } from 'express';
import { z } from 'zod';
import type { ExtractionService } from '../services/resolution';
import { NotFoundError } from '../utils/errors';
import { termSchema } from './params';

const learnDefinitionSchema = z.object({
  definition: z.string().trim().min(1).max(500),
  source: z.enum(['learned', 'user']).default('user'),
  confidence: z.number().min(0).max(1).default(1),
});

export function createLearnedRouter(service: ExtractionService): Router {
  const router = Router();

  router.get('/:term', async (req, res, next) => {
    try {
      const term = termSchema.parse(req.params.term);
      const entry = await service.getLearned(term);

      if (!entry) {
        throw new NotFoundError(`No learned definition for ${term}`, 'LEARNED_NOT_FOUND');
      }

      res.json(entry);
    } catch (error) {
      next(error);
    }
  });

  router.put('/:term', async (req, res, next) => {
    try {
      const term = termSchema.parse(req.params.term);
      const { definition, source, confidence } = learnDefinitionSchema.parse(req.body);
      const result = await service.learn(term, definition, source, confidence);

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
