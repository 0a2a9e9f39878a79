import { Router } from 'express';
import type { ExtractionService } from '../services/resolution';
import { lookupOptionsSchema, termSchema } from './params';

export function createLookupRouter(service: ExtractionService): Router {
  const router = Router();

  router.get('/:term', async (req, res, next) => {
    try {
      const term = termSchema.parse(req.params.term);
      const options = lookupOptionsSchema.parse(req.query);
      const result = await service.lookup(term, options);

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
