import { Router, type Request } from 'express';
import multer from 'multer';
import { readUploadedDocument, type DocumentSource } from '../services/documents';
import { toCsv } from '../services/export/csv';
import type { ExtractionOptions, ExtractionService } from '../services/resolution';
import { bodyFields, extractionOptionsSchema, textDocumentSchema, toDocumentSource } from './params';

export interface ExtractRouterOptions {
  maxUploadBytes: number;
}

async function readRequestDocument(req: Request): Promise<DocumentSource> {
  if (req.file) {
    return readUploadedDocument(req.file.originalname, req.file.buffer);
  }
  return toDocumentSource(textDocumentSchema.parse(bodyFields(req.body)));
}

function readOptions(req: Request): ExtractionOptions {
  return extractionOptionsSchema.parse({ ...req.query, ...bodyFields(req.body) });
}

export function createExtractRouter(service: ExtractionService, options: ExtractRouterOptions): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: options.maxUploadBytes } });

  router.post('/', upload.single('file'), async (req, res, next) => {
    try {
      const extractionOptions = readOptions(req);
      const document = await readRequestDocument(req);
      const result = await service.extract(document, extractionOptions);

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post('/csv', upload.single('file'), async (req, res, next) => {
    try {
      const extractionOptions = readOptions(req);
      const document = await readRequestDocument(req);
      const result = await service.extract(document, extractionOptions);

      res.attachment('acronyms.csv');
      res.type('text/csv');
      res.send(toCsv(result.acronyms));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
