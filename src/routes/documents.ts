import { Router, type NextFunction, type Request, type Response } from 'express';
import type { Services } from '../services';
import { NotFoundError } from '../utils/errors';
import { responseSignal } from '../utils/http';
import { deleteBodySchema, insertBodySchema } from '../utils/validation';

export function createDocumentRoutes({ ingestion }: Services): Router {
  const router = Router();

  router.post('/insert', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = insertBodySchema.parse(req.body);
      const result = await ingestion.ingestFile(
        body.file_path,
        { author: body.author, region: body.region ?? null, date: body.date ?? null },
        responseSignal(res)
      );
      res.json({
        document_id: result.documentId,
        num_chunks: result.chunkCount,
        status: result.status,
        language: result.language,
        failed_pages: result.failedPages,
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/delete', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = deleteBodySchema.parse(req.body);
      const deleted = await ingestion.remove(body.file_name, responseSignal(res));
      res.json({ deleted });
    } catch (error) {
      next(error);
    }
  });

  router.get('/documents/:id/status', (req: Request, res: Response, next: NextFunction) => {
    const status = ingestion.getStatus(req.params.id);
    if (!status) {
      next(new NotFoundError(`No ingestion recorded for ${req.params.id}`, 'STATUS_NOT_FOUND'));
      return;
    }
    res.json({ status, busy: ingestion.isBusy(req.params.id) });
  });

  return router;
}
