import { Router, type NextFunction, type Request, type Response } from 'express';
import type { Services } from '../services';
import { uniqueQuerySchema } from '../utils/validation';
import { serializeDocument } from './serializers';

export function createCollectionRoutes({ index, config }: Services): Router {
  const router = Router();

  router.get('/collections/count', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ count: await index.count() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/collections/unique', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { attribute } = uniqueQuerySchema.parse(req.query);
      const values = await index.uniqueValues(attribute);
      res.json({ attribute, values });
    } catch (error) {
      next(error);
    }
  });

  router.get('/collections/files', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const documents = await index.listDocuments();
      res.json({ files: documents.map((doc) => serializeDocument(doc, config.FILE_SERVER_URL)) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/collections/name', (_req: Request, res: Response) => {
    res.json({ name: config.COLLECTION_NAME, store: index.backend });
  });

  router.delete('/collections', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await index.clear();
      res.json({ cleared: true });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
