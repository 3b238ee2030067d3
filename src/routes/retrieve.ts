import { Router, type NextFunction, type Request, type Response } from 'express';
import type { Services } from '../services';
import { responseSignal } from '../utils/http';
import {
  ragQuerySchema,
  retrieveQuerySchema,
  stanceBodySchema,
  toSearchFilters,
} from '../utils/validation';
import { serializeEvidence, serializeVerdict } from './serializers';

export function createRetrieveRoutes({ retriever, stance }: Services): Router {
  const router = Router();

  router.get('/retrieve', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = retrieveQuerySchema.parse(req.query);
      const result = await retriever.retrieve(
        query.query,
        toSearchFilters(query),
        query.top_k,
        responseSignal(res)
      );
      res.json({
        query: result.query,
        top_k: result.topK,
        reranked: result.reranked,
        results: result.evidence.map(serializeEvidence),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/rag', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = ragQuerySchema.parse(req.query);
      const signal = responseSignal(res);
      const result = await retriever.retrieve(query.query, toSearchFilters(query), query.top_k, signal);
      const verdict = await stance.assess(result.evidence, query.query, {
        subject: query.subject ?? query.author,
        signal,
      });
      res.json({
        query: result.query,
        subject: verdict.subject ?? null,
        top_k: result.topK,
        reranked: result.reranked,
        verdict: serializeVerdict(verdict),
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/stance', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = stanceBodySchema.parse(req.body);
      const judgment = await stance.judgeOne(body.query, body.evidence, body.author, responseSignal(res));
      res.json({ score: judgment.score, reason: judgment.reason });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
