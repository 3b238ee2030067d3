import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { Services } from './services';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/logger';
import { createCollectionRoutes } from './routes/collections';
import { createDocumentRoutes } from './routes/documents';
import { createRetrieveRoutes } from './routes/retrieve';

export function createApp(services: Services) {
  const app = express();

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          upgradeInsecureRequests: null,
        },
      },
    })
  );

  app.use(
    cors({
      origin: services.config.NODE_ENV === 'development' ? ['http://localhost:5173', 'http://localhost:3001'] : [],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', store: services.index.backend });
  });

  app.use(requestLogger);

  app.use(createRetrieveRoutes(services));
  app.use(createDocumentRoutes(services));
  app.use(createCollectionRoutes(services));

  app.use(errorHandler);

  return app;
}
