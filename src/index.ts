import { env } from './config/env';
import { createApp } from './app';
import { createServices } from './services';
import { errorMessage, logger } from './utils/logger';

const services = createServices(env);

try {
  await services.index.init();
} catch (error) {
  logger.fatal({ error: errorMessage(error) }, 'Vector index failed to initialize');
  process.exit(1);
}

const app = createApp(services);

const server = app.listen(env.PORT, '0.0.0.0', () => {
  logger.info(`Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);
});

function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down gracefully`);
  server.close(() => {
    services
      .close()
      .then(() => {
        logger.info('Server closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Shutdown failed');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
