import { config } from '@config/env.config.js';

import { logger } from '@utils/logger.js';

import { createApp } from './app.js';
import { createContainer } from './container.js';

async function bootstrap() {
  const container = await createContainer(config);
  // fail fast on bad reference data; later refresh failures keep the last snapshot
  await container.reference.refresh();
  container.start();

  const app = createApp(container, config.NODE_ENV);
  const server = app.listen(config.PORT, () => {
    logger.info('[server] listening', { port: config.PORT, env: config.NODE_ENV });
  });

  const shutdown = (signal: string) => {
    logger.info('[server] shutting down', { signal });
    server.close();
    container
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('[server] shutdown failed', { err });
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((err: unknown) => {
  logger.error('[server] fatal bootstrap error', { err });
  process.exit(1);
});
