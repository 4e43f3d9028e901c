import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { apiRouter, createHealthHandler } from './api/index.js';
import type { AppContainer } from './container.js';
import { errorMiddleware } from './middleware/index.js';

/** Body parsing is per route: webhooks need the raw bytes for signature checks. */
export function createApp(container: AppContainer, env: string): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  app.get('/health', createHealthHandler(container.reference));
  app.use('/', apiRouter(container, env));
  app.use(errorMiddleware);

  return app;
}
