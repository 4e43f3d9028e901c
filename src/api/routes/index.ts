import { Router } from 'express';

import type { AppContainer } from '../../container.js';

import webhookRoutes from './webhook.routes.js';
import devRoutes from './dev.routes.js';

export default function apiRouter(container: AppContainer, env: string): Router {
  const v1Router = Router();
  v1Router.use('/webhook', webhookRoutes(container));
  if (env !== 'production') {
    v1Router.use(devRoutes(container.pipeline));
  }

  const router = Router();
  router.use('/v1', v1Router);
  return router;
}
