import express from 'express';
import type { Router } from 'express';

import { errorMiddleware } from '@middleware/error.middleware.js';

/** Routers bring their own body parsers; webhooks need the raw body. */
export function buildTestApp(router: Router, base = '/v1') {
  const app = express();
  app.use(base, router);
  app.use(errorMiddleware);
  return app;
}
