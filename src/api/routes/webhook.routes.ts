import { Router } from 'express';

import { createWebhookController, type WebhookDeps } from '../controllers/webhook.controller.js';
import { rawBody } from '../../middleware/raw-body.js';

export default function webhookRoutes(deps: WebhookDeps): Router {
  const { verifyHandler, webhookHandler } = createWebhookController(deps);
  const router = Router();
  router.get('/:platform', verifyHandler);
  router.post('/:platform', rawBody, webhookHandler);
  return router;
}
