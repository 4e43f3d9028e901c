import express, { Router, type NextFunction, type Request, type Response } from 'express';
import { randomUUID } from 'crypto';
import { z } from 'zod';

import { ValidationError } from '@core/errors/index.js';
import { PLATFORMS } from '@core/interfaces/message.types.js';

import type { MessagePipeline } from '@services/pipeline/message.pipeline.js';
import { toInbound } from '@services/messaging/platform.adapter.js';

import { nowISO } from '@utils/time.js';

const ChatBody = z.object({
  platform: z.enum(PLATFORMS).default('whatsapp'),
  userId: z.string().min(1),
  text: z.string().min(1).max(2000),
  messageId: z.string().min(1).optional(),
});

/** Runs the pipeline synchronously and returns the outcome instead of sending it. */
export default function devRoutes(pipeline: MessagePipeline): Router {
  const router = Router();
  router.use(express.json());

  router.post('/dev/chat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = ChatBody.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
      }
      const { platform, userId, text, messageId } = parsed.data;
      const outcome = await pipeline.handle(toInbound(platform, userId, text, messageId ?? randomUUID(), nowISO()));
      res.json(outcome);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
