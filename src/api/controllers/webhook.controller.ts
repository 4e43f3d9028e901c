import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { NotFoundError, SignatureError } from '@core/errors/index.js';
import { isPlatform } from '@core/interfaces/message.types.js';

import type { AdapterRegistry, PlatformAdapter } from '@services/messaging/platform.adapter.js';
import type { MessageQueue } from '@services/queue/queue.manager.js';

import { logger } from '@utils/logger.js';
import { nowISO } from '@utils/time.js';

export interface WebhookDeps {
  adapters: AdapterRegistry;
  queue: MessageQueue;
}

function adapterFor(req: Request, adapters: AdapterRegistry): PlatformAdapter {
  const platform = req.params.platform ?? '';
  const adapter = isPlatform(platform) ? adapters.get(platform) : undefined;
  if (!adapter) throw new NotFoundError(`Unknown platform: ${platform}`);
  return adapter;
}

function parseJson(raw: Buffer): unknown {
  if (raw.length === 0) return {};
  try {
    return JSON.parse(raw.toString('utf8'));
  } catch {
    logger.warn('[webhook] body is not JSON', { bytes: raw.length });
    return {};
  }
}

export function createWebhookController({ adapters, queue }: WebhookDeps) {
  const verifyHandler: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
    try {
      const challenge = adapterFor(req, adapters).verifyChallenge(req.query);
      if (challenge === null) {
        res.sendStatus(403);
        return;
      }
      res.status(200).send(challenge);
    } catch (err) {
      next(err);
    }
  };

  const webhookHandler: RequestHandler = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const adapter = adapterFor(req, adapters);
      const raw = req.rawBody ?? Buffer.alloc(0);
      if (!adapter.verifySignature(raw, req.headers)) throw new SignatureError();

      const messages = adapter.parseInbound(parseJson(raw), nowISO());
      for (const msg of messages) {
        await queue.enqueue(msg);
      }
      logger.debug('[webhook] accepted', { platform: adapter.platform, messages: messages.length });
      res.sendStatus(200);
    } catch (err) {
      next(err);
    }
  };

  return { verifyHandler, webhookHandler };
}
