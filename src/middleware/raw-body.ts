import type { RequestHandler } from 'express';
import { raw } from 'express';

/** Keeps the exact request bytes for HMAC verification; JSON parsing happens per platform. */
export const rawBody: RequestHandler = (req, res, next) => {
  raw({ type: '*/*', limit: '1mb' })(req, res, (err?: unknown) => {
    if (err) return next(err);
    req.rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    next();
  });
};
