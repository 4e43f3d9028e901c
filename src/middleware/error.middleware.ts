import { randomUUID } from 'crypto';

import type { Request, Response, NextFunction } from 'express';

import { BaseError } from '@core/errors/base-error.js';

import { logger } from '@utils/logger.js';

interface ErrorPayload {
  message: string;
  code: string;
  traceId: string;
  data?: unknown;
}

export const errorMiddleware = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const traceId = randomUUID();
  const status = err instanceof BaseError ? err.status : 500;
  const code = err instanceof BaseError ? err.code : 'INTERNAL_ERROR';

  if (status >= 500) {
    logger.error('[http] request failed', { traceId, path: req.path, err });
  } else {
    logger.warn('[http] request rejected', { traceId, path: req.path, code });
  }

  const payload: ErrorPayload = {
    message: status >= 500 && !(err instanceof BaseError) ? 'Internal server error' : err.message,
    code,
    traceId,
  };

  if (err instanceof BaseError && err.data !== undefined) {
    try {
      payload.data = JSON.parse(JSON.stringify(err.data));
    } catch {
      payload.data = String(err.data);
    }
  }

  res.status(status).json(payload);
};
