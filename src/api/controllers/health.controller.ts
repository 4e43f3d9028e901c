import type { Request, RequestHandler, Response } from 'express';

import type { ReferenceProvider } from '@services/reference/reference.provider.js';

export function createHealthHandler(reference: ReferenceProvider): RequestHandler {
  return (_req: Request, res: Response) => {
    const snapshot = reference.peek();
    res.status(200).json({
      status: 'ok',
      reference: snapshot ? { version: snapshot.version, loadedAt: snapshot.loadedAt } : null,
    });
  };
}
