import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';

import { BaseError } from '@core/errors/index.js';

import { logger } from '@utils/logger.js';

interface ErrorBody {
  message: string;
  code: string;
  traceId: string;
  data?: Record<string, unknown>;
}

export const errorMiddleware = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  const traceId = randomUUID();

  if (err instanceof BaseError) {
    const body: ErrorBody = { message: err.message, code: err.code, traceId };
    if (err.data !== undefined) body.data = err.data;
    if (err.status >= 500) {
      logger.error('[http] request failed', { traceId, path: req.path, code: err.code, err });
    }
    res.status(err.status).json(body);
    return;
  }

  // express.json() rejects malformed bodies with a 400-status SyntaxError
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    const body: ErrorBody = { message: 'Malformed JSON body', code: 'BAD_REQUEST', traceId };
    res.status(400).json(body);
    return;
  }

  logger.error('[http] unhandled error', { traceId, path: req.path, err });
  const body: ErrorBody = { message: 'Internal server error', code: 'INTERNAL_ERROR', traceId };
  res.status(500).json(body);
};
