import type { NextFunction, Request, Response } from 'express';
import { httpErrorFor } from '@/utils/errorResponse';
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';

/** Last middleware: maps domain errors to the standard error envelope. */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  // express.json() parse failures carry a 4xx status of their own
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({ success: false, message: 'Malformed JSON body', code: 'BAD_JSON' });
    return;
  }

  const { status, body } = httpErrorFor(err);
  const context = {
    path: req.originalUrl,
    method: req.method,
    status,
    correlationId: res.locals.correlationId,
    err: errorMessage(err),
  };
  if (status >= 500 && status !== 503) logger.error('http:error', context);
  else logger.warn('http:error', context);

  res.status(status).json(body);
}
