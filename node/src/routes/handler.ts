// Adapts a transport-free handler to Express. The handler's AbortSignal fires when the client goes away.
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { HttpResult } from '@/utils/errorResponse';
import { logger } from '@/services/logger';

export interface HandlerInput {
  body: unknown;
  params: Record<string, string>;
}

export type Handler = (input: HandlerInput, signal: AbortSignal) => Promise<HttpResult>;

export function toExpress(handler: Handler): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await handler({ body: req.body, params: req.params }, controller.signal);
      if (result.body === undefined) {
        res.status(result.status).end();
      } else {
        res.status(result.status).json(result.body);
      }
    } catch (err) {
      if (controller.signal.aborted) {
        // connection is gone; nothing to send
        logger.debug('http:client_closed', {
          path: req.originalUrl,
          correlationId: res.locals.correlationId,
        });
        return;
      }
      next(err);
    }
  };
}
