import type { Request, Response } from 'express';
import { createErrorResponse } from '@/utils/errorResponse';

export function notFoundHandler(req: Request, res: Response): void {
  res
    .status(404)
    .json(createErrorResponse(`Route ${req.method} ${req.originalUrl} not found`, undefined, 'NOT_FOUND'));
}
