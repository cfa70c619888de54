/**
 * Standard response envelopes and the mapping from domain errors to HTTP status codes.
 */
import {
  IndexCorruptionError,
  TotalRetrievalFailureError,
  errorMessage,
} from '@/services/errors';
import type { ValidationIssue } from '@/validation/request.validation';

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: ValidationIssue[];
  code?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export interface HttpResult<T = unknown> {
  status: number;
  /** Absent for 204. */
  body?: SuccessResponse<T> | ErrorResponse;
}

export function createErrorResponse(
  message: string,
  errors?: ValidationIssue[],
  code?: string,
): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}

export function validationFailure(errors: ValidationIssue[]): HttpResult<never> & { body: ErrorResponse } {
  return {
    status: 400,
    body: createErrorResponse('Invalid request', errors, 'VALIDATION_ERROR'),
  };
}

/** 503 while retrieval cannot serve at all; 500 for anything unexpected. */
export function httpErrorFor(err: unknown): HttpResult<never> & { body: ErrorResponse } {
  if (err instanceof TotalRetrievalFailureError) {
    return {
      status: 503,
      body: createErrorResponse(
        'Search is temporarily unavailable',
        err.failures.map((f) => ({ path: f.source, message: f.reason })),
        err.code,
      ),
    };
  }
  if (err instanceof IndexCorruptionError) {
    return { status: 503, body: createErrorResponse(err.message, undefined, err.code) };
  }
  return {
    status: 500,
    body: createErrorResponse(
      process.env.NODE_ENV === 'production' ? 'Internal server error' : errorMessage(err),
      undefined,
      'INTERNAL_ERROR',
    ),
  };
}
