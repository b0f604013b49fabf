import { NextFunction, Request, Response } from 'express';
import { CoreError, describeError } from '../utils/errors';
import type { AppLogger } from '../utils/logger';
import { getServices } from '../services';

export interface ErrorBody {
  error: string;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

// The slice of express.Response that error rendering needs.
export interface ErrorResponder {
  status(code: number): { json(body: ErrorBody): unknown };
}

/** Writes a reason-coded failure; anything outside the taxonomy is a logged 500. */
export const sendError = (res: ErrorResponder, error: unknown, logger: AppLogger): void => {
  if (error instanceof CoreError) {
    const body: ErrorBody = {
      error: error.code,
      message: error.message,
      retryable: error.retryable,
      ...(error.details ? { details: error.details } : {}),
    };
    if (error.status >= 500) {
      logger.error('request.dependency_failed', { code: error.code, error: error.message });
    }
    res.status(error.status).json(body);
    return;
  }

  logger.error('request.unhandled_error', {
    error: describeError(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  const body: ErrorBody = {
    error: 'INTERNAL_ERROR',
    message: 'Server error',
    retryable: false,
  };
  res.status(500).json(body);
};

export const createErrorHandler =
  (logger: AppLogger) =>
  (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (!(err instanceof CoreError)) {
      logger.error('request.failed', { method: req.method, path: req.path });
    }
    sendError(res, err, logger);
  };

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
    retryable: false,
  });
};

// Controllers catch locally and render through the shared service logger.
export const failRequest = (res: Response, error: unknown): void => {
  sendError(res, error, getServices().logger);
};
