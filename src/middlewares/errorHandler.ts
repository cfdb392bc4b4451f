import type { NextFunction, Request, Response } from 'express';
import * as functions from 'firebase-functions';
import { StorageTimeoutError } from '../services/repositories/common/errors';
import { captureException } from '../utils/sentry';

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof StorageTimeoutError) {
    functions.logger.warn(`[storage] ${err.message} (${req.method} ${req.path})`);
    res.status(503).json({
      code: 'storage_unavailable',
      message: 'The service is temporarily unavailable. Please try again.',
    });
    return;
  }

  captureException(err, { method: req.method, path: req.path });

  if (process.env.NODE_ENV === 'production') {
    res.status(500).json({
      code: 'server_error',
      message: 'An unexpected error occurred',
    });
  } else {
    res.status(500).json({
      code: 'server_error',
      message: err.message,
      stack: err.stack,
    });
  }
}
