import type { Response } from 'express';
import * as functions from 'firebase-functions';
import type { ZodError } from 'zod';
import type { DomainError, DomainErrorKind } from '../services/domain/common/results';
import { StorageTimeoutError } from '../services/repositories/common/errors';
import { captureException } from '../utils/sentry';

export const DOMAIN_ERROR_STATUS: Record<DomainErrorKind, number> = {
  not_found: 404,
  conflict: 409,
  invalid_state: 409,
  forbidden: 403,
  constraint_violation: 409,
  validation_failed: 400,
  unauthorized: 401,
};

export function sendDomainError(res: Response, error: DomainError): void {
  res.status(DOMAIN_ERROR_STATUS[error.kind]).json({
    code: error.kind,
    reason: error.reason,
    message: error.message,
    ...(error.details ? { details: error.details } : {}),
  });
}

export function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    code: 'validation_failed',
    message: 'Invalid request body',
    details: error.flatten().fieldErrors,
  });
}

/**
 * Answers a request whose handler threw. Storage timeouts become a 503 the
 * client can retry; anything else is logged and reported as a 500.
 */
export function sendServerError(
  res: Response,
  area: string,
  failureMessage: string,
  error: unknown,
): void {
  if (error instanceof StorageTimeoutError) {
    functions.logger.warn(`[${area}] ${failureMessage}: ${error.message}`);
    res.status(503).json({
      code: 'storage_unavailable',
      message: 'The service is temporarily unavailable. Please try again.',
    });
    return;
  }

  functions.logger.error(`[${area}] ${failureMessage}:`, error);
  captureException(error, { area });
  res.status(500).json({ code: 'server_error', message: failureMessage });
}
