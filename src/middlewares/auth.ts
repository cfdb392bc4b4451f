import type { NextFunction, Request, RequestHandler, Response } from 'express';
import * as functions from 'firebase-functions';
import type { OrganizerAuthService } from '../services/domain/organizers/OrganizerAuthService';
import type { RequestContext } from '../types/scheduling';
import { setUser } from '../utils/sentry';

export interface AuthRequest extends Request {
  context?: RequestContext;
}

export function readBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice('Bearer '.length).trim();
  return token.length > 0 ? token : null;
}

/**
 * Resolves the bearer session token into the organizer's request context.
 */
export function createRequireAuth(
  authService: Pick<OrganizerAuthService, 'resolveSession'>,
): RequestHandler {
  return async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    const token = readBearerToken(req);
    if (!token) {
      res.status(401).json({
        code: 'unauthorized',
        message: 'Missing or invalid authorization header',
      });
      return;
    }

    try {
      const context = await authService.resolveSession(token);
      if (!context) {
        res.status(401).json({
          code: 'unauthorized',
          message: 'Invalid or expired session',
        });
        return;
      }

      req.context = context;
      setUser(context.organizerId, context.organizerEmail);
      next();
    } catch (error) {
      functions.logger.error('[auth] Session lookup failed', error);
      next(error);
    }
  };
}

export function getRequestContext(req: AuthRequest): RequestContext {
  if (!req.context) {
    throw new Error('Request context missing; requireAuth must run before this handler');
  }
  return req.context;
}
