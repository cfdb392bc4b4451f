import { Router } from 'express';
import { z } from 'zod';
import { authLimiter } from '../middlewares/rateLimit';
import {
  createRequireAuth,
  getRequestContext,
  readBearerToken,
  type AuthRequest,
} from '../middlewares/auth';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { sendDomainError, sendServerError, sendValidationError } from './helpers';

const MIN_PASSWORD_LENGTH = 8;

const registerSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(MIN_PASSWORD_LENGTH).max(200),
  name: z.string().max(200).optional(),
  recoveryPhrase: z.string().trim().min(1).max(500),
});

const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1).max(200),
});

const resetPasswordSchema = z.object({
  email: z.string().trim().email(),
  recoveryPhrase: z.string().trim().min(1).max(500),
  newPassword: z.string().min(MIN_PASSWORD_LENGTH).max(200),
});

export function createAuthRouter(services: Pick<DomainServiceContainer, 'authService'>): Router {
  const router = Router();
  const { authService } = services;
  const requireAuth = createRequireAuth(authService);

  // POST /v1/auth/register
  router.post(
    '/register',
    authLimiter,
    async (req, res) => {
      try {
        const parsed = registerSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await authService.register(parsed.data);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.status(201).json({ organizer: result.value });
      } catch (error) {
        sendServerError(res, 'auth', 'Failed to register', error);
      }
    },
  );

  // POST /v1/auth/login
  router.post(
    '/login',
    authLimiter,
    async (req, res) => {
      try {
        const parsed = loginSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await authService.login(parsed.data.email, parsed.data.password);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'auth', 'Failed to log in', error);
      }
    },
  );

  // POST /v1/auth/logout
  router.post(
    '/logout',
    async (req, res) => {
      try {
        const token = readBearerToken(req);
        if (token) {
          await authService.logout(token);
        }
        res.status(204).end();
      } catch (error) {
        sendServerError(res, 'auth', 'Failed to log out', error);
      }
    },
  );

  // POST /v1/auth/reset-password
  router.post(
    '/reset-password',
    authLimiter,
    async (req, res) => {
      try {
        const parsed = resetPasswordSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const { email, recoveryPhrase, newPassword } = parsed.data;
        const result = await authService.resetPassword(email, recoveryPhrase, newPassword);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ reset: true });
      } catch (error) {
        sendServerError(res, 'auth', 'Failed to reset password', error);
      }
    },
  );

  // GET /v1/auth/me
  router.get(
    '/me',
    requireAuth,
    async (req: AuthRequest, res) => {
      try {
        const ctx = getRequestContext(req);
        const result = await authService.getOrganizer(ctx.organizerId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ organizer: result.value });
      } catch (error) {
        sendServerError(res, 'auth', 'Failed to fetch account', error);
      }
    },
  );

  return router;
}
