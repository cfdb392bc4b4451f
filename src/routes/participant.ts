import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { participantLimiter } from '../middlewares/rateLimit';
import type { DomainError } from '../services/domain/common/results';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { AVAILABILITY_VALUES } from '../types/scheduling';
import { sendDomainError, sendServerError, sendValidationError } from './helpers';

const suggestionSchema = z.object({
  startsAt: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
  note: z.string().max(5000).nullable().optional(),
});

const submissionSchema = z.object({
  answers: z.record(z.string().min(1), z.enum(AVAILABILITY_VALUES)).default({}),
  suggestion: suggestionSchema.nullable().optional(),
});

function readToken(req: Request): unknown {
  return req.query.token;
}

/**
 * Every token failure answers the same way, whether the token is malformed,
 * unknown or points at a deleted meeting.
 */
function sendParticipantError(res: Response, error: DomainError): void {
  if (error.reason === 'invalid_token') {
    res.status(404).json({
      code: 'invalid_link',
      message: 'This link is invalid or has expired.',
    });
    return;
  }
  sendDomainError(res, error);
}

export function createParticipantRouter(
  services: Pick<DomainServiceContainer, 'responseService'>,
): Router {
  const router = Router();
  const { responseService } = services;

  // GET /v1/respond?token=...
  router.get(
    '/',
    async (req, res) => {
      try {
        const result = await responseService.getParticipantView(readToken(req));
        if (!result.ok) {
          sendParticipantError(res, result.error);
          return;
        }
        res.set('Cache-Control', 'no-store');
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'respond', 'Failed to load invitation', error);
      }
    },
  );

  // POST /v1/respond?token=... - answers for several slots, optionally with a suggestion
  router.post(
    '/',
    participantLimiter,
    async (req, res) => {
      try {
        const parsed = submissionSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const answers = Object.entries(parsed.data.answers).map(([slotId, availability]) => ({
          slotId,
          availability,
        }));
        const result = await responseService.submitAll(
          readToken(req),
          answers,
          parsed.data.suggestion ?? null,
        );
        if (!result.ok) {
          sendParticipantError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'respond', 'Failed to record responses', error);
      }
    },
  );

  // POST /v1/respond/suggestion?token=...
  router.post(
    '/suggestion',
    participantLimiter,
    async (req, res) => {
      try {
        const parsed = suggestionSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await responseService.suggestAlternative(readToken(req), parsed.data);
        if (!result.ok) {
          sendParticipantError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'respond', 'Failed to record suggestion', error);
      }
    },
  );

  return router;
}
