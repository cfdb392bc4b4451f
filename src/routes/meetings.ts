import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { createRequireAuth, getRequestContext, type AuthRequest } from '../middlewares/auth';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { sendDomainError, sendServerError, sendValidationError } from './helpers';

const instantSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const slotSchema = z.object({
  startsAt: instantSchema,
  durationMinutes: z.number().int().positive().optional(),
});

const participantSelectionSchema = z
  .object({
    contactIds: z.array(z.string().min(1)).optional(),
    groupIds: z.array(z.string().min(1)).optional(),
  })
  .refine((selection) => (selection.contactIds?.length ?? 0) + (selection.groupIds?.length ?? 0) > 0, {
    message: 'Select at least one contact or group',
  });

const createMeetingSchema = z.object({
  title: z.string().min(1).max(500),
  description: z.string().max(10000).optional(),
  slots: z.array(slotSchema).min(1),
  participants: participantSelectionSchema,
  sendNow: z.boolean().default(true),
});

const finalizeSchema = z.object({
  slotId: z.string().min(1),
});

export function createMeetingsRouter(
  services: Pick<
    DomainServiceContainer,
    'authService' | 'meetingService' | 'schedulingService'
  >,
): Router {
  const router = Router();
  const { meetingService, schedulingService } = services;

  router.use(createRequireAuth(services.authService));

  // GET /v1/meetings - newest first
  router.get(
    '/',
    async (req: AuthRequest, res) => {
      try {
        const meetings = await meetingService.listMeetings(getRequestContext(req));
        res.json({ meetings });
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to fetch meetings', error);
      }
    },
  );

  // POST /v1/meetings - creates the draft and sends invitations unless sendNow is false
  router.post(
    '/',
    async (req: AuthRequest, res) => {
      try {
        const parsed = createMeetingSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const ctx = getRequestContext(req);
        const { sendNow, ...request } = parsed.data;
        const created = await meetingService.createMeeting(ctx, request);
        if (!created.ok) {
          sendDomainError(res, created.error);
          return;
        }

        if (!sendNow) {
          res.status(201).json({ ...created.value, deliveries: null });
          return;
        }

        const sent = await meetingService.sendInvitations(ctx, created.value.meeting.id);
        if (!sent.ok) {
          functions.logger.error(
            `[meetings] Meeting ${created.value.meeting.id} created but not sent: ${sent.error.reason}`,
          );
          sendDomainError(res, sent.error);
          return;
        }

        res.status(201).json({
          ...created.value,
          meeting: sent.value.meeting,
          deliveries: sent.value.deliveries,
        });
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to create meeting', error);
      }
    },
  );

  // GET /v1/meetings/:meetingId
  router.get(
    '/:meetingId',
    async (req: AuthRequest, res) => {
      try {
        const result = await meetingService.getMeeting(getRequestContext(req), req.params.meetingId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to fetch meeting', error);
      }
    },
  );

  // DELETE /v1/meetings/:meetingId
  router.delete(
    '/:meetingId',
    async (req: AuthRequest, res) => {
      try {
        const result = await meetingService.deleteMeeting(getRequestContext(req), req.params.meetingId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to delete meeting', error);
      }
    },
  );

  // GET /v1/meetings/:meetingId/summary - organizer dashboard
  router.get(
    '/:meetingId/summary',
    async (req: AuthRequest, res) => {
      try {
        const result = await schedulingService.getMeetingSummary(
          getRequestContext(req),
          req.params.meetingId,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to fetch summary', error);
      }
    },
  );

  // GET /v1/meetings/:meetingId/rankings
  router.get(
    '/:meetingId/rankings',
    async (req: AuthRequest, res) => {
      try {
        const result = await schedulingService.rankSlots(getRequestContext(req), req.params.meetingId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ rankings: result.value });
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to fetch rankings', error);
      }
    },
  );

  // POST /v1/meetings/:meetingId/send
  router.post(
    '/:meetingId/send',
    async (req: AuthRequest, res) => {
      try {
        const result = await meetingService.sendInvitations(
          getRequestContext(req),
          req.params.meetingId,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to send invitations', error);
      }
    },
  );

  // POST /v1/meetings/:meetingId/reminders
  router.post(
    '/:meetingId/reminders',
    async (req: AuthRequest, res) => {
      try {
        const result = await meetingService.sendReminders(getRequestContext(req), req.params.meetingId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to send reminders', error);
      }
    },
  );

  // POST /v1/meetings/:meetingId/slots
  router.post(
    '/:meetingId/slots',
    async (req: AuthRequest, res) => {
      try {
        const parsed = slotSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await meetingService.addSlot(
          getRequestContext(req),
          req.params.meetingId,
          parsed.data,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.status(201).json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to add slot', error);
      }
    },
  );

  // DELETE /v1/meetings/:meetingId/slots/:slotId - removes the slot's responses too
  router.delete(
    '/:meetingId/slots/:slotId',
    async (req: AuthRequest, res) => {
      try {
        const result = await meetingService.deleteSlot(
          getRequestContext(req),
          req.params.meetingId,
          req.params.slotId,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to remove slot', error);
      }
    },
  );

  // POST /v1/meetings/:meetingId/participants
  router.post(
    '/:meetingId/participants',
    async (req: AuthRequest, res) => {
      try {
        const parsed = participantSelectionSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await meetingService.addParticipants(
          getRequestContext(req),
          req.params.meetingId,
          parsed.data,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to add participants', error);
      }
    },
  );

  // POST /v1/meetings/:meetingId/finalize
  router.post(
    '/:meetingId/finalize',
    async (req: AuthRequest, res) => {
      try {
        const parsed = finalizeSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await schedulingService.finalize(
          getRequestContext(req),
          req.params.meetingId,
          parsed.data.slotId,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to finalize meeting', error);
      }
    },
  );

  // POST /v1/meetings/:meetingId/cancel
  router.post(
    '/:meetingId/cancel',
    async (req: AuthRequest, res) => {
      try {
        const result = await meetingService.cancelMeeting(getRequestContext(req), req.params.meetingId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ meeting: result.value });
      } catch (error) {
        sendServerError(res, 'meetings', 'Failed to cancel meeting', error);
      }
    },
  );

  return router;
}
