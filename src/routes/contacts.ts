import { Router } from 'express';
import { z } from 'zod';
import { createRequireAuth, getRequestContext, type AuthRequest } from '../middlewares/auth';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { sendDomainError, sendServerError, sendValidationError } from './helpers';

const contactSchema = z.object({
  name: z.string().min(1).max(500),
  email: z.string().trim().email().max(320),
});

export function createContactsRouter(
  services: Pick<DomainServiceContainer, 'authService' | 'contactService'>,
): Router {
  const router = Router();
  const { contactService } = services;

  router.use(createRequireAuth(services.authService));

  // GET /v1/contacts
  router.get(
    '/',
    async (req: AuthRequest, res) => {
      try {
        const contacts = await contactService.listContacts(getRequestContext(req));
        res.json({ contacts });
      } catch (error) {
        sendServerError(res, 'contacts', 'Failed to fetch contacts', error);
      }
    },
  );

  // POST /v1/contacts - idempotent on (organizer, email)
  router.post(
    '/',
    async (req: AuthRequest, res) => {
      try {
        const parsed = contactSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await contactService.createContact(getRequestContext(req), parsed.data);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.status(result.value.created ? 201 : 200).json(result.value);
      } catch (error) {
        sendServerError(res, 'contacts', 'Failed to create contact', error);
      }
    },
  );

  // GET /v1/contacts/:contactId
  router.get(
    '/:contactId',
    async (req: AuthRequest, res) => {
      try {
        const result = await contactService.getContact(getRequestContext(req), req.params.contactId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ contact: result.value });
      } catch (error) {
        sendServerError(res, 'contacts', 'Failed to fetch contact', error);
      }
    },
  );

  // PUT /v1/contacts/:contactId
  router.put(
    '/:contactId',
    async (req: AuthRequest, res) => {
      try {
        const parsed = contactSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await contactService.updateContact(
          getRequestContext(req),
          req.params.contactId,
          parsed.data,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ contact: result.value });
      } catch (error) {
        sendServerError(res, 'contacts', 'Failed to update contact', error);
      }
    },
  );

  // DELETE /v1/contacts/:contactId
  router.delete(
    '/:contactId',
    async (req: AuthRequest, res) => {
      try {
        const result = await contactService.deleteContact(getRequestContext(req), req.params.contactId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'contacts', 'Failed to delete contact', error);
      }
    },
  );

  return router;
}
