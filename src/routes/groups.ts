import { Router } from 'express';
import { z } from 'zod';
import { createRequireAuth, getRequestContext, type AuthRequest } from '../middlewares/auth';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { sendDomainError, sendServerError, sendValidationError } from './helpers';

const groupSchema = z.object({
  name: z.string().min(1).max(500),
  description: z.string().max(10000).optional(),
});

const memberSchema = z.object({
  contactId: z.string().min(1),
});

const sharedFlagSchema = z.object({
  shared: z.boolean(),
});

const shareSchema = z.object({
  email: z.string().trim().email().max(320),
});

export function createGroupsRouter(
  services: Pick<DomainServiceContainer, 'authService' | 'groupService'>,
): Router {
  const router = Router();
  const { groupService } = services;

  router.use(createRequireAuth(services.authService));

  // GET /v1/groups - owned groups, then groups shared with the caller
  router.get(
    '/',
    async (req: AuthRequest, res) => {
      try {
        const groups = await groupService.listGroups(getRequestContext(req));
        res.json({ groups });
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to fetch groups', error);
      }
    },
  );

  // POST /v1/groups
  router.post(
    '/',
    async (req: AuthRequest, res) => {
      try {
        const parsed = groupSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await groupService.createGroup(getRequestContext(req), parsed.data);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.status(201).json({ group: result.value });
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to create group', error);
      }
    },
  );

  // GET /v1/groups/:groupId
  router.get(
    '/:groupId',
    async (req: AuthRequest, res) => {
      try {
        const result = await groupService.getAccessibleGroup(getRequestContext(req), req.params.groupId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to fetch group', error);
      }
    },
  );

  // PUT /v1/groups/:groupId
  router.put(
    '/:groupId',
    async (req: AuthRequest, res) => {
      try {
        const parsed = groupSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await groupService.updateGroup(
          getRequestContext(req),
          req.params.groupId,
          parsed.data,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ group: result.value });
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to update group', error);
      }
    },
  );

  // DELETE /v1/groups/:groupId - removes memberships and shares too
  router.delete(
    '/:groupId',
    async (req: AuthRequest, res) => {
      try {
        const result = await groupService.deleteGroup(getRequestContext(req), req.params.groupId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to delete group', error);
      }
    },
  );

  // GET /v1/groups/:groupId/members
  router.get(
    '/:groupId/members',
    async (req: AuthRequest, res) => {
      try {
        const result = await groupService.listGroupMembers(getRequestContext(req), req.params.groupId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ members: result.value });
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to fetch members', error);
      }
    },
  );

  // POST /v1/groups/:groupId/members
  router.post(
    '/:groupId/members',
    async (req: AuthRequest, res) => {
      try {
        const parsed = memberSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await groupService.addMember(
          getRequestContext(req),
          req.params.groupId,
          parsed.data.contactId,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.status(201).json(result.value);
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to add member', error);
      }
    },
  );

  // DELETE /v1/groups/:groupId/members/:contactId
  router.delete(
    '/:groupId/members/:contactId',
    async (req: AuthRequest, res) => {
      try {
        const result = await groupService.removeMember(
          getRequestContext(req),
          req.params.groupId,
          req.params.contactId,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to remove member', error);
      }
    },
  );

  // PATCH /v1/groups/:groupId/sharing - clearing the flag revokes every grant
  router.patch(
    '/:groupId/sharing',
    async (req: AuthRequest, res) => {
      try {
        const parsed = sharedFlagSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await groupService.setShared(
          getRequestContext(req),
          req.params.groupId,
          parsed.data.shared,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to update sharing', error);
      }
    },
  );

  // GET /v1/groups/:groupId/shares
  router.get(
    '/:groupId/shares',
    async (req: AuthRequest, res) => {
      try {
        const result = await groupService.listGroupShares(getRequestContext(req), req.params.groupId);
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json({ shares: result.value });
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to fetch shares', error);
      }
    },
  );

  // POST /v1/groups/:groupId/shares
  router.post(
    '/:groupId/shares',
    async (req: AuthRequest, res) => {
      try {
        const parsed = shareSchema.safeParse(req.body);
        if (!parsed.success) {
          sendValidationError(res, parsed.error);
          return;
        }

        const result = await groupService.grantShare(
          getRequestContext(req),
          req.params.groupId,
          parsed.data.email,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.status(201).json({ share: result.value });
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to share group', error);
      }
    },
  );

  // DELETE /v1/groups/:groupId/shares/:email
  router.delete(
    '/:groupId/shares/:email',
    async (req: AuthRequest, res) => {
      try {
        const result = await groupService.revokeShare(
          getRequestContext(req),
          req.params.groupId,
          req.params.email,
        );
        if (!result.ok) {
          sendDomainError(res, result.error);
          return;
        }
        res.json(result.value);
      } catch (error) {
        sendServerError(res, 'groups', 'Failed to revoke share', error);
      }
    },
  );

  return router;
}
