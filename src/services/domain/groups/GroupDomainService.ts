import * as functions from 'firebase-functions';
import type {
  ContactGroupRecord,
  ContactRecord,
  GroupAccess,
  GroupShareRecord,
  RequestContext,
} from '../../../types/scheduling';
import {
  MAX_DESCRIPTION_LENGTH,
  MAX_NAME_LENGTH,
  sanitizePlainText,
  sanitizeSingleLine,
} from '../../../utils/inputSanitization';
import type { ContactRepository } from '../../repositories/contacts/ContactRepository';
import { normalizeEmail } from '../../repositories/common/storage';
import type { GroupRepository } from '../../repositories/groups/GroupRepository';
import { failure, propagate, success, type DomainResult } from '../common/results';

export type GroupInput = {
  name: string;
  description?: string;
};

export type GroupSummary = ContactGroupRecord & {
  access: GroupAccess;
  memberCount: number;
};

export type AccessibleGroup = {
  group: ContactGroupRecord;
  access: GroupAccess;
};

function byName(left: ContactGroupRecord, right: ContactGroupRecord): number {
  return left.name.localeCompare(right.name) || left.id.localeCompare(right.id);
}

export class GroupDomainService {
  constructor(
    private readonly groupRepository: GroupRepository,
    private readonly contactRepository: ContactRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Owned groups followed by groups shared with the caller's email while their
   * shared flag is set.
   */
  async listGroups(ctx: RequestContext): Promise<GroupSummary[]> {
    const [owned, shared] = await Promise.all([
      this.groupRepository.listByOwner(ctx.organizerId),
      this.groupRepository.listSharedWith(ctx.organizerEmail),
    ]);
    const visibleShared = shared.filter((group) => group.ownerId !== ctx.organizerId);

    const counts = await this.groupRepository.countMembers([
      ...owned.map((group) => group.id),
      ...visibleShared.map((group) => group.id),
    ]);

    const summarize = (group: ContactGroupRecord, access: GroupAccess): GroupSummary => ({
      ...group,
      access,
      memberCount: counts.get(group.id) ?? 0,
    });

    return [
      ...owned.sort(byName).map((group) => summarize(group, 'owned')),
      ...visibleShared.sort(byName).map((group) => summarize(group, 'shared')),
    ];
  }

  /**
   * Read access: the owner, or a grantee while the group is shared.
   */
  async getAccessibleGroup(
    ctx: RequestContext,
    groupId: string,
  ): Promise<DomainResult<AccessibleGroup>> {
    const group = await this.groupRepository.getById(groupId);
    if (!group) {
      return failure('not_found', 'group_not_found', 'Group not found.');
    }
    if (group.ownerId === ctx.organizerId) {
      return success({ group, access: 'owned' });
    }
    if (group.shared && (await this.groupRepository.hasShare(groupId, ctx.organizerEmail))) {
      return success({ group, access: 'shared' });
    }
    return failure('forbidden', 'not_owner', 'You do not have access to this group.');
  }

  async createGroup(
    ctx: RequestContext,
    input: GroupInput,
  ): Promise<DomainResult<ContactGroupRecord>> {
    const name = sanitizeSingleLine(input.name, MAX_NAME_LENGTH);
    if (!name) {
      return failure('validation_failed', 'invalid_input', 'Group name is required.');
    }

    const group = await this.groupRepository.create({
      ownerId: ctx.organizerId,
      ownerEmail: ctx.organizerEmail,
      name,
      description: sanitizePlainText(input.description ?? '', MAX_DESCRIPTION_LENGTH),
      createdAt: this.now(),
    });

    functions.logger.info(`[groups] Organizer ${ctx.organizerId} created group ${group.id}`);
    return success(group);
  }

  async updateGroup(
    ctx: RequestContext,
    groupId: string,
    input: GroupInput,
  ): Promise<DomainResult<ContactGroupRecord>> {
    const owned = await this.requireOwnedGroup(ctx, groupId);
    if (!owned.ok) {
      return owned;
    }

    const name = sanitizeSingleLine(input.name, MAX_NAME_LENGTH);
    if (!name) {
      return failure('validation_failed', 'invalid_input', 'Group name is required.');
    }

    const updated = await this.groupRepository.update(groupId, {
      name,
      description: sanitizePlainText(input.description ?? owned.value.description, MAX_DESCRIPTION_LENGTH),
      updatedAt: this.now(),
    });
    if (!updated) {
      return failure('not_found', 'group_not_found', 'Group not found.');
    }
    return success(updated);
  }

  async deleteGroup(
    ctx: RequestContext,
    groupId: string,
  ): Promise<DomainResult<{ groupId: string; removedMembers: number; removedShares: number }>> {
    const owned = await this.requireOwnedGroup(ctx, groupId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const result = await this.groupRepository.deleteCascade(groupId);
    if (result.outcome === 'not_found') {
      return failure('not_found', 'group_not_found', 'Group not found.');
    }

    functions.logger.info(
      `[groups] Organizer ${ctx.organizerId} deleted group ${groupId} (${result.removedMembers} members, ${result.removedShares} shares)`,
    );
    return success({
      groupId,
      removedMembers: result.removedMembers,
      removedShares: result.removedShares,
    });
  }

  async addMember(
    ctx: RequestContext,
    groupId: string,
    contactId: string,
  ): Promise<DomainResult<{ groupId: string; contactId: string }>> {
    const owned = await this.requireOwnedGroup(ctx, groupId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const result = await this.groupRepository.addMember(groupId, contactId, this.now());
    switch (result.outcome) {
      case 'group_not_found':
        return failure('not_found', 'group_not_found', 'Group not found.');
      case 'contact_not_found':
        return failure('not_found', 'contact_not_found', 'Contact not found.');
      case 'contact_not_owned':
        return failure(
          'forbidden',
          'contact_not_visible',
          'Only your own contacts can be added to your groups.',
        );
      case 'duplicate':
        return failure('conflict', 'duplicate_membership', 'This contact is already in the group.');
      case 'added':
        return success({ groupId, contactId });
    }
  }

  async removeMember(
    ctx: RequestContext,
    groupId: string,
    contactId: string,
  ): Promise<DomainResult<{ groupId: string; contactId: string }>> {
    const owned = await this.requireOwnedGroup(ctx, groupId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const removed = await this.groupRepository.removeMember(groupId, contactId);
    if (!removed) {
      return failure('not_found', 'membership_not_found', 'This contact is not in the group.');
    }
    return success({ groupId, contactId });
  }

  async listGroupMembers(
    ctx: RequestContext,
    groupId: string,
  ): Promise<DomainResult<ContactRecord[]>> {
    const accessible = await this.getAccessibleGroup(ctx, groupId);
    if (!accessible.ok) {
      return propagate(accessible.error);
    }

    const memberIds = await this.groupRepository.listMemberIds(groupId);
    const contacts = await this.contactRepository.getByIds(memberIds);
    return success(
      contacts.sort((left, right) => left.name.localeCompare(right.name) || left.id.localeCompare(right.id)),
    );
  }

  async setShared(
    ctx: RequestContext,
    groupId: string,
    shared: boolean,
  ): Promise<DomainResult<{ group: ContactGroupRecord; revokedShares: number }>> {
    const owned = await this.requireOwnedGroup(ctx, groupId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const result = await this.groupRepository.setShared(groupId, shared, this.now());
    if (result.outcome === 'not_found') {
      return failure('not_found', 'group_not_found', 'Group not found.');
    }

    if (result.revokedShares > 0) {
      functions.logger.info(`[groups] Unsharing group ${groupId} revoked ${result.revokedShares} shares`);
    }
    return success({ group: result.group, revokedShares: result.revokedShares });
  }

  async grantShare(
    ctx: RequestContext,
    groupId: string,
    granteeEmail: string,
  ): Promise<DomainResult<GroupShareRecord>> {
    const owned = await this.requireOwnedGroup(ctx, groupId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    if (normalizeEmail(granteeEmail) === normalizeEmail(ctx.organizerEmail)) {
      return failure('validation_failed', 'invalid_input', 'You cannot share a group with yourself.');
    }

    const result = await this.groupRepository.grantShare(groupId, granteeEmail, this.now());
    switch (result.outcome) {
      case 'not_found':
        return failure('not_found', 'group_not_found', 'Group not found.');
      case 'duplicate':
        return failure('conflict', 'duplicate_share', 'The group is already shared with this organizer.');
      case 'granted':
        functions.logger.info(`[groups] Group ${groupId} shared with ${result.share.granteeEmail}`);
        return success(result.share);
    }
  }

  async revokeShare(
    ctx: RequestContext,
    groupId: string,
    granteeEmail: string,
  ): Promise<DomainResult<{ groupId: string; granteeEmail: string }>> {
    const owned = await this.requireOwnedGroup(ctx, groupId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const revoked = await this.groupRepository.revokeShare(groupId, granteeEmail);
    if (!revoked) {
      return failure('not_found', 'share_not_found', 'The group is not shared with this organizer.');
    }
    return success({ groupId, granteeEmail: normalizeEmail(granteeEmail) });
  }

  async listGroupShares(
    ctx: RequestContext,
    groupId: string,
  ): Promise<DomainResult<GroupShareRecord[]>> {
    const owned = await this.requireOwnedGroup(ctx, groupId);
    if (!owned.ok) {
      return propagate(owned.error);
    }
    return success(await this.groupRepository.listShares(groupId));
  }

  private async requireOwnedGroup(
    ctx: RequestContext,
    groupId: string,
  ): Promise<DomainResult<ContactGroupRecord>> {
    const group = await this.groupRepository.getById(groupId);
    if (!group) {
      return failure('not_found', 'group_not_found', 'Group not found.');
    }
    if (group.ownerId !== ctx.organizerId) {
      return failure('forbidden', 'not_owner', 'Only the group owner can change this group.');
    }
    return success(group);
  }
}
