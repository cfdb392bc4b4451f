import type { ContactGroupRecord, GroupShareRecord } from '../../../types/scheduling';

export type CreateGroupInput = {
  ownerId: string;
  ownerEmail: string;
  name: string;
  description: string;
  createdAt: Date;
};

export type UpdateGroupInput = {
  name: string;
  description: string;
  updatedAt: Date;
};

export type DeleteGroupResult =
  | { outcome: 'deleted'; removedMembers: number; removedShares: number }
  | { outcome: 'not_found' };

export type AddMemberResult =
  | { outcome: 'added' }
  | { outcome: 'duplicate' }
  | { outcome: 'group_not_found' }
  | { outcome: 'contact_not_found' }
  | { outcome: 'contact_not_owned' };

export type SetSharedResult =
  | { outcome: 'updated'; group: ContactGroupRecord; revokedShares: number }
  | { outcome: 'not_found' };

export type GrantShareResult =
  | { outcome: 'granted'; share: GroupShareRecord; flagSet: boolean }
  | { outcome: 'duplicate' }
  | { outcome: 'not_found' };

export interface GroupRepository {
  create(input: CreateGroupInput): Promise<ContactGroupRecord>;
  getById(groupId: string): Promise<ContactGroupRecord | null>;
  listByOwner(ownerId: string): Promise<ContactGroupRecord[]>;
  /** Groups with a share granted to the email whose shared flag is still set. */
  listSharedWith(granteeEmail: string): Promise<ContactGroupRecord[]>;
  update(groupId: string, input: UpdateGroupInput): Promise<ContactGroupRecord | null>;
  deleteCascade(groupId: string): Promise<DeleteGroupResult>;

  addMember(groupId: string, contactId: string, addedAt: Date): Promise<AddMemberResult>;
  removeMember(groupId: string, contactId: string): Promise<boolean>;
  listMemberIds(groupId: string): Promise<string[]>;
  countMembers(groupIds: string[]): Promise<Map<string, number>>;

  setShared(groupId: string, shared: boolean, updatedAt: Date): Promise<SetSharedResult>;
  grantShare(groupId: string, granteeEmail: string, sharedAt: Date): Promise<GrantShareResult>;
  revokeShare(groupId: string, granteeEmail: string): Promise<boolean>;
  listShares(groupId: string): Promise<GroupShareRecord[]>;
  hasShare(groupId: string, granteeEmail: string): Promise<boolean>;
}
