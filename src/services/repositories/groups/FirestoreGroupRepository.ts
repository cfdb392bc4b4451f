import { z } from 'zod';
import type { ContactGroupRecord, GroupShareRecord } from '../../../types/scheduling';
import { isAlreadyExistsError } from '../common/errors';
import {
  DEFAULT_STORAGE_TIMEOUT_MS,
  emailKey,
  normalizeEmail,
  parseDocument,
  timestampSchema,
  toTimestamp,
  withStorageTimeout,
  type RepositoryOptions,
} from '../common/storage';
import type {
  AddMemberResult,
  CreateGroupInput,
  DeleteGroupResult,
  GrantShareResult,
  GroupRepository,
  SetSharedResult,
  UpdateGroupInput,
} from './GroupRepository';

const GROUPS = 'contactGroups';
const MEMBERS = 'groupMembers';
const SHARES = 'groupShares';
const CONTACTS = 'contacts';

const groupDocSchema = z.object({
  ownerId: z.string().min(1),
  ownerEmail: z.string(),
  name: z.string(),
  description: z.string().default(''),
  shared: z.boolean().default(false),
  createdAt: timestampSchema,
});

const memberDocSchema = z.object({
  groupId: z.string().min(1),
  contactId: z.string().min(1),
});

const shareDocSchema = z.object({
  groupId: z.string().min(1),
  ownerId: z.string().min(1),
  granteeEmail: z.string(),
  sharedAt: timestampSchema,
});

const contactOwnerSchema = z.object({
  ownerId: z.string().min(1),
});

function mapGroupDoc(id: string, data: unknown): ContactGroupRecord {
  return { id, ...parseDocument(groupDocSchema, data, `${GROUPS}/${id}`) };
}

function mapShareDoc(doc: FirebaseFirestore.QueryDocumentSnapshot): GroupShareRecord {
  return parseDocument(shareDocSchema, doc.data(), doc.ref.path);
}

function memberId(groupId: string, contactId: string): string {
  return `${groupId}_${contactId}`;
}

function shareId(groupId: string, granteeEmail: string): string {
  return `${groupId}_${emailKey(granteeEmail)}`;
}

export class FirestoreGroupRepository implements GroupRepository {
  private readonly timeoutMs: number;

  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    options: RepositoryOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  async create(input: CreateGroupInput): Promise<ContactGroupRecord> {
    const groupRef = this.db.collection(GROUPS).doc();
    const ownerEmail = normalizeEmail(input.ownerEmail);

    await withStorageTimeout('groups.create', this.timeoutMs, () =>
      groupRef.create({
        ownerId: input.ownerId,
        ownerEmail,
        name: input.name,
        description: input.description,
        shared: false,
        createdAt: toTimestamp(input.createdAt),
      }),
    );

    return {
      id: groupRef.id,
      ownerId: input.ownerId,
      ownerEmail,
      name: input.name,
      description: input.description,
      shared: false,
      createdAt: input.createdAt,
    };
  }

  async getById(groupId: string): Promise<ContactGroupRecord | null> {
    const doc = await withStorageTimeout('groups.getById', this.timeoutMs, () =>
      this.db.collection(GROUPS).doc(groupId).get(),
    );
    return doc.exists ? mapGroupDoc(doc.id, doc.data()) : null;
  }

  async listByOwner(ownerId: string): Promise<ContactGroupRecord[]> {
    const snapshot = await withStorageTimeout('groups.listByOwner', this.timeoutMs, () =>
      this.db.collection(GROUPS).where('ownerId', '==', ownerId).get(),
    );
    return snapshot.docs.map((doc) => mapGroupDoc(doc.id, doc.data()));
  }

  async listSharedWith(granteeEmail: string): Promise<ContactGroupRecord[]> {
    const shares = await withStorageTimeout('groups.listSharedWith', this.timeoutMs, () =>
      this.db.collection(SHARES).where('granteeEmail', '==', normalizeEmail(granteeEmail)).get(),
    );
    const groupIds = Array.from(new Set(shares.docs.map((doc) => mapShareDoc(doc).groupId)));

    const groupDocs = await withStorageTimeout('groups.loadShared', this.timeoutMs, () =>
      Promise.all(groupIds.map((id) => this.db.collection(GROUPS).doc(id).get())),
    );

    return groupDocs
      .filter((doc) => doc.exists)
      .map((doc) => mapGroupDoc(doc.id, doc.data()))
      .filter((group) => group.shared);
  }

  async update(groupId: string, input: UpdateGroupInput): Promise<ContactGroupRecord | null> {
    const groupRef = this.db.collection(GROUPS).doc(groupId);

    return withStorageTimeout('groups.update', this.timeoutMs, () =>
      this.db.runTransaction<ContactGroupRecord | null>(async (tx) => {
        const groupDoc = await tx.get(groupRef);
        if (!groupDoc.exists) {
          return null;
        }

        tx.update(groupRef, {
          name: input.name,
          description: input.description,
          updatedAt: toTimestamp(input.updatedAt),
        });

        return {
          ...mapGroupDoc(groupDoc.id, groupDoc.data()),
          name: input.name,
          description: input.description,
        };
      }),
    );
  }

  async deleteCascade(groupId: string): Promise<DeleteGroupResult> {
    const groupRef = this.db.collection(GROUPS).doc(groupId);

    return withStorageTimeout('groups.delete', this.timeoutMs, () =>
      this.db.runTransaction<DeleteGroupResult>(async (tx) => {
        const groupDoc = await tx.get(groupRef);
        if (!groupDoc.exists) {
          return { outcome: 'not_found' };
        }

        const members = await tx.get(this.db.collection(MEMBERS).where('groupId', '==', groupId));
        const shares = await tx.get(this.db.collection(SHARES).where('groupId', '==', groupId));

        members.docs.forEach((doc) => tx.delete(doc.ref));
        shares.docs.forEach((doc) => tx.delete(doc.ref));
        tx.delete(groupRef);

        return {
          outcome: 'deleted',
          removedMembers: members.size,
          removedShares: shares.size,
        };
      }),
    );
  }

  async addMember(groupId: string, contactId: string, addedAt: Date): Promise<AddMemberResult> {
    const groupRef = this.db.collection(GROUPS).doc(groupId);
    const contactRef = this.db.collection(CONTACTS).doc(contactId);
    const memberRef = this.db.collection(MEMBERS).doc(memberId(groupId, contactId));

    try {
      return await withStorageTimeout('groups.addMember', this.timeoutMs, () =>
        this.db.runTransaction<AddMemberResult>(async (tx) => {
          const groupDoc = await tx.get(groupRef);
          if (!groupDoc.exists) {
            return { outcome: 'group_not_found' };
          }
          const contactDoc = await tx.get(contactRef);
          if (!contactDoc.exists) {
            return { outcome: 'contact_not_found' };
          }

          const group = mapGroupDoc(groupDoc.id, groupDoc.data());
          const contact = parseDocument(contactOwnerSchema, contactDoc.data(), contactRef.path);
          if (contact.ownerId !== group.ownerId) {
            return { outcome: 'contact_not_owned' };
          }

          const memberDoc = await tx.get(memberRef);
          if (memberDoc.exists) {
            return { outcome: 'duplicate' };
          }

          tx.create(memberRef, {
            groupId,
            contactId,
            ownerId: group.ownerId,
            addedAt: toTimestamp(addedAt),
          });
          return { outcome: 'added' };
        }),
      );
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        return { outcome: 'duplicate' };
      }
      throw error;
    }
  }

  async removeMember(groupId: string, contactId: string): Promise<boolean> {
    const memberRef = this.db.collection(MEMBERS).doc(memberId(groupId, contactId));

    return withStorageTimeout('groups.removeMember', this.timeoutMs, () =>
      this.db.runTransaction<boolean>(async (tx) => {
        const memberDoc = await tx.get(memberRef);
        if (!memberDoc.exists) {
          return false;
        }
        tx.delete(memberRef);
        return true;
      }),
    );
  }

  async listMemberIds(groupId: string): Promise<string[]> {
    const snapshot = await withStorageTimeout('groups.listMembers', this.timeoutMs, () =>
      this.db.collection(MEMBERS).where('groupId', '==', groupId).get(),
    );
    return snapshot.docs.map((doc) => parseDocument(memberDocSchema, doc.data(), doc.ref.path).contactId);
  }

  async countMembers(groupIds: string[]): Promise<Map<string, number>> {
    const uniqueIds = Array.from(new Set(groupIds));
    const snapshots = await withStorageTimeout('groups.countMembers', this.timeoutMs, () =>
      Promise.all(
        uniqueIds.map((groupId) =>
          this.db.collection(MEMBERS).where('groupId', '==', groupId).get(),
        ),
      ),
    );

    const counts = new Map<string, number>();
    uniqueIds.forEach((groupId, index) => {
      counts.set(groupId, snapshots[index]?.size ?? 0);
    });
    return counts;
  }

  async setShared(groupId: string, shared: boolean, updatedAt: Date): Promise<SetSharedResult> {
    const groupRef = this.db.collection(GROUPS).doc(groupId);

    return withStorageTimeout('groups.setShared', this.timeoutMs, () =>
      this.db.runTransaction<SetSharedResult>(async (tx) => {
        const groupDoc = await tx.get(groupRef);
        if (!groupDoc.exists) {
          return { outcome: 'not_found' };
        }

        let revokedShares = 0;
        if (!shared) {
          const shares = await tx.get(this.db.collection(SHARES).where('groupId', '==', groupId));
          shares.docs.forEach((doc) => tx.delete(doc.ref));
          revokedShares = shares.size;
        }

        tx.update(groupRef, { shared, updatedAt: toTimestamp(updatedAt) });

        return {
          outcome: 'updated',
          group: { ...mapGroupDoc(groupDoc.id, groupDoc.data()), shared },
          revokedShares,
        };
      }),
    );
  }

  async grantShare(
    groupId: string,
    granteeEmail: string,
    sharedAt: Date,
  ): Promise<GrantShareResult> {
    const email = normalizeEmail(granteeEmail);
    const groupRef = this.db.collection(GROUPS).doc(groupId);
    const shareRef = this.db.collection(SHARES).doc(shareId(groupId, email));

    try {
      return await withStorageTimeout('groups.grantShare', this.timeoutMs, () =>
        this.db.runTransaction<GrantShareResult>(async (tx) => {
          const groupDoc = await tx.get(groupRef);
          if (!groupDoc.exists) {
            return { outcome: 'not_found' };
          }
          const shareDoc = await tx.get(shareRef);
          if (shareDoc.exists) {
            return { outcome: 'duplicate' };
          }

          const group = mapGroupDoc(groupDoc.id, groupDoc.data());
          if (!group.shared) {
            tx.update(groupRef, { shared: true, updatedAt: toTimestamp(sharedAt) });
          }
          tx.create(shareRef, {
            groupId,
            ownerId: group.ownerId,
            granteeEmail: email,
            sharedAt: toTimestamp(sharedAt),
          });

          return {
            outcome: 'granted',
            share: { groupId, ownerId: group.ownerId, granteeEmail: email, sharedAt },
            flagSet: !group.shared,
          };
        }),
      );
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        return { outcome: 'duplicate' };
      }
      throw error;
    }
  }

  async revokeShare(groupId: string, granteeEmail: string): Promise<boolean> {
    const shareRef = this.db.collection(SHARES).doc(shareId(groupId, granteeEmail));

    return withStorageTimeout('groups.revokeShare', this.timeoutMs, () =>
      this.db.runTransaction<boolean>(async (tx) => {
        const shareDoc = await tx.get(shareRef);
        if (!shareDoc.exists) {
          return false;
        }
        tx.delete(shareRef);
        return true;
      }),
    );
  }

  async listShares(groupId: string): Promise<GroupShareRecord[]> {
    const snapshot = await withStorageTimeout('groups.listShares', this.timeoutMs, () =>
      this.db.collection(SHARES).where('groupId', '==', groupId).get(),
    );
    return snapshot.docs
      .map((doc) => mapShareDoc(doc))
      .sort((left, right) => left.granteeEmail.localeCompare(right.granteeEmail));
  }

  async hasShare(groupId: string, granteeEmail: string): Promise<boolean> {
    const doc = await withStorageTimeout('groups.hasShare', this.timeoutMs, () =>
      this.db.collection(SHARES).doc(shareId(groupId, granteeEmail)).get(),
    );
    return doc.exists;
  }
}
