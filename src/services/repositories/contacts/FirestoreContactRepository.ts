import { z } from 'zod';
import type { ContactRecord } from '../../../types/scheduling';
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
  ContactRepository,
  CreateContactInput,
  CreateContactResult,
  DeleteContactResult,
  UpdateContactInput,
  UpdateContactResult,
} from './ContactRepository';

const CONTACTS = 'contacts';
const EMAIL_INDEX = 'contactEmailIndex';
const GROUP_MEMBERS = 'groupMembers';
const PARTICIPANTS = 'meetingParticipants';

const contactDocSchema = z.object({
  ownerId: z.string().min(1),
  name: z.string(),
  email: z.string(),
  createdAt: timestampSchema,
});

const emailIndexDocSchema = z.object({
  contactId: z.string().min(1),
  ownerId: z.string().min(1),
});

const bindingRefSchema = z.object({
  meetingId: z.string().min(1),
});

function mapContactDoc(id: string, data: unknown): ContactRecord {
  const doc = parseDocument(contactDocSchema, data, `${CONTACTS}/${id}`);
  return { id, ...doc };
}

function indexId(ownerId: string, email: string): string {
  return `${ownerId}_${emailKey(email)}`;
}

export class FirestoreContactRepository implements ContactRepository {
  private readonly timeoutMs: number;

  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    options: RepositoryOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  async create(input: CreateContactInput): Promise<CreateContactResult> {
    const email = normalizeEmail(input.email);
    const indexRef = this.db.collection(EMAIL_INDEX).doc(indexId(input.ownerId, email));

    try {
      return await withStorageTimeout('contacts.create', this.timeoutMs, () =>
        this.db.runTransaction<CreateContactResult>(async (tx) => {
          const indexDoc = await tx.get(indexRef);
          if (indexDoc.exists) {
            const index = parseDocument(emailIndexDocSchema, indexDoc.data(), indexRef.path);
            const existingDoc = await tx.get(this.db.collection(CONTACTS).doc(index.contactId));
            if (existingDoc.exists) {
              return {
                outcome: 'existing',
                contact: mapContactDoc(existingDoc.id, existingDoc.data()),
              };
            }
          }

          const contactRef = this.db.collection(CONTACTS).doc();
          const indexEntry = { contactId: contactRef.id, ownerId: input.ownerId };
          if (indexDoc.exists) {
            // Index entry left behind by a contact that no longer exists.
            tx.set(indexRef, indexEntry);
          } else {
            tx.create(indexRef, indexEntry);
          }
          tx.create(contactRef, {
            ownerId: input.ownerId,
            name: input.name,
            email,
            createdAt: toTimestamp(input.createdAt),
          });

          return {
            outcome: 'created',
            contact: {
              id: contactRef.id,
              ownerId: input.ownerId,
              name: input.name,
              email,
              createdAt: input.createdAt,
            },
          };
        }),
      );
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw error;
      }
    }

    // A concurrent create won the index entry; hand back its contact.
    const existing = await this.findByIndex(indexRef);
    if (!existing) {
      throw new Error(`Contact index ${indexRef.id} conflicted but could not be read back`);
    }
    return { outcome: 'existing', contact: existing };
  }

  async getById(contactId: string): Promise<ContactRecord | null> {
    const doc = await withStorageTimeout('contacts.getById', this.timeoutMs, () =>
      this.db.collection(CONTACTS).doc(contactId).get(),
    );
    if (!doc.exists) {
      return null;
    }
    return mapContactDoc(doc.id, doc.data());
  }

  async getByIds(contactIds: string[]): Promise<ContactRecord[]> {
    const uniqueIds = Array.from(new Set(contactIds));
    const docs = await withStorageTimeout('contacts.getByIds', this.timeoutMs, () =>
      Promise.all(uniqueIds.map((id) => this.db.collection(CONTACTS).doc(id).get())),
    );

    return docs
      .filter((doc) => doc.exists)
      .map((doc) => mapContactDoc(doc.id, doc.data()));
  }

  async listByOwner(ownerId: string): Promise<ContactRecord[]> {
    const snapshot = await withStorageTimeout('contacts.listByOwner', this.timeoutMs, () =>
      this.db.collection(CONTACTS).where('ownerId', '==', ownerId).get(),
    );

    return snapshot.docs
      .map((doc) => mapContactDoc(doc.id, doc.data()))
      .sort((left, right) => left.name.localeCompare(right.name) || left.id.localeCompare(right.id));
  }

  async update(contactId: string, input: UpdateContactInput): Promise<UpdateContactResult> {
    const contactRef = this.db.collection(CONTACTS).doc(contactId);
    const nextEmail = normalizeEmail(input.email);
    const pending: { nextIndexRef?: FirebaseFirestore.DocumentReference } = {};

    try {
      return await withStorageTimeout('contacts.update', this.timeoutMs, () =>
        this.db.runTransaction<UpdateContactResult>(async (tx) => {
          const contactDoc = await tx.get(contactRef);
          if (!contactDoc.exists) {
            return { outcome: 'not_found' };
          }

          const current = mapContactDoc(contactDoc.id, contactDoc.data());
          if (current.email !== nextEmail) {
            const nextIndexRef = this.db
              .collection(EMAIL_INDEX)
              .doc(indexId(current.ownerId, nextEmail));
            pending.nextIndexRef = nextIndexRef;
            const nextIndexDoc = await tx.get(nextIndexRef);
            if (nextIndexDoc.exists) {
              const index = parseDocument(
                emailIndexDocSchema,
                nextIndexDoc.data(),
                nextIndexRef.path,
              );
              if (index.contactId !== contactId) {
                return { outcome: 'duplicate_email', existingContactId: index.contactId };
              }
            }

            tx.delete(this.db.collection(EMAIL_INDEX).doc(indexId(current.ownerId, current.email)));
            if (!nextIndexDoc.exists) {
              tx.create(nextIndexRef, { contactId, ownerId: current.ownerId });
            }
          }

          tx.update(contactRef, {
            name: input.name,
            email: nextEmail,
            updatedAt: toTimestamp(input.updatedAt),
          });

          return {
            outcome: 'updated',
            contact: { ...current, name: input.name, email: nextEmail },
          };
        }),
      );
    } catch (error) {
      if (!isAlreadyExistsError(error) || !pending.nextIndexRef) {
        throw error;
      }
    }

    const winner = await this.findByIndex(pending.nextIndexRef);
    if (!winner) {
      throw new Error(`Contact index ${pending.nextIndexRef.id} conflicted but could not be read back`);
    }
    return { outcome: 'duplicate_email', existingContactId: winner.id };
  }

  async deleteIfUnused(contactId: string): Promise<DeleteContactResult> {
    const contactRef = this.db.collection(CONTACTS).doc(contactId);

    return withStorageTimeout('contacts.delete', this.timeoutMs, () =>
      this.db.runTransaction<DeleteContactResult>(async (tx) => {
        const contactDoc = await tx.get(contactRef);
        if (!contactDoc.exists) {
          return { outcome: 'not_found' };
        }
        const contact = mapContactDoc(contactDoc.id, contactDoc.data());

        const bindings = await tx.get(
          this.db.collection(PARTICIPANTS).where('contactId', '==', contactId),
        );
        if (!bindings.empty) {
          const meetingIds = new Set<string>();
          bindings.docs.forEach((doc) => {
            meetingIds.add(parseDocument(bindingRefSchema, doc.data(), doc.ref.path).meetingId);
          });
          return { outcome: 'in_use', meetingIds: Array.from(meetingIds).sort() };
        }

        const memberships = await tx.get(
          this.db.collection(GROUP_MEMBERS).where('contactId', '==', contactId),
        );
        memberships.docs.forEach((doc) => tx.delete(doc.ref));
        tx.delete(this.db.collection(EMAIL_INDEX).doc(indexId(contact.ownerId, contact.email)));
        tx.delete(contactRef);

        return { outcome: 'deleted', removedMemberships: memberships.size };
      }),
    );
  }

  private async findByIndex(
    indexRef: FirebaseFirestore.DocumentReference,
  ): Promise<ContactRecord | null> {
    const indexDoc = await withStorageTimeout('contacts.readIndex', this.timeoutMs, () =>
      indexRef.get(),
    );
    if (!indexDoc.exists) {
      return null;
    }
    const index = parseDocument(emailIndexDocSchema, indexDoc.data(), indexRef.path);
    return this.getById(index.contactId);
  }
}
