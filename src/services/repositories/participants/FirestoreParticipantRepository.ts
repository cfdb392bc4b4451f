import { z } from 'zod';
import type { ParticipantBindingRecord } from '../../../types/scheduling';
import { isAlreadyExistsError } from '../common/errors';
import {
  DEFAULT_STORAGE_TIMEOUT_MS,
  nullableTimestampSchema,
  parseDocument,
  timestampSchema,
  toTimestamp,
  withStorageTimeout,
  type RepositoryOptions,
} from '../common/storage';
import type {
  CreateBindingResult,
  ParticipantRepository,
  ResolvedToken,
} from './ParticipantRepository';

const PARTICIPANTS = 'meetingParticipants';
const TOKENS = 'participantTokens';
const MEETINGS = 'meetings';
const CONTACTS = 'contacts';

const bindingDocSchema = z.object({
  meetingId: z.string().min(1),
  contactId: z.string().min(1),
  token: z.string().min(1),
  responded: z.boolean().default(false),
  respondedAt: nullableTimestampSchema,
  createdAt: timestampSchema,
});

const tokenDocSchema = z.object({
  meetingId: z.string().min(1),
  contactId: z.string().min(1),
});

export function bindingId(meetingId: string, contactId: string): string {
  return `${meetingId}_${contactId}`;
}

export function mapBindingDoc(data: unknown, path: string): ParticipantBindingRecord {
  return parseDocument(bindingDocSchema, data, path);
}

export class FirestoreParticipantRepository implements ParticipantRepository {
  private readonly timeoutMs: number;

  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    options: RepositoryOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  async createBinding(
    meetingId: string,
    contactId: string,
    token: string,
    createdAt: Date,
  ): Promise<CreateBindingResult> {
    const bindingRef = this.db.collection(PARTICIPANTS).doc(bindingId(meetingId, contactId));
    const tokenRef = this.db.collection(TOKENS).doc(token);

    try {
      return await withStorageTimeout('participants.createBinding', this.timeoutMs, () =>
        this.db.runTransaction<CreateBindingResult>(async (tx) => {
          const bindingDoc = await tx.get(bindingRef);
          if (bindingDoc.exists) {
            return {
              outcome: 'existing',
              binding: mapBindingDoc(bindingDoc.data(), bindingRef.path),
            };
          }

          const tokenDoc = await tx.get(tokenRef);
          if (tokenDoc.exists) {
            return { outcome: 'token_collision' };
          }

          const meetingDoc = await tx.get(this.db.collection(MEETINGS).doc(meetingId));
          if (!meetingDoc.exists) {
            return { outcome: 'meeting_not_found' };
          }
          const contactDoc = await tx.get(this.db.collection(CONTACTS).doc(contactId));
          if (!contactDoc.exists) {
            return { outcome: 'contact_not_found' };
          }

          tx.create(bindingRef, {
            meetingId,
            contactId,
            token,
            responded: false,
            respondedAt: null,
            createdAt: toTimestamp(createdAt),
          });
          tx.create(tokenRef, { meetingId, contactId, createdAt: toTimestamp(createdAt) });

          return {
            outcome: 'created',
            binding: {
              meetingId,
              contactId,
              token,
              responded: false,
              respondedAt: null,
              createdAt,
            },
          };
        }),
      );
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw error;
      }
    }

    // Either a concurrent request bound the pair first or the token was taken.
    const winner = await this.getBinding(meetingId, contactId);
    return winner ? { outcome: 'existing', binding: winner } : { outcome: 'token_collision' };
  }

  async getBinding(meetingId: string, contactId: string): Promise<ParticipantBindingRecord | null> {
    const ref = this.db.collection(PARTICIPANTS).doc(bindingId(meetingId, contactId));
    const doc = await withStorageTimeout('participants.getBinding', this.timeoutMs, () => ref.get());
    return doc.exists ? mapBindingDoc(doc.data(), ref.path) : null;
  }

  async listBindings(meetingId: string): Promise<ParticipantBindingRecord[]> {
    const snapshot = await withStorageTimeout('participants.list', this.timeoutMs, () =>
      this.db.collection(PARTICIPANTS).where('meetingId', '==', meetingId).get(),
    );

    return snapshot.docs
      .map((doc) => mapBindingDoc(doc.data(), doc.ref.path))
      .sort(
        (left, right) =>
          left.createdAt.getTime() - right.createdAt.getTime() ||
          left.contactId.localeCompare(right.contactId),
      );
  }

  async resolveToken(token: string): Promise<ResolvedToken | null> {
    const ref = this.db.collection(TOKENS).doc(token);
    const doc = await withStorageTimeout('participants.resolveToken', this.timeoutMs, () =>
      ref.get(),
    );
    return doc.exists ? parseDocument(tokenDocSchema, doc.data(), `${TOKENS}/<token>`) : null;
  }
}
