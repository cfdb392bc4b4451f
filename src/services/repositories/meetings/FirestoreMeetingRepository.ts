import { z } from 'zod';
import {
  MEETING_STATUSES,
  type MeetingRecord,
  type MeetingStatus,
  type SlotInput,
  type TimeSlotRecord,
} from '../../../types/scheduling';
import { rejectClosedMeeting, rejectTransition } from '../../meetingLifecycle';
import { isAlreadyExistsError, RepositoryValidationError } from '../common/errors';
import {
  DEFAULT_STORAGE_TIMEOUT_MS,
  nullableTimestampSchema,
  parseDocument,
  timestampSchema,
  toTimestamp,
  withStorageTimeout,
  type RepositoryOptions,
} from '../common/storage';
import { bindingId } from '../participants/FirestoreParticipantRepository';
import type {
  AddSlotResult,
  CreateMeetingInput,
  CreateMeetingResult,
  DeleteMeetingResult,
  DeleteSlotResult,
  FinalizeResult,
  MeetingRepository,
  TransitionResult,
} from './MeetingRepository';

const MEETINGS = 'meetings';
const SLOTS = 'timeSlots';
const PARTICIPANTS = 'meetingParticipants';
const TOKENS = 'participantTokens';
const RESPONSES = 'responses';
const SUGGESTIONS = 'suggestedSlots';

const meetingDocSchema = z.object({
  title: z.string(),
  description: z.string().default(''),
  organizerId: z.string().min(1),
  organizerEmail: z.string(),
  organizerName: z.string().default(''),
  status: z.enum(MEETING_STATUSES),
  finalizedSlot: z.string().nullable().default(null),
  finalizedSlotId: z.string().nullable().default(null),
  finalizedAt: nullableTimestampSchema,
  sentAt: nullableTimestampSchema,
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
});

const slotDocSchema = z.object({
  meetingId: z.string().min(1),
  startsAt: timestampSchema,
  durationMinutes: z.number().int().positive(),
});

const bindingTokenSchema = z.object({
  token: z.string().min(1),
});

export function mapMeetingDoc(id: string, data: unknown): MeetingRecord {
  const path = `${MEETINGS}/${id}`;
  const doc = parseDocument(meetingDocSchema, data, path);
  const base = {
    id,
    title: doc.title,
    description: doc.description,
    organizerId: doc.organizerId,
    organizerEmail: doc.organizerEmail,
    organizerName: doc.organizerName,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
    sentAt: doc.sentAt,
  };

  if (doc.status === 'finalized') {
    if (doc.finalizedSlot === null || doc.finalizedSlotId === null || doc.finalizedAt === null) {
      throw new RepositoryValidationError(`Malformed document ${path}: finalized without a slot`);
    }
    return {
      ...base,
      status: 'finalized',
      finalizedSlot: doc.finalizedSlot,
      finalizedSlotId: doc.finalizedSlotId,
      finalizedAt: doc.finalizedAt,
    };
  }

  return {
    ...base,
    status: doc.status,
    finalizedSlot: null,
    finalizedSlotId: null,
    finalizedAt: null,
  };
}

export function mapSlotDoc(id: string, data: unknown): TimeSlotRecord {
  return { id, ...parseDocument(slotDocSchema, data, `${SLOTS}/${id}`) };
}

export function sortSlots(slots: TimeSlotRecord[]): TimeSlotRecord[] {
  return [...slots].sort(
    (left, right) =>
      left.startsAt.getTime() - right.startsAt.getTime() || left.id.localeCompare(right.id),
  );
}

function slotPayload(meetingId: string, slot: SlotInput, createdAt: Date) {
  return {
    meetingId,
    startsAt: toTimestamp(slot.startsAt),
    durationMinutes: slot.durationMinutes,
    createdAt: toTimestamp(createdAt),
  };
}

export class FirestoreMeetingRepository implements MeetingRepository {
  private readonly timeoutMs: number;

  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    options: RepositoryOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  async create(input: CreateMeetingInput): Promise<CreateMeetingResult> {
    const meetingRef = this.db.collection(MEETINGS).doc();
    const batch = this.db.batch();
    const createdAt = toTimestamp(input.createdAt);

    batch.create(meetingRef, {
      title: input.title,
      description: input.description,
      organizerId: input.organizerId,
      organizerEmail: input.organizerEmail,
      organizerName: input.organizerName,
      status: 'draft',
      finalizedSlot: null,
      finalizedSlotId: null,
      finalizedAt: null,
      sentAt: null,
      createdAt,
      updatedAt: createdAt,
    });

    const slots = input.slots.map((slot) => {
      const slotRef = this.db.collection(SLOTS).doc();
      batch.create(slotRef, slotPayload(meetingRef.id, slot, input.createdAt));
      return {
        id: slotRef.id,
        meetingId: meetingRef.id,
        startsAt: slot.startsAt,
        durationMinutes: slot.durationMinutes,
      };
    });

    const participants = input.participants.map(({ contactId, token }) => {
      batch.create(this.db.collection(PARTICIPANTS).doc(bindingId(meetingRef.id, contactId)), {
        meetingId: meetingRef.id,
        contactId,
        token,
        responded: false,
        respondedAt: null,
        createdAt,
      });
      batch.create(this.db.collection(TOKENS).doc(token), {
        meetingId: meetingRef.id,
        contactId,
        createdAt,
      });
      return {
        meetingId: meetingRef.id,
        contactId,
        token,
        responded: false,
        respondedAt: null,
        createdAt: input.createdAt,
      };
    });

    try {
      await withStorageTimeout('meetings.create', this.timeoutMs, () => batch.commit());
    } catch (error) {
      // The meeting id is fresh, so only a participant token can already exist.
      if (isAlreadyExistsError(error)) {
        return { outcome: 'token_collision' };
      }
      throw error;
    }

    return {
      outcome: 'created',
      meeting: {
        id: meetingRef.id,
        title: input.title,
        description: input.description,
        organizerId: input.organizerId,
        organizerEmail: input.organizerEmail,
        organizerName: input.organizerName,
        status: 'draft',
        finalizedSlot: null,
        finalizedSlotId: null,
        finalizedAt: null,
        sentAt: null,
        createdAt: input.createdAt,
        updatedAt: input.createdAt,
      },
      slots: sortSlots(slots),
      participants,
    };
  }

  async getById(meetingId: string): Promise<MeetingRecord | null> {
    const doc = await withStorageTimeout('meetings.getById', this.timeoutMs, () =>
      this.db.collection(MEETINGS).doc(meetingId).get(),
    );
    return doc.exists ? mapMeetingDoc(doc.id, doc.data()) : null;
  }

  async listByOrganizer(organizerId: string): Promise<MeetingRecord[]> {
    const snapshot = await withStorageTimeout('meetings.listByOrganizer', this.timeoutMs, () =>
      this.db.collection(MEETINGS).where('organizerId', '==', organizerId).get(),
    );

    return snapshot.docs
      .map((doc) => mapMeetingDoc(doc.id, doc.data()))
      .sort(
        (left, right) =>
          right.createdAt.getTime() - left.createdAt.getTime() || left.id.localeCompare(right.id),
      );
  }

  async listSlots(meetingId: string): Promise<TimeSlotRecord[]> {
    const snapshot = await withStorageTimeout('meetings.listSlots', this.timeoutMs, () =>
      this.db.collection(SLOTS).where('meetingId', '==', meetingId).get(),
    );
    return sortSlots(snapshot.docs.map((doc) => mapSlotDoc(doc.id, doc.data())));
  }

  async addSlot(
    meetingId: string,
    slot: SlotInput,
    createdAt: Date,
    maxSlots: number,
  ): Promise<AddSlotResult> {
    const meetingRef = this.db.collection(MEETINGS).doc(meetingId);

    return withStorageTimeout('meetings.addSlot', this.timeoutMs, () =>
      this.db.runTransaction<AddSlotResult>(async (tx) => {
        const meetingDoc = await tx.get(meetingRef);
        if (!meetingDoc.exists) {
          return { outcome: 'not_found' };
        }
        const meeting = mapMeetingDoc(meetingDoc.id, meetingDoc.data());
        const rejection = rejectClosedMeeting(meeting.status);
        if (rejection) {
          return { outcome: 'rejected', status: meeting.status, reason: rejection };
        }

        const existing = await tx.get(this.db.collection(SLOTS).where('meetingId', '==', meetingId));
        if (existing.size >= maxSlots) {
          return { outcome: 'slot_limit', maxSlots };
        }

        const slotRef = this.db.collection(SLOTS).doc();
        tx.create(slotRef, slotPayload(meetingId, slot, createdAt));
        tx.update(meetingRef, { updatedAt: toTimestamp(createdAt) });

        return {
          outcome: 'added',
          slot: {
            id: slotRef.id,
            meetingId,
            startsAt: slot.startsAt,
            durationMinutes: slot.durationMinutes,
          },
        };
      }),
    );
  }

  async deleteSlot(meetingId: string, slotId: string, updatedAt: Date): Promise<DeleteSlotResult> {
    const meetingRef = this.db.collection(MEETINGS).doc(meetingId);

    return withStorageTimeout('meetings.deleteSlot', this.timeoutMs, () =>
      this.db.runTransaction<DeleteSlotResult>(async (tx) => {
        const meetingDoc = await tx.get(meetingRef);
        if (!meetingDoc.exists) {
          return { outcome: 'not_found' };
        }
        const meeting = mapMeetingDoc(meetingDoc.id, meetingDoc.data());
        const rejection = rejectClosedMeeting(meeting.status);
        if (rejection) {
          return { outcome: 'rejected', status: meeting.status, reason: rejection };
        }

        const slotSnapshot = await tx.get(
          this.db.collection(SLOTS).where('meetingId', '==', meetingId),
        );
        const slots = slotSnapshot.docs.map((doc) => mapSlotDoc(doc.id, doc.data()));
        if (!slots.some((slot) => slot.id === slotId)) {
          return { outcome: 'unknown_slot' };
        }
        if (slots.length <= 1) {
          return { outcome: 'last_slot' };
        }

        const responses = await tx.get(
          this.db
            .collection(RESPONSES)
            .where('meetingId', '==', meetingId)
            .where('slotId', '==', slotId),
        );
        responses.docs.forEach((doc) => tx.delete(doc.ref));
        tx.delete(this.db.collection(SLOTS).doc(slotId));
        tx.update(meetingRef, { updatedAt: toTimestamp(updatedAt) });

        return {
          outcome: 'deleted',
          removedResponses: responses.size,
          remainingSlots: sortSlots(slots.filter((slot) => slot.id !== slotId)),
        };
      }),
    );
  }

  async transitionStatus(
    meetingId: string,
    to: Exclude<MeetingStatus, 'finalized'>,
    updatedAt: Date,
  ): Promise<TransitionResult> {
    const meetingRef = this.db.collection(MEETINGS).doc(meetingId);

    return withStorageTimeout('meetings.transition', this.timeoutMs, () =>
      this.db.runTransaction<TransitionResult>(async (tx) => {
        const meetingDoc = await tx.get(meetingRef);
        if (!meetingDoc.exists) {
          return { outcome: 'not_found' };
        }
        const current = mapMeetingDoc(meetingDoc.id, meetingDoc.data());
        const rejection = rejectTransition(current.status, to);
        if (rejection) {
          return { outcome: 'rejected', status: current.status, reason: rejection };
        }

        const sentAt = to === 'sent' ? updatedAt : current.sentAt;
        tx.update(meetingRef, {
          status: to,
          updatedAt: toTimestamp(updatedAt),
          sentAt: sentAt ? toTimestamp(sentAt) : null,
        });

        return {
          outcome: 'updated',
          previousStatus: current.status,
          meeting: {
            ...current,
            status: to,
            finalizedSlot: null,
            finalizedSlotId: null,
            finalizedAt: null,
            sentAt,
            updatedAt,
          },
        };
      }),
    );
  }

  async finalize(
    meetingId: string,
    slotId: string,
    renderSlot: (slot: TimeSlotRecord) => string,
    finalizedAt: Date,
  ): Promise<FinalizeResult> {
    const meetingRef = this.db.collection(MEETINGS).doc(meetingId);
    const slotRef = this.db.collection(SLOTS).doc(slotId);

    return withStorageTimeout('meetings.finalize', this.timeoutMs, () =>
      this.db.runTransaction<FinalizeResult>(async (tx) => {
        const meetingDoc = await tx.get(meetingRef);
        if (!meetingDoc.exists) {
          return { outcome: 'not_found' };
        }
        const current = mapMeetingDoc(meetingDoc.id, meetingDoc.data());
        const rejection = rejectTransition(current.status, 'finalized');
        if (rejection) {
          return { outcome: 'rejected', status: current.status, reason: rejection };
        }

        const slotDoc = await tx.get(slotRef);
        if (!slotDoc.exists) {
          return { outcome: 'unknown_slot' };
        }
        const slot = mapSlotDoc(slotDoc.id, slotDoc.data());
        if (slot.meetingId !== meetingId) {
          return { outcome: 'unknown_slot' };
        }

        const finalizedSlot = renderSlot(slot);
        tx.update(meetingRef, {
          status: 'finalized',
          finalizedSlot,
          finalizedSlotId: slot.id,
          finalizedAt: toTimestamp(finalizedAt),
          updatedAt: toTimestamp(finalizedAt),
        });

        return {
          outcome: 'finalized',
          slot,
          meeting: {
            ...current,
            status: 'finalized',
            finalizedSlot,
            finalizedSlotId: slot.id,
            finalizedAt,
            updatedAt: finalizedAt,
          },
        };
      }),
    );
  }

  async deleteCascade(meetingId: string): Promise<DeleteMeetingResult> {
    const meetingRef = this.db.collection(MEETINGS).doc(meetingId);

    return withStorageTimeout('meetings.delete', this.timeoutMs, () =>
      this.db.runTransaction<DeleteMeetingResult>(async (tx) => {
        const meetingDoc = await tx.get(meetingRef);
        if (!meetingDoc.exists) {
          return { outcome: 'not_found' };
        }

        const byMeeting = (collection: string) =>
          tx.get(this.db.collection(collection).where('meetingId', '==', meetingId));
        const [slots, participants, responses, suggestions] = await Promise.all([
          byMeeting(SLOTS),
          byMeeting(PARTICIPANTS),
          byMeeting(RESPONSES),
          byMeeting(SUGGESTIONS),
        ]);

        participants.docs.forEach((doc) => {
          const { token } = parseDocument(bindingTokenSchema, doc.data(), doc.ref.path);
          tx.delete(this.db.collection(TOKENS).doc(token));
          tx.delete(doc.ref);
        });
        [slots, responses, suggestions].forEach((snapshot) => {
          snapshot.docs.forEach((doc) => tx.delete(doc.ref));
        });
        tx.delete(meetingRef);

        return {
          outcome: 'deleted',
          removedSlots: slots.size,
          removedParticipants: participants.size,
          removedResponses: responses.size,
        };
      }),
    );
  }
}
