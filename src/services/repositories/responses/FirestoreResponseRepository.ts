import { z } from 'zod';
import {
  AVAILABILITY_VALUES,
  type Availability,
  type ResponseRecord,
  type SuggestedSlotRecord,
} from '../../../types/scheduling';
import { rejectClosedMeeting } from '../../meetingLifecycle';
import {
  DEFAULT_STORAGE_TIMEOUT_MS,
  parseDocument,
  timestampSchema,
  toTimestamp,
  withStorageTimeout,
  type RepositoryOptions,
} from '../common/storage';
import { mapMeetingDoc } from '../meetings/FirestoreMeetingRepository';
import { bindingId, mapBindingDoc } from '../participants/FirestoreParticipantRepository';
import type {
  ResponseRepository,
  SaveSuggestionInput,
  SaveSuggestionResult,
  SubmitResponsesInput,
  SubmitResponsesResult,
} from './ResponseRepository';

const RESPONSES = 'responses';
const SUGGESTIONS = 'suggestedSlots';
const PARTICIPANTS = 'meetingParticipants';
const MEETINGS = 'meetings';
const SLOTS = 'timeSlots';

const responseDocSchema = z.object({
  meetingId: z.string().min(1),
  contactId: z.string().min(1),
  slotId: z.string().min(1),
  availability: z.enum(AVAILABILITY_VALUES),
  updatedAt: timestampSchema,
});

const suggestionDocSchema = z.object({
  meetingId: z.string().min(1),
  contactId: z.string().min(1),
  startsAt: timestampSchema,
  note: z.string().nullable().default(null),
  createdAt: timestampSchema,
});

function responseId(meetingId: string, contactId: string, slotId: string): string {
  return `${meetingId}_${contactId}_${slotId}`;
}

function mapResponseDoc(doc: FirebaseFirestore.QueryDocumentSnapshot): ResponseRecord {
  return parseDocument(responseDocSchema, doc.data(), doc.ref.path);
}

function mapSuggestionDoc(data: unknown, path: string): SuggestedSlotRecord {
  return parseDocument(suggestionDocSchema, data, path);
}

function sortResponses(responses: ResponseRecord[]): ResponseRecord[] {
  return responses.sort(
    (left, right) =>
      left.contactId.localeCompare(right.contactId) || left.slotId.localeCompare(right.slotId),
  );
}

export class FirestoreResponseRepository implements ResponseRepository {
  private readonly timeoutMs: number;

  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    options: RepositoryOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  async submit(input: SubmitResponsesInput): Promise<SubmitResponsesResult> {
    const { meetingId, contactId, submittedAt } = input;
    const meetingRef = this.db.collection(MEETINGS).doc(meetingId);
    const bindingRef = this.db.collection(PARTICIPANTS).doc(bindingId(meetingId, contactId));
    const suggestionRef = this.db.collection(SUGGESTIONS).doc(bindingId(meetingId, contactId));

    // Later answers for the same slot win.
    const answers = new Map<string, Availability>();
    input.answers.forEach((answer) => answers.set(answer.slotId, answer.availability));

    return withStorageTimeout('responses.submit', this.timeoutMs, () =>
      this.db.runTransaction<SubmitResponsesResult>(async (tx) => {
        const bindingDoc = await tx.get(bindingRef);
        if (!bindingDoc.exists) {
          return { outcome: 'binding_not_found' };
        }
        const meetingDoc = await tx.get(meetingRef);
        if (!meetingDoc.exists) {
          return { outcome: 'meeting_not_found' };
        }

        const meeting = mapMeetingDoc(meetingDoc.id, meetingDoc.data());
        const rejection = rejectClosedMeeting(meeting.status);
        if (rejection) {
          return { outcome: 'rejected', status: meeting.status, reason: rejection };
        }

        const slots = await tx.get(this.db.collection(SLOTS).where('meetingId', '==', meetingId));
        const knownSlotIds = new Set(slots.docs.map((doc) => doc.id));
        const unknownSlotIds = Array.from(answers.keys()).filter((slotId) => !knownSlotIds.has(slotId));
        if (unknownSlotIds.length > 0) {
          return { outcome: 'unknown_slot', slotIds: unknownSlotIds };
        }

        const binding = mapBindingDoc(bindingDoc.data(), bindingRef.path);
        const updatedAt = toTimestamp(submittedAt);
        const responses: ResponseRecord[] = [];

        answers.forEach((availability, slotId) => {
          tx.set(this.db.collection(RESPONSES).doc(responseId(meetingId, contactId, slotId)), {
            meetingId,
            contactId,
            slotId,
            availability,
            updatedAt,
          });
          responses.push({ meetingId, contactId, slotId, availability, updatedAt: submittedAt });
        });

        tx.update(bindingRef, { responded: true, respondedAt: updatedAt });

        let suggestion: SuggestedSlotRecord | null = null;
        if (input.suggestion) {
          suggestion = {
            meetingId,
            contactId,
            startsAt: input.suggestion.startsAt,
            note: input.suggestion.note,
            createdAt: submittedAt,
          };
          tx.set(suggestionRef, {
            meetingId,
            contactId,
            startsAt: toTimestamp(suggestion.startsAt),
            note: suggestion.note,
            createdAt: updatedAt,
          });
        }

        return {
          outcome: 'recorded',
          meeting,
          responses: sortResponses(responses),
          firstSubmission: !binding.responded,
          suggestion,
        };
      }),
    );
  }

  async saveSuggestion(input: SaveSuggestionInput): Promise<SaveSuggestionResult> {
    const { meetingId, contactId } = input;
    const bindingRef = this.db.collection(PARTICIPANTS).doc(bindingId(meetingId, contactId));
    const meetingRef = this.db.collection(MEETINGS).doc(meetingId);
    const suggestionRef = this.db.collection(SUGGESTIONS).doc(bindingId(meetingId, contactId));

    return withStorageTimeout('responses.saveSuggestion', this.timeoutMs, () =>
      this.db.runTransaction<SaveSuggestionResult>(async (tx) => {
        const bindingDoc = await tx.get(bindingRef);
        if (!bindingDoc.exists) {
          return { outcome: 'binding_not_found' };
        }
        const meetingDoc = await tx.get(meetingRef);
        if (!meetingDoc.exists) {
          return { outcome: 'meeting_not_found' };
        }
        const meeting = mapMeetingDoc(meetingDoc.id, meetingDoc.data());
        const rejection = rejectClosedMeeting(meeting.status);
        if (rejection) {
          return { outcome: 'rejected', status: meeting.status, reason: rejection };
        }

        const previous = await tx.get(suggestionRef);
        tx.set(suggestionRef, {
          meetingId,
          contactId,
          startsAt: toTimestamp(input.startsAt),
          note: input.note,
          createdAt: toTimestamp(input.createdAt),
        });

        return {
          outcome: 'saved',
          replaced: previous.exists,
          suggestion: {
            meetingId,
            contactId,
            startsAt: input.startsAt,
            note: input.note,
            createdAt: input.createdAt,
          },
        };
      }),
    );
  }

  async listByMeeting(meetingId: string): Promise<ResponseRecord[]> {
    const snapshot = await withStorageTimeout('responses.listByMeeting', this.timeoutMs, () =>
      this.db.collection(RESPONSES).where('meetingId', '==', meetingId).get(),
    );
    return sortResponses(snapshot.docs.map((doc) => mapResponseDoc(doc)));
  }

  async listByParticipant(meetingId: string, contactId: string): Promise<ResponseRecord[]> {
    const snapshot = await withStorageTimeout('responses.listByParticipant', this.timeoutMs, () =>
      this.db
        .collection(RESPONSES)
        .where('meetingId', '==', meetingId)
        .where('contactId', '==', contactId)
        .get(),
    );
    return sortResponses(snapshot.docs.map((doc) => mapResponseDoc(doc)));
  }

  async listSuggestions(meetingId: string): Promise<SuggestedSlotRecord[]> {
    const snapshot = await withStorageTimeout('responses.listSuggestions', this.timeoutMs, () =>
      this.db.collection(SUGGESTIONS).where('meetingId', '==', meetingId).get(),
    );
    return snapshot.docs
      .map((doc) => mapSuggestionDoc(doc.data(), doc.ref.path))
      .sort((left, right) => left.startsAt.getTime() - right.startsAt.getTime());
  }

  async getSuggestion(meetingId: string, contactId: string): Promise<SuggestedSlotRecord | null> {
    const ref = this.db.collection(SUGGESTIONS).doc(bindingId(meetingId, contactId));
    const doc = await withStorageTimeout('responses.getSuggestion', this.timeoutMs, () => ref.get());
    return doc.exists ? mapSuggestionDoc(doc.data(), ref.path) : null;
  }
}
