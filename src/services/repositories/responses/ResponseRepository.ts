import type {
  Availability,
  MeetingRecord,
  MeetingStatus,
  ResponseRecord,
  SuggestedSlotRecord,
} from '../../../types/scheduling';
import type { LifecycleRejection } from '../../meetingLifecycle';

export type SlotAnswer = {
  slotId: string;
  availability: Availability;
};

export type SuggestionInput = {
  startsAt: Date;
  note: string | null;
};

export type SubmitResponsesInput = {
  meetingId: string;
  contactId: string;
  answers: SlotAnswer[];
  suggestion?: SuggestionInput | null;
  submittedAt: Date;
};

export type SubmitResponsesResult =
  | {
      outcome: 'recorded';
      meeting: MeetingRecord;
      responses: ResponseRecord[];
      firstSubmission: boolean;
      suggestion: SuggestedSlotRecord | null;
    }
  | { outcome: 'binding_not_found' }
  | { outcome: 'meeting_not_found' }
  | { outcome: 'unknown_slot'; slotIds: string[] }
  | { outcome: 'rejected'; status: MeetingStatus; reason: LifecycleRejection };

export type SaveSuggestionInput = SuggestionInput & {
  meetingId: string;
  contactId: string;
  createdAt: Date;
};

export type SaveSuggestionResult =
  | { outcome: 'saved'; suggestion: SuggestedSlotRecord; replaced: boolean }
  | { outcome: 'binding_not_found' }
  | { outcome: 'meeting_not_found' }
  | { outcome: 'rejected'; status: MeetingStatus; reason: LifecycleRejection };

export interface ResponseRepository {
  /**
   * Upserts every answer, marks the binding as responded and optionally replaces
   * the participant's suggestion, all in one transaction. Slot ownership and the
   * meeting status are checked before anything is written.
   */
  submit(input: SubmitResponsesInput): Promise<SubmitResponsesResult>;
  saveSuggestion(input: SaveSuggestionInput): Promise<SaveSuggestionResult>;
  listByMeeting(meetingId: string): Promise<ResponseRecord[]>;
  listByParticipant(meetingId: string, contactId: string): Promise<ResponseRecord[]>;
  listSuggestions(meetingId: string): Promise<SuggestedSlotRecord[]>;
  getSuggestion(meetingId: string, contactId: string): Promise<SuggestedSlotRecord | null>;
}
