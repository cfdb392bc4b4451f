import type {
  FinalizedMeeting,
  MeetingRecord,
  ParticipantBindingRecord,
  MeetingStatus,
  SlotInput,
  TimeSlotRecord,
} from '../../../types/scheduling';
import type { LifecycleRejection } from '../../meetingLifecycle';

export type ParticipantSeed = {
  contactId: string;
  token: string;
};

export type CreateMeetingInput = {
  title: string;
  description: string;
  organizerId: string;
  organizerEmail: string;
  organizerName: string;
  slots: SlotInput[];
  participants: ParticipantSeed[];
  createdAt: Date;
};

export type CreatedMeeting = {
  meeting: MeetingRecord;
  slots: TimeSlotRecord[];
  participants: ParticipantBindingRecord[];
};

export type CreateMeetingResult =
  | ({ outcome: 'created' } & CreatedMeeting)
  | { outcome: 'token_collision' };

export type AddSlotResult =
  | { outcome: 'added'; slot: TimeSlotRecord }
  | { outcome: 'not_found' }
  | { outcome: 'slot_limit'; maxSlots: number }
  | { outcome: 'rejected'; status: MeetingStatus; reason: LifecycleRejection };

export type DeleteSlotResult =
  | { outcome: 'deleted'; removedResponses: number; remainingSlots: TimeSlotRecord[] }
  | { outcome: 'not_found' }
  | { outcome: 'unknown_slot' }
  | { outcome: 'last_slot' }
  | { outcome: 'rejected'; status: MeetingStatus; reason: LifecycleRejection };

export type TransitionResult =
  | { outcome: 'updated'; meeting: MeetingRecord; previousStatus: MeetingStatus }
  | { outcome: 'not_found' }
  | { outcome: 'rejected'; status: MeetingStatus; reason: LifecycleRejection };

export type FinalizeResult =
  | { outcome: 'finalized'; meeting: FinalizedMeeting; slot: TimeSlotRecord }
  | { outcome: 'not_found' }
  | { outcome: 'unknown_slot' }
  | { outcome: 'rejected'; status: MeetingStatus; reason: LifecycleRejection };

export type DeleteMeetingResult =
  | {
      outcome: 'deleted';
      removedSlots: number;
      removedParticipants: number;
      removedResponses: number;
    }
  | { outcome: 'not_found' };

export interface MeetingRepository {
  /**
   * Writes the meeting, its slots, participant bindings and token index in one
   * batch. Nothing is stored when a token is already taken.
   */
  create(input: CreateMeetingInput): Promise<CreateMeetingResult>;
  getById(meetingId: string): Promise<MeetingRecord | null>;
  /** Newest first. */
  listByOrganizer(organizerId: string): Promise<MeetingRecord[]>;
  /** Earliest start first. */
  listSlots(meetingId: string): Promise<TimeSlotRecord[]>;
  addSlot(
    meetingId: string,
    slot: SlotInput,
    createdAt: Date,
    maxSlots: number,
  ): Promise<AddSlotResult>;
  deleteSlot(meetingId: string, slotId: string, updatedAt: Date): Promise<DeleteSlotResult>;
  transitionStatus(
    meetingId: string,
    to: Exclude<MeetingStatus, 'finalized'>,
    updatedAt: Date,
  ): Promise<TransitionResult>;
  finalize(
    meetingId: string,
    slotId: string,
    renderSlot: (slot: TimeSlotRecord) => string,
    finalizedAt: Date,
  ): Promise<FinalizeResult>;
  deleteCascade(meetingId: string): Promise<DeleteMeetingResult>;
}
