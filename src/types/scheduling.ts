/**
 * Shared domain records for the scheduling engine.
 * Repositories map Firestore documents into these shapes; services and routes
 * never see raw document data.
 */

export const AVAILABILITY_VALUES = ['available', 'maybe', 'unavailable'] as const;
export type Availability = (typeof AVAILABILITY_VALUES)[number];

export const MEETING_STATUSES = ['draft', 'sent', 'finalized', 'cancelled'] as const;
export type MeetingStatus = (typeof MEETING_STATUSES)[number];

export type OpenMeetingStatus = Exclude<MeetingStatus, 'finalized' | 'cancelled'>;

/**
 * Identity of the authenticated organizer for one request.
 * Built by the auth middleware and passed explicitly into every organizer operation.
 */
export type RequestContext = Readonly<{
  organizerId: string;
  organizerEmail: string;
}>;

export type OrganizerRecord = {
  id: string;
  email: string;
  name: string;
  createdAt: Date;
};

export type ContactRecord = {
  id: string;
  ownerId: string;
  name: string;
  email: string;
  createdAt: Date;
};

export type ContactGroupRecord = {
  id: string;
  ownerId: string;
  ownerEmail: string;
  name: string;
  description: string;
  shared: boolean;
  createdAt: Date;
};

export type GroupAccess = 'owned' | 'shared';

export type GroupShareRecord = {
  groupId: string;
  ownerId: string;
  granteeEmail: string;
  sharedAt: Date;
};

type MeetingBase = {
  id: string;
  title: string;
  description: string;
  organizerId: string;
  organizerEmail: string;
  organizerName: string;
  createdAt: Date;
  updatedAt: Date;
  sentAt: Date | null;
};

export type OpenOrCancelledMeeting = MeetingBase & {
  status: Exclude<MeetingStatus, 'finalized'>;
  finalizedSlot: null;
  finalizedSlotId: null;
  finalizedAt: null;
};

export type FinalizedMeeting = MeetingBase & {
  status: 'finalized';
  finalizedSlot: string;
  finalizedSlotId: string;
  finalizedAt: Date;
};

export type MeetingRecord = OpenOrCancelledMeeting | FinalizedMeeting;

export type TimeSlotRecord = {
  id: string;
  meetingId: string;
  startsAt: Date;
  durationMinutes: number;
};

export type ParticipantBindingRecord = {
  meetingId: string;
  contactId: string;
  token: string;
  responded: boolean;
  respondedAt: Date | null;
  createdAt: Date;
};

export type ResponseRecord = {
  meetingId: string;
  contactId: string;
  slotId: string;
  availability: Availability;
  updatedAt: Date;
};

export type SuggestedSlotRecord = {
  meetingId: string;
  contactId: string;
  startsAt: Date;
  note: string | null;
  createdAt: Date;
};

export type SlotInput = {
  startsAt: Date;
  durationMinutes: number;
};

export type ParticipantSelection = {
  contactIds?: string[];
  groupIds?: string[];
};
