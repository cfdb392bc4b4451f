import type { MeetingStatus, OpenMeetingStatus } from '../types/scheduling';

export type LifecycleRejection =
  | 'already_sent'
  | 'already_finalized'
  | 'meeting_finalized'
  | 'meeting_cancelled'
  | 'meeting_not_sent';

const ALLOWED_TRANSITIONS: Readonly<Record<MeetingStatus, readonly MeetingStatus[]>> = {
  draft: ['sent', 'cancelled'],
  sent: ['finalized', 'cancelled'],
  finalized: [],
  cancelled: [],
};

export function canTransition(from: MeetingStatus, to: MeetingStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Draft and sent meetings accept responses and slot or participant edits;
 * finalized and cancelled meetings are closed.
 */
export function isOpen(status: MeetingStatus): status is OpenMeetingStatus {
  return status === 'draft' || status === 'sent';
}

/**
 * Why `from -> to` is refused, or null when the transition is legal.
 */
export function rejectTransition(
  from: MeetingStatus,
  to: MeetingStatus,
): LifecycleRejection | null {
  if (canTransition(from, to)) {
    return null;
  }

  if (from === 'cancelled') {
    return 'meeting_cancelled';
  }
  if (from === 'finalized') {
    return to === 'finalized' ? 'already_finalized' : 'meeting_finalized';
  }
  if (from === 'sent' && to === 'sent') {
    return 'already_sent';
  }
  return 'meeting_not_sent';
}

/** Reason an open-meeting operation (respond, edit slots) is refused. */
export function rejectClosedMeeting(status: MeetingStatus): LifecycleRejection | null {
  if (status === 'cancelled') {
    return 'meeting_cancelled';
  }
  if (status === 'finalized') {
    return 'meeting_finalized';
  }
  return null;
}
