import type { MeetingStatus } from '../../../types/scheduling';
import type { LifecycleRejection } from '../../meetingLifecycle';
import { failure, type DomainResult } from './results';

const REJECTION_MESSAGES: Record<LifecycleRejection, string> = {
  already_sent: 'Invitations for this meeting have already been sent.',
  already_finalized: 'This meeting has already been finalized.',
  meeting_finalized: 'This meeting has been finalized and no longer accepts changes.',
  meeting_cancelled: 'This meeting has been cancelled.',
  meeting_not_sent: 'Invitations for this meeting have not been sent yet.',
};

export function lifecycleFailure<T = never>(
  reason: LifecycleRejection,
  status: MeetingStatus,
): DomainResult<T> {
  return failure('invalid_state', reason, REJECTION_MESSAGES[reason], { status });
}
