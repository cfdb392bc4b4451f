import type { MeetingRecord, RequestContext } from '../../../types/scheduling';
import type { MeetingRepository } from '../../repositories/meetings/MeetingRepository';
import { failure, success, type DomainResult } from './results';

export async function loadOwnedMeeting(
  meetingRepository: Pick<MeetingRepository, 'getById'>,
  ctx: RequestContext,
  meetingId: string,
): Promise<DomainResult<MeetingRecord>> {
  const meeting = await meetingRepository.getById(meetingId);
  if (!meeting) {
    return failure('not_found', 'meeting_not_found', 'Meeting not found.');
  }
  if (meeting.organizerId !== ctx.organizerId) {
    return failure('forbidden', 'not_owner', 'Only the organizer can manage this meeting.');
  }
  return success(meeting);
}
