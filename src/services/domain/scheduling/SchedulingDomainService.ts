import * as functions from 'firebase-functions';
import type {
  FinalizedMeeting,
  MeetingRecord,
  RequestContext,
  TimeSlotRecord,
} from '../../../types/scheduling';
import type { SlotFormatter } from '../../../utils/slotFormatting';
import {
  dispatchAll,
  notifyAfterCommit,
  type DeliveryReport,
  type NotificationDispatcher,
} from '../../notifications';
import type { ContactRepository } from '../../repositories/contacts/ContactRepository';
import type { MeetingRepository } from '../../repositories/meetings/MeetingRepository';
import type { ParticipantRepository } from '../../repositories/participants/ParticipantRepository';
import type { ResponseRepository } from '../../repositories/responses/ResponseRepository';
import {
  buildAvailabilityMatrix,
  DEFAULT_SCORING_POLICY,
  rankSlots,
  type MatrixCell,
  type ScoringPolicy,
  type SlotRanking,
} from '../../slotScoring';
import { loadMeetingParticipants } from '../common/audience';
import { lifecycleFailure } from '../common/lifecycleFailure';
import { loadOwnedMeeting } from '../common/ownership';
import { failure, propagate, success, type DomainResult } from '../common/results';
import type { LabeledSlot } from '../meetings/MeetingDomainService';

export type SummaryRow = {
  contactId: string;
  name: string;
  email: string;
  responded: boolean;
  respondedAt: Date | null;
  cells: Record<string, MatrixCell>;
};

export type SummarySuggestion = {
  contactId: string;
  participantName: string;
  startsAt: Date;
  label: string;
  note: string | null;
  createdAt: Date;
};

export type MeetingSummary = {
  meeting: MeetingRecord;
  invited: number;
  responded: number;
  pending: number;
  slots: LabeledSlot[];
  matrix: SummaryRow[];
  suggestions: SummarySuggestion[];
  rankings: SlotRanking[];
};

export type FinalizeOutcome = {
  meeting: FinalizedMeeting;
  slot: TimeSlotRecord;
  deliveries: DeliveryReport;
};

export type SchedulingDomainServiceDeps = {
  meetingRepository: MeetingRepository;
  participantRepository: ParticipantRepository;
  contactRepository: ContactRepository;
  responseRepository: ResponseRepository;
  notifications: NotificationDispatcher;
  slotFormatter: SlotFormatter;
  policy?: ScoringPolicy;
  now?: () => Date;
};

export class SchedulingDomainService {
  private readonly meetingRepository: MeetingRepository;
  private readonly participantRepository: ParticipantRepository;
  private readonly contactRepository: ContactRepository;
  private readonly responseRepository: ResponseRepository;
  private readonly notifications: NotificationDispatcher;
  private readonly slotFormatter: SlotFormatter;
  private readonly policy: ScoringPolicy;
  private readonly now: () => Date;

  constructor(deps: SchedulingDomainServiceDeps) {
    this.meetingRepository = deps.meetingRepository;
    this.participantRepository = deps.participantRepository;
    this.contactRepository = deps.contactRepository;
    this.responseRepository = deps.responseRepository;
    this.notifications = deps.notifications;
    this.slotFormatter = deps.slotFormatter;
    this.policy = deps.policy ?? DEFAULT_SCORING_POLICY;
    this.now = deps.now ?? (() => new Date());
  }

  async rankSlots(ctx: RequestContext, meetingId: string): Promise<DomainResult<SlotRanking[]>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const [slots, responses, bindings] = await Promise.all([
      this.meetingRepository.listSlots(meetingId),
      this.responseRepository.listByMeeting(meetingId),
      this.participantRepository.listBindings(meetingId),
    ]);

    return success(
      rankSlots({
        slots,
        responses,
        invitedContactIds: bindings.map((binding) => binding.contactId),
        policy: this.policy,
      }),
    );
  }

  /**
   * Everything the organizer dashboard shows for one meeting: response counts,
   * the participant x slot grid, alternative suggestions and the slot ranking.
   */
  async getMeetingSummary(
    ctx: RequestContext,
    meetingId: string,
  ): Promise<DomainResult<MeetingSummary>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const [slots, responses, participants, suggestions] = await Promise.all([
      this.meetingRepository.listSlots(meetingId),
      this.responseRepository.listByMeeting(meetingId),
      loadMeetingParticipants(this.participantRepository, this.contactRepository, meetingId),
      this.responseRepository.listSuggestions(meetingId),
    ]);

    const bindings = participants.map((participant) => participant.binding);
    const rows = buildAvailabilityMatrix(bindings, slots, responses);
    const respondedCount = bindings.filter((binding) => binding.responded).length;
    const namesById = new Map(
      participants.map(({ contact }) => [contact.id, contact.name]),
    );

    return success({
      meeting: owned.value,
      invited: bindings.length,
      responded: respondedCount,
      pending: bindings.length - respondedCount,
      slots: slots.map((slot) => ({ ...slot, label: this.slotFormatter.formatSlot(slot) })),
      matrix: rows.map((row, index) => ({
        contactId: row.contactId,
        name: participants[index].contact.name,
        email: participants[index].contact.email,
        responded: row.responded,
        respondedAt: participants[index].binding.respondedAt,
        cells: row.cells,
      })),
      suggestions: suggestions.map((suggestion) => ({
        contactId: suggestion.contactId,
        participantName: namesById.get(suggestion.contactId) ?? '',
        startsAt: suggestion.startsAt,
        label: this.slotFormatter.formatStart(suggestion.startsAt),
        note: suggestion.note,
        createdAt: suggestion.createdAt,
      })),
      rankings: rankSlots({
        slots,
        responses,
        invitedContactIds: bindings.map((binding) => binding.contactId),
        policy: this.policy,
      }),
    });
  }

  /**
   * Fixes the meeting on one of its slots. The status check and the write share
   * a transaction, so of two concurrent calls only one succeeds and only that
   * one notifies participants. Once committed, notification problems only show
   * up in the delivery report.
   */
  async finalize(
    ctx: RequestContext,
    meetingId: string,
    slotId: string,
  ): Promise<DomainResult<FinalizeOutcome>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const result = await this.meetingRepository.finalize(
      meetingId,
      slotId,
      (slot) => this.slotFormatter.formatStart(slot.startsAt),
      this.now(),
    );
    switch (result.outcome) {
      case 'not_found':
        return failure('not_found', 'meeting_not_found', 'Meeting not found.');
      case 'unknown_slot':
        return failure('not_found', 'unknown_slot', 'This slot does not belong to the meeting.');
      case 'rejected':
        return lifecycleFailure(result.reason, result.status);
      case 'finalized':
        break;
    }

    const { meeting } = result;
    functions.logger.info(`[scheduling] Meeting ${meetingId} finalized on slot ${slotId}`);

    const deliveries = await notifyAfterCommit(`meeting ${meetingId} finalized`, async () => {
      const participants = await loadMeetingParticipants(
        this.participantRepository,
        this.contactRepository,
        meetingId,
      );
      return dispatchAll(
        this.notifications,
        'finalized',
        participants.map(({ contact }) => ({
          recipient: contact.email,
          payload: {
            participantName: contact.name,
            meetingTitle: meeting.title,
            organizerName: meeting.organizerName,
            organizerEmail: meeting.organizerEmail,
            finalizedSlot: meeting.finalizedSlot,
          },
        })),
      );
    });

    return success({ meeting, slot: result.slot, deliveries });
  }
}
