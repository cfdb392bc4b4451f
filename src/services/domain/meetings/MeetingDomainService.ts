import * as functions from 'firebase-functions';
import type {
  ContactRecord,
  MeetingRecord,
  ParticipantSelection,
  RequestContext,
  SlotInput,
  TimeSlotRecord,
} from '../../../types/scheduling';
import {
  MAX_DESCRIPTION_LENGTH,
  MAX_TITLE_LENGTH,
  sanitizePlainText,
  sanitizeSingleLine,
} from '../../../utils/inputSanitization';
import { participantResponseUrl } from '../../../utils/links';
import type { SlotFormatter } from '../../../utils/slotFormatting';
import type { ParticipantNotice } from '../../emailTemplates';
import { rejectClosedMeeting } from '../../meetingLifecycle';
import {
  dispatchAll,
  notifyAfterCommit,
  type DeliveryReport,
  type NotificationDispatcher,
} from '../../notifications';
import type { ContactRepository } from '../../repositories/contacts/ContactRepository';
import type { GroupRepository } from '../../repositories/groups/GroupRepository';
import type { MeetingRepository } from '../../repositories/meetings/MeetingRepository';
import type { OrganizerRepository } from '../../repositories/organizers/OrganizerRepository';
import type { ParticipantRepository } from '../../repositories/participants/ParticipantRepository';
import { loadMeetingParticipants, type MeetingParticipant } from '../common/audience';
import { lifecycleFailure } from '../common/lifecycleFailure';
import { loadOwnedMeeting } from '../common/ownership';
import { failure, propagate, success, type DomainResult } from '../common/results';
import type { GroupDomainService } from '../groups/GroupDomainService';
import type { ParticipantTokenService } from '../tokens/ParticipantTokenService';

export const MAX_SLOTS_PER_MEETING = 10;
export const DEFAULT_SLOT_DURATION_MINUTES = 60;
const MAX_SLOT_DURATION_MINUTES = 24 * 60;

export type SlotRequest = {
  startsAt: Date;
  durationMinutes?: number;
};

export type CreateMeetingRequest = {
  title: string;
  description?: string;
  slots: SlotRequest[];
  participants: ParticipantSelection;
};

export type LabeledSlot = TimeSlotRecord & { label: string };

export type MeetingParticipantView = {
  contactId: string;
  name: string;
  email: string;
  responded: boolean;
  respondedAt: Date | null;
  responseUrl: string;
};

export type MeetingDetail = {
  meeting: MeetingRecord;
  slots: LabeledSlot[];
  participants: MeetingParticipantView[];
};

export type MeetingNotificationOutcome = {
  meeting: MeetingRecord;
  deliveries: DeliveryReport;
};

export type AddParticipantsOutcome = {
  added: string[];
  existing: string[];
  deliveries: DeliveryReport | null;
};

export type SlotChangeOutcome<T> = T & {
  slots: LabeledSlot[];
  deliveries: DeliveryReport | null;
};

export type MeetingDomainServiceDeps = {
  meetingRepository: MeetingRepository;
  participantRepository: ParticipantRepository;
  contactRepository: ContactRepository;
  groupRepository: GroupRepository;
  organizerRepository: OrganizerRepository;
  groupService: GroupDomainService;
  tokenService: ParticipantTokenService;
  notifications: NotificationDispatcher;
  slotFormatter: SlotFormatter;
  publicBaseUrl: string;
  now?: () => Date;
};

function validateSlot(request: SlotRequest): DomainResult<SlotInput> {
  if (Number.isNaN(request.startsAt.getTime())) {
    return failure('validation_failed', 'invalid_input', 'Slot start time is not a valid date.');
  }

  const durationMinutes = request.durationMinutes ?? DEFAULT_SLOT_DURATION_MINUTES;
  if (
    !Number.isInteger(durationMinutes) ||
    durationMinutes <= 0 ||
    durationMinutes > MAX_SLOT_DURATION_MINUTES
  ) {
    return failure(
      'validation_failed',
      'invalid_input',
      `Slot duration must be a whole number of minutes between 1 and ${MAX_SLOT_DURATION_MINUTES}.`,
    );
  }
  return success({ startsAt: request.startsAt, durationMinutes });
}

export class MeetingDomainService {
  private readonly meetingRepository: MeetingRepository;
  private readonly participantRepository: ParticipantRepository;
  private readonly contactRepository: ContactRepository;
  private readonly groupRepository: GroupRepository;
  private readonly organizerRepository: OrganizerRepository;
  private readonly groupService: GroupDomainService;
  private readonly tokenService: ParticipantTokenService;
  private readonly notifications: NotificationDispatcher;
  private readonly slotFormatter: SlotFormatter;
  private readonly publicBaseUrl: string;
  private readonly now: () => Date;

  constructor(deps: MeetingDomainServiceDeps) {
    this.meetingRepository = deps.meetingRepository;
    this.participantRepository = deps.participantRepository;
    this.contactRepository = deps.contactRepository;
    this.groupRepository = deps.groupRepository;
    this.organizerRepository = deps.organizerRepository;
    this.groupService = deps.groupService;
    this.tokenService = deps.tokenService;
    this.notifications = deps.notifications;
    this.slotFormatter = deps.slotFormatter;
    this.publicBaseUrl = deps.publicBaseUrl;
    this.now = deps.now ?? (() => new Date());
  }

  async listMeetings(ctx: RequestContext): Promise<MeetingRecord[]> {
    return this.meetingRepository.listByOrganizer(ctx.organizerId);
  }

  async getMeeting(ctx: RequestContext, meetingId: string): Promise<DomainResult<MeetingDetail>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }
    return success(await this.buildDetail(owned.value));
  }

  /**
   * Creates a draft meeting with its slots and a token for every selected
   * participant, all in one write. Invitations go out separately through
   * `sendInvitations`.
   */
  async createMeeting(
    ctx: RequestContext,
    request: CreateMeetingRequest,
  ): Promise<DomainResult<MeetingDetail>> {
    const title = sanitizeSingleLine(request.title, MAX_TITLE_LENGTH);
    if (!title) {
      return failure('validation_failed', 'invalid_input', 'Meeting title is required.');
    }
    if (request.slots.length === 0) {
      return failure('validation_failed', 'invalid_input', 'At least one time slot is required.');
    }
    if (request.slots.length > MAX_SLOTS_PER_MEETING) {
      return failure(
        'validation_failed',
        'too_many_slots',
        `A meeting can have at most ${MAX_SLOTS_PER_MEETING} time slots.`,
        { maxSlots: MAX_SLOTS_PER_MEETING },
      );
    }

    const slots: SlotInput[] = [];
    for (const requested of request.slots) {
      const slot = validateSlot(requested);
      if (!slot.ok) {
        return propagate(slot.error);
      }
      slots.push(slot.value);
    }

    const participants = await this.resolveParticipants(ctx, request.participants);
    if (!participants.ok) {
      return propagate(participants.error);
    }
    if (participants.value.length === 0) {
      return failure('validation_failed', 'invalid_input', 'At least one participant is required.');
    }

    const organizer = await this.organizerRepository.getById(ctx.organizerId);
    if (!organizer) {
      return failure('not_found', 'organizer_not_found', 'Organizer not found.');
    }

    const description = sanitizePlainText(request.description ?? '', MAX_DESCRIPTION_LENGTH);
    const created = await this.tokenService.issueTogether(
      participants.value.map((contact) => contact.id),
      async (seeds) => {
        const result = await this.meetingRepository.create({
          title,
          description,
          organizerId: ctx.organizerId,
          organizerEmail: organizer.email,
          organizerName: organizer.name,
          slots,
          participants: seeds,
          createdAt: this.now(),
        });
        return result.outcome === 'created' ? result : null;
      },
    );
    if (!created.ok) {
      functions.logger.error(`[meetings] Could not create meeting for organizer ${ctx.organizerId}`, {
        reason: created.error.reason,
      });
      return propagate(created.error);
    }

    const { meeting } = created.value;
    functions.logger.info(
      `[meetings] Organizer ${ctx.organizerId} created meeting ${meeting.id} with ${slots.length} slots and ${participants.value.length} participants`,
    );
    return success(await this.buildDetail(meeting));
  }

  /**
   * The one-time draft to sent transition followed by an invitation to every
   * participant. A repeated call is refused and sends nothing.
   */
  async sendInvitations(
    ctx: RequestContext,
    meetingId: string,
  ): Promise<DomainResult<MeetingNotificationOutcome>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const result = await this.meetingRepository.transitionStatus(meetingId, 'sent', this.now());
    switch (result.outcome) {
      case 'not_found':
        return failure('not_found', 'meeting_not_found', 'Meeting not found.');
      case 'rejected':
        return lifecycleFailure(result.reason, result.status);
      case 'updated':
        break;
    }

    functions.logger.info(`[meetings] Meeting ${meetingId} sent`);
    const deliveries = await notifyAfterCommit(`meeting ${meetingId} invitations`, async () => {
      const participants = await loadMeetingParticipants(
        this.participantRepository,
        this.contactRepository,
        meetingId,
      );
      return this.notifyParticipants('invitation', result.meeting, participants);
    });

    return success({ meeting: result.meeting, deliveries });
  }

  async sendReminders(
    ctx: RequestContext,
    meetingId: string,
  ): Promise<DomainResult<MeetingNotificationOutcome>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const meeting = owned.value;
    if (meeting.status === 'draft') {
      return lifecycleFailure('meeting_not_sent', meeting.status);
    }
    const closed = rejectClosedMeeting(meeting.status);
    if (closed) {
      return lifecycleFailure(closed, meeting.status);
    }

    const participants = await loadMeetingParticipants(
      this.participantRepository,
      this.contactRepository,
      meetingId,
    );
    const pending = participants.filter((participant) => !participant.binding.responded);
    const deliveries = await this.notifyParticipants('reminder', meeting, pending);

    return success({ meeting, deliveries });
  }

  async addSlot(
    ctx: RequestContext,
    meetingId: string,
    request: SlotRequest,
  ): Promise<DomainResult<SlotChangeOutcome<{ slot: TimeSlotRecord }>>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const slot = validateSlot(request);
    if (!slot.ok) {
      return propagate(slot.error);
    }

    const result = await this.meetingRepository.addSlot(
      meetingId,
      slot.value,
      this.now(),
      MAX_SLOTS_PER_MEETING,
    );
    switch (result.outcome) {
      case 'not_found':
        return failure('not_found', 'meeting_not_found', 'Meeting not found.');
      case 'rejected':
        return lifecycleFailure(result.reason, result.status);
      case 'slot_limit':
        return failure(
          'validation_failed',
          'too_many_slots',
          `A meeting can have at most ${result.maxSlots} time slots.`,
          { maxSlots: result.maxSlots },
        );
      case 'added':
        break;
    }

    const slots = await this.meetingRepository.listSlots(meetingId);
    const deliveries = await this.announceScheduleChange(owned.value, slots);
    return success({ slot: result.slot, slots: this.labelSlots(slots), deliveries });
  }

  async deleteSlot(
    ctx: RequestContext,
    meetingId: string,
    slotId: string,
  ): Promise<DomainResult<SlotChangeOutcome<{ removedResponses: number }>>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const result = await this.meetingRepository.deleteSlot(meetingId, slotId, this.now());
    switch (result.outcome) {
      case 'not_found':
        return failure('not_found', 'meeting_not_found', 'Meeting not found.');
      case 'unknown_slot':
        return failure('not_found', 'unknown_slot', 'This slot does not belong to the meeting.');
      case 'last_slot':
        return failure(
          'constraint_violation',
          'last_slot',
          'A meeting must keep at least one time slot.',
        );
      case 'rejected':
        return lifecycleFailure(result.reason, result.status);
      case 'deleted':
        break;
    }

    functions.logger.info(
      `[meetings] Removed slot ${slotId} from meeting ${meetingId} (${result.removedResponses} responses)`,
    );
    const deliveries = await this.announceScheduleChange(owned.value, result.remainingSlots);
    return success({
      removedResponses: result.removedResponses,
      slots: this.labelSlots(result.remainingSlots),
      deliveries,
    });
  }

  async addParticipants(
    ctx: RequestContext,
    meetingId: string,
    selection: ParticipantSelection,
  ): Promise<DomainResult<AddParticipantsOutcome>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const meeting = owned.value;
    const closed = rejectClosedMeeting(meeting.status);
    if (closed) {
      return lifecycleFailure(closed, meeting.status);
    }

    const contacts = await this.resolveParticipants(ctx, selection);
    if (!contacts.ok) {
      return propagate(contacts.error);
    }
    if (contacts.value.length === 0) {
      return failure('validation_failed', 'invalid_input', 'At least one participant is required.');
    }

    const added: MeetingParticipant[] = [];
    const existing: string[] = [];
    for (const contact of contacts.value) {
      const issued = await this.tokenService.issueToken(meetingId, contact.id);
      if (!issued.ok) {
        return propagate(issued.error);
      }
      if (issued.value.created) {
        added.push({ binding: issued.value.binding, contact });
      } else {
        existing.push(contact.id);
      }
    }

    const deliveries =
      meeting.status === 'sent' && added.length > 0
        ? await notifyAfterCommit(`meeting ${meetingId} invitations`, () =>
            this.notifyParticipants('invitation', meeting, added),
          )
        : null;

    return success({
      added: added.map((participant) => participant.contact.id),
      existing,
      deliveries,
    });
  }

  async cancelMeeting(ctx: RequestContext, meetingId: string): Promise<DomainResult<MeetingRecord>> {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const result = await this.meetingRepository.transitionStatus(meetingId, 'cancelled', this.now());
    switch (result.outcome) {
      case 'not_found':
        return failure('not_found', 'meeting_not_found', 'Meeting not found.');
      case 'rejected':
        return lifecycleFailure(result.reason, result.status);
      case 'updated':
        functions.logger.info(
          `[meetings] Meeting ${meetingId} cancelled (was ${result.previousStatus})`,
        );
        return success(result.meeting);
    }
  }

  async deleteMeeting(
    ctx: RequestContext,
    meetingId: string,
  ): Promise<
    DomainResult<{
      meetingId: string;
      removedSlots: number;
      removedParticipants: number;
      removedResponses: number;
    }>
  > {
    const owned = await loadOwnedMeeting(this.meetingRepository, ctx, meetingId);
    if (!owned.ok) {
      return propagate(owned.error);
    }

    const result = await this.meetingRepository.deleteCascade(meetingId);
    if (result.outcome === 'not_found') {
      return failure('not_found', 'meeting_not_found', 'Meeting not found.');
    }

    functions.logger.info(`[meetings] Organizer ${ctx.organizerId} deleted meeting ${meetingId}`);
    return success({
      meetingId,
      removedSlots: result.removedSlots,
      removedParticipants: result.removedParticipants,
      removedResponses: result.removedResponses,
    });
  }

  /**
   * Contacts named directly must be the caller's own or members of a group
   * currently shared with the caller. Groups contribute all their members and
   * must be owned or shared. The result is deduplicated in selection order.
   */
  private async resolveParticipants(
    ctx: RequestContext,
    selection: ParticipantSelection,
  ): Promise<DomainResult<ContactRecord[]>> {
    const selectedIds: string[] = [];

    for (const groupId of selection.groupIds ?? []) {
      const accessible = await this.groupService.getAccessibleGroup(ctx, groupId);
      if (!accessible.ok) {
        return propagate(accessible.error);
      }
      selectedIds.push(...(await this.groupRepository.listMemberIds(groupId)));
    }

    const directIds = selection.contactIds ?? [];
    selectedIds.push(...directIds);

    const uniqueIds = Array.from(new Set(selectedIds));
    const contacts = await this.contactRepository.getByIds(uniqueIds);
    const contactsById = new Map(contacts.map((contact) => [contact.id, contact]));

    const missing = uniqueIds.filter((contactId) => !contactsById.has(contactId));
    if (missing.length > 0) {
      return failure('not_found', 'contact_not_found', 'Contact not found.', {
        contactIds: missing,
      });
    }

    const foreignDirect = directIds.filter(
      (contactId) => contactsById.get(contactId)?.ownerId !== ctx.organizerId,
    );
    if (foreignDirect.length > 0) {
      const visible = await this.sharedContactIds(ctx);
      const hidden = foreignDirect.filter((contactId) => !visible.has(contactId));
      if (hidden.length > 0) {
        return failure(
          'forbidden',
          'contact_not_visible',
          'You can only invite your own contacts or members of groups shared with you.',
          { contactIds: hidden },
        );
      }
    }

    return success(
      uniqueIds.flatMap((contactId) => {
        const contact = contactsById.get(contactId);
        return contact ? [contact] : [];
      }),
    );
  }

  private async sharedContactIds(ctx: RequestContext): Promise<Set<string>> {
    const groups = await this.groupRepository.listSharedWith(ctx.organizerEmail);
    const memberLists = await Promise.all(
      groups.map((group) => this.groupRepository.listMemberIds(group.id)),
    );
    return new Set(memberLists.flat());
  }

  private labelSlots(slots: TimeSlotRecord[]): LabeledSlot[] {
    return slots.map((slot) => ({ ...slot, label: this.slotFormatter.formatSlot(slot) }));
  }

  private async buildDetail(meeting: MeetingRecord): Promise<MeetingDetail> {
    const [slots, participants] = await Promise.all([
      this.meetingRepository.listSlots(meeting.id),
      loadMeetingParticipants(this.participantRepository, this.contactRepository, meeting.id),
    ]);

    return {
      meeting,
      slots: this.labelSlots(slots),
      participants: participants.map(({ binding, contact }) => ({
        contactId: contact.id,
        name: contact.name,
        email: contact.email,
        responded: binding.responded,
        respondedAt: binding.respondedAt,
        responseUrl: participantResponseUrl(this.publicBaseUrl, binding.token),
      })),
    };
  }

  private async announceScheduleChange(
    meeting: MeetingRecord,
    slots: TimeSlotRecord[],
  ): Promise<DeliveryReport | null> {
    if (meeting.status !== 'sent') {
      return null;
    }
    return notifyAfterCommit(`meeting ${meeting.id} schedule update`, async () => {
      const participants = await loadMeetingParticipants(
        this.participantRepository,
        this.contactRepository,
        meeting.id,
      );
      return this.notifyParticipants('schedule-update', meeting, participants, slots);
    });
  }

  private async notifyParticipants(
    kind: 'invitation' | 'reminder' | 'schedule-update',
    meeting: MeetingRecord,
    participants: MeetingParticipant[],
    knownSlots?: TimeSlotRecord[],
  ): Promise<DeliveryReport> {
    const slots = knownSlots ?? (await this.meetingRepository.listSlots(meeting.id));
    const slotLabels = slots.map((slot) => this.slotFormatter.formatSlot(slot));

    const items = participants.map(({ binding, contact }) => {
      const payload: ParticipantNotice = {
        participantName: contact.name,
        meetingTitle: meeting.title,
        meetingDescription: meeting.description,
        organizerName: meeting.organizerName,
        organizerEmail: meeting.organizerEmail,
        responseUrl: participantResponseUrl(this.publicBaseUrl, binding.token),
        slots: slotLabels,
      };
      return { recipient: contact.email, payload };
    });

    return dispatchAll(this.notifications, kind, items);
  }
}
