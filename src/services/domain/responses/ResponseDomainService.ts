import * as functions from 'firebase-functions';
import type {
  Availability,
  MeetingRecord,
  MeetingStatus,
  ResponseRecord,
  SuggestedSlotRecord,
} from '../../../types/scheduling';
import { MAX_NOTE_LENGTH, sanitizePlainText } from '../../../utils/inputSanitization';
import { organizerDashboardUrl } from '../../../utils/links';
import type { SlotFormatter } from '../../../utils/slotFormatting';
import { isOpen } from '../../meetingLifecycle';
import {
  notifyOneAfterCommit,
  type NotificationDispatcher,
  type NotificationResult,
} from '../../notifications';
import type { ContactRepository } from '../../repositories/contacts/ContactRepository';
import type { MeetingRepository } from '../../repositories/meetings/MeetingRepository';
import type { ResolvedToken } from '../../repositories/participants/ParticipantRepository';
import type {
  ResponseRepository,
  SlotAnswer,
  SuggestionInput,
} from '../../repositories/responses/ResponseRepository';
import { lifecycleFailure } from '../common/lifecycleFailure';
import { failure, propagate, success, type DomainResult } from '../common/results';
import type { LabeledSlot } from '../meetings/MeetingDomainService';
import type { ParticipantTokenService } from '../tokens/ParticipantTokenService';

const INVALID_LINK_MESSAGE = 'This link is invalid or has expired.';

export type SuggestionRequest = {
  startsAt: Date;
  note?: string | null;
};

export type ParticipantView = {
  meeting: {
    id: string;
    title: string;
    description: string;
    status: MeetingStatus;
    organizerName: string;
    organizerEmail: string;
    finalizedSlot: string | null;
  };
  acceptingResponses: boolean;
  participant: { contactId: string; name: string };
  slots: LabeledSlot[];
  answers: Record<string, Availability>;
  suggestion: SuggestedSlotRecord | null;
};

export type SubmissionOutcome = {
  responses: ResponseRecord[];
  firstSubmission: boolean;
  suggestion: SuggestedSlotRecord | null;
  /** Organizer notification; null when the participant record could not be loaded. */
  notification: NotificationResult | null;
};

export type ResponseDomainServiceDeps = {
  tokenService: ParticipantTokenService;
  responseRepository: ResponseRepository;
  meetingRepository: MeetingRepository;
  contactRepository: ContactRepository;
  notifications: NotificationDispatcher;
  slotFormatter: SlotFormatter;
  publicBaseUrl: string;
  now?: () => Date;
};

/**
 * Token-authenticated side of the engine. Every operation starts from the
 * opaque participant token; nothing here takes an organizer context.
 */
export class ResponseDomainService {
  private readonly tokenService: ParticipantTokenService;
  private readonly responseRepository: ResponseRepository;
  private readonly meetingRepository: MeetingRepository;
  private readonly contactRepository: ContactRepository;
  private readonly notifications: NotificationDispatcher;
  private readonly slotFormatter: SlotFormatter;
  private readonly publicBaseUrl: string;
  private readonly now: () => Date;

  constructor(deps: ResponseDomainServiceDeps) {
    this.tokenService = deps.tokenService;
    this.responseRepository = deps.responseRepository;
    this.meetingRepository = deps.meetingRepository;
    this.contactRepository = deps.contactRepository;
    this.notifications = deps.notifications;
    this.slotFormatter = deps.slotFormatter;
    this.publicBaseUrl = deps.publicBaseUrl;
    this.now = deps.now ?? (() => new Date());
  }

  async getParticipantView(token: unknown): Promise<DomainResult<ParticipantView>> {
    const resolved = await this.resolveToken(token);
    if (!resolved.ok) {
      return propagate(resolved.error);
    }

    const { meetingId, contactId } = resolved.value;
    const [meeting, contact, slots, responses, suggestion] = await Promise.all([
      this.meetingRepository.getById(meetingId),
      this.contactRepository.getById(contactId),
      this.meetingRepository.listSlots(meetingId),
      this.responseRepository.listByParticipant(meetingId, contactId),
      this.responseRepository.getSuggestion(meetingId, contactId),
    ]);
    if (!meeting || !contact) {
      return failure('not_found', 'invalid_token', INVALID_LINK_MESSAGE);
    }

    const answers: Record<string, Availability> = {};
    for (const response of responses) {
      answers[response.slotId] = response.availability;
    }

    return success({
      meeting: {
        id: meeting.id,
        title: meeting.title,
        description: meeting.description,
        status: meeting.status,
        organizerName: meeting.organizerName,
        organizerEmail: meeting.organizerEmail,
        finalizedSlot: meeting.finalizedSlot,
      },
      acceptingResponses: isOpen(meeting.status),
      participant: { contactId: contact.id, name: contact.name },
      slots: slots.map((slot) => ({ ...slot, label: this.slotFormatter.formatSlot(slot) })),
      answers,
      suggestion,
    });
  }

  async submitResponse(
    token: unknown,
    slotId: string,
    availability: Availability,
  ): Promise<DomainResult<SubmissionOutcome>> {
    return this.submitAll(token, [{ slotId, availability }]);
  }

  /**
   * Upserts every answer in one transaction. Unknown slots reject the whole
   * submission before anything is written. An optional suggestion replaces the
   * participant's previous one in the same commit.
   */
  async submitAll(
    token: unknown,
    answers: SlotAnswer[],
    suggestionRequest?: SuggestionRequest | null,
  ): Promise<DomainResult<SubmissionOutcome>> {
    const resolved = await this.resolveToken(token);
    if (!resolved.ok) {
      return propagate(resolved.error);
    }

    if (answers.length === 0 && !suggestionRequest) {
      return failure(
        'validation_failed',
        'invalid_input',
        'Select your availability for at least one time slot.',
      );
    }

    const suggestion = suggestionRequest ? this.toSuggestionInput(suggestionRequest) : null;
    if (suggestion && !suggestion.ok) {
      return propagate(suggestion.error);
    }

    const { meetingId, contactId } = resolved.value;
    const result = await this.responseRepository.submit({
      meetingId,
      contactId,
      answers,
      suggestion: suggestion ? suggestion.value : null,
      submittedAt: this.now(),
    });

    switch (result.outcome) {
      case 'binding_not_found':
      case 'meeting_not_found':
        return failure('not_found', 'invalid_token', INVALID_LINK_MESSAGE);
      case 'unknown_slot':
        return failure('not_found', 'unknown_slot', 'One or more time slots do not belong to this meeting.', {
          slotIds: result.slotIds,
        });
      case 'rejected':
        return lifecycleFailure(result.reason, result.status);
      case 'recorded':
        break;
    }

    functions.logger.info(
      `[responses] Participant ${contactId} answered ${answers.length} slots for meeting ${meetingId}`,
    );
    const notification = await this.notifyOrganizer(result.meeting, contactId);

    return success({
      responses: result.responses,
      firstSubmission: result.firstSubmission,
      suggestion: result.suggestion,
      notification,
    });
  }

  async suggestAlternative(
    token: unknown,
    request: SuggestionRequest,
  ): Promise<DomainResult<{ suggestion: SuggestedSlotRecord; replaced: boolean }>> {
    const resolved = await this.resolveToken(token);
    if (!resolved.ok) {
      return propagate(resolved.error);
    }

    const suggestion = this.toSuggestionInput(request);
    if (!suggestion.ok) {
      return propagate(suggestion.error);
    }

    const result = await this.responseRepository.saveSuggestion({
      ...resolved.value,
      ...suggestion.value,
      createdAt: this.now(),
    });
    switch (result.outcome) {
      case 'binding_not_found':
      case 'meeting_not_found':
        return failure('not_found', 'invalid_token', INVALID_LINK_MESSAGE);
      case 'rejected':
        return lifecycleFailure(result.reason, result.status);
      case 'saved':
        return success({ suggestion: result.suggestion, replaced: result.replaced });
    }
  }

  private async resolveToken(token: unknown): Promise<DomainResult<ResolvedToken>> {
    const resolved = await this.tokenService.resolve(token);
    if (!resolved) {
      return failure('not_found', 'invalid_token', INVALID_LINK_MESSAGE);
    }
    return success(resolved);
  }

  private toSuggestionInput(request: SuggestionRequest): DomainResult<SuggestionInput> {
    if (Number.isNaN(request.startsAt.getTime())) {
      return failure('validation_failed', 'invalid_input', 'Suggested time is not a valid date.');
    }
    const note = sanitizePlainText(request.note ?? '', MAX_NOTE_LENGTH);
    return success({ startsAt: request.startsAt, note: note || null });
  }

  private async notifyOrganizer(
    meeting: MeetingRecord,
    contactId: string,
  ): Promise<NotificationResult | null> {
    return notifyOneAfterCommit('response-received', meeting.organizerEmail, async () => {
      const contact = await this.contactRepository.getById(contactId);
      if (!contact) {
        functions.logger.warn(`[responses] Contact ${contactId} missing; organizer not notified`);
        return null;
      }

      return this.notifications.notify('response-received', meeting.organizerEmail, {
        participantName: contact.name,
        meetingTitle: meeting.title,
        dashboardUrl: organizerDashboardUrl(this.publicBaseUrl, meeting.id),
      });
    });
  }
}
