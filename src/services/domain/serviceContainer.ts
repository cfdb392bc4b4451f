import { appConfig, authConfig, emailConfig, storageConfig } from '../../config';
import { createSlotFormatter } from '../../utils/slotFormatting';
import { EmailService } from '../email';
import { EmailNotificationDispatcher, type NotificationDispatcher } from '../notifications';
import type { ScoringPolicy } from '../slotScoring';
import type { ContactRepository } from '../repositories/contacts/ContactRepository';
import { FirestoreContactRepository } from '../repositories/contacts/FirestoreContactRepository';
import { FirestoreGroupRepository } from '../repositories/groups/FirestoreGroupRepository';
import type { GroupRepository } from '../repositories/groups/GroupRepository';
import { FirestoreMeetingRepository } from '../repositories/meetings/FirestoreMeetingRepository';
import type { MeetingRepository } from '../repositories/meetings/MeetingRepository';
import { FirestoreOrganizerRepository } from '../repositories/organizers/FirestoreOrganizerRepository';
import type { OrganizerRepository } from '../repositories/organizers/OrganizerRepository';
import { FirestoreParticipantRepository } from '../repositories/participants/FirestoreParticipantRepository';
import type { ParticipantRepository } from '../repositories/participants/ParticipantRepository';
import { FirestoreResponseRepository } from '../repositories/responses/FirestoreResponseRepository';
import type { ResponseRepository } from '../repositories/responses/ResponseRepository';
import { ContactDomainService } from './contacts/ContactDomainService';
import { GroupDomainService } from './groups/GroupDomainService';
import { MeetingDomainService } from './meetings/MeetingDomainService';
import { OrganizerAuthService } from './organizers/OrganizerAuthService';
import { ResponseDomainService } from './responses/ResponseDomainService';
import { SchedulingDomainService } from './scheduling/SchedulingDomainService';
import { ParticipantTokenService } from './tokens/ParticipantTokenService';

export type DomainServiceContainer = {
  organizerRepository: OrganizerRepository;
  contactRepository: ContactRepository;
  groupRepository: GroupRepository;
  meetingRepository: MeetingRepository;
  participantRepository: ParticipantRepository;
  responseRepository: ResponseRepository;
  authService: OrganizerAuthService;
  contactService: ContactDomainService;
  groupService: GroupDomainService;
  tokenService: ParticipantTokenService;
  meetingService: MeetingDomainService;
  responseService: ResponseDomainService;
  schedulingService: SchedulingDomainService;
};

export type CreateDomainServiceContainerOptions = {
  db: FirebaseFirestore.Firestore;
  organizerRepository?: OrganizerRepository;
  contactRepository?: ContactRepository;
  groupRepository?: GroupRepository;
  meetingRepository?: MeetingRepository;
  participantRepository?: ParticipantRepository;
  responseRepository?: ResponseRepository;
  notifications?: NotificationDispatcher;
  generateToken?: () => string;
  scoringPolicy?: ScoringPolicy;
  passwordIterations?: number;
  storageTimeoutMs?: number;
  publicBaseUrl?: string;
  displayTimeZone?: string;
  now?: () => Date;
};

export function createDomainServiceContainer(
  options: CreateDomainServiceContainerOptions,
): DomainServiceContainer {
  const repositoryOptions = { timeoutMs: options.storageTimeoutMs ?? storageConfig.timeoutMs };
  const now = options.now ?? (() => new Date());
  const publicBaseUrl = options.publicBaseUrl ?? appConfig.publicBaseUrl;
  const slotFormatter = createSlotFormatter(options.displayTimeZone ?? appConfig.displayTimeZone);

  const organizerRepository =
    options.organizerRepository ?? new FirestoreOrganizerRepository(options.db, repositoryOptions);
  const contactRepository =
    options.contactRepository ?? new FirestoreContactRepository(options.db, repositoryOptions);
  const groupRepository =
    options.groupRepository ?? new FirestoreGroupRepository(options.db, repositoryOptions);
  const meetingRepository =
    options.meetingRepository ?? new FirestoreMeetingRepository(options.db, repositoryOptions);
  const participantRepository =
    options.participantRepository ??
    new FirestoreParticipantRepository(options.db, repositoryOptions);
  const responseRepository =
    options.responseRepository ?? new FirestoreResponseRepository(options.db, repositoryOptions);

  const notifications =
    options.notifications ??
    new EmailNotificationDispatcher(
      new EmailService({
        apiKey: emailConfig.resendApiKey,
        fromAddress: emailConfig.fromAddress,
        fromName: emailConfig.fromName,
      }),
    );

  const groupService = new GroupDomainService(groupRepository, contactRepository, now);
  const tokenService = new ParticipantTokenService(participantRepository, {
    generateToken: options.generateToken,
    now,
  });

  return {
    organizerRepository,
    contactRepository,
    groupRepository,
    meetingRepository,
    participantRepository,
    responseRepository,
    authService: new OrganizerAuthService(organizerRepository, {
      iterations: options.passwordIterations ?? authConfig.passwordIterations,
      sessionTtlHours: authConfig.sessionTtlHours,
      now,
    }),
    contactService: new ContactDomainService(contactRepository, now),
    groupService,
    tokenService,
    meetingService: new MeetingDomainService({
      meetingRepository,
      participantRepository,
      contactRepository,
      groupRepository,
      organizerRepository,
      groupService,
      tokenService,
      notifications,
      slotFormatter,
      publicBaseUrl,
      now,
    }),
    responseService: new ResponseDomainService({
      tokenService,
      responseRepository,
      meetingRepository,
      contactRepository,
      notifications,
      slotFormatter,
      publicBaseUrl,
      now,
    }),
    schedulingService: new SchedulingDomainService({
      meetingRepository,
      participantRepository,
      contactRepository,
      responseRepository,
      notifications,
      slotFormatter,
      policy: options.scoringPolicy,
      now,
    }),
  };
}
