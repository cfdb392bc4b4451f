import { z } from 'zod';
import type { OrganizerRecord } from '../../../types/scheduling';
import { isAlreadyExistsError } from '../common/errors';
import {
  DEFAULT_STORAGE_TIMEOUT_MS,
  emailKey,
  normalizeEmail,
  parseDocument,
  timestampSchema,
  toTimestamp,
  withStorageTimeout,
  type RepositoryOptions,
} from '../common/storage';
import type {
  CreateOrganizerInput,
  CreateOrganizerResult,
  OrganizerCredentialsRecord,
  OrganizerRepository,
  OrganizerSessionRecord,
  PasswordHashRecord,
} from './OrganizerRepository';

const ORGANIZERS = 'organizers';
const SESSIONS = 'organizerSessions';

const passwordHashSchema = z.object({
  algorithm: z.literal('pbkdf2-sha256'),
  iterations: z.number().int().positive(),
  salt: z.string().min(1),
  hash: z.string().min(1),
});

const organizerDocSchema = z.object({
  email: z.string(),
  name: z.string(),
  passwordHash: passwordHashSchema,
  recoveryHash: passwordHashSchema,
  createdAt: timestampSchema,
});

const sessionDocSchema = z.object({
  organizerId: z.string().min(1),
  createdAt: timestampSchema,
  expiresAt: timestampSchema,
});

function toOrganizer(id: string, doc: z.output<typeof organizerDocSchema>): OrganizerRecord {
  return {
    id,
    email: doc.email,
    name: doc.name,
    createdAt: doc.createdAt,
  };
}

/**
 * Organizers are keyed by the digest of their normalized email, so the email
 * uniqueness constraint is the document id itself.
 */
export class FirestoreOrganizerRepository implements OrganizerRepository {
  private readonly timeoutMs: number;

  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    options: RepositoryOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
  }

  async create(input: CreateOrganizerInput): Promise<CreateOrganizerResult> {
    const email = normalizeEmail(input.email);
    const organizerId = emailKey(email);
    const organizerRef = this.db.collection(ORGANIZERS).doc(organizerId);

    try {
      await withStorageTimeout('organizers.create', this.timeoutMs, () =>
        organizerRef.create({
          email,
          name: input.name,
          passwordHash: input.passwordHash,
          recoveryHash: input.recoveryHash,
          createdAt: toTimestamp(input.createdAt),
        }),
      );
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        return { outcome: 'already_exists' };
      }
      throw error;
    }

    return {
      outcome: 'created',
      organizer: { id: organizerId, email, name: input.name, createdAt: input.createdAt },
    };
  }

  async getById(organizerId: string): Promise<OrganizerRecord | null> {
    const doc = await withStorageTimeout('organizers.getById', this.timeoutMs, () =>
      this.db.collection(ORGANIZERS).doc(organizerId).get(),
    );
    if (!doc.exists) {
      return null;
    }

    return toOrganizer(
      doc.id,
      parseDocument(organizerDocSchema, doc.data(), `${ORGANIZERS}/${doc.id}`),
    );
  }

  async getCredentialsByEmail(email: string): Promise<OrganizerCredentialsRecord | null> {
    const organizerId = emailKey(email);
    const doc = await withStorageTimeout('organizers.getCredentials', this.timeoutMs, () =>
      this.db.collection(ORGANIZERS).doc(organizerId).get(),
    );
    if (!doc.exists) {
      return null;
    }

    const parsed = parseDocument(organizerDocSchema, doc.data(), `${ORGANIZERS}/${doc.id}`);
    return {
      ...toOrganizer(doc.id, parsed),
      passwordHash: parsed.passwordHash,
      recoveryHash: parsed.recoveryHash,
    };
  }

  async updatePasswordHash(
    organizerId: string,
    passwordHash: PasswordHashRecord,
    updatedAt: Date,
  ): Promise<void> {
    await withStorageTimeout('organizers.updatePassword', this.timeoutMs, () =>
      this.db.collection(ORGANIZERS).doc(organizerId).update({
        passwordHash,
        updatedAt: toTimestamp(updatedAt),
      }),
    );
  }

  async createSession(sessionKey: string, session: OrganizerSessionRecord): Promise<void> {
    await withStorageTimeout('sessions.create', this.timeoutMs, () =>
      this.db.collection(SESSIONS).doc(sessionKey).create({
        organizerId: session.organizerId,
        createdAt: toTimestamp(session.createdAt),
        expiresAt: toTimestamp(session.expiresAt),
      }),
    );
  }

  async getSession(sessionKey: string): Promise<OrganizerSessionRecord | null> {
    const doc = await withStorageTimeout('sessions.get', this.timeoutMs, () =>
      this.db.collection(SESSIONS).doc(sessionKey).get(),
    );
    if (!doc.exists) {
      return null;
    }

    return parseDocument(sessionDocSchema, doc.data(), `${SESSIONS}/${doc.id}`);
  }

  async deleteSession(sessionKey: string): Promise<void> {
    await withStorageTimeout('sessions.delete', this.timeoutMs, () =>
      this.db.collection(SESSIONS).doc(sessionKey).delete(),
    );
  }
}
