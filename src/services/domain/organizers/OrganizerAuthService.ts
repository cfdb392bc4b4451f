import { createHash, pbkdf2, randomBytes, timingSafeEqual } from 'crypto';
import { promisify } from 'util';
import * as functions from 'firebase-functions';
import type { OrganizerRecord, RequestContext } from '../../../types/scheduling';
import type {
  OrganizerRepository,
  PasswordHashRecord,
} from '../../repositories/organizers/OrganizerRepository';
import { normalizeEmail } from '../../repositories/common/storage';
import { failure, propagate, success, type DomainResult } from '../common/results';

const pbkdf2Async = promisify(pbkdf2);

const KEY_LENGTH = 32;
const SALT_BYTES = 32;
const SESSION_TOKEN_BYTES = 32;

export type OrganizerAuthOptions = {
  iterations: number;
  sessionTtlHours: number;
  now?: () => Date;
};

export type RegisterOrganizerInput = {
  email: string;
  password: string;
  name?: string;
  recoveryPhrase: string;
};

export type OrganizerSession = {
  organizer: OrganizerRecord;
  sessionToken: string;
  expiresAt: Date;
};

function normalizeRecoveryPhrase(phrase: string): string {
  return phrase.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function sessionKey(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Password and recovery-phrase hashing plus opaque bearer sessions for organizers.
 * Plaintext secrets never leave this service.
 */
export class OrganizerAuthService {
  private readonly now: () => Date;

  constructor(
    private readonly organizerRepository: OrganizerRepository,
    private readonly options: OrganizerAuthOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async register(input: RegisterOrganizerInput): Promise<DomainResult<OrganizerRecord>> {
    const email = normalizeEmail(input.email);
    const name = input.name?.trim() || email.split('@')[0] || email;

    const [passwordHash, recoveryHash] = await Promise.all([
      this.hashSecret(input.password),
      this.hashSecret(normalizeRecoveryPhrase(input.recoveryPhrase)),
    ]);

    const result = await this.organizerRepository.create({
      email,
      name,
      passwordHash,
      recoveryHash,
      createdAt: this.now(),
    });

    if (result.outcome === 'already_exists') {
      return failure('conflict', 'already_exists', 'An organizer with this email already exists.');
    }

    functions.logger.info(`[auth] Registered organizer ${email}`);
    return success(result.organizer);
  }

  async authenticate(email: string, password: string): Promise<DomainResult<OrganizerRecord>> {
    const credentials = await this.organizerRepository.getCredentialsByEmail(email);
    if (!credentials) {
      // Burn the same work as a real check so unknown emails are not distinguishable by timing.
      await this.hashSecret(password);
      return failure('unauthorized', 'invalid_credentials', 'Invalid email or password.');
    }

    const valid = await this.verifySecret(password, credentials.passwordHash);
    if (!valid) {
      functions.logger.warn(`[auth] Failed login for ${credentials.email}`);
      return failure('unauthorized', 'invalid_credentials', 'Invalid email or password.');
    }

    return success({
      id: credentials.id,
      email: credentials.email,
      name: credentials.name,
      createdAt: credentials.createdAt,
    });
  }

  async login(email: string, password: string): Promise<DomainResult<OrganizerSession>> {
    const authenticated = await this.authenticate(email, password);
    if (!authenticated.ok) {
      return propagate(authenticated.error);
    }

    const sessionToken = randomBytes(SESSION_TOKEN_BYTES).toString('base64url');
    const createdAt = this.now();
    const expiresAt = new Date(createdAt.getTime() + this.options.sessionTtlHours * 60 * 60 * 1000);

    await this.organizerRepository.createSession(sessionKey(sessionToken), {
      organizerId: authenticated.value.id,
      createdAt,
      expiresAt,
    });

    return success({ organizer: authenticated.value, sessionToken, expiresAt });
  }

  /**
   * Resolves a bearer session into the request context. Expired sessions are removed.
   */
  async resolveSession(sessionToken: string): Promise<RequestContext | null> {
    const key = sessionKey(sessionToken);
    const session = await this.organizerRepository.getSession(key);
    if (!session) {
      return null;
    }

    if (session.expiresAt.getTime() <= this.now().getTime()) {
      await this.organizerRepository.deleteSession(key);
      return null;
    }

    const organizer = await this.organizerRepository.getById(session.organizerId);
    if (!organizer) {
      await this.organizerRepository.deleteSession(key);
      return null;
    }

    return { organizerId: organizer.id, organizerEmail: organizer.email };
  }

  async getOrganizer(organizerId: string): Promise<DomainResult<OrganizerRecord>> {
    const organizer = await this.organizerRepository.getById(organizerId);
    if (!organizer) {
      return failure('not_found', 'organizer_not_found', 'Organizer not found.');
    }
    return success(organizer);
  }

  async logout(sessionToken: string): Promise<void> {
    await this.organizerRepository.deleteSession(sessionKey(sessionToken));
  }

  async resetPassword(
    email: string,
    recoveryPhrase: string,
    newPassword: string,
  ): Promise<DomainResult<{ organizerId: string }>> {
    const credentials = await this.organizerRepository.getCredentialsByEmail(email);
    if (!credentials) {
      return failure('not_found', 'organizer_not_found', 'No organizer is registered with this email.');
    }

    const valid = await this.verifySecret(
      normalizeRecoveryPhrase(recoveryPhrase),
      credentials.recoveryHash,
    );
    if (!valid) {
      functions.logger.warn(`[auth] Rejected password reset for ${credentials.email}`);
      return failure('unauthorized', 'invalid_recovery_phrase', 'The recovery phrase is incorrect.');
    }

    const passwordHash = await this.hashSecret(newPassword);
    await this.organizerRepository.updatePasswordHash(credentials.id, passwordHash, this.now());

    functions.logger.info(`[auth] Password reset for ${credentials.email}`);
    return success({ organizerId: credentials.id });
  }

  private async hashSecret(secret: string): Promise<PasswordHashRecord> {
    const salt = randomBytes(SALT_BYTES).toString('hex');
    const hash = await pbkdf2Async(secret, salt, this.options.iterations, KEY_LENGTH, 'sha256');
    return {
      algorithm: 'pbkdf2-sha256',
      iterations: this.options.iterations,
      salt,
      hash: hash.toString('hex'),
    };
  }

  private async verifySecret(secret: string, stored: PasswordHashRecord): Promise<boolean> {
    const expected = Buffer.from(stored.hash, 'hex');
    const actual = await pbkdf2Async(secret, stored.salt, stored.iterations, expected.length, 'sha256');
    return actual.length === expected.length && timingSafeEqual(actual, expected);
  }
}
