import type { OrganizerRecord } from '../../../types/scheduling';

export type PasswordHashRecord = {
  algorithm: 'pbkdf2-sha256';
  iterations: number;
  salt: string;
  hash: string;
};

export type OrganizerCredentialsRecord = OrganizerRecord & {
  passwordHash: PasswordHashRecord;
  recoveryHash: PasswordHashRecord;
};

export type OrganizerSessionRecord = {
  organizerId: string;
  createdAt: Date;
  expiresAt: Date;
};

export type CreateOrganizerInput = {
  email: string;
  name: string;
  passwordHash: PasswordHashRecord;
  recoveryHash: PasswordHashRecord;
  createdAt: Date;
};

export type CreateOrganizerResult =
  | { outcome: 'created'; organizer: OrganizerRecord }
  | { outcome: 'already_exists' };

export interface OrganizerRepository {
  create(input: CreateOrganizerInput): Promise<CreateOrganizerResult>;
  getById(organizerId: string): Promise<OrganizerRecord | null>;
  getCredentialsByEmail(email: string): Promise<OrganizerCredentialsRecord | null>;
  updatePasswordHash(
    organizerId: string,
    passwordHash: PasswordHashRecord,
    updatedAt: Date,
  ): Promise<void>;
  createSession(sessionKey: string, session: OrganizerSessionRecord): Promise<void>;
  getSession(sessionKey: string): Promise<OrganizerSessionRecord | null>;
  deleteSession(sessionKey: string): Promise<void>;
}
