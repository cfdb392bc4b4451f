import { randomBytes } from 'crypto';
import * as functions from 'firebase-functions';
import { withRetry } from '../../../utils/retryUtils';
import type {
  ParticipantRepository,
  ResolvedToken,
} from '../../repositories/participants/ParticipantRepository';
import type { ParticipantBindingRecord } from '../../../types/scheduling';
import { failure, success, type DomainResult } from '../common/results';

const TOKEN_BYTES = 32;
const TOKEN_PATTERN = /^[A-Za-z0-9_-]{43}$/;
const DEFAULT_MAX_ATTEMPTS = 5;

export function generateParticipantToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}

export function isWellFormedToken(token: unknown): token is string {
  return typeof token === 'string' && TOKEN_PATTERN.test(token);
}

class TokenCollisionError extends Error {
  constructor() {
    super('Generated participant token is already bound');
    this.name = 'TokenCollisionError';
  }
}

export type TokenSeed = {
  contactId: string;
  token: string;
};

export type IssuedToken = {
  binding: ParticipantBindingRecord;
  created: boolean;
};

export type ParticipantTokenServiceOptions = {
  generateToken?: () => string;
  maxAttempts?: number;
  now?: () => Date;
};

/**
 * Binds (meeting, contact) pairs to opaque random tokens. Issuing is idempotent:
 * an existing binding keeps its token for good.
 */
export class ParticipantTokenService {
  private readonly generateToken: () => string;
  private readonly maxAttempts: number;
  private readonly now: () => Date;

  constructor(
    private readonly participantRepository: ParticipantRepository,
    options: ParticipantTokenServiceOptions = {},
  ) {
    this.generateToken = options.generateToken ?? generateParticipantToken;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.now = options.now ?? (() => new Date());
  }

  async issueToken(meetingId: string, contactId: string): Promise<DomainResult<IssuedToken>> {
    return this.withTokenRetry(async (): Promise<DomainResult<IssuedToken>> => {
      const result = await this.participantRepository.createBinding(
        meetingId,
        contactId,
        this.generateToken(),
        this.now(),
      );

      switch (result.outcome) {
        case 'token_collision':
          functions.logger.warn(`[tokens] Token collision for meeting ${meetingId}; regenerating`);
          throw new TokenCollisionError();
        case 'meeting_not_found':
          return failure('not_found', 'meeting_not_found', 'Meeting not found.');
        case 'contact_not_found':
          return failure('not_found', 'contact_not_found', 'Contact not found.');
        case 'created':
          return success({ binding: result.binding, created: true });
        case 'existing':
          return success({ binding: result.binding, created: false });
      }
    });
  }

  /**
   * Draws one token per contact and hands them to `write`, which stores them
   * together with whatever else it commits. `write` answers null when a token
   * was already taken and is then called again with fresh tokens.
   */
  async issueTogether<T>(
    contactIds: string[],
    write: (seeds: TokenSeed[]) => Promise<T | null>,
  ): Promise<DomainResult<T>> {
    return this.withTokenRetry(async (): Promise<DomainResult<T>> => {
      const written = await write(
        contactIds.map((contactId) => ({ contactId, token: this.generateToken() })),
      );
      if (written === null) {
        functions.logger.warn(`[tokens] Token collision while binding ${contactIds.length} participants; regenerating`);
        throw new TokenCollisionError();
      }
      return success(written);
    });
  }

  /**
   * Malformed tokens resolve to null without a storage read.
   */
  async resolve(token: unknown): Promise<ResolvedToken | null> {
    if (!isWellFormedToken(token)) {
      return null;
    }
    return this.participantRepository.resolveToken(token);
  }

  private async withTokenRetry<T>(
    attempt: () => Promise<DomainResult<T>>,
  ): Promise<DomainResult<T>> {
    try {
      return await withRetry(attempt, {
        maxAttempts: this.maxAttempts,
        initialDelayMs: 0,
        shouldRetry: (error) => error instanceof TokenCollisionError,
      });
    } catch (error) {
      if (error instanceof TokenCollisionError) {
        return failure(
          'conflict',
          'token_collision',
          `Could not issue a unique token after ${this.maxAttempts} attempts.`,
        );
      }
      throw error;
    }
  }
}
