export type DomainErrorKind =
  | 'not_found'
  | 'conflict'
  | 'invalid_state'
  | 'forbidden'
  | 'constraint_violation'
  | 'validation_failed'
  | 'unauthorized';

export type DomainErrorReason =
  | 'organizer_not_found'
  | 'contact_not_found'
  | 'group_not_found'
  | 'meeting_not_found'
  | 'membership_not_found'
  | 'share_not_found'
  | 'unknown_slot'
  | 'invalid_token'
  | 'already_exists'
  | 'duplicate_contact_email'
  | 'duplicate_membership'
  | 'duplicate_share'
  | 'token_collision'
  | 'already_sent'
  | 'already_finalized'
  | 'meeting_cancelled'
  | 'meeting_finalized'
  | 'meeting_not_sent'
  | 'not_owner'
  | 'contact_not_visible'
  | 'contact_in_use'
  | 'last_slot'
  | 'too_many_slots'
  | 'invalid_input'
  | 'invalid_credentials'
  | 'invalid_recovery_phrase';

export type DomainError = {
  kind: DomainErrorKind;
  reason: DomainErrorReason;
  message: string;
  details?: Record<string, unknown>;
};

export type DomainResult<T> = { ok: true; value: T } | { ok: false; error: DomainError };

export function success<T>(value: T): DomainResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(
  kind: DomainErrorKind,
  reason: DomainErrorReason,
  message: string,
  details?: Record<string, unknown>,
): DomainResult<T> {
  return {
    ok: false,
    error: details ? { kind, reason, message, details } : { kind, reason, message },
  };
}

/**
 * Re-types a failed result so it can be returned from an operation with a
 * different success payload.
 */
export function propagate<T>(error: DomainError): DomainResult<T> {
  return { ok: false, error };
}
