export class RepositoryValidationError extends Error {
  readonly code = 'validation_failed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'RepositoryValidationError';
  }
}

export class StorageTimeoutError extends Error {
  readonly code = 'storage_unavailable' as const;

  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`Storage operation "${operation}" timed out after ${timeoutMs}ms`);
    this.name = 'StorageTimeoutError';
  }
}

const ALREADY_EXISTS_GRPC_CODE = 6;

/**
 * Firestore rejects `create` on an existing document with gRPC status 6.
 */
export function isAlreadyExistsError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return code === ALREADY_EXISTS_GRPC_CODE || code === 'already-exists' || code === 'ALREADY_EXISTS';
}
