import { createHash } from 'crypto';
import { Timestamp } from 'firebase-admin/firestore';
import { z } from 'zod';
import { RepositoryValidationError, StorageTimeoutError } from './errors';

export const DEFAULT_STORAGE_TIMEOUT_MS = 5000;

export type RepositoryOptions = {
  timeoutMs?: number;
};

/**
 * Bounds a storage call so a stalled backend surfaces as StorageTimeoutError
 * instead of holding the request open.
 */
export async function withStorageTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StorageTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Document-id-safe key for an email address. Emails may contain characters
 * Firestore ids reject, so uniqueness documents are keyed by this digest.
 */
export function emailKey(email: string): string {
  return createHash('sha256').update(normalizeEmail(email)).digest('hex');
}

export const timestampSchema = z.instanceof(Timestamp).transform((value) => value.toDate());

export const nullableTimestampSchema = z
  .instanceof(Timestamp)
  .nullable()
  .optional()
  .transform((value) => (value ? value.toDate() : null));

export function toTimestamp(date: Date): Timestamp {
  return Timestamp.fromDate(date);
}

export function parseDocument<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  data: unknown,
  path: string,
): z.output<TSchema> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RepositoryValidationError(`Malformed document ${path}: ${issues}`);
  }
  return parsed.data;
}
