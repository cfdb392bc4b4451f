import * as functions from 'firebase-functions';
import { FieldValue } from 'firebase-admin/firestore';
import { withStorageTimeout } from './repositories/common/storage';

const MAINTENANCE_COLLECTION = 'systemMaintenance';
const STORAGE_STATE_DOC = 'storage';

export type InitializeStorageOptions = {
  schemaVersion: number;
  timeoutMs: number;
};

const initialized = new WeakSet<FirebaseFirestore.Firestore>();

/**
 * One-time storage setup for a process: Firestore client settings and the
 * schema version marker. Runs at startup, never on a request path. Repeated
 * calls for the same client are no-ops.
 */
export async function initializeStorage(
  db: FirebaseFirestore.Firestore,
  options: InitializeStorageOptions,
): Promise<void> {
  if (initialized.has(db)) {
    return;
  }

  // settings() may only be called before the first read or write
  db.settings({ ignoreUndefinedProperties: true });
  initialized.add(db);

  await withStorageTimeout('storage.initialize', options.timeoutMs, () =>
    db.collection(MAINTENANCE_COLLECTION).doc(STORAGE_STATE_DOC).set(
      {
        schemaVersion: options.schemaVersion,
        initializedAt: FieldValue.serverTimestamp(),
      },
      { merge: true },
    ),
  );

  functions.logger.info(`[storage] Initialized (schema version ${options.schemaVersion})`);
}
