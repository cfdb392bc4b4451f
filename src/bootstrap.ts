import * as admin from 'firebase-admin';
import { storageConfig } from './config';
import { initializeStorage } from './services/initializeStorage';
import {
  createDomainServiceContainer,
  type DomainServiceContainer,
} from './services/domain/serviceContainer';
import { initSentry } from './utils/sentry';

/**
 * Process-level setup shared by the Cloud Functions export and the plain Node
 * server: Sentry, the Admin SDK, storage settings and the service container.
 */
export async function bootstrap(): Promise<DomainServiceContainer> {
  initSentry();

  if (admin.apps.length === 0) {
    admin.initializeApp();
  }
  const db = admin.firestore();

  await initializeStorage(db, {
    schemaVersion: storageConfig.schemaVersion,
    timeoutMs: storageConfig.timeoutMs,
  });

  return createDomainServiceContainer({ db });
}
