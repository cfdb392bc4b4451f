import { FakeFirestore } from '../../__tests__/helpers/fakeFirestore';
import { initializeStorage } from '../initializeStorage';

describe('initializeStorage', () => {
  it('applies client settings and records the schema version once per client', async () => {
    const db = new FakeFirestore();

    await initializeStorage(db.asFirestore(), { schemaVersion: 1, timeoutMs: 1000 });
    await initializeStorage(db.asFirestore(), { schemaVersion: 1, timeoutMs: 1000 });

    expect(db.settingsCalls).toEqual([{ ignoreUndefinedProperties: true }]);
    expect(db.read('systemMaintenance/storage')).toMatchObject({ schemaVersion: 1 });
  });

  it('keeps other fields of the state document', async () => {
    const db = new FakeFirestore();
    db.seed('systemMaintenance/storage', { schemaVersion: 0, note: 'seeded' });

    await initializeStorage(db.asFirestore(), { schemaVersion: 2, timeoutMs: 1000 });

    expect(db.read('systemMaintenance/storage')).toMatchObject({ schemaVersion: 2, note: 'seeded' });
  });
});
