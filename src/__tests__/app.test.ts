import * as functions from 'firebase-functions';
import { loadApp } from '../app';
import { buildHarness } from './helpers/harness';

describe('loadApp', () => {
  it('builds the app from the bootstrapped services', async () => {
    const { services } = buildHarness();

    const app = await loadApp(async () => services);

    expect(typeof app).toBe('function');
    expect(typeof app.listen).toBe('function');
  });

  it('logs a failed start and still rejects', async () => {
    const failure = new Error('storage settings missing');

    await expect(loadApp(() => Promise.reject(failure))).rejects.toBe(failure);
    expect(functions.logger.error).toHaveBeenCalledWith(
      '[bootstrap] Failed to start the API:',
      failure,
    );
  });
});
