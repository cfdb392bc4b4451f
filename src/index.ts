import { onRequest } from 'firebase-functions/v2/https';
import { loadApp } from './app';
import { bootstrap } from './bootstrap';

// Built once per instance at cold start
const appPromise = loadApp(bootstrap);

export const api = onRequest(
  {
    timeoutSeconds: 60,
    memory: '512MiB',
    maxInstances: 100,
  },
  async (req, res) => {
    const app = await appPromise;
    app(req, res);
  },
);
