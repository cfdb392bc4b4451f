import * as functions from 'firebase-functions';
import { createApp } from './app';
import { bootstrap } from './bootstrap';
import { appConfig } from './config';
import { flushSentry } from './utils/sentry';

async function main(): Promise<void> {
  const services = await bootstrap();
  const app = createApp(services);

  app.listen(appConfig.port, () => {
    functions.logger.info(`[server] Listening on port ${appConfig.port}`);
  });
}

main().catch(async (error: unknown) => {
  functions.logger.error('[server] Startup failed', error);
  await flushSentry();
  process.exit(1);
});
