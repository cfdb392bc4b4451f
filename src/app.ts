import cors from 'cors';
import express, { type Express } from 'express';
import * as functions from 'firebase-functions';
import helmet from 'helmet';
import { corsConfig } from './config';
import { errorHandler } from './middlewares/errorHandler';
import { apiLimiter } from './middlewares/rateLimit';
import { createAuthRouter } from './routes/auth';
import { createContactsRouter } from './routes/contacts';
import { createGroupsRouter } from './routes/groups';
import { createMeetingsRouter } from './routes/meetings';
import { createParticipantRouter } from './routes/participant';
import type { DomainServiceContainer } from './services/domain/serviceContainer';
import { setupSentryErrorHandler } from './utils/sentry';

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://localhost:8080'];

export function resolveAllowedOrigins(): string[] {
  const configured = corsConfig.allowedOrigins
    ? corsConfig.allowedOrigins.split(',').map((origin) => origin.trim()).filter(Boolean)
    : [];
  return [...configured, ...(corsConfig.isDevelopment ? DEV_ORIGINS : [])];
}

export function createApp(services: DomainServiceContainer): Express {
  const app = express();

  // Trust proxy - required for rate limiting behind Cloud Functions/Load Balancer
  app.set('trust proxy', true);

  const allowedOrigins = resolveAllowedOrigins();
  if (allowedOrigins.length === 0) {
    functions.logger.warn(
      '[cors] No ALLOWED_ORIGINS configured. API will reject all CORS requests from browsers.',
    );
  }

  app.use(
    cors({
      origin: (origin, callback) => {
        // Requests without an origin (server-to-server, curl, email clients)
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }

        functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
        callback(new Error(`Origin ${origin} not allowed by CORS policy`));
      },
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    }),
  );

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          objectSrc: ["'none'"],
          frameSrc: ["'none'"],
        },
      },
      hsts: {
        maxAge: 31536000,
        includeSubDomains: true,
      },
      frameguard: { action: 'deny' },
      referrerPolicy: { policy: 'no-referrer' },
    }),
  );

  app.use(express.json({ limit: '100kb' }));
  app.use(apiLimiter);

  app.use('/v1/auth', createAuthRouter(services));
  app.use('/v1/contacts', createContactsRouter(services));
  app.use('/v1/groups', createGroupsRouter(services));
  app.use('/v1/meetings', createMeetingsRouter(services));
  app.use('/v1/respond', createParticipantRouter(services));

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Sentry error handler - must come before custom error handler
  setupSentryErrorHandler(app);
  app.use(errorHandler);

  return app;
}

/**
 * Runs the bootstrap step and builds the app from it. A failed start is logged
 * here and still rejects, so requests waiting on it fail too.
 */
export function loadApp(start: () => Promise<DomainServiceContainer>): Promise<Express> {
  return start()
    .then(createApp)
    .catch((error: unknown) => {
      functions.logger.error('[bootstrap] Failed to start the API:', error);
      throw error;
    });
}
