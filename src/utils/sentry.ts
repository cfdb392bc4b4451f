/**
 * Sentry Error Tracking Configuration
 *
 * Set the SENTRY_DSN environment variable to enable Sentry.
 * Without a DSN, Sentry stays disabled and errors are only logged.
 */

import * as Sentry from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';
import { sentryConfig } from '../config';

let isInitialized = false;

/**
 * Initialize Sentry. Called once at process start, before the app is built.
 */
export function initSentry(): void {
    if (isInitialized) {
        return;
    }

    if (!sentryConfig.dsn) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        isInitialized = true;
        return;
    }

    Sentry.init({
        dsn: sentryConfig.dsn,
        environment: sentryConfig.environment,
        tracesSampleRate: sentryConfig.environment === 'production' ? 0.1 : 1.0,
        enabled: sentryConfig.environment !== 'test',

        beforeSend(event) {
            if (event.request?.headers?.authorization) {
                event.request.headers.authorization = '[REDACTED]';
            }

            // Request bodies carry passwords, recovery phrases and participant answers
            if (event.request?.data) {
                event.request.data = '[REDACTED]';
            }

            // Participant links embed their access token
            if (event.request?.query_string) {
                event.request.query_string = '[REDACTED]';
            }

            return event;
        },

        ignoreErrors: ['ECONNRESET', 'ETIMEDOUT'],
    });

    functions.logger.info('[sentry] Sentry initialized successfully');
    isInitialized = true;
}

/**
 * Capture an exception and send to Sentry.
 * Also logs to the functions logger.
 */
export function captureException(
    error: unknown,
    context?: Record<string, unknown>
): string | undefined {
    functions.logger.error('[error]', error);

    if (!sentryConfig.dsn) {
        return undefined;
    }

    if (context) {
        return Sentry.withScope((scope) => {
            Object.entries(context).forEach(([key, value]) => {
                scope.setExtra(key, value);
            });
            return Sentry.captureException(error);
        });
    }

    return Sentry.captureException(error);
}

/**
 * Attach the authenticated organizer to subsequent events.
 */
export function setUser(organizerId: string, email?: string): void {
    if (!sentryConfig.dsn) return;

    Sentry.setUser({
        id: organizerId,
        email: email ? email.substring(0, 3) + '***' : undefined,
    });
}

/**
 * Call AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
    if (!sentryConfig.dsn) return;
    Sentry.setupExpressErrorHandler(app);
}

/**
 * Flush pending events before the process exits.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
    if (!sentryConfig.dsn) return;
    await Sentry.flush(timeout);
}
