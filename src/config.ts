/**
 * Configuration for the scheduling API.
 * Reads from environment variables (process.env) once at module load.
 *
 * Optional environment variables:
 * - PUBLIC_BASE_URL: Base of participant and organizer dashboard links
 * - DISPLAY_TIME_ZONE: IANA zone used to render slot times
 * - STORAGE_TIMEOUT_MS: Upper bound for a single Firestore call
 * - SESSION_TTL_HOURS: Organizer session lifetime
 * - RESEND_API_KEY: Email transport; emails are only logged when unset
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 * - SENTRY_DSN: Error tracking
 */

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const appConfig = {
  publicBaseUrl: (process.env.PUBLIC_BASE_URL || 'http://localhost:8080').replace(/\/+$/, ''),
  displayTimeZone: process.env.DISPLAY_TIME_ZONE || 'UTC',
  port: readPositiveInt('PORT', 8080),
  isProduction: process.env.NODE_ENV === 'production',
};

export const storageConfig = {
  timeoutMs: readPositiveInt('STORAGE_TIMEOUT_MS', 5000),
  schemaVersion: 1,
};

export const authConfig = {
  sessionTtlHours: readPositiveInt('SESSION_TTL_HOURS', 12),
  passwordIterations: 100_000,
};

export const emailConfig = {
  resendApiKey: process.env.RESEND_API_KEY || '',
  fromAddress: process.env.EMAIL_FROM_ADDRESS || 'noreply@example.com',
  fromName: process.env.EMAIL_FROM_NAME || 'Meeting Scheduler',
};

export const corsConfig = {
  // Example: "https://scheduler.example.com,https://admin.example.com"
  allowedOrigins: process.env.ALLOWED_ORIGINS || '',
  // Allow development origins when NODE_ENV is not production
  isDevelopment: process.env.NODE_ENV !== 'production',
};

export const sentryConfig = {
  dsn: process.env.SENTRY_DSN || '',
  environment: process.env.NODE_ENV || 'development',
};
