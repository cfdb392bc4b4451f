import rateLimit from 'express-rate-limit';
import * as functions from 'firebase-functions';

/**
 * General API rate limiter
 * 300 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded general rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many requests, please try again later.',
    });
  },
});

/**
 * Auth rate limiter - login, registration and password reset
 * 10 failed attempts per 15 minutes per IP
 */
export const authLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 10,
  skipSuccessfulRequests: true,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded auth rate limit`);
    res.status(429).json({
      code: 'auth_rate_limit_exceeded',
      message: 'Too many authentication attempts, please try again later.',
    });
  },
});

/**
 * Participant submissions through response links
 * 30 writes per 10 minutes per IP
 */
export const participantLimiter = rateLimit({
  windowMs: 10 * 60 * 1000,
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded participant submission limit`);
    res.status(429).json({
      code: 'response_rate_limit_exceeded',
      message: 'Too many submissions, please try again later.',
    });
  },
});
