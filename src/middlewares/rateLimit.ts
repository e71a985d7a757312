import { rateLimit } from 'express-rate-limit';
import { env } from '../config/env.js';

/**
 * Global rate limiter
 */
export const globalRateLimit = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  limit: env.RATE_LIMIT_MAX,
  message: {
    error: 'Too many requests',
    message: 'You have exceeded the rate limit. Please try again later.',
  },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Stricter limiter for release lookups, which fan out to Letterboxd and TMDB.
 * One store per router.
 */
export const releasesRateLimit = () =>
  rateLimit({
    windowMs: 60000, // 1 minute
    limit: 10,
    message: {
      error: 'Too many release lookups',
      message: 'You have exceeded the release lookup rate limit. Please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
