import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import logger from '../config/logger.js';
import type { ReleaseTracker } from './tracker.service.js';

const countryCode = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{2}$/, 'Country must be a two-letter ISO 3166-1 code')
  .transform(code => code.toUpperCase());

export const releasesQuerySchema = z.object({
  username: z
    .string()
    .trim()
    .regex(
      /^[A-Za-z0-9_-]{1,64}$/,
      'Username must be 1-64 letters, numbers, underscores or dashes'
    ),
  country: countryCode,
  recencyWindowDays: z.coerce.number().int().min(0).max(3650).optional(),
  fallback: z
    .string()
    .optional()
    .transform(value =>
      value
        ?.split(',')
        .map(code => code.trim())
        .filter(code => code.length > 0)
    )
    .pipe(z.array(countryCode).optional()),
});

export class TrackerController {
  constructor(private readonly tracker: ReleaseTracker) {}

  /**
   * GET /api/releases
   * Upcoming theatrical and streaming releases for a user's watchlist
   */
  async getReleases(req: Request, res: Response, next: NextFunction): Promise<void> {
    // Stop scheduling upstream work once the client has gone away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const query = releasesQuerySchema.parse(req.query);

      const report = await this.tracker.process(query.username, query.country, {
        recencyWindowDays: query.recencyWindowDays,
        fallbackCountries: query.fallback,
        signal: controller.signal,
      });

      res.json(report);
    } catch (error) {
      if (controller.signal.aborted) {
        logger.info({ url: req.originalUrl }, 'Client disconnected, release lookup cancelled');
        return;
      }
      next(error);
    }
  }
}
