import { Router } from 'express';
import { releasesRateLimit } from './middlewares/rateLimit.js';
import { TrackerController } from './tracker/tracker.controller.js';
import type { ReleaseTracker } from './tracker/tracker.service.js';

export function createRoutes(tracker: ReleaseTracker): Router {
  const router = Router();
  const trackerController = new TrackerController(tracker);

  // Release report for a watchlist
  router.get(
    '/releases',
    releasesRateLimit(),
    trackerController.getReleases.bind(trackerController)
  );

  return router;
}
