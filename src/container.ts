import { env, type Env } from './config/env.js';
import logger from './config/logger.js';
import { Database } from './db/index.js';
import { HOUR_MS } from './domain/freshness.js';
import { FilmsRepository } from './films/films.repo.js';
import { FilmResolver } from './films/films.service.js';
import { ReleasesRepository } from './releases/releases.repo.js';
import { ReleaseFetcher } from './releases/releases.service.js';
import { TokenBucketRateLimiter } from './tmdb/rateLimiter.js';
import { TmdbClient } from './tmdb/tmdb.service.js';
import { ReleaseTracker } from './tracker/tracker.service.js';
import { LetterboxdWatchlistSource } from './watchlist/watchlist.service.js';

export interface Container {
  database: Database;
  tracker: ReleaseTracker;
}

/**
 * Wires the service graph from configuration. One rate limiter is shared by
 * every TMDB call in the process.
 */
export function createContainer(config: Env = env): Container {
  const database = new Database(config.DATABASE_URL);

  const limiter = new TokenBucketRateLimiter({
    ratePerSecond: config.TMDB_RPS,
    burst: config.TMDB_BURST,
  });

  const catalog = new TmdbClient({
    apiKey: config.TMDB_API_KEY,
    baseUrl: config.TMDB_BASE_URL,
    limiter,
    timeoutMs: config.UPSTREAM_TIMEOUT_MS,
    maxRetries: config.UPSTREAM_MAX_RETRIES,
  });

  const watchlist = new LetterboxdWatchlistSource({
    pageDelayMs: config.LETTERBOXD_DELAY_MS,
    maxPages: config.WATCHLIST_MAX_PAGES,
    timeoutMs: config.UPSTREAM_TIMEOUT_MS,
  });

  const resolver = new FilmResolver(new FilmsRepository(database), catalog, {
    ttlMs: config.FILM_CACHE_TTL_HOURS * HOUR_MS,
    filmPages: watchlist,
  });

  const releases = new ReleaseFetcher(new ReleasesRepository(database), catalog, {
    ttlMs: config.RELEASE_CACHE_TTL_HOURS * HOUR_MS,
    fallbackCountries: config.COUNTRY_FALLBACK,
  });

  const tracker = new ReleaseTracker(watchlist, resolver, releases, {
    concurrency: config.MAX_CONCURRENT_REQUESTS,
    recencyWindowDays: config.RECENCY_WINDOW_DAYS,
  });

  logger.info(
    {
      tmdbRps: config.TMDB_RPS,
      concurrency: config.MAX_CONCURRENT_REQUESTS,
      fallbackCountries: config.COUNTRY_FALLBACK,
      filmTtlHours: config.FILM_CACHE_TTL_HOURS,
      releaseTtlHours: config.RELEASE_CACHE_TTL_HOURS,
    },
    'Service container ready'
  );

  return { database, tracker };
}
