import pLimit from 'p-limit';
import type { Logger } from 'pino';
import rootLogger from '../config/logger.js';
import { toCalendarDate } from '../domain/calendar.js';
import { categorize } from '../domain/categorize.js';
import { CacheIOError, errorMessage, isAbortError } from '../domain/errors.js';
import { systemClock, type Clock } from '../domain/freshness.js';
import type {
  BatchResult,
  CategorizedFilm,
  EntryFailure,
  FilmReleases,
  ReleaseEvent,
  ReleaseReport,
  ResolvedFilm,
  WatchlistEntry,
  WatchlistSource,
} from '../domain/types.js';
import type { FilmResolver } from '../films/films.service.js';
import type { ReleaseFetcher } from '../releases/releases.service.js';

export interface ReleaseTrackerOptions {
  /** Upper bound on watchlist entries in flight at once */
  concurrency: number;
  recencyWindowDays: number;
  clock?: Clock;
  logger?: Logger;
}

export interface ProcessOptions {
  recencyWindowDays?: number;
  fallbackCountries?: readonly string[];
  signal?: AbortSignal;
}

type EntryOutcome =
  | { kind: 'film'; film: FilmReleases }
  | { kind: 'unresolved' }
  | { kind: 'no_releases' }
  | { kind: 'failed'; failure: EntryFailure };

export class ReleaseTracker {
  private readonly concurrency: number;
  private readonly recencyWindowDays: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly watchlist: WatchlistSource,
    private readonly resolver: FilmResolver,
    private readonly releases: ReleaseFetcher,
    options: ReleaseTrackerOptions
  ) {
    this.concurrency = Math.max(1, options.concurrency);
    this.recencyWindowDays = options.recencyWindowDays;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ component: 'tracker' });
  }

  /**
   * Fetch a user's watchlist and report upcoming releases in `country`.
   * Watchlist and cache failures fail the whole request.
   */
  async process(username: string, country: string, options: ProcessOptions = {}): Promise<ReleaseReport> {
    const startTime = Date.now();
    const recencyWindowDays = options.recencyWindowDays ?? this.recencyWindowDays;

    const entries = await this.watchlist.fetchWatchlist(username, options.signal);
    this.log.info({ username, country, entries: entries.length }, 'Fetched watchlist');

    const asOfDate = toCalendarDate(this.clock());
    const batch = await this.processEntries(entries, country, { ...options, recencyWindowDays });

    const theatrical = batch.films.flatMap(film => (film.theatrical ? [film.theatrical] : []));
    const streaming = batch.films.flatMap(film => (film.streaming ? [film.streaming] : []));
    theatrical.sort(compareCategorized);
    streaming.sort(compareCategorized);

    this.log.info(
      { username, country, ...batch.stats, duration: Date.now() - startTime },
      'Release report ready'
    );

    return {
      username,
      country,
      asOfDate,
      recencyWindowDays,
      ...batch,
      theatrical,
      streaming,
    };
  }

  /**
   * Resolve → fetch releases → categorize, for every entry, at most
   * `concurrency` at a time. A failing entry is recorded and skipped; a cache
   * failure or cancellation aborts the batch.
   */
  async processEntries(
    entries: readonly WatchlistEntry[],
    country: string,
    options: ProcessOptions = {}
  ): Promise<BatchResult> {
    options.signal?.throwIfAborted();
    const recencyWindowDays = options.recencyWindowDays ?? this.recencyWindowDays;
    const asOfDate = toCalendarDate(this.clock());

    const batchController = new AbortController();
    const onAbort = () => batchController.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onAbort, { once: true });
    const signal = batchController.signal;

    const unique = [...new Map(entries.map(entry => [entry.sourceSlug, entry])).values()];
    const limit = pLimit(this.concurrency);

    try {
      const settled = await Promise.allSettled(
        unique.map(entry =>
          limit(async () => {
            try {
              return await this.processEntry(entry, country, {
                asOfDate,
                recencyWindowDays,
                fallbackCountries: options.fallbackCountries,
                signal,
              });
            } catch (error) {
              if (error instanceof CacheIOError) {
                // queued entries see the aborted signal and bail out immediately
                batchController.abort(error);
              }
              throw error;
            }
          })
        )
      );

      const fatal = settled.find(result => result.status === 'rejected');
      if (fatal?.status === 'rejected') {
        const reason: unknown = signal.reason instanceof CacheIOError ? signal.reason : fatal.reason;
        throw reason;
      }

      return this.collect(
        settled.flatMap(result => (result.status === 'fulfilled' ? [result.value] : [])),
        unique.length
      );
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async processEntry(
    entry: WatchlistEntry,
    country: string,
    context: {
      asOfDate: string;
      recencyWindowDays: number;
      fallbackCountries: readonly string[] | undefined;
      signal: AbortSignal;
    }
  ): Promise<EntryOutcome> {
    const { signal } = context;
    signal.throwIfAborted();

    try {
      const film = await this.resolver.resolve(entry, signal);
      if (!film) return { kind: 'unresolved' };

      signal.throwIfAborted();
      const events = await this.releases.fetchReleases(film.catalogId, country, {
        fallbackCountries: context.fallbackCountries,
        signal,
      });

      const buckets = categorize(events, context.asOfDate, context.recencyWindowDays);
      const theatrical = buckets.theatrical[0];
      const streaming = buckets.streaming[0];
      if (!theatrical && !streaming) return { kind: 'no_releases' };

      return {
        kind: 'film',
        film: {
          sourceSlug: entry.sourceSlug,
          catalogId: film.catalogId,
          title: film.title,
          year: film.year,
          posterPath: film.posterPath,
          theatrical: theatrical ? toCategorized(film, theatrical) : null,
          streaming: streaming ? toCategorized(film, streaming) : null,
        },
      };
    } catch (error) {
      if (error instanceof CacheIOError || isAbortError(error) || signal.aborted) {
        throw error;
      }

      this.log.warn(
        { slug: entry.sourceSlug, title: entry.titleHint, error: errorMessage(error) },
        'Watchlist entry failed'
      );
      return {
        kind: 'failed',
        failure: {
          sourceSlug: entry.sourceSlug,
          title: entry.titleHint,
          reason: errorMessage(error),
          retryable: isRetryable(error),
        },
      };
    }
  }

  private collect(outcomes: EntryOutcome[], entryCount: number): BatchResult {
    const films = new Map<number, FilmReleases>();
    const failures: EntryFailure[] = [];
    let merged = 0;
    let unresolved = 0;
    let withoutReleases = 0;

    for (const outcome of outcomes) {
      switch (outcome.kind) {
        case 'film':
          if (films.has(outcome.film.catalogId)) {
            merged++;
          } else {
            films.set(outcome.film.catalogId, outcome.film);
          }
          break;
        case 'unresolved':
          unresolved++;
          break;
        case 'no_releases':
          withoutReleases++;
          break;
        case 'failed':
          failures.push(outcome.failure);
          break;
      }
    }

    const sorted = [...films.values()].sort(compareFilms);
    failures.sort((a, b) => a.sourceSlug.localeCompare(b.sourceSlug));

    return {
      films: sorted,
      failures,
      stats: {
        entries: entryCount,
        matched: sorted.length,
        merged,
        unresolved,
        withoutReleases,
        failed: failures.length,
      },
    };
  }
}

function toCategorized(film: ResolvedFilm, event: ReleaseEvent): CategorizedFilm {
  return {
    catalogId: film.catalogId,
    title: film.title,
    year: film.year,
    posterPath: film.posterPath,
    releaseDate: event.releaseDate,
    releaseType: event.releaseType,
    country: event.country,
    note: event.note,
  };
}

function isRetryable(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'retryable' in error && error.retryable === true;
}

/** Earliest of the theatrical and streaming picks. */
export function earliestReleaseDate(film: FilmReleases): string {
  const dates = [film.theatrical?.releaseDate, film.streaming?.releaseDate].filter(
    (date): date is string => date !== undefined
  );
  return dates.sort()[0] ?? '';
}

function compareFilms(a: FilmReleases, b: FilmReleases): number {
  const left = earliestReleaseDate(a);
  const right = earliestReleaseDate(b);
  if (left !== right) return left < right ? -1 : 1;
  return a.title.localeCompare(b.title) || a.catalogId - b.catalogId;
}

function compareCategorized(a: CategorizedFilm, b: CategorizedFilm): number {
  if (a.releaseDate !== b.releaseDate) return a.releaseDate < b.releaseDate ? -1 : 1;
  return a.title.localeCompare(b.title) || a.catalogId - b.catalogId;
}
