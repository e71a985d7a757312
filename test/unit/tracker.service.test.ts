import { describe, it, expect, beforeEach } from 'vitest';
import { CacheIOError, TransportError } from '../../src/domain/errors.js';
import { HOUR_MS } from '../../src/domain/freshness.js';
import type {
  CatalogCandidate,
  FilmIdentity,
  WatchlistEntry,
  WatchlistSource,
} from '../../src/domain/types.js';
import { FilmResolver } from '../../src/films/films.service.js';
import { ReleaseFetcher } from '../../src/releases/releases.service.js';
import { ReleaseTracker, earliestReleaseDate } from '../../src/tracker/tracker.service.js';
import { FakeCatalog, nextTick } from '../fakes/catalog.js';
import { InMemoryFilmStore, InMemoryReleaseStore } from '../fakes/stores.js';

const now = new Date('2024-06-01T00:00:00Z');
const clock = () => now;

const entries: WatchlistEntry[] = Array.from({ length: 10 }, (_, i) => ({
  sourceSlug: `film-${i + 1}`,
  titleHint: `Film ${i + 1}`,
  yearHint: 2024,
}));

class CountingCatalog extends FakeCatalog {
  active = 0;
  maxActive = 0;

  override async searchMovies(title: string, year: number | null, signal?: AbortSignal): Promise<CatalogCandidate[]> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await nextTick();
      return await super.searchMovies(title, year, signal);
    } finally {
      this.active--;
    }
  }
}

class BrokenFilmStore extends InMemoryFilmStore {
  constructor(private readonly brokenSlug: string) {
    super(clock);
  }

  override async lookup(sourceSlug: string): Promise<FilmIdentity | null> {
    if (sourceSlug === this.brokenSlug) {
      throw new CacheIOError(`Failed to read film cache for ${sourceSlug}`);
    }
    return super.lookup(sourceSlug);
  }
}

describe('ReleaseTracker', () => {
  let catalog: CountingCatalog;
  let films: InMemoryFilmStore;
  let releases: InMemoryReleaseStore;

  const buildTracker = (watchlist: WatchlistSource = { fetchWatchlist: async () => entries }) =>
    new ReleaseTracker(
      watchlist,
      new FilmResolver(films, catalog, { ttlMs: 24 * HOUR_MS, clock }),
      new ReleaseFetcher(releases, catalog, { ttlMs: 6 * HOUR_MS, fallbackCountries: [], clock }),
      { concurrency: 3, recencyWindowDays: 0, clock }
    );

  beforeEach(() => {
    catalog = new CountingCatalog(
      entries.map((entry, i) => ({
        id: 101 + i,
        title: entry.titleHint,
        year: 2024,
        posterPath: null,
      }))
    );
    entries.forEach((_, i) => {
      catalog.setReleases(101 + i, {
        US: [
          { releaseDate: `2024-07-${String(11 + i)}`, releaseType: 'theatrical', note: null },
          { releaseDate: `2024-10-${String(20 - i)}`, releaseType: 'digital', note: null },
        ],
      });
    });
    films = new InMemoryFilmStore(clock);
    releases = new InMemoryReleaseStore(clock);
  });

  it('should record a failing entry and keep the rest of the batch', async () => {
    catalog.searchErrors.set('Film 5', new TransportError('HTTP 503: Service Unavailable'));

    const result = await buildTracker().processEntries(entries, 'US');

    expect(result.films).toHaveLength(9);
    expect(result.films.map(film => film.sourceSlug)).not.toContain('film-5');
    expect(result.failures).toEqual([
      { sourceSlug: 'film-5', title: 'Film 5', reason: 'HTTP 503: Service Unavailable', retryable: true },
    ]);
    expect(result.stats).toEqual({ entries: 10, matched: 9, merged: 0, unresolved: 0, withoutReleases: 0, failed: 1 });
  });

  it('should never run more entries at once than the concurrency limit', async () => {
    await buildTracker().processEntries(entries, 'US');

    expect(catalog.maxActive).toBe(3);
  });

  it('should abort the whole batch on a cache failure', async () => {
    films = new BrokenFilmStore('film-3');

    await expect(buildTracker().processEntries(entries, 'US')).rejects.toBeInstanceOf(CacheIOError);
  });

  it('should stop when the caller cancels', async () => {
    await expect(
      buildTracker().processEntries(entries, 'US', { signal: AbortSignal.abort() })
    ).rejects.toThrow();
    expect(catalog.searchCalls).toHaveLength(0);
  });

  it('should count unresolved entries and films without upcoming releases', async () => {
    catalog.setReleases(102, { US: [{ releaseDate: '2020-01-01', releaseType: 'digital', note: null }] });

    const result = await buildTracker().processEntries(
      [...entries.slice(0, 2), { sourceSlug: 'ghost', titleHint: 'Ghost Film', yearHint: null }],
      'US'
    );

    expect(result.films.map(film => film.catalogId)).toEqual([101]);
    expect(result.stats).toEqual({ entries: 3, matched: 1, merged: 0, unresolved: 1, withoutReleases: 1, failed: 0 });
  });

  it('should merge entries that resolve to the same film', async () => {
    const result = await buildTracker().processEntries(
      [
        { sourceSlug: 'film-1', titleHint: 'Film 1', yearHint: 2024 },
        { sourceSlug: 'film-1-2024', titleHint: 'Film 1', yearHint: 2024 },
        { sourceSlug: 'film-1', titleHint: 'Film 1', yearHint: 2024 },
      ],
      'US'
    );

    expect(result.films).toHaveLength(1);
    expect(result.stats).toEqual({
      entries: 2,
      matched: 1,
      merged: 1,
      unresolved: 0,
      withoutReleases: 0,
      failed: 0,
    });
    expect(catalog.releaseCalls).toEqual([101]);
    expect(await releases.listReleases(101, 'US')).toHaveLength(2);
  });

  it('should sort films by earliest release date', async () => {
    const result = await buildTracker().processEntries(entries, 'US');

    expect(result.films.map(earliestReleaseDate)).toEqual([
      '2024-07-11',
      '2024-07-12',
      '2024-07-13',
      '2024-07-14',
      '2024-07-15',
      '2024-07-16',
      '2024-07-17',
      '2024-07-18',
      '2024-07-19',
      '2024-07-20',
    ]);
  });

  it('should build a report with sorted theatrical and streaming lists', async () => {
    const report = await buildTracker().process('alice', 'US');

    expect(report).toMatchObject({ username: 'alice', country: 'US', asOfDate: '2024-06-01', recencyWindowDays: 0 });
    expect(report.theatrical.map(film => film.catalogId)).toEqual([101, 102, 103, 104, 105, 106, 107, 108, 109, 110]);
    expect(report.streaming.map(film => film.catalogId)).toEqual([110, 109, 108, 107, 106, 105, 104, 103, 102, 101]);
    expect(report.streaming[0]).toEqual({
      catalogId: 110,
      title: 'Film 10',
      year: 2024,
      posterPath: null,
      releaseDate: '2024-10-11',
      releaseType: 'digital',
      country: 'US',
      note: null,
    });
  });
});
