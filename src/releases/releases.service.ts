import type { Logger } from 'pino';
import rootLogger from '../config/logger.js';
import { compareReleaseEvents } from '../domain/categorize.js';
import { isAbortError } from '../domain/errors.js';
import { isFresh, systemClock, type Clock } from '../domain/freshness.js';
import type {
  CatalogClient,
  CountryReleases,
  ReleaseEvent,
  ReleaseStore,
} from '../domain/types.js';

export interface ReleaseFetcherOptions {
  /** How long a refreshed (catalogId, country) pair is trusted */
  ttlMs: number;
  /** Countries tried, in order, when the requested one has no releases */
  fallbackCountries: readonly string[];
  clock?: Clock;
  logger?: Logger;
}

export interface FetchReleasesOptions {
  /** Overrides the configured fallback order for this call */
  fallbackCountries?: readonly string[];
  signal?: AbortSignal;
}

interface Refresh {
  snapshot: CountryReleases;
  cachedAt: Date;
}

export class ReleaseFetcher {
  private readonly ttlMs: number;
  private readonly fallbackCountries: readonly string[];
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly inflight = new Map<number, Promise<Refresh>>();

  constructor(
    private readonly releases: ReleaseStore,
    private readonly catalog: CatalogClient,
    options: ReleaseFetcherOptions
  ) {
    this.ttlMs = options.ttlMs;
    this.fallbackCountries = options.fallbackCountries;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ component: 'releases' });
  }

  /**
   * Release events for a film in `country`, or in the first fallback country
   * that has any. An empty list means nothing is known anywhere.
   */
  async fetchReleases(
    catalogId: number,
    country: string,
    options: FetchReleasesOptions = {}
  ): Promise<ReleaseEvent[]> {
    const fallbacks = (options.fallbackCountries ?? this.fallbackCountries).filter(
      code => code !== country
    );

    if (await this.isPairFresh(catalogId, country)) {
      const cached = await this.releases.listReleases(catalogId, country);
      if (cached.length > 0) return sortEvents(cached);
      return this.cachedFallback(catalogId, fallbacks);
    }

    options.signal?.throwIfAborted();
    const { snapshot, cachedAt } = await this.refresh(
      catalogId,
      [country, ...fallbacks],
      options.signal
    );

    for (const code of [country, ...fallbacks]) {
      const releases = snapshot.get(code);
      if (releases && releases.length > 0) {
        if (code !== country) {
          this.log.debug({ catalogId, country, fallback: code }, 'Using fallback country');
        }
        return sortEvents(
          releases.map(release => ({ ...release, catalogId, country: code, cachedAt }))
        );
      }
    }

    return [];
  }

  private async isPairFresh(catalogId: number, country: string): Promise<boolean> {
    const entry = await this.releases.getLedgerEntry(catalogId, country);
    return entry !== null && isFresh(entry.cachedAt, this.ttlMs, this.clock());
  }

  /**
   * Fallback over the cache only. A fallback country whose ledger entry is
   * stale or absent counts as empty until the requested pair itself expires.
   * A refresh marks every country in the upstream table, so an absent entry
   * means no refresh has seen releases there.
   */
  private async cachedFallback(
    catalogId: number,
    fallbacks: readonly string[]
  ): Promise<ReleaseEvent[]> {
    for (const code of fallbacks) {
      if (!(await this.isPairFresh(catalogId, code))) continue;
      const cached = await this.releases.listReleases(catalogId, code);
      if (cached.length > 0) return sortEvents(cached);
    }
    return [];
  }

  /**
   * One upstream call per film at a time: concurrent callers share the
   * in-flight refresh. A waiter whose own signal is still live retries when
   * the shared refresh was cancelled by its initiator.
   */
  private async refresh(
    catalogId: number,
    checkedCountries: readonly string[],
    signal?: AbortSignal
  ): Promise<Refresh> {
    const existing = this.inflight.get(catalogId);
    if (existing) {
      try {
        const shared = await existing;
        await this.markChecked(catalogId, shared, checkedCountries);
        return shared;
      } catch (error) {
        if (!isAbortError(error) || signal?.aborted) throw error;
        return this.refresh(catalogId, checkedCountries, signal);
      }
    }

    const pending = this.refreshFromUpstream(catalogId, checkedCountries, signal);
    this.inflight.set(catalogId, pending);
    try {
      return await pending;
    } finally {
      if (this.inflight.get(catalogId) === pending) {
        this.inflight.delete(catalogId);
      }
    }
  }

  private async refreshFromUpstream(
    catalogId: number,
    checkedCountries: readonly string[],
    signal?: AbortSignal
  ): Promise<Refresh> {
    const snapshot = await this.catalog.getReleases(catalogId, signal);
    const cachedAt = await this.releases.replaceSnapshot(catalogId, snapshot, checkedCountries);

    this.log.debug(
      { catalogId, countries: snapshot.size, checked: checkedCountries },
      'Refreshed release cache'
    );
    return { snapshot, cachedAt };
  }

  /**
   * A waiter may have asked about countries the shared refresh did not
   * mark; record them as checked against the same snapshot.
   */
  private async markChecked(
    catalogId: number,
    shared: Refresh,
    checkedCountries: readonly string[]
  ): Promise<void> {
    const missing: string[] = [];
    for (const code of checkedCountries) {
      if (shared.snapshot.has(code)) continue;
      const entry = await this.releases.getLedgerEntry(catalogId, code);
      if (!entry || entry.cachedAt.getTime() < shared.cachedAt.getTime()) {
        missing.push(code);
      }
    }
    if (missing.length > 0) {
      await this.releases.replaceSnapshot(catalogId, new Map(), missing);
    }
  }
}

function sortEvents(events: ReleaseEvent[]): ReleaseEvent[] {
  return [...events].sort(compareReleaseEvents);
}
