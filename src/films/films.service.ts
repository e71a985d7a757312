import type { Logger } from 'pino';
import rootLogger from '../config/logger.js';
import { WatchlistSourceError, errorMessage } from '../domain/errors.js';
import { isFresh, systemClock, type Clock } from '../domain/freshness.js';
import { titleSimilarity } from '../domain/normalize.js';
import type {
  CatalogCandidate,
  CatalogClient,
  FilmIdentity,
  FilmIdentityStore,
  FilmPage,
  FilmPageSource,
  ResolvedFilm,
  WatchlistEntry,
} from '../domain/types.js';

export interface FilmResolverOptions {
  /** How long a cached identity (positive or negative) is trusted */
  ttlMs: number;
  /** Source film pages consulted for a catalog id before searching */
  filmPages?: FilmPageSource;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Deterministic pick among search candidates: exact year match first, then
 * the closest title, then the lowest catalog id.
 */
export function selectCandidate(
  candidates: readonly CatalogCandidate[],
  titleHint: string,
  yearHint: number | null
): CatalogCandidate | null {
  const ranked = candidates.map(candidate => ({
    candidate,
    yearMatch: yearHint !== null && candidate.year === yearHint ? 1 : 0,
    similarity: titleSimilarity(candidate.title, titleHint),
  }));

  ranked.sort(
    (a, b) =>
      b.yearMatch - a.yearMatch ||
      b.similarity - a.similarity ||
      a.candidate.id - b.candidate.id
  );

  return ranked[0]?.candidate ?? null;
}

export class FilmResolver {
  private readonly ttlMs: number;
  private readonly filmPages: FilmPageSource | undefined;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly films: FilmIdentityStore,
    private readonly catalog: CatalogClient,
    options: FilmResolverOptions
  ) {
    this.ttlMs = options.ttlMs;
    this.filmPages = options.filmPages;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ component: 'resolver' });
  }

  /**
   * Resolve a watchlist entry to a catalog film, or null when the catalog has
   * no match. An id on the film page wins over a title search. Both outcomes
   * are cached; only transport and parse failures throw.
   */
  async resolve(entry: WatchlistEntry, signal?: AbortSignal): Promise<ResolvedFilm | null> {
    const cached = await this.films.lookup(entry.sourceSlug);
    if (cached && isFresh(cached.updatedAt, this.ttlMs, this.clock())) {
      this.log.debug({ slug: entry.sourceSlug, catalogId: cached.catalogId }, 'Using cached identity');
      return toResolved(cached);
    }

    signal?.throwIfAborted();
    const page = await this.readFilmPage(entry.sourceSlug, signal);
    const titleHint = page?.title ?? entry.titleHint;
    const yearHint = page?.year ?? entry.yearHint;
    const pageId = page?.catalogId ?? null;

    const match: CatalogCandidate | null =
      pageId !== null
        ? { id: pageId, title: titleHint, year: yearHint, posterPath: null }
        : await this.search(titleHint, yearHint, signal);

    const identity = await this.films.store({
      sourceSlug: entry.sourceSlug,
      catalogId: match?.id ?? null,
      title: match?.title ?? titleHint,
      year: match ? (match.year ?? yearHint) : yearHint,
      posterPath: match?.posterPath ?? null,
    });

    if (!match) {
      this.log.info(
        { slug: entry.sourceSlug, title: titleHint, year: yearHint },
        'No catalog match, caching negative result'
      );
    }

    return toResolved(identity);
  }

  private async readFilmPage(sourceSlug: string, signal?: AbortSignal): Promise<FilmPage | null> {
    if (!this.filmPages) return null;

    try {
      return await this.filmPages.fetchFilmPage(sourceSlug, signal);
    } catch (error) {
      if (signal?.aborted || !(error instanceof WatchlistSourceError)) throw error;
      this.log.warn(
        { slug: sourceSlug, error: errorMessage(error) },
        'Film page unavailable, searching by title'
      );
      return null;
    }
  }

  private async search(
    titleHint: string,
    yearHint: number | null,
    signal?: AbortSignal
  ): Promise<CatalogCandidate | null> {
    let candidates = await this.catalog.searchMovies(titleHint, yearHint, signal);

    // The watchlist year can differ from the catalog's primary release year
    if (candidates.length === 0 && yearHint !== null) {
      candidates = await this.catalog.searchMovies(titleHint, null, signal);
    }

    return selectCandidate(candidates, titleHint, yearHint);
  }
}

function toResolved(identity: FilmIdentity): ResolvedFilm | null {
  if (identity.catalogId === null) return null;
  return {
    sourceSlug: identity.sourceSlug,
    catalogId: identity.catalogId,
    title: identity.title,
    year: identity.year,
    posterPath: identity.posterPath,
  };
}
