export interface WatchlistEntry {
  sourceSlug: string;
  titleHint: string;
  yearHint: number | null;
}

export interface FilmIdentity {
  sourceSlug: string;
  catalogId: number | null;
  title: string;
  year: number | null;
  posterPath: string | null;
  updatedAt: Date;
}

export type NewFilmIdentity = Omit<FilmIdentity, 'updatedAt'>;

export interface ResolvedFilm {
  sourceSlug: string;
  catalogId: number;
  title: string;
  year: number | null;
  posterPath: string | null;
}

export const RELEASE_TYPES = [
  'premiere',
  'theatrical_limited',
  'theatrical',
  'digital',
  'physical',
  'tv',
] as const;

export type ReleaseType = (typeof RELEASE_TYPES)[number];

/** TMDB release type codes are 1..6 in RELEASE_TYPES order. */
export function releaseTypeFromCode(code: number): ReleaseType | null {
  return RELEASE_TYPES[code - 1] ?? null;
}

export function releaseTypeToCode(releaseType: ReleaseType): number {
  return RELEASE_TYPES.indexOf(releaseType) + 1;
}

export type ReleaseBucket = 'theatrical' | 'streaming';

/**
 * One release as reported upstream for a single country.
 * `releaseDate` is a calendar date (YYYY-MM-DD).
 */
export interface UpstreamRelease {
  releaseDate: string;
  releaseType: ReleaseType;
  note: string | null;
}

/** Upstream release table for one film, keyed by ISO-3166-1 country code. */
export type CountryReleases = Map<string, UpstreamRelease[]>;

export interface ReleaseEvent extends UpstreamRelease {
  catalogId: number;
  country: string;
  cachedAt: Date;
}

export interface RefreshLedgerEntry {
  catalogId: number;
  country: string;
  cachedAt: Date;
}

export interface CatalogCandidate {
  id: number;
  title: string;
  year: number | null;
  posterPath: string | null;
}

export interface CategorizedReleases {
  theatrical: ReleaseEvent[];
  streaming: ReleaseEvent[];
}

export interface CategorizedFilm {
  catalogId: number;
  title: string;
  year: number | null;
  posterPath: string | null;
  releaseDate: string;
  releaseType: ReleaseType;
  country: string;
  note: string | null;
}

export interface FilmReleases {
  sourceSlug: string;
  catalogId: number;
  title: string;
  year: number | null;
  posterPath: string | null;
  theatrical: CategorizedFilm | null;
  streaming: CategorizedFilm | null;
}

export interface EntryFailure {
  sourceSlug: string;
  title: string;
  reason: string;
  retryable: boolean;
}

export interface BatchStats {
  entries: number;
  matched: number;
  /** Entries whose film was already reported under another slug */
  merged: number;
  unresolved: number;
  withoutReleases: number;
  failed: number;
}

export interface BatchResult {
  films: FilmReleases[];
  failures: EntryFailure[];
  stats: BatchStats;
}

export interface ReleaseReport extends BatchResult {
  username: string;
  country: string;
  asOfDate: string;
  recencyWindowDays: number;
  theatrical: CategorizedFilm[];
  streaming: CategorizedFilm[];
}

// Collaborator contracts

export interface FilmIdentityStore {
  lookup(sourceSlug: string): Promise<FilmIdentity | null>;
  store(identity: NewFilmIdentity): Promise<FilmIdentity>;
}

export interface ReleaseStore {
  getLedgerEntry(catalogId: number, country: string): Promise<RefreshLedgerEntry | null>;
  listReleases(catalogId: number, country: string): Promise<ReleaseEvent[]>;
  /**
   * Replaces every country present in `snapshot` and marks the ledger for
   * those countries plus `checkedCountries`, in one unit of work.
   */
  replaceSnapshot(
    catalogId: number,
    snapshot: CountryReleases,
    checkedCountries: readonly string[]
  ): Promise<Date>;
}

export interface CatalogClient {
  searchMovies(title: string, year: number | null, signal?: AbortSignal): Promise<CatalogCandidate[]>;
  getReleases(catalogId: number, signal?: AbortSignal): Promise<CountryReleases>;
}

export interface WatchlistSource {
  fetchWatchlist(username: string, signal?: AbortSignal): Promise<WatchlistEntry[]>;
}

/** What a source's own film page says about a slug */
export interface FilmPage {
  catalogId: number | null;
  title: string | null;
  year: number | null;
}

export interface FilmPageSource {
  /** Null when the source has no page for the slug */
  fetchFilmPage(sourceSlug: string, signal?: AbortSignal): Promise<FilmPage | null>;
}

// Database row types (raw from database)

export interface FilmCacheRow {
  source_slug: string;
  catalog_id: number | null;
  title: string;
  year: number | null;
  poster_path: string | null;
  updated_at: Date;
}

export interface ReleaseCacheRow {
  id: number;
  catalog_id: number;
  country: string;
  release_date: string;
  release_type: number;
  note: string | null;
  cached_at: Date;
}

export interface RefreshLedgerRow {
  catalog_id: number;
  country: string;
  cached_at: Date;
}

// TMDB API types

export interface TmdbSearchResult {
  id: number;
  title: string;
  release_date?: string | null;
  poster_path?: string | null;
}

export interface TmdbReleaseDate {
  release_date: string;
  type: number;
  note?: string | null;
}

export interface TmdbCountryReleases {
  iso_3166_1: string;
  release_dates: TmdbReleaseDate[];
}
