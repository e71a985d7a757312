import { fetch, type Dispatcher, type Response } from 'undici';
import type { Logger } from 'pino';
import { z } from 'zod';
import rootLogger from '../config/logger.js';
import { isCalendarDate } from '../domain/calendar.js';
import { TransportError, UpstreamResponseError, errorMessage } from '../domain/errors.js';
import { parseYear } from '../domain/normalize.js';
import {
  releaseTypeFromCode,
  releaseTypeToCode,
  type CatalogCandidate,
  type CatalogClient,
  type CountryReleases,
  type TmdbCountryReleases,
  type TmdbSearchResult,
  type UpstreamRelease,
} from '../domain/types.js';
import { sleep as defaultSleep, type RateLimiter, type Sleep } from './rateLimiter.js';

const searchResponseSchema = z.object({
  results: z.array(
    z.object({
      id: z.number().int().positive(),
      title: z.string(),
      release_date: z.string().nullish(),
      poster_path: z.string().nullish(),
    })
  ),
});

const releaseDatesResponseSchema = z.object({
  results: z.array(
    z.object({
      iso_3166_1: z.string(),
      release_dates: z.array(
        z.object({
          release_date: z.string(),
          type: z.number().int(),
          note: z.string().nullish(),
        })
      ),
    })
  ),
});

export interface TmdbClientOptions {
  apiKey: string;
  baseUrl?: string;
  limiter: RateLimiter;
  timeoutMs?: number;
  maxRetries?: number;
  /** First backoff delay; doubles on each retry */
  retryBaseMs?: number;
  dispatcher?: Dispatcher;
  sleep?: Sleep;
  logger?: Logger;
}

type JsonResult = { status: 'ok'; body: unknown } | { status: 'not_found' };

export class TmdbClient implements CatalogClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly limiter: RateLimiter;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(options: TmdbClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.themoviedb.org/3').replace(/\/+$/, '');
    this.limiter = options.limiter;
    this.timeout = options.timeoutMs ?? 10000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseMs = options.retryBaseMs ?? 1000;
    this.dispatcher = options.dispatcher;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = (options.logger ?? rootLogger).child({ component: 'tmdb' });
  }

  /**
   * Search movies by title, optionally restricted to a release year
   */
  async searchMovies(
    title: string,
    year: number | null,
    signal?: AbortSignal
  ): Promise<CatalogCandidate[]> {
    const query: Record<string, string> = { query: title, include_adult: 'false' };
    if (year !== null) {
      query.year = String(year);
    }

    const result = await this.requestJson('/search/movie', query, signal);
    if (result.status === 'not_found') return [];

    const parsed = this.parse(searchResponseSchema, result.body, 'search');
    return parsed.results.map(toCandidate);
  }

  /**
   * Full per-country release table for a movie. An unknown id yields an empty table.
   */
  async getReleases(catalogId: number, signal?: AbortSignal): Promise<CountryReleases> {
    const result = await this.requestJson(`/movie/${catalogId}/release_dates`, {}, signal);
    if (result.status === 'not_found') {
      this.log.debug({ catalogId }, 'TMDB has no release dates for movie');
      return new Map();
    }

    const parsed = this.parse(releaseDatesResponseSchema, result.body, 'release_dates');
    return toCountryReleases(parsed.results);
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamResponseError(`Malformed TMDB ${what} response`, { cause: parsed.error });
    }
    return parsed.data;
  }

  /**
   * Rate-limited GET with retry logic and exponential backoff.
   * Every attempt takes its own permit from the shared limiter.
   */
  private async requestJson(
    path: string,
    query: Record<string, string>,
    signal?: AbortSignal
  ): Promise<JsonResult> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('api_key', this.apiKey);

    for (let attempt = 0; ; attempt++) {
      await this.limiter.acquire(signal);

      try {
        return await this.requestOnce(url, signal);
      } catch (error) {
        if (!(error instanceof TransportError) || attempt >= this.maxRetries) {
          throw error;
        }

        // Exponential backoff: 1s, 2s, 4s... unless upstream says otherwise
        const delay = error.retryAfterMs ?? this.retryBaseMs * 2 ** attempt;
        this.log.warn(
          { path, attempt: attempt + 1, delay, error: error.message },
          'TMDB request failed, retrying'
        );
        await this.sleep(delay, signal);
      }
    }
  }

  private async requestOnce(url: URL, signal?: AbortSignal): Promise<JsonResult> {
    const timeoutSignal = AbortSignal.timeout(this.timeout);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    let response: Response;
    try {
      response = await fetch(url, {
        signal: combined,
        dispatcher: this.dispatcher,
        headers: {
          Accept: 'application/json',
          'User-Agent': 'watchlist-release-tracker/1.0',
        },
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      if (timeoutSignal.aborted) {
        throw new TransportError(`TMDB request timed out after ${this.timeout}ms`, { cause: error });
      }
      throw new TransportError(`TMDB request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status === 404) {
      await response.body?.cancel();
      return { status: 'not_found' };
    }

    if (response.status === 429) {
      await response.body?.cancel();
      throw new TransportError('TMDB rate limit exceeded', {
        rateLimited: true,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
      });
    }

    if (response.status >= 500) {
      await response.body?.cancel();
      throw new TransportError(`HTTP ${response.status}: ${response.statusText}`);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new UpstreamResponseError(`HTTP ${response.status}: ${response.statusText}`);
    }

    try {
      return { status: 'ok', body: await response.json() };
    } catch (error) {
      if (signal?.aborted) throw error;
      if (timeoutSignal.aborted) {
        throw new TransportError(`TMDB request timed out after ${this.timeout}ms`, { cause: error });
      }
      throw new UpstreamResponseError('TMDB returned a non-JSON body', { cause: error });
    }
  }
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function toCandidate(result: TmdbSearchResult): CatalogCandidate {
  return {
    id: result.id,
    title: result.title,
    year: parseYear(result.release_date),
    posterPath: result.poster_path || null,
  };
}

/**
 * Converts the TMDB per-country table: dates truncated to the calendar day,
 * unknown type codes skipped, duplicate (date, type) pairs within a country
 * dropped keeping the first, blank notes nulled.
 */
export function toCountryReleases(results: readonly TmdbCountryReleases[]): CountryReleases {
  const table: CountryReleases = new Map();

  for (const entry of results) {
    const country = entry.iso_3166_1.trim().toUpperCase();
    if (!/^[A-Z]{2}$/.test(country)) continue;

    const releases = table.get(country) ?? [];
    const seen = new Set(releases.map(r => `${r.releaseDate}|${r.releaseType}`));

    for (const raw of entry.release_dates) {
      const releaseType = releaseTypeFromCode(raw.type);
      const releaseDate = raw.release_date.slice(0, 10);
      if (!releaseType || !isCalendarDate(releaseDate)) continue;

      const key = `${releaseDate}|${releaseType}`;
      if (seen.has(key)) continue;
      seen.add(key);

      const note = raw.note?.trim();
      releases.push({ releaseDate, releaseType, note: note ? note : null });
    }

    releases.sort(compareUpstream);
    table.set(country, releases);
  }

  return table;
}

function compareUpstream(a: UpstreamRelease, b: UpstreamRelease): number {
  if (a.releaseDate !== b.releaseDate) return a.releaseDate < b.releaseDate ? -1 : 1;
  return releaseTypeToCode(a.releaseType) - releaseTypeToCode(b.releaseType);
}
