import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import { fetch, type Dispatcher, type Response } from 'undici';
import rootLogger from '../config/logger.js';
import { WatchlistSourceError, errorMessage } from '../domain/errors.js';
import { parseYear, splitTrailingYear } from '../domain/normalize.js';
import type { FilmPage, FilmPageSource, WatchlistEntry, WatchlistSource } from '../domain/types.js';
import { sleep as defaultSleep, type Sleep } from '../tmdb/rateLimiter.js';

export interface LetterboxdOptions {
  baseUrl?: string;
  /** Pause between page requests */
  pageDelayMs?: number;
  maxPages?: number;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Extracts film entries from one watchlist page. Handles both the current
 * `data-item-*` poster markup and the older `data-film-*` one.
 */
export function parseWatchlistPage(html: string): WatchlistEntry[] {
  const $ = cheerio.load(html);
  const entries: WatchlistEntry[] = [];

  $('[data-item-slug], [data-film-slug]').each((_, element) => {
    const node = $(element);
    const slug = node.attr('data-item-slug') ?? node.attr('data-film-slug');
    const displayName =
      node.attr('data-item-name') ?? node.attr('data-film-name') ?? node.find('img').attr('alt');
    if (!slug || !displayName) return;

    const { title, year } = splitTrailingYear(displayName);
    entries.push({
      sourceSlug: slug,
      titleHint: title,
      yearHint: year ?? parseYear(node.attr('data-film-release-year')),
    });
  });

  return entries;
}

/**
 * Reads the catalog id and canonical title from a film page. The id comes
 * from `body[data-tmdb-id]`, else from the first TMDB movie link.
 */
export function parseFilmPage(html: string): FilmPage {
  const $ = cheerio.load(html);

  let catalogId = toCatalogId($('body').attr('data-tmdb-id'));
  if (catalogId === null) {
    const href = $('a[href*="themoviedb.org"]').first().attr('href');
    catalogId = toCatalogId(href?.match(/\/movie\/(\d+)/)?.[1]);
  }

  const ogTitle = $('meta[property="og:title"]').attr('content')?.trim();
  if (!ogTitle) {
    return { catalogId, title: null, year: null };
  }

  const { title, year } = splitTrailingYear(ogTitle);
  return { catalogId, title, year };
}

function toCatalogId(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value.trim())) return null;
  const id = Number(value.trim());
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export class LetterboxdWatchlistSource implements WatchlistSource, FilmPageSource {
  private readonly baseUrl: string;
  private readonly pageDelayMs: number;
  private readonly maxPages: number;
  private readonly timeout: number;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(options: LetterboxdOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://letterboxd.com').replace(/\/+$/, '');
    this.pageDelayMs = options.pageDelayMs ?? 250;
    this.maxPages = options.maxPages ?? 50;
    this.timeout = options.timeoutMs ?? 15000;
    this.dispatcher = options.dispatcher;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = (options.logger ?? rootLogger).child({ component: 'watchlist' });
  }

  /**
   * Walks the watchlist pages until one comes back empty. Slugs seen on an
   * earlier page are skipped.
   */
  async fetchWatchlist(username: string, signal?: AbortSignal): Promise<WatchlistEntry[]> {
    const seen = new Set<string>();
    const entries: WatchlistEntry[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      if (page > 1) {
        await this.sleep(this.pageDelayMs, signal);
      }

      const html = await this.fetchPage(username, page, signal);
      const films = parseWatchlistPage(html);
      this.log.debug({ username, page, films: films.length }, 'Parsed watchlist page');

      if (films.length === 0) break;

      for (const film of films) {
        if (!seen.has(film.sourceSlug)) {
          seen.add(film.sourceSlug);
          entries.push(film);
        }
      }

      if (page === this.maxPages) {
        this.log.warn({ username, maxPages: this.maxPages }, 'Watchlist truncated at page limit');
      }
    }

    return entries;
  }

  /**
   * Film page for a slug, or null when Letterboxd has none.
   */
  async fetchFilmPage(sourceSlug: string, signal?: AbortSignal): Promise<FilmPage | null> {
    const url = `${this.baseUrl}/film/${encodeURIComponent(sourceSlug)}/`;
    const html = await this.fetchHtml(url, `film page ${sourceSlug}`, signal);
    if (html === null) return null;

    const page = parseFilmPage(html);
    this.log.debug({ slug: sourceSlug, ...page }, 'Parsed film page');
    return page;
  }

  private async fetchPage(username: string, page: number, signal?: AbortSignal): Promise<string> {
    const user = encodeURIComponent(username);
    const url =
      page === 1
        ? `${this.baseUrl}/${user}/watchlist/`
        : `${this.baseUrl}/${user}/watchlist/page/${page}/`;

    const html = await this.fetchHtml(url, `${username}'s watchlist`, signal);
    if (html === null) {
      throw new WatchlistSourceError(`Letterboxd user "${username}" not found`, 404);
    }
    return html;
  }

  /** GET an HTML page; null on 404 */
  private async fetchHtml(url: string, what: string, signal?: AbortSignal): Promise<string | null> {
    const timeoutSignal = AbortSignal.timeout(this.timeout);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    let response: Response;
    try {
      response = await fetch(url, {
        signal: combined,
        dispatcher: this.dispatcher,
        headers: {
          Accept: 'text/html',
          Referer: `${this.baseUrl}/`,
          'User-Agent': 'watchlist-release-tracker/1.0',
        },
      });
    } catch (error) {
      throw this.failure(error, what, signal, timeoutSignal);
    }

    if (response.status === 404) {
      await response.body?.cancel();
      return null;
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new WatchlistSourceError(`Letterboxd returned HTTP ${response.status} for ${what}`, 502);
    }

    try {
      return await response.text();
    } catch (error) {
      throw this.failure(error, what, signal, timeoutSignal);
    }
  }

  private failure(
    error: unknown,
    what: string,
    signal: AbortSignal | undefined,
    timeoutSignal: AbortSignal
  ): unknown {
    if (signal?.aborted) return error;
    if (timeoutSignal.aborted) {
      return new WatchlistSourceError(
        `Letterboxd timed out after ${this.timeout}ms loading ${what}`,
        502,
        { cause: error }
      );
    }
    return new WatchlistSourceError(`Could not reach Letterboxd: ${errorMessage(error)}`, 502, {
      cause: error,
    });
  }
}
