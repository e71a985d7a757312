import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { TransportError, UpstreamResponseError } from '../../src/domain/errors.js';
import { unlimited, type RateLimiter, type Sleep } from '../../src/tmdb/rateLimiter.js';
import { TmdbClient, toCountryReleases } from '../../src/tmdb/tmdb.service.js';
import { startStallingServer } from '../fakes/stallingServer.js';

const ORIGIN = 'https://api.themoviedb.org';

describe('TmdbClient', () => {
  let agent: MockAgent;
  let permits: number;
  let sleeps: number[];
  let client: TmdbClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    permits = 0;
    sleeps = [];

    const limiter: RateLimiter = {
      acquire: async () => {
        permits++;
        return 0;
      },
    };
    const sleep: Sleep = async ms => {
      sleeps.push(ms);
    };

    client = new TmdbClient({
      apiKey: 'test-key',
      limiter,
      maxRetries: 2,
      retryBaseMs: 100,
      dispatcher: agent,
      sleep,
    });
  });

  afterEach(async () => {
    await agent.close();
  });

  describe('searchMovies', () => {
    it('should send the title, year and key and map the results', async () => {
      const paths: string[] = [];
      agent
        .get(ORIGIN)
        .intercept({
          method: 'GET',
          path: path => {
            paths.push(path);
            return path.startsWith('/3/search/movie?');
          },
        })
        .reply(200, {
          page: 1,
          results: [
            { id: 693134, title: 'Dune: Part Two', release_date: '2024-02-27', poster_path: '/dune2.jpg' },
            { id: 5, title: 'Dune Drifter', release_date: '', poster_path: null },
          ],
        });

      const candidates = await client.searchMovies('Dune: Part Two', 2024);

      expect(candidates).toEqual([
        { id: 693134, title: 'Dune: Part Two', year: 2024, posterPath: '/dune2.jpg' },
        { id: 5, title: 'Dune Drifter', year: null, posterPath: null },
      ]);
      const url = new URL(`${ORIGIN}${paths[0] ?? ''}`);
      expect(url.searchParams.get('query')).toBe('Dune: Part Two');
      expect(url.searchParams.get('year')).toBe('2024');
      expect(url.searchParams.get('include_adult')).toBe('false');
      expect(url.searchParams.get('api_key')).toBe('test-key');
      expect(permits).toBe(1);
    });

    it('should leave out the year when none is given', async () => {
      const paths: string[] = [];
      agent
        .get(ORIGIN)
        .intercept({
          method: 'GET',
          path: path => {
            paths.push(path);
            return true;
          },
        })
        .reply(200, { results: [] });

      await expect(client.searchMovies('Heat', null)).resolves.toEqual([]);
      expect(new URL(`${ORIGIN}${paths[0] ?? ''}`).searchParams.has('year')).toBe(false);
    });
  });

  describe('getReleases', () => {
    const releasesPath = (path: string) => path.startsWith('/3/movie/693134/release_dates?');

    it('should retry server errors with exponential backoff', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ method: 'GET', path: releasesPath }).reply(500, 'oops');
      pool.intercept({ method: 'GET', path: releasesPath }).reply(502, 'oops');
      pool.intercept({ method: 'GET', path: releasesPath }).reply(200, {
        id: 693134,
        results: [{ iso_3166_1: 'US', release_dates: [{ release_date: '2024-03-01T00:00:00.000Z', type: 3, note: '' }] }],
      });

      const table = await client.getReleases(693134);

      expect(table.get('US')).toEqual([{ releaseDate: '2024-03-01', releaseType: 'theatrical', note: null }]);
      expect(sleeps).toEqual([100, 200]);
      expect(permits).toBe(3);
    });

    it('should give up after the retry budget', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ method: 'GET', path: releasesPath }).reply(503, 'down').times(3);

      await expect(client.getReleases(693134)).rejects.toBeInstanceOf(TransportError);
      expect(sleeps).toEqual([100, 200]);
    });

    it('should honour Retry-After on 429', async () => {
      const pool = agent.get(ORIGIN);
      pool
        .intercept({ method: 'GET', path: releasesPath })
        .reply(429, { status_message: 'slow down' }, { headers: { 'retry-after': '2' } });
      pool.intercept({ method: 'GET', path: releasesPath }).reply(200, { id: 693134, results: [] });

      await expect(client.getReleases(693134)).resolves.toEqual(new Map());
      expect(sleeps).toEqual([2000]);
    });

    it('should return an empty table for an unknown movie', async () => {
      agent
        .get(ORIGIN)
        .intercept({ method: 'GET', path: releasesPath })
        .reply(404, { status_code: 34, status_message: 'The resource you requested could not be found.' });

      const table = await client.getReleases(693134);

      expect(table.size).toBe(0);
      expect(sleeps).toEqual([]);
    });

    it('should not retry client errors', async () => {
      agent
        .get(ORIGIN)
        .intercept({ method: 'GET', path: releasesPath })
        .reply(401, { status_code: 7, status_message: 'Invalid API key' });

      await expect(client.getReleases(693134)).rejects.toBeInstanceOf(UpstreamResponseError);
      expect(permits).toBe(1);
    });

    it('should reject a malformed body', async () => {
      agent
        .get(ORIGIN)
        .intercept({ method: 'GET', path: releasesPath })
        .reply(200, { results: 'nope' });

      await expect(client.getReleases(693134)).rejects.toThrow('Malformed TMDB release_dates response');
    });

    it('should reject a non-JSON body', async () => {
      agent
        .get(ORIGIN)
        .intercept({ method: 'GET', path: releasesPath })
        .reply(200, '<html>maintenance</html>');

      await expect(client.getReleases(693134)).rejects.toBeInstanceOf(UpstreamResponseError);
    });

    it('should retry when the body stalls past the timeout', async () => {
      const server = await startStallingServer('application/json', '{"id":693134,"results":[');
      try {
        const stalled = new TmdbClient({
          apiKey: 'test-key',
          baseUrl: `${server.baseUrl}/3`,
          limiter: unlimited,
          timeoutMs: 200,
          maxRetries: 2,
          retryBaseMs: 100,
          sleep: async ms => {
            sleeps.push(ms);
          },
        });

        const error = await stalled.getReleases(693134).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({ message: 'TMDB request timed out after 200ms' });
        expect(server.requests()).toBe(3);
        expect(sleeps).toEqual([100, 200]);
      } finally {
        await server.close();
      }
    });
  });
});

describe('toCountryReleases', () => {
  it('should normalize dates, drop unknown types and duplicates, and sort', () => {
    const table = toCountryReleases([
      {
        iso_3166_1: 'us',
        release_dates: [
          { release_date: '2024-03-01T00:00:00.000Z', type: 3, note: '' },
          { release_date: '2024-03-01T00:00:00.000Z', type: 3, note: 'IMAX' },
          { release_date: '2024-02-15T00:00:00.000Z', type: 1, note: 'Premiere' },
          { release_date: '2024-04-16T00:00:00.000Z', type: 9 },
          { release_date: 'not-a-date', type: 4 },
        ],
      },
      { iso_3166_1: 'XXX', release_dates: [{ release_date: '2024-03-01T00:00:00.000Z', type: 3 }] },
      { iso_3166_1: 'GB', release_dates: [{ release_date: '2024-05-14T00:00:00.000Z', type: 4, note: null }] },
    ]);

    expect([...table.keys()]).toEqual(['US', 'GB']);
    expect(table.get('US')).toEqual([
      { releaseDate: '2024-02-15', releaseType: 'premiere', note: 'Premiere' },
      { releaseDate: '2024-03-01', releaseType: 'theatrical', note: null },
    ]);
    expect(table.get('GB')).toEqual([{ releaseDate: '2024-05-14', releaseType: 'digital', note: null }]);
  });
});
