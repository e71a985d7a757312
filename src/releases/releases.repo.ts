import type { Queryable } from '../db/index.js';
import { CacheIOError } from '../domain/errors.js';
import { systemClock, type Clock } from '../domain/freshness.js';
import {
  releaseTypeFromCode,
  releaseTypeToCode,
  type CountryReleases,
  type RefreshLedgerEntry,
  type RefreshLedgerRow,
  type ReleaseCacheRow,
  type ReleaseEvent,
  type ReleaseStore,
} from '../domain/types.js';

export class ReleasesRepository implements ReleaseStore {
  constructor(
    private readonly db: Queryable,
    private readonly clock: Clock = systemClock
  ) {}

  async getLedgerEntry(catalogId: number, country: string): Promise<RefreshLedgerEntry | null> {
    try {
      const result = await this.db.query<RefreshLedgerRow>(
        'SELECT * FROM release_refresh_ledger WHERE catalog_id = $1 AND country = $2',
        [catalogId, country]
      );

      const row = result.rows[0];
      if (!row) return null;
      return { catalogId: row.catalog_id, country: row.country, cachedAt: row.cached_at };
    } catch (error) {
      throw new CacheIOError(`Failed to read refresh ledger for ${catalogId}/${country}`, {
        cause: error,
      });
    }
  }

  async listReleases(catalogId: number, country: string): Promise<ReleaseEvent[]> {
    try {
      const result = await this.db.query<ReleaseCacheRow>(
        `
        SELECT * FROM release_cache
        WHERE catalog_id = $1 AND country = $2
        ORDER BY release_date, release_type, note NULLS FIRST
      `,
        [catalogId, country]
      );

      return result.rows.flatMap(row => {
        const event = this.mapRowToEvent(row);
        return event ? [event] : [];
      });
    } catch (error) {
      throw new CacheIOError(`Failed to read release cache for ${catalogId}/${country}`, {
        cause: error,
      });
    }
  }

  /**
   * Swap in a fresh upstream snapshot for one film.
   *
   * Runs in a single transaction holding an advisory lock on the catalog id,
   * so concurrent refreshes of the same film are serialized and readers see
   * either the old rows or the new ones.
   */
  async replaceSnapshot(
    catalogId: number,
    snapshot: CountryReleases,
    checkedCountries: readonly string[]
  ): Promise<Date> {
    const cachedAt = this.clock();
    const countries = [...new Set([...snapshot.keys(), ...checkedCountries])];

    const rowCountries: string[] = [];
    const rowDates: string[] = [];
    const rowTypes: number[] = [];
    const rowNotes: (string | null)[] = [];
    for (const [country, releases] of snapshot) {
      for (const release of releases) {
        rowCountries.push(country);
        rowDates.push(release.releaseDate);
        rowTypes.push(releaseTypeToCode(release.releaseType));
        rowNotes.push(release.note);
      }
    }

    try {
      await this.db.transaction(async client => {
        await client.query('SELECT pg_advisory_xact_lock($1)', [catalogId]);

        await client.query(
          'DELETE FROM release_cache WHERE catalog_id = $1 AND country = ANY($2::text[])',
          [catalogId, countries]
        );

        if (rowCountries.length > 0) {
          await client.query(
            `
            INSERT INTO release_cache (catalog_id, country, release_date, release_type, note, cached_at)
            SELECT $1, r.country, r.release_date, r.release_type, r.note, $6
            FROM unnest($2::text[], $3::text[], $4::smallint[], $5::text[])
              AS r(country, release_date, release_type, note)
            ON CONFLICT (catalog_id, country, release_date, release_type) DO NOTHING
          `,
            [catalogId, rowCountries, rowDates, rowTypes, rowNotes, cachedAt]
          );
        }

        await client.query(
          `
          INSERT INTO release_refresh_ledger (catalog_id, country, cached_at)
          SELECT $1, c.country, $3
          FROM unnest($2::text[]) AS c(country)
          ON CONFLICT (catalog_id, country)
          DO UPDATE SET cached_at = EXCLUDED.cached_at
        `,
          [catalogId, countries, cachedAt]
        );
      });
    } catch (error) {
      throw new CacheIOError(`Failed to replace release cache for ${catalogId}`, { cause: error });
    }

    return cachedAt;
  }

  private mapRowToEvent(row: ReleaseCacheRow): ReleaseEvent | null {
    const releaseType = releaseTypeFromCode(row.release_type);
    if (!releaseType) return null;

    return {
      catalogId: row.catalog_id,
      country: row.country,
      releaseDate: row.release_date,
      releaseType,
      note: row.note,
      cachedAt: row.cached_at,
    };
  }
}
