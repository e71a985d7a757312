import type { Queryable } from '../db/index.js';
import { CacheIOError } from '../domain/errors.js';
import { systemClock, type Clock } from '../domain/freshness.js';
import type {
  FilmCacheRow,
  FilmIdentity,
  FilmIdentityStore,
  NewFilmIdentity,
} from '../domain/types.js';

export class FilmsRepository implements FilmIdentityStore {
  constructor(
    private readonly db: Queryable,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Find cached identity by watchlist slug. Stale rows are returned as-is.
   */
  async lookup(sourceSlug: string): Promise<FilmIdentity | null> {
    try {
      const result = await this.db.query<FilmCacheRow>(
        'SELECT * FROM film_cache WHERE source_slug = $1',
        [sourceSlug]
      );

      const row = result.rows[0];
      return row ? this.mapRowToIdentity(row) : null;
    } catch (error) {
      throw new CacheIOError(`Failed to read film cache for ${sourceSlug}`, { cause: error });
    }
  }

  /**
   * Upsert identity (last writer wins); updated_at is always reset to now
   */
  async store(identity: NewFilmIdentity): Promise<FilmIdentity> {
    try {
      const result = await this.db.query<FilmCacheRow>(
        `
        INSERT INTO film_cache (source_slug, catalog_id, title, year, poster_path, updated_at)
        VALUES ($1, $2, $3, $4, $5, $6)
        ON CONFLICT (source_slug)
        DO UPDATE SET
          catalog_id = EXCLUDED.catalog_id,
          title = EXCLUDED.title,
          year = EXCLUDED.year,
          poster_path = EXCLUDED.poster_path,
          updated_at = EXCLUDED.updated_at
        RETURNING *
      `,
        [
          identity.sourceSlug,
          identity.catalogId,
          identity.title,
          identity.year,
          identity.posterPath,
          this.clock(),
        ]
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error('Upsert returned no row');
      }
      return this.mapRowToIdentity(row);
    } catch (error) {
      throw new CacheIOError(`Failed to write film cache for ${identity.sourceSlug}`, {
        cause: error,
      });
    }
  }

  private mapRowToIdentity(row: FilmCacheRow): FilmIdentity {
    return {
      sourceSlug: row.source_slug,
      catalogId: row.catalog_id,
      title: row.title,
      year: row.year,
      posterPath: row.poster_path,
      updatedAt: row.updated_at,
    };
  }
}
