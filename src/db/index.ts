import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { env } from '../config/env.js';
import logger from '../config/logger.js';

export const REQUIRED_TABLES = ['film_cache', 'release_cache', 'release_refresh_ledger'] as const;

/** The part of a connection the repositories use; a pooled client inside a transaction. */
export interface SqlClient {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>>;
}

export interface Queryable extends SqlClient {
  transaction<T>(callback: (client: SqlClient) => Promise<T>): Promise<T>;
}

export class Database implements Queryable {
  private pool: Pool;

  constructor(connectionString: string = env.DATABASE_URL) {
    // Log database connection details (without sensitive info)
    const dbUrl = new URL(connectionString);
    logger.info(
      {
        host: dbUrl.hostname,
        port: dbUrl.port,
        database: dbUrl.pathname.slice(1),
        user: dbUrl.username,
      },
      'Initializing database connection'
    );

    this.pool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', err => {
      logger.error({ err }, 'Unexpected error on idle client');
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    try {
      return await this.pool.query<T>(text, params);
    } catch (error) {
      logger.error({ text, error }, 'Database query error');
      throw error;
    }
  }

  async transaction<T>(callback: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const scoped: SqlClient = {
      query: <R extends QueryResultRow>(text: string, params?: unknown[]) =>
        client.query<R>(text, params),
    };

    try {
      await client.query('BEGIN');
      const result = await callback(scoped);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Check database connection and basic info
   */
  async checkConnection(): Promise<{ database: string; now: Date }> {
    const result = await this.query<{ database: string; now: Date }>(
      'SELECT current_database() AS database, now() AS now'
    );
    const info = result.rows[0];
    if (!info) {
      throw new Error('Database connection check returned no rows');
    }
    return info;
  }

  /**
   * Check if required tables exist
   */
  async checkTables(): Promise<Record<string, boolean>> {
    const result = await this.query<{ table_name: string }>(
      `
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = current_schema()
      AND table_type = 'BASE TABLE'
    `
    );

    const existingTables = new Set(result.rows.map(row => row.table_name));
    return Object.fromEntries(REQUIRED_TABLES.map(table => [table, existingTables.has(table)]));
  }

  /**
   * Apply src/db/schema.sql. Every statement is IF NOT EXISTS, so this runs on each start.
   */
  async ensureSchema(): Promise<void> {
    const schemaPath = path.join(process.cwd(), 'src', 'db', 'schema.sql');
    const schemaSQL = await readFile(schemaPath, 'utf8');
    await this.query(schemaSQL);

    const tables = await this.checkTables();
    const missing = REQUIRED_TABLES.filter(table => !tables[table]);
    if (missing.length > 0) {
      throw new Error(`Schema verification failed, missing tables: ${missing.join(', ')}`);
    }
    logger.info({ tables }, 'Database schema ready');
  }
}
