import pg from "pg";
import { OriginalUrlConflictError, ShortIdConflictError } from "./errors.js";
import type { StoredUrl, UrlStore } from "./storage.js";

const { Pool } = pg;

export const LIVE_URL_INDEX = "urls_original_url_live_idx";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS urls (
    short_id TEXT PRIMARY KEY,
    original_url TEXT NOT NULL,
    user_id TEXT NOT NULL,
    is_deleted BOOLEAN NOT NULL DEFAULT FALSE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
  CREATE UNIQUE INDEX IF NOT EXISTS ${LIVE_URL_INDEX}
    ON urls (original_url) WHERE NOT is_deleted;
  CREATE INDEX IF NOT EXISTS urls_user_id_idx ON urls (user_id);
`;

const INSERT_URL = `INSERT INTO urls (short_id, original_url, user_id) VALUES ($1, $2, $3)`;

const SELECT_BY_SHORT_ID = `
  SELECT original_url FROM urls
  WHERE short_id = $1 AND NOT is_deleted`;

const SELECT_BY_ORIGINAL_URL = `
  SELECT short_id FROM urls
  WHERE original_url = $1 AND NOT is_deleted
  LIMIT 1`;

const SELECT_BY_USER_ID = `
  SELECT short_id, original_url FROM urls
  WHERE user_id = $1 AND NOT is_deleted`;

const MARK_DELETED = `
  UPDATE urls SET is_deleted = TRUE
  WHERE short_id = ANY($1) AND user_id = $2`;

interface UrlRow {
  short_id: string;
  original_url: string;
}

/**
 * Translates a unique violation (23505) into the store's conflict errors.
 * Anything else comes back unchanged.
 */
export function mapInsertError(err: unknown, shortId: string, originalUrl: string): unknown {
  if (typeof err !== "object" || err === null || !("code" in err) || err.code !== "23505") {
    return err;
  }
  if ("constraint" in err && err.constraint === LIVE_URL_INDEX) {
    return new OriginalUrlConflictError(originalUrl);
  }
  return new ShortIdConflictError(shortId);
}

export class PostgresUrlStore implements UrlStore {
  readonly kind = "postgres";

  constructor(private readonly pool: pg.Pool) {}

  /** Opens a pool, checks connectivity and bootstraps the schema. */
  static async connect(databaseUrl: string): Promise<PostgresUrlStore> {
    const pool = new Pool({
      connectionString: databaseUrl,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000
    });

    try {
      await pool.query("SELECT 1");
      await pool.query(SCHEMA);
    } catch (err) {
      await pool.end();
      throw err;
    }
    return new PostgresUrlStore(pool);
  }

  async save(shortId: string, originalUrl: string, userId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    try {
      await this.pool.query(INSERT_URL, [shortId, originalUrl, userId]);
    } catch (err) {
      throw mapInsertError(err, shortId, originalUrl);
    }
  }

  async saveBatch(items: ReadonlyMap<string, string>, userId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const [shortId, originalUrl] of items) {
        try {
          await client.query(INSERT_URL, [shortId, originalUrl, userId]);
        } catch (err) {
          throw mapInsertError(err, shortId, originalUrl);
        }
      }
      await client.query("COMMIT");
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  async get(shortId: string, signal?: AbortSignal): Promise<string | null> {
    signal?.throwIfAborted();
    const res = await this.pool.query<Pick<UrlRow, "original_url">>(SELECT_BY_SHORT_ID, [shortId]);
    return res.rows[0]?.original_url ?? null;
  }

  async findByOriginalUrl(originalUrl: string, signal?: AbortSignal): Promise<string | null> {
    signal?.throwIfAborted();
    const res = await this.pool.query<Pick<UrlRow, "short_id">>(SELECT_BY_ORIGINAL_URL, [originalUrl]);
    return res.rows[0]?.short_id ?? null;
  }

  async getUrlsByUserId(userId: string, signal?: AbortSignal): Promise<StoredUrl[]> {
    signal?.throwIfAborted();
    const res = await this.pool.query<UrlRow>(SELECT_BY_USER_ID, [userId]);
    return res.rows.map((row) => ({ shortId: row.short_id, originalUrl: row.original_url }));
  }

  async deleteUrls(shortIds: readonly string[], userId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (shortIds.length === 0) return;
    await this.pool.query(MARK_DELETED, [shortIds, userId]);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
