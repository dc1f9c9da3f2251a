import { Pool, type QueryResultRow } from "pg";
import fs from "fs/promises";
import path from "path";
import { requireDatabaseConfig, type DatabaseConfig, type DatabaseSettings } from "../config";
import {
  AppError,
  ConflictError,
  DatabaseError,
  ResourceUnavailableError,
  TransientInfrastructureError,
  ValidationError,
  errorCode,
  errorMessage,
} from "./errors";
import { getLogger, type Logger } from "./logger";
import { assertTransition } from "./videoStatus";
import {
  DEFAULT_LIST_LIMIT,
  type NewVideo,
  type VideoFilter,
  type VideoRecord,
  type VideoStatus,
  type VideoStore,
} from "../types";

export const SCHEMA_PATH = path.resolve(__dirname, "../../sql/schema.sql");

export interface QueryOutcome {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export interface PooledClient {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
  release(err?: Error): void;
}

/** The slice of a pg Pool the store relies on. */
export interface ConnectionPool {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

export type PoolFactory = (config: DatabaseConfig) => ConnectionPool;

export function createPgPool(config: DatabaseConfig): ConnectionPool {
  const pool = new Pool({
    host: config.host,
    user: config.user,
    password: config.password,
    database: config.database,
    port: config.port,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
    max: config.poolMax,
    connectionTimeoutMillis: config.connectionTimeoutMs,
    statement_timeout: config.statementTimeoutMs,
  });

  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
}

const COLUMNS = "video_id, user_id, filename, storage_key, status, created_at, updated_at";

const SQLSTATE_UNIQUE_VIOLATION = "23505";
const SQLSTATE_TOO_MANY_CONNECTIONS = "53300";
const TRANSIENT_SQLSTATES = new Set(["40001", "40P01", "57014", "57P01", "57P02", "57P03"]);
const NETWORK_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE", "ENOTFOUND", "EAI_AGAIN"]);

// no SQLSTATE class starts with E, so five-letter errno codes (EPERM) stay out
const isSqlState = (code: string): boolean => /^[0-9A-Z]{5}$/.test(code) && !/^E[A-Z]+$/.test(code);

/**
 * Maps a pg or socket failure onto the store's error taxonomy. Errors the
 * store already raised pass through; non-database errors are returned as-is.
 */
export function classifyDatabaseError(error: unknown, operation: string): unknown {
  if (error instanceof AppError) return error;

  const code = errorCode(error);
  const message = errorMessage(error);

  if (code === SQLSTATE_UNIQUE_VIOLATION) {
    return new ConflictError(`Video already exists (${operation}): ${message}`, { cause: error });
  }
  if (code === SQLSTATE_TOO_MANY_CONNECTIONS || /timeout exceeded when trying to connect/i.test(message)) {
    return new ResourceUnavailableError(`No database connection available (${operation}): ${message}`, {
      cause: error,
    });
  }
  if (code !== undefined && (NETWORK_ERROR_CODES.has(code) || code.startsWith("08") || TRANSIENT_SQLSTATES.has(code))) {
    return new TransientInfrastructureError(`Database unavailable (${operation}): ${message}`, { cause: error });
  }
  if (code !== undefined && isSqlState(code)) {
    return new DatabaseError(`Database error (${operation}): ${message}`, { cause: error, code });
  }
  return error;
}

const readString = (row: QueryResultRow, column: string): string => {
  const value: unknown = row[column];
  if (typeof value !== "string") {
    throw new DatabaseError(`Column ${column} is not text`);
  }
  return value;
};

const readDate = (row: QueryResultRow, column: string): Date => {
  const value: unknown = row[column];
  if (!(value instanceof Date)) {
    throw new DatabaseError(`Column ${column} is not a timestamp`);
  }
  return value;
};

export function toVideoRecord(row: QueryResultRow): VideoRecord {
  return {
    videoId: readString(row, "video_id"),
    userId: readString(row, "user_id"),
    filename: readString(row, "filename"),
    storageKey: readString(row, "storage_key"),
    status: readString(row, "status"),
    createdAt: readDate(row, "created_at"),
    updatedAt: readDate(row, "updated_at"),
  };
}

export function assertListLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`);
  }
}

export interface PgVideoStoreOptions {
  createPool?: PoolFactory;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Video records in PostgreSQL. Each call checks out one pooled client and
 * hands it back before returning, on success and failure alike.
 */
export class PgVideoStore implements VideoStore {
  private pool?: ConnectionPool;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly settings: DatabaseSettings,
    private readonly options: PgVideoStoreOptions = {},
  ) {
    this.logger = (options.logger ?? getLogger()).child({ component: "video-store" });
    this.now = options.now ?? (() => new Date());
  }

  private getPool(): ConnectionPool {
    if (!this.pool) {
      const config = requireDatabaseConfig(this.settings);
      this.pool = (this.options.createPool ?? createPgPool)(config);
    }
    return this.pool;
  }

  private async withClient<T>(
    operation: string,
    context: Record<string, unknown>,
    work: (client: PooledClient, discard: (reason: Error) => void) => Promise<T>,
  ): Promise<T> {
    let client: PooledClient;
    try {
      client = await this.getPool().connect();
    } catch (error) {
      throw this.fail(operation, context, error);
    }

    // a client in an unknown transaction state is destroyed rather than pooled
    let broken: Error | undefined;
    try {
      return await work(client, (reason) => {
        broken = reason;
      });
    } catch (error) {
      throw this.fail(operation, context, error);
    } finally {
      client.release(broken);
    }
  }

  private fail(operation: string, context: Record<string, unknown>, error: unknown): unknown {
    const classified = classifyDatabaseError(error, operation);
    if (classified instanceof ConflictError) {
      this.logger.warn({ ...context, operation }, classified.message);
    } else {
      this.logger.error({ ...context, operation, err: error }, `${operation} failed`);
    }
    return classified;
  }

  async insert(video: NewVideo): Promise<VideoRecord> {
    const now = this.now();
    const record = await this.withClient("insert", { videoId: video.videoId }, async (client) => {
      const result = await client.query(
        `INSERT INTO videos (${COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $6)
         RETURNING ${COLUMNS}`,
        [video.videoId, video.userId, video.filename, video.storageKey, video.status ?? "pending", now],
      );
      return toVideoRecord(result.rows[0]);
    });

    this.logger.info({ videoId: record.videoId, userId: record.userId }, "video inserted");
    return record;
  }

  async get(videoId: string): Promise<VideoRecord | null> {
    return this.withClient("get", { videoId }, async (client) => {
      const result = await client.query(`SELECT ${COLUMNS} FROM videos WHERE video_id = $1`, [videoId]);
      const row = result.rows[0];
      return row ? toVideoRecord(row) : null;
    });
  }

  async list(filter: VideoFilter = {}): Promise<VideoRecord[]> {
    const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
    assertListLimit(limit);

    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.userId) {
      params.push(filter.userId);
      conditions.push(`user_id = $${params.length}`);
    }
    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    params.push(limit);

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";
    const text = `SELECT ${COLUMNS} FROM videos${where} ORDER BY created_at DESC, video_id ASC LIMIT $${params.length}`;

    return this.withClient("list", { userId: filter.userId, status: filter.status }, async (client) => {
      const result = await client.query(text, params);
      return result.rows.map(toVideoRecord);
    });
  }

  /**
   * Moves a video along `pending -> processing -> completed|failed` under a
   * row lock. Re-applying the current status is a no-op. Returns null when
   * the video does not exist.
   */
  async updateStatus(videoId: string, status: VideoStatus): Promise<VideoRecord | null> {
    const now = this.now();
    return this.withClient("updateStatus", { videoId, status }, async (client, discard) => {
      await client.query("BEGIN");
      try {
        const current = await client.query(
          `SELECT ${COLUMNS} FROM videos WHERE video_id = $1 FOR UPDATE`,
          [videoId],
        );
        const row = current.rows[0];
        if (!row) {
          await client.query("ROLLBACK");
          return null;
        }

        const existing = toVideoRecord(row);
        if (existing.status === status) {
          await client.query("COMMIT");
          return existing;
        }
        assertTransition(existing.status, status);

        const updated = await client.query(
          `UPDATE videos SET status = $2, updated_at = GREATEST($3, created_at)
           WHERE video_id = $1
           RETURNING ${COLUMNS}`,
          [videoId, status, now],
        );
        await client.query("COMMIT");
        this.logger.info({ videoId, from: existing.status, to: status }, "video status updated");
        return toVideoRecord(updated.rows[0]);
      } catch (error) {
        await client.query("ROLLBACK").catch((rollbackError: unknown) => {
          this.logger.error({ err: rollbackError, videoId }, "rollback failed");
          discard(rollbackError instanceof Error ? rollbackError : new Error(errorMessage(rollbackError)));
        });
        throw error;
      }
    });
  }

  async delete(videoId: string): Promise<boolean> {
    const deleted = await this.withClient("delete", { videoId }, async (client) => {
      const result = await client.query("DELETE FROM videos WHERE video_id = $1", [videoId]);
      return (result.rowCount ?? 0) > 0;
    });
    if (deleted) this.logger.info({ videoId }, "video deleted");
    return deleted;
  }

  async countByStatus(userId?: string): Promise<Record<string, number>> {
    return this.withClient("countByStatus", { userId }, async (client) => {
      const result = await client.query(
        `SELECT status, COUNT(*)::int AS count
         FROM videos
         WHERE ($1::text IS NULL OR user_id = $1::text)
         GROUP BY status`,
        [userId || null],
      );
      const counts: Record<string, number> = {};
      for (const row of result.rows) {
        const count: unknown = row.count;
        counts[readString(row, "status")] = typeof count === "number" ? count : Number(count);
      }
      return counts;
    });
  }

  async ping(): Promise<void> {
    await this.withClient("ping", {}, (client) => client.query("SELECT 1"));
  }

  /** Applies sql/schema.sql. Every statement in it is idempotent. */
  async ensureSchema(schemaPath: string = SCHEMA_PATH): Promise<void> {
    const sql = await fs.readFile(schemaPath, "utf8");
    await this.withClient("ensureSchema", { schemaPath }, (client) => client.query(sql));
    this.logger.info({ schemaPath }, "schema applied");
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = undefined;
    await pool.end();
  }
}
