import type { QueryResultRow } from "pg";
import { describe, expect, it, vi } from "vitest";
import type { DatabaseSettings } from "../config";
import {
  PgVideoStore,
  classifyDatabaseError,
  toVideoRecord,
  type ConnectionPool,
  type PooledClient,
  type QueryOutcome,
} from "./db";
import {
  ConfigurationError,
  ConflictError,
  DatabaseError,
  InvalidStatusTransitionError,
  ResourceUnavailableError,
  TransientInfrastructureError,
  ValidationError,
} from "./errors";
import { createLogger } from "./logger";

type Handler = (text: string, values: unknown[]) => QueryOutcome;

const normalize = (text: string) => text.replace(/\s+/g, " ").trim();

const result = (rows: QueryResultRow[] = [], rowCount: number = rows.length): QueryOutcome => ({ rows, rowCount });

/** Records every statement; counts checkouts and releases. */
class FakePool implements ConnectionPool {
  readonly queries: Array<{ text: string; values: unknown[] }> = [];
  connects = 0;
  releases = 0;
  readonly releasedWith: Array<Error | undefined> = [];
  ended = false;
  connectError?: Error;

  constructor(private readonly handler: Handler = () => result()) {}

  async connect(): Promise<PooledClient> {
    if (this.connectError) throw this.connectError;
    this.connects++;
    return {
      query: async (text, values = []) => {
        const statement = normalize(text);
        this.queries.push({ text: statement, values });
        return this.handler(statement, values);
      },
      release: (err) => {
        this.releases++;
        this.releasedWith.push(err);
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  texts(): string[] {
    return this.queries.map((query) => query.text);
  }
}

const logger = createLogger({ level: "silent" });
const created = new Date("2026-01-01T00:00:00.000Z");
const now = new Date("2026-01-02T03:04:05.000Z");

const settings: DatabaseSettings = {
  host: "localhost",
  user: "videos",
  password: "test-secret",
  database: "videos",
  port: 5432,
  ssl: false,
  poolMax: 5,
  connectionTimeoutMs: 1000,
  statementTimeoutMs: 1000,
};

const row = (overrides: QueryResultRow = {}): QueryResultRow => ({
  video_id: "vid-1",
  user_id: "user-1",
  filename: "a.mp4",
  storage_key: "videos/vid-1.mp4",
  status: "pending",
  created_at: created,
  updated_at: created,
  ...overrides,
});

const storeWith = (pool: ConnectionPool) =>
  new PgVideoStore(settings, { createPool: () => pool, logger, now: () => now });

const SELECT_COLUMNS = "SELECT video_id, user_id, filename, storage_key, status, created_at, updated_at FROM videos";

const pgError = (message: string, code: string) => Object.assign(new Error(message), { code });

describe("PgVideoStore.insert", () => {
  const insertHandler: Handler = (_text, values) =>
    result([
      row({
        video_id: values[0],
        user_id: values[1],
        filename: values[2],
        storage_key: values[3],
        status: values[4],
        created_at: values[5],
        updated_at: values[5],
      }),
    ]);

  it("inserts with store-generated timestamps and returns the record", async () => {
    const pool = new FakePool(insertHandler);

    const record = await storeWith(pool).insert({
      videoId: "vid-1",
      userId: "user-1",
      filename: "a.mp4",
      storageKey: "videos/vid-1.mp4",
    });

    expect(record).toEqual({
      videoId: "vid-1",
      userId: "user-1",
      filename: "a.mp4",
      storageKey: "videos/vid-1.mp4",
      status: "pending",
      createdAt: now,
      updatedAt: now,
    });
    expect(pool.queries).toHaveLength(1);
    expect(pool.queries[0].text).toBe(
      "INSERT INTO videos (video_id, user_id, filename, storage_key, status, created_at, updated_at) " +
        "VALUES ($1, $2, $3, $4, $5, $6, $6) " +
        "RETURNING video_id, user_id, filename, storage_key, status, created_at, updated_at",
    );
    expect(pool.queries[0].values).toEqual(["vid-1", "user-1", "a.mp4", "videos/vid-1.mp4", "pending", now]);
    expect(pool.releases).toBe(1);
  });

  it("keeps a caller-supplied status, known or not", async () => {
    const pool = new FakePool(insertHandler);

    const record = await storeWith(pool).insert({
      videoId: "vid-2",
      userId: "user-1",
      filename: "b.mp4",
      storageKey: "videos/vid-2.mp4",
      status: "archived",
    });

    expect(record.status).toBe("archived");
  });

  it("maps a primary key violation to ConflictError and still releases", async () => {
    const pool = new FakePool(() => {
      throw pgError('duplicate key value violates unique constraint "videos_pkey"', "23505");
    });

    await expect(
      storeWith(pool).insert({ videoId: "vid-1", userId: "user-1", filename: "a.mp4", storageKey: "k" }),
    ).rejects.toBeInstanceOf(ConflictError);
    expect(pool.connects).toBe(1);
    expect(pool.releases).toBe(1);
  });

  it("wraps other database errors and keeps the cause", async () => {
    const cause = pgError('relation "videos" does not exist', "42P01");
    const pool = new FakePool(() => {
      throw cause;
    });

    const error = await storeWith(pool)
      .insert({ videoId: "vid-1", userId: "user-1", filename: "a.mp4", storageKey: "k" })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DatabaseError);
    if (error instanceof DatabaseError) {
      expect(error.code).toBe("42P01");
      expect(error.cause).toBe(cause);
    }
    expect(pool.releases).toBe(1);
  });

  it("reports dropped connections as transient", async () => {
    const pool = new FakePool(() => {
      throw pgError("terminating connection due to administrator command", "57P01");
    });

    await expect(storeWith(pool).get("vid-1")).rejects.toBeInstanceOf(TransientInfrastructureError);
    expect(pool.releases).toBe(1);
  });

  it("reports a broken pipe as transient", async () => {
    const pool = new FakePool(() => {
      throw pgError("write EPIPE", "EPIPE");
    });

    await expect(storeWith(pool).get("vid-1")).rejects.toBeInstanceOf(TransientInfrastructureError);
  });

  it("does not mistake five-letter errno codes for SQLSTATEs", () => {
    const denied = pgError("operation not permitted", "EPERM");
    expect(classifyDatabaseError(denied, "get")).toBe(denied);
  });

  it("propagates non-database errors unchanged", async () => {
    const unexpected = new TypeError("bad input");
    const pool = new FakePool(() => {
      throw unexpected;
    });

    await expect(storeWith(pool).get("vid-1")).rejects.toBe(unexpected);
    expect(pool.releases).toBe(1);
  });
});

describe("PgVideoStore connection handling", () => {
  it("fails with ConfigurationError before creating a pool", async () => {
    const createPool = vi.fn(() => new FakePool());
    const store = new PgVideoStore({ ...settings, password: undefined }, { createPool, logger });

    await expect(store.get("vid-1")).rejects.toBeInstanceOf(ConfigurationError);
    expect(createPool).not.toHaveBeenCalled();
  });

  it("reports pool exhaustion as ResourceUnavailableError", async () => {
    const pool = new FakePool();
    pool.connectError = new Error("timeout exceeded when trying to connect");

    await expect(storeWith(pool).list()).rejects.toBeInstanceOf(ResourceUnavailableError);
    expect(pool.releases).toBe(0);
  });

  it("creates the pool once and ends it on close", async () => {
    const pool = new FakePool(() => result([row()]));
    const createPool = vi.fn(() => pool);
    const store = new PgVideoStore(settings, { createPool, logger });

    await store.get("vid-1");
    await store.get("vid-1");
    await store.close();
    await store.close();

    expect(createPool).toHaveBeenCalledTimes(1);
    expect(pool.ended).toBe(true);
    expect(pool.connects).toBe(2);
    expect(pool.releases).toBe(2);
  });
});

describe("PgVideoStore.get", () => {
  it("returns null when the video does not exist", async () => {
    const pool = new FakePool();

    await expect(storeWith(pool).get("nonexistent-id")).resolves.toBeNull();
    expect(pool.queries[0]).toEqual({ text: `${SELECT_COLUMNS} WHERE video_id = $1`, values: ["nonexistent-id"] });
    expect(pool.releases).toBe(1);
  });

  it("returns the full record", async () => {
    const pool = new FakePool(() => result([row({ status: "completed" })]));

    await expect(storeWith(pool).get("vid-1")).resolves.toEqual({
      videoId: "vid-1",
      userId: "user-1",
      filename: "a.mp4",
      storageKey: "videos/vid-1.mp4",
      status: "completed",
      createdAt: created,
      updatedAt: created,
    });
  });
});

describe("PgVideoStore.list", () => {
  it("orders by newest first with the default limit", async () => {
    const pool = new FakePool();

    await storeWith(pool).list();

    expect(pool.queries[0]).toEqual({
      text: `${SELECT_COLUMNS} ORDER BY created_at DESC, video_id ASC LIMIT $1`,
      values: [100],
    });
  });

  it("combines filters with AND", async () => {
    const pool = new FakePool();

    await storeWith(pool).list({ userId: "u1", status: "completed", limit: 5 });

    expect(pool.queries[0]).toEqual({
      text: `${SELECT_COLUMNS} WHERE user_id = $1 AND status = $2 ORDER BY created_at DESC, video_id ASC LIMIT $3`,
      values: ["u1", "completed", 5],
    });
  });

  it("numbers parameters for a single filter", async () => {
    const pool = new FakePool();

    await storeWith(pool).list({ status: "pending" });

    expect(pool.queries[0]).toEqual({
      text: `${SELECT_COLUMNS} WHERE status = $1 ORDER BY created_at DESC, video_id ASC LIMIT $2`,
      values: ["pending", 100],
    });
  });

  it("maps every returned row", async () => {
    const pool = new FakePool(() => result([row({ video_id: "b" }), row({ video_id: "a" })]));

    const videos = await storeWith(pool).list({ userId: "user-1" });

    expect(videos.map((video) => video.videoId)).toEqual(["b", "a"]);
  });

  it("rejects a non-positive limit without touching the pool", async () => {
    const pool = new FakePool();

    await expect(storeWith(pool).list({ limit: 0 })).rejects.toBeInstanceOf(ValidationError);
    expect(pool.connects).toBe(0);
  });
});

describe("PgVideoStore.updateStatus", () => {
  const transitionHandler =
    (current: string): Handler =>
    (text, values) => {
      if (text.startsWith("SELECT")) return result([row({ status: current })]);
      if (text.startsWith("UPDATE")) return result([row({ status: values[1], updated_at: values[2] })]);
      return result();
    };

  it("applies an allowed transition inside a transaction", async () => {
    const pool = new FakePool(transitionHandler("pending"));

    const updated = await storeWith(pool).updateStatus("vid-1", "processing");

    expect(updated?.status).toBe("processing");
    expect(updated?.updatedAt).toEqual(now);
    expect(pool.texts()).toEqual([
      "BEGIN",
      `${SELECT_COLUMNS} WHERE video_id = $1 FOR UPDATE`,
      "UPDATE videos SET status = $2, updated_at = GREATEST($3, created_at) WHERE video_id = $1 " +
        "RETURNING video_id, user_id, filename, storage_key, status, created_at, updated_at",
      "COMMIT",
    ]);
    expect(pool.queries[2].values).toEqual(["vid-1", "processing", now]);
    expect(pool.releases).toBe(1);
  });

  it("rejects an illegal transition and rolls back", async () => {
    const pool = new FakePool(transitionHandler("completed"));

    await expect(storeWith(pool).updateStatus("vid-1", "processing")).rejects.toBeInstanceOf(
      InvalidStatusTransitionError,
    );
    expect(pool.texts()).toEqual(["BEGIN", `${SELECT_COLUMNS} WHERE video_id = $1 FOR UPDATE`, "ROLLBACK"]);
    expect(pool.releases).toBe(1);
  });

  it("returns the client to the pool after a clean rollback", async () => {
    const pool = new FakePool(transitionHandler("completed"));

    await storeWith(pool).updateStatus("vid-1", "processing").catch(() => undefined);

    expect(pool.releasedWith).toEqual([undefined]);
  });

  it("discards the client when the rollback itself fails", async () => {
    const rollbackFailure = new Error("connection terminated");
    const pool = new FakePool((text, values) => {
      if (text === "ROLLBACK") throw rollbackFailure;
      if (text.startsWith("UPDATE")) throw pgError("canceling statement due to statement timeout", "57014");
      return transitionHandler("pending")(text, values);
    });

    await expect(storeWith(pool).updateStatus("vid-1", "processing")).rejects.toBeInstanceOf(
      TransientInfrastructureError,
    );
    expect(pool.texts().at(-1)).toBe("ROLLBACK");
    expect(pool.releasedWith).toEqual([rollbackFailure]);
  });

  it("returns null for a missing video", async () => {
    const pool = new FakePool((text) => (text.startsWith("SELECT") ? result([]) : result()));

    await expect(storeWith(pool).updateStatus("missing", "processing")).resolves.toBeNull();
    expect(pool.texts().at(-1)).toBe("ROLLBACK");
  });

  it("treats the current status as a no-op", async () => {
    const pool = new FakePool(transitionHandler("processing"));

    const record = await storeWith(pool).updateStatus("vid-1", "processing");

    expect(record?.updatedAt).toEqual(created);
    expect(pool.texts()).toEqual(["BEGIN", `${SELECT_COLUMNS} WHERE video_id = $1 FOR UPDATE`, "COMMIT"]);
  });
});

describe("PgVideoStore.delete", () => {
  it("reports whether a row was removed", async () => {
    const removed = new FakePool(() => result([], 1));
    const missing = new FakePool(() => result([], 0));

    await expect(storeWith(removed).delete("vid-1")).resolves.toBe(true);
    await expect(storeWith(missing).delete("vid-1")).resolves.toBe(false);
    expect(removed.queries[0]).toEqual({ text: "DELETE FROM videos WHERE video_id = $1", values: ["vid-1"] });
  });
});

describe("PgVideoStore.countByStatus", () => {
  it("returns counts keyed by status", async () => {
    const pool = new FakePool(() =>
      result([
        { status: "pending", count: 2 },
        { status: "completed", count: 1 },
      ]),
    );

    await expect(storeWith(pool).countByStatus()).resolves.toEqual({ pending: 2, completed: 1 });
    expect(pool.queries[0].values).toEqual([null]);
  });

  it("filters by user when given", async () => {
    const pool = new FakePool();

    await storeWith(pool).countByStatus("user-1");

    expect(pool.queries[0].values).toEqual(["user-1"]);
  });
});

describe("toVideoRecord", () => {
  it("rejects rows with the wrong column types", () => {
    expect(() => toVideoRecord(row({ created_at: "2026-01-01" }))).toThrow("Column created_at is not a timestamp");
  });
});
