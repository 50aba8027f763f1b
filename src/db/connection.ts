import { Kysely, PostgresDialect, sql, type SqlBool } from "kysely";
import pg from "pg";

import { errorMessage, SyncError, TransientError } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { createTunnel, type SecureTunnel } from "./tunnel.js";

import type {
  Dataset,
  HistoryEvent,
  JobSpec,
  Scalar,
  Source,
  StateRow,
} from "../types/index.js";
import type { SourceDatabase } from "./types.js";

const { Pool, types } = pg;

// Bot user ids are bigint columns; they fit in a double
types.setTypeParser(types.builtins.INT8, (val: string) => Number(val));
types.setTypeParser(types.builtins.JSON, (val: string): unknown => JSON.parse(val));
types.setTypeParser(types.builtins.JSONB, (val: string): unknown => JSON.parse(val));

// ============================================================================
// Configuration
// ============================================================================

const POOL_DEFAULTS = {
  max: 10, // Maximum pool connections
  idleTimeoutMillis: 30_000, // Close idle connections after 30s
  connectionTimeoutMillis: 10_000, // Connection timeout
  statement_timeout: 60_000, // Per-statement timeout
} satisfies pg.PoolConfig;

export interface PostgresSourceOptions {
  /** Replace tunnel creation (for testing) */
  tunnelFactory?: typeof createTunnel;
  /** Replace pool creation (for testing) */
  poolFactory?: (config: pg.PoolConfig) => pg.Pool;
}

// ============================================================================
// Value normalization
// ============================================================================

/**
 * Normalize a pg cell value to a sheet scalar.
 * JSON columns are re-serialized, byte arrays become hex.
 */
export function toScalar(value: unknown): Scalar {
  if (value === undefined || value === null) {
    return null;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint" ||
    value instanceof Date
  ) {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("hex");
  }
  return JSON.stringify(value);
}

/**
 * pg raises its own connect timeouts and dropped connections as plain errors
 * with no code. Errors carrying a code (SQLSTATE or socket) keep their own
 * category.
 */
function toConnectError(error: unknown, database: string): Error {
  if (
    error instanceof SyncError ||
    (error instanceof Error && "code" in error && typeof error.code === "string")
  ) {
    return error;
  }
  return new TransientError(
    `Connection to ${database} failed: ${errorMessage(error)}`,
    { cause: error }
  );
}

// ============================================================================
// Source
// ============================================================================

/**
 * PostgreSQL bot database, optionally reached through an SSH tunnel
 */
export class PostgresSource implements Source {
  private pool: pg.Pool | null = null;
  private db: Kysely<SourceDatabase> | null = null;
  private tunnel: SecureTunnel | null = null;

  private readonly tunnelFactory: typeof createTunnel;
  private readonly poolFactory: (config: pg.PoolConfig) => pg.Pool;

  constructor(
    private readonly job: JobSpec,
    options: PostgresSourceOptions = {}
  ) {
    this.tunnelFactory = options.tunnelFactory ?? createTunnel;
    this.poolFactory = options.poolFactory ?? ((config) => new Pool(config));
  }

  /**
   * Open the tunnel (if any) and the pool, and verify with a round trip.
   * A failed attempt releases what it opened, so it can simply be retried.
   */
  async connect(): Promise<void> {
    if (this.db !== null) {
      return;
    }

    const { connection, tunnel } = this.job;
    let host = connection.host;
    let port = connection.port;

    try {
      if (tunnel !== undefined) {
        this.tunnel = this.tunnelFactory(tunnel, {
          host: connection.host,
          port: connection.port,
        });
        const endpoint = await this.tunnel.open();
        host = endpoint.host;
        port = endpoint.port;
      }

      const pool = this.poolFactory({
        ...POOL_DEFAULTS,
        host,
        port,
        user: connection.user,
        password: connection.password,
        database: connection.database,
        application_name: "funnel-sheets-sync",
      });
      pool.on("error", (error) => {
        sourceLogger.error(
          { database: this.job.name, error: error.message },
          "Idle pool client error"
        );
      });
      this.pool = pool;

      const db = new Kysely<SourceDatabase>({
        dialect: new PostgresDialect({ pool }),
      });
      this.db = db;

      // destroy() only ends the pool after kysely has run a query
      await sql`SELECT 1`.execute(db);

      sourceLogger.info(
        { database: this.job.name, host, port, tunneled: tunnel !== undefined },
        "Connected to database"
      );
    } catch (error) {
      await this.release();
      throw toConnectError(error, this.job.name);
    }
  }

  async disconnect(): Promise<void> {
    await this.release();
    sourceLogger.info({ database: this.job.name }, "Disconnected from database");
  }

  /**
   * Run the job's primary query; column order follows the result fields
   */
  async fetchRows(query: string): Promise<Dataset> {
    const pool = this.requirePool();
    const result = await pool.query<unknown[]>({ text: query, rowMode: "array" });

    const headers = result.fields.map((field) => field.name);
    const rows = result.rows.map((row) => row.map(toScalar));

    sourceLogger.info(
      { database: this.job.name, rowCount: rows.length },
      "Fetched rows"
    );

    return { headers, rows };
  }

  async fetchHistory(subjectIds: readonly number[]): Promise<HistoryEvent[]> {
    if (subjectIds.length === 0) {
      return [];
    }

    const rows = await this.requireDb()
      .selectFrom("funnel_history")
      .select(["user_id", "label", "datetime"])
      .where(sql<SqlBool>`user_id = ANY(${[...subjectIds]}::bigint[])`)
      .orderBy("user_id")
      .orderBy("datetime")
      .execute();

    return rows.map((row) => ({
      subjectId: row.user_id,
      label: row.label,
      timestamp: row.datetime,
    }));
  }

  /**
   * Latest funnel state per user
   */
  async fetchStates(subjectIds: readonly number[]): Promise<StateRow[]> {
    if (subjectIds.length === 0) {
      return [];
    }

    const rows = await this.requireDb()
      .selectFrom("user_funnel")
      .distinctOn("user_id")
      .select(["user_id", "label", "datetime"])
      .where(sql<SqlBool>`user_id = ANY(${[...subjectIds]}::bigint[])`)
      .orderBy("user_id")
      .orderBy("datetime", "desc")
      .execute();

    return rows.map((row) => ({
      subjectId: row.user_id,
      label: row.label,
      timestamp: row.datetime,
    }));
  }

  private requirePool(): pg.Pool {
    if (this.pool === null) {
      throw new TransientError(`Database ${this.job.name} is not connected`);
    }
    return this.pool;
  }

  private requireDb(): Kysely<SourceDatabase> {
    if (this.db === null) {
      throw new TransientError(`Database ${this.job.name} is not connected`);
    }
    return this.db;
  }

  private async release(): Promise<void> {
    const db = this.db;
    const pool = this.pool;
    const tunnel = this.tunnel;
    this.db = null;
    this.pool = null;
    this.tunnel = null;

    try {
      // db.destroy() already closes the pool
      if (db !== null) {
        await db.destroy();
      } else if (pool !== null) {
        await pool.end();
      }
    } catch (error) {
      sourceLogger.warn(
        { database: this.job.name, error: errorMessage(error) },
        "Error closing database pool"
      );
    }

    if (tunnel !== null) {
      await tunnel.close();
    }
  }
}

export function createPostgresSource(job: JobSpec): Source {
  return new PostgresSource(job);
}
