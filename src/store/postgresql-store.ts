import type { QueryResultRow } from "pg";
import { JobStoreError, NotFoundError, StoreError } from "../errors";
import { isJobStatus } from "../job-state";
import type { Job, JobOutcome, JobResult, JobStatus } from "../types";
import { generateId } from "../utils/id-generator";
import { type Logger, silentLogger } from "../utils/logger";
import { DEFAULT_PAGE_SIZE, type JobStore } from "./base-store";
import { applyDispatch, applyRetryOrExpire, applyTerminal } from "./transitions";

export interface JobRow extends QueryResultRow {
  id: string;
  job_type: string;
  payload: unknown;
  status: string;
  attempt_count: number;
  max_attempts: number;
  // BIGINT columns come back from pg as strings
  timeout_ms: number | string;
  scheduled_for: Date | null;
  dispatched_at: Date | null;
  ack_deadline: Date | null;
  result: JobResult | null;
  created_at: Date;
  updated_at: Date;
}

// The subset of a pg PoolClient the store drives
export interface JobDatabaseClient {
  query(text: string, values?: unknown[]): Promise<{ rows: JobRow[] }>;
  release(): void;
}

// The subset of a pg Pool the store drives
export interface JobDatabase {
  query(text: string, values?: unknown[]): Promise<{ rows: JobRow[] }>;
  connect(): Promise<JobDatabaseClient>;
}

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * PostgreSQL storage adapter for the dispatch engine
 *
 * Every transition runs in its own transaction: the row is locked with
 * `SELECT ... FOR UPDATE`, checked against the state machine and written
 * back, so concurrent writers on the same job serialise on the row lock and
 * the loser sees the winner's status.
 */
export class PostgreSQLJobStore implements JobStore {
  private readonly pool: JobDatabase;
  private readonly tableName: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private initializing?: Promise<void>;

  /**
   * Create a new PostgreSQL job store
   *
   * @param pool - A pg Pool, or anything exposing its `query` and `connect`
   * @param options - Configuration options
   */
  constructor(
    pool: JobDatabase,
    options: { tableName?: string; logger?: Logger; clock?: () => Date } = {},
  ) {
    this.pool = pool;
    this.tableName = options.tableName || "jobs";
    if (!TABLE_NAME.test(this.tableName)) {
      throw new Error(`Invalid table name "${this.tableName}"`);
    }
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Initialize the database table and indexes if they don't exist
   */
  async initialize(): Promise<void> {
    const pending =
      this.initializing ??
      this.createSchema().catch((error: unknown) => {
        this.initializing = undefined;
        throw new StoreError("Failed to initialize job table", { cause: error });
      });
    this.initializing = pending;
    return pending;
  }

  async create<T>(
    jobType: string,
    payload: T,
    maxAttempts: number,
    timeoutMs: number,
    scheduledFor: Date | null = null,
  ): Promise<Job<T>> {
    const now = this.clock();
    const job: Job<T> = {
      id: generateId(),
      jobType,
      payload,
      status: "pending",
      attemptCount: 0,
      maxAttempts,
      timeoutMs,
      scheduledFor,
      dispatchedAt: null,
      ackDeadline: null,
      result: null,
      createdAt: now,
      updatedAt: now,
    };
    await this.query(
      `INSERT INTO ${this.tableName} (
        id, job_type, payload, status, attempt_count, max_attempts, timeout_ms, scheduled_for,
        created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        job.id,
        job.jobType,
        JSON.stringify(job.payload),
        job.status,
        job.attemptCount,
        job.maxAttempts,
        job.timeoutMs,
        job.scheduledFor,
        job.createdAt,
        job.updatedAt,
      ],
      "Error saving job",
    );
    return job;
  }

  async get(jobId: string): Promise<Job | null> {
    const rows = await this.query(
      `SELECT * FROM ${this.tableName} WHERE id = $1`,
      [jobId],
      "Error getting job",
    );
    return rows.length === 0 ? null : this.mapRowToJob(rows[0]);
  }

  async markDispatched(jobId: string, timeoutMs: number): Promise<Job> {
    return this.transition(jobId, (job) => applyDispatch(job, timeoutMs, this.clock()));
  }

  async markTerminal(
    jobId: string,
    outcome: JobOutcome,
    result: JobResult,
    expectedStatus: JobStatus = "dispatched",
  ): Promise<Job> {
    return this.transition(jobId, (job) =>
      applyTerminal(job, expectedStatus, outcome, result, this.clock()),
    );
  }

  async markRetryOrExpire(jobId: string, now: Date = this.clock()): Promise<Job> {
    return this.transition(jobId, (job) => applyRetryOrExpire(job, now));
  }

  findOverdue(now: Date, pageSize: number = DEFAULT_PAGE_SIZE): AsyncIterable<Job> {
    return this.scan("status = 'dispatched' AND ack_deadline < $1", [now], "ack_deadline", pageSize);
  }

  findStalled(olderThan: Date, pageSize: number = DEFAULT_PAGE_SIZE): AsyncIterable<Job> {
    return this.scan(
      "(status = 'retrying' OR (status = 'pending' AND scheduled_for IS NULL)) AND updated_at < $1",
      [olderThan],
      "updated_at",
      pageSize,
    );
  }

  findReady(now: Date, pageSize: number = DEFAULT_PAGE_SIZE): AsyncIterable<Job> {
    return this.scan(
      "status = 'pending' AND scheduled_for <= $1",
      [now],
      "scheduled_for",
      pageSize,
    );
  }

  async listRecent(limit: number): Promise<Job[]> {
    const rows = await this.query(
      `SELECT * FROM ${this.tableName} ORDER BY created_at DESC LIMIT $1`,
      [limit],
      "Error listing recent jobs",
    );
    return rows.map((row) => this.mapRowToJob(row));
  }

  async ping(): Promise<void> {
    try {
      await this.pool.query("SELECT 1");
    } catch (error) {
      throw new StoreError("Database is unreachable", { cause: error });
    }
  }

  private async createSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(`
        CREATE TABLE IF NOT EXISTS ${this.tableName} (
          id TEXT PRIMARY KEY,
          job_type TEXT NOT NULL,
          payload JSONB,
          status TEXT NOT NULL,
          attempt_count INTEGER NOT NULL DEFAULT 0,
          max_attempts INTEGER NOT NULL,
          timeout_ms BIGINT NOT NULL,
          scheduled_for TIMESTAMP WITH TIME ZONE,
          dispatched_at TIMESTAMP WITH TIME ZONE,
          ack_deadline TIMESTAMP WITH TIME ZONE,
          result JSONB,
          created_at TIMESTAMP WITH TIME ZONE NOT NULL,
          updated_at TIMESTAMP WITH TIME ZONE NOT NULL
        )
      `);

      await client.query(`
        CREATE INDEX IF NOT EXISTS ${this.tableName}_status_deadline_idx
        ON ${this.tableName} (status, ack_deadline)
      `);

      await client.query(`
        CREATE INDEX IF NOT EXISTS ${this.tableName}_status_updated_idx
        ON ${this.tableName} (status, updated_at)
      `);

      await client.query(`
        CREATE INDEX IF NOT EXISTS ${this.tableName}_status_scheduled_idx
        ON ${this.tableName} (status, scheduled_for)
      `);
    } finally {
      client.release();
    }
  }

  private async query(text: string, params: unknown[], failure: string): Promise<JobRow[]> {
    await this.initialize();
    try {
      const result = await this.pool.query(text, params);
      return result.rows;
    } catch (error) {
      this.logger.error(failure, { error });
      throw new StoreError(failure, { cause: error });
    }
  }

  /**
   * Locks the row, applies a transition and writes the result back.
   */
  private async transition(jobId: string, apply: (job: Job) => Job): Promise<Job> {
    await this.initialize();
    let client: JobDatabaseClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new StoreError("Could not acquire a database connection", { jobId, cause: error });
    }

    try {
      await client.query("BEGIN");
      const found = await client.query(
        `SELECT * FROM ${this.tableName} WHERE id = $1 FOR UPDATE`,
        [jobId],
      );
      if (found.rows.length === 0) {
        throw new NotFoundError(jobId);
      }

      const next = apply(this.mapRowToJob(found.rows[0]));
      await client.query(
        `UPDATE ${this.tableName} SET
          status = $2,
          attempt_count = $3,
          dispatched_at = $4,
          ack_deadline = $5,
          result = $6,
          updated_at = $7
        WHERE id = $1`,
        [
          next.id,
          next.status,
          next.attemptCount,
          next.dispatchedAt,
          next.ackDeadline,
          next.result ? JSON.stringify(next.result) : null,
          next.updatedAt,
        ],
      );
      await client.query("COMMIT");
      return next;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        this.logger.error("Error during rollback", { jobId, error: rollbackError });
      }
      if (error instanceof JobStoreError) {
        throw error;
      }
      throw new StoreError(`Error updating job ${jobId}`, { jobId, cause: error });
    } finally {
      client.release();
    }
  }

  /**
   * Keyset pagination over `(orderColumn, id)`; `filter` must only use `$1`.
   */
  private async *scan(
    filter: string,
    params: [Date],
    orderColumn: "ack_deadline" | "updated_at" | "scheduled_for",
    pageSize: number,
  ): AsyncIterable<Job> {
    let cursor: { at: Date; id: string } | null = null;
    while (true) {
      const rows: JobRow[] =
        cursor === null
          ? await this.query(
              `SELECT * FROM ${this.tableName} WHERE ${filter}
              ORDER BY ${orderColumn}, id LIMIT $2`,
              [...params, pageSize],
              "Error scanning jobs",
            )
          : await this.query(
              `SELECT * FROM ${this.tableName} WHERE ${filter}
              AND (${orderColumn}, id) > ($3, $4)
              ORDER BY ${orderColumn}, id LIMIT $2`,
              [...params, pageSize, cursor.at, cursor.id],
              "Error scanning jobs",
            );

      for (const row of rows) {
        yield this.mapRowToJob(row);
      }
      if (rows.length < pageSize) return;

      const last = rows[rows.length - 1];
      const at = last[orderColumn];
      if (at === null) return;
      cursor = { at, id: last.id };
    }
  }

  /**
   * Map a database row to a Job object
   */
  private mapRowToJob(row: JobRow): Job {
    if (!isJobStatus(row.status)) {
      throw new StoreError(`Job ${row.id} has unknown status "${row.status}"`, { jobId: row.id });
    }
    return {
      id: row.id,
      jobType: row.job_type,
      payload: row.payload,
      status: row.status,
      attemptCount: row.attempt_count,
      maxAttempts: row.max_attempts,
      timeoutMs: Number(row.timeout_ms),
      scheduledFor: row.scheduled_for ? new Date(row.scheduled_for) : null,
      dispatchedAt: row.dispatched_at ? new Date(row.dispatched_at) : null,
      ackDeadline: row.ack_deadline ? new Date(row.ack_deadline) : null,
      result: row.result,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
