import { describe, it, expect, beforeEach } from "vitest";
import { ConflictError, NotFoundError, StoreError } from "../../src/errors";
import { PostgreSQLJobStore } from "../../src/store/postgresql-store";
import type { Job } from "../../src/types";
import { FakePool, jobRow } from "../mocks/pg-mock";
import { TestClock } from "../helpers";

async function collect(jobs: AsyncIterable<Job>): Promise<Job[]> {
  const result: Job[] = [];
  for await (const job of jobs) result.push(job);
  return result;
}

describe("PostgreSQLJobStore queries", () => {
  let pool: FakePool;
  let clock: TestClock;
  let store: PostgreSQLJobStore;

  beforeEach(() => {
    pool = new FakePool();
    clock = new TestClock();
    store = new PostgreSQLJobStore(pool, { tableName: "jobs", clock: clock.now });
  });

  it("should create the schema once and insert new rows", async () => {
    await store.create("report", { userId: 7 }, 3, 1000);
    await store.create("report", {}, 3, 1000, new Date("2025-01-01T00:05:00.000Z"));

    expect(pool.clients).toHaveLength(1);
    expect(pool.clients[0].statements()).toEqual(["CREATE", "CREATE", "CREATE", "CREATE"]);
    expect(pool.clients[0].released).toBe(true);

    const inserts = pool.queries.filter((query) => query.text.startsWith("INSERT"));
    expect(inserts).toHaveLength(2);
    expect(inserts[1].values.slice(1)).toEqual([
      "report",
      "{}",
      "pending",
      0,
      3,
      1000,
      new Date("2025-01-01T00:05:00.000Z"),
      clock.now(),
      clock.now(),
    ]);
  });

  it("should reject an unsafe table name", () => {
    expect(() => new PostgreSQLJobStore(pool, { tableName: "jobs; drop" })).toThrow(
      'Invalid table name "jobs; drop"',
    );
  });

  describe("transitions", () => {
    beforeEach(async () => {
      await store.initialize();
    });

    it("should lock, update and commit a dispatch", async () => {
      pool.on(/FOR UPDATE$/, [jobRow()]);
      clock.advance(500);

      const job = await store.markDispatched("job-1", 1000);

      const client = pool.clients[1];
      expect(client.statements()).toEqual(["BEGIN", "SELECT", "UPDATE", "COMMIT"]);
      expect(client.queries[1].values).toEqual(["job-1"]);
      expect(client.queries[2].values).toEqual([
        "job-1",
        "dispatched",
        1,
        new Date("2025-01-01T00:00:00.500Z"),
        new Date("2025-01-01T00:00:01.500Z"),
        null,
        new Date("2025-01-01T00:00:00.500Z"),
      ]);
      expect(client.released).toBe(true);
      expect(job.status).toBe("dispatched");
      expect(job.timeoutMs).toBe(1000);
    });

    it("should store the result of a terminal transition as JSON", async () => {
      pool.on(/FOR UPDATE$/, [
        jobRow({
          status: "dispatched",
          attempt_count: 1,
          dispatched_at: new Date("2025-01-01T00:00:00.000Z"),
          ack_deadline: new Date("2025-01-01T00:00:01.000Z"),
        }),
      ]);
      const result = {
        outcome: "success" as const,
        errorDetail: null,
        data: { rows: 3 },
        executionDurationMs: 40,
        reportedAt: "2025-01-01T00:00:00.000Z",
      };

      const job = await store.markTerminal("job-1", "success", result);

      expect(job.status).toBe("acknowledged");
      const update = pool.clients[1].queries[2];
      expect(update.values.slice(1, 6)).toEqual([
        "acknowledged",
        1,
        new Date("2025-01-01T00:00:00.000Z"),
        null,
        JSON.stringify(result),
      ]);
    });

    it("should roll back and surface a conflict", async () => {
      pool.on(/FOR UPDATE$/, [jobRow({ status: "acknowledged", attempt_count: 1 })]);

      await expect(store.markRetryOrExpire("job-1")).rejects.toBeInstanceOf(ConflictError);

      const client = pool.clients[1];
      expect(client.statements()).toEqual(["BEGIN", "SELECT", "ROLLBACK"]);
      expect(client.released).toBe(true);
    });

    it("should roll back when the row is missing", async () => {
      await expect(store.markDispatched("job-1", 1000)).rejects.toBeInstanceOf(NotFoundError);

      expect(pool.clients[1].statements()).toEqual(["BEGIN", "SELECT", "ROLLBACK"]);
    });

    it("should wrap a driver failure in StoreError after rolling back", async () => {
      const failure = new Error("connection reset");
      pool.on(/FOR UPDATE$/, [jobRow()]).on(/^UPDATE/, failure);

      const attempt = store.markDispatched("job-1", 1000);

      await expect(attempt).rejects.toBeInstanceOf(StoreError);
      await expect(attempt).rejects.toMatchObject({ message: "Error updating job job-1", cause: failure });
      expect(pool.clients[1].statements()).toEqual(["BEGIN", "SELECT", "UPDATE", "ROLLBACK"]);
      expect(pool.clients[1].released).toBe(true);
    });
  });

  describe("scans", () => {
    const now = new Date("2025-01-01T00:01:00.000Z");
    const overdue = ["a", "b", "c"].map((id, index) =>
      jobRow({
        id,
        status: "dispatched",
        attempt_count: 1,
        ack_deadline: new Date(Date.parse("2025-01-01T00:00:01.000Z") + index * 1000),
      }),
    );

    it("should page through rows with a keyset cursor", async () => {
      pool.on(/ack_deadline < \$1/, (values) => {
        if (values.length === 2) return overdue.slice(0, 2);
        const after = overdue.findIndex((row) => row.id === values[3]);
        return overdue.slice(after + 1, after + 3);
      });

      const jobs = await collect(store.findOverdue(now, 2));

      expect(jobs.map((job) => job.id)).toEqual(["a", "b", "c"]);
      const scans = pool.queries.filter((query) => query.text.startsWith("SELECT"));
      expect(scans.map((query) => query.values)).toEqual([
        [now, 2],
        [now, 2, new Date("2025-01-01T00:00:02.000Z"), "b"],
      ]);
      expect(scans[1].text).toContain("AND (ack_deadline, id) > ($3, $4)");
    });

    it("should ask for one more page after a full last page", async () => {
      pool.on(/ack_deadline < \$1/, (values) => (values.length === 2 ? overdue.slice(0, 3) : []));

      const jobs = await collect(store.findOverdue(now, 3));

      expect(jobs).toHaveLength(3);
      expect(pool.queries.filter((query) => query.text.startsWith("SELECT"))).toHaveLength(2);
    });

    it("should select due scheduled rows in schedule order", async () => {
      await collect(store.findReady(now));

      expect(pool.queries).toEqual([
        {
          text: "SELECT * FROM jobs WHERE status = 'pending' AND scheduled_for <= $1 ORDER BY scheduled_for, id LIMIT $2",
          values: [now, 100],
        },
      ]);
    });

    it("should leave scheduled pending rows out of the stalled scan", async () => {
      await collect(store.findStalled(now));

      expect(pool.queries[0].text).toContain(
        "WHERE (status = 'retrying' OR (status = 'pending' AND scheduled_for IS NULL)) AND updated_at < $1",
      );
    });
  });

  describe("row mapping", () => {
    it("should read a BIGINT timeout and the schedule back", async () => {
      pool.on(/WHERE id = \$1$/, [
        jobRow({ timeout_ms: "2592000000", scheduled_for: new Date("2025-02-01T00:00:00.000Z") }),
      ]);

      const job = await store.get("job-1");

      expect(job?.timeoutMs).toBe(2592000000);
      expect(job?.scheduledFor).toEqual(new Date("2025-02-01T00:00:00.000Z"));
    });

    it("should reject a row with an unknown status", async () => {
      pool.on(/WHERE id = \$1$/, [jobRow({ status: "archived" })]);

      await expect(store.get("job-1")).rejects.toBeInstanceOf(StoreError);
    });

    it("should wrap a failed ping in StoreError", async () => {
      pool.on(/^SELECT 1$/, new Error("ECONNREFUSED"));

      await expect(store.ping()).rejects.toThrow("Database is unreachable");
    });
  });
});
