import type { JobDatabase, JobDatabaseClient, JobRow } from "../../src/store/postgresql-store";

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

type Reply = JobRow[] | Error | ((values: unknown[]) => JobRow[]);

function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Stand-in for a pg Pool. Queries are recorded per pool or per checked-out
 * client and answered by the first rule whose pattern matches the SQL text;
 * unmatched queries return no rows.
 */
export class FakePool implements JobDatabase {
  readonly queries: RecordedQuery[] = [];
  readonly clients: FakeClient[] = [];
  private readonly rules: { pattern: RegExp; reply: Reply }[] = [];

  on(pattern: RegExp, reply: Reply): this {
    this.rules.push({ pattern, reply });
    return this;
  }

  async query(text: string, values: unknown[] = []): Promise<{ rows: JobRow[] }> {
    this.queries.push({ text: normalize(text), values });
    return { rows: this.answer(text, values) };
  }

  async connect(): Promise<FakeClient> {
    const client = new FakeClient(this);
    this.clients.push(client);
    return client;
  }

  answer(text: string, values: unknown[]): JobRow[] {
    const rule = this.rules.find(({ pattern }) => pattern.test(normalize(text)));
    if (!rule) return [];
    if (rule.reply instanceof Error) throw rule.reply;
    return typeof rule.reply === "function" ? rule.reply(values) : rule.reply;
  }
}

export class FakeClient implements JobDatabaseClient {
  readonly queries: RecordedQuery[] = [];
  released: boolean = false;

  constructor(private readonly pool: FakePool) {}

  async query(text: string, values: unknown[] = []): Promise<{ rows: JobRow[] }> {
    this.queries.push({ text: normalize(text), values });
    return { rows: this.pool.answer(text, values) };
  }

  release(): void {
    this.released = true;
  }

  // First keyword of every statement, e.g. ["BEGIN", "SELECT", "UPDATE", "COMMIT"]
  statements(): string[] {
    return this.queries.map((query) => query.text.split(" ")[0]);
  }
}

export function jobRow(overrides: Partial<JobRow> = {}): JobRow {
  return {
    id: "job-1",
    job_type: "report",
    payload: { userId: 7 },
    status: "pending",
    attempt_count: 0,
    max_attempts: 3,
    timeout_ms: "1000",
    scheduled_for: null,
    dispatched_at: null,
    ack_deadline: null,
    result: null,
    created_at: new Date("2025-01-01T00:00:00.000Z"),
    updated_at: new Date("2025-01-01T00:00:00.000Z"),
    ...overrides,
  };
}
