import { describe, it, expect, beforeEach } from "vitest";
import type { TriggerInfo } from "../../src/engine/scheduler";
import { createHealthApp, type HealthSource } from "../../src/http/health";
import type { Job } from "../../src/types";

class FakeHealthSource implements HealthSource {
  broker = true;
  store = true;
  running = true;
  jobs: Job[] = [];
  limits: number[] = [];

  brokerConnected(): boolean {
    return this.broker;
  }

  async storeReachable(): Promise<boolean> {
    return this.store;
  }

  schedulerRunning(): boolean {
    return this.running;
  }

  triggers(): TriggerInfo[] {
    return [
      {
        name: "check_pending_jobs",
        trigger: "every 10000 milliseconds",
        nextFireAt: "2025-01-01T00:00:10.000Z",
        running: false,
      },
    ];
  }

  async recentJobs(limit: number): Promise<Job[]> {
    this.limits.push(limit);
    return this.jobs.slice(0, limit);
  }
}

describe("health app", () => {
  let source: FakeHealthSource;
  let app: ReturnType<typeof createHealthApp>;

  beforeEach(() => {
    source = new FakeHealthSource();
    app = createHealthApp(source, { service: "relay-scheduler", version: "1.2.3" });
  });

  it("should describe the service at the root", async () => {
    const res = await app.request("/");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ service: "relay-scheduler", version: "1.2.3", status: "running" });
  });

  it("should report healthy when broker and store are up", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "healthy",
      service: "relay-scheduler",
      broker: "connected",
      store: "reachable",
      timestamp: expect.any(String),
    });
  });

  it("should report 503 when the broker is down", async () => {
    source.broker = false;

    const res = await app.request("/health");

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: "unhealthy", broker: "disconnected", store: "reachable" });
  });

  it("should report 503 when the store is unreachable", async () => {
    source.store = false;

    const res = await app.request("/health");

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: "unhealthy", store: "unreachable" });
  });

  it("should list the scheduler triggers", async () => {
    const res = await app.request("/health/scheduler");

    expect(await res.json()).toEqual({
      status: "running",
      running: true,
      jobs: [
        {
          name: "check_pending_jobs",
          trigger: "every 10000 milliseconds",
          nextFireAt: "2025-01-01T00:00:10.000Z",
          running: false,
        },
      ],
    });
  });

  it("should return recent jobs with the default limit", async () => {
    source.jobs = [
      {
        id: "job-1",
        jobType: "report",
        payload: {},
        status: "acknowledged",
        attemptCount: 1,
        maxAttempts: 3,
        timeoutMs: 1000,
        scheduledFor: null,
        dispatchedAt: new Date("2025-01-01T00:00:00.000Z"),
        ackDeadline: null,
        result: null,
        createdAt: new Date("2025-01-01T00:00:00.000Z"),
        updatedAt: new Date("2025-01-01T00:00:00.500Z"),
      },
    ];

    const res = await app.request("/jobs/recent");

    expect(source.limits).toEqual([20]);
    expect(await res.json()).toMatchObject({
      jobs: [{ id: "job-1", status: "acknowledged", createdAt: "2025-01-01T00:00:00.000Z" }],
    });
  });

  it("should reject an out-of-range limit", async () => {
    const res = await app.request("/jobs/recent?limit=500");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "limit must be an integer between 1 and 100" });
    expect(source.limits).toEqual([]);
  });
});
