import { Hono } from "hono";
import type { TriggerInfo } from "../engine/scheduler";
import type { Job } from "../types";

export interface HealthSource {
  brokerConnected(): boolean;
  storeReachable(): Promise<boolean>;
  schedulerRunning(): boolean;
  triggers(): TriggerInfo[];
  recentJobs(limit: number): Promise<Job[]>;
}

export interface HealthAppOptions {
  service: string;
  version: string;
  maxRecentJobs?: number;
}

const DEFAULT_RECENT_JOBS = 20;

export const createHealthApp = (source: HealthSource, options: HealthAppOptions) => {
  const app = new Hono();
  const maxRecentJobs = options.maxRecentJobs || 100;

  app.get("/", (c) =>
    c.json({ service: options.service, version: options.version, status: "running" }),
  );

  app.get("/health", async (c) => {
    const broker = source.brokerConnected();
    const store = await source.storeReachable();
    const healthy = broker && store;
    return c.json(
      {
        status: healthy ? "healthy" : "unhealthy",
        service: options.service,
        broker: broker ? "connected" : "disconnected",
        store: store ? "reachable" : "unreachable",
        timestamp: new Date().toISOString(),
      },
      healthy ? 200 : 503,
    );
  });

  app.get("/health/scheduler", (c) => {
    const running = source.schedulerRunning();
    return c.json({
      status: running ? "running" : "stopped",
      running,
      jobs: source.triggers(),
    });
  });

  app.get("/jobs/recent", async (c) => {
    const raw = c.req.query("limit");
    const limit = raw === undefined ? DEFAULT_RECENT_JOBS : Number(raw);
    if (!Number.isInteger(limit) || limit < 1 || limit > maxRecentJobs) {
      return c.json({ error: `limit must be an integer between 1 and ${maxRecentJobs}` }, 400);
    }
    const jobs = await source.recentJobs(limit);
    return c.json({ jobs });
  });

  return app;
};
