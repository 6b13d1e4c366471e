import { errorKind, errorMessage } from "../errors";
import type { PeriodicDefinition, Trigger } from "../types";
import { type Logger, silentLogger } from "../utils/logger";
import { nextFireTime } from "../utils/triggers";
import { JobExecutor } from "./job-executor";

interface TriggerEntry {
  name: string;
  trigger: Trigger;
  fire: () => Promise<void>;
  nextFireAt: Date;
  running: boolean;
}

export interface TriggerInfo {
  name: string;
  trigger: string;
  nextFireAt: string;
  running: boolean;
}

/**
 * Single tick loop driving periodic job definitions and internal recurring
 * tasks such as the periodic checker's sweep.
 */
export class Scheduler {
  private readonly executor: JobExecutor;
  private readonly entries: Map<string, TriggerEntry> = new Map();
  private readonly inFlight: Set<Promise<void>> = new Set();
  private readonly tickIntervalMs: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private intervalId?: NodeJS.Timeout;

  constructor(
    executor: JobExecutor,
    options: { tickIntervalMs?: number; clock?: () => Date; logger?: Logger } = {},
  ) {
    this.executor = executor;
    this.tickIntervalMs = options.tickIntervalMs || 1000;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  // Register a periodic job definition, replacing any entry with the same name
  addPeriodic<T>(definition: PeriodicDefinition<T>): void {
    this.register(definition.name, definition.trigger, async () => {
      const request = definition.createJob();
      await this.executor.dispatch(
        request.jobType,
        request.payload,
        request.maxAttempts,
        request.timeoutMs,
        request.scheduledFor,
      );
    });
  }

  // Register a recurring task that runs in-process instead of creating a job
  addTask(name: string, trigger: Trigger, run: () => Promise<unknown>): void {
    this.register(name, trigger, async () => {
      await run();
    });
  }

  start(): void {
    if (this.intervalId) return;
    this.logger.info("Starting scheduler", { triggers: this.entries.size });
    for (const info of this.describe()) {
      this.logger.info("Scheduled", { ...info });
    }
    this.intervalId = setInterval(() => this.tick(), this.tickIntervalMs);
  }

  /**
   * Stops the tick loop and waits for fires that are still running.
   */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }
    await Promise.all(this.inFlight);
    this.logger.info("Scheduler stopped");
  }

  isRunning(): boolean {
    return this.intervalId !== undefined;
  }

  /**
   * Fires every entry that is due at `now` exactly once. A missed window is
   * not backfilled: the next fire time is the first slot of the trigger's
   * schedule after `now`. Entries whose trigger is exhausted or throws are
   * dropped. Returns the fires started by this tick.
   */
  tick(now: Date = this.clock()): Promise<void>[] {
    const started: Promise<void>[] = [];
    for (const entry of this.entries.values()) {
      if (entry.nextFireAt.getTime() > now.getTime()) continue;

      if (entry.running) {
        this.logger.warn("Previous run still in progress, skipping", { name: entry.name });
      } else {
        started.push(this.fire(entry));
      }
      this.advance(entry, now);
    }
    return started;
  }

  describe(): TriggerInfo[] {
    return Array.from(this.entries.values()).map((entry) => ({
      name: entry.name,
      trigger: entry.trigger.describe?.() ?? "custom",
      nextFireAt: entry.nextFireAt.toISOString(),
      running: entry.running,
    }));
  }

  private register(name: string, trigger: Trigger, fire: () => Promise<void>): void {
    const now = this.clock();
    const nextFireAt = nextFireTime(trigger, now, now);
    if (this.entries.has(name)) {
      this.logger.info("Replacing existing trigger", { name });
      this.entries.delete(name);
    }
    if (nextFireAt === null) {
      this.logger.warn("Trigger has no future fire time, not scheduled", { name });
      return;
    }
    this.entries.set(name, { name, trigger, fire, nextFireAt, running: false });
  }

  private advance(entry: TriggerEntry, now: Date): void {
    let next: Date | null;
    try {
      next = nextFireTime(entry.trigger, entry.nextFireAt, now);
    } catch (error) {
      this.logger.error("Trigger failed, removing entry", {
        name: entry.name,
        kind: errorKind(error),
        error: errorMessage(error),
      });
      this.entries.delete(entry.name);
      return;
    }
    if (next === null) {
      this.logger.info("Trigger exhausted, removing entry", { name: entry.name });
      this.entries.delete(entry.name);
      return;
    }
    entry.nextFireAt = next;
  }

  private fire(entry: TriggerEntry): Promise<void> {
    entry.running = true;
    const run = (async () => {
      try {
        await entry.fire();
      } catch (error) {
        this.logger.error("Scheduled run failed", {
          name: entry.name,
          kind: errorKind(error),
          error: errorMessage(error),
        });
      } finally {
        entry.running = false;
      }
    })();
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
    return run;
  }
}
