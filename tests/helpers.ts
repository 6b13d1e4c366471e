import type { JobResult } from "../src/types";

/**
 * Manually advanced clock shared by stores and engine components under test.
 */
export class TestClock {
  private current: number;

  constructor(start: string = "2025-01-01T00:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): Date {
    this.current += ms;
    return this.now();
  }
}

export function successResult(reportedAt: Date, data: unknown = null): JobResult {
  return {
    outcome: "success",
    errorDetail: null,
    data,
    executionDurationMs: 12,
    reportedAt: reportedAt.toISOString(),
  };
}
