import type { JobOutcome, JobStatus } from "./types";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["dispatched"],
  dispatched: ["acknowledged", "failed", "retrying", "expired"],
  retrying: ["dispatched"],
  acknowledged: [],
  failed: [],
  expired: [],
};

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === "string" && Object.hasOwn(TRANSITIONS, value);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

// Statuses from which a job may be (re)published
export function isDispatchable(status: JobStatus): boolean {
  return canTransition(status, "dispatched");
}

export function statusForOutcome(outcome: JobOutcome): JobStatus {
  return outcome === "success" ? "acknowledged" : "failed";
}
