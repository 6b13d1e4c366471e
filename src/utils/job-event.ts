import type { Job, JobStatus } from "../types";

export type JobEventType =
  | "scheduled"
  | "dispatched"
  | "publish-failed"
  | "acknowledged"
  | "failed"
  | "expired";

export interface JobEventData {
  job: Job;
  status: JobStatus;
  error?: string;
}

// Extend standard Event with the job that caused it
export class JobEvent extends Event {
  public readonly data: JobEventData;
  constructor(type: JobEventType, data: JobEventData) {
    super(type);
    this.data = data;
  }
}

/**
 * Subscribes to a job event on any engine component, narrowing the listener
 * argument to JobEvent.
 */
export function onJobEvent(
  target: EventTarget,
  type: JobEventType,
  listener: (event: JobEvent) => void,
): () => void {
  const wrapped = (event: Event) => {
    if (event instanceof JobEvent) listener(event);
  };
  target.addEventListener(type, wrapped);
  return () => target.removeEventListener(type, wrapped);
}
