import type { Trigger } from "../types";

export const INTERVAL_UNITS = ["milliseconds", "seconds", "minutes", "hours", "days", "weeks"] as const;

export type IntervalUnit = (typeof INTERVAL_UNITS)[number];

const UNIT_MS: Record<IntervalUnit, number> = {
  milliseconds: 1,
  seconds: 1000,
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
  weeks: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Fixed-interval trigger: fires `every` units after the previous fire.
 */
export function every(every: number, unit: IntervalUnit = "milliseconds"): Trigger {
  if (!Number.isFinite(every) || every <= 0) {
    throw new Error("Repeat interval must be greater than 0");
  }
  const intervalMs = every * UNIT_MS[unit];
  return {
    nextFireAfter: (last) => new Date(last.getTime() + intervalMs),
    describe: () => `every ${every} ${unit}`,
  };
}

/**
 * One-shot trigger firing once at `date`.
 */
export function at(date: Date): Trigger {
  const fireAt = new Date(date.getTime());
  if (Number.isNaN(fireAt.getTime())) {
    throw new Error("Invalid fire date");
  }
  return {
    nextFireAfter: (last) => (last.getTime() < fireAt.getTime() ? fireAt : null),
    describe: () => `at ${fireAt.toISOString()}`,
  };
}

/**
 * Computes the first fire time strictly after `now`, starting from `last`.
 * Returns `null` once the trigger is exhausted. A trigger that does not move
 * forward is rejected so the tick loop cannot spin.
 */
export function nextFireTime(trigger: Trigger, last: Date, now: Date): Date | null {
  let next = trigger.nextFireAfter(last);
  while (next !== null && next.getTime() <= now.getTime()) {
    const advanced = trigger.nextFireAfter(next);
    if (advanced !== null && advanced.getTime() <= next.getTime()) {
      throw new Error(`Trigger did not advance past ${next.toISOString()}`);
    }
    next = advanced;
  }
  return next;
}
