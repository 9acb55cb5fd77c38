import type { MemoryScope } from "./types.js";

const HOUR_MS = 3_600_000;

export const HALF_LIFE_HOURS: Readonly<Record<MemoryScope, number>> = {
  working: 1,
  project: 24 * 7,
  skill: 24 * 30,
  failure: 24,
};

export function decayRate(scope: MemoryScope): number {
  return Math.LN2 / HALF_LIFE_HOURS[scope];
}

/**
 * Current strength of an entry: initial confidence decayed exponentially by the
 * hours since creation. Clock skew never raises strength above the initial value.
 */
export function strengthAt(
  initialConfidence: number,
  scope: MemoryScope,
  createdAt: Date,
  now: Date,
): number {
  const hoursElapsed = Math.max(0, (now.getTime() - createdAt.getTime()) / HOUR_MS);
  return initialConfidence * Math.exp(-decayRate(scope) * hoursElapsed);
}
