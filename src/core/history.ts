import type { Step } from '../schema/index.js';

// ── Immutable step records ──────────────────────────────────

function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/** Detach a step from whatever produced it and freeze it for the history. */
export function freezeStep(step: Step): Readonly<Step> {
  return deepFreeze(structuredClone(step));
}

/** Mutable copies for callers outside the run. */
export function copySteps(steps: readonly Step[]): Step[] {
  return structuredClone(steps.slice());
}

export function lastN<T>(items: readonly T[], n: number): T[] {
  return n <= 0 ? [] : items.slice(-n);
}
