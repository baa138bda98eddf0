import { z } from 'zod';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';

// ── Constraints ─────────────────────────────────────────────

export const taskConstraintsSchema = z.object({
  allowedDomains: z.array(z.string().min(1)).optional(),
  additionalInfo: z.string().optional(),
});

export type TaskConstraints = z.infer<typeof taskConstraintsSchema>;

// ── Task ────────────────────────────────────────────────────

export const taskSchema = z.object({
  instruction: z.string().trim().min(1),
  maxSteps: z.number().int().positive().default(LIMITS.MAX_STEPS),
  stepTimeoutMs: z.number().int().positive().default(TIMEOUTS.STEP_TIMEOUT),
  startUrl: z.string().url().optional(),
  constraints: taskConstraintsSchema.optional(),
});

export type Task = Readonly<z.infer<typeof taskSchema>>;
export type TaskInput = z.input<typeof taskSchema>;

/** Validate caller input and freeze it; a Task is read-only from here on. */
export function createTask(input: TaskInput): Task {
  const task = taskSchema.parse(input);

  if (task.constraints) {
    if (task.constraints.allowedDomains) {
      Object.freeze(task.constraints.allowedDomains);
    }
    Object.freeze(task.constraints);
  }

  return Object.freeze(task);
}

// ── Domain allow-list ───────────────────────────────────────

export function isUrlAllowed(task: Task, url: string): boolean {
  const allowed = task.constraints?.allowedDomains;
  if (!allowed || allowed.length === 0) return true;

  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }

  return allowed.some((domain) => {
    const d = domain.toLowerCase();
    return hostname === d || hostname.endsWith(`.${d}`);
  });
}
