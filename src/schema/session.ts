import { z } from 'zod';

import { BROWSER_DEFAULTS } from '../config/defaults.js';

// ── Requirements ────────────────────────────────────────────

export const sessionRequirementsSchema = z.object({
  headless: z.boolean().default(true),
  windowWidth: z.number().int().positive().default(BROWSER_DEFAULTS.WINDOW_WIDTH),
  windowHeight: z.number().int().positive().default(BROWSER_DEFAULTS.WINDOW_HEIGHT),
  disableSecurity: z.boolean().default(false),
  cdpUrl: z.string().url().optional(),
  chromePath: z.string().min(1).optional(),
  userDataDir: z.string().min(1).optional(),
  extraArgs: z.array(z.string()).default([]),
  recordingsDir: z.string().min(1).optional(),
  tracesDir: z.string().min(1).optional(),
});

export type SessionRequirements = z.infer<typeof sessionRequirementsSchema>;
export type SessionRequirementsInput = z.input<typeof sessionRequirementsSchema>;

export function parseSessionRequirements(
  input: SessionRequirementsInput = {},
): SessionRequirements {
  return sessionRequirementsSchema.parse(input);
}

/**
 * Stable key for matching a free session against a request.
 * Two requirement sets with the same key are interchangeable.
 */
export function requirementsKey(requirements: SessionRequirements): string {
  const entries = Object.entries(requirements)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));
  return JSON.stringify(entries);
}

// ── Pool record ─────────────────────────────────────────────

export const FREE_HOLDER = 'free';

export const sessionHealthSchema = z.enum(['healthy', 'unhealthy', 'terminated']);

export type SessionHealth = z.infer<typeof sessionHealthSchema>;

export interface BrowserSessionRecord {
  id: string;
  /** Run id of the current holder, or `FREE_HOLDER`. */
  holder: string;
  health: SessionHealth;
  createdAt: number;
  lastReleasedAt: number | null;
  requirementsKey: string;
}
