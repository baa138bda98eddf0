import { z } from 'zod';

// ── Per-step page capture ────────────────────────────────────

export const consoleEntrySchema = z.object({
  level: z.enum(['error', 'warn']),
  text: z.string(),
});

export type ConsoleEntry = z.infer<typeof consoleEntrySchema>;

export const networkFailureSchema = z.object({
  url: z.string(),
  status: z.number().int(),
  method: z.string(),
});

export type NetworkFailure = z.infer<typeof networkFailureSchema>;

export const pageCaptureSchema = z.object({
  consoleEntries: z.array(consoleEntrySchema),
  networkFailures: z.array(networkFailureSchema),
  pageErrors: z.array(z.string()),
});

export type PageCapture = z.infer<typeof pageCaptureSchema>;

// ── Interactive elements ────────────────────────────────────

export const interactiveElementSchema = z.object({
  tag: z.string().min(1),
  type: z.string().optional(),
  text: z.string().optional(),
  testId: z.string().optional(),
  name: z.string().optional(),
  placeholder: z.string().optional(),
  href: z.string().optional(),
  options: z.array(z.string()).optional(),
});

export type InteractiveElement = z.infer<typeof interactiveElementSchema>;

// ── Observation ──────────────────────────────────────────────

/**
 * What the browser reports back after an action. Screenshot bytes are
 * not part of it; they ride along in `ActionResult` and go straight to
 * the recording sink.
 */
export const observationSchema = z.object({
  url: z.string(),
  title: z.string(),
  visibleText: z.string(),
  elements: z.array(interactiveElementSchema).optional(),
  capture: pageCaptureSchema.optional(),
});

export type Observation = z.infer<typeof observationSchema>;

export interface ActionResult {
  observation: Observation;
  screenshot?: Buffer | undefined;
}
