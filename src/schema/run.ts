import { z } from 'zod';

import { browserActionSchema } from './action.js';
import { observationSchema } from './observation.js';

// ── Lifecycle phase ─────────────────────────────────────────

export const runPhaseSchema = z.enum([
  'pending',
  'running',
  'succeeded',
  'failed',
  'cancelled',
]);

export type RunPhase = z.infer<typeof runPhaseSchema>;

export type TerminalPhase = Extract<RunPhase, 'succeeded' | 'failed' | 'cancelled'>;

export function isTerminalPhase(phase: RunPhase): phase is TerminalPhase {
  return phase === 'succeeded' || phase === 'failed' || phase === 'cancelled';
}

// ── Model decision ──────────────────────────────────────────

export const actionDecisionSchema = z.object({
  type: z.literal('action'),
  action: browserActionSchema,
  reasoning: z.string().optional(),
});

export const doneDecisionSchema = z.object({
  type: z.literal('done'),
  result: z.string(),
});

export const modelDecisionSchema = z.discriminatedUnion('type', [
  actionDecisionSchema,
  doneDecisionSchema,
]);

export type ModelDecision = z.infer<typeof modelDecisionSchema>;
export type ActionDecision = z.infer<typeof actionDecisionSchema>;
export type DoneDecision = z.infer<typeof doneDecisionSchema>;

// ── Step ────────────────────────────────────────────────────

export const stepErrorSchema = z.object({
  kind: z.enum(['ModelError', 'ActionError']),
  message: z.string(),
  fatal: z.boolean(),
});

export type StepError = z.infer<typeof stepErrorSchema>;

/**
 * One decide/act cycle. Timestamps are monotonic epoch milliseconds.
 * `action` is null when the cycle ended without one (done, or the
 * model never produced a usable decision).
 */
export const stepSchema = z.object({
  sequence: z.number().int().nonnegative(),
  action: browserActionSchema.nullable(),
  reasoning: z.string().optional(),
  observation: observationSchema.nullable(),
  decideStartedAt: z.number().nonnegative(),
  actStartedAt: z.number().nonnegative().optional(),
  actEndedAt: z.number().nonnegative().optional(),
  decideAttempts: z.number().int().positive(),
  decideErrors: z.array(z.string()),
  error: stepErrorSchema.optional(),
});

export type Step = z.infer<typeof stepSchema>;

// ── Outcome ─────────────────────────────────────────────────

export const failureReasonSchema = z.enum([
  'ModelError',
  'ActionError',
  'SessionFatal',
  'StepLimitExceeded',
  'Internal',
]);

export type FailureReason = z.infer<typeof failureReasonSchema>;

export const cancelReasonSchema = z.enum(['user', 'run-timeout', 'shutdown']);

export type CancelReason = z.infer<typeof cancelReasonSchema>;

export const runOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('succeeded'), result: z.string() }),
  z.object({
    status: z.literal('failed'),
    reason: failureReasonSchema,
    message: z.string(),
  }),
  z.object({ status: z.literal('cancelled'), reason: cancelReasonSchema }),
]);

export type RunOutcome = z.infer<typeof runOutcomeSchema>;

// ── Read-only views ─────────────────────────────────────────

export const runSnapshotSchema = z.object({
  runId: z.string().min(1),
  slot: z.string().min(1),
  instruction: z.string(),
  phase: runPhaseSchema,
  stepCount: z.number().int().nonnegative(),
  recentSteps: z.array(stepSchema),
  outcome: runOutcomeSchema.nullable(),
  lastError: z.string().optional(),
  createdAt: z.string().datetime(),
  startedAt: z.string().datetime().optional(),
  finishedAt: z.string().datetime().optional(),
});

export type RunSnapshot = z.infer<typeof runSnapshotSchema>;

export const runSummarySchema = z.object({
  runId: z.string().min(1),
  slot: z.string().min(1),
  instruction: z.string(),
  outcome: runOutcomeSchema,
  steps: z.array(stepSchema),
  createdAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type RunSummary = z.infer<typeof runSummarySchema>;
