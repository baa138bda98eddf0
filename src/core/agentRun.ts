import { randomUUID } from 'node:crypto';

import type {
  ActionDecision,
  CancelReason,
  ModelDecision,
  Observation,
  RetryPolicy,
  RunOutcome,
  RunPhase,
  RunSnapshot,
  RunSummary,
  Step,
  StepError,
  Task,
} from '../schema/index.js';
import { describeAction, isTerminalPhase, isUrlAllowed } from '../schema/index.js';
import { LIMITS, RETRY } from '../config/defaults.js';
import type { ReleaseOutcome, SessionHandle } from '../browser/manager.js';
import type { ConversationState, ModelClient } from '../llm/model.js';
import type { RecordingSink } from '../report/sink.js';
import * as log from '../utils/logger.js';
import { backoffDelay, delay, monotonicNow, withTimeout } from '../utils/timing.js';
import {
  CancelledError,
  StepLimitExceededError,
  errorMessage,
  isSessionFatal,
} from './errors.js';
import { copySteps, freezeStep, lastN } from './history.js';

// ── Public types ─────────────────────────────────────────────

export interface AgentRunOptions {
  retry?: RetryPolicy | undefined;
  recordingSink?: RecordingSink | undefined;
}

export interface AgentRunInit {
  id?: string | undefined;
  slot: string;
  task: Task;
  options?: AgentRunOptions | undefined;
}

/** Returns the session to its owner. Called exactly once per bound run. */
export type ReleaseSession = (outcome: ReleaseOutcome) => void;

// ── Internal types ───────────────────────────────────────────

interface Binding {
  handle: SessionHandle;
  model: ModelClient;
}

type DecideResult =
  | { kind: 'decided'; decision: ModelDecision; attempts: number; errors: string[] }
  | { kind: 'exhausted'; attempts: number; errors: string[] }
  | { kind: 'cancelled' };

type ActResult =
  | { kind: 'ok'; observation: Observation; screenshot: Buffer | undefined }
  | { kind: 'recoverable'; error: StepError }
  | { kind: 'fatal'; error: StepError }
  | { kind: 'interrupted'; error: StepError };

const DEFAULT_RETRY: RetryPolicy = {
  budget: RETRY.BUDGET,
  baseDelayMs: RETRY.BASE_DELAY,
  maxDelayMs: RETRY.MAX_DELAY,
};

// ── AgentRun ─────────────────────────────────────────────────

/**
 * One task executed against one browser session.
 *
 *   pending ──bind──▶ running ──▶ succeeded | failed | cancelled
 *
 * The step loop is sequential. Every external call (model decision,
 * browser action) is bounded by the task's step timeout and abandoned as
 * soon as the run is cancelled. The session is released before the run
 * reaches a terminal phase.
 */
export class AgentRun {
  readonly id: string;
  readonly slot: string;
  readonly task: Task;
  readonly done: Promise<RunOutcome>;

  private readonly retry: RetryPolicy;
  private readonly sink: RecordingSink | undefined;
  private readonly controller = new AbortController();
  private readonly steps: Readonly<Step>[] = [];
  private readonly createdAt = new Date();

  private phaseValue: RunPhase = 'pending';
  private outcomeValue: RunOutcome | null = null;
  private cancelReason: CancelReason | null = null;
  private lastError: string | undefined;
  private startedAt: Date | undefined;
  private finishedAt: Date | undefined;

  private binding: Binding | null = null;
  private releaseSession: ReleaseSession | null = null;
  private loopStarted = false;

  private lastTimestamp = 0;
  private consecutiveFailures = 0;
  private lastObservation: Observation | null = null;
  private lastScreenshot: Buffer | undefined;

  private settle: (outcome: RunOutcome) => void = () => undefined;

  constructor(init: AgentRunInit) {
    this.id = init.id ?? randomUUID();
    this.slot = init.slot;
    this.task = init.task;
    this.retry = init.options?.retry ?? DEFAULT_RETRY;
    this.sink = init.options?.recordingSink;
    this.done = new Promise<RunOutcome>((resolve) => {
      this.settle = resolve;
    });
  }

  // ── Accessors ──────────────────────────────────────────────

  get phase(): RunPhase {
    return this.phaseValue;
  }

  get outcome(): RunOutcome | null {
    return this.outcomeValue;
  }

  /** Aborts when the run is cancelled; pass it to anything the run waits on. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stepCount(): number {
    return this.steps.length;
  }

  get cancelRequested(): boolean {
    return this.cancelReason !== null;
  }

  // ── Lifecycle ──────────────────────────────────────────────

  /**
   * Attach the session and model. A run cancelled while pending goes
   * straight to `cancelled` and hands the session back.
   */
  bind(handle: SessionHandle, model: ModelClient, release: ReleaseSession): void {
    if (this.binding !== null || this.releaseSession !== null) {
      throw new Error(`Run ${this.id} is already bound`);
    }

    this.releaseSession = release;

    if (isTerminalPhase(this.phaseValue)) {
      this.release({ clean: true });
      return;
    }

    if (this.cancelReason !== null) {
      this.finish({ status: 'cancelled', reason: this.cancelReason }, { clean: true });
      return;
    }

    this.binding = { handle, model };
    this.phaseValue = 'running';
    this.startedAt = new Date();
    log.run(`Run ${this.id} started on ${handle.sessionId}: ${this.task.instruction}`);
  }

  /**
   * Drive the step loop to a terminal phase. Never rejects: anything
   * unexpected becomes `failed` with reason `Internal`.
   */
  async execute(): Promise<RunOutcome> {
    const binding = this.binding;
    if (binding === null || this.loopStarted || this.phaseValue !== 'running') {
      return this.done;
    }
    this.loopStarted = true;

    try {
      await this.loop(binding);
    } catch (err) {
      log.error(`Run ${this.id} crashed: ${errorMessage(err)}`);
      this.finish(
        { status: 'failed', reason: 'Internal', message: errorMessage(err) },
        { clean: false, reason: 'internal error' },
      );
    }

    return this.done;
  }

  /** Request cancellation. Idempotent; has no effect on a terminal run. */
  cancel(reason: CancelReason = 'user'): void {
    if (isTerminalPhase(this.phaseValue) || this.cancelReason !== null) return;

    this.cancelReason = reason;
    log.run(`Cancelling run ${this.id} (${reason})`);
    this.controller.abort();
  }

  /**
   * End a run that never got a session. Reports `cancelled` if
   * cancellation was already requested, `outcome` otherwise.
   */
  abandon(outcome: RunOutcome): void {
    if (this.phaseValue !== 'pending') return;

    const final: RunOutcome =
      this.cancelReason !== null ? { status: 'cancelled', reason: this.cancelReason } : outcome;
    this.finish(final, { clean: true });
  }

  // ── Views ──────────────────────────────────────────────────

  snapshot(recentSteps: number = LIMITS.SNAPSHOT_RECENT_STEPS): RunSnapshot {
    return structuredClone({
      runId: this.id,
      slot: this.slot,
      instruction: this.task.instruction,
      phase: this.phaseValue,
      stepCount: this.steps.length,
      recentSteps: lastN(this.steps, recentSteps),
      outcome: this.outcomeValue,
      ...(this.lastError !== undefined ? { lastError: this.lastError } : {}),
      createdAt: this.createdAt.toISOString(),
      ...(this.startedAt ? { startedAt: this.startedAt.toISOString() } : {}),
      ...(this.finishedAt ? { finishedAt: this.finishedAt.toISOString() } : {}),
    });
  }

  history(): Step[] {
    return copySteps(this.steps);
  }

  /** Full record of a finished run; null while it is still going. */
  summary(): RunSummary | null {
    if (this.outcomeValue === null || this.finishedAt === undefined) return null;

    return {
      runId: this.id,
      slot: this.slot,
      instruction: this.task.instruction,
      outcome: structuredClone(this.outcomeValue),
      steps: this.history(),
      createdAt: this.createdAt.toISOString(),
      finishedAt: this.finishedAt.toISOString(),
      durationMs: Math.max(0, this.finishedAt.getTime() - this.createdAt.getTime()),
    };
  }

  // ── Step loop ──────────────────────────────────────────────

  private async loop({ handle, model }: Binding): Promise<void> {
    const { maxSteps } = this.task;

    while (this.phaseValue === 'running' && this.steps.length < maxSteps) {
      if (this.cancelReason !== null) {
        this.finishCancelled(true);
        return;
      }

      const sequence = this.steps.length;
      const decideStartedAt = this.tick();

      // ── DECIDE ─────────────────────────────────────────
      const { startUrl } = this.task;
      let decided: DecideResult;
      if (sequence === 0 && startUrl !== undefined) {
        decided = openStartUrl(startUrl);
      } else {
        log.llm(`Run ${this.id} deciding step ${String(sequence + 1)}/${String(maxSteps)}`);
        decided = await this.decide(model);
      }

      if (decided.kind === 'cancelled') {
        this.finishCancelled(true);
        return;
      }

      if (decided.kind === 'exhausted') {
        const message = decided.errors[decided.errors.length - 1] ?? 'Model decision failed';
        await this.appendStep({
          sequence,
          action: null,
          observation: null,
          decideStartedAt,
          decideAttempts: decided.attempts,
          decideErrors: decided.errors,
          error: { kind: 'ModelError', message, fatal: false },
        });
        this.finish(
          {
            status: 'failed',
            reason: 'ModelError',
            message: `Model failed after ${String(decided.attempts)} attempt(s): ${message}`,
          },
          { clean: true },
        );
        return;
      }

      const { decision } = decided;

      // ── DONE ───────────────────────────────────────────
      if (decision.type === 'done') {
        await this.appendStep({
          sequence,
          action: null,
          observation: null,
          decideStartedAt,
          decideAttempts: decided.attempts,
          decideErrors: decided.errors,
        });
        log.info(`Run ${this.id} done: ${decision.result}`);
        this.finish({ status: 'succeeded', result: decision.result }, { clean: true });
        return;
      }

      // Decided but not started: drop it
      if (this.cancelReason !== null) {
        this.finishCancelled(true);
        return;
      }

      // ── ACT ────────────────────────────────────────────
      const { action } = decision;
      log.step(sequence, maxSteps, action.description);

      const actStartedAt = this.tick();
      const acted = await this.act(handle, decision);
      const actEndedAt = this.tick();

      const step: Step = {
        sequence,
        action,
        ...(decision.reasoning !== undefined ? { reasoning: decision.reasoning } : {}),
        observation: acted.kind === 'ok' ? acted.observation : null,
        decideStartedAt,
        actStartedAt,
        actEndedAt,
        decideAttempts: decided.attempts,
        decideErrors: decided.errors,
        ...(acted.kind !== 'ok' ? { error: acted.error } : {}),
      };

      if (acted.kind === 'ok') {
        this.lastObservation = acted.observation;
        this.lastScreenshot = acted.screenshot;
        this.consecutiveFailures = 0;
      } else if (acted.kind === 'recoverable') {
        this.consecutiveFailures++;
        this.lastError = acted.error.message;
      }

      log.stepResult(sequence, maxSteps, acted.kind === 'ok', describeAction(action));
      await this.appendStep(step, acted.kind === 'ok' ? acted.screenshot : undefined);

      // ── TRANSITIONS ────────────────────────────────────
      if (acted.kind === 'interrupted') {
        this.finishCancelled(false);
        return;
      }

      if (acted.kind === 'fatal') {
        this.finish(
          { status: 'failed', reason: 'SessionFatal', message: acted.error.message },
          { clean: false, reason: acted.error.message },
        );
        return;
      }

      if (this.cancelReason !== null) {
        this.finishCancelled(true);
        return;
      }

      if (this.consecutiveFailures > this.retry.budget) {
        this.finish(
          {
            status: 'failed',
            reason: 'ActionError',
            message: `${String(this.consecutiveFailures)} consecutive failures; last: ${this.lastError ?? 'unknown'}`,
          },
          { clean: true },
        );
        return;
      }
    }

    if (this.phaseValue === 'running') {
      const { message } = new StepLimitExceededError(maxSteps);
      this.finish({ status: 'failed', reason: 'StepLimitExceeded', message }, { clean: true });
    }
  }

  // ── External calls ─────────────────────────────────────────

  private async decide(model: ModelClient): Promise<DecideResult> {
    const errors: string[] = [];

    for (let attempt = 1; ; attempt++) {
      if (this.cancelReason !== null) return { kind: 'cancelled' };

      try {
        const decision = await withTimeout(
          (signal) => model.decide(this.conversationState(), signal),
          this.task.stepTimeoutMs,
          'Model decision',
          this.signal,
        );
        return { kind: 'decided', decision, attempts: attempt, errors };
      } catch (err) {
        if (this.cancelReason !== null) return { kind: 'cancelled' };

        const message = errorMessage(err);
        errors.push(message);
        this.lastError = message;
        this.consecutiveFailures++;
        log.warn(`Run ${this.id} decision attempt ${String(attempt)} failed: ${message}`);

        if (this.consecutiveFailures > this.retry.budget) {
          return { kind: 'exhausted', attempts: attempt, errors };
        }
      }

      try {
        await delay(
          backoffDelay(attempt, this.retry.baseDelayMs, this.retry.maxDelayMs),
          this.signal,
        );
      } catch (err) {
        if (err instanceof CancelledError) return { kind: 'cancelled' };
        throw err;
      }
    }
  }

  private async act(handle: SessionHandle, decision: ActionDecision): Promise<ActResult> {
    const { action } = decision;

    if (action.type === 'navigate' && !isUrlAllowed(this.task, action.url)) {
      return {
        kind: 'recoverable',
        error: {
          kind: 'ActionError',
          message: `Navigation to ${action.url} is outside the allowed domains`,
          fatal: false,
        },
      };
    }

    try {
      const result = await withTimeout(
        (signal) => handle.execute(action, signal),
        this.task.stepTimeoutMs,
        'Browser action',
        this.signal,
      );
      return { kind: 'ok', observation: result.observation, screenshot: result.screenshot };
    } catch (err) {
      if (err instanceof CancelledError && this.cancelReason !== null) {
        return {
          kind: 'interrupted',
          error: { kind: 'ActionError', message: 'Interrupted by cancellation', fatal: false },
        };
      }

      const message = errorMessage(err);
      if (isSessionFatal(err)) {
        log.error(`Run ${this.id} lost its session: ${message}`);
        return { kind: 'fatal', error: { kind: 'ActionError', message, fatal: true } };
      }

      log.warn(`Run ${this.id} action failed: ${message}`);
      return { kind: 'recoverable', error: { kind: 'ActionError', message, fatal: false } };
    }
  }

  private conversationState(): ConversationState {
    return {
      runId: this.id,
      task: this.task,
      steps: this.steps,
      lastObservation: this.lastObservation,
      lastScreenshot: this.lastScreenshot,
      remainingSteps: this.task.maxSteps - this.steps.length,
    };
  }

  // ── Recording ──────────────────────────────────────────────

  private async appendStep(step: Step, screenshot?: Buffer): Promise<void> {
    const frozen = freezeStep(step);
    this.steps.push(frozen);

    if (frozen.error) this.lastError = frozen.error.message;

    if (!this.sink) return;
    try {
      await this.sink.recordStep(this.id, frozen, screenshot);
    } catch (err) {
      log.warn(`Could not record step ${String(step.sequence)} of ${this.id}: ${errorMessage(err)}`);
    }
  }

  /** Monotonic, and never earlier than the previous reading. */
  private tick(): number {
    this.lastTimestamp = Math.max(monotonicNow(), this.lastTimestamp);
    return this.lastTimestamp;
  }

  // ── Terminal transitions ───────────────────────────────────

  private finishCancelled(clean: boolean): void {
    const reason = this.cancelReason ?? 'user';
    this.finish(
      { status: 'cancelled', reason },
      clean ? { clean: true } : { clean: false, reason: 'action interrupted by cancellation' },
    );
  }

  private finish(outcome: RunOutcome, release: ReleaseOutcome): void {
    if (isTerminalPhase(this.phaseValue)) return;

    this.release(release);

    this.outcomeValue = outcome;
    this.phaseValue = outcome.status;
    this.finishedAt = new Date();
    if (outcome.status === 'failed') this.lastError = outcome.message;

    log.run(`Run ${this.id} ${outcome.status}${describeEnding(outcome)}`);
    this.settle(outcome);
  }

  private release(outcome: ReleaseOutcome): void {
    const release = this.releaseSession;
    if (release === null) return;
    this.releaseSession = null;

    try {
      release(outcome);
    } catch (err) {
      log.error(`Releasing session for run ${this.id} failed: ${errorMessage(err)}`);
    }
  }
}

/** The first step of a task with a start URL goes there without asking the model. */
function openStartUrl(url: string): DecideResult {
  return {
    kind: 'decided',
    decision: { type: 'action', action: { type: 'navigate', url, description: 'Open start URL' } },
    attempts: 1,
    errors: [],
  };
}

function describeEnding(outcome: RunOutcome): string {
  switch (outcome.status) {
    case 'succeeded':
      return '';
    case 'failed':
      return ` (${outcome.reason}): ${outcome.message}`;
    case 'cancelled':
      return ` (${outcome.reason})`;
  }
}
