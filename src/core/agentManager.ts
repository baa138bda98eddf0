import type {
  RetryPolicy,
  RunOutcome,
  RunSnapshot,
  RunSummary,
  SessionRequirementsInput,
  Step,
  TaskInput,
} from '../schema/index.js';
import { createTask, isTerminalPhase } from '../schema/index.js';
import { LIMITS, RETENTION, RETRY, TIMEOUTS } from '../config/defaults.js';
import type { BrowserManager, ReleaseOutcome, SessionHandle } from '../browser/manager.js';
import type { LLMConfig } from '../llm/client.js';
import type { ModelClient } from '../llm/model.js';
import type { RecordingSink } from '../report/sink.js';
import * as log from '../utils/logger.js';
import { withTimeout } from '../utils/timing.js';
import { AgentRun } from './agentRun.js';
import type { ReleaseSession } from './agentRun.js';
import {
  NotFoundError,
  ShuttingDownError,
  SlotBusyError,
  TimeoutError,
  errorMessage,
} from './errors.js';

// ── Public types ─────────────────────────────────────────────

/** Per-run overrides handed to `start`. */
export interface RunConfig {
  /** Merged over the manager's default session requirements. */
  requirements?: SessionRequirementsInput | undefined;
  /** Passed through to the ModelClientFactory. */
  llm?: Partial<LLMConfig> | undefined;
  runTimeoutMs?: number | undefined;
}

export type ModelClientFactory = (config: RunConfig) => ModelClient;

export interface AgentManagerOptions {
  /** Wall-clock backstop per run; the run is cancelled when it elapses. */
  runTimeoutMs?: number | undefined;
  acquireTimeoutMs?: number | undefined;
  /** How long finished runs stay queryable. */
  historyRetentionMs?: number | undefined;
  retry?: RetryPolicy | undefined;
  recordingSink?: RecordingSink | undefined;
  defaultRequirements?: SessionRequirementsInput | undefined;
}

export interface CancelAck {
  acknowledged: true;
  alreadyTerminal: boolean;
}

// ── Internal state ───────────────────────────────────────────

interface RunEntry {
  run: AgentRun;
  /** Set for runs that never got a session; they are not kept. */
  dropped: boolean;
  runTimer: NodeJS.Timeout | undefined;
  archiveTimer: NodeJS.Timeout | undefined;
  /** Resolves once the manager has finished its terminal bookkeeping. */
  settled: Promise<void>;
}

function once(release: (outcome: ReleaseOutcome) => void): ReleaseSession {
  let called = false;
  return (outcome) => {
    if (called) return;
    called = true;
    release(outcome);
  };
}

// ── Manager ──────────────────────────────────────────────────

/**
 * Starts agent runs on named slots and answers questions about them.
 * A slot holds at most one non-terminal run. Runs execute concurrently;
 * the browser pool is the only state they share.
 */
export class AgentManager {
  private readonly runs = new Map<string, RunEntry>();
  private readonly slots = new Map<string, string>();
  private readonly runTimeoutMs: number;
  private readonly acquireTimeoutMs: number;
  private readonly historyRetentionMs: number;
  private readonly retry: RetryPolicy;
  private readonly sink: RecordingSink | undefined;
  private readonly defaultRequirements: SessionRequirementsInput;
  private closing = false;

  constructor(
    private readonly browsers: BrowserManager,
    private readonly modelFactory: ModelClientFactory,
    options: AgentManagerOptions = {},
  ) {
    this.runTimeoutMs = options.runTimeoutMs ?? TIMEOUTS.RUN_TIMEOUT;
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? TIMEOUTS.ACQUIRE_TIMEOUT;
    this.historyRetentionMs = options.historyRetentionMs ?? RETENTION.HISTORY;
    this.retry = options.retry ?? {
      budget: RETRY.BUDGET,
      baseDelayMs: RETRY.BASE_DELAY,
      maxDelayMs: RETRY.MAX_DELAY,
    };
    this.sink = options.recordingSink;
    this.defaultRequirements = options.defaultRequirements ?? {};
  }

  // ── Start ──────────────────────────────────────────────────

  /**
   * Create a run on `slot`, give it a session and start its loop.
   * Resolves with the run id as soon as the loop is under way.
   */
  async start(slot: string, taskInput: TaskInput, config: RunConfig = {}): Promise<string> {
    if (this.closing) throw new ShuttingDownError('AgentManager');

    const task = createTask(taskInput);

    // Claimed before any await
    const activeId = this.slots.get(slot);
    if (activeId !== undefined) throw new SlotBusyError(slot, activeId);

    const run = new AgentRun({
      slot,
      task,
      options: { retry: this.retry, recordingSink: this.sink },
    });
    const entry = this.track(run);
    this.slots.set(slot, run.id);

    let handle: SessionHandle;
    try {
      handle = await this.browsers.acquire(
        { ...this.defaultRequirements, ...config.requirements },
        { holder: run.id, timeoutMs: this.acquireTimeoutMs, signal: run.signal },
      );
    } catch (err) {
      if (run.cancelRequested) {
        run.abandon({ status: 'failed', reason: 'Internal', message: errorMessage(err) });
        return run.id;
      }
      this.drop(entry, err);
      throw err;
    }

    let model: ModelClient;
    try {
      model = this.modelFactory(config);
    } catch (err) {
      this.browsers.release(handle, { clean: true });
      this.drop(entry, err);
      throw err;
    }

    run.bind(
      handle,
      model,
      once((outcome) => this.browsers.release(handle, outcome)),
    );

    if (!isTerminalPhase(run.phase)) {
      const timeoutMs = config.runTimeoutMs ?? this.runTimeoutMs;
      entry.runTimer = setTimeout(() => {
        log.warn(`Run ${run.id} exceeded ${String(timeoutMs)}ms`);
        run.cancel('run-timeout');
      }, timeoutMs);

      run.execute().catch((err: unknown) => {
        log.error(`Run ${run.id} loop rejected: ${errorMessage(err)}`);
      });
    }

    return run.id;
  }

  // ── Queries and control ────────────────────────────────────

  /** Idempotent; a terminal run is left as it is. */
  cancel(runId: string): CancelAck {
    const { run } = this.entry(runId);
    const alreadyTerminal = isTerminalPhase(run.phase);
    if (!alreadyTerminal) run.cancel('user');
    return { acknowledged: true, alreadyTerminal };
  }

  status(runId: string, recentSteps: number = LIMITS.SNAPSHOT_RECENT_STEPS): RunSnapshot {
    return this.entry(runId).run.snapshot(recentSteps);
  }

  /** Wait for the run's outcome; without `timeoutMs` this waits indefinitely. */
  async await(runId: string, timeoutMs?: number): Promise<RunOutcome> {
    const { run } = this.entry(runId);
    if (timeoutMs === undefined) return run.done;
    return withTimeout(() => run.done, timeoutMs, `Waiting for run ${runId}`);
  }

  history(runId: string): Step[] {
    return this.entry(runId).run.history();
  }

  /** Full record of a finished run; null while it is still going. */
  summary(runId: string): RunSummary | null {
    return this.entry(runId).run.summary();
  }

  activeRun(slot: string): string | undefined {
    return this.slots.get(slot);
  }

  listRuns(): RunSnapshot[] {
    return [...this.runs.values()].map(({ run }) => run.snapshot());
  }

  // ── Shutdown ───────────────────────────────────────────────

  /**
   * Refuse new starts, cancel every active run and wait for them to
   * finish. With `graceMs`, stops waiting after that long.
   */
  async shutdown(graceMs?: number): Promise<void> {
    this.closing = true;

    const entries = [...this.runs.values()];
    for (const { run } of entries) {
      if (!isTerminalPhase(run.phase)) run.cancel('shutdown');
    }

    const settled = Promise.all(entries.map((e) => e.settled)).then(() => undefined);
    if (graceMs === undefined) {
      await settled;
    } else {
      try {
        await withTimeout(() => settled, graceMs, 'AgentManager shutdown');
      } catch (err) {
        if (!(err instanceof TimeoutError)) throw err;
        log.warn(`Some runs did not finish within ${String(graceMs)}ms of shutdown`);
      }
    }

    for (const entry of this.runs.values()) {
      clearTimeout(entry.archiveTimer);
    }
  }

  // ── Internals ──────────────────────────────────────────────

  private entry(runId: string): RunEntry {
    const entry = this.runs.get(runId);
    if (!entry) throw new NotFoundError(runId);
    return entry;
  }

  private track(run: AgentRun): RunEntry {
    const entry: RunEntry = {
      run,
      dropped: false,
      runTimer: undefined,
      archiveTimer: undefined,
      settled: Promise.resolve(),
    };
    entry.settled = run.done.then(() => this.onTerminal(entry));
    this.runs.set(run.id, entry);
    return entry;
  }

  /** A run that could not be started is removed without a trace. */
  private drop(entry: RunEntry, err: unknown): void {
    entry.dropped = true;
    entry.run.abandon({ status: 'failed', reason: 'Internal', message: errorMessage(err) });
    this.runs.delete(entry.run.id);
    this.freeSlot(entry.run);
  }

  private freeSlot(run: AgentRun): void {
    if (this.slots.get(run.slot) === run.id) {
      this.slots.delete(run.slot);
    }
  }

  private async onTerminal(entry: RunEntry): Promise<void> {
    const { run } = entry;
    this.freeSlot(run);
    clearTimeout(entry.runTimer);
    entry.runTimer = undefined;

    if (entry.dropped) return;

    entry.archiveTimer = setTimeout(() => {
      this.runs.delete(run.id);
      log.debug(`Archived run ${run.id}`);
    }, this.historyRetentionMs);
    entry.archiveTimer.unref();

    const summary = run.summary();
    if (!this.sink || summary === null) return;
    try {
      await this.sink.recordRun(summary);
    } catch (err) {
      log.warn(`Could not record run ${run.id}: ${errorMessage(err)}`);
    }
  }
}
