/**
 * Tests for AgentManager.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { AgentManager } from './agentManager.js';
import type { AgentManagerOptions, ModelClientFactory } from './agentManager.js';
import {
  NotFoundError,
  ProvisionFailedError,
  ResourceExhaustedError,
  SessionCrashedError,
  ShuttingDownError,
  SlotBusyError,
  TimeoutError,
} from './errors.js';
import { BrowserManager } from '../browser/manager.js';
import { createMemoryRecordingSink } from '../report/sink.js';
import type { MemoryRecordingSink } from '../report/sink.js';
import type { TaskInput } from '../schema/index.js';
import {
  createFakeSessionPool,
  createScriptedModel,
  done,
  hang,
  navigate,
} from '../testing/fakes.js';
import type { FakeBrowserSession, FakeSessionPool, ScriptEntry } from '../testing/fakes.js';

const TASK: TaskInput = { instruction: 'find the pricing page', stepTimeoutMs: 1000 };
const STUCK: ScriptEntry = () => hang();

describe('AgentManager', () => {
  let pool: FakeSessionPool;
  let browsers: BrowserManager;
  let agents: AgentManager;
  let sink: MemoryRecordingSink;
  let script: ScriptEntry[];
  let fallback: ScriptEntry;

  const modelFactory: ModelClientFactory = () => createScriptedModel(script, fallback);

  function create(
    options: AgentManagerOptions = {},
    sessionSetup?: (session: FakeBrowserSession) => void,
    maxSessions = 2,
  ): void {
    pool = createFakeSessionPool(sessionSetup);
    browsers = new BrowserManager(pool.factory, { maxSessions, provisionBackoffMs: 1 });
    sink = createMemoryRecordingSink();
    agents = new AgentManager(browsers, modelFactory, {
      retry: { budget: 2, baseDelayMs: 1, maxDelayMs: 2 },
      acquireTimeoutMs: 100,
      recordingSink: sink,
      ...options,
    });
  }

  beforeEach(() => {
    script = [];
    fallback = done('ok');
    create();
  });

  afterEach(async () => {
    await agents.shutdown();
    await browsers.shutdown(0);
  });

  describe('start', () => {
    it('returns the run id before the run finishes', async () => {
      fallback = STUCK;

      const runId = await agents.start('slot-a', TASK);

      expect(agents.status(runId).phase).toBe('running');
      expect(agents.activeRun('slot-a')).toBe(runId);
    });

    it('runs the task to an outcome and frees the slot', async () => {
      script = [navigate('https://example.com/pricing'), done('found it')];

      const runId = await agents.start('slot-a', TASK);
      const outcome = await agents.await(runId);

      expect(outcome).toEqual({ status: 'succeeded', result: 'found it' });
      expect(agents.activeRun('slot-a')).toBeUndefined();
      expect(agents.history(runId)).toHaveLength(2);
      expect(browsers.stats()).toMatchObject({ held: 0, free: 1 });
    });

    it('rejects a second start on a busy slot without creating a run', async () => {
      fallback = STUCK;
      const runId = await agents.start('slot-a', TASK);

      const err = await agents.start('slot-a', TASK).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SlotBusyError);
      expect(err instanceof SlotBusyError && err.activeRunId).toBe(runId);
      expect(agents.listRuns()).toHaveLength(1);
    });

    it('claims the slot before acquiring a session', async () => {
      fallback = STUCK;

      const first = agents.start('slot-a', TASK);
      const second = agents.start('slot-a', TASK);

      await expect(second).rejects.toBeInstanceOf(SlotBusyError);
      await expect(first).resolves.toBe(agents.activeRun('slot-a'));
    });

    it('runs different slots side by side', async () => {
      fallback = STUCK;

      const a = await agents.start('slot-a', TASK);
      const b = await agents.start('slot-b', TASK);

      expect(a).not.toBe(b);
      expect(browsers.stats().held).toBe(2);
    });

    it('accepts a new run on a slot once the previous one finished', async () => {
      const first = await agents.start('slot-a', TASK);
      await agents.await(first);

      const second = await agents.start('slot-a', TASK);

      expect(second).not.toBe(first);
    });

    it('rethrows ResourceExhausted and frees the slot', async () => {
      create({}, undefined, 1);
      fallback = STUCK;
      await agents.start('slot-a', TASK);

      await expect(agents.start('slot-b', TASK)).rejects.toBeInstanceOf(ResourceExhaustedError);

      expect(agents.activeRun('slot-b')).toBeUndefined();
      expect(agents.listRuns()).toHaveLength(1);
    });

    it('rethrows ProvisionFailed and frees the slot', async () => {
      pool.failNext(3);

      await expect(agents.start('slot-a', TASK)).rejects.toBeInstanceOf(ProvisionFailedError);

      expect(agents.activeRun('slot-a')).toBeUndefined();
      expect(agents.listRuns()).toEqual([]);
    });

    it('rejects an invalid task before claiming the slot', async () => {
      await expect(agents.start('slot-a', { instruction: '   ' })).rejects.toThrow();

      expect(agents.activeRun('slot-a')).toBeUndefined();
    });
  });

  describe('cancel', () => {
    it('is idempotent and reports whether the run had already finished', async () => {
      fallback = STUCK;
      const runId = await agents.start('slot-a', TASK);

      expect(agents.cancel(runId)).toEqual({ acknowledged: true, alreadyTerminal: false });
      expect(await agents.await(runId)).toEqual({ status: 'cancelled', reason: 'user' });
      expect(agents.cancel(runId)).toEqual({ acknowledged: true, alreadyTerminal: true });
      expect(agents.status(runId).outcome).toEqual({ status: 'cancelled', reason: 'user' });
    });

    it('releases the session of a cancelled run', async () => {
      fallback = STUCK;
      const runId = await agents.start('slot-a', TASK);

      agents.cancel(runId);
      await agents.await(runId);

      expect(browsers.stats()).toMatchObject({ held: 0, free: 1 });
    });

    it('cancels a run still waiting for a session', async () => {
      create({ acquireTimeoutMs: 5000 }, undefined, 1);
      fallback = STUCK;
      await agents.start('slot-a', TASK);

      const starting = agents.start('slot-b', TASK);
      const pendingId = agents.activeRun('slot-b');
      expect(pendingId).toBeDefined();
      if (pendingId === undefined) return;

      expect(agents.status(pendingId).phase).toBe('pending');
      expect(agents.cancel(pendingId)).toEqual({ acknowledged: true, alreadyTerminal: false });

      expect(await starting).toBe(pendingId);
      expect(await agents.await(pendingId)).toEqual({ status: 'cancelled', reason: 'user' });
      expect(agents.activeRun('slot-b')).toBeUndefined();
    });

    it('cancels a run that outlives its wall-clock budget', async () => {
      fallback = STUCK;

      const runId = await agents.start('slot-a', TASK, { runTimeoutMs: 30 });

      expect(await agents.await(runId)).toEqual({ status: 'cancelled', reason: 'run-timeout' });
    });
  });

  describe('queries', () => {
    it('returns status snapshots as copies', async () => {
      script = [navigate('https://example.com/a'), done('ok')];
      const runId = await agents.start('slot-a', TASK);
      await agents.await(runId);

      const snapshot = agents.status(runId);
      expect(snapshot).toMatchObject({
        runId,
        slot: 'slot-a',
        phase: 'succeeded',
        stepCount: 2,
      });

      snapshot.phase = 'failed';
      snapshot.recentSteps.length = 0;

      expect(agents.status(runId).phase).toBe('succeeded');
      expect(agents.status(runId).recentSteps).toHaveLength(2);
    });

    it('keeps partial history and the last error of a failed run', async () => {
      create({}, (session) => {
        session.executeImpl = async () => {
          throw new SessionCrashedError('Browser has disconnected');
        };
      });
      fallback = navigate('https://example.com/');

      const runId = await agents.start('slot-a', TASK);
      const outcome = await agents.await(runId);

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'SessionFatal',
        message: 'Browser has disconnected',
      });
      expect(agents.history(runId)).toHaveLength(1);
      expect(agents.status(runId).lastError).toBe('Browser has disconnected');
      await vi.waitFor(() => {
        expect(pool.sessions[0]?.terminated).toBe(true);
      });
    });

    it('times out while waiting for an unfinished run', async () => {
      fallback = STUCK;
      const runId = await agents.start('slot-a', TASK);

      await expect(agents.await(runId, 20)).rejects.toBeInstanceOf(TimeoutError);
      expect(agents.status(runId).phase).toBe('running');
    });

    it('throws NotFound for unknown runs', async () => {
      expect(() => agents.status('missing')).toThrow(NotFoundError);
      expect(() => agents.cancel('missing')).toThrow(NotFoundError);
      expect(() => agents.history('missing')).toThrow(NotFoundError);
      await expect(agents.await('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('lists every run it still holds', async () => {
      fallback = STUCK;
      const a = await agents.start('slot-a', TASK);
      const b = await agents.start('slot-b', TASK);

      expect(agents.listRuns().map((r) => r.runId).sort()).toEqual([a, b].sort());
    });

    it('archives finished runs after the retention period', async () => {
      create({ historyRetentionMs: 20 });

      const runId = await agents.start('slot-a', TASK);
      await agents.await(runId);

      await vi.waitFor(() => {
        expect(() => agents.status(runId)).toThrow(NotFoundError);
      });
    });
  });

  describe('session release', () => {
    it('releases exactly once per run', async () => {
      const release = vi.spyOn(browsers, 'release');
      script = [navigate('https://example.com/a'), done('ok')];

      const runId = await agents.start('slot-a', TASK);
      await agents.await(runId);
      agents.cancel(runId);

      expect(release).toHaveBeenCalledTimes(1);
      expect(release.mock.calls[0]?.[1]).toEqual({ clean: true });
    });

    it('releases unclean when an action is interrupted', async () => {
      let started: () => void = () => undefined;
      const actionStarted = new Promise<void>((resolve) => {
        started = resolve;
      });
      create({}, (session) => {
        session.executeImpl = () => {
          started();
          return hang();
        };
      });
      const release = vi.spyOn(browsers, 'release');
      fallback = navigate('https://example.com/');

      const runId = await agents.start('slot-a', TASK);
      await actionStarted;
      agents.cancel(runId);
      await agents.await(runId);

      expect(release).toHaveBeenCalledTimes(1);
      expect(release.mock.calls[0]?.[1]).toEqual({
        clean: false,
        reason: 'action interrupted by cancellation',
      });
    });
  });

  describe('recording', () => {
    it('sends the finished run to the sink', async () => {
      script = [navigate('https://example.com/a'), done('ok')];

      const runId = await agents.start('slot-a', TASK);
      await agents.await(runId);
      await agents.shutdown();

      expect(sink.runs.map((r) => r.runId)).toEqual([runId]);
      expect(sink.runs[0]?.outcome).toEqual({ status: 'succeeded', result: 'ok' });
      expect(sink.steps.get(runId)).toHaveLength(2);
    });
  });

  describe('shutdown', () => {
    it('cancels active runs and refuses new ones', async () => {
      fallback = STUCK;
      const a = await agents.start('slot-a', TASK);
      const b = await agents.start('slot-b', TASK);

      await agents.shutdown();

      expect(agents.status(a).outcome).toEqual({ status: 'cancelled', reason: 'shutdown' });
      expect(agents.status(b).outcome).toEqual({ status: 'cancelled', reason: 'shutdown' });
      expect(browsers.stats().held).toBe(0);
      await expect(agents.start('slot-c', TASK)).rejects.toBeInstanceOf(ShuttingDownError);
    });
  });
});
