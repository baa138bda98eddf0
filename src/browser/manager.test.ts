/**
 * Tests for BrowserManager.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';

import { BrowserManager } from './manager.js';
import type { BrowserManagerOptions } from './manager.js';
import type { SessionFactory } from './session.js';
import {
  ActionError,
  CancelledError,
  ProvisionFailedError,
  ResourceExhaustedError,
  ShuttingDownError,
} from '../core/errors.js';
import { delay } from '../utils/timing.js';
import { createFakeSessionPool } from '../testing/fakes.js';
import type { FakeSessionPool } from '../testing/fakes.js';

const NAVIGATE = { type: 'navigate', url: 'https://example.com/', description: 'open' } as const;

describe('BrowserManager', () => {
  let pool: FakeSessionPool;
  let manager: BrowserManager;

  function create(options: BrowserManagerOptions = {}): BrowserManager {
    pool = createFakeSessionPool();
    manager = new BrowserManager(pool.factory, { provisionBackoffMs: 1, ...options });
    return manager;
  }

  afterEach(async () => {
    await manager.shutdown(0);
  });

  describe('acquire and release', () => {
    it('provisions a session for the first caller', async () => {
      create();

      const handle = await manager.acquire({}, { holder: 'run-1' });

      expect(handle.sessionId).toBe('session-1');
      expect(handle.holder).toBe('run-1');
      expect(manager.listSessions()).toMatchObject([
        { id: 'session-1', holder: 'run-1', health: 'healthy', lastReleasedAt: null },
      ]);
    });

    it('reuses a released session with the same requirements', async () => {
      create();

      const first = await manager.acquire({ headless: true }, { holder: 'run-1' });
      manager.release(first);
      const second = await manager.acquire({ headless: true }, { holder: 'run-2' });

      expect(second.sessionId).toBe('session-1');
      expect(pool.sessions).toHaveLength(1);
      expect(manager.stats()).toMatchObject({ total: 1, held: 1, free: 0 });
    });

    it('revokes a handle on release', async () => {
      create();

      const handle = await manager.acquire({}, { holder: 'run-1' });
      manager.release(handle);

      expect(handle.released).toBe(true);
      const err = await handle
        .execute(NAVIGATE, new AbortController().signal)
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ActionError);
      expect(err instanceof ActionError && err.fatal).toBe(true);
      expect(pool.sessions[0]?.actions).toEqual([]);
    });

    it('ignores a second release of the same handle', async () => {
      create();

      const handle = await manager.acquire({}, { holder: 'run-1' });
      manager.release(handle);
      manager.release(handle, { clean: false });

      expect(manager.listSessions()).toMatchObject([{ id: 'session-1', health: 'healthy' }]);
      expect(manager.stats().free).toBe(1);
    });

    it('returns copies from listSessions', async () => {
      create();
      await manager.acquire({}, { holder: 'run-1' });

      const [record] = manager.listSessions();
      if (record) record.holder = 'someone-else';

      expect(manager.listSessions()[0]?.holder).toBe('run-1');
    });
  });

  describe('health', () => {
    it('never hands out a session that fails its health check', async () => {
      create({ maxSessions: 1 });

      const first = await manager.acquire({}, { holder: 'run-1' });
      manager.release(first);
      const stale = pool.sessions[0];
      if (stale) stale.health = 'unhealthy';

      const second = await manager.acquire({}, { holder: 'run-2', timeoutMs: 1000 });

      expect(second.sessionId).toBe('session-2');
      expect(stale?.terminated).toBe(true);
      expect(manager.listSessions().map((s) => s.id)).toEqual(['session-2']);
    });

    it('tears down a session released unclean', async () => {
      create();

      const handle = await manager.acquire({}, { holder: 'run-1' });
      manager.release(handle, { clean: false, reason: 'crashed' });

      expect(manager.listSessions()).toMatchObject([{ id: 'session-1', health: 'unhealthy' }]);
      await vi.waitFor(() => {
        expect(manager.listSessions()).toEqual([]);
      });
      expect(pool.sessions[0]?.terminated).toBe(true);
    });
  });

  describe('capacity', () => {
    it('fails with ResourceExhausted when nothing frees up in time', async () => {
      create({ maxSessions: 1 });
      await manager.acquire({}, { holder: 'run-1' });

      await expect(
        manager.acquire({}, { holder: 'run-2', timeoutMs: 30 }),
      ).rejects.toBeInstanceOf(ResourceExhaustedError);
    });

    it('hands a released session to a waiting caller', async () => {
      create({ maxSessions: 1 });
      const first = await manager.acquire({}, { holder: 'run-1' });

      const waiting = manager.acquire({}, { holder: 'run-2', timeoutMs: 1000 });
      expect(manager.stats().waiting).toBe(1);
      manager.release(first);

      const second = await waiting;
      expect(second.sessionId).toBe('session-1');
      expect(second.holder).toBe('run-2');
    });

    it('stops waiting when the caller aborts', async () => {
      create({ maxSessions: 1 });
      await manager.acquire({}, { holder: 'run-1' });
      const controller = new AbortController();

      const waiting = manager.acquire({}, { holder: 'run-2', signal: controller.signal });
      controller.abort();

      await expect(waiting).rejects.toBeInstanceOf(CancelledError);
      expect(manager.stats().waiting).toBe(0);
    });

    it('retires an idle session built for other requirements to make room', async () => {
      create({ maxSessions: 1 });
      const headless = await manager.acquire({ headless: true }, { holder: 'run-1' });
      manager.release(headless);

      const headed = await manager.acquire({ headless: false }, { holder: 'run-2', timeoutMs: 1000 });

      expect(headed.sessionId).toBe('session-2');
      expect(pool.sessions[0]?.terminated).toBe(true);
      expect(pool.sessions[1]?.requirements.headless).toBe(false);
    });

    it('gives each session at most one holder under concurrent load', async () => {
      create({ maxSessions: 3 });
      const inUse = new Set<string>();
      let overlaps = 0;

      const worker = async (n: number): Promise<void> => {
        for (let round = 0; round < 5; round++) {
          const handle = await manager.acquire({}, { holder: `run-${String(n)}`, timeoutMs: 5000 });
          if (inUse.has(handle.sessionId)) overlaps++;
          inUse.add(handle.sessionId);
          await delay((n + round) % 3);
          inUse.delete(handle.sessionId);
          manager.release(handle);
        }
      };

      await Promise.all(Array.from({ length: 12 }, (_, n) => worker(n)));

      expect(overlaps).toBe(0);
      expect(pool.sessions.length).toBeLessThanOrEqual(3);
      expect(manager.stats()).toMatchObject({ held: 0, waiting: 0 });
    });
  });

  describe('provisioning', () => {
    it('retries a failed launch', async () => {
      create({ provisionRetries: 1 });
      pool.failNext(1);

      const handle = await manager.acquire({}, { holder: 'run-1' });

      expect(handle.sessionId).toBe('session-2');
    });

    it('fails with ProvisionFailed once retries are used up', async () => {
      create({ provisionRetries: 1 });
      pool.failNext(2);

      const err = await manager.acquire({}, { holder: 'run-1' }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ProvisionFailedError);
      expect(err instanceof ProvisionFailedError && err.attempts).toBe(2);
      expect(manager.stats()).toMatchObject({ total: 0, provisioning: 0 });
    });

    it('prewarms free sessions up to capacity', async () => {
      create({ maxSessions: 2 });

      await manager.prewarm({}, 5);

      expect(manager.stats()).toMatchObject({ total: 2, free: 2 });
      await manager.acquire({}, { holder: 'run-1' });
      expect(pool.sessions).toHaveLength(2);
    });
  });

  describe('idle sweep', () => {
    it('terminates sessions idle past the timeout', async () => {
      create({ idleTimeoutMs: 20 });
      const handle = await manager.acquire({}, { holder: 'run-1' });
      manager.release(handle);

      await vi.waitFor(() => {
        expect(manager.listSessions()).toEqual([]);
      });
      expect(pool.sessions[0]?.terminated).toBe(true);
    });

    it('keeps minIdleSessions warm', async () => {
      create({ idleTimeoutMs: 20, minIdleSessions: 1, maxSessions: 2 });
      await manager.prewarm({}, 2);

      await vi.waitFor(() => {
        expect(manager.listSessions()).toHaveLength(1);
      });
      await delay(60);
      expect(manager.stats()).toMatchObject({ total: 1, free: 1 });
    });
  });

  describe('shutdown', () => {
    it('refuses new acquisitions', async () => {
      create();

      await manager.shutdown(0);

      await expect(manager.acquire({}, { holder: 'run-1' })).rejects.toBeInstanceOf(
        ShuttingDownError,
      );
    });

    it('rejects pending waiters', async () => {
      create({ maxSessions: 1 });
      await manager.acquire({}, { holder: 'run-1' });
      const waiting = manager.acquire({}, { holder: 'run-2', timeoutMs: 5000 });
      const rejected = expect(waiting).rejects.toBeInstanceOf(ShuttingDownError);

      await manager.shutdown(0);

      await rejected;
    });

    it('force-terminates held sessions after the grace period', async () => {
      create();
      const handle = await manager.acquire({}, { holder: 'run-1' });

      await manager.shutdown(20);

      expect(handle.released).toBe(true);
      expect(pool.sessions[0]?.terminated).toBe(true);
      expect(manager.listSessions()).toEqual([]);
    });

    it('waits for a session that finished launching after shutdown began', async () => {
      pool = createFakeSessionPool((session) => {
        session.terminate = async () => {
          await delay(50);
          session.terminated = true;
        };
      });
      const slowFactory: SessionFactory = async (id, requirements) => {
        await delay(30);
        return pool.factory(id, requirements);
      };
      manager = new BrowserManager(slowFactory, { provisionBackoffMs: 1 });

      const acquiring = manager.acquire({}, { holder: 'run-1' });
      const rejected = expect(acquiring).rejects.toBeInstanceOf(ShuttingDownError);
      await manager.shutdown(1000);

      expect(pool.sessions).toHaveLength(1);
      expect(pool.sessions[0]?.terminated).toBe(true);
      await rejected;
    });

    it('finishes early once holders release', async () => {
      create();
      const handle = await manager.acquire({}, { holder: 'run-1' });

      const closing = manager.shutdown(5000);
      manager.release(handle);
      await closing;

      expect(pool.sessions[0]?.terminated).toBe(true);
      expect(manager.isShuttingDown).toBe(true);
    });
  });
});
