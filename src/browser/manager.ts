import type {
  ActionResult,
  BrowserAction,
  BrowserSessionRecord,
  SessionRequirements,
  SessionRequirementsInput,
} from '../schema/index.js';
import {
  FREE_HOLDER,
  parseSessionRequirements,
  requirementsKey,
} from '../schema/index.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import {
  ActionError,
  CancelledError,
  ProvisionFailedError,
  ResourceExhaustedError,
  ShuttingDownError,
  errorMessage,
} from '../core/errors.js';
import * as log from '../utils/logger.js';
import { backoffDelay, delay, monotonicNow, withTimeout } from '../utils/timing.js';
import type { BrowserSession, SessionFactory } from './session.js';

// ── Public types ─────────────────────────────────────────────

export interface BrowserManagerOptions {
  maxSessions?: number | undefined;
  /** Free sessions kept warm; the idle sweep never goes below this. */
  minIdleSessions?: number | undefined;
  idleTimeoutMs?: number | undefined;
  healthCheckTimeoutMs?: number | undefined;
  healthCheckOnAcquire?: boolean | undefined;
  provisionRetries?: number | undefined;
  provisionBackoffMs?: number | undefined;
  shutdownGraceMs?: number | undefined;
  /** Used when replenishing `minIdleSessions`. */
  defaultRequirements?: SessionRequirementsInput | undefined;
}

export interface AcquireOptions {
  /** Run id (or any caller id) recorded as the session's holder. */
  holder: string;
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface ReleaseOutcome {
  /** False when the session crashed or was left in an unknown state. */
  clean: boolean;
  reason?: string | undefined;
}

/**
 * What a run gets from `acquire`. It can only execute actions; once
 * released it is revoked and refuses further use.
 */
export interface SessionHandle {
  readonly sessionId: string;
  readonly holder: string;
  readonly released: boolean;
  execute(action: BrowserAction, signal: AbortSignal): Promise<ActionResult>;
}

export interface PoolStats {
  total: number;
  free: number;
  held: number;
  unhealthy: number;
  provisioning: number;
  waiting: number;
}

// ── Internal state ───────────────────────────────────────────

interface PoolEntry {
  record: BrowserSessionRecord;
  session: BrowserSession;
}

interface Lease {
  entry: PoolEntry;
  revoke(): void;
}

type ResolvedOptions = {
  [K in Exclude<keyof BrowserManagerOptions, 'defaultRequirements'>]-?: NonNullable<
    BrowserManagerOptions[K]
  >;
} & {
  defaultRequirements: SessionRequirements;
};

// ── Manager ──────────────────────────────────────────────────

/**
 * Owns the pool of browser sessions and hands each one to at most one
 * holder at a time.
 *
 * Every pool mutation happens synchronously between awaits, and an entry
 * is claimed before any await that concerns it, so concurrent callers
 * never observe a half-updated pool.
 */
export class BrowserManager {
  private readonly options: ResolvedOptions;
  private readonly entries = new Map<string, PoolEntry>();
  private readonly leases = new Map<SessionHandle, Lease>();
  private readonly waiters = new Set<() => void>();
  private readonly background = new Set<Promise<void>>();
  private readonly sweepTimer: NodeJS.Timeout;
  private provisioning = 0;
  private sessionCounter = 0;
  private closing = false;
  private closed: Promise<void> | undefined;

  constructor(
    private readonly factory: SessionFactory,
    options: BrowserManagerOptions = {},
  ) {
    this.options = {
      maxSessions: options.maxSessions ?? LIMITS.MAX_SESSIONS,
      minIdleSessions: options.minIdleSessions ?? LIMITS.MIN_IDLE_SESSIONS,
      idleTimeoutMs: options.idleTimeoutMs ?? TIMEOUTS.IDLE_SESSION_TIMEOUT,
      healthCheckTimeoutMs: options.healthCheckTimeoutMs ?? TIMEOUTS.HEALTH_CHECK_TIMEOUT,
      healthCheckOnAcquire: options.healthCheckOnAcquire ?? true,
      provisionRetries: options.provisionRetries ?? LIMITS.PROVISION_RETRIES,
      provisionBackoffMs: options.provisionBackoffMs ?? 500,
      shutdownGraceMs: options.shutdownGraceMs ?? TIMEOUTS.SHUTDOWN_GRACE,
      defaultRequirements: parseSessionRequirements(options.defaultRequirements),
    };

    if (this.options.minIdleSessions > this.options.maxSessions) {
      throw new Error('minIdleSessions cannot exceed maxSessions');
    }

    this.sweepTimer = setInterval(
      () => this.sweepIdle(),
      Math.min(this.options.idleTimeoutMs, 30_000),
    );
    this.sweepTimer.unref();
  }

  // ── Acquire ────────────────────────────────────────────────

  async acquire(
    requirementsInput: SessionRequirementsInput,
    options: AcquireOptions,
  ): Promise<SessionHandle> {
    const requirements = parseSessionRequirements(requirementsInput);
    const key = requirementsKey(requirements);
    const timeoutMs = options.timeoutMs ?? TIMEOUTS.ACQUIRE_TIMEOUT;
    const deadline = monotonicNow() + timeoutMs;

    for (;;) {
      this.assertOpen();
      if (options.signal?.aborted) throw new CancelledError();

      const free = this.findFree(key);
      if (free) {
        free.record.holder = options.holder;

        if (await this.passesHealthCheck(free)) {
          if (this.closing) {
            free.record.holder = FREE_HOLDER;
            this.notify();
            throw new ShuttingDownError('BrowserManager');
          }
          log.session(`Reusing ${free.record.id} for ${options.holder}`);
          return this.lease(free, options.holder);
        }

        free.record.holder = FREE_HOLDER;
        this.evict(free, 'failed health check');
        continue;
      }

      if (this.capacityLeft() > 0) {
        return this.provisionFor(requirements, key, options.holder);
      }

      // Full: make room by retiring an idle session built for something else
      this.evictIdleMismatch(key);

      const remaining = deadline - monotonicNow();
      if (remaining <= 0) {
        throw new ResourceExhaustedError(
          `No browser session available within ${String(timeoutMs)}ms ` +
            `(${String(this.options.maxSessions)} in use)`,
        );
      }
      await this.waitForChange(remaining, options.signal);
    }
  }

  // ── Release ────────────────────────────────────────────────

  release(handle: SessionHandle, outcome: ReleaseOutcome = { clean: true }): void {
    const lease = this.leases.get(handle);
    if (!lease) {
      log.warn(`Ignoring release of ${handle.sessionId}: handle is not active`);
      return;
    }

    this.leases.delete(handle);
    lease.revoke();

    const { record } = lease.entry;
    record.holder = FREE_HOLDER;
    record.lastReleasedAt = monotonicNow();

    // Already being torn down (forced shutdown)
    if (record.health !== 'healthy') return;

    if (!outcome.clean) {
      this.evict(lease.entry, outcome.reason ?? 'released unclean');
      return;
    }

    log.debug(`Session ${record.id} back in pool`);
    this.notify();
  }

  // ── Pre-warming ────────────────────────────────────────────

  /** Start up to `count` free sessions ahead of demand, within capacity. */
  async prewarm(requirementsInput: SessionRequirementsInput, count: number): Promise<void> {
    this.assertOpen();
    const requirements = parseSessionRequirements(requirementsInput);
    const n = Math.min(count, this.capacityLeft());

    const started: Promise<void>[] = [];
    for (let i = 0; i < n; i++) {
      started.push(this.track(this.provisionFree(requirements)));
    }
    await Promise.all(started);
  }

  // ── Introspection ──────────────────────────────────────────

  listSessions(): BrowserSessionRecord[] {
    return [...this.entries.values()].map((entry) => ({ ...entry.record }));
  }

  stats(): PoolStats {
    let free = 0;
    let held = 0;
    let unhealthy = 0;
    for (const { record } of this.entries.values()) {
      if (record.health !== 'healthy') unhealthy++;
      else if (record.holder === FREE_HOLDER) free++;
      else held++;
    }
    return {
      total: this.entries.size,
      free,
      held,
      unhealthy,
      provisioning: this.provisioning,
      waiting: this.waiters.size,
    };
  }

  get isShuttingDown(): boolean {
    return this.closing;
  }

  // ── Shutdown ───────────────────────────────────────────────

  /**
   * Refuse new acquisitions, give holders `graceMs` to release, then
   * terminate everything. Safe to call more than once.
   */
  shutdown(graceMs: number = this.options.shutdownGraceMs): Promise<void> {
    if (this.closed) return this.closed;

    this.closing = true;
    clearInterval(this.sweepTimer);
    this.notify();

    this.closed = this.drain(graceMs);
    return this.closed;
  }

  private async drain(graceMs: number): Promise<void> {
    log.session('Shutting down browser pool');
    const deadline = monotonicNow() + graceMs;

    while (this.stats().held > 0 || this.provisioning > 0) {
      const remaining = deadline - monotonicNow();
      if (remaining <= 0) break;
      await this.waitForChange(remaining);
    }

    if (this.leases.size > 0) {
      log.warn(`Force-terminating ${String(this.leases.size)} session(s) still in use`);
      for (const lease of this.leases.values()) {
        lease.revoke();
      }
      this.leases.clear();
    }

    for (const entry of [...this.entries.values()]) {
      if (entry.record.health === 'healthy') {
        this.evict(entry, 'shutdown');
      }
    }

    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
    log.session('Browser pool closed');
  }

  // ── Internals ──────────────────────────────────────────────

  private assertOpen(): void {
    if (this.closing) throw new ShuttingDownError('BrowserManager');
  }

  private capacityLeft(): number {
    return this.options.maxSessions - this.entries.size - this.provisioning;
  }

  private findFree(key: string): PoolEntry | undefined {
    for (const entry of this.entries.values()) {
      const { record } = entry;
      if (
        record.holder === FREE_HOLDER &&
        record.health === 'healthy' &&
        record.requirementsKey === key
      ) {
        return entry;
      }
    }
    return undefined;
  }

  private async passesHealthCheck(entry: PoolEntry): Promise<boolean> {
    if (!this.options.healthCheckOnAcquire) return true;
    try {
      const status = await withTimeout(
        () => entry.session.healthCheck(),
        this.options.healthCheckTimeoutMs,
        `health check of ${entry.record.id}`,
      );
      return status === 'healthy';
    } catch (err) {
      log.warn(`Health check of ${entry.record.id} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private lease(entry: PoolEntry, holder: string): SessionHandle {
    let revoked = false;
    const sessionId = entry.record.id;

    const handle: SessionHandle = {
      sessionId,
      holder,
      get released(): boolean {
        return revoked;
      },
      execute(action: BrowserAction, signal: AbortSignal): Promise<ActionResult> {
        if (revoked) {
          return Promise.reject(
            new ActionError(`Handle for ${sessionId} has been released`, true),
          );
        }
        return entry.session.execute(action, signal);
      },
    };

    this.leases.set(handle, {
      entry,
      revoke: () => {
        revoked = true;
      },
    });
    return handle;
  }

  private async startSession(requirements: SessionRequirements): Promise<BrowserSession> {
    const attempts = this.options.provisionRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const id = `session-${String(++this.sessionCounter)}`;
      try {
        const session = await this.factory(id, requirements);
        log.session(`Started ${id}`);
        return session;
      } catch (err) {
        lastError = err;
        log.warn(`Starting ${id} failed (attempt ${String(attempt)}/${String(attempts)}): ${errorMessage(err)}`);
        if (attempt < attempts) {
          await delay(backoffDelay(attempt, this.options.provisionBackoffMs, 8 * this.options.provisionBackoffMs));
        }
      }
    }

    throw new ProvisionFailedError(attempts, lastError);
  }

  private addEntry(
    session: BrowserSession,
    key: string,
    holder: string,
  ): PoolEntry {
    const entry: PoolEntry = {
      session,
      record: {
        id: session.id,
        holder,
        health: 'healthy',
        createdAt: monotonicNow(),
        lastReleasedAt: holder === FREE_HOLDER ? monotonicNow() : null,
        requirementsKey: key,
      },
    };
    this.entries.set(session.id, entry);
    return entry;
  }

  private async provisionFor(
    requirements: SessionRequirements,
    key: string,
    holder: string,
  ): Promise<SessionHandle> {
    this.provisioning++;
    let session: BrowserSession;
    try {
      session = await this.startSession(requirements);
    } finally {
      this.provisioning--;
      this.notify();
    }

    if (this.closing) {
      await this.track(this.terminateQuietly(session));
      throw new ShuttingDownError('BrowserManager');
    }

    return this.lease(this.addEntry(session, key, holder), holder);
  }

  private async provisionFree(requirements: SessionRequirements): Promise<void> {
    this.provisioning++;
    let session: BrowserSession;
    try {
      session = await this.startSession(requirements);
    } catch (err) {
      log.warn(`Pre-warming failed: ${errorMessage(err)}`);
      return;
    } finally {
      this.provisioning--;
    }

    if (this.closing) {
      await this.track(this.terminateQuietly(session));
    } else {
      this.addEntry(session, requirementsKey(requirements), FREE_HOLDER);
    }
    this.notify();
  }

  /** Mark unhealthy now; terminate and drop from the pool in the background. */
  private evict(entry: PoolEntry, reason: string): void {
    entry.record.health = 'unhealthy';
    log.session(`Evicting ${entry.record.id}: ${reason}`);

    this.track(
      this.terminateQuietly(entry.session).then(() => {
        entry.record.health = 'terminated';
        this.entries.delete(entry.record.id);
        this.notify();
        this.replenish();
      }),
    );
  }

  private evictIdleMismatch(key: string): void {
    let oldest: PoolEntry | undefined;
    for (const entry of this.entries.values()) {
      const { record } = entry;
      if (record.holder !== FREE_HOLDER || record.health !== 'healthy') continue;
      if (record.requirementsKey === key) continue;
      if (!oldest || (record.lastReleasedAt ?? 0) < (oldest.record.lastReleasedAt ?? 0)) {
        oldest = entry;
      }
    }
    if (oldest) this.evict(oldest, 'making room for different requirements');
  }

  private sweepIdle(): void {
    if (this.closing) return;
    const cutoff = monotonicNow() - this.options.idleTimeoutMs;

    const idle = [...this.entries.values()]
      .filter(
        ({ record }) => record.holder === FREE_HOLDER && record.health === 'healthy',
      )
      .sort((a, b) => (a.record.lastReleasedAt ?? 0) - (b.record.lastReleasedAt ?? 0));

    let keep = idle.length;
    for (const entry of idle) {
      if (keep <= this.options.minIdleSessions) break;
      if ((entry.record.lastReleasedAt ?? 0) > cutoff) break;
      this.evict(entry, 'idle timeout');
      keep--;
    }
  }

  private replenish(): void {
    if (this.closing) return;
    const { free } = this.stats();
    const missing = Math.min(
      this.options.minIdleSessions - free - this.provisioning,
      this.capacityLeft(),
    );
    for (let i = 0; i < missing; i++) {
      this.track(this.provisionFree(this.options.defaultRequirements));
    }
  }

  private async terminateQuietly(session: BrowserSession): Promise<void> {
    try {
      await withTimeout(
        () => session.terminate(),
        this.options.shutdownGraceMs || TIMEOUTS.SHUTDOWN_GRACE,
        `terminate ${session.id}`,
      );
      log.session(`Terminated ${session.id}`);
    } catch (err) {
      log.warn(`Terminating ${session.id} failed: ${errorMessage(err)}`);
    }
  }

  private track(task: Promise<void>): Promise<void> {
    const tracked: Promise<void> = task.finally(() => {
      this.background.delete(tracked);
    });
    this.background.add(tracked);
    return tracked;
  }

  private notify(): void {
    const wake = [...this.waiters];
    this.waiters.clear();
    for (const fn of wake) fn();
  }

  private waitForChange(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        signal?.removeEventListener('abort', onAbort);
      };
      const wake = (): void => {
        cleanup();
        resolve();
      };
      const onAbort = (): void => {
        cleanup();
        reject(new CancelledError());
      };
      const timer = setTimeout(wake, timeoutMs);

      this.waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
