import { performance } from 'node:perf_hooks';

import { CancelledError, TimeoutError } from '../core/errors.js';

// ── Clock ───────────────────────────────────────────────────

/**
 * Epoch milliseconds derived from the monotonic clock, so successive
 * readings never go backwards even if the wall clock is adjusted.
 */
export function monotonicNow(): number {
  return Math.floor(performance.timeOrigin + performance.now());
}

// ── Delays ──────────────────────────────────────────────────

/** Resolve after `ms`; rejects with CancelledError if the signal aborts first. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
}

// ── Bounded external calls ──────────────────────────────────

/**
 * Run `fn` with a derived signal that aborts on timeout or when `parent`
 * aborts. The returned promise settles as soon as either happens, even if
 * `fn` ignores its signal.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    if (parent?.aborted) {
      reject(new CancelledError());
      return;
    }

    let settled = false;

    const settle = (action: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
      action();
    };

    const onAbort = (): void => {
      controller.abort();
      settle(() => reject(new CancelledError()));
    };

    const timer = setTimeout(() => {
      controller.abort();
      settle(() => reject(new TimeoutError(label, timeoutMs)));
    }, timeoutMs);

    parent?.addEventListener('abort', onAbort, { once: true });

    fn(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (err: unknown) => settle(() => reject(err)),
    );
  });
}
