// ── Error taxonomy ───────────────────────────────────────────

export type EngineErrorCode =
  | 'ResourceExhausted'
  | 'ProvisionFailed'
  | 'ShuttingDown'
  | 'ModelError'
  | 'ActionError'
  | 'SessionCrashed'
  | 'StepLimitExceeded'
  | 'SlotBusy'
  | 'NotFound'
  | 'Timeout'
  | 'Cancelled';

/**
 * Base class for every error the engine raises. `retryable` tells a
 * caller whether trying the same request again later can succeed.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly retryable: boolean;

  constructor(code: EngineErrorCode, message: string, retryable = false) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.retryable = retryable;
  }
}

// ── Resource acquisition ─────────────────────────────────────

export class ResourceExhaustedError extends EngineError {
  constructor(message = 'No browser session became available in time') {
    super('ResourceExhausted', message, true);
    this.name = 'ResourceExhaustedError';
  }
}

export class ProvisionFailedError extends EngineError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(
      'ProvisionFailed',
      `Browser could not be started after ${String(attempts)} attempt(s): ${errorMessage(cause)}`,
    );
    this.name = 'ProvisionFailedError';
    this.attempts = attempts;
  }
}

export class ShuttingDownError extends EngineError {
  constructor(component: string) {
    super('ShuttingDown', `${component} is shutting down`);
    this.name = 'ShuttingDownError';
  }
}

// ── Step loop ────────────────────────────────────────────────

export class ModelError extends EngineError {
  constructor(message: string) {
    super('ModelError', message, true);
    this.name = 'ModelError';
  }
}

export class ActionError extends EngineError {
  readonly fatal: boolean;

  constructor(message: string, fatal = false) {
    super('ActionError', message, !fatal);
    this.name = 'ActionError';
    this.fatal = fatal;
  }
}

/** Raised by a browser session whose process crashed or stopped answering. */
export class SessionCrashedError extends EngineError {
  constructor(message: string) {
    super('SessionCrashed', message);
    this.name = 'SessionCrashedError';
  }
}

export class StepLimitExceededError extends EngineError {
  constructor(maxSteps: number) {
    super('StepLimitExceeded', `Step limit of ${String(maxSteps)} reached without completion`);
    this.name = 'StepLimitExceededError';
  }
}

// ── Manager API ──────────────────────────────────────────────

export class SlotBusyError extends EngineError {
  readonly slot: string;
  readonly activeRunId: string;

  constructor(slot: string, activeRunId: string) {
    super('SlotBusy', `Slot "${slot}" already has an active run (${activeRunId})`, true);
    this.name = 'SlotBusyError';
    this.slot = slot;
    this.activeRunId = activeRunId;
  }
}

export class NotFoundError extends EngineError {
  constructor(runId: string) {
    super('NotFound', `Run ${runId} not found`);
    this.name = 'NotFoundError';
  }
}

export class TimeoutError extends EngineError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('Timeout', `${label} timed out after ${String(timeoutMs)}ms`, true);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Cancellation is requested, not failed; it still travels as an error to unwind awaits. */
export class CancelledError extends EngineError {
  constructor(message = 'Operation cancelled') {
    super('Cancelled', message);
    this.name = 'CancelledError';
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const SESSION_FATAL_PATTERNS = [
  /target (page|context|browser|page, context or browser) (has been|is) closed/i,
  /browser has been closed/i,
  /browser has disconnected/i,
  /browser closed/i,
  /crashed/i,
];

/**
 * Session-fatal errors leave the browser unusable: a crashed or
 * unresponsive process. Everything else (element not found, a bad
 * selector, a navigation error page) is reported back to the model.
 */
export function isSessionFatal(err: unknown): boolean {
  if (err instanceof SessionCrashedError) return true;
  if (err instanceof TimeoutError) return true;
  if (err instanceof ActionError) return err.fatal;
  if (!(err instanceof Error)) return false;
  return SESSION_FATAL_PATTERNS.some((pattern) => pattern.test(err.message));
}
