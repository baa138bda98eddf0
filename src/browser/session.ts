import type { ActionResult, BrowserAction, SessionRequirements } from '../schema/index.js';

// ── Capability ───────────────────────────────────────────────

export type HealthStatus = 'healthy' | 'unhealthy';

/**
 * A live browser (process or CDP connection) plus its context.
 * Only BrowserManager calls `healthCheck` and `terminate`; runs reach
 * `execute` through a SessionHandle.
 */
export interface BrowserSession {
  readonly id: string;
  execute(action: BrowserAction, signal: AbortSignal): Promise<ActionResult>;
  healthCheck(): Promise<HealthStatus>;
  terminate(): Promise<void>;
}

export type SessionFactory = (
  id: string,
  requirements: SessionRequirements,
) => Promise<BrowserSession>;
