/**
 * Browser module.
 * The BrowserSession capability, its Playwright implementation, and the
 * BrowserManager that pools sessions across runs. No LLM calls.
 */

export type { BrowserSession, HealthStatus, SessionFactory } from './session.js';
export { createPlaywrightSession } from './playwright.js';
export { attachCapture } from './capture.js';
export type { CaptureBuffer } from './capture.js';
export { BrowserManager } from './manager.js';
export type {
  AcquireOptions,
  BrowserManagerOptions,
  PoolStats,
  ReleaseOutcome,
  SessionHandle,
} from './manager.js';
