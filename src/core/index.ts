/**
 * Core orchestration module.
 * Runs tasks step by step against pooled browser sessions and tracks
 * them per slot. No CLI and no direct browser APIs.
 */

export { AgentRun } from './agentRun.js';
export type { AgentRunInit, AgentRunOptions, ReleaseSession } from './agentRun.js';
export { AgentManager } from './agentManager.js';
export type {
  AgentManagerOptions,
  CancelAck,
  ModelClientFactory,
  RunConfig,
} from './agentManager.js';
export * from './errors.js';
