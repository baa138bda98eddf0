/**
 * navpilot library entry point.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './llm/index.js';
export * from './report/index.js';
export * from './config/index.js';
export { setLevel as setLogLevel } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
