/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './action.js';
export * from './observation.js';
export * from './task.js';
export * from './run.js';
export * from './session.js';
export * from './config.js';
