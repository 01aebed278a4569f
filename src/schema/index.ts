/**
 * Schema module: every data shape the engine passes around.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './selector.js';
export * from './action.js';
export * from './results.js';
export * from './identity.js';
export * from './workflow.js';
export * from './config.js';
export * from './jsonOutput.js';
