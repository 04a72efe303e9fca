/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './status.js';
export * from './diagnostic.js';
export * from './manifest.js';
export * from './config.js';
export * from './jsonOutput.js';
