/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './config.js';
export * from './request.js';
export * from './results.js';
export * from './wire.js';
