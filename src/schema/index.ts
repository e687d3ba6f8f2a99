/**
 * Schema module: the data shapes every other module reads.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './parameter.js';
export * from './operation.js';
export * from './routine.js';
export * from './results.js';
export * from './config.js';
export * from './jsonOutput.js';
