/**
 * Schema module: the single source of truth for every data shape.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './hints.js';
export * from './extrinsic.js';
export * from './document.js';
export * from './report.js';
