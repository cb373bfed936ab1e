/**
 * Cleaning module exports
 */

export * from './appendix.js';
export * from './artifacts.js';
export * from './dedup.js';
export * from './deliverables.js';
export * from './noise.js';
export * from './pipeline.js';
