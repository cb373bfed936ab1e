/**
 * Dossier module exports
 */

export * from './types.js';
export * from './errors.js';
export * from './options.js';
export * from './groups.js';
export * from './reconcile.js';
export * from './excerpt.js';
export * from './sources.js';
export * from './render.js';
export * from './cleaning/index.js';
export * from './working-index.js';
export * from './assemble.js';
export * from './build.js';
export * from './inputs.js';
export * from './writer.js';
