/**
 * Finders Module
 *
 * Built-in finder variants, the scheme registry and the finder stack.
 *
 * @module services/finders
 */

export * from './base-finder.js';
export * from './finder-stack.js';
export * from './scheme-registry.js';
export * from './archive-reader.js';
export * from './archive-finder.js';
export * from './directory-finder.js';
export * from './virtual-file-system.js';
export * from './virtual-finder.js';
