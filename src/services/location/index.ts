/**
 * Location Module
 *
 * Location identifiers and the pluggable namespace lookup strategy.
 *
 * @module services/location
 */

export * from './uri.js';
export * from './location-provider.js';
export * from './search-path-provider.js';
export * from './location-providers.js';
