// Export all domain models

export * from './types.js';
export * from './location.js';
export * from './finder.js';
