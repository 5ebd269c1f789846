// Export all services

export * from './location/index.js';
export * from './finders/index.js';
export * from './scanner/index.js';
export * from './config/index.js';
