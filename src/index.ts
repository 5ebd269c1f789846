// Namespace scanner public API

export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/validation.js';
export * from './core/schemas.js';
export * from './models/index.js';
export * from './services/index.js';
