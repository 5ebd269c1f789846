/**
 * Config Service Module
 *
 * @module services/config
 */

export * from './config-service.js';
