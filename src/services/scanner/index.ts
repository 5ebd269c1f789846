/**
 * Scanner Module
 *
 * @module services/scanner
 */

export * from './package-scanner.js';
