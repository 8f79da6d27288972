/**
 * @revtrack/core - Core library for revtrack
 *
 * Provides the MediaWiki API client, revision history interpretation,
 * configuration and error types.
 */

export { VERSION } from './version.js';

// Re-export all modules
export * from './api/index.js';
export * from './config/index.js';
export * from './errors.js';
export * from './history/index.js';
