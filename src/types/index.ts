/**
 * Main type exports
 */

export * from './scheduling.js';
