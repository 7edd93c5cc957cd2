/**
 * Backend Module
 *
 * Exports the state backend interface, the CLI backend, the executor and tool detection.
 */

export * from './types.js';
export * from './executor.js';
export * from './detect.js';
export * from './cli-backend.js';
export * from './verbose.js';
