/**
 * Data formatters for human-readable output.
 */

export * from './value.js';
