/**
 * @linesift/shared - Types and errors shared by the router and the CLI
 *
 * This package provides:
 * - Sink declaration and run summary types
 * - The Result type returned by fallible engine operations
 * - The error taxonomy
 */

// Re-export all types
export * from './types/index.js';

export * from './errors.js';

export { BufferSizes } from './constants.js';
