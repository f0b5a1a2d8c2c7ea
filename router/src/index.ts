/**
 * @linesift/router - Sink-routing engine
 *
 * Pattern sets, the sink registry, the line router and the buffered output
 * discipline behind the linesift CLI.
 */

export * from './matching/index.js';
export * from './output/index.js';
export * from './registry/index.js';
export * from './routing/index.js';
