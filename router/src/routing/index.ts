/**
 * Routing module
 * First-match-wins line dispatch
 */

export { LineRouter, claims, selectSink } from './router.js';
export type { LineFilter } from './router.js';
