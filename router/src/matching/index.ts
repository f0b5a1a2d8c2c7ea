export { PatternSet, parsePattern } from './pattern-set.js';
export type { MatchStrategy } from './pattern-set.js';
