// Sink declaration types
export type {
  SinkDestination,
  SinkDeclaration,
  SinkRecord,
  SinkDocument,
} from './sink.js';

export {
  DISCARD_SENTINEL,
  resolveDestination,
  describeDestination,
} from './sink.js';

// Result type
export type { Result } from './result.js';
export { ok, err } from './result.js';

// Run types
export type { RunStatus, SinkStats, RunSummary } from './run.js';
