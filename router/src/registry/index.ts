export {
  SinkRegistry,
  validateSinks,
  findDuplicateNames,
  openSinkRegistry,
} from './registry.js';
export type { SinkPlan, SinkOutput, Sink, OpenRegistryOptions } from './registry.js';
