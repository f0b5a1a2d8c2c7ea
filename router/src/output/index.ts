export { BufferedWriter } from './buffered-writer.js';
export type { BufferedWriterOptions } from './buffered-writer.js';
export { OutputManager } from './output-manager.js';
export { fileTarget, openFileTarget, streamTarget } from './targets.js';
export type { WriteTarget, StreamTargetOptions } from './targets.js';
