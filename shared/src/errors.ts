/**
 * Error taxonomy
 *
 * Engine operations return these inside a failed Result; only the CLI entry
 * point turns them into an exit code.
 */

export type ErrorKind = 'config' | 'pattern' | 'resource' | 'read' | 'write' | 'template';

/**
 * Base class for every error the tool reports
 */
export class LinesiftError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message);
    this.name = 'LinesiftError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration file could not be read, parsed or validated
 */
export class ConfigError extends LinesiftError {
  constructor(message: string, details: string[] = []) {
    super('config', message, details);
    this.name = 'ConfigError';
  }
}

/**
 * One pattern of a sink that failed to compile
 */
export interface PatternFailure {
  /** Position of the pattern within the sink's list */
  index: number;

  /** Pattern source as written */
  pattern: string;

  /** Message from the regular expression engine */
  reason: string;
}

/**
 * A sink whose pattern set failed to compile
 */
export class SinkPatternError extends LinesiftError {
  constructor(
    public readonly sinkName: string,
    public readonly sinkIndex: number,
    public readonly failures: PatternFailure[],
  ) {
    super(
      'pattern',
      `Error parsing regex pattern in sink named '${sinkName}'`,
      failures.map(f => `pattern ${f.index} (${f.pattern}): ${f.reason}`),
    );
    this.name = 'SinkPatternError';
  }
}

/**
 * Output file or its parent directory could not be created
 */
export class ResourceError extends LinesiftError {
  constructor(
    public readonly sinkName: string,
    public readonly path: string,
    reason: string,
    cleanup: string[] = [],
  ) {
    super(
      'resource',
      `Unable to create output file '${path}' for sink named '${sinkName}'`,
      [reason, ...cleanup],
    );
    this.name = 'ResourceError';
  }
}

const BROKEN_PIPE_CODES = new Set(['EPIPE', 'ERR_STREAM_DESTROYED', 'ERR_STREAM_WRITE_AFTER_END']);

/**
 * Read the `code` property of a Node system error, if there is one
 */
export function errorCode(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * Reading the input stream failed
 */
export class ReadError extends LinesiftError {
  constructor(cause: unknown) {
    super('read', 'Unable to read input', [cause instanceof Error ? cause.message : String(cause)]);
    this.name = 'ReadError';
  }
}

/**
 * Writing to or flushing a destination failed
 */
export class WriteError extends LinesiftError {
  public readonly code: string | undefined;

  constructor(
    public readonly destination: string,
    cause: unknown,
    public readonly sinkName?: string,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'write',
      sinkName === undefined
        ? `Unable to write data to ${destination}`
        : `Unable to write to output file '${destination}' for sink named '${sinkName}'`,
      [reason],
    );
    this.name = 'WriteError';
    this.code = errorCode(cause);
  }

  /**
   * Whether the reader on the other end went away
   */
  get isBrokenPipe(): boolean {
    return this.code !== undefined && BROKEN_PIPE_CODES.has(this.code);
  }
}

/**
 * Template file could not be generated
 */
export class TemplateError extends LinesiftError {
  constructor(message: string, details: string[] = []) {
    super('template', message, details);
    this.name = 'TemplateError';
  }
}
