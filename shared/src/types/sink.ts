/**
 * Sink declaration types
 *
 * A sink declaration is one record of the configuration document after it has
 * been parsed and checked. Declarations are turned into live sinks by the
 * router package.
 */

/**
 * Placeholder written in the configuration file for "throw matches away"
 */
export const DISCARD_SENTINEL = 'null';

/**
 * Where a sink's matched lines go
 */
export type SinkDestination =
  | { kind: 'discard' }
  | { kind: 'file'; path: string };

/**
 * A validated sink record from the configuration document
 */
export interface SinkDeclaration {
  /** Sink name, used in logs and errors */
  name: string;

  /** Destination for matched lines */
  destination: SinkDestination;

  /** Regular expression sources; the sink matches when any of them does */
  patterns: string[];

  /** Negate the match decision (default: false) */
  invert?: boolean;
}

/**
 * Raw sink record as written in the configuration file
 */
export interface SinkRecord {
  name: string;
  file_name: string | null;
  patterns: string[];
  invert?: boolean;
}

/**
 * Top-level shape of the configuration document
 */
export interface SinkDocument {
  sinks: SinkRecord[];
}

/**
 * Resolve the configuration file's `file_name` value to a destination
 */
export function resolveDestination(fileName: string | null): SinkDestination {
  if (fileName === null || fileName === DISCARD_SENTINEL) {
    return { kind: 'discard' };
  }
  return { kind: 'file', path: fileName };
}

/**
 * Render a destination the way the configuration file spells it
 */
export function describeDestination(destination: SinkDestination): string {
  return destination.kind === 'discard' ? DISCARD_SENTINEL : destination.path;
}
