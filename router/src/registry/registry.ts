/**
 * Sink registry
 *
 * Builds the ordered list of sinks from configuration. Every sink's patterns
 * are compiled before any output file is created; a registry is either built
 * whole or not at all.
 */

import type {
  LinesiftError,
  Result,
  SinkDeclaration,
  SinkDestination,
} from '@linesift/shared';
import { ok, err, BufferSizes, ResourceError, SinkPatternError } from '@linesift/shared';
import { PatternSet } from '../matching/index.js';
import { BufferedWriter, openFileTarget } from '../output/index.js';
import type { WriteTarget } from '../output/index.js';

/**
 * A sink that passed validation but owns no file yet
 */
export interface SinkPlan {
  name: string;
  destination: SinkDestination;
  matcher: PatternSet;
  invert: boolean;
}

/**
 * Where a live sink writes
 */
export type SinkOutput =
  | { kind: 'discard' }
  | { kind: 'file'; path: string; writer: BufferedWriter };

/**
 * A live sink
 */
export interface Sink {
  readonly name: string;
  readonly output: SinkOutput;
  readonly matcher: PatternSet;
  readonly invert: boolean;
}

export interface OpenRegistryOptions {
  /** Per-sink buffer capacity (default: BufferSizes.file) */
  fileBufferSize?: number;

  /** Opens a file destination (default: create parent dirs, then the file) */
  openTarget?: (path: string) => Promise<WriteTarget>;
}

/**
 * Ordered, first-match-wins collection of sinks
 */
export class SinkRegistry {
  constructor(readonly sinks: readonly Sink[]) {}

  get size(): number {
    return this.sinks.length;
  }

  /**
   * Writers of every file sink, in declaration order
   */
  writers(): BufferedWriter[] {
    const writers: BufferedWriter[] = [];
    for (const sink of this.sinks) {
      if (sink.output.kind === 'file') {
        writers.push(sink.output.writer);
      }
    }
    return writers;
  }
}

/**
 * Compile every sink's patterns without touching the filesystem
 *
 * Returns one error per sink whose patterns fail to compile.
 */
export function validateSinks(
  declarations: readonly SinkDeclaration[]
): Result<SinkPlan[], SinkPatternError[]> {
  const plans: SinkPlan[] = [];
  const errors: SinkPatternError[] = [];

  declarations.forEach((declaration, index) => {
    const compiled = PatternSet.compile(declaration.patterns);
    if (!compiled.ok) {
      errors.push(new SinkPatternError(declaration.name, index, compiled.error));
      return;
    }
    plans.push({
      name: declaration.name,
      destination: declaration.destination,
      matcher: compiled.value,
      invert: declaration.invert ?? false,
    });
  });

  return errors.length > 0 ? err(errors) : ok(plans);
}

/**
 * Names declared by more than one sink, in order of first appearance
 */
export function findDuplicateNames(declarations: readonly Pick<SinkDeclaration, 'name'>[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const { name } of declarations) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }

  return Array.from(duplicates);
}

/**
 * Close the files opened so far, returning a line for each close that failed
 */
async function closeOpened(sinks: Sink[]): Promise<string[]> {
  const failures: string[] = [];
  for (const sink of sinks) {
    if (sink.output.kind === 'file') {
      const closed = await sink.output.writer.close();
      if (!closed.ok) {
        failures.push(`${closed.error.message}: ${closed.error.details.join('; ')}`);
      }
    }
  }
  return failures;
}

/**
 * Validate all sinks, then create their output files in declaration order
 */
export async function openSinkRegistry(
  declarations: readonly SinkDeclaration[],
  options: OpenRegistryOptions = {}
): Promise<Result<SinkRegistry, LinesiftError[]>> {
  const validated = validateSinks(declarations);
  if (!validated.ok) {
    return err(validated.error);
  }

  const openTarget = options.openTarget ?? openFileTarget;
  const capacity = options.fileBufferSize ?? BufferSizes.file;
  const sinks: Sink[] = [];

  for (const plan of validated.value) {
    if (plan.destination.kind === 'discard') {
      sinks.push({ name: plan.name, output: { kind: 'discard' }, matcher: plan.matcher, invert: plan.invert });
      continue;
    }

    const { path } = plan.destination;
    let target: WriteTarget;
    try {
      target = await openTarget(path);
    } catch (cause) {
      const cleanup = await closeOpened(sinks);
      const reason = cause instanceof Error ? cause.message : String(cause);
      return err([new ResourceError(plan.name, path, reason, cleanup)]);
    }

    sinks.push({
      name: plan.name,
      output: {
        kind: 'file',
        path,
        writer: new BufferedWriter(target, { capacity, sinkName: plan.name }),
      },
      matcher: plan.matcher,
      invert: plan.invert,
    });
  }

  return ok(new SinkRegistry(sinks));
}
