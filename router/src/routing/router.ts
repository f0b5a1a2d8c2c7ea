/**
 * Line router
 *
 * Dispatches each input line to the first sink whose effective match is
 * true. Lines no sink claims go to the default output, or are dropped when
 * pass-through is disabled.
 */

import type { Result, RunStatus, RunSummary, WriteError } from '@linesift/shared';
import { ok, err, ReadError } from '@linesift/shared';
import type { PatternSet } from '../matching/index.js';
import type { OutputManager } from '../output/index.js';
import type { Sink, SinkRegistry } from '../registry/index.js';

/**
 * The part of a sink that decides whether it claims a line
 */
export interface LineFilter {
  readonly matcher: PatternSet;
  readonly invert: boolean;
}

/**
 * Effective match decision for one sink
 */
export function claims(filter: LineFilter, line: string): boolean {
  const raw = filter.matcher.matches(line);
  return filter.invert ? !raw : raw;
}

/**
 * Index of the first filter that claims the line, or -1
 */
export function selectSink(filters: readonly LineFilter[], line: string): number {
  for (let i = 0; i < filters.length; i++) {
    const filter = filters[i];
    if (filter && claims(filter, line)) {
      return i;
    }
  }
  return -1;
}

/**
 * Routes a line stream through a sink registry
 */
export class LineRouter {
  private readonly sinks: readonly Sink[];

  constructor(
    registry: SinkRegistry,
    private readonly output: OutputManager,
  ) {
    this.sinks = registry.sinks;
  }

  /**
   * Route every line, then flush and close every writer
   *
   * Stops early when the default output's reader goes away; that run still
   * succeeds with status 'consumer-closed'. Writers are flushed on every
   * path, including a failed read.
   */
  async run(
    lines: AsyncIterable<string> | Iterable<string>
  ): Promise<Result<RunSummary, WriteError | ReadError>> {
    const startedAt = Date.now();
    const matched = this.sinks.map(() => 0);
    let linesRead = 0;
    let passedThrough = 0;
    let dropped = 0;
    let status: RunStatus = 'completed';
    let failure: WriteError | ReadError | null = null;

    try {
      for await (const line of lines) {
        linesRead++;

        const index = selectSink(this.sinks, line);
        const sink = this.sinks[index];
        if (sink) {
          matched[index] = (matched[index] ?? 0) + 1;
          if (sink.output.kind === 'file') {
            const written = await this.output.writeLine(sink.output.writer, line);
            if (!written.ok) {
              failure = written.error;
              break;
            }
          }
          continue;
        }

        const fallback = this.output.defaultWriter;
        if (!fallback) {
          dropped++;
          continue;
        }

        const written = await this.output.writeLine(fallback, line);
        if (!written.ok) {
          if (written.error.isBrokenPipe) {
            status = 'consumer-closed';
          } else {
            failure = written.error;
          }
          break;
        }
        passedThrough++;
      }
    } catch (cause) {
      failure = new ReadError(cause);
    }

    for (const closeFailure of await this.output.closeAll()) {
      if (closeFailure.sinkName === undefined && closeFailure.isBrokenPipe) {
        status = 'consumer-closed';
      } else {
        failure ??= closeFailure;
      }
    }

    if (failure) {
      return err(failure);
    }

    return ok({
      status,
      linesRead,
      passedThrough,
      dropped,
      sinks: this.sinks.map((sink, i) => ({ name: sink.name, matched: matched[i] ?? 0 })),
      elapsedMs: Date.now() - startedAt,
    });
  }
}
