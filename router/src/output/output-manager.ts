/**
 * Output manager
 *
 * Owns every writer of a run: one per file sink plus the optional default
 * output. Each writer has its own buffer. Lines go out as two writes, the
 * payload and then the terminator.
 */

import type { Result, WriteError } from '@linesift/shared';
import type { BufferedWriter } from './buffered-writer.js';

const TERMINATOR = '\n';

export class OutputManager {
  constructor(
    private readonly sinkWriters: readonly BufferedWriter[],
    /** Writer for unclaimed lines; null when pass-through is disabled */
    readonly defaultWriter: BufferedWriter | null,
  ) {}

  /** Whether unclaimed lines are passed through */
  get passThrough(): boolean {
    return this.defaultWriter !== null;
  }

  /**
   * Write one line followed by its terminator
   */
  async writeLine(writer: BufferedWriter, line: string): Promise<Result<void, WriteError>> {
    const payload = await writer.write(line);
    if (!payload.ok) {
      return payload;
    }
    return writer.write(TERMINATOR);
  }

  /**
   * Flush and close every writer, sinks first
   *
   * Every writer is attempted even after a failure. Returns the failures in
   * the order they occurred.
   */
  async closeAll(): Promise<WriteError[]> {
    const failures: WriteError[] = [];
    const writers = this.defaultWriter ? [...this.sinkWriters, this.defaultWriter] : this.sinkWriters;

    for (const writer of writers) {
      const closed = await writer.close();
      if (!closed.ok) {
        failures.push(closed.error);
      }
    }

    return failures;
  }
}
