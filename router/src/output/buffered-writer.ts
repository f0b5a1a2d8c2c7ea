/**
 * Buffered writer
 *
 * Collects small writes in memory and hands them to its target once the
 * buffer reaches capacity, on flush, or on close. After the first failure
 * every further call reports the same error.
 */

import type { Result } from '@linesift/shared';
import { ok, err, WriteError } from '@linesift/shared';
import type { WriteTarget } from './targets.js';

const DONE: Result<void, WriteError> = ok(undefined);

export interface BufferedWriterOptions {
  /** Buffer capacity in UTF-16 code units */
  capacity: number;

  /** Sink that owns this writer; absent for the default output */
  sinkName?: string;
}

export class BufferedWriter {
  private chunks: string[] = [];
  private size = 0;
  private failure: WriteError | null = null;
  private closed = false;

  constructor(
    private readonly target: WriteTarget,
    private readonly options: BufferedWriterOptions,
  ) {}

  /** Destination label */
  get label(): string {
    return this.target.label;
  }

  /** Owning sink, if any */
  get sinkName(): string | undefined {
    return this.options.sinkName;
  }

  /** Text waiting in the buffer */
  get pending(): number {
    return this.size;
  }

  /**
   * Append text, flushing when the buffer is full
   */
  async write(text: string): Promise<Result<void, WriteError>> {
    if (this.failure) {
      return err(this.failure);
    }
    this.chunks.push(text);
    this.size += text.length;
    if (this.size >= this.options.capacity) {
      return this.flush();
    }
    return DONE;
  }

  /**
   * Hand everything buffered to the target
   */
  async flush(): Promise<Result<void, WriteError>> {
    if (this.failure) {
      return err(this.failure);
    }
    if (this.size === 0) {
      return DONE;
    }

    const data = this.chunks.join('');
    this.chunks = [];
    this.size = 0;

    try {
      await this.target.write(data);
      return DONE;
    } catch (cause) {
      return err(this.fail(cause));
    }
  }

  /**
   * Flush and release the target; later calls are no-ops
   */
  async close(): Promise<Result<void, WriteError>> {
    if (this.closed) {
      return this.failure ? err(this.failure) : DONE;
    }
    this.closed = true;

    const flushed = await this.flush();
    try {
      await this.target.close();
    } catch (cause) {
      return err(this.failure ?? this.fail(cause));
    }
    return flushed;
  }

  private fail(cause: unknown): WriteError {
    this.failure = new WriteError(this.target.label, cause, this.options.sinkName);
    return this.failure;
  }
}
