/**
 * Write targets
 *
 * The byte-level end of a buffered writer: a file this process owns, or a
 * stream such as standard output.
 */

import { mkdir, open } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';
import type { Writable } from 'stream';

export interface WriteTarget {
  /** Human-readable destination, used in errors */
  readonly label: string;

  /** Write a chunk; resolves once the chunk has been handed to the OS */
  write(chunk: string): Promise<void>;

  /** Release the destination */
  close(): Promise<void>;
}

/**
 * Wrap an open file handle
 */
export function fileTarget(handle: FileHandle, path: string): WriteTarget {
  return {
    label: path,

    async write(chunk: string): Promise<void> {
      const data = Buffer.from(chunk, 'utf8');
      let offset = 0;
      while (offset < data.length) {
        const { bytesWritten } = await handle.write(data, offset, data.length - offset);
        offset += bytesWritten;
      }
    },

    close(): Promise<void> {
      return handle.close();
    },
  };
}

/**
 * Create (or truncate) a file, making its parent directories first
 */
export async function openFileTarget(path: string): Promise<WriteTarget> {
  await mkdir(dirname(path), { recursive: true });
  const handle = await open(path, 'w');
  return fileTarget(handle, path);
}

export interface StreamTargetOptions {
  /** Label used in errors (default: STDOUT) */
  label?: string;

  /** End the stream on close; leave false for process.stdout */
  end?: boolean;
}

/**
 * Wrap a writable stream
 *
 * The stream's 'error' event is captured for the lifetime of the process, so
 * a reader closing the pipe surfaces as a rejected write rather than an
 * uncaught exception.
 */
export function streamTarget(stream: Writable, options: StreamTargetOptions = {}): WriteTarget {
  let failure: Error | null = null;

  stream.on('error', (error: Error) => {
    failure ??= error;
  });

  return {
    label: options.label ?? 'STDOUT',

    write(chunk: string): Promise<void> {
      if (failure) {
        return Promise.reject(failure);
      }
      return new Promise((resolve, reject) => {
        stream.write(chunk, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },

    close(): Promise<void> {
      if (!options.end || failure) {
        return Promise.resolve();
      }
      return new Promise((resolve) => {
        stream.end(() => resolve());
      });
    },
  };
}
