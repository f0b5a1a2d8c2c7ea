/**
 * Run command - Route standard input through the configured sinks
 */

import type { Readable, Writable } from 'stream';
import type { RunSummary } from '@linesift/shared';
import { BufferSizes } from '@linesift/shared';
import { BufferedWriter, LineRouter, OutputManager, openSinkRegistry, streamTarget } from '@linesift/router';
import { loadSinkConfig } from '../utils/config-file.js';
import { readLines } from '../utils/input.js';
import { debug, formatDuration, formatKeyValue, info, infoEnabled, reportError } from '../utils/output.js';
import type { OutputOptions } from '../utils/output.js';
import { warnDuplicateNames } from './validate.js';

export interface RunStreams {
  /** Line source */
  stdin: Readable;

  /** Default output */
  stdout: Writable;

  /** End stdout when the run finishes (never for process.stdout) */
  endStdout?: boolean;
}

export interface RunOptions extends OutputOptions {
  /** Write unclaimed lines to stdout */
  passThrough: boolean;
}

function logSummary(summary: RunSummary, options: OutputOptions): void {
  if (summary.status === 'consumer-closed') {
    info('Output consumer closed; stopped reading input', options);
  }
  info(`Ending data processing. Time elapsed was: ${formatDuration(summary.elapsedMs)}`, options);

  if (!infoEnabled(options)) {
    return;
  }
  const counts: Record<string, number> = {
    'Lines read': summary.linesRead,
    'Passed through': summary.passedThrough,
    'Dropped': summary.dropped,
  };
  summary.sinks.forEach((sink, index) => {
    counts[`${index + 1}. ${sink.name}`] = sink.matched;
  });
  console.error(formatKeyValue(counts));
}

export async function runCommand(
  configPath: string,
  options: RunOptions,
  streams: RunStreams
): Promise<number> {
  info(`Loading configuration file: ${configPath}`, options);

  const loaded = await loadSinkConfig(configPath);
  if (!loaded.ok) {
    reportError(loaded.error);
    return 1;
  }
  warnDuplicateNames(loaded.value, options);

  const opened = await openSinkRegistry(loaded.value);
  if (!opened.ok) {
    opened.error.forEach(reportError);
    return 1;
  }
  const registry = opened.value;
  debug(`Opened ${registry.size} sink(s)`, options);

  const defaultWriter = options.passThrough
    ? new BufferedWriter(streamTarget(streams.stdout, { end: streams.endStdout ?? false }), {
        capacity: BufferSizes.stdout,
      })
    : null;
  const output = new OutputManager(registry.writers(), defaultWriter);

  info('Starting data processing.', options);
  const result = await new LineRouter(registry, output).run(readLines(streams.stdin));
  if (!result.ok) {
    reportError(result.error);
    return 1;
  }

  logSummary(result.value, options);
  return 0;
}
