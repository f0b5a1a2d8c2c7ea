/**
 * Sink configuration file
 *
 * Reads the YAML document, checks its shape and turns each record into a
 * sink declaration. Regular expressions are not compiled here; that is the
 * registry's job.
 */

import { readFile } from 'fs/promises';
import { parseDocument } from 'yaml';
import { z } from 'zod';
import type { Result, SinkDeclaration, SinkDocument } from '@linesift/shared';
import { ok, err, ConfigError, resolveDestination } from '@linesift/shared';

// Plain YAML scalars such as 404 or true are read as strings
const scalarText = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(
    (value) => (typeof value === 'number' || typeof value === 'boolean' ? String(value) : value),
    schema
  );

const sinkRecordSchema = z.object({
  name: scalarText(z.string().min(1, 'name must not be empty')),
  file_name: scalarText(z.string().min(1, 'file_name must not be empty')).nullable(),
  patterns: z.array(scalarText(z.string())).min(1, 'at least one pattern is required'),
  invert: z.boolean().nullish(),
});

const sinkDocumentSchema = z.object({
  sinks: z.array(sinkRecordSchema),
});

/**
 * Render an issue path as `sinks[1].patterns`
 */
export function formatIssuePath(path: (string | number)[]): string {
  if (path.length === 0) {
    return '(root)';
  }
  return path
    .map((part, i) => (typeof part === 'number' ? `[${part}]` : i === 0 ? part : `.${part}`))
    .join('');
}

/**
 * Parse the text of a configuration document
 *
 * @param text YAML source
 * @param source Where the text came from, for error messages
 */
export function parseSinkConfig(text: string, source: string): Result<SinkDeclaration[], ConfigError> {
  const document = parseDocument(text);
  if (document.errors.length > 0) {
    return err(
      new ConfigError(
        `Error parsing configuration file (${source})`,
        document.errors.map((e) => e.message)
      )
    );
  }

  const parsed = sinkDocumentSchema.safeParse(document.toJS());
  if (!parsed.success) {
    return err(
      new ConfigError(
        `Invalid configuration file (${source})`,
        parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`)
      )
    );
  }

  return ok(
    parsed.data.sinks.map((record) => ({
      name: record.name,
      destination: resolveDestination(record.file_name),
      patterns: record.patterns,
      invert: record.invert ?? false,
    }))
  );
}

/**
 * Read and parse a configuration file
 */
export async function loadSinkConfig(path: string): Promise<Result<SinkDeclaration[], ConfigError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (cause) {
    return err(
      new ConfigError(`Unable to open specified configuration file (${path})`, [
        cause instanceof Error ? cause.message : String(cause),
      ])
    );
  }
  return parseSinkConfig(text, path);
}

/**
 * Sample document written by --gen-template
 */
export const TEMPLATE_DOCUMENT: SinkDocument = {
  sinks: [
    {
      name: 'first_sink',
      file_name: 'first_output.txt',
      patterns: ['^[a-zA-Z0-9]+$'],
    },
    {
      name: 'second_sink',
      file_name: 'second_output.txt',
      patterns: ['😎*'],
    },
  ],
};
