/**
 * Template command - Write a sample configuration document
 */

import { writeFile } from 'fs/promises';
import { stringify } from 'yaml';
import type { Result } from '@linesift/shared';
import { ok, err, errorCode, TemplateError } from '@linesift/shared';
import { TEMPLATE_DOCUMENT } from '../utils/config-file.js';
import { reportError, success } from '../utils/output.js';
import type { OutputOptions } from '../utils/output.js';

/**
 * YAML text of the sample document
 */
export function renderTemplate(): string {
  return stringify(TEMPLATE_DOCUMENT);
}

/**
 * Write the sample document, refusing to overwrite an existing file
 */
export async function writeTemplate(path: string): Promise<Result<string, TemplateError>> {
  try {
    await writeFile(path, renderTemplate(), { encoding: 'utf-8', flag: 'wx' });
    return ok(path);
  } catch (cause) {
    if (errorCode(cause) === 'EEXIST') {
      return err(new TemplateError(`Template file '${path}' already exists`));
    }
    return err(
      new TemplateError(`Unable to create template file '${path}'`, [
        cause instanceof Error ? cause.message : String(cause),
      ])
    );
  }
}

export async function templateCommand(path: string, options: OutputOptions): Promise<number> {
  const written = await writeTemplate(path);
  if (!written.ok) {
    reportError(written.error);
    return 1;
  }
  success(`Wrote configuration template to ${written.value}`, options);
  return 0;
}
