/**
 * Validate command - Check a configuration file without creating any output
 */

import ora from 'ora';
import type { SinkDeclaration } from '@linesift/shared';
import { describeDestination } from '@linesift/shared';
import { findDuplicateNames, validateSinks } from '@linesift/router';
import type { SinkPlan } from '@linesift/router';
import { loadSinkConfig } from '../utils/config-file.js';
import { createTable, info, infoEnabled, reportError, success, warning } from '../utils/output.js';
import type { OutputOptions } from '../utils/output.js';

/**
 * Warn about sink names used more than once; routing is unaffected
 */
export function warnDuplicateNames(declarations: SinkDeclaration[], options: OutputOptions): void {
  for (const name of findDuplicateNames(declarations)) {
    warning(`Sink name '${name}' is declared more than once`, options);
  }
}

/**
 * Summary rows for validated sinks
 */
export function summaryRows(plans: SinkPlan[]): string[][] {
  return plans.map((plan, index) => [
    String(index + 1),
    plan.name,
    describeDestination(plan.destination),
    String(plan.matcher.patterns.length),
    plan.invert ? 'yes' : 'no',
  ]);
}

export async function validateCommand(configPath: string, options: OutputOptions): Promise<number> {
  const quiet = !infoEnabled(options);
  const spinner = ora({ text: 'Validating configuration...', isSilent: quiet });

  info(`Loading configuration file: ${configPath}`, options);
  spinner.start();

  const loaded = await loadSinkConfig(configPath);
  if (!loaded.ok) {
    spinner.fail('Configuration could not be loaded');
    reportError(loaded.error);
    return 1;
  }

  const validated = validateSinks(loaded.value);
  if (!validated.ok) {
    spinner.fail(`${validated.error.length} sink(s) have invalid patterns`);
    validated.error.forEach(reportError);
    return 1;
  }

  spinner.succeed(`${validated.value.length} sink(s) validated`);
  warnDuplicateNames(loaded.value, options);

  if (!quiet) {
    info('Configuration summary', options);
    if (validated.value.length === 0) {
      console.error('No sinks declared; every line will pass through');
    } else {
      const table = createTable(['#', 'Name', 'Output', 'Patterns', 'Invert'], summaryRows(validated.value));
      console.error(table.toString());
    }
  }

  success('Configuration is valid', options);
  return 0;
}
