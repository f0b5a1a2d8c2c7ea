/**
 * CLI command setup using Commander.js
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { ConfigError } from '@linesift/shared';

import { runCommand } from './commands/run.js';
import type { RunStreams } from './commands/run.js';
import { templateCommand } from './commands/template.js';
import { validateCommand } from './commands/validate.js';
import { info, reportError, resolveOutputOptions } from './utils/output.js';

// Get package.json version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { name: string; version: string } = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
);

export const CLI_NAME = 'linesift';
export const CLI_VERSION = packageJson.version;

export interface GlobalOptions {
  config?: string;
  genTemplate?: string;
  validateOnly?: boolean;
  stdout: boolean;
  quiet?: boolean;
}

export type CLIAction = (options: GlobalOptions) => Promise<void>;

export function createCLI(action: CLIAction): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(
      'Sift lines from standard input into output files using regex patterns defined in a YAML config file'
    )
    .version(CLI_VERSION);

  program
    .option('-c, --config <file>', 'Specifies the YAML config file')
    .option('-g, --gen-template <file>', 'Generates an example YAML config file and exits')
    .option('-v, --validate-only', 'Validate that the config file specified by -c is correctly formed')
    .option('-n, --no-stdout', 'Disables emitting unfiltered data on STDOUT')
    .option('-q, --quiet', 'Disables info level log events (version, run time, etc) on STDERR')
    .action(async (_options, command: Command) => {
      await action(getGlobalOptions(command));
    });

  return program;
}

/**
 * Read the resolved options from the program
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const opts = command.opts();
  return {
    config: opts.config,
    genTemplate: opts.genTemplate,
    validateOnly: opts.validateOnly,
    stdout: opts.stdout,
    quiet: opts.quiet,
  };
}

/**
 * Pick the operation the options ask for and return its exit code
 */
export async function dispatch(options: GlobalOptions, streams: RunStreams): Promise<number> {
  const outputOptions = resolveOutputOptions(options.quiet);

  info(`${CLI_NAME} ${CLI_VERSION}`, outputOptions);

  if (options.genTemplate !== undefined) {
    return templateCommand(options.genTemplate, outputOptions);
  }

  if (options.config === undefined) {
    reportError(new ConfigError('Please specify the configuration file!', ['use -c/--config <file>']));
    return 1;
  }

  if (options.validateOnly) {
    return validateCommand(options.config, outputOptions);
  }

  return runCommand(
    options.config,
    { ...outputOptions, passThrough: options.stdout },
    streams
  );
}

/**
 * Parse argv, run the requested operation and return the exit code
 */
export async function runCLI(argv: string[], streams: RunStreams): Promise<number> {
  let exitCode = 0;
  const program = createCLI(async (options) => {
    exitCode = await dispatch(options, streams);
  });
  await program.parseAsync(argv);
  return exitCode;
}
