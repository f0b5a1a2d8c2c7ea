/**
 * Tests for CLI option handling
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { CLI_VERSION, createCLI, dispatch, runCLI } from '../cli.js';
import type { GlobalOptions } from '../cli.js';
import { collectingStream } from '../../../tests/helpers/memory-target.js';

function streamsFor(input: string) {
  const { stream, text } = collectingStream();
  return {
    streams: { stdin: Readable.from([Buffer.from(input)]), stdout: stream },
    stdoutText: text,
  };
}

describe('CLI', () => {
  let dir: string;
  let consoleErrors: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'linesift-cli-'));
    consoleErrors = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      consoleErrors.push(args.join(' '));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(text: string): Promise<string> {
    const path = join(dir, 'sinks.yaml');
    await writeFile(path, text);
    return path;
  }

  describe('createCLI', () => {
    it('should map flags to options', async () => {
      let seen: GlobalOptions | undefined;
      const program = createCLI(async (options) => {
        seen = options;
      });

      await program.parseAsync(['node', 'linesift', '-c', 'a.yaml', '-v', '-n', '-q']);

      expect(seen).toEqual({
        config: 'a.yaml',
        genTemplate: undefined,
        validateOnly: true,
        stdout: false,
        quiet: true,
      });
    });

    it('should pass through to stdout by default', async () => {
      let seen: GlobalOptions | undefined;
      const program = createCLI(async (options) => {
        seen = options;
      });

      await program.parseAsync(['node', 'linesift', '--gen-template', 't.yaml']);

      expect(seen?.stdout).toBe(true);
      expect(seen?.genTemplate).toBe('t.yaml');
    });

    it('should report the package version', () => {
      expect(createCLI(async () => undefined).version()).toBe(CLI_VERSION);
    });
  });

  describe('dispatch', () => {
    it('should fail without a config file', async () => {
      const { streams } = streamsFor('');

      expect(await dispatch({ stdout: true, quiet: true }, streams)).toBe(1);
      expect(consoleErrors[0]).toContain('Please specify the configuration file!');
    });

    it('should write a template without needing a config file', async () => {
      const { streams } = streamsFor('');
      const path = join(dir, 'template.yaml');

      expect(await dispatch({ genTemplate: path, stdout: true, quiet: true }, streams)).toBe(0);
      expect(await readdir(dir)).toEqual(['template.yaml']);
    });

    it('should validate without creating output files', async () => {
      const out = join(dir, 'out', 'digits.txt');
      const config = await writeConfig(`sinks:\n  - name: digits\n    file_name: ${out}\n    patterns: ['^[0-9]+$']\n`);
      const { streams, stdoutText } = streamsFor('123\n');

      expect(await dispatch({ config, validateOnly: true, stdout: true, quiet: true }, streams)).toBe(0);
      expect(await readdir(dir)).toEqual(['sinks.yaml']);
      expect(stdoutText()).toBe('');
    });

    it('should fail validation on bad patterns', async () => {
      const config = await writeConfig(
        'sinks:\n  - name: one\n    file_name: "null"\n    patterns: ["("]\n'
      );
      const { streams } = streamsFor('');

      expect(await dispatch({ config, validateOnly: true, stdout: true, quiet: true }, streams)).toBe(1);
      expect(consoleErrors.some((l) => l.includes("Error parsing regex pattern in sink named 'one'"))).toBe(true);
    });
  });

  describe('runCLI', () => {
    it('should route stdin and exit 0', async () => {
      const out = join(dir, 'digits.txt');
      const config = await writeConfig(`sinks:\n  - name: digits\n    file_name: ${out}\n    patterns: ['^[0-9]+$']\n`);
      const { streams, stdoutText } = streamsFor('123\nabc\n456\n');

      const code = await runCLI(['node', 'linesift', '-c', config, '-q'], streams);

      expect(code).toBe(0);
      expect(await readFile(out, 'utf-8')).toBe('123\n456\n');
      expect(stdoutText()).toBe('abc\n');
    });

    it('should keep stdout empty with --no-stdout', async () => {
      const out = join(dir, 'digits.txt');
      const config = await writeConfig(`sinks:\n  - name: digits\n    file_name: ${out}\n    patterns: ['^[0-9]+$']\n`);
      const { streams, stdoutText } = streamsFor('123\nabc\n');

      const code = await runCLI(['node', 'linesift', '-c', config, '--no-stdout', '-q'], streams);

      expect(code).toBe(0);
      expect(stdoutText()).toBe('');
      expect(await readFile(out, 'utf-8')).toBe('123\n');
    });

    it('should stay silent on stderr with --quiet', async () => {
      const config = await writeConfig('sinks: []\n');
      const { streams } = streamsFor('a\n');

      await runCLI(['node', 'linesift', '-c', config, '-q'], streams);

      expect(consoleErrors).toEqual([]);
    });

    it('should exit 1 for an unreadable config', async () => {
      const { streams } = streamsFor('');

      const code = await runCLI(['node', 'linesift', '-c', join(dir, 'nope.yaml'), '-q'], streams);

      expect(code).toBe(1);
    });
  });
});
