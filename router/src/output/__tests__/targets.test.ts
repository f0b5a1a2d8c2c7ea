/**
 * Write Target Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { openFileTarget, streamTarget } from '../targets.js';
import { brokenPipeStream, collectingStream } from '../../../../tests/helpers/memory-target.js';

describe('openFileTarget', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'linesift-targets-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create missing parent directories', async () => {
    const path = join(dir, 'a', 'b', 'out.txt');

    const target = await openFileTarget(path);
    await target.write('123\n');
    await target.close();

    expect(await readFile(path, 'utf-8')).toBe('123\n');
    expect(target.label).toBe(path);
  });

  it('should truncate an existing file', async () => {
    const path = join(dir, 'out.txt');
    await writeFile(path, 'stale contents\n');

    const target = await openFileTarget(path);
    await target.close();

    expect(await readFile(path, 'utf-8')).toBe('');
  });

  it('should write multi-byte text intact', async () => {
    const path = join(dir, 'emoji.txt');

    const target = await openFileTarget(path);
    await target.write('😎 ok\n');
    await target.close();

    expect(await readFile(path, 'utf-8')).toBe('😎 ok\n');
  });

  it('should fail when the parent path is a file', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, '');

    await expect(openFileTarget(join(blocker, 'out.txt'))).rejects.toThrow();
  });
});

describe('streamTarget', () => {
  it('should write chunks to the stream', async () => {
    const { stream, text } = collectingStream();
    const target = streamTarget(stream);

    await target.write('abc\n');
    await target.write('def\n');

    expect(text()).toBe('abc\ndef\n');
    expect(target.label).toBe('STDOUT');
  });

  it('should reject writes once the reader has gone away', async () => {
    const target = streamTarget(brokenPipeStream());

    await expect(target.write('abc\n')).rejects.toMatchObject({ code: 'EPIPE' });
    await expect(target.write('def\n')).rejects.toBeInstanceOf(Error);
  });

  it('should leave the stream open on close by default', async () => {
    const { stream } = collectingStream();

    await streamTarget(stream).close();

    expect(stream.writableEnded).toBe(false);
  });

  it('should end the stream on close when asked to', async () => {
    const { stream } = collectingStream();

    await streamTarget(stream, { end: true, label: 'test' }).close();

    expect(stream.writableEnded).toBe(true);
  });
});
