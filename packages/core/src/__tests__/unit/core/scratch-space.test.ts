/**
 * Scratch space and atomic write tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { ResourceExhaustedError } from '../../../core/errors.js';
import { atomicWriteFile } from '../../../core/utils/atomic-write.js';
import { ScratchSpace, withScratchSpace } from '../../../core/utils/scratch-space.js';
import { makeTempDir } from '../../utils/builders.js';

const bytes = (n: number): Uint8Array => new Uint8Array(n).fill(0x61);

describe('ScratchSpace', () => {
  let root: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir: root, cleanup } = await makeTempDir('geoconvert-scratch-'));
  });

  afterEach(async () => {
    await cleanup();
  });

  it('creates a private directory named after the job', async () => {
    const scratch = await ScratchSpace.acquire({ root, maxBytes: 100, jobId: 'job/42' });

    expect(basename(scratch.directory).startsWith('job-job_42-')).toBe(true);
    expect((await stat(scratch.directory)).isDirectory()).toBe(true);
    await scratch.release();
  });

  it('writes nested files and counts their bytes', async () => {
    const scratch = await ScratchSpace.acquire({ root, maxBytes: 100, jobId: 'write' });

    const path = await scratch.writeFile('input/deep/a.csv', bytes(8));

    expect(path).toBe(join(scratch.directory, 'input', 'deep', 'a.csv'));
    expect(await readFile(path, 'utf8')).toBe('aaaaaaaa');
    expect(scratch.usedBytes).toBe(8);
    await scratch.release();
  });

  it('refuses writes past the quota', async () => {
    const scratch = await ScratchSpace.acquire({ root, maxBytes: 10, jobId: 'quota' });
    await scratch.writeFile('a.bin', bytes(8));

    const attempt = scratch.writeFile('b.bin', bytes(4));

    await expect(attempt).rejects.toBeInstanceOf(ResourceExhaustedError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Scratch quota exceeded: 12 bytes requested, limit is 10',
      stage: 'scratch',
      limitBytes: 10,
    });
    expect(scratch.usedBytes).toBe(8);
    await scratch.release();
  });

  it('checks room without reserving it', async () => {
    const scratch = await ScratchSpace.acquire({ root, maxBytes: 10, jobId: 'room' });
    await scratch.writeFile('a.bin', bytes(6));

    expect(() => scratch.ensureRoom(4)).not.toThrow();
    expect(() => scratch.ensureRoom(5)).toThrow('Scratch quota exceeded: 11 bytes requested, limit is 10');
    expect(scratch.usedBytes).toBe(6);
    expect(scratch.remainingBytes).toBe(4);
    await scratch.release();
  });

  it('keeps paths inside the directory', async () => {
    const scratch = await ScratchSpace.acquire({ root, maxBytes: 10, jobId: 'paths' });

    expect(() => scratch.resolve('../outside.txt')).toThrow('Path escapes scratch space: ../outside.txt');
    expect(() => scratch.resolve('a/../../outside.txt')).toThrow('Path escapes scratch space');
    expect(() => scratch.resolve('/etc/hosts')).toThrow('Path escapes scratch space: /etc/hosts');
    expect(scratch.resolve('a/./b.txt')).toBe(join(scratch.directory, 'a', 'b.txt'));
    await scratch.release();
  });

  it('removes the directory on release and refuses later writes', async () => {
    const scratch = await ScratchSpace.acquire({ root, maxBytes: 10, jobId: 'release' });
    await scratch.writeFile('a.bin', bytes(2));

    await scratch.release();
    await scratch.release();

    await expect(stat(scratch.directory)).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(scratch.writeFile('b.bin', bytes(1))).rejects.toThrow('Scratch space already released');
  });

  it('releases the directory when the job body throws', async () => {
    let directory = '';

    await expect(
      withScratchSpace({ root, maxBytes: 10, jobId: 'failing' }, async (scratch) => {
        directory = scratch.directory;
        await scratch.writeFile('a.bin', bytes(1));
        throw new Error('stage failed');
      })
    ).rejects.toThrow('stage failed');

    await expect(stat(directory)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('atomicWriteFile', () => {
  it('creates parent directories and leaves no temporary file', async () => {
    const { dir, cleanup } = await makeTempDir('geoconvert-atomic-');
    try {
      const target = join(dir, 'outputs', 'job.geojson');

      await atomicWriteFile(target, '{}');

      expect(await readFile(target, 'utf8')).toBe('{}');
      expect(await readdir(join(dir, 'outputs'))).toEqual(['job.geojson']);
    } finally {
      await cleanup();
    }
  });

  it('skips the rename once the signal has aborted', async () => {
    const { dir, cleanup } = await makeTempDir('geoconvert-atomic-');
    try {
      const controller = new AbortController();
      controller.abort();

      await expect(
        atomicWriteFile(join(dir, 'job.geojson'), '{}', { signal: controller.signal })
      ).rejects.toThrow();

      expect(await readdir(dir)).toEqual([]);
    } finally {
      await cleanup();
    }
  });
});
