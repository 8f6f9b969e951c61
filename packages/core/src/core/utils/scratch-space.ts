/**
 * Per-job scratch storage
 *
 * Each job gets a private directory with a byte quota. Archives are unpacked
 * and artifacts are staged here; `withScratchSpace` removes the directory on
 * every exit path, including failures and aborts.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, normalize, sep } from 'node:path';
import { ResourceExhaustedError } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'scratch' });

export interface ScratchOptions {
  readonly root: string;
  readonly maxBytes: number;
  readonly jobId: string;
}

export class ScratchSpace {
  private used = 0;
  private released = false;

  private constructor(
    readonly directory: string,
    readonly maxBytes: number
  ) {}

  /**
   * Create the job directory under `options.root`
   */
  static async acquire(options: ScratchOptions): Promise<ScratchSpace> {
    await mkdir(options.root, { recursive: true });
    const safeId = options.jobId.replace(/[^A-Za-z0-9_-]/g, '_');
    const directory = await mkdtemp(join(options.root, `job-${safeId}-`));
    log.debug('Scratch space acquired', { directory, maxBytes: options.maxBytes });
    return new ScratchSpace(directory, options.maxBytes);
  }

  get usedBytes(): number {
    return this.used;
  }

  get remainingBytes(): number {
    return this.maxBytes - this.used;
  }

  /**
   * Resolve a relative path inside the scratch directory
   *
   * @throws Error if the path escapes the directory
   */
  resolve(relativePath: string): string {
    const cleaned = normalize(relativePath);
    if (isAbsolute(cleaned) || cleaned === '..' || cleaned.startsWith(`..${sep}`)) {
      throw new Error(`Path escapes scratch space: ${relativePath}`);
    }
    return join(this.directory, cleaned);
  }

  /**
   * Count `bytes` against the quota before writing them
   */
  reserve(bytes: number): void {
    this.ensureRoom(bytes);
    this.used += bytes;
  }

  /**
   * Throw unless `bytes` more would fit, without reserving them
   *
   * @throws ResourceExhaustedError
   */
  ensureRoom(bytes: number): void {
    if (this.used + bytes > this.maxBytes) {
      throw new ResourceExhaustedError(
        `Scratch quota exceeded: ${this.used + bytes} bytes requested, limit is ${this.maxBytes}`,
        this.maxBytes
      );
    }
  }

  /**
   * Write a file inside the scratch directory, creating parent directories
   *
   * @returns Absolute path of the written file
   */
  async writeFile(relativePath: string, data: Uint8Array): Promise<string> {
    if (this.released) {
      throw new Error('Scratch space already released');
    }
    const target = this.resolve(relativePath);
    this.reserve(data.byteLength);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
    return target;
  }

  /**
   * Remove the directory and everything in it. Safe to call twice.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.directory, { recursive: true, force: true });
    log.debug('Scratch space released', { directory: this.directory, usedBytes: this.used });
  }
}

/**
 * Run `fn` with a scratch space that is released however `fn` exits
 */
export async function withScratchSpace<T>(
  options: ScratchOptions,
  fn: (scratch: ScratchSpace) => Promise<T>
): Promise<T> {
  const scratch = await ScratchSpace.acquire(options);
  try {
    return await fn(scratch);
  } finally {
    await scratch.release();
  }
}
