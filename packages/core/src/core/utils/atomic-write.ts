/**
 * Atomic Write Utilities
 *
 * Output artifacts become visible to the caller in one step: data is written
 * to a temporary sibling of the target and renamed over it. A crash or abort
 * mid-write leaves at most a `.tmp` file, never a truncated artifact under
 * the final name.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface AtomicWriteOptions {
  /** Once aborted, the rename is skipped and nothing appears under `filePath` */
  readonly signal?: AbortSignal;
}

/**
 * Atomically write data to `filePath`
 *
 * @throws Error if write or rename fails, or `signal` aborts before the rename
 * (the temporary file is removed first)
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/srv/outputs/job-42.geojson', bytes);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array,
  options: AtomicWriteOptions = {}
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keep concurrent workers from sharing a temporary name
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data);
    options.signal?.throwIfAborted();
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* already gone */
    });
    throw error;
  }
}
