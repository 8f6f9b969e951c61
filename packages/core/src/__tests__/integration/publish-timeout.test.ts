/**
 * Publication under the hard time budget
 *
 * The output write is slowed past the hard budget; the job must fail with
 * TimeoutError and nothing may land in the output directory, even after the
 * slow write has had time to finish.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { createConfig } from '../../core/config.js';
import { TimeoutError } from '../../core/errors.js';
import { runConversion } from '../../pipeline/orchestrator.js';
import { makeTempDir, point } from '../utils/builders.js';

const WRITE_DELAY_MS = 600;

vi.mock('../../core/utils/atomic-write.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../core/utils/atomic-write.js')>();
  return {
    ...actual,
    atomicWriteFile: async (...args: Parameters<typeof actual.atomicWriteFile>): Promise<void> => {
      await sleep(WRITE_DELAY_MS);
      return actual.atomicWriteFile(...args);
    },
  };
});

describe('publish', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir('geoconvert-publish-'));
    await writeFile(
      join(dir, 'stations.geojson'),
      JSON.stringify({
        type: 'FeatureCollection',
        features: [{ type: 'Feature', properties: { name: 'Gare A' }, geometry: point(2.35, 48.85) }],
      })
    );
  });

  afterEach(async () => {
    await cleanup();
  });

  it('leaves no output when the hard budget runs out during the write', async () => {
    const outputDir = join(dir, 'outputs');
    const config = createConfig({
      scratch: { root: join(dir, 'scratch') },
      outputDir,
      budget: { softTimeoutMs: 100, hardTimeoutMs: 300 },
    });

    await expect(
      runConversion(
        { input_location: join(dir, 'stations.geojson'), output_format: 'geojson' },
        { config, jobId: 'slow-write' }
      )
    ).rejects.toBeInstanceOf(TimeoutError);

    await sleep(WRITE_DELAY_MS);
    expect(await readdir(outputDir).catch((): string[] => [])).toEqual([]);
  });
});
