/**
 * Archive unpacking
 */

import { readdir } from 'node:fs/promises';
import { gzipSync } from 'node:zlib';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CorruptArchiveError, ResourceExhaustedError } from '../../../core/errors.js';
import { ScratchSpace } from '../../../core/utils/scratch-space.js';
import { extractGzip, extractZip, gunzip, isArchiveName } from '../../../formats/archive.js';
import { makeTempDir } from '../../utils/builders.js';

const text = (value: string): Uint8Array => new TextEncoder().encode(value);

describe('archive', () => {
  let cleanup: () => Promise<void>;
  let scratch: ScratchSpace;

  beforeEach(async () => {
    const temp = await makeTempDir();
    cleanup = temp.cleanup;
    scratch = await ScratchSpace.acquire({ root: temp.dir, maxBytes: 1024, jobId: 'archive-test' });
  });

  afterEach(async () => {
    await scratch.release();
    await cleanup();
  });

  it('extracts every file and skips macOS resource forks', async () => {
    const zip = new JSZip();
    zip.file('parcels/parcels.geojson', '{"type":"FeatureCollection","features":[]}');
    zip.file('__MACOSX/parcels/._parcels.geojson', 'junk');
    const bytes = await zip.generateAsync({ type: 'uint8array' });

    const files = await extractZip(bytes, scratch, 'input');
    expect(files.map((f) => f.entryName)).toEqual(['parcels/parcels.geojson']);
    expect(new TextDecoder().decode(files[0]?.bytes)).toBe('{"type":"FeatureCollection","features":[]}');
    expect(scratch.usedBytes).toBe(42);
  });

  it('rejects bytes that are not a zip archive', async () => {
    await expect(extractZip(text('PK but not really'), scratch, 'input')).rejects.toBeInstanceOf(CorruptArchiveError);
  });

  it('counts extracted bytes against the scratch quota', async () => {
    const zip = new JSZip();
    zip.file('big.csv', 'x'.repeat(2048));
    const bytes = await zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
    await expect(extractZip(bytes, scratch, 'input')).rejects.toBeInstanceOf(ResourceExhaustedError);
  });

  it('stops inflating an entry once it outgrows the quota', async () => {
    const zip = new JSZip();
    zip.file('bomb.csv', 'x'.repeat(1_000_000));
    const bytes = await zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
    expect(bytes.byteLength).toBeLessThan(10_000);

    await expect(extractZip(bytes, scratch, 'input')).rejects.toBeInstanceOf(ResourceExhaustedError);
    expect(scratch.usedBytes).toBe(0);
    expect(await readdir(scratch.directory)).toEqual([]);
  });

  it('caps gunzip output at the room left in scratch', async () => {
    await expect(
      extractGzip(new Uint8Array(gzipSync('x'.repeat(4096))), 'points.csv.gz', scratch, 'input')
    ).rejects.toBeInstanceOf(ResourceExhaustedError);
    expect(() => gunzip(new Uint8Array(gzipSync('x'.repeat(64))), 32)).toThrow(ResourceExhaustedError);
    expect(scratch.usedBytes).toBe(0);
  });

  it('names a gunzipped file after the input', async () => {
    const files = await extractGzip(new Uint8Array(gzipSync('a,b\n1,2\n')), '/uploads/points.csv.gz', scratch, 'input');
    expect(files.map((f) => f.entryName)).toEqual(['points.csv']);
    expect(new TextDecoder().decode(files[0]?.bytes)).toBe('a,b\n1,2\n');
  });

  it('unpacks a gzipped zip as a zip', async () => {
    const zip = new JSZip();
    zip.file('inner.kml', '<kml/>');
    const zipped = await zip.generateAsync({ type: 'uint8array' });
    const files = await extractGzip(new Uint8Array(gzipSync(zipped)), 'bundle.zip.gz', scratch, 'input');
    expect(files.map((f) => f.entryName)).toEqual(['inner.kml']);
  });

  it('rejects a broken gzip stream', () => {
    expect(() => gunzip(Uint8Array.from([0x1f, 0x8b, 0x00, 0x01]))).toThrow(CorruptArchiveError);
  });

  it('recognizes nested archive names', () => {
    expect(isArchiveName('data/inner.ZIP')).toBe(true);
    expect(isArchiveName('data/inner.shp')).toBe(false);
  });
});
