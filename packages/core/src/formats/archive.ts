/**
 * Archive unpacking
 *
 * ZIP (and KMZ) archives are unpacked one level into the job scratch area.
 * Gzip input is decompressed to a single file; a gzipped ZIP is unpacked as
 * a ZIP. Detection uses magic bytes:
 * - ZIP: 0x50 0x4B 0x03 0x04
 * - GZIP: 0x1F 0x8B
 *
 * Entries are inflated against the scratch quota as they stream, so a small
 * archive cannot expand past it.
 */

import { constants } from 'node:buffer';
import { basename, isAbsolute } from 'node:path';
import { gunzipSync } from 'node:zlib';
import JSZip from 'jszip';
import { CorruptArchiveError, ResourceExhaustedError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { ScratchSpace } from '../core/utils/scratch-space.js';
import { matchesSignature } from './sniffer.js';

const log = createLogger({ module: 'archive' });

export interface ExtractedFile {
  /** Path inside the archive, with forward slashes */
  readonly entryName: string;
  /** Absolute path in scratch */
  readonly path: string;
  readonly bytes: Uint8Array;
}

const ARCHIVE_EXTENSIONS = ['.zip', '.kmz', '.gz', '.tar', '.tgz', '.7z', '.rar'];

export function isArchiveName(name: string): boolean {
  const lower = name.toLowerCase();
  return ARCHIVE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

function isUnsafeEntryName(name: string): boolean {
  const normalized = name.replace(/\\/g, '/');
  return isAbsolute(normalized) || /^[A-Za-z]:/.test(normalized) || normalized.split('/').includes('..');
}

function isOutputTooLarge(error: unknown): boolean {
  return error instanceof RangeError && 'code' in error && error.code === 'ERR_BUFFER_TOO_LARGE';
}

/**
 * Decompress gzip bytes, producing at most `maxBytes`
 *
 * @throws CorruptArchiveError if the stream is invalid
 * @throws ResourceExhaustedError if the output would exceed `maxBytes`
 */
export function gunzip(bytes: Uint8Array, maxBytes = Number.MAX_SAFE_INTEGER): Uint8Array {
  if (maxBytes < 1) {
    throw new ResourceExhaustedError(`Decompressed data exceeds the ${maxBytes} bytes left in scratch`, maxBytes);
  }
  try {
    return new Uint8Array(gunzipSync(bytes, { maxOutputLength: Math.min(maxBytes, constants.MAX_LENGTH) }));
  } catch (error) {
    if (isOutputTooLarge(error)) {
      throw new ResourceExhaustedError(`Decompressed data exceeds the ${maxBytes} bytes left in scratch`, maxBytes);
    }
    throw new CorruptArchiveError('Gzip stream cannot be decompressed', { cause: error });
  }
}

/**
 * Inflate one ZIP entry, checking the running size against the room left in
 * scratch after every chunk
 */
async function inflateEntry(entry: JSZip.JSZipObject, entryName: string, scratch: ScratchSpace): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  let size = 0;
  try {
    for await (const chunk of entry.nodeStream('nodebuffer')) {
      const piece = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      size += piece.byteLength;
      scratch.ensureRoom(size);
      chunks.push(piece);
    }
  } catch (error) {
    if (error instanceof ResourceExhaustedError) throw error;
    throw new CorruptArchiveError(`Archive entry cannot be read: ${entryName}`, { cause: error });
  }
  const joined = Buffer.concat(chunks, size);
  return new Uint8Array(joined.buffer, joined.byteOffset, joined.byteLength);
}

/**
 * Unpack every file of a ZIP archive into `scratch` under `targetDir`
 *
 * @throws CorruptArchiveError for unreadable archives and entries that
 *   would escape the extraction directory
 */
export async function extractZip(bytes: Uint8Array, scratch: ScratchSpace, targetDir: string): Promise<ExtractedFile[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (error) {
    throw new CorruptArchiveError('Archive cannot be opened', { cause: error });
  }

  const files: ExtractedFile[] = [];
  for (const entry of Object.values(zip.files)) {
    if (entry.dir) continue;

    const entryName = entry.unsafeOriginalName ?? entry.name;
    if (isUnsafeEntryName(entryName)) {
      throw new CorruptArchiveError(`Archive entry escapes the extraction directory: ${entryName}`);
    }
    // macOS resource forks ride along in many hand-made archives
    if (entryName.startsWith('__MACOSX/') || basename(entryName).startsWith('._')) continue;

    const data = await inflateEntry(entry, entryName, scratch);
    const path = await scratch.writeFile(`${targetDir}/${entryName}`, data);
    files.push({ entryName: entryName.replace(/\\/g, '/'), path, bytes: data });
  }

  log.debug('Archive extracted', { entries: files.length, bytes: scratch.usedBytes });
  return files;
}

/**
 * Unpack a gzip file: a gzipped ZIP is unpacked as a ZIP, anything else
 * becomes one file named after the input minus `.gz`
 */
export async function extractGzip(
  bytes: Uint8Array,
  inputName: string,
  scratch: ScratchSpace,
  targetDir: string
): Promise<ExtractedFile[]> {
  const inflated = gunzip(bytes, scratch.remainingBytes);
  if (matchesSignature('zip', inflated)) {
    return extractZip(inflated, scratch, targetDir);
  }
  const entryName = basename(inputName).replace(/\.gz$/i, '') || 'dataset';
  const path = await scratch.writeFile(`${targetDir}/${entryName}`, inflated);
  return [{ entryName, path, bytes: inflated }];
}
