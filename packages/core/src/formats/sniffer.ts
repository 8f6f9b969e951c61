/**
 * Container sniffing by leading bytes
 *
 * | Container          | Signature                                    |
 * |--------------------|----------------------------------------------|
 * | zip, kmz           | 50 4B 03 04                                  |
 * | gzip               | 1F 8B                                        |
 * | shapefile (.shp)   | 00 00 27 0A (file code 9994, big-endian)     |
 * | gpkg               | "SQLite format 3\0"                          |
 * | geojson            | first non-blank character `{`                |
 * | kml                | first non-blank character `<`                |
 * | csv                | no NUL byte in the first 4 KiB               |
 */

import { extname } from 'node:path';
import type { FormatId } from '../core/types.js';
import { formatForExtension } from './format-registry.js';

export type ArchiveKind = 'zip' | 'gzip';

export type ContainerKind = FormatId | ArchiveKind;

const SQLITE_HEADER = new TextEncoder().encode('SQLite format 3\0');
const TEXT_PROBE_BYTES = 4096;

function startsWith(bytes: Uint8Array, prefix: ArrayLike<number>): boolean {
  if (bytes.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) return false;
  }
  return true;
}

/**
 * First character after an optional UTF-8 BOM and whitespace
 */
function firstNonBlank(bytes: Uint8Array): string | undefined {
  let i = startsWith(bytes, [0xef, 0xbb, 0xbf]) ? 3 : 0;
  const limit = Math.min(bytes.length, TEXT_PROBE_BYTES);
  for (; i < limit; i++) {
    const byte = bytes[i];
    if (byte === undefined) break;
    // space, tab, LF, CR
    if (byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d) continue;
    return String.fromCharCode(byte);
  }
  return undefined;
}

function looksLikeText(bytes: Uint8Array): boolean {
  return !bytes.subarray(0, TEXT_PROBE_BYTES).includes(0);
}

/**
 * Whether `bytes` carry the signature of `kind`
 */
export function matchesSignature(kind: ContainerKind, bytes: Uint8Array): boolean {
  switch (kind) {
    case 'zip':
      return startsWith(bytes, [0x50, 0x4b, 0x03, 0x04]);
    case 'gzip':
      return startsWith(bytes, [0x1f, 0x8b]);
    case 'shapefile':
      return startsWith(bytes, [0x00, 0x00, 0x27, 0x0a]);
    case 'gpkg':
      return startsWith(bytes, SQLITE_HEADER);
    case 'geojson':
      return firstNonBlank(bytes) === '{';
    case 'kml':
      return firstNonBlank(bytes) === '<';
    case 'csv':
      return bytes.length > 0 && looksLikeText(bytes);
  }
}

/**
 * Identify a container from its bytes alone
 */
export function sniffContainer(bytes: Uint8Array): ContainerKind | undefined {
  const order: readonly ContainerKind[] = ['zip', 'gzip', 'shapefile', 'gpkg', 'geojson', 'kml', 'csv'];
  return order.find((kind) => matchesSignature(kind, bytes));
}

/**
 * Container implied by a file name
 */
export function containerForPath(path: string): ContainerKind | undefined {
  const ext = extname(path).toLowerCase();
  if (ext === '.zip' || ext === '.kmz') return 'zip';
  if (ext === '.gz') return 'gzip';
  return formatForExtension(ext);
}
