/**
 * Format Reader
 *
 * Turns an input file into a Layer:
 * 1. Decide the container from the declared format, the file extension or
 *    the leading bytes, and verify the bytes carry that container's signature
 * 2. Unpack archives one level into the job scratch area and pick the
 *    dataset inside by priority
 * 3. Gather sidecar files (.dbf, .shx, .prj, .cpg) and hand everything to the
 *    format's codec
 */

import { readFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { CorruptArchiveError, MalformedDataError, UnsupportedFormatError } from '../core/errors.js';
import type { FormatId, Layer } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { ScratchSpace } from '../core/utils/scratch-space.js';
import { extractGzip, extractZip, isArchiveName, type ExtractedFile } from '../formats/archive.js';
import type { TextEncodingName } from '../formats/encoding.js';
import { getFormat } from '../formats/format-registry.js';
import { readGeoJson } from '../formats/geojson.js';
import { readGeoPackage } from '../formats/gpkg.js';
import { readKml } from '../formats/kml.js';
import { readCsv } from '../formats/csv.js';
import { readShapefile } from '../formats/shapefile.js';
import { containerForPath, matchesSignature, sniffContainer, type ArchiveKind, type ContainerKind } from '../formats/sniffer.js';
import type { CompanionExtension, DatasetInput, DatasetReader } from '../formats/types.js';

const log = createLogger({ module: 'format-reader' });

const READERS: Readonly<Record<FormatId, DatasetReader>> = {
  geojson: readGeoJson,
  shapefile: readShapefile,
  gpkg: readGeoPackage,
  kml: readKml,
  csv: readCsv,
};

/**
 * Main-file extensions, highest priority first, when choosing inside an archive
 */
export const DATASET_PRIORITY: ReadonlyArray<readonly [string, FormatId]> = [
  ['.shp', 'shapefile'],
  ['.gpkg', 'gpkg'],
  ['.geojson', 'geojson'],
  ['.json', 'geojson'],
  ['.kml', 'kml'],
  ['.csv', 'csv'],
];

const COMPANIONS: readonly CompanionExtension[] = ['.dbf', '.shx', '.prj', '.cpg'];

export interface ReadRequest {
  /** Path of the input file */
  readonly inputLocation: string;
  readonly declaredFormat?: FormatId;
  readonly encoding: TextEncodingName;
}

// ============================================================================
// Container resolution
// ============================================================================

function isArchiveKind(kind: ContainerKind): kind is 'zip' | 'gzip' {
  return kind === 'zip' || kind === 'gzip';
}

/**
 * Container of the input file
 *
 * An archive extension (`.zip`, `.kmz`, `.gz`) must carry its archive
 * signature. Archive bytes under any other known extension are refused; with
 * no known extension they are accepted, so a declared `kml` may arrive as a
 * KMZ. Otherwise the declared format, then the extension, must match the bytes.
 *
 * @throws UnsupportedFormatError when the signature disagrees or nothing matches
 */
export function resolveContainer(path: string, bytes: Uint8Array, declared?: FormatId): ContainerKind {
  const fromPath = containerForPath(path);
  const mismatch = (expected: ContainerKind, source: string): UnsupportedFormatError =>
    new UnsupportedFormatError(`Input does not carry the signature of ${expected} (from ${source}): ${basename(path)}`);

  const archive: ArchiveKind | undefined = matchesSignature('zip', bytes)
    ? 'zip'
    : matchesSignature('gzip', bytes)
      ? 'gzip'
      : undefined;

  if (fromPath !== undefined && isArchiveKind(fromPath)) {
    if (archive !== fromPath) throw mismatch(fromPath, 'file extension');
    return fromPath;
  }
  if (archive !== undefined) {
    if (fromPath !== undefined) throw mismatch(fromPath, 'file extension');
    return archive;
  }

  const expected: ContainerKind | undefined = declared ?? fromPath;
  if (expected !== undefined) {
    if (!matchesSignature(expected, bytes)) {
      throw mismatch(expected, declared !== undefined ? 'declared format' : 'file extension');
    }
    return expected;
  }

  const sniffed = sniffContainer(bytes);
  if (sniffed === undefined) {
    throw new UnsupportedFormatError(`Cannot identify the format of ${basename(path)}`);
  }
  return sniffed;
}

// ============================================================================
// Archive datasets
// ============================================================================

function stem(name: string): string {
  return name.slice(0, name.length - extname(name).length);
}

/**
 * Pick the dataset inside an unpacked archive
 *
 * @throws CorruptArchiveError when none is found, when the only content is
 *   another archive, or when a shapefile lacks its .dbf
 */
export function selectArchiveDataset(
  files: readonly ExtractedFile[],
  declared?: FormatId
): { readonly main: ExtractedFile; readonly format: FormatId; readonly companions: DatasetInput['companions'] } {
  const sorted = [...files].sort((a, b) => a.entryName.localeCompare(b.entryName));

  for (const [extension, format] of DATASET_PRIORITY) {
    if (declared !== undefined && declared !== format) continue;
    const main = sorted.find((f) => extname(f.entryName).toLowerCase() === extension);
    if (!main) continue;

    const base = stem(main.entryName).toLowerCase();
    const companions: Partial<Record<CompanionExtension, Uint8Array>> = {};
    for (const companion of COMPANIONS) {
      const file = sorted.find((f) => f.entryName.toLowerCase() === `${base}${companion}`);
      if (file) companions[companion] = file.bytes;
    }
    if (format === 'shapefile' && !companions['.dbf']) {
      throw new CorruptArchiveError(`Archive holds ${main.entryName} without its .dbf`);
    }
    return { main, format, companions };
  }

  if (sorted.some((f) => isArchiveName(f.entryName))) {
    throw new CorruptArchiveError('Archive contains only nested archives, which are not unpacked');
  }
  const wanted = declared !== undefined ? `${getFormat(declared).label} dataset` : 'recognized dataset';
  throw new CorruptArchiveError(`Archive holds no ${wanted}`);
}

// ============================================================================
// Plain files
// ============================================================================

async function readOptional(path: string): Promise<Uint8Array | undefined> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined;
    throw error;
  }
}

/**
 * Sidecar files next to `path`, in lower or upper case extension
 */
async function siblingCompanions(path: string): Promise<DatasetInput['companions']> {
  const base = join(dirname(path), stem(basename(path)));
  const companions: Partial<Record<CompanionExtension, Uint8Array>> = {};
  for (const companion of COMPANIONS) {
    const bytes = (await readOptional(`${base}${companion}`)) ?? (await readOptional(`${base}${companion.toUpperCase()}`));
    if (bytes) companions[companion] = bytes;
  }
  return companions;
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Read the input of a job into a Layer
 *
 * @throws UnsupportedFormatError, CorruptArchiveError, MalformedDataError
 */
export async function readLayer(request: ReadRequest, scratch: ScratchSpace): Promise<Layer> {
  const { inputLocation, declaredFormat, encoding } = request;

  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await readFile(inputLocation));
  } catch (error) {
    throw new MalformedDataError(`Cannot read input ${inputLocation}`, 'read', { cause: error });
  }

  const container = resolveContainer(inputLocation, bytes, declaredFormat);
  let input: DatasetInput;

  if (isArchiveKind(container)) {
    const files =
      container === 'zip'
        ? await extractZip(bytes, scratch, 'input')
        : await extractGzip(bytes, basename(inputLocation), scratch, 'input');
    const { main, format, companions } = selectArchiveDataset(files, declaredFormat);
    if (!matchesSignature(format, main.bytes)) {
      throw new UnsupportedFormatError(`Archive entry ${main.entryName} does not carry the ${format} signature`);
    }
    input = {
      format,
      path: main.path,
      bytes: main.bytes,
      layerName: stem(basename(main.entryName)),
      companions,
      encoding,
    };
    log.info('Dataset selected from archive', { archive: basename(inputLocation), entry: main.entryName, format });
  } else {
    input = {
      format: container,
      path: inputLocation,
      bytes,
      layerName: stem(basename(inputLocation)),
      companions: container === 'shapefile' ? await siblingCompanions(inputLocation) : {},
      encoding,
    };
  }

  const layer = await READERS[input.format](input);
  log.info('Layer read', {
    format: input.format,
    layer: layer.name,
    features: layer.features.length,
    fields: layer.schema.length,
    encoding: layer.source.encoding,
    ...(layer.source.encodingFallback !== undefined ? { encodingFallback: layer.source.encodingFallback } : {}),
  });
  return layer;
}
