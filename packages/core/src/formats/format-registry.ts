/**
 * Format Registry
 *
 * Static description of every container the core handles: the names a job
 * may use for it, its file extensions, and what its writer can represent.
 * The writer and the orchestrator consult these capabilities before any
 * bytes are produced.
 */

import { UnsupportedFormatError, type PipelineStage } from '../core/errors.js';
import type { FieldType, FormatId, GeometryKind } from '../core/types.js';

/**
 * How a writer stores a field type
 * - native: a column type of the container holds it
 * - text: stored as its text form unless strict field types are requested
 * - unsupported: never stored
 */
export type FieldEncoding = 'native' | 'text' | 'unsupported';

export interface FormatCapabilities {
  readonly id: FormatId;
  readonly label: string;
  readonly aliases: readonly string[];
  /** Extensions of the main dataset file, lowercase with dot */
  readonly extensions: readonly string[];
  /** Extension of the published artifact */
  readonly outputExtension: string;
  readonly mediaType: string;
  /** Geometry kinds the writer accepts */
  readonly geometryKinds: ReadonlySet<GeometryKind>;
  /** All geometries of a layer must share one kind */
  readonly singleGeometryKind: boolean;
  readonly fieldTypes: Readonly<Record<FieldType, FieldEncoding>>;
  readonly maxFieldNameLength?: number;
  /** Field names restricted to printable ASCII */
  readonly asciiFieldNames: boolean;
  /** Field names matched without regard to case */
  readonly caseInsensitiveFieldNames: boolean;
  /** Names the container reserves for its own columns */
  readonly reservedFieldNames: readonly string[];
  /** Writer applies the job encoding (otherwise output is always UTF-8) */
  readonly honorsEncoding: boolean;
  /** CRS the container mandates */
  readonly requiredEpsg?: number;
}

const ALL_KINDS: ReadonlySet<GeometryKind> = new Set(['point', 'line', 'polygon', 'mixed']);

export const FORMATS: Readonly<Record<FormatId, FormatCapabilities>> = {
  geojson: {
    id: 'geojson',
    label: 'GeoJSON',
    aliases: ['geojson', 'json'],
    extensions: ['.geojson', '.json'],
    outputExtension: '.geojson',
    mediaType: 'application/geo+json',
    geometryKinds: ALL_KINDS,
    singleGeometryKind: false,
    fieldTypes: {
      text: 'native',
      integer: 'native',
      real: 'native',
      boolean: 'native',
      date: 'native',
      datetime: 'native',
      json: 'native',
    },
    asciiFieldNames: false,
    caseInsensitiveFieldNames: false,
    reservedFieldNames: [],
    honorsEncoding: false,
  },
  shapefile: {
    id: 'shapefile',
    label: 'ESRI Shapefile',
    aliases: ['esri shapefile', 'shapefile', 'shp'],
    extensions: ['.shp'],
    outputExtension: '.zip',
    mediaType: 'application/zip',
    geometryKinds: new Set(['point', 'line', 'polygon']),
    singleGeometryKind: true,
    fieldTypes: {
      text: 'native',
      integer: 'native',
      real: 'native',
      boolean: 'native',
      date: 'native',
      datetime: 'text',
      json: 'text',
    },
    maxFieldNameLength: 10,
    asciiFieldNames: true,
    caseInsensitiveFieldNames: true,
    reservedFieldNames: [],
    honorsEncoding: true,
  },
  gpkg: {
    id: 'gpkg',
    label: 'GeoPackage',
    aliases: ['gpkg', 'geopackage'],
    extensions: ['.gpkg'],
    outputExtension: '.gpkg',
    mediaType: 'application/geopackage+sqlite3',
    geometryKinds: ALL_KINDS,
    singleGeometryKind: false,
    fieldTypes: {
      text: 'native',
      integer: 'native',
      real: 'native',
      boolean: 'native',
      date: 'native',
      datetime: 'native',
      json: 'text',
    },
    asciiFieldNames: false,
    caseInsensitiveFieldNames: true,
    reservedFieldNames: ['fid', 'geom'],
    honorsEncoding: false,
  },
  kml: {
    id: 'kml',
    label: 'KML',
    aliases: ['kml', 'kmz'],
    extensions: ['.kml'],
    outputExtension: '.kml',
    mediaType: 'application/vnd.google-earth.kml+xml',
    geometryKinds: ALL_KINDS,
    singleGeometryKind: false,
    fieldTypes: {
      text: 'native',
      integer: 'text',
      real: 'text',
      boolean: 'text',
      date: 'text',
      datetime: 'text',
      json: 'text',
    },
    asciiFieldNames: false,
    caseInsensitiveFieldNames: false,
    reservedFieldNames: [],
    honorsEncoding: false,
    requiredEpsg: 4326,
  },
  csv: {
    id: 'csv',
    label: 'CSV',
    aliases: ['csv'],
    extensions: ['.csv'],
    outputExtension: '.csv',
    mediaType: 'text/csv',
    geometryKinds: new Set(['point']),
    singleGeometryKind: true,
    fieldTypes: {
      text: 'native',
      integer: 'text',
      real: 'text',
      boolean: 'text',
      date: 'text',
      datetime: 'text',
      json: 'text',
    },
    asciiFieldNames: false,
    caseInsensitiveFieldNames: true,
    reservedFieldNames: ['longitude', 'latitude', 'x', 'y'],
    honorsEncoding: true,
  },
};

/**
 * Formats listed by other converters that this core does not handle
 */
const KNOWN_UNSUPPORTED = new Set(['dxf', 'openfilegdb', 'filegdb', 'gdb', 'flatgeobuf', 'fgb']);

export function getFormat(id: FormatId): FormatCapabilities {
  return FORMATS[id];
}

/**
 * Resolve a format name or alias (case-insensitive)
 *
 * @throws UnsupportedFormatError for unknown names
 */
export function resolveFormatId(name: string, stage: PipelineStage = 'job'): FormatId {
  const wanted = name.trim().toLowerCase();
  for (const format of Object.values(FORMATS)) {
    if (format.aliases.includes(wanted)) return format.id;
  }
  const hint = KNOWN_UNSUPPORTED.has(wanted) ? ' (recognized but not supported)' : '';
  throw new UnsupportedFormatError(`Unknown format '${name}'${hint}`, stage);
}

/**
 * Dataset format for a file extension (`.shp`, `.json`, ...)
 */
export function formatForExtension(extension: string): FormatId | undefined {
  const ext = extension.toLowerCase();
  return Object.values(FORMATS).find((format) => format.extensions.includes(ext))?.id;
}
