/**
 * GeoPackage codec (better-sqlite3)
 *
 * Reads the first feature table listed in `gpkg_contents`. Writes a single
 * feature table into an in-memory database and serializes it, so no partial
 * file ever reaches the output directory.
 *
 * Geometry blobs: GeoPackage binary header (magic "GP", flags, SRS id,
 * optional envelope) followed by WKB.
 */

import Database from 'better-sqlite3';
import type { Geometry } from 'geojson';
import { z } from 'zod';
import { isConversionError, MalformedDataError } from '../core/errors.js';
import { computeExtent, coordinateDimension, deriveLayerKind, forEachPosition, isEmptyGeometry } from '../core/geo-utils.js';
import type { AttributeValue, FieldDefinition, FieldType, GeometryKind, Layer, LayerFeature } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { getCrsRegistry } from '../projection/crs-registry.js';
import type { DatasetInput, EncodeRequest } from './types.js';
import { decodeWkb, encodeWkb } from './wkb.js';

const log = createLogger({ module: 'gpkg' });

/** "GPKG" */
export const GPKG_APPLICATION_ID = 0x47504b47;
/** GeoPackage 1.3.0 */
export const GPKG_USER_VERSION = 10300;

// ============================================================================
// Row Schemas
// ============================================================================

const ContentsRowSchema = z.object({ table_name: z.string() });

const GeometryColumnRowSchema = z.object({
  column_name: z.string(),
  geometry_type_name: z.string(),
  srs_id: z.number().int(),
});

const SrsRowSchema = z.object({
  organization: z.string(),
  organization_coordsys_id: z.number().int(),
  definition: z.string(),
});

const TableInfoRowSchema = z.object({
  name: z.string(),
  type: z.string(),
  pk: z.number().int(),
});

const CellSchema = z.union([z.string(), z.number(), z.bigint(), z.instanceof(Uint8Array), z.null()]);
const FeatureRowSchema = z.record(CellSchema);

type Cell = z.infer<typeof CellSchema>;

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

// ============================================================================
// Geometry Blobs
// ============================================================================

/**
 * Envelope sizes in bytes, by the envelope indicator in header flags bits 1-3
 */
const ENVELOPE_BYTES: Readonly<Record<number, number>> = { 0: 0, 1: 32, 2: 48, 3: 48, 4: 64 };

export function decodeGeometryBlob(blob: Uint8Array): Geometry {
  if (blob.length < 8 || blob[0] !== 0x47 || blob[1] !== 0x50) {
    throw new MalformedDataError('GeoPackage geometry blob lacks the GP header');
  }
  const flags = blob[3] ?? 0;
  const envelope = ENVELOPE_BYTES[(flags >> 1) & 0x07];
  if (envelope === undefined) {
    throw new MalformedDataError(`Invalid GeoPackage envelope indicator in flags 0x${flags.toString(16)}`);
  }
  if ((flags & 0x20) !== 0) {
    throw new MalformedDataError('Extended GeoPackage geometry types are not supported');
  }

  return decodeWkb(blob.subarray(8 + envelope));
}

export function encodeGeometryBlob(geometry: Geometry, srsId: number): Uint8Array {
  const empty = isEmptyGeometry(geometry);
  const wkb = encodeWkb(geometry);
  const envelopeBytes = empty ? 0 : 32;
  const blob = new Uint8Array(8 + envelopeBytes + wkb.length);
  const view = new DataView(blob.buffer);

  blob[0] = 0x47;
  blob[1] = 0x50;
  blob[2] = 0;
  // little-endian header; envelope [minx, maxx, miny, maxy] unless empty
  blob[3] = empty ? 0x11 : 0x03;
  view.setInt32(4, srsId, true);

  if (!empty) {
    let minX = Infinity;
    let maxX = -Infinity;
    let minY = Infinity;
    let maxY = -Infinity;
    forEachPosition(geometry, ([x = NaN, y = NaN]) => {
      minX = Math.min(minX, x);
      maxX = Math.max(maxX, x);
      minY = Math.min(minY, y);
      maxY = Math.max(maxY, y);
    });
    view.setFloat64(8, minX, true);
    view.setFloat64(16, maxX, true);
    view.setFloat64(24, minY, true);
    view.setFloat64(32, maxY, true);
  }

  blob.set(wkb, 8 + envelopeBytes);
  return blob;
}

// ============================================================================
// Reader
// ============================================================================

function fieldTypeOfColumn(declared: string): FieldType | undefined {
  const type = declared.trim().toUpperCase();
  if (/^(INTEGER|INT|MEDIUMINT|SMALLINT|TINYINT)$/.test(type)) return 'integer';
  if (type === 'BOOLEAN') return 'boolean';
  if (/^(REAL|DOUBLE|FLOAT)$/.test(type)) return 'real';
  if (type === 'DATE') return 'date';
  if (type === 'DATETIME') return 'datetime';
  if (type === '' || type.startsWith('TEXT')) return 'text';
  return undefined;
}

function kindOfGeometryTypeName(name: string): GeometryKind | undefined {
  switch (name.toUpperCase()) {
    case 'POINT':
    case 'MULTIPOINT':
      return 'point';
    case 'LINESTRING':
    case 'MULTILINESTRING':
      return 'line';
    case 'POLYGON':
    case 'MULTIPOLYGON':
      return 'polygon';
    default:
      return undefined;
  }
}

function cellValue(cell: Cell | undefined, type: FieldType): AttributeValue {
  if (cell === undefined || cell === null) return null;
  if (cell instanceof Uint8Array) return null;
  if (typeof cell === 'bigint') return Number(cell);
  switch (type) {
    case 'boolean':
      return typeof cell === 'number' ? cell !== 0 : cell === 'true' || cell === '1';
    case 'integer':
    case 'real':
      return typeof cell === 'number' ? cell : Number.isFinite(Number(cell)) ? Number(cell) : null;
    default:
      return String(cell);
  }
}

function parseRows<T>(schema: z.ZodType<T>, rows: unknown[], what: string): T[] {
  return rows.map((row) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new MalformedDataError(`Unexpected ${what} row in GeoPackage`);
    }
    return parsed.data;
  });
}

export async function readGeoPackage(input: DatasetInput): Promise<Layer> {
  let db: Database.Database;
  try {
    db = new Database(input.path, { readonly: true, fileMustExist: true });
  } catch (error) {
    throw new MalformedDataError(`Cannot open GeoPackage ${input.layerName}`, 'read', { cause: error });
  }

  try {
    const [contents] = parseRows(
      ContentsRowSchema,
      db.prepare(`SELECT table_name FROM gpkg_contents WHERE data_type = 'features' ORDER BY rowid`).all(),
      'gpkg_contents'
    );
    if (!contents) {
      throw new MalformedDataError('GeoPackage holds no feature table');
    }
    const table = contents.table_name;

    const [geometryColumn] = parseRows(
      GeometryColumnRowSchema,
      db
        .prepare(`SELECT column_name, geometry_type_name, srs_id FROM gpkg_geometry_columns WHERE table_name = ?`)
        .all(table),
      'gpkg_geometry_columns'
    );
    if (!geometryColumn) {
      throw new MalformedDataError(`Feature table '${table}' has no geometry column`);
    }

    const [srs] = parseRows(
      SrsRowSchema,
      db
        .prepare(
          `SELECT organization, organization_coordsys_id, definition FROM gpkg_spatial_ref_sys WHERE srs_id = ?`
        )
        .all(geometryColumn.srs_id),
      'gpkg_spatial_ref_sys'
    );
    let embeddedCrs: string | undefined;
    if (srs && srs.organization.toUpperCase() === 'EPSG' && srs.organization_coordsys_id > 0) {
      embeddedCrs = `EPSG:${srs.organization_coordsys_id}`;
    } else if (srs && srs.definition !== 'undefined') {
      embeddedCrs = srs.definition;
    }

    const columns = parseRows(TableInfoRowSchema, db.prepare(`PRAGMA table_info(${quoteIdentifier(table)})`).all(), 'table_info');
    const pk = columns.find((c) => c.pk > 0)?.name;
    const schema: FieldDefinition[] = [];
    for (const column of columns) {
      if (column.name === pk || column.name === geometryColumn.column_name) continue;
      const type = fieldTypeOfColumn(column.type);
      if (type === undefined) {
        log.warn('Skipping GeoPackage column of unsupported type', { table, column: column.name, type: column.type });
        continue;
      }
      schema.push({ name: column.name, type });
    }

    const order = pk ? ` ORDER BY ${quoteIdentifier(pk)}` : '';
    const rows = parseRows(FeatureRowSchema, db.prepare(`SELECT * FROM ${quoteIdentifier(table)}${order}`).all(), 'feature');

    const features: LayerFeature[] = rows.map((row, index) => {
      const blob = row[geometryColumn.column_name];
      let geometry: Geometry | null = null;
      if (blob instanceof Uint8Array) {
        try {
          geometry = decodeGeometryBlob(blob);
        } catch (error) {
          if (error instanceof MalformedDataError) {
            throw new MalformedDataError(error.message, 'read', { featureIndex: index, cause: error });
          }
          throw error;
        }
      }
      const attributes: Record<string, AttributeValue> = {};
      for (const field of schema) attributes[field.name] = cellValue(row[field.name], field.type);
      return { index, geometry, attributes };
    });

    return {
      name: table,
      kind: kindOfGeometryTypeName(geometryColumn.geometry_type_name) ?? deriveLayerKind(features),
      schema,
      features,
      source: {
        format: 'gpkg',
        ...(embeddedCrs !== undefined ? { embeddedCrs } : {}),
        encoding: 'utf-8',
      },
    };
  } catch (error) {
    if (isConversionError(error)) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedDataError(`Cannot read GeoPackage ${input.layerName}: ${message}`, 'read', { cause: error });
  } finally {
    db.close();
  }
}

// ============================================================================
// Writer
// ============================================================================

const COLUMN_TYPES: Readonly<Record<FieldType, string>> = {
  text: 'TEXT',
  integer: 'INTEGER',
  real: 'REAL',
  boolean: 'BOOLEAN',
  date: 'DATE',
  datetime: 'DATETIME',
  json: 'TEXT',
};

function geometryTypeName(layer: Layer): string {
  const types = new Set(layer.features.flatMap((f) => (f.geometry ? [f.geometry.type] : [])));
  const pick = (single: Geometry['type'], multi: Geometry['type']): string =>
    (types.has(multi) ? multi : single).toUpperCase();
  switch (layer.kind) {
    case 'point':
      return pick('Point', 'MultiPoint');
    case 'line':
      return pick('LineString', 'MultiLineString');
    case 'polygon':
      return pick('Polygon', 'MultiPolygon');
    default:
      return 'GEOMETRY';
  }
}

function tableNameFor(layer: Layer): string {
  const name = layer.name.trim() === '' ? 'layer' : layer.name.trim();
  return name.toLowerCase().startsWith('gpkg_') ? `layer_${name}` : name;
}

function bindValue(value: AttributeValue): string | number | null {
  if (value === null || typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return JSON.stringify(value);
}

function createMetadataTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE gpkg_spatial_ref_sys (
      srs_name TEXT NOT NULL,
      srs_id INTEGER PRIMARY KEY,
      organization TEXT NOT NULL,
      organization_coordsys_id INTEGER NOT NULL,
      definition TEXT NOT NULL,
      description TEXT
    );

    CREATE TABLE gpkg_contents (
      table_name TEXT NOT NULL PRIMARY KEY,
      data_type TEXT NOT NULL,
      identifier TEXT UNIQUE,
      description TEXT DEFAULT '',
      last_change DATETIME NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
      min_x DOUBLE,
      min_y DOUBLE,
      max_x DOUBLE,
      max_y DOUBLE,
      srs_id INTEGER,
      CONSTRAINT fk_gc_r_srs_id FOREIGN KEY (srs_id) REFERENCES gpkg_spatial_ref_sys(srs_id)
    );

    CREATE TABLE gpkg_geometry_columns (
      table_name TEXT NOT NULL,
      column_name TEXT NOT NULL,
      geometry_type_name TEXT NOT NULL,
      srs_id INTEGER NOT NULL,
      z TINYINT NOT NULL,
      m TINYINT NOT NULL,
      CONSTRAINT pk_geom_cols PRIMARY KEY (table_name, column_name),
      CONSTRAINT fk_gc_tn FOREIGN KEY (table_name) REFERENCES gpkg_contents(table_name),
      CONSTRAINT fk_gc_srs FOREIGN KEY (srs_id) REFERENCES gpkg_spatial_ref_sys(srs_id)
    );
  `);
}

export async function encodeGeoPackage(request: EncodeRequest): Promise<Uint8Array> {
  const { layer, epsg, crs } = request;
  const table = tableNameFor(layer);
  const db = new Database(':memory:');

  try {
    db.pragma(`application_id = ${GPKG_APPLICATION_ID}`);
    db.pragma(`user_version = ${GPKG_USER_VERSION}`);
    db.pragma('foreign_keys = ON');
    createMetadataTables(db);

    const insertSrs = db.prepare(`
      INSERT INTO gpkg_spatial_ref_sys (srs_name, srs_id, organization, organization_coordsys_id, definition)
      VALUES (?, ?, ?, ?, ?)
    `);
    const wgs84 = epsg === 4326 ? crs : getCrsRegistry().get(4326);
    insertSrs.run('Undefined cartesian SRS', -1, 'NONE', -1, 'undefined');
    insertSrs.run('Undefined geographic SRS', 0, 'NONE', 0, 'undefined');
    insertSrs.run('WGS 84 geodetic', 4326, 'EPSG', 4326, wgs84?.wkt ?? 'undefined');
    if (epsg !== 4326) {
      insertSrs.run(crs?.name ?? `EPSG:${epsg}`, epsg, 'EPSG', epsg, crs?.wkt ?? 'undefined');
    }

    const fieldColumns = layer.schema.map((f) => `${quoteIdentifier(f.name)} ${COLUMN_TYPES[f.type]}`);
    const geometryType = geometryTypeName(layer);
    db.exec(`
      CREATE TABLE ${quoteIdentifier(table)} (
        fid INTEGER PRIMARY KEY AUTOINCREMENT,
        geom ${geometryType}${fieldColumns.map((c) => `,\n        ${c}`).join('')}
      )
    `);

    const extent = computeExtent(layer.features);
    db.prepare(`
      INSERT INTO gpkg_contents (table_name, data_type, identifier, min_x, min_y, max_x, max_y, srs_id)
      VALUES (?, 'features', ?, ?, ?, ?, ?, ?)
    `).run(table, table, extent?.[0] ?? null, extent?.[1] ?? null, extent?.[2] ?? null, extent?.[3] ?? null, epsg);

    const hasZ = layer.features.some((f) => f.geometry !== null && coordinateDimension(f.geometry) >= 3);
    db.prepare(`
      INSERT INTO gpkg_geometry_columns (table_name, column_name, geometry_type_name, srs_id, z, m)
      VALUES (?, 'geom', ?, ?, ?, 0)
    `).run(table, geometryType, epsg, hasZ ? 1 : 0);

    const placeholders = ['?', ...layer.schema.map(() => '?')].join(', ');
    const names = ['geom', ...layer.schema.map((f) => quoteIdentifier(f.name))].join(', ');
    const insertFeature = db.prepare(`INSERT INTO ${quoteIdentifier(table)} (${names}) VALUES (${placeholders})`);

    const insertAll = db.transaction(() => {
      for (const feature of layer.features) {
        const blob = feature.geometry ? Buffer.from(encodeGeometryBlob(feature.geometry, epsg)) : null;
        insertFeature.run(blob, ...layer.schema.map((f) => bindValue(feature.attributes[f.name] ?? null)));
      }
    });
    insertAll();

    return new Uint8Array(db.serialize());
  } finally {
    db.close();
  }
}
