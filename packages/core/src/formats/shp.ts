/**
 * SHP/SHX geometry encoding
 *
 * Main file (.shp): 100-byte header, then one record per feature (record
 * header big-endian, content little-endian). Index file (.shx): the same
 * header, then offset/length pairs in 16-bit words.
 *
 * Polygons are written with clockwise exterior rings and counter-clockwise
 * holes, as the format requires.
 */

import rewind from '@turf/rewind';
import type { Geometry, MultiPolygon, Polygon, Position } from 'geojson';
import { WriteCapabilityError } from '../core/errors.js';
import { coordinateDimension, geometryKindsPresent } from '../core/geo-utils.js';
import type { LayerFeature } from '../core/types.js';

export const SHAPE_TYPES = {
  NULL: 0,
  POINT: 1,
  POLYLINE: 3,
  POLYGON: 5,
  MULTIPOINT: 8,
  POINT_Z: 11,
  POLYLINE_Z: 13,
  POLYGON_Z: 15,
  MULTIPOINT_Z: 18,
} as const;

export type ShapeType = (typeof SHAPE_TYPES)[keyof typeof SHAPE_TYPES];

const FILE_CODE = 9994;
const VERSION = 1000;
const HEADER_BYTES = 100;

interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  minZ: number;
  maxZ: number;
}

function emptyBounds(): Bounds {
  return { minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity, minZ: Infinity, maxZ: -Infinity };
}

function extend(bounds: Bounds, position: Position): void {
  const [x = 0, y = 0, z = 0] = position;
  bounds.minX = Math.min(bounds.minX, x);
  bounds.minY = Math.min(bounds.minY, y);
  bounds.maxX = Math.max(bounds.maxX, x);
  bounds.maxY = Math.max(bounds.maxY, y);
  bounds.minZ = Math.min(bounds.minZ, z);
  bounds.maxZ = Math.max(bounds.maxZ, z);
}

function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

/**
 * Shape type for the geometries of a layer
 *
 * @throws WriteCapabilityError when the layer mixes kinds or holds collections
 */
export function selectShapeType(features: readonly LayerFeature[]): ShapeType {
  const kinds = geometryKindsPresent(features);
  if (kinds.has('mixed') || kinds.size > 1) {
    throw new WriteCapabilityError(
      `Shapefile holds a single geometry kind; layer has ${[...kinds].sort().join(', ')}`
    );
  }

  const geometries = features.flatMap((f) => (f.geometry ? [f.geometry] : []));
  const hasZ = geometries.some((g) => coordinateDimension(g) >= 3);
  const [kind] = kinds;

  switch (kind) {
    case undefined:
      return SHAPE_TYPES.NULL;
    case 'point': {
      const multi = geometries.some((g) => g.type === 'MultiPoint');
      if (multi) return hasZ ? SHAPE_TYPES.MULTIPOINT_Z : SHAPE_TYPES.MULTIPOINT;
      return hasZ ? SHAPE_TYPES.POINT_Z : SHAPE_TYPES.POINT;
    }
    case 'line':
      return hasZ ? SHAPE_TYPES.POLYLINE_Z : SHAPE_TYPES.POLYLINE;
    default:
      return hasZ ? SHAPE_TYPES.POLYGON_Z : SHAPE_TYPES.POLYGON;
  }
}

/**
 * Parts of a geometry as lists of positions, in shapefile ring order
 */
function partsOf(geometry: Geometry): Position[][] {
  switch (geometry.type) {
    case 'Point':
      return geometry.coordinates.length > 0 ? [[geometry.coordinates]] : [];
    case 'MultiPoint':
      return geometry.coordinates.length > 0 ? [geometry.coordinates] : [];
    case 'LineString':
      return geometry.coordinates.length > 0 ? [geometry.coordinates] : [];
    case 'MultiLineString':
      return geometry.coordinates.filter((line) => line.length > 0);
    case 'Polygon':
    case 'MultiPolygon': {
      const wound: Polygon | MultiPolygon = rewind(geometry, { reverse: true });
      const polygons = wound.type === 'Polygon' ? [wound.coordinates] : wound.coordinates;
      return polygons.flat().filter((ring) => ring.length > 0);
    }
    case 'GeometryCollection':
      return [];
  }
}

/**
 * Byte writer over a growable buffer
 */
class ByteSink {
  private buffer = new Uint8Array(1024);
  private view = new DataView(this.buffer.buffer);
  private length = 0;

  private ensure(extra: number): void {
    if (this.length + extra <= this.buffer.length) return;
    let size = this.buffer.length * 2;
    while (size < this.length + extra) size *= 2;
    const next = new Uint8Array(size);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }

  int32BE(value: number): void {
    this.ensure(4);
    this.view.setInt32(this.length, value, false);
    this.length += 4;
  }

  int32LE(value: number): void {
    this.ensure(4);
    this.view.setInt32(this.length, value, true);
    this.length += 4;
  }

  float64LE(value: number): void {
    this.ensure(8);
    this.view.setFloat64(this.length, value, true);
    this.length += 8;
  }

  append(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  bytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}

function recordContent(geometry: Geometry | null, shapeType: ShapeType): ByteSink {
  const sink = new ByteSink();
  const parts = geometry ? partsOf(geometry) : [];
  if (shapeType === SHAPE_TYPES.NULL || parts.length === 0) {
    sink.int32LE(SHAPE_TYPES.NULL);
    return sink;
  }

  const points = parts.flat();
  const hasZ = shapeType >= 11;
  sink.int32LE(shapeType);

  if (shapeType === SHAPE_TYPES.POINT || shapeType === SHAPE_TYPES.POINT_Z) {
    const [x = 0, y = 0, z = 0] = points[0] ?? [];
    sink.float64LE(x);
    sink.float64LE(y);
    if (hasZ) {
      sink.float64LE(z);
      sink.float64LE(0);
    }
    return sink;
  }

  const bounds = emptyBounds();
  points.forEach((p) => extend(bounds, p));
  sink.float64LE(bounds.minX);
  sink.float64LE(bounds.minY);
  sink.float64LE(bounds.maxX);
  sink.float64LE(bounds.maxY);

  const isMultiPoint = shapeType === SHAPE_TYPES.MULTIPOINT || shapeType === SHAPE_TYPES.MULTIPOINT_Z;
  if (!isMultiPoint) sink.int32LE(parts.length);
  sink.int32LE(points.length);
  if (!isMultiPoint) {
    let start = 0;
    for (const part of parts) {
      sink.int32LE(start);
      start += part.length;
    }
  }
  for (const [x = 0, y = 0] of points) {
    sink.float64LE(x);
    sink.float64LE(y);
  }
  if (hasZ) {
    sink.float64LE(finite(bounds.minZ));
    sink.float64LE(finite(bounds.maxZ));
    for (const p of points) sink.float64LE(p[2] ?? 0);
    // M range and values (unused)
    sink.float64LE(0);
    sink.float64LE(0);
    for (let i = 0; i < points.length; i++) sink.float64LE(0);
  }
  return sink;
}

function writeHeader(sink: ByteSink, fileBytes: number, shapeType: ShapeType, bounds: Bounds): void {
  sink.int32BE(FILE_CODE);
  for (let i = 0; i < 5; i++) sink.int32BE(0);
  sink.int32BE(fileBytes / 2);
  sink.int32LE(VERSION);
  sink.int32LE(shapeType);
  sink.float64LE(finite(bounds.minX));
  sink.float64LE(finite(bounds.minY));
  sink.float64LE(finite(bounds.maxX));
  sink.float64LE(finite(bounds.maxY));
  sink.float64LE(finite(bounds.minZ));
  sink.float64LE(finite(bounds.maxZ));
  sink.float64LE(0);
  sink.float64LE(0);
}

export interface ShpFiles {
  readonly shp: Uint8Array;
  readonly shx: Uint8Array;
  readonly shapeType: ShapeType;
}

/**
 * Encode the geometries of `features` as .shp and .shx files
 */
export function writeShp(features: readonly LayerFeature[]): ShpFiles {
  const shapeType = selectShapeType(features);
  const bounds = emptyBounds();
  const contents = features.map((feature) => {
    if (feature.geometry) {
      for (const part of partsOf(feature.geometry)) part.forEach((p) => extend(bounds, p));
    }
    return recordContent(feature.geometry, shapeType).bytes();
  });

  const shpLength = HEADER_BYTES + contents.reduce((sum, c) => sum + 8 + c.length, 0);
  const shxLength = HEADER_BYTES + contents.length * 8;

  const shp = new ByteSink();
  const shx = new ByteSink();
  writeHeader(shp, shpLength, shapeType, bounds);
  writeHeader(shx, shxLength, shapeType, bounds);

  let offset = HEADER_BYTES;
  contents.forEach((content, i) => {
    shx.int32BE(offset / 2);
    shx.int32BE(content.length / 2);

    shp.int32BE(i + 1);
    shp.int32BE(content.length / 2);
    shp.append(content);
    offset += 8 + content.length;
  });

  return { shp: shp.bytes(), shx: shx.bytes(), shapeType };
}
