/**
 * Well-Known Binary geometry codec
 *
 * Writes little-endian ISO WKB (type + 1000 for Z). Reads either byte order,
 * ISO Z/M/ZM type codes and EWKB flag bits; M ordinates are discarded.
 */

import type { Geometry, Position } from 'geojson';
import { MalformedDataError } from '../core/errors.js';
import { coordinateDimension } from '../core/geo-utils.js';

const WKB_TYPES = {
  Point: 1,
  LineString: 2,
  Polygon: 3,
  MultiPoint: 4,
  MultiLineString: 5,
  MultiPolygon: 6,
  GeometryCollection: 7,
} as const satisfies Record<Geometry['type'], number>;

const EWKB_Z = 0x80000000;
const EWKB_M = 0x40000000;
const EWKB_SRID = 0x20000000;

// ============================================================================
// Encoding
// ============================================================================

class WkbWriter {
  private readonly chunks: Uint8Array[] = [];
  private size = 0;

  constructor(private readonly hasZ: boolean) {}

  private push(bytes: Uint8Array): void {
    this.chunks.push(bytes);
    this.size += bytes.length;
  }

  private header(type: number): void {
    const bytes = new Uint8Array(5);
    const view = new DataView(bytes.buffer);
    bytes[0] = 1;
    view.setUint32(1, this.hasZ ? type + 1000 : type, true);
    this.push(bytes);
  }

  private count(n: number): void {
    const bytes = new Uint8Array(4);
    new DataView(bytes.buffer).setUint32(0, n, true);
    this.push(bytes);
  }

  private positions(list: readonly Position[]): void {
    const stride = this.hasZ ? 3 : 2;
    const bytes = new Uint8Array(list.length * stride * 8);
    const view = new DataView(bytes.buffer);
    list.forEach((p, i) => {
      const offset = i * stride * 8;
      view.setFloat64(offset, p[0] ?? NaN, true);
      view.setFloat64(offset + 8, p[1] ?? NaN, true);
      if (this.hasZ) view.setFloat64(offset + 16, p[2] ?? 0, true);
    });
    this.push(bytes);
  }

  geometry(geometry: Geometry): void {
    this.header(WKB_TYPES[geometry.type]);
    switch (geometry.type) {
      case 'Point':
        // Empty point: NaN coordinates
        this.positions([geometry.coordinates.length > 0 ? geometry.coordinates : [NaN, NaN, NaN]]);
        return;
      case 'LineString':
        this.count(geometry.coordinates.length);
        this.positions(geometry.coordinates);
        return;
      case 'Polygon':
        this.count(geometry.coordinates.length);
        for (const ring of geometry.coordinates) {
          this.count(ring.length);
          this.positions(ring);
        }
        return;
      case 'MultiPoint':
        this.count(geometry.coordinates.length);
        for (const coordinates of geometry.coordinates) this.geometry({ type: 'Point', coordinates });
        return;
      case 'MultiLineString':
        this.count(geometry.coordinates.length);
        for (const coordinates of geometry.coordinates) this.geometry({ type: 'LineString', coordinates });
        return;
      case 'MultiPolygon':
        this.count(geometry.coordinates.length);
        for (const coordinates of geometry.coordinates) this.geometry({ type: 'Polygon', coordinates });
        return;
      case 'GeometryCollection':
        this.count(geometry.geometries.length);
        for (const member of geometry.geometries) this.geometry(member);
        return;
    }
  }

  bytes(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

export function encodeWkb(geometry: Geometry): Uint8Array {
  const writer = new WkbWriter(coordinateDimension(geometry) >= 3);
  writer.geometry(geometry);
  return writer.bytes();
}

// ============================================================================
// Decoding
// ============================================================================

class WkbReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  private need(n: number): void {
    if (this.offset + n > this.bytes.length) {
      throw new MalformedDataError(`Truncated WKB at byte ${this.offset}`);
    }
  }

  private uint32(littleEndian: boolean): number {
    this.need(4);
    const value = this.view.getUint32(this.offset, littleEndian);
    this.offset += 4;
    return value;
  }

  private float64(littleEndian: boolean): number {
    this.need(8);
    const value = this.view.getFloat64(this.offset, littleEndian);
    this.offset += 8;
    return value;
  }

  private position(le: boolean, hasZ: boolean, hasM: boolean): Position {
    const x = this.float64(le);
    const y = this.float64(le);
    const z = hasZ ? this.float64(le) : undefined;
    if (hasM) this.float64(le);
    return z === undefined ? [x, y] : [x, y, z];
  }

  private positions(le: boolean, hasZ: boolean, hasM: boolean): Position[] {
    const n = this.uint32(le);
    const out: Position[] = [];
    for (let i = 0; i < n; i++) out.push(this.position(le, hasZ, hasM));
    return out;
  }

  private members<T extends Geometry['type']>(le: boolean, expected: T): Array<Extract<Geometry, { type: T }>> {
    const n = this.uint32(le);
    const out: Array<Extract<Geometry, { type: T }>> = [];
    for (let i = 0; i < n; i++) {
      const member = this.geometry();
      if (member.type !== expected) {
        throw new MalformedDataError(`WKB multi-geometry member is ${member.type}, expected ${expected}`);
      }
      out.push(member);
    }
    return out;
  }

  geometry(): Geometry {
    this.need(1);
    const order = this.bytes[this.offset];
    this.offset += 1;
    if (order !== 0 && order !== 1) {
      throw new MalformedDataError(`Invalid WKB byte order marker ${String(order)}`);
    }
    const le = order === 1;

    const rawType = this.uint32(le);
    let hasZ = (rawType & EWKB_Z) !== 0;
    let hasM = (rawType & EWKB_M) !== 0;
    if ((rawType & EWKB_SRID) !== 0) this.uint32(le);

    let type = rawType & 0x0fffffff;
    if (type >= 3000) {
      hasZ = true;
      hasM = true;
    } else if (type >= 2000) {
      hasM = true;
    } else if (type >= 1000) {
      hasZ = true;
    }
    type %= 1000;

    switch (type) {
      case WKB_TYPES.Point: {
        const coordinates = this.position(le, hasZ, hasM);
        const empty = coordinates.every((c) => Number.isNaN(c));
        return { type: 'Point', coordinates: empty ? [] : coordinates };
      }
      case WKB_TYPES.LineString:
        return { type: 'LineString', coordinates: this.positions(le, hasZ, hasM) };
      case WKB_TYPES.Polygon: {
        const rings = this.uint32(le);
        const coordinates: Position[][] = [];
        for (let i = 0; i < rings; i++) coordinates.push(this.positions(le, hasZ, hasM));
        return { type: 'Polygon', coordinates };
      }
      case WKB_TYPES.MultiPoint:
        return {
          type: 'MultiPoint',
          coordinates: this.members(le, 'Point').flatMap((p) => (p.coordinates.length > 0 ? [p.coordinates] : [])),
        };
      case WKB_TYPES.MultiLineString:
        return { type: 'MultiLineString', coordinates: this.members(le, 'LineString').map((l) => l.coordinates) };
      case WKB_TYPES.MultiPolygon:
        return { type: 'MultiPolygon', coordinates: this.members(le, 'Polygon').map((p) => p.coordinates) };
      case WKB_TYPES.GeometryCollection: {
        const n = this.uint32(le);
        const geometries: Geometry[] = [];
        for (let i = 0; i < n; i++) geometries.push(this.geometry());
        return { type: 'GeometryCollection', geometries };
      }
      default:
        throw new MalformedDataError(`Unsupported WKB geometry type ${rawType}`);
    }
  }
}

/**
 * Decode one WKB geometry
 *
 * @throws MalformedDataError on truncated input or unknown type codes
 */
export function decodeWkb(bytes: Uint8Array): Geometry {
  return new WkbReader(bytes).geometry();
}
