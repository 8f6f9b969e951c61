/**
 * Geometry repair
 *
 * Total function from any geometry to a geometry of the same kind that is
 * either valid or empty. Repairs:
 * - drop positions with non-finite or missing ordinates
 * - drop consecutive duplicate and collinear positions (turf clean-coords)
 * - close open rings; drop degenerate interior rings
 * - split self-intersecting polygons into simple parts (turf unkink-polygon)
 *
 * Positions are never extended, so the coordinate dimension never grows.
 */

import cleanCoords from '@turf/clean-coords';
import { polygon as turfPolygon } from '@turf/helpers';
import unkinkPolygon from '@turf/unkink-polygon';
import type { Geometry, LineString, MultiPolygon, Polygon, Position } from 'geojson';
import { checkValidity, isFinitePosition, samePoint } from './validity.js';

type Rings = Position[][];

function cleanPositions(positions: readonly Position[]): Position[] {
  const finite = positions.filter(isFinitePosition);
  if (finite.length < 2) return finite;
  // Rings go through as open paths: clean-coords refuses short polygon rings
  const path: LineString = { type: 'LineString', coordinates: finite };
  return cleanCoords(path).coordinates;
}

function repairLine(line: readonly Position[]): Position[] {
  const cleaned = cleanPositions(line);
  return cleaned.length >= 2 ? cleaned : [];
}

function repairRing(ring: readonly Position[]): Position[] | null {
  const cleaned = cleanPositions(ring);
  const first = cleaned[0];
  const last = cleaned[cleaned.length - 1];
  if (first === undefined || last === undefined) return null;
  if (!samePoint(first, last)) cleaned.push(first);
  return cleaned.length >= 4 ? cleaned : null;
}

/**
 * Repair one polygon into zero or more simple polygons
 */
function repairPolygonRings(rings: readonly (readonly Position[])[]): Rings[] {
  const [exterior, ...holes] = rings;
  if (exterior === undefined) return [];
  const shell = repairRing(exterior);
  if (shell === null) return [];

  const repaired: Rings = [shell];
  for (const hole of holes) {
    const ring = repairRing(hole);
    if (ring !== null) repaired.push(ring);
  }

  const candidate: Polygon = { type: 'Polygon', coordinates: repaired };
  const verdict = checkValidity(candidate);
  if (verdict.valid) return [repaired];
  if (verdict.kind !== 'SELF_INTERSECTION') return [];

  let parts: Rings[];
  try {
    parts = unkinkPolygon(turfPolygon(repaired)).features.map((f) => f.geometry.coordinates);
  } catch {
    return [];
  }
  return parts.filter((part) => checkValidity({ type: 'Polygon', coordinates: part }).valid);
}

function toPolygonal(parts: Rings[], multi: boolean): Polygon | MultiPolygon {
  if (!multi && parts.length <= 1) {
    return { type: 'Polygon', coordinates: parts[0] ?? [] };
  }
  return { type: 'MultiPolygon', coordinates: parts };
}

function repairStructure(geometry: Geometry): Geometry {
  switch (geometry.type) {
    case 'Point':
      return {
        type: 'Point',
        coordinates: geometry.coordinates.length > 0 && isFinitePosition(geometry.coordinates) ? geometry.coordinates : [],
      };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: geometry.coordinates.filter(isFinitePosition) };
    case 'LineString':
      return { type: 'LineString', coordinates: repairLine(geometry.coordinates) };
    case 'MultiLineString':
      return {
        type: 'MultiLineString',
        coordinates: geometry.coordinates.map(repairLine).filter((line) => line.length > 0),
      };
    case 'Polygon':
      return toPolygonal(repairPolygonRings(geometry.coordinates), false);
    case 'MultiPolygon':
      return toPolygonal(geometry.coordinates.flatMap(repairPolygonRings), true);
    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: geometry.geometries.map(repairGeometry).filter((member) => checkValidity(member).valid),
      };
  }
}

/**
 * Empty geometry of the same GeoJSON type
 */
export function emptyLike(geometry: Geometry): Geometry {
  switch (geometry.type) {
    case 'GeometryCollection':
      return { type: 'GeometryCollection', geometries: [] };
    case 'Point':
      return { type: 'Point', coordinates: [] };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: [] };
    case 'LineString':
      return { type: 'LineString', coordinates: [] };
    case 'MultiLineString':
      return { type: 'MultiLineString', coordinates: [] };
    case 'Polygon':
      return { type: 'Polygon', coordinates: [] };
    case 'MultiPolygon':
      return { type: 'MultiPolygon', coordinates: [] };
  }
}

/**
 * Repair `geometry`; the result is valid or empty
 */
export function repairGeometry(geometry: Geometry): Geometry {
  const repaired = repairStructure(geometry);
  return checkValidity(repaired).valid ? repaired : emptyLike(repaired);
}
