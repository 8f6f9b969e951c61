/**
 * Geometry validity predicate
 *
 * A geometry is valid when:
 * - every position has at least two finite ordinates
 * - points have a position, lines at least two distinct positions
 * - polygon rings are closed, hold at least four positions and enclose area
 * - no polygon ring crosses itself or another ring (turf kinks)
 * - collections are non-empty and every member is valid
 */

import cleanCoords from '@turf/clean-coords';
import kinks from '@turf/kinks';
import { polygon as turfPolygon } from '@turf/helpers';
import type { Geometry, Position } from 'geojson';

export type ValidityVerdict =
  | { readonly valid: true }
  | { readonly valid: false; readonly kind: 'SELF_INTERSECTION' | 'INVALID_STRUCTURE'; readonly detail: string };

const VALID: ValidityVerdict = { valid: true };

function structure(detail: string): ValidityVerdict {
  return { valid: false, kind: 'INVALID_STRUCTURE', detail };
}

// ============================================================================
// Position helpers
// ============================================================================

export function isFinitePosition(position: Position): boolean {
  return position.length >= 2 && position.every((ordinate) => typeof ordinate === 'number' && Number.isFinite(ordinate));
}

/**
 * Planar equality; extra ordinates are ignored
 */
export function samePoint(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

function distinctCount(positions: readonly Position[]): number {
  return new Set(positions.map((p) => `${p[0]},${p[1]}`)).size;
}

// ============================================================================
// Per-type checks
// ============================================================================

function checkPositions(positions: readonly Position[]): ValidityVerdict {
  for (const position of positions) {
    if (!isFinitePosition(position)) {
      return structure('non-finite or missing coordinate');
    }
  }
  return VALID;
}

function checkLine(line: readonly Position[]): ValidityVerdict {
  const positions = checkPositions(line);
  if (!positions.valid) return positions;
  if (distinctCount(line) < 2) {
    return structure('line has fewer than two distinct points');
  }
  return VALID;
}

function checkRing(ring: readonly Position[], label: string): ValidityVerdict {
  const positions = checkPositions(ring);
  if (!positions.valid) return positions;
  if (ring.length < 4) {
    return structure(`${label} has ${ring.length} positions, at least 4 required`);
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first === undefined || last === undefined || !samePoint(first, last)) {
    return structure(`${label} is not closed`);
  }
  if (distinctCount(ring) < 3) {
    return structure(`${label} is degenerate`);
  }
  return VALID;
}

function checkPolygon(rings: readonly (readonly Position[])[]): ValidityVerdict {
  if (rings.length === 0) return structure('polygon has no rings');

  for (const [i, ring] of rings.entries()) {
    const verdict = checkRing(ring, i === 0 ? 'exterior ring' : `interior ring ${i}`);
    if (!verdict.valid) return verdict;
  }

  // Repeated vertices are legal but confuse the intersection sweep; a ring
  // left with fewer than four positions once they go encloses no area
  let crossings: number;
  try {
    crossings = kinks(cleanCoords(turfPolygon(rings.map((ring) => [...ring])))).features.length;
  } catch (error) {
    return structure(`topology check failed: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (crossings > 0) {
    return {
      valid: false,
      kind: 'SELF_INTERSECTION',
      detail: `ring self-intersection at ${crossings} point(s)`,
    };
  }
  return VALID;
}

/**
 * Classify a geometry as valid or name its first defect
 */
export function checkValidity(geometry: Geometry): ValidityVerdict {
  switch (geometry.type) {
    case 'Point':
      return geometry.coordinates.length === 0 ? structure('empty point') : checkPositions([geometry.coordinates]);
    case 'MultiPoint':
      return geometry.coordinates.length === 0 ? structure('empty multipoint') : checkPositions(geometry.coordinates);
    case 'LineString':
      return checkLine(geometry.coordinates);
    case 'MultiLineString': {
      if (geometry.coordinates.length === 0) return structure('empty multilinestring');
      for (const line of geometry.coordinates) {
        const verdict = checkLine(line);
        if (!verdict.valid) return verdict;
      }
      return VALID;
    }
    case 'Polygon':
      return checkPolygon(geometry.coordinates);
    case 'MultiPolygon': {
      if (geometry.coordinates.length === 0) return structure('empty multipolygon');
      for (const polygon of geometry.coordinates) {
        const verdict = checkPolygon(polygon);
        if (!verdict.valid) return verdict;
      }
      return VALID;
    }
    case 'GeometryCollection': {
      if (geometry.geometries.length === 0) return structure('empty geometry collection');
      for (const member of geometry.geometries) {
        const verdict = checkValidity(member);
        if (!verdict.valid) return verdict;
      }
      return VALID;
    }
  }
}
