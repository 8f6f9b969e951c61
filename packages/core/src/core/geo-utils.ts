/**
 * Geometry helpers shared by readers, the cleaner, the reprojector and writers
 */

import bbox from '@turf/bbox';
import { feature, featureCollection } from '@turf/helpers';
import type { Feature, Geometry, Position } from 'geojson';
import type { GeometryKind, LayerFeature } from './types.js';

/**
 * [minX, minY, maxX, maxY]
 */
export type Extent = readonly [number, number, number, number];

/**
 * Kind of a single geometry; collections are `mixed`
 */
export function geometryKindOf(geometry: Geometry): GeometryKind {
  switch (geometry.type) {
    case 'Point':
    case 'MultiPoint':
      return 'point';
    case 'LineString':
    case 'MultiLineString':
      return 'line';
    case 'Polygon':
    case 'MultiPolygon':
      return 'polygon';
    case 'GeometryCollection':
      return 'mixed';
  }
}

/**
 * Kinds present among the non-null geometries of `features`
 */
export function geometryKindsPresent(features: readonly LayerFeature[]): ReadonlySet<GeometryKind> {
  const kinds = new Set<GeometryKind>();
  for (const f of features) {
    if (f.geometry) kinds.add(geometryKindOf(f.geometry));
  }
  return kinds;
}

/**
 * Declared kind of a layer: the single kind present, otherwise `mixed`
 */
export function deriveLayerKind(features: readonly LayerFeature[]): GeometryKind {
  const kinds = geometryKindsPresent(features);
  if (kinds.size === 1) {
    const [only] = kinds;
    if (only) return only;
  }
  return 'mixed';
}

/**
 * Kind of a layer whose features have changed; a layer left without any
 * geometry keeps `declared`
 */
export function refreshLayerKind(features: readonly LayerFeature[], declared: GeometryKind): GeometryKind {
  return geometryKindsPresent(features).size === 0 ? declared : deriveLayerKind(features);
}

/**
 * Apply `fn` to every position, returning a new geometry of the same type
 */
export function mapPositions(geometry: Geometry, fn: (position: Position) => Position): Geometry {
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: geometry.coordinates.length === 0 ? [] : fn(geometry.coordinates) };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: geometry.coordinates.map(fn) };
    case 'LineString':
      return { type: 'LineString', coordinates: geometry.coordinates.map(fn) };
    case 'MultiLineString':
      return { type: 'MultiLineString', coordinates: geometry.coordinates.map((line) => line.map(fn)) };
    case 'Polygon':
      return { type: 'Polygon', coordinates: geometry.coordinates.map((ring) => ring.map(fn)) };
    case 'MultiPolygon':
      return {
        type: 'MultiPolygon',
        coordinates: geometry.coordinates.map((polygon) => polygon.map((ring) => ring.map(fn))),
      };
    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: geometry.geometries.map((member) => mapPositions(member, fn)),
      };
  }
}

/**
 * Visit every position of a geometry
 */
export function forEachPosition(geometry: Geometry, fn: (position: Position) => void): void {
  mapPositions(geometry, (position) => {
    fn(position);
    return position;
  });
}

/**
 * True when the geometry holds no positions at all
 */
export function isEmptyGeometry(geometry: Geometry): boolean {
  let count = 0;
  forEachPosition(geometry, () => {
    count++;
  });
  return count === 0;
}

/**
 * Highest coordinate dimension used by any position (0 for empty geometries)
 */
export function coordinateDimension(geometry: Geometry): number {
  let dimension = 0;
  forEachPosition(geometry, (position) => {
    dimension = Math.max(dimension, position.length);
  });
  return dimension;
}

/**
 * Canonical string used to compare geometries coordinate for coordinate
 */
export function geometryKey(geometry: Geometry): string {
  if (geometry.type === 'GeometryCollection') {
    return `GeometryCollection(${geometry.geometries.map(geometryKey).join(';')})`;
  }
  return `${geometry.type}${JSON.stringify(geometry.coordinates)}`;
}

/**
 * Extent of all non-null geometries, or null when there are no positions
 */
export function computeExtent(features: readonly LayerFeature[]): Extent | null {
  const geojsonFeatures: Feature[] = [];
  for (const f of features) {
    if (f.geometry && !isEmptyGeometry(f.geometry)) {
      geojsonFeatures.push(feature(f.geometry));
    }
  }
  if (geojsonFeatures.length === 0) return null;

  const [minX, minY, maxX, maxY] = bbox(featureCollection(geojsonFeatures));
  if (![minX, minY, maxX, maxY].every((v) => v !== undefined && Number.isFinite(v))) {
    return null;
  }
  return [minX, minY, maxX, maxY];
}
