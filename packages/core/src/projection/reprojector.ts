/**
 * Reprojector
 *
 * Forward coordinate transform of a whole layer from its selected source CRS
 * to the requested target, via proj4. Ordinates beyond X/Y are carried over
 * untouched so the coordinate dimension never changes.
 */

import proj4 from 'proj4';
import type { Geometry, Position } from 'geojson';
import { ProjectionTransformError } from '../core/errors.js';
import { mapPositions } from '../core/geo-utils.js';
import type { Layer, LayerFeature } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { getCrsRegistry, type CrsDefinition, type CrsRegistry } from './crs-registry.js';

const log = createLogger({ module: 'reprojector' });

export type XYTransform = (xy: [number, number]) => [number, number];

export interface ReprojectionResult {
  readonly layer: Layer;
  readonly sourceEpsg: number;
  readonly targetEpsg: number;
  /** False when the target was absent or equal to the source */
  readonly transformed: boolean;
}

/**
 * Build an X/Y transform between two registry entries
 */
export function createTransform(source: CrsDefinition, target: CrsDefinition): XYTransform {
  const converter = proj4(source.proj4, target.proj4);
  return (xy) => {
    const [x, y] = converter.forward(xy);
    return [x, y];
  };
}

function transformPosition(
  position: Position,
  transform: XYTransform,
  source: CrsDefinition,
  featureIndex: number
): Position {
  const [x, y, ...rest] = position;
  if (x === undefined || y === undefined) {
    throw new ProjectionTransformError('Position with fewer than two ordinates', { featureIndex });
  }
  if (source.geographic && (Math.abs(y) > 90 || Math.abs(x) > 180)) {
    throw new ProjectionTransformError(
      `Coordinate (${x}, ${y}) is outside the domain of EPSG:${source.epsg}`,
      { featureIndex }
    );
  }

  let projected: [number, number];
  try {
    projected = transform([x, y]);
  } catch (error) {
    throw new ProjectionTransformError(`Transform failed for (${x}, ${y})`, { featureIndex, cause: error });
  }

  const [px, py] = projected;
  if (!Number.isFinite(px) || !Number.isFinite(py)) {
    throw new ProjectionTransformError(`Transform of (${x}, ${y}) produced a non-finite result`, { featureIndex });
  }
  return [px, py, ...rest];
}

/**
 * Transform one geometry; errors carry `featureIndex`
 */
export function reprojectGeometry(
  geometry: Geometry,
  transform: XYTransform,
  source: CrsDefinition,
  featureIndex: number
): Geometry {
  return mapPositions(geometry, (position) => transformPosition(position, transform, source, featureIndex));
}

/**
 * Reproject every feature of `layer`
 *
 * @throws ProjectionTransformError for unknown CRS codes, out-of-domain
 *   coordinates and non-finite results
 */
export function reprojectLayer(
  layer: Layer,
  sourceEpsg: number,
  targetEpsg: number | undefined,
  registry: CrsRegistry = getCrsRegistry()
): ReprojectionResult {
  if (targetEpsg === undefined || targetEpsg === sourceEpsg) {
    return { layer, sourceEpsg, targetEpsg: sourceEpsg, transformed: false };
  }

  const source = registry.require(sourceEpsg);
  const target = registry.require(targetEpsg);
  const transform = createTransform(source, target);

  const features: LayerFeature[] = layer.features.map((feature) =>
    feature.geometry === null
      ? feature
      : { ...feature, geometry: reprojectGeometry(feature.geometry, transform, source, feature.index) }
  );

  log.debug('Layer reprojected', { from: sourceEpsg, to: targetEpsg, features: features.length });
  return { layer: { ...layer, features }, sourceEpsg, targetEpsg, transformed: true };
}
