/**
 * Projection Detector
 *
 * Determines the source CRS of a layer through a cascade of strategies tried
 * in confidence order. The first strategy to produce a candidate wins; when
 * none does, the configured fallback CRS is returned with LOW confidence.
 *
 * CASCADE:
 * 1. Embedded container metadata            (HIGH)
 * 2. Sidecar projection definition (.prj)   (HIGH)
 * 3. Extent within geographic bounds        (MEDIUM, EPSG:4326)
 * 4. Smallest projected area of use         (MEDIUM)
 * 5. Fallback                               (LOW, with warning)
 *
 * Detection never fails. A caller-declared EPSG code bypasses the cascade.
 */

import { computeExtent, type Extent } from '../core/geo-utils.js';
import type { CrsCandidate, DetectionMethod, Layer } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { getCrsRegistry, type CrsRegistry } from './crs-registry.js';
import { resolveProjectionText } from './prj-parser.js';

const log = createLogger({ module: 'detector' });

export interface DetectionContext {
  readonly layer: Layer;
  readonly registry: CrsRegistry;
  /** Extent of all non-null geometries, null for layers without coordinates */
  readonly extent: Extent | null;
}

/**
 * One step of the cascade
 */
export interface DetectionStrategy {
  readonly method: DetectionMethod;
  detect(context: DetectionContext): CrsCandidate | undefined;
}

export interface DetectOptions {
  /** Caller-declared source CRS; skips detection */
  readonly sourceEpsg?: number;
  readonly fallbackEpsg?: number;
  readonly registry?: CrsRegistry;
  readonly strategies?: readonly DetectionStrategy[];
}

// ============================================================================
// Strategies
// ============================================================================

export const embeddedMetadataStrategy: DetectionStrategy = {
  method: 'metadata',
  detect({ layer, registry }) {
    const declared = layer.source.embeddedCrs;
    if (declared === undefined) return undefined;
    const epsg = resolveProjectionText(declared, registry);
    return epsg === undefined ? undefined : { epsg, confidence: 'HIGH', method: 'metadata' };
  },
};

export const sidecarStrategy: DetectionStrategy = {
  method: 'sidecar',
  detect({ layer, registry }) {
    const text = layer.source.sidecarProjection;
    if (text === undefined || text.trim() === '') return undefined;
    const epsg = resolveProjectionText(text, registry);
    if (epsg === undefined) {
      log.warn('Sidecar projection not recognized', { preview: text.slice(0, 80) });
      return undefined;
    }
    return { epsg, confidence: 'HIGH', method: 'sidecar' };
  },
};

export const geographicExtentStrategy: DetectionStrategy = {
  method: 'extent-geographic',
  detect({ extent }) {
    if (!extent) return undefined;
    const [minX, minY, maxX, maxY] = extent;
    if (minX >= -180 && maxX <= 180 && minY >= -90 && maxY <= 90) {
      return { epsg: 4326, confidence: 'MEDIUM', method: 'extent-geographic' };
    }
    return undefined;
  },
};

export const projectedExtentStrategy: DetectionStrategy = {
  method: 'extent-projected',
  detect({ extent, registry }) {
    if (!extent) return undefined;
    const [minX, minY, maxX, maxY] = extent;

    let best: { epsg: number; area: number } | undefined;
    for (const definition of registry.projectedWithBounds()) {
      const [bMinX, bMinY, bMaxX, bMaxY] = definition.bounds;
      if (minX < bMinX || minY < bMinY || maxX > bMaxX || maxY > bMaxY) continue;
      const area = (bMaxX - bMinX) * (bMaxY - bMinY);
      // Strictly smaller: ties keep the earlier registry entry
      if (!best || area < best.area) {
        best = { epsg: definition.epsg, area };
      }
    }
    return best ? { epsg: best.epsg, confidence: 'MEDIUM', method: 'extent-projected' } : undefined;
  },
};

export const DEFAULT_STRATEGIES: readonly DetectionStrategy[] = [
  embeddedMetadataStrategy,
  sidecarStrategy,
  geographicExtentStrategy,
  projectedExtentStrategy,
];

// ============================================================================
// Detection
// ============================================================================

/**
 * Select the source CRS for `layer`
 *
 * @returns Exactly one candidate
 */
export function detectCrs(layer: Layer, options: DetectOptions = {}): CrsCandidate {
  if (options.sourceEpsg !== undefined) {
    return { epsg: options.sourceEpsg, confidence: 'HIGH', method: 'declared' };
  }

  const context: DetectionContext = {
    layer,
    registry: options.registry ?? getCrsRegistry(),
    extent: computeExtent(layer.features),
  };

  for (const strategy of options.strategies ?? DEFAULT_STRATEGIES) {
    const candidate = strategy.detect(context);
    if (candidate) {
      log.debug('CRS detected', { epsg: candidate.epsg, method: candidate.method, confidence: candidate.confidence });
      return candidate;
    }
  }

  const fallbackEpsg = options.fallbackEpsg ?? 4326;
  const warning = context.extent
    ? `Could not identify the source CRS from metadata or extent; assuming EPSG:${fallbackEpsg}`
    : `Layer has no coordinates to infer a CRS from; assuming EPSG:${fallbackEpsg}`;
  log.warn('CRS fallback used', { epsg: fallbackEpsg, layer: layer.name });
  return { epsg: fallbackEpsg, confidence: 'LOW', method: 'fallback', warning };
}
