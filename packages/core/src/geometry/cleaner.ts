/**
 * Geometry Cleaner
 *
 * Removes or repairs defective geometries. Steps, applied in order:
 *
 * 1. Drop null geometries                        → NULL_GEOMETRY
 * 2. Classify survivors with the validity check  → SELF_INTERSECTION | INVALID_STRUCTURE
 * 3. Repair invalid geometries
 * 4. Drop geometries left empty                  → EMPTY_AFTER_REPAIR
 * 5. Drop exact duplicates, first occurrence wins → DUPLICATE
 *
 * The output contains only valid, non-null, non-empty, distinct geometries, so
 * cleaning an already-cleaned layer changes nothing.
 *
 * In `assess` mode the counters are computed the same way but the layer is
 * returned untouched.
 */

import { geometryKey, isEmptyGeometry, refreshLayerKind } from '../core/geo-utils.js';
import type { Layer, LayerFeature, ValidityIssue } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { repairGeometry } from './repair.js';
import { checkValidity } from './validity.js';

const log = createLogger({ module: 'cleaner' });

export const MAX_ERROR_SAMPLES = 10;

export type CleanMode = 'repair' | 'assess';

export interface GeometryCleaningStats {
  readonly inputCount: number;
  readonly nullCount: number;
  readonly invalidFound: number;
  readonly fixed: number;
  readonly unfixable: number;
  /** Features that reached the duplicate check */
  readonly dedupeCandidates: number;
  readonly duplicates: number;
  readonly outputCount: number;
  /** First issues encountered, at most MAX_ERROR_SAMPLES */
  readonly samples: readonly ValidityIssue[];
}

export interface CleaningResult {
  readonly layer: Layer;
  readonly stats: GeometryCleaningStats;
}

/**
 * Clean the geometries of `layer`
 */
export function cleanGeometries(layer: Layer, mode: CleanMode = 'repair'): CleaningResult {
  const samples: ValidityIssue[] = [];
  const record = (issue: ValidityIssue): void => {
    if (samples.length < MAX_ERROR_SAMPLES) samples.push(issue);
  };

  let nullCount = 0;
  let invalidFound = 0;
  let fixed = 0;
  let unfixable = 0;

  const repaired: LayerFeature[] = [];
  for (const feature of layer.features) {
    if (feature.geometry === null) {
      nullCount++;
      record({ kind: 'NULL_GEOMETRY', featureIndex: feature.index });
      continue;
    }

    const verdict = checkValidity(feature.geometry);
    if (verdict.valid) {
      repaired.push(feature);
      continue;
    }

    invalidFound++;
    record({ kind: verdict.kind, featureIndex: feature.index, detail: verdict.detail });

    const geometry = repairGeometry(feature.geometry);
    if (isEmptyGeometry(geometry)) {
      unfixable++;
      record({ kind: 'EMPTY_AFTER_REPAIR', featureIndex: feature.index });
      continue;
    }
    fixed++;
    repaired.push({ ...feature, geometry });
  }

  const seen = new Set<string>();
  const output: LayerFeature[] = [];
  let duplicates = 0;
  for (const feature of repaired) {
    if (feature.geometry === null) continue;
    const key = geometryKey(feature.geometry);
    if (seen.has(key)) {
      duplicates++;
      record({ kind: 'DUPLICATE', featureIndex: feature.index });
      continue;
    }
    seen.add(key);
    output.push(feature);
  }

  const stats: GeometryCleaningStats = {
    inputCount: layer.features.length,
    nullCount,
    invalidFound,
    fixed,
    unfixable,
    dedupeCandidates: repaired.length,
    duplicates,
    outputCount: mode === 'repair' ? output.length : layer.features.length,
    samples,
  };

  log.info('Geometry cleaning complete', {
    layer: layer.name,
    mode,
    input: stats.inputCount,
    nulls: nullCount,
    invalid: invalidFound,
    fixed,
    unfixable,
    duplicates,
    output: stats.outputCount,
  });

  return {
    layer: mode === 'repair' ? { ...layer, kind: refreshLayerKind(output, layer.kind), features: output } : layer,
    stats,
  };
}
