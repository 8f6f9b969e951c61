/**
 * Quality Reporter
 *
 * Scores one finished job on five dimensions (0-100 each) and combines them
 * into a weighted composite:
 *
 * | Dimension              | Score                                                  |
 * |------------------------|--------------------------------------------------------|
 * | geometry validity      | 100 × (input − null − invalid found) / input           |
 * | CRS confidence         | HIGH 100, MEDIUM 60, LOW 20                            |
 * | attribute completeness | 100 × non-null cells / cells in the output             |
 * | schema conformance     | 100 × (source fields − non-conformant) / source fields |
 * | duplication ratio      | 100 × (1 − duplicates / features checked)              |
 *
 * Empty denominators score 100. Scores are rounded to one decimal. The report
 * is read-only over the outputs of earlier stages and frozen once built.
 *
 * Alongside the scores it carries per-column statistics of the written layer
 * and its data distribution: features per geometry type and the geodesic
 * area of its polygons (turf area, on WGS 84 coordinates).
 */

import area from '@turf/area';
import type { AttributeNormalizationStats } from '../attributes/normalizer.js';
import { DEFAULT_QUALITY_WEIGHTS, type QualityWeights } from '../core/config.js';
import { isConversionError } from '../core/errors.js';
import { computeExtent, type Extent } from '../core/geo-utils.js';
import type {
  ConfidenceTier,
  CrsCandidate,
  DetectionMethod,
  FieldType,
  FormatId,
  GeometryKind,
  Layer,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { GeometryCleaningStats } from '../geometry/cleaner.js';
import { getCrsRegistry, type CrsRegistry } from '../projection/crs-registry.js';
import { reprojectLayer } from '../projection/reprojector.js';
import type { TextFallback } from '../writer/format-writer.js';

const log = createLogger({ module: 'quality' });

// ============================================================================
// Types
// ============================================================================

export type QualityGrade = 'A' | 'B' | 'C' | 'D' | 'F';

export interface QualityDimensions {
  readonly geometryValidity: number;
  readonly crsConfidence: number;
  readonly attributeCompleteness: number;
  readonly schemaConformance: number;
  readonly duplicationRatio: number;
}

export interface QualitySummary {
  readonly featuresInput: number;
  readonly featuresOutput: number;
  readonly featuresLost: number;
  readonly fieldsInput: number;
  readonly fieldsOutput: number;
  readonly geometryKind: GeometryKind;
  /** [minX, minY, maxX, maxY] of the output, in the output CRS */
  readonly bbox: Extent | null;
  readonly sourceEpsg: number;
  readonly targetEpsg: number;
  readonly reprojected: boolean;
  readonly crsMethod: DetectionMethod;
  readonly crsConfidence: ConfidenceTier;
  readonly outputFormat: FormatId;
  readonly encoding: string;
}

export interface ColumnStats {
  readonly type: FieldType;
  readonly nullCount: number;
  /** Percent of output features, one decimal */
  readonly nullRate: number;
  /** Distinct non-null values */
  readonly uniqueCount: number;
  /** Numeric columns with at least one value only */
  readonly min?: number;
  readonly max?: number;
  /** Four decimals */
  readonly mean?: number;
}

export interface DataDistribution {
  /** Output features per GeoJSON geometry type, nulls excluded */
  readonly geometryTypes: Readonly<Record<string, number>>;
  /** Geodesic area of the output polygons in km², two decimals; null without geometries */
  readonly areaKm2: number | null;
}

export interface QualityReport {
  readonly compositeScore: number;
  readonly grade: QualityGrade;
  readonly weights: QualityWeights;
  readonly dimensions: QualityDimensions;
  readonly geometryErrorsFound: number;
  readonly geometryErrorsFixed: number;
  readonly geometryErrorsUnfixable: number;
  readonly nullGeometryCount: number;
  readonly duplicateCount: number;
  readonly recommendations: readonly string[];
  readonly summary: QualitySummary;
  /** Keyed by output field name */
  readonly attributeStats: Readonly<Record<string, ColumnStats>>;
  readonly distribution: DataDistribution;
  /** Job time up to the report */
  readonly processingTimeSeconds: number;
  readonly generatedAt: string;
}

export interface QualityInputs {
  readonly crs: CrsCandidate;
  readonly geometry: GeometryCleaningStats;
  /** False when cleaning ran in assess mode */
  readonly geometryRepaired: boolean;
  readonly attributes: AttributeNormalizationStats;
  /** The layer as written */
  readonly output: Layer;
  readonly outputFormat: FormatId;
  readonly targetEpsg: number;
  readonly reprojected: boolean;
  readonly renamedFields: Readonly<Record<string, string>>;
  readonly textFallbacks: readonly TextFallback[];
  /** Encoding the job asked for */
  readonly requestedEncoding: string;
  /** Encoding the input was actually decoded with */
  readonly sourceEncoding: string;
  readonly encodingFallback?: string;
  /** Job time so far */
  readonly elapsedMs?: number;
  readonly weights?: QualityWeights;
  /** Resolves `targetEpsg` for the area estimate */
  readonly registry?: CrsRegistry;
  readonly now?: () => Date;
}

// ============================================================================
// Scoring
// ============================================================================

const CONFIDENCE_SCORES: Readonly<Record<ConfidenceTier, number>> = {
  HIGH: 100,
  MEDIUM: 60,
  LOW: 20,
};

const COMPLETENESS_WARNING = 80;

const DIMENSION_KEYS = [
  'geometryValidity',
  'crsConfidence',
  'attributeCompleteness',
  'schemaConformance',
  'duplicationRatio',
] as const satisfies ReadonlyArray<keyof QualityWeights & keyof QualityDimensions>;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function clamp(value: number): number {
  return Math.min(100, Math.max(0, value));
}

function ratioScore(numerator: number, denominator: number): number {
  return denominator === 0 ? 100 : clamp(round1((100 * numerator) / denominator));
}

/**
 * Share of non-null attribute cells, as a score
 */
export function attributeCompleteness(layer: Layer): number {
  let cells = 0;
  let filled = 0;
  for (const feature of layer.features) {
    for (const field of layer.schema) {
      cells++;
      const value = feature.attributes[field.name];
      if (value !== undefined && value !== null) filled++;
    }
  }
  return ratioScore(filled, cells);
}

export function computeDimensions(inputs: QualityInputs): QualityDimensions {
  const { geometry, attributes, crs, output } = inputs;
  return {
    geometryValidity: ratioScore(geometry.inputCount - geometry.nullCount - geometry.invalidFound, geometry.inputCount),
    crsConfidence: CONFIDENCE_SCORES[crs.confidence],
    attributeCompleteness: attributeCompleteness(output),
    schemaConformance: ratioScore(attributes.sourceFieldCount - attributes.nonConformantFields, attributes.sourceFieldCount),
    duplicationRatio: ratioScore(geometry.dedupeCandidates - geometry.duplicates, geometry.dedupeCandidates),
  };
}

/**
 * Weighted mean of the dimensions, clamped to [0, 100]
 */
export function compositeScore(dimensions: QualityDimensions, weights: QualityWeights = DEFAULT_QUALITY_WEIGHTS): number {
  const total = DIMENSION_KEYS.reduce((sum, key) => sum + weights[key], 0);
  if (total <= 0) return 0;
  const weighted = DIMENSION_KEYS.reduce((sum, key) => sum + weights[key] * dimensions[key], 0);
  return clamp(round1(weighted / total));
}

export function gradeFor(score: number): QualityGrade {
  if (score >= 90) return 'A';
  if (score >= 80) return 'B';
  if (score >= 70) return 'C';
  if (score >= 60) return 'D';
  return 'F';
}

// ============================================================================
// Statistics
// ============================================================================

const WGS84 = 4326;
const NUMERIC_TYPES: ReadonlySet<FieldType> = new Set(['integer', 'real']);

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Null count, distinct values and numeric range of every output column
 */
export function computeColumnStats(layer: Layer): Record<string, ColumnStats> {
  const total = layer.features.length;
  const stats: Record<string, ColumnStats> = {};

  for (const field of layer.schema) {
    let nullCount = 0;
    const distinct = new Set<string>();
    const numbers: number[] = [];
    for (const feature of layer.features) {
      const value = feature.attributes[field.name];
      if (value === undefined || value === null) {
        nullCount++;
        continue;
      }
      distinct.add(typeof value === 'string' ? value : JSON.stringify(value));
      if (typeof value === 'number' && Number.isFinite(value)) numbers.push(value);
    }

    const numeric = NUMERIC_TYPES.has(field.type) && numbers.length > 0;
    stats[field.name] = {
      type: field.type,
      nullCount,
      nullRate: total === 0 ? 0 : round1((100 * nullCount) / total),
      uniqueCount: distinct.size,
      ...(numeric
        ? {
            min: numbers.reduce((a, b) => Math.min(a, b)),
            max: numbers.reduce((a, b) => Math.max(a, b)),
            mean: roundTo(numbers.reduce((sum, n) => sum + n, 0) / numbers.length, 4),
          }
        : {}),
    };
  }
  return stats;
}

/**
 * Sum of the geodesic areas of `layer` in km²
 *
 * Overlapping polygons are counted once each. Returns null when the layer
 * has no geometry or cannot be brought to WGS 84.
 */
export function estimateAreaKm2(layer: Layer, epsg: number, registry: CrsRegistry = getCrsRegistry()): number | null {
  if (!layer.features.some((f) => f.geometry !== null)) return null;

  let geographic = layer;
  if (epsg !== WGS84) {
    try {
      geographic = reprojectLayer(layer, epsg, WGS84, registry).layer;
    } catch (error) {
      if (!isConversionError(error)) throw error;
      log.warn('Area estimate skipped', { epsg, error: error.message });
      return null;
    }
  }

  let squareMeters = 0;
  for (const feature of geographic.features) {
    if (feature.geometry) squareMeters += area(feature.geometry);
  }
  return roundTo(squareMeters / 1_000_000, 2);
}

export function computeDistribution(layer: Layer, epsg: number, registry?: CrsRegistry): DataDistribution {
  const geometryTypes: Record<string, number> = {};
  for (const feature of layer.features) {
    if (feature.geometry) geometryTypes[feature.geometry.type] = (geometryTypes[feature.geometry.type] ?? 0) + 1;
  }
  return { geometryTypes, areaKm2: estimateAreaKm2(layer, epsg, registry) };
}

// ============================================================================
// Recommendations
// ============================================================================

function plural(n: number, singular: string, pluralForm = `${singular}s`): string {
  return `${n} ${n === 1 ? singular : pluralForm}`;
}

export function buildRecommendations(inputs: QualityInputs, dimensions: QualityDimensions): string[] {
  const { geometry, attributes, crs } = inputs;
  const recommendations: string[] = [];

  if (inputs.geometryRepaired) {
    if (geometry.fixed > 0) {
      recommendations.push(`${plural(geometry.fixed, 'geometry', 'geometries')} required repair; verify the output visually`);
    }
    if (geometry.unfixable > 0) {
      recommendations.push(
        `${plural(geometry.unfixable, 'geometry', 'geometries')} could not be repaired and ${geometry.unfixable === 1 ? 'was' : 'were'} dropped`
      );
    }
    if (geometry.nullCount > 0) {
      recommendations.push(`${plural(geometry.nullCount, 'feature')} without geometry dropped`);
    }
    if (geometry.duplicates > 0) {
      recommendations.push(`${plural(geometry.duplicates, 'duplicate geometry', 'duplicate geometries')} removed`);
    }
  } else {
    if (geometry.invalidFound > 0) {
      recommendations.push(
        `${plural(geometry.invalidFound, 'invalid geometry', 'invalid geometries')} left as is; enable fix_geometries to repair`
      );
    }
    if (geometry.nullCount > 0) {
      recommendations.push(`${plural(geometry.nullCount, 'feature')} without geometry`);
    }
    if (geometry.duplicates > 0) {
      recommendations.push(`${plural(geometry.duplicates, 'duplicate geometry', 'duplicate geometries')} kept`);
    }
  }

  if (crs.confidence === 'LOW') {
    recommendations.push(`Source CRS could not be identified; EPSG:${crs.epsg} was assumed. Declare source_epsg`);
  } else if (crs.confidence === 'MEDIUM') {
    recommendations.push(`Source CRS EPSG:${crs.epsg} was inferred from the data extent; confirm it or declare source_epsg`);
  }

  if (dimensions.attributeCompleteness < COMPLETENESS_WARNING) {
    recommendations.push(`Attribute completeness is ${dimensions.attributeCompleteness}%; many values are missing`);
  }
  if (attributes.dropped.length > 0) {
    recommendations.push(`Dropped identifier fields: ${attributes.dropped.join(', ')}`);
  }

  const renamed = Object.entries(inputs.renamedFields);
  if (renamed.length > 0) {
    const pairs = renamed.map(([from, to]) => `${from} → ${to}`).join(', ');
    recommendations.push(`Field names changed to fit ${inputs.outputFormat}: ${pairs}`);
  }
  if (inputs.textFallbacks.length > 0) {
    const fields = inputs.textFallbacks.map((t) => `${t.field} (${t.from})`).join(', ');
    recommendations.push(`Fields stored as text in ${inputs.outputFormat}: ${fields}`);
  }
  if (inputs.encodingFallback !== undefined) {
    recommendations.push(
      `Input was not valid ${inputs.requestedEncoding}; decoded as ${inputs.encodingFallback}. Check accented text`
    );
  }

  return recommendations;
}

// ============================================================================
// Report
// ============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const member of Object.values(value)) deepFreeze(member);
  }
  return value;
}

/**
 * Build the frozen quality report of a job
 */
export function generateQualityReport(inputs: QualityInputs): QualityReport {
  const weights = inputs.weights ?? DEFAULT_QUALITY_WEIGHTS;
  const dimensions = computeDimensions(inputs);
  const composite = compositeScore(dimensions, weights);
  const { geometry, attributes, crs, output } = inputs;

  const report: QualityReport = {
    compositeScore: composite,
    grade: gradeFor(composite),
    weights: { ...weights },
    dimensions,
    geometryErrorsFound: geometry.invalidFound,
    geometryErrorsFixed: geometry.fixed,
    geometryErrorsUnfixable: geometry.unfixable,
    nullGeometryCount: geometry.nullCount,
    duplicateCount: geometry.duplicates,
    recommendations: buildRecommendations(inputs, dimensions),
    summary: {
      featuresInput: geometry.inputCount,
      featuresOutput: output.features.length,
      featuresLost: geometry.inputCount - output.features.length,
      fieldsInput: attributes.sourceFieldCount,
      fieldsOutput: output.schema.length,
      geometryKind: output.kind,
      bbox: computeExtent(output.features),
      sourceEpsg: crs.epsg,
      targetEpsg: inputs.targetEpsg,
      reprojected: inputs.reprojected,
      crsMethod: crs.method,
      crsConfidence: crs.confidence,
      outputFormat: inputs.outputFormat,
      encoding: inputs.sourceEncoding,
    },
    attributeStats: computeColumnStats(output),
    distribution: computeDistribution(output, inputs.targetEpsg, inputs.registry),
    processingTimeSeconds: roundTo((inputs.elapsedMs ?? 0) / 1000, 2),
    generatedAt: (inputs.now ?? (() => new Date()))().toISOString(),
  };
  return deepFreeze(report);
}

/**
 * Wire form of a report (snake_case keys)
 */
export function qualityReportToJson(report: QualityReport): Record<string, unknown> {
  const { dimensions: d, weights: w, summary: s } = report;
  return {
    composite_score: report.compositeScore,
    grade: report.grade,
    weights: {
      geometry_validity: w.geometryValidity,
      crs_confidence: w.crsConfidence,
      attribute_completeness: w.attributeCompleteness,
      schema_conformance: w.schemaConformance,
      duplication_ratio: w.duplicationRatio,
    },
    dimensions: {
      geometry_validity: d.geometryValidity,
      crs_confidence: d.crsConfidence,
      attribute_completeness: d.attributeCompleteness,
      schema_conformance: d.schemaConformance,
      duplication_ratio: d.duplicationRatio,
    },
    geometry_errors_found: report.geometryErrorsFound,
    geometry_errors_fixed: report.geometryErrorsFixed,
    geometry_errors_unfixable: report.geometryErrorsUnfixable,
    null_geometry_count: report.nullGeometryCount,
    duplicate_count: report.duplicateCount,
    recommendations: [...report.recommendations],
    summary: {
      features_input: s.featuresInput,
      features_output: s.featuresOutput,
      features_lost: s.featuresLost,
      fields_input: s.fieldsInput,
      fields_output: s.fieldsOutput,
      geometry_kind: s.geometryKind,
      bbox: s.bbox === null ? null : [...s.bbox],
      source_epsg: s.sourceEpsg,
      target_epsg: s.targetEpsg,
      reprojected: s.reprojected,
      crs_method: s.crsMethod,
      crs_confidence: s.crsConfidence,
      output_format: s.outputFormat,
      encoding: s.encoding,
    },
    attribute_stats: Object.fromEntries(
      Object.entries(report.attributeStats).map(([name, c]) => [
        name,
        {
          type: c.type,
          null_count: c.nullCount,
          null_rate: c.nullRate,
          unique_count: c.uniqueCount,
          ...(c.min !== undefined ? { min: c.min } : {}),
          ...(c.max !== undefined ? { max: c.max } : {}),
          ...(c.mean !== undefined ? { mean: c.mean } : {}),
        },
      ])
    ),
    data_distribution: {
      geometry_types: { ...report.distribution.geometryTypes },
      area_km2: report.distribution.areaKm2,
    },
    processing_time_seconds: report.processingTimeSeconds,
    generated_at: report.generatedAt,
  };
}
