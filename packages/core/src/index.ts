/**
 * GeoConvert Core - Geospatial vector conversion pipeline
 *
 * @geoconvert/core provides:
 * - Readers and writers for GeoJSON, Shapefile, GeoPackage, KML and CSV
 * - Source CRS detection with confidence tiers, and proj4 reprojection
 * - Geometry repair and deduplication, attribute schema normalization
 * - A 0-100 quality report for every converted dataset
 *
 * External collaborators call `runConversion` with a job descriptor.
 *
 * @packageDocumentation
 */

// Pipeline entry point
export {
  runConversion,
  jobResultToJson,
  type ConversionOptions,
  type JobResult,
} from './pipeline/orchestrator.js';
export { parseJobSpec, JobSpecSchema, type JobSpecInput } from './pipeline/job-schema.js';
export { TaskGraph, type TaskHandle } from './pipeline/task-graph.js';
export { JobBudget, type BudgetLimits } from './pipeline/job-budget.js';

// Configuration
export {
  DEFAULT_CONFIG,
  DEFAULT_QUALITY_WEIGHTS,
  createConfig,
  loadConfig,
  parseQualityWeights,
  type ConversionConfig,
  type QualityWeights,
  type DeepPartial,
} from './core/config.js';

// Errors
export {
  ConversionError,
  UnsupportedFormatError,
  CorruptArchiveError,
  MalformedDataError,
  ProjectionTransformError,
  WriteCapabilityError,
  TimeoutError,
  ResourceExhaustedError,
  PipelineStageError,
  isConversionError,
  wrapStageError,
  type PipelineStage,
  type ConversionErrorCode,
  type ErrorDiagnostic,
} from './core/errors.js';

// Data model
export type {
  FormatId,
  FieldType,
  FieldDefinition,
  LayerSchema,
  AttributeValue,
  AttributeRecord,
  GeometryKind,
  Layer,
  LayerFeature,
  LayerSource,
  ConfidenceTier,
  DetectionMethod,
  CrsCandidate,
  ValidityIssue,
  ValidityIssueKind,
  JobSpec,
} from './core/types.js';

// Stages
export { readLayer, type ReadRequest } from './reader/format-reader.js';
export { detectCrs, DEFAULT_STRATEGIES, type DetectionStrategy, type DetectOptions } from './projection/detector.js';
export { CrsRegistry, getCrsRegistry, parseCrsRegistry, type CrsDefinition } from './projection/crs-registry.js';
export { reprojectLayer, type ReprojectionResult } from './projection/reprojector.js';
export { cleanGeometries, type CleanMode, type CleaningResult, type GeometryCleaningStats } from './geometry/cleaner.js';
export {
  normalizeAttributes,
  type NormalizeMode,
  type NormalizeOptions,
  type NormalizationResult,
  type AttributeNormalizationStats,
} from './attributes/normalizer.js';
export { writeLayer, mergeBranches, type WriteRequest, type WriteResult, type TextFallback } from './writer/format-writer.js';
export {
  generateQualityReport,
  qualityReportToJson,
  compositeScore,
  gradeFor,
  type QualityReport,
  type QualityGrade,
  type QualityDimensions,
  type QualitySummary,
} from './quality/reporter.js';

// Formats
export { FORMATS, getFormat, resolveFormatId, type FormatCapabilities } from './formats/format-registry.js';

// Logging
export { createLogger, Logger, type LogLevel } from './core/utils/logger.js';
