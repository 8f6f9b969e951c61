/**
 * GeoConvert Core Types
 *
 * Value types shared by every pipeline stage. Layers are treated as immutable:
 * a stage receives one version and returns the next, never mutating its input.
 *
 * TYPE SAFETY: All collections are readonly. Stages that need to build a new
 * layer construct it from scratch.
 */

import type { Geometry } from 'geojson';

// ============================================================================
// Formats
// ============================================================================

/**
 * Container formats the core can read and write
 */
export type FormatId = 'geojson' | 'shapefile' | 'gpkg' | 'kml' | 'csv';

// ============================================================================
// Attributes
// ============================================================================

/**
 * Field type tags carried by a layer schema
 *
 * `date` values are ISO `YYYY-MM-DD` strings, `datetime` values ISO 8601
 * date-time strings; `json` holds nested objects or arrays.
 */
export type FieldType = 'text' | 'integer' | 'real' | 'boolean' | 'date' | 'datetime' | 'json';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

export type JsonArray = readonly JsonValue[];

/**
 * Attribute value as held in memory
 */
export type AttributeValue = JsonValue;

export type AttributeRecord = Readonly<Record<string, AttributeValue>>;

export interface FieldDefinition {
  readonly name: string;
  readonly type: FieldType;
}

export type LayerSchema = readonly FieldDefinition[];

// ============================================================================
// Layers
// ============================================================================

/**
 * Declared geometry kind of a layer
 */
export type GeometryKind = 'point' | 'line' | 'polygon' | 'mixed';

/**
 * One record of a layer
 *
 * `index` is the feature's position in the source dataset. It never changes
 * as features move through the pipeline, so branches that run independently
 * (geometry cleaning, attribute normalization) can be merged back by index.
 */
export interface LayerFeature {
  readonly index: number;
  readonly geometry: Geometry | null;
  readonly attributes: AttributeRecord;
}

/**
 * Where a layer came from, as far as later stages care
 */
export interface LayerSource {
  readonly format: FormatId;
  /** CRS declared inside the container (e.g. `EPSG:2154`, GeoJSON `crs`, GeoPackage SRS) */
  readonly embeddedCrs?: string;
  /** Raw text of a `.prj` file found beside the dataset */
  readonly sidecarProjection?: string;
  /** Encoding actually used to decode text */
  readonly encoding: string;
  /** Set when the requested encoding failed and a fallback decoded the data */
  readonly encodingFallback?: string;
}

/**
 * In-memory feature collection
 */
export interface Layer {
  readonly name: string;
  readonly kind: GeometryKind;
  readonly schema: LayerSchema;
  readonly features: readonly LayerFeature[];
  readonly source: LayerSource;
}

// ============================================================================
// Projection
// ============================================================================

export type ConfidenceTier = 'HIGH' | 'MEDIUM' | 'LOW';

export type DetectionMethod =
  | 'declared'
  | 'metadata'
  | 'sidecar'
  | 'extent-geographic'
  | 'extent-projected'
  | 'fallback';

/**
 * Detected or declared source CRS
 */
export interface CrsCandidate {
  readonly epsg: number;
  readonly confidence: ConfidenceTier;
  readonly method: DetectionMethod;
  /** Set when the candidate is a guess the caller should confirm */
  readonly warning?: string;
}

// ============================================================================
// Geometry validity
// ============================================================================

export type ValidityIssueKind =
  | 'NULL_GEOMETRY'
  | 'SELF_INTERSECTION'
  | 'INVALID_STRUCTURE'
  | 'EMPTY_AFTER_REPAIR'
  | 'DUPLICATE';

/**
 * A geometry defect bound to a source feature index
 */
export interface ValidityIssue {
  readonly kind: ValidityIssueKind;
  readonly featureIndex: number;
  readonly detail?: string;
}

// ============================================================================
// Jobs
// ============================================================================

/**
 * Job descriptor after validation (camelCase view of the wire format)
 */
export interface JobSpec {
  readonly inputLocation: string;
  readonly declaredFormat?: FormatId;
  readonly sourceEpsg?: number;
  readonly outputFormat: FormatId;
  readonly targetEpsg?: number;
  readonly fixGeometries: boolean;
  readonly normalizeAttributes: boolean;
  readonly encoding: string;
}
