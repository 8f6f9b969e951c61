/**
 * GeoConvert Configuration
 *
 * Defaults for the conversion pipeline plus environment loading. The job
 * descriptor says WHAT to convert; this configuration says how much time,
 * disk and leniency a worker grants each job.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

/**
 * Relative weight of each quality dimension in the composite score
 *
 * Weights need not sum to 100; the composite is a weighted mean.
 */
export interface QualityWeights {
  readonly geometryValidity: number;
  readonly crsConfidence: number;
  readonly attributeCompleteness: number;
  readonly schemaConformance: number;
  readonly duplicationRatio: number;
}

export interface ConversionConfig {
  /** Per-job temporary storage */
  readonly scratch: {
    /** Parent directory under which each job gets its own directory */
    readonly root: string;
    /** Bytes a job may write to its scratch directory */
    readonly maxBytes: number;
  };

  /** Directory output artifacts are published to */
  readonly outputDir: string;

  /** Per-job time budget */
  readonly budget: {
    /** Past this, the job logs a warning and keeps going */
    readonly softTimeoutMs: number;
    /** Past this, the job is aborted with TimeoutError */
    readonly hardTimeoutMs: number;
  };

  readonly projection: {
    /** CRS assumed when nothing identifies the source CRS */
    readonly fallbackEpsg: number;
  };

  readonly attributes: {
    /** Normalized field names dropped as autogenerated identifiers */
    readonly syntheticIdFields: readonly string[];
  };

  readonly writer: {
    /**
     * Refuse to encode a field type as text when the target format has no
     * native representation for it. Default: false (text fallback allowed)
     */
    readonly strictFieldTypes: boolean;
  };

  readonly quality: {
    readonly weights: QualityWeights;
  };
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_QUALITY_WEIGHTS: QualityWeights = {
  geometryValidity: 30,
  crsConfidence: 20,
  attributeCompleteness: 20,
  schemaConformance: 15,
  duplicationRatio: 15,
};

/**
 * Default configuration
 *
 * - 10-minute hard budget, warning at 8 minutes
 * - 2 GiB scratch per job
 * - EPSG:4326 when the source CRS cannot be identified
 */
export const DEFAULT_CONFIG: ConversionConfig = {
  scratch: {
    root: join(tmpdir(), 'geoconvert'),
    maxBytes: 2 * 1024 * 1024 * 1024,
  },
  outputDir: join(tmpdir(), 'geoconvert', 'outputs'),
  budget: {
    softTimeoutMs: 480_000,
    hardTimeoutMs: 600_000,
  },
  projection: {
    fallbackEpsg: 4326,
  },
  attributes: {
    syntheticIdFields: ['fid', 'ogc_fid', 'objectid', 'object_id', 'oid', 'gid'],
  },
  writer: {
    strictFieldTypes: false,
  },
  quality: {
    weights: DEFAULT_QUALITY_WEIGHTS,
  },
};

/**
 * Deep partial type for nested configuration objects. Arrays are replaced
 * wholesale, never merged.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

/**
 * Create custom configuration by merging with defaults
 */
export function createConfig(
  overrides: DeepPartial<ConversionConfig> = {},
  base: ConversionConfig = DEFAULT_CONFIG
): ConversionConfig {
  // Field by field: an override left undefined must not erase the default
  const weights = overrides.quality?.weights;
  const config: ConversionConfig = {
    scratch: {
      root: overrides.scratch?.root ?? base.scratch.root,
      maxBytes: overrides.scratch?.maxBytes ?? base.scratch.maxBytes,
    },
    outputDir: overrides.outputDir ?? base.outputDir,
    budget: {
      softTimeoutMs: overrides.budget?.softTimeoutMs ?? base.budget.softTimeoutMs,
      hardTimeoutMs: overrides.budget?.hardTimeoutMs ?? base.budget.hardTimeoutMs,
    },
    projection: {
      fallbackEpsg: overrides.projection?.fallbackEpsg ?? base.projection.fallbackEpsg,
    },
    attributes: {
      syntheticIdFields: overrides.attributes?.syntheticIdFields ?? base.attributes.syntheticIdFields,
    },
    writer: {
      strictFieldTypes: overrides.writer?.strictFieldTypes ?? base.writer.strictFieldTypes,
    },
    quality: {
      weights: {
        geometryValidity: weights?.geometryValidity ?? base.quality.weights.geometryValidity,
        crsConfidence: weights?.crsConfidence ?? base.quality.weights.crsConfidence,
        attributeCompleteness: weights?.attributeCompleteness ?? base.quality.weights.attributeCompleteness,
        schemaConformance: weights?.schemaConformance ?? base.quality.weights.schemaConformance,
        duplicationRatio: weights?.duplicationRatio ?? base.quality.weights.duplicationRatio,
      },
    },
  };
  assertValidConfig(config);
  return config;
}

// ============================================================================
// Validation
// ============================================================================

const WeightSchema = z.number().finite().min(0, 'Quality weights must be >= 0');

const ConfigSchema = z
  .object({
    scratch: z.object({
      root: z.string().min(1),
      maxBytes: z.number().int().positive(),
    }),
    outputDir: z.string().min(1),
    budget: z.object({
      softTimeoutMs: z.number().int().positive(),
      hardTimeoutMs: z.number().int().positive(),
    }),
    projection: z.object({
      fallbackEpsg: z.number().int().positive(),
    }),
    attributes: z.object({
      syntheticIdFields: z.array(z.string()),
    }),
    writer: z.object({
      strictFieldTypes: z.boolean(),
    }),
    quality: z.object({
      weights: z
        .object({
          geometryValidity: WeightSchema,
          crsConfidence: WeightSchema,
          attributeCompleteness: WeightSchema,
          schemaConformance: WeightSchema,
          duplicationRatio: WeightSchema,
        })
        .refine(
          (w) =>
            w.geometryValidity + w.crsConfidence + w.attributeCompleteness + w.schemaConformance + w.duplicationRatio > 0,
          'At least one quality weight must be positive'
        ),
    }),
  })
  .refine((c) => c.budget.softTimeoutMs <= c.budget.hardTimeoutMs, 'softTimeoutMs must not exceed hardTimeoutMs');

function assertValidConfig(config: ConversionConfig): void {
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new Error(`Invalid GeoConvert configuration: ${issues.join('; ')}`);
  }
}

// ============================================================================
// Environment
// ============================================================================

const WEIGHT_KEYS: Record<string, keyof QualityWeights> = {
  geometry_validity: 'geometryValidity',
  crs_confidence: 'crsConfidence',
  attribute_completeness: 'attributeCompleteness',
  schema_conformance: 'schemaConformance',
  duplication_ratio: 'duplicationRatio',
};

const IntegerFromEnv = z.coerce.number().int().positive();

const BooleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Parse `geometry_validity=30,crs_confidence=20,...`
 */
export function parseQualityWeights(raw: string): Partial<QualityWeights> {
  const weights: { -readonly [K in keyof QualityWeights]?: number } = {};
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (trimmed === '') continue;
    const [key, value] = trimmed.split('=').map((part) => part.trim());
    const target = key === undefined ? undefined : WEIGHT_KEYS[key];
    if (!target || value === undefined) {
      throw new Error(`Invalid quality weight entry '${trimmed}'`);
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new Error(`Quality weight '${key}' is not a number: '${value}'`);
    }
    weights[target] = parsed;
  }
  return weights;
}

/**
 * Load configuration from environment variables
 *
 * Environment variables:
 * - GEOCONVERT_SCRATCH_DIR, GEOCONVERT_SCRATCH_MAX_BYTES
 * - GEOCONVERT_OUTPUT_DIR
 * - GEOCONVERT_SOFT_TIMEOUT_MS, GEOCONVERT_HARD_TIMEOUT_MS
 * - GEOCONVERT_FALLBACK_EPSG
 * - GEOCONVERT_QUALITY_WEIGHTS (e.g. `geometry_validity=40,crs_confidence=10`)
 * - GEOCONVERT_STRICT_FIELD_TYPES (`true` | `false`)
 * - GEOCONVERT_SYNTHETIC_ID_FIELDS (comma-separated)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConversionConfig {
  const read = <T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const result = schema.safeParse(raw.trim());
    if (!result.success) {
      throw new Error(`Invalid value for ${name}: '${raw}'`);
    }
    return result.data;
  };

  const weightsRaw = env.GEOCONVERT_QUALITY_WEIGHTS;
  const idFieldsRaw = env.GEOCONVERT_SYNTHETIC_ID_FIELDS;

  return createConfig({
    scratch: {
      root: read('GEOCONVERT_SCRATCH_DIR', z.string()),
      maxBytes: read('GEOCONVERT_SCRATCH_MAX_BYTES', IntegerFromEnv),
    },
    outputDir: read('GEOCONVERT_OUTPUT_DIR', z.string()),
    budget: {
      softTimeoutMs: read('GEOCONVERT_SOFT_TIMEOUT_MS', IntegerFromEnv),
      hardTimeoutMs: read('GEOCONVERT_HARD_TIMEOUT_MS', IntegerFromEnv),
    },
    projection: {
      fallbackEpsg: read('GEOCONVERT_FALLBACK_EPSG', IntegerFromEnv),
    },
    attributes: {
      syntheticIdFields: idFieldsRaw
        ? idFieldsRaw.split(',').map((f) => f.trim().toLowerCase()).filter((f) => f !== '')
        : undefined,
    },
    writer: {
      strictFieldTypes: read('GEOCONVERT_STRICT_FIELD_TYPES', BooleanFromEnv),
    },
    quality: {
      weights: weightsRaw ? parseQualityWeights(weightsRaw) : undefined,
    },
  });
}
