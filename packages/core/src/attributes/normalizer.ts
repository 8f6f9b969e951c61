/**
 * Attribute Normalizer
 *
 * Cleans the attribute table of a layer:
 *
 * 1. Rename fields to lowercase ASCII identifiers, suffixing collisions
 * 2. Truncate names to the target format's limit, re-suffixing collisions
 * 3. Drop autogenerated identifier fields (fid, objectid, ...)
 * 4. Promote text fields whose values are all numeric, dates or date-times
 * 5. Trim whitespace and strip control characters from text values
 * 6. Replace null sentinels (`N/A`, `--`, `#N/A`, ...) with null
 *
 * Type inference looks at values as they will be after steps 5 and 6, so a
 * second pass over the output finds nothing left to do.
 */

import type { AttributeValue, FieldDefinition, FieldType, Layer, LayerFeature } from '../core/types.js';
import { DEFAULT_CONFIG } from '../core/config.js';
import { createLogger } from '../core/utils/logger.js';
import { assignUniqueNames, normalizeIdentifier } from './field-names.js';
import { cleanText, convertText, inferTextFieldType, isNullSentinel } from './values.js';

const log = createLogger({ module: 'normalizer' });

export type NormalizeMode = 'normalize' | 'assess';

export interface NormalizeOptions {
  readonly mode?: NormalizeMode;
  /** Normalized names dropped as autogenerated identifiers */
  readonly syntheticIdFields?: readonly string[];
  /** Name length limit of the target format */
  readonly maxFieldNameLength?: number;
}

export interface AttributeNormalizationStats {
  readonly sourceFieldCount: number;
  /** Source name → new name, for fields whose name changed */
  readonly renamed: Readonly<Record<string, string>>;
  /** Source names whose normalized form was cut to the length limit */
  readonly truncated: readonly string[];
  /** Source names of dropped fields */
  readonly dropped: readonly string[];
  /** New name → promoted type */
  readonly promoted: Readonly<Record<string, FieldType>>;
  readonly trimmedValues: number;
  readonly strippedValues: number;
  readonly nullsStandardized: number;
  /** Source fields that were renamed, dropped or promoted */
  readonly nonConformantFields: number;
}

export interface NormalizationResult {
  readonly layer: Layer;
  readonly stats: AttributeNormalizationStats;
}

interface FieldPlan {
  readonly source: FieldDefinition;
  readonly target: FieldDefinition;
  readonly values: ReadonlyMap<number, AttributeValue>;
}

function textOf(value: AttributeValue): string {
  if (typeof value === 'string') return value;
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Normalize the attribute table of `layer`
 */
export function normalizeAttributes(layer: Layer, options: NormalizeOptions = {}): NormalizationResult {
  const mode = options.mode ?? 'normalize';
  const denylist = new Set(
    (options.syntheticIdFields ?? DEFAULT_CONFIG.attributes.syntheticIdFields).map((f) => f.toLowerCase())
  );
  const maxLength = options.maxFieldNameLength;

  // Steps 1-3: names
  const dropped: string[] = [];
  const kept: Array<{ field: FieldDefinition; base: string }> = [];
  for (const field of layer.schema) {
    const base = normalizeIdentifier(field.name);
    if (denylist.has(base)) {
      dropped.push(field.name);
    } else {
      kept.push({ field, base });
    }
  }

  const newNames = assignUniqueNames(
    kept.map((k) => k.base),
    { maxLength }
  );
  const truncated = maxLength === undefined ? [] : kept.filter((k) => k.base.length > maxLength).map((k) => k.field.name);

  // Steps 4-6: values
  let trimmedValues = 0;
  let strippedValues = 0;
  let nullsStandardized = 0;
  const renamed: Record<string, string> = {};
  const promoted: Record<string, FieldType> = {};
  const plans: FieldPlan[] = [];

  for (const [i, { field }] of kept.entries()) {
    const name = newNames[i] ?? field.name;
    if (name !== field.name) renamed[field.name] = name;

    const values = new Map<number, AttributeValue>();
    for (const [position, feature] of layer.features.entries()) {
      if (Object.prototype.hasOwnProperty.call(feature.attributes, field.name)) {
        values.set(position, feature.attributes[field.name] ?? null);
      }
    }

    if (field.type !== 'text') {
      plans.push({ source: field, target: { name, type: field.type }, values });
      continue;
    }

    const cleaned = new Map<number, string | null>();
    for (const [position, value] of values) {
      if (value === null) {
        cleaned.set(position, null);
        continue;
      }
      const text = cleanText(textOf(value));
      if (text.stripped) strippedValues++;
      if (text.trimmed) trimmedValues++;
      if (isNullSentinel(text.value)) {
        nullsStandardized++;
        cleaned.set(position, null);
      } else {
        cleaned.set(position, text.value);
      }
    }

    const present = [...cleaned.values()].filter((v): v is string => v !== null);
    const type = inferTextFieldType(present) ?? 'text';
    if (type !== 'text') promoted[name] = type;

    const converted = new Map<number, AttributeValue>();
    for (const [position, value] of cleaned) {
      converted.set(position, value === null ? null : convertText(value, type));
    }
    plans.push({ source: field, target: { name, type }, values: converted });
  }

  const nonConformant = new Set<string>([...dropped, ...Object.keys(renamed)]);
  for (const plan of plans) {
    if (plan.target.type !== plan.source.type) nonConformant.add(plan.source.name);
  }

  const stats: AttributeNormalizationStats = {
    sourceFieldCount: layer.schema.length,
    renamed,
    truncated,
    dropped,
    promoted,
    trimmedValues,
    strippedValues,
    nullsStandardized,
    nonConformantFields: nonConformant.size,
  };

  log.info('Attribute normalization complete', {
    layer: layer.name,
    mode,
    fields: layer.schema.length,
    renamed: Object.keys(renamed).length,
    dropped: dropped.length,
    promoted: Object.keys(promoted).length,
    nullsStandardized,
  });

  if (mode === 'assess') {
    return { layer, stats };
  }

  const features: LayerFeature[] = layer.features.map((feature, position) => {
    const attributes: Record<string, AttributeValue> = {};
    for (const plan of plans) {
      const value = plan.values.get(position);
      if (value !== undefined) attributes[plan.target.name] = value;
    }
    return { ...feature, attributes };
  });

  return {
    layer: { ...layer, schema: plans.map((p) => p.target), features },
    stats,
  };
}
