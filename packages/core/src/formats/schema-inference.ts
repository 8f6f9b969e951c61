/**
 * Schema inference for self-describing containers (GeoJSON, KML, CSV)
 *
 * Field order is order of first appearance. A field whose values disagree on
 * type becomes `text` and its values are converted to their text form, except
 * that integers mixed with reals make a `real` field.
 */

import type { AttributeRecord, AttributeValue, FieldType, JsonValue, LayerSchema } from '../core/types.js';

/**
 * Convert a value parsed from JSON (typed unknown) into a JsonValue
 *
 * Values JSON cannot carry (undefined, functions, symbols, bigints) become null.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') {
    const out: Record<string, JsonValue> = {};
    for (const [key, member] of Object.entries(value)) {
      out[key] = toJsonValue(member);
    }
    return out;
  }
  return null;
}

function typeOfValue(value: AttributeValue): FieldType | undefined {
  if (value === null) return undefined;
  switch (typeof value) {
    case 'string':
      return 'text';
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'real';
    default:
      return 'json';
  }
}

function unify(a: FieldType | undefined, b: FieldType): FieldType {
  if (a === undefined || a === b) return b;
  if ((a === 'integer' && b === 'real') || (a === 'real' && b === 'integer')) return 'real';
  return 'text';
}

export function asText(value: AttributeValue): string | null {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export interface InferredAttributes {
  readonly schema: LayerSchema;
  readonly records: readonly AttributeRecord[];
}

/**
 * Derive a schema from attribute records and coerce values to it
 */
export function inferSchema(records: readonly AttributeRecord[]): InferredAttributes {
  const types = new Map<string, FieldType | undefined>();
  for (const record of records) {
    for (const [name, value] of Object.entries(record)) {
      const current = types.get(name);
      const seen = typeOfValue(value);
      types.set(name, seen === undefined ? current : unify(current, seen));
    }
  }

  const schema: LayerSchema = [...types.entries()].map(([name, type]) => ({ name, type: type ?? 'text' }));
  const textFields = new Set(schema.filter((f) => f.type === 'text').map((f) => f.name));

  const coerced = records.map((record) => {
    const out: Record<string, AttributeValue> = {};
    for (const [name, value] of Object.entries(record)) {
      out[name] = textFields.has(name) ? asText(value) : value;
    }
    return out;
  });

  return { schema, records: coerced };
}
