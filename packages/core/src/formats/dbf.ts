/**
 * dBASE III table codec (the attribute part of a Shapefile)
 *
 * LAYOUT:
 * - 32-byte header: version, last update, record count, header and record length
 * - 32-byte field descriptors, terminated by 0x0D
 * - fixed-width records, each led by a deletion flag byte
 * - 0x1A end-of-file marker
 *
 * FIELD TYPES:
 * - C text (≤ 254 bytes), N numeric, F float, L logical, D date (YYYYMMDD)
 * - N with zero decimals reads back as integer, with decimals as real
 */

import { MalformedDataError, WriteCapabilityError } from '../core/errors.js';
import type { AttributeRecord, AttributeValue, FieldDefinition, FieldType, LayerSchema } from '../core/types.js';
import { decodeText, encodeText, isValidUtf8, type TextEncodingName } from './encoding.js';

export const DBF_MAX_TEXT_BYTES = 254;
const DBF_MAX_NUMBER_WIDTH = 24;
const HEADER_BYTES = 32;
const DESCRIPTOR_BYTES = 32;

export interface DbfFieldDescriptor {
  readonly name: string;
  readonly type: string;
  readonly length: number;
  readonly decimals: number;
}

export interface DbfTable {
  readonly fields: readonly DbfFieldDescriptor[];
  readonly schema: LayerSchema;
  readonly records: readonly AttributeRecord[];
  readonly encoding: TextEncodingName;
  /** Set when UTF-8 was requested but the table only decodes as latin1 */
  readonly fallbackFrom?: TextEncodingName;
}

// ============================================================================
// Reading
// ============================================================================

function fieldTypeOf(descriptor: DbfFieldDescriptor): FieldType {
  switch (descriptor.type) {
    case 'N':
      return descriptor.decimals === 0 ? 'integer' : 'real';
    case 'F':
    case 'O':
      return 'real';
    case 'L':
      return 'boolean';
    case 'D':
      return 'date';
    default:
      return 'text';
  }
}

function parseValue(raw: string, descriptor: DbfFieldDescriptor): AttributeValue {
  switch (descriptor.type) {
    case 'N':
    case 'F': {
      const trimmed = raw.trim();
      if (trimmed === '' || trimmed.startsWith('*')) return null;
      const value = Number(trimmed);
      return Number.isFinite(value) ? value : null;
    }
    case 'L': {
      const flag = raw.trim().toUpperCase();
      if (flag === 'T' || flag === 'Y') return true;
      if (flag === 'F' || flag === 'N') return false;
      return null;
    }
    case 'D': {
      const match = /^(\d{4})(\d{2})(\d{2})$/.exec(raw.trim());
      return match ? `${match[1]}-${match[2]}-${match[3]}` : null;
    }
    case 'M':
      // Memo pointers refer to a .dbt file, which is not part of the dataset
      return null;
    default: {
      const text = raw.replace(/\0+$/, '').trimEnd();
      return text === '' ? null : text;
    }
  }
}

/**
 * Parse a .dbf file
 *
 * @throws MalformedDataError for truncated or inconsistent tables
 */
export function readDbf(bytes: Uint8Array, encoding: TextEncodingName): DbfTable {
  if (bytes.length < HEADER_BYTES) {
    throw new MalformedDataError('DBF file is shorter than its header');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const recordCount = view.getUint32(4, true);
  const headerLength = view.getUint16(8, true);
  const recordLength = view.getUint16(10, true);

  if (headerLength > bytes.length || headerLength < HEADER_BYTES + 1) {
    throw new MalformedDataError(`DBF header length ${headerLength} is invalid`);
  }

  // Decide the encoding once, from the whole record area
  const body = bytes.subarray(HEADER_BYTES, Math.min(bytes.length, headerLength + recordCount * recordLength));
  let effective = encoding;
  let fallbackFrom: TextEncodingName | undefined;
  if (encoding === 'utf-8' && !isValidUtf8(body)) {
    effective = 'latin1';
    fallbackFrom = 'utf-8';
  }
  const decode = (slice: Uint8Array): string => decodeText(slice, effective).text;

  const fields: DbfFieldDescriptor[] = [];
  for (let offset = HEADER_BYTES; offset + DESCRIPTOR_BYTES <= headerLength; offset += DESCRIPTOR_BYTES) {
    if (bytes[offset] === 0x0d) break;
    const nameBytes = bytes.subarray(offset, offset + 11);
    const nul = nameBytes.indexOf(0);
    fields.push({
      name: decode(nul === -1 ? nameBytes : nameBytes.subarray(0, nul)).trim(),
      type: String.fromCharCode(bytes[offset + 11] ?? 0x43).toUpperCase(),
      length: bytes[offset + 16] ?? 0,
      decimals: bytes[offset + 17] ?? 0,
    });
  }

  const declaredWidth = 1 + fields.reduce((sum, f) => sum + f.length, 0);
  if (declaredWidth > recordLength) {
    throw new MalformedDataError(`DBF field widths (${declaredWidth}) exceed record length (${recordLength})`);
  }
  if (headerLength + recordCount * recordLength > bytes.length) {
    throw new MalformedDataError(`DBF declares ${recordCount} records but the file is truncated`);
  }

  const records: AttributeRecord[] = [];
  for (let r = 0; r < recordCount; r++) {
    let offset = headerLength + r * recordLength + 1;
    const record: Record<string, AttributeValue> = {};
    for (const field of fields) {
      record[field.name] = parseValue(decode(bytes.subarray(offset, offset + field.length)), field);
      offset += field.length;
    }
    records.push(record);
  }

  return {
    fields,
    schema: fields.map((f) => ({ name: f.name, type: fieldTypeOf(f) })),
    records,
    encoding: effective,
    ...(fallbackFrom !== undefined ? { fallbackFrom } : {}),
  };
}

// ============================================================================
// Writing
// ============================================================================

interface ColumnPlan {
  readonly descriptor: DbfFieldDescriptor;
  /** Encode the value of row `row` */
  readonly format: (value: AttributeValue, row: number) => Uint8Array;
}

function padEnd(bytes: Uint8Array, width: number, fill = 0x20): Uint8Array {
  const out = new Uint8Array(width).fill(fill);
  out.set(bytes.subarray(0, width));
  return out;
}

function padStart(text: string, width: number): Uint8Array {
  return new TextEncoder().encode(text.padStart(width, ' '));
}

function fractionDigits(value: number): number {
  const text = String(value);
  if (/e-/i.test(text)) return 15;
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : Math.min(15, text.length - dot - 1);
}

function numberColumn(
  field: FieldDefinition,
  values: readonly AttributeValue[],
  indices: readonly number[]
): ColumnPlan {
  const numbers = values.filter((v): v is number => typeof v === 'number');
  const integral = field.type === 'integer';

  const intWidth = numbers.reduce(
    (max, v) => Math.max(max, Math.trunc(Math.abs(v)).toFixed(0).length + (v < 0 ? 1 : 0)),
    1
  );
  let decimals = integral ? 0 : numbers.reduce((max, v) => Math.max(max, fractionDigits(v)), 1);
  if (intWidth + (decimals > 0 ? decimals + 1 : 0) > DBF_MAX_NUMBER_WIDTH) {
    decimals = integral ? 0 : Math.max(1, DBF_MAX_NUMBER_WIDTH - intWidth - 1);
  }
  const width = Math.min(DBF_MAX_NUMBER_WIDTH, intWidth + (decimals > 0 ? decimals + 1 : 0));

  return {
    descriptor: { name: field.name, type: 'N', length: width, decimals },
    format: (value, row) => {
      if (typeof value !== 'number') return padStart('', width);
      const text = value.toFixed(decimals);
      if (text.length > width) {
        throw new WriteCapabilityError(`Value ${value} of field '${field.name}' exceeds the DBF numeric width ${width}`, {
          featureIndex: indices[row],
        });
      }
      return padStart(text, width);
    },
  };
}

function textColumn(
  field: FieldDefinition,
  values: readonly AttributeValue[],
  indices: readonly number[],
  encoding: TextEncodingName
): ColumnPlan {
  const encoded = values.map((value, i) => {
    if (value === null) return new Uint8Array(0);
    const text = typeof value === 'string' ? value : typeof value === 'object' ? JSON.stringify(value) : String(value);
    const bytes = encodeText(text, encoding);
    const featureIndex = indices[i];
    if (bytes === undefined) {
      throw new WriteCapabilityError(`Field '${field.name}' holds text that ${encoding} cannot represent`, {
        featureIndex,
      });
    }
    if (bytes.length > DBF_MAX_TEXT_BYTES) {
      throw new WriteCapabilityError(
        `Field '${field.name}' value is ${bytes.length} bytes, DBF text is limited to ${DBF_MAX_TEXT_BYTES}`,
        { featureIndex }
      );
    }
    return bytes;
  });
  const width = encoded.reduce((max, b) => Math.max(max, b.length), 1);
  return {
    descriptor: { name: field.name, type: 'C', length: width, decimals: 0 },
    format: (_value, row) => padEnd(encoded[row] ?? new Uint8Array(0), width),
  };
}

function planColumn(
  field: FieldDefinition,
  values: readonly AttributeValue[],
  indices: readonly number[],
  encoding: TextEncodingName
): ColumnPlan {
  switch (field.type) {
    case 'integer':
    case 'real':
      return numberColumn(field, values, indices);
    case 'boolean':
      return {
        descriptor: { name: field.name, type: 'L', length: 1, decimals: 0 },
        format: (value) => new Uint8Array([value === true ? 0x54 : value === false ? 0x46 : 0x3f]),
      };
    case 'date':
      return {
        descriptor: { name: field.name, type: 'D', length: 8, decimals: 0 },
        format: (value) =>
          padEnd(new TextEncoder().encode(typeof value === 'string' ? value.slice(0, 10).replace(/-/g, '') : ''), 8),
      };
    default:
      return textColumn(field, values, indices, encoding);
  }
}

export interface DbfRow {
  readonly featureIndex: number;
  readonly attributes: AttributeRecord;
}

/**
 * Serialize rows into a .dbf file
 *
 * Field names must already be valid DBF names (≤ 10 ASCII characters).
 * `datetime` and `json` values are written as text.
 *
 * @throws WriteCapabilityError for text over 254 bytes, numbers wider than
 *   the column, and characters the encoding cannot hold
 */
export function writeDbf(schema: LayerSchema, rows: readonly DbfRow[], encoding: TextEncodingName): Uint8Array {
  const indices = rows.map((r) => r.featureIndex);
  const plans = schema.map((field) =>
    planColumn(
      field,
      rows.map((r) => r.attributes[field.name] ?? null),
      indices,
      encoding
    )
  );

  const headerLength = HEADER_BYTES + plans.length * DESCRIPTOR_BYTES + 1;
  const recordLength = 1 + plans.reduce((sum, p) => sum + p.descriptor.length, 0);
  const out = new Uint8Array(headerLength + rows.length * recordLength + 1);
  const view = new DataView(out.buffer);

  const now = new Date();
  out[0] = 0x03;
  out[1] = now.getFullYear() - 1900;
  out[2] = now.getMonth() + 1;
  out[3] = now.getDate();
  view.setUint32(4, rows.length, true);
  view.setUint16(8, headerLength, true);
  view.setUint16(10, recordLength, true);
  // Language driver: 0x57 (ANSI) for single-byte tables; UTF-8 is declared by the .cpg file
  out[29] = encoding === 'utf-8' ? 0x00 : 0x57;

  plans.forEach((plan, i) => {
    const offset = HEADER_BYTES + i * DESCRIPTOR_BYTES;
    out.set(padEnd(new TextEncoder().encode(plan.descriptor.name), 11, 0x00), offset);
    out[offset + 11] = plan.descriptor.type.charCodeAt(0);
    out[offset + 16] = plan.descriptor.length;
    out[offset + 17] = plan.descriptor.decimals;
  });
  out[headerLength - 1] = 0x0d;

  rows.forEach((row, r) => {
    let offset = headerLength + r * recordLength;
    out[offset++] = 0x20;
    for (const [i, field] of schema.entries()) {
      const plan = plans[i];
      if (!plan) continue;
      out.set(plan.format(row.attributes[field.name] ?? null, r), offset);
      offset += plan.descriptor.length;
    }
  });
  out[out.length - 1] = 0x1a;

  return out;
}
