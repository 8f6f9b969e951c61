/**
 * dBASE table codec tests
 */

import { describe, it, expect } from 'vitest';
import { MalformedDataError, WriteCapabilityError } from '../../../core/errors.js';
import type { LayerSchema } from '../../../core/types.js';
import { readDbf, writeDbf, type DbfRow } from '../../../formats/dbf.js';

const schema: LayerSchema = [
  { name: 'name', type: 'text' },
  { name: 'pop', type: 'integer' },
  { name: 'area', type: 'real' },
  { name: 'open', type: 'boolean' },
  { name: 'since', type: 'date' },
];

const rows: DbfRow[] = [
  { featureIndex: 0, attributes: { name: 'Zoë', pop: 1200, area: 12.5, open: true, since: '2021-03-04' } },
  { featureIndex: 1, attributes: { name: null, pop: -5, area: 3, open: null, since: null } },
];

function expectWriteError(run: () => unknown): WriteCapabilityError {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(WriteCapabilityError);
    if (error instanceof WriteCapabilityError) return error;
  }
  throw new Error('Expected a WriteCapabilityError');
}

describe('writeDbf / readDbf', () => {
  it('reads back every field type', () => {
    const table = readDbf(writeDbf(schema, rows, 'latin1'), 'latin1');

    expect(table.schema).toEqual(schema);
    expect(table.records).toEqual([
      { name: 'Zoë', pop: 1200, area: 12.5, open: true, since: '2021-03-04' },
      { name: null, pop: -5, area: 3, open: null, since: null },
    ]);
    expect(table.encoding).toBe('latin1');
    expect(table.fallbackFrom).toBeUndefined();
  });

  it('sizes columns from the widest value', () => {
    const table = readDbf(writeDbf(schema, rows, 'latin1'), 'latin1');

    expect(table.fields).toEqual([
      { name: 'name', type: 'C', length: 3, decimals: 0 },
      { name: 'pop', type: 'N', length: 4, decimals: 0 },
      { name: 'area', type: 'N', length: 4, decimals: 1 },
      { name: 'open', type: 'L', length: 1, decimals: 0 },
      { name: 'since', type: 'D', length: 8, decimals: 0 },
    ]);
  });

  it('stores UTF-8 text as multi-byte sequences', () => {
    const table = readDbf(writeDbf(schema, rows, 'utf-8'), 'utf-8');

    expect(table.fields[0]?.length).toBe(4);
    expect(table.records[0]?.['name']).toBe('Zoë');
  });

  it('falls back to latin1 when a UTF-8 read finds invalid sequences', () => {
    const table = readDbf(writeDbf(schema, rows, 'latin1'), 'utf-8');

    expect(table.encoding).toBe('latin1');
    expect(table.fallbackFrom).toBe('utf-8');
    expect(table.records[0]?.['name']).toBe('Zoë');
  });

  it('rejects text longer than 254 bytes with the feature index', () => {
    const error = expectWriteError(() =>
      writeDbf([{ name: 'note', type: 'text' }], [{ featureIndex: 7, attributes: { note: 'x'.repeat(255) } }], 'utf-8')
    );

    expect(error.message).toBe("Field 'note' value is 255 bytes, DBF text is limited to 254");
    expect(error.featureIndex).toBe(7);
  });

  it('rejects characters the encoding cannot hold', () => {
    const error = expectWriteError(() =>
      writeDbf([{ name: 'note', type: 'text' }], [{ featureIndex: 3, attributes: { note: '東京' } }], 'latin1')
    );

    expect(error.message).toBe("Field 'note' holds text that latin1 cannot represent");
    expect(error.featureIndex).toBe(3);
  });

  it('writes json values as text', () => {
    const table = readDbf(
      writeDbf([{ name: 'tags', type: 'json' }], [{ featureIndex: 0, attributes: { tags: ['a', 'b'] } }], 'utf-8'),
      'utf-8'
    );

    expect(table.records).toEqual([{ tags: '["a","b"]' }]);
  });
});

describe('readDbf', () => {
  it('rejects a file shorter than the header', () => {
    expect(() => readDbf(new Uint8Array(10), 'utf-8')).toThrow(MalformedDataError);
    expect(() => readDbf(new Uint8Array(10), 'utf-8')).toThrow('DBF file is shorter than its header');
  });

  it('rejects a table whose records are cut off', () => {
    const bytes = writeDbf(schema, rows, 'latin1');

    expect(() => readDbf(bytes.subarray(0, bytes.length - 5), 'latin1')).toThrow(
      'DBF declares 2 records but the file is truncated'
    );
  });
});
