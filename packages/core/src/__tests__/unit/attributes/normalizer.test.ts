/**
 * Attribute Normalizer
 */

import { describe, it, expect } from 'vitest';
import { normalizeAttributes } from '../../../attributes/normalizer.js';
import { feature, makeLayer, point } from '../../utils/builders.js';

function communeLayer() {
  return makeLayer(
    [
      feature(0, point(2.35, 48.85), {
        OBJECTID: 1,
        'Date De Création': '2021-03-04',
        'Population ': ' 1200 ',
        'Code Postal': '01234',
      }),
      feature(1, point(4.83, 45.76), {
        OBJECTID: 2,
        'Date De Création': 'N/A',
        'Population ': '980',
        'Code Postal': '75001',
      }),
    ],
    {
      schema: [
        { name: 'OBJECTID', type: 'integer' },
        { name: 'Date De Création', type: 'text' },
        { name: 'Population ', type: 'text' },
        { name: 'Code Postal', type: 'text' },
      ],
    }
  );
}

describe('normalizeAttributes', () => {
  it('renames, drops identifiers and promotes types', () => {
    const { layer, stats } = normalizeAttributes(communeLayer());

    expect(layer.schema).toEqual([
      { name: 'date_de_creation', type: 'date' },
      { name: 'population', type: 'integer' },
      { name: 'code_postal', type: 'text' },
    ]);
    expect(layer.features.map((f) => f.attributes)).toEqual([
      { date_de_creation: '2021-03-04', population: 1200, code_postal: '01234' },
      { date_de_creation: null, population: 980, code_postal: '75001' },
    ]);

    expect(stats.dropped).toEqual(['OBJECTID']);
    expect(stats.renamed).toEqual({
      'Date De Création': 'date_de_creation',
      'Population ': 'population',
      'Code Postal': 'code_postal',
    });
    expect(stats.promoted).toEqual({ date_de_creation: 'date', population: 'integer' });
    expect(stats.nullsStandardized).toBe(1);
    expect(stats.trimmedValues).toBe(1);
    expect(stats.sourceFieldCount).toBe(4);
    expect(stats.nonConformantFields).toBe(4);
  });

  it('keeps geometries and source indexes', () => {
    const input = communeLayer();
    const { layer } = normalizeAttributes(input);
    expect(layer.features.map((f) => f.index)).toEqual([0, 1]);
    expect(layer.features[0]?.geometry).toEqual(input.features[0]?.geometry);
  });

  it('is idempotent', () => {
    const once = normalizeAttributes(communeLayer()).layer;
    const twice = normalizeAttributes(once);
    expect(twice.layer).toEqual(once);
    expect(twice.stats.renamed).toEqual({});
    expect(twice.stats.dropped).toEqual([]);
    expect(twice.stats.promoted).toEqual({});
    expect(twice.stats.nonConformantFields).toBe(0);
  });

  it('fits truncated names inside the length limit', () => {
    const layer = makeLayer([feature(0, point(0, 0), { abcdefghijk: 'a', abcdefghijz: 'b' })]);
    const result = normalizeAttributes(layer, { maxFieldNameLength: 10 });
    expect(result.layer.schema.map((f) => f.name)).toEqual(['abcdefghi1', 'abcdefghi2']);
    expect(result.stats.truncated).toEqual(['abcdefghijk', 'abcdefghijz']);
  });

  it('leaves identifiers longer than a double holds as text', () => {
    const layer = makeLayer([
      feature(0, point(0, 0), { reference: '12345678901234567891' }),
      feature(1, point(1, 1), { reference: '42' }),
    ]);

    const { layer: out, stats } = normalizeAttributes(layer);

    expect(out.schema).toEqual([{ name: 'reference', type: 'text' }]);
    expect(out.features.map((f) => f.attributes['reference'])).toEqual(['12345678901234567891', '42']);
    expect(stats.promoted).toEqual({});
  });

  it('honors a custom identifier denylist', () => {
    const layer = makeLayer([feature(0, point(0, 0), { OBJECTID: '7', gml_id: 'x1' })]);
    const { layer: out, stats } = normalizeAttributes(layer, { syntheticIdFields: ['gml_id'] });
    expect(out.schema.map((f) => f.name)).toEqual(['objectid']);
    expect(stats.dropped).toEqual(['gml_id']);
  });

  it('reports without changing the layer in assess mode', () => {
    const input = communeLayer();
    const { layer, stats } = normalizeAttributes(input, { mode: 'assess' });
    expect(layer).toBe(input);
    expect(stats.dropped).toEqual(['OBJECTID']);
    expect(stats.nonConformantFields).toBe(4);
  });
});
