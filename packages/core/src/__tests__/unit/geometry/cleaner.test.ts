/**
 * Geometry Cleaner
 */

import { describe, it, expect } from 'vitest';
import { cleanGeometries, MAX_ERROR_SAMPLES } from '../../../geometry/cleaner.js';
import { bowtie, feature, line, makeLayer, point, square } from '../../utils/builders.js';

function threeParcels() {
  return makeLayer([
    feature(0, bowtie(), { parcel: 'A' }),
    feature(1, square(10, 10), { parcel: 'B' }),
    feature(2, square(10, 10), { parcel: 'C' }),
  ]);
}

describe('cleanGeometries', () => {
  it('repairs the bowtie and removes the duplicate square', () => {
    const { layer, stats } = cleanGeometries(threeParcels());

    expect(layer.features.map((f) => f.index)).toEqual([0, 1]);
    expect(layer.features[0]?.geometry?.type).toBe('MultiPolygon');
    expect(layer.features[1]?.geometry).toEqual(square(10, 10));
    expect(stats).toMatchObject({
      inputCount: 3,
      nullCount: 0,
      invalidFound: 1,
      fixed: 1,
      unfixable: 0,
      dedupeCandidates: 3,
      duplicates: 1,
      outputCount: 2,
    });
    expect(stats.samples.map((s) => [s.kind, s.featureIndex])).toEqual([
      ['SELF_INTERSECTION', 0],
      ['DUPLICATE', 2],
    ]);
  });

  it('is idempotent', () => {
    const once = cleanGeometries(threeParcels()).layer;
    const twice = cleanGeometries(once);
    expect(twice.layer.features).toEqual(once.features);
    expect(twice.stats).toMatchObject({ invalidFound: 0, fixed: 0, duplicates: 0, outputCount: 2 });
  });

  it('drops null geometries and unrepairable ones', () => {
    const input = makeLayer([feature(0, null), feature(1, line([1, 1], [1, 1])), feature(2, point(3, 4))]);
    expect(input.kind).toBe('mixed');

    const { layer, stats } = cleanGeometries(input);
    expect(layer.features.map((f) => f.index)).toEqual([2]);
    expect(layer.kind).toBe('point');
    expect(stats).toMatchObject({ nullCount: 1, invalidFound: 1, fixed: 0, unfixable: 1, outputCount: 1 });
    expect(stats.samples.map((s) => s.kind)).toEqual(['NULL_GEOMETRY', 'INVALID_STRUCTURE', 'EMPTY_AFTER_REPAIR']);
  });

  it('keeps the layer untouched in assess mode', () => {
    const input = threeParcels();
    const { layer, stats } = cleanGeometries(input, 'assess');
    expect(layer).toBe(input);
    expect(stats).toMatchObject({ invalidFound: 1, fixed: 1, duplicates: 1, outputCount: 3 });
  });

  it('caps error samples', () => {
    const features = Array.from({ length: 15 }, (_, i) => feature(i, null));
    const { stats } = cleanGeometries(makeLayer(features));
    expect(stats.nullCount).toBe(15);
    expect(stats.samples).toHaveLength(MAX_ERROR_SAMPLES);
  });
});
