/**
 * Format Writer tests
 *
 * Capability checks, field fitting, and the merge of the geometry and
 * attribute branches.
 */

import { describe, it, expect } from 'vitest';
import { WriteCapabilityError } from '../../../core/errors.js';
import { mergeBranches, writeLayer } from '../../../writer/format-writer.js';
import { feature, makeLayer, point, square } from '../../utils/builders.js';

const census = makeLayer(
  [feature(0, point(0, 0), { population_totale: 10, population_hommes: 4, tags: { a: 1 }, 'Größe': 'x' })],
  {
    schema: [
      { name: 'population_totale', type: 'integer' },
      { name: 'population_hommes', type: 'integer' },
      { name: 'tags', type: 'json' },
      { name: 'Größe', type: 'text' },
    ],
  }
);

describe('mergeBranches', () => {
  it('takes geometries from one branch and attributes from the other by source index', () => {
    const geometryBranch = makeLayer([feature(0, point(1, 1), { raw: 'a' }), feature(2, point(3, 3), { raw: 'c' })], {
      name: 'cleaned',
    });
    const attributeBranch = makeLayer(
      [feature(0, point(0, 0), { nom: 'A' }), feature(1, point(0, 0), { nom: 'B' }), feature(2, point(0, 0), { nom: 'C' })],
      { name: 'normalized' }
    );

    const merged = mergeBranches(geometryBranch, attributeBranch);

    expect(merged.name).toBe('cleaned');
    expect(merged.schema).toEqual([{ name: 'nom', type: 'text' }]);
    expect(merged.features).toEqual([feature(0, point(1, 1), { nom: 'A' }), feature(2, point(3, 3), { nom: 'C' })]);
  });

  it('derives the kind from the geometries left after cleaning', () => {
    const geometryBranch = { ...makeLayer([feature(1, square(0, 0), { raw: 'b' })]), kind: 'mixed' as const };
    const attributeBranch = makeLayer([feature(0, point(0, 0), { nom: 'A' }), feature(1, point(0, 0), { nom: 'B' })]);

    expect(mergeBranches(geometryBranch, attributeBranch).kind).toBe('polygon');
    expect(mergeBranches({ ...geometryBranch, features: [] }, attributeBranch).kind).toBe('mixed');
  });
});

describe('writeLayer', () => {
  it('fits names and types to a shapefile and reports the changes', async () => {
    const result = await writeLayer({
      layer: census,
      format: 'shapefile',
      epsg: 4326,
      encoding: 'latin1',
      strictFieldTypes: false,
    });

    expect(result.extension).toBe('.zip');
    expect(result.mediaType).toBe('application/zip');
    expect(result.encoding).toBe('latin1');
    expect(result.renamedFields).toEqual({
      population_totale: 'populatio1',
      population_hommes: 'populatio2',
      'Größe': 'groe',
    });
    expect(result.textFallbacks).toEqual([{ field: 'tags', from: 'json' }]);
    expect(result.layer.schema).toEqual([
      { name: 'populatio1', type: 'integer' },
      { name: 'populatio2', type: 'integer' },
      { name: 'tags', type: 'text' },
      { name: 'groe', type: 'text' },
    ]);
    expect(result.layer.features[0]?.attributes).toEqual({ populatio1: 10, populatio2: 4, tags: '{"a":1}', groe: 'x' });
  });

  it('refuses text fallback under strict field types', async () => {
    await expect(
      writeLayer({ layer: census, format: 'shapefile', epsg: 4326, encoding: 'utf-8', strictFieldTypes: true })
    ).rejects.toThrow("ESRI Shapefile has no native type for field 'tags' (json)");
  });

  it('suffixes fields that use a reserved column name', async () => {
    const layer = makeLayer([feature(0, point(0, 0), { FID: 7 })], { schema: [{ name: 'FID', type: 'integer' }] });

    const result = await writeLayer({ layer, format: 'gpkg', epsg: 4326, encoding: 'utf-8', strictFieldTypes: false });

    expect(result.renamedFields).toEqual({ FID: 'FID1' });
  });

  it('requires WGS 84 coordinates for KML', async () => {
    const layer = makeLayer([feature(0, point(652000, 6862000))]);

    await expect(
      writeLayer({ layer, format: 'kml', epsg: 2154, encoding: 'utf-8', strictFieldTypes: false })
    ).rejects.toThrow('KML requires EPSG:4326, layer is in EPSG:2154');
  });

  it('refuses geometry kinds the container cannot hold', async () => {
    const layer = makeLayer([feature(0, square(0, 0))]);

    const attempt = writeLayer({ layer, format: 'csv', epsg: 4326, encoding: 'utf-8', strictFieldTypes: false });

    await expect(attempt).rejects.toBeInstanceOf(WriteCapabilityError);
    await expect(attempt).rejects.toThrow('CSV cannot hold polygon geometries');
  });

  it('writes GeoJSON as UTF-8 whatever the job encoding', async () => {
    const result = await writeLayer({
      layer: makeLayer([feature(0, point(0, 0), { nom: 'Zoë' })]),
      format: 'geojson',
      epsg: 4326,
      encoding: 'latin1',
      strictFieldTypes: false,
    });

    expect(result.encoding).toBe('utf-8');
    expect(result.extension).toBe('.geojson');
    expect(new TextDecoder().decode(result.bytes)).toContain('"nom":"Zoë"');
  });
});
