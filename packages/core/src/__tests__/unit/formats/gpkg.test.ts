/**
 * GeoPackage codec tests
 *
 * Writes GeoPackages to a temporary directory and reads them back with the
 * same better-sqlite3 driver the reader uses.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MalformedDataError } from '../../../core/errors.js';
import type { Layer } from '../../../core/types.js';
import { decodeGeometryBlob, encodeGeometryBlob, encodeGeoPackage, readGeoPackage } from '../../../formats/gpkg.js';
import { getCrsRegistry } from '../../../projection/crs-registry.js';
import { datasetInput, feature, makeLayer, makeTempDir, square } from '../../utils/builders.js';

const parcelles = makeLayer(
  [
    feature(0, square(652000, 6862000, 10), { nom: 'A', surface: 100.5, actif: true, cree: '2020-01-02', lots: 3 }),
    feature(1, square(652100, 6862000, 20), { nom: null, surface: null, actif: false, cree: null, lots: null }),
    feature(2, null, { nom: 'C', surface: 7, actif: null, cree: null, lots: 1 }),
  ],
  {
    name: 'parcelles',
    schema: [
      { name: 'nom', type: 'text' },
      { name: 'surface', type: 'real' },
      { name: 'actif', type: 'boolean' },
      { name: 'cree', type: 'date' },
      { name: 'lots', type: 'integer' },
    ],
  }
);

describe('GeoPackage round trip', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir('geoconvert-gpkg-'));
  });

  afterEach(async () => {
    await cleanup();
  });

  async function writeAndRead(layer: Layer, epsg: number): Promise<Layer> {
    const bytes = await encodeGeoPackage({ layer, epsg, crs: getCrsRegistry().get(epsg), encoding: 'utf-8' });
    const path = join(dir, 'out.gpkg');
    await writeFile(path, bytes);
    return readGeoPackage(datasetInput('gpkg', bytes, { path, layerName: 'out' }));
  }

  it('keeps geometries, field types and the SRS', async () => {
    const layer = await writeAndRead(parcelles, 2154);

    expect(layer.name).toBe('parcelles');
    expect(layer.kind).toBe('polygon');
    expect(layer.source).toEqual({ format: 'gpkg', embeddedCrs: 'EPSG:2154', encoding: 'utf-8' });
    expect(layer.schema).toEqual(parcelles.schema);
    expect(layer.features.map((f) => f.geometry)).toEqual(parcelles.features.map((f) => f.geometry));
    expect(layer.features.map((f) => f.attributes)).toEqual(parcelles.features.map((f) => f.attributes));
  });

  it('renames a table that would collide with the metadata tables', async () => {
    const layer = await writeAndRead(makeLayer([feature(0, square(0, 0))], { name: 'gpkg_parcels', schema: [] }), 4326);

    expect(layer.name).toBe('layer_gpkg_parcels');
    expect(layer.source.embeddedCrs).toBe('EPSG:4326');
  });

  it('reports a missing file as malformed data', async () => {
    await expect(
      readGeoPackage(datasetInput('gpkg', new Uint8Array(0), { path: join(dir, 'missing.gpkg') }))
    ).rejects.toThrow(MalformedDataError);
  });
});

describe('geometry blobs', () => {
  it('round-trips a geometry with its envelope', () => {
    const geometry = square(1, 2, 3);
    const blob = encodeGeometryBlob(geometry, 2154);
    const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);

    expect(blob[3]).toBe(0x03);
    expect(view.getInt32(4, true)).toBe(2154);
    expect([8, 16, 24, 32].map((offset) => view.getFloat64(offset, true))).toEqual([1, 4, 2, 5]);
    expect(decodeGeometryBlob(blob)).toEqual(geometry);
  });

  it('flags empty geometries and omits the envelope', () => {
    const blob = encodeGeometryBlob({ type: 'Point', coordinates: [] }, 4326);

    expect(blob[3]).toBe(0x11);
    expect(decodeGeometryBlob(blob)).toEqual({ type: 'Point', coordinates: [] });
  });

  it('rejects bytes without the GP magic', () => {
    expect(() => decodeGeometryBlob(new Uint8Array(12))).toThrow('GeoPackage geometry blob lacks the GP header');
  });
});
