/**
 * Test builders for layers and geometries
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Geometry, Polygon, Position } from 'geojson';
import { deriveLayerKind } from '../../core/geo-utils.js';
import type { AttributeRecord, FieldDefinition, FormatId, Layer, LayerFeature, LayerSource } from '../../core/types.js';
import type { TextEncodingName } from '../../formats/encoding.js';
import type { DatasetInput } from '../../formats/types.js';

export interface LayerInit {
  readonly name?: string;
  readonly schema?: readonly FieldDefinition[];
  readonly source?: Partial<LayerSource>;
}

/**
 * Feature with a stable source index
 */
export function feature(index: number, geometry: Geometry | null, attributes: AttributeRecord = {}): LayerFeature {
  return { index, geometry, attributes };
}

/**
 * Layer from features; the schema defaults to text fields named after the
 * first feature's attributes
 */
export function makeLayer(features: readonly LayerFeature[], init: LayerInit = {}): Layer {
  const schema: readonly FieldDefinition[] =
    init.schema ?? Object.keys(features[0]?.attributes ?? {}).map((name) => ({ name, type: 'text' as const }));
  const format: FormatId = init.source?.format ?? 'geojson';
  return {
    name: init.name ?? 'test_layer',
    kind: deriveLayerKind(features),
    schema,
    features,
    source: { encoding: 'utf-8', ...init.source, format },
  };
}

export function point(x: number, y: number): Geometry {
  return { type: 'Point', coordinates: [x, y] };
}

export function line(...positions: Position[]): Geometry {
  return { type: 'LineString', coordinates: positions };
}

/**
 * Axis-aligned square polygon with its lower-left corner at (x, y)
 */
export function square(x: number, y: number, size = 1): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [x, y],
        [x + size, y],
        [x + size, y + size],
        [x, y + size],
        [x, y],
      ],
    ],
  };
}

/**
 * Self-intersecting "bowtie" polygon crossing at (1, 1)
 */
export function bowtie(): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [0, 0],
        [2, 2],
        [2, 0],
        [0, 2],
        [0, 0],
      ],
    ],
  };
}

/**
 * Fresh temporary directory removed by the returned cleanup
 */
export async function makeTempDir(prefix = 'geoconvert-test-'): Promise<{
  readonly dir: string;
  readonly cleanup: () => Promise<void>;
}> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

/**
 * In-memory dataset input for codec tests
 */
export function datasetInput(
  format: FormatId,
  content: string | Uint8Array,
  init: Partial<Omit<DatasetInput, 'format' | 'bytes'>> & { readonly encoding?: TextEncodingName } = {}
): DatasetInput {
  return {
    format,
    path: init.path ?? `/data/${init.layerName ?? 'sample'}`,
    bytes: typeof content === 'string' ? new TextEncoder().encode(content) : content,
    layerName: init.layerName ?? 'sample',
    companions: init.companions ?? {},
    encoding: init.encoding ?? 'utf-8',
  };
}
