/**
 * ESRI Shapefile codec
 *
 * Geometry comes from the .shp file via the `shapefile` package; attributes
 * and field types come from the .dbf descriptors. The .cpg code page, when
 * present, overrides the job encoding for the DBF.
 *
 * Output is a ZIP holding .shp, .shx, .dbf, .cpg and, when the CRS is known,
 * a .prj with its ESRI WKT.
 */

import * as shapefile from 'shapefile';
import JSZip from 'jszip';
import type { Geometry } from 'geojson';
import { MalformedDataError } from '../core/errors.js';
import type { GeometryKind, Layer, LayerFeature } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { readDbf, writeDbf } from './dbf.js';
import { canonicalEncoding, decodeText, type TextEncodingName } from './encoding.js';
import { writeShp } from './shp.js';
import type { DatasetInput, EncodeRequest } from './types.js';

const log = createLogger({ module: 'shapefile' });

// Content of the written .cpg file
const CODE_PAGES: Readonly<Record<TextEncodingName, string>> = {
  'utf-8': 'UTF-8',
  latin1: 'ISO-8859-1',
  'windows-1252': '1252',
};

function kindOfShapeType(shapeType: number): GeometryKind {
  switch (shapeType % 10) {
    case 1:
    case 8:
      return 'point';
    case 3:
      return 'line';
    case 5:
      return 'polygon';
    default:
      return 'mixed';
  }
}

async function readGeometries(shp: Uint8Array): Promise<Array<Geometry | null>> {
  const geometries: Array<Geometry | null> = [];
  try {
    const source = await shapefile.open(shp);
    let result = await source.read();
    while (!result.done) {
      geometries.push(result.value.geometry ?? null);
      result = await source.read();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedDataError(`Failed to parse shapefile geometry: ${message}`, 'read', { cause: error });
  }
  return geometries;
}

export async function readShapefile(input: DatasetInput): Promise<Layer> {
  const dbf = input.companions['.dbf'];
  if (!dbf) {
    throw new MalformedDataError(`Shapefile '${input.layerName}' has no .dbf file`);
  }
  if (input.bytes.length < 100) {
    throw new MalformedDataError(`Shapefile '${input.layerName}' is shorter than its header`);
  }

  let encoding = input.encoding;
  const cpg = input.companions['.cpg'];
  if (cpg) {
    const label = decodeText(cpg, 'latin1').text;
    const declared = canonicalEncoding(label);
    if (declared) {
      encoding = declared;
    } else {
      log.warn('Unrecognized .cpg code page, using job encoding', { codePage: label.trim(), encoding });
    }
  }

  const table = readDbf(dbf, encoding);
  const geometries = await readGeometries(input.bytes);
  if (geometries.length !== table.records.length) {
    throw new MalformedDataError(
      `Shapefile has ${geometries.length} shapes but its DBF has ${table.records.length} records`
    );
  }

  const features: LayerFeature[] = geometries.map((geometry, index) => ({
    index,
    geometry,
    attributes: table.records[index] ?? {},
  }));

  const view = new DataView(input.bytes.buffer, input.bytes.byteOffset, input.bytes.byteLength);
  const prj = input.companions['.prj'];

  return {
    name: input.layerName,
    kind: kindOfShapeType(view.getInt32(32, true)),
    schema: table.schema,
    features,
    source: {
      format: 'shapefile',
      ...(prj ? { sidecarProjection: decodeText(prj, 'utf-8').text } : {}),
      encoding: table.encoding,
      ...(table.fallbackFrom !== undefined ? { encodingFallback: table.encoding } : {}),
    },
  };
}

/**
 * File base name safe inside any archive tool
 */
function archiveBaseName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
  return cleaned === '' ? 'layer' : cleaned;
}

export async function encodeShapefile(request: EncodeRequest): Promise<Uint8Array> {
  const { layer, encoding, crs } = request;
  const base = archiveBaseName(layer.name);

  const { shp, shx } = writeShp(layer.features);
  const dbf = writeDbf(
    layer.schema,
    layer.features.map((f) => ({ featureIndex: f.index, attributes: f.attributes })),
    encoding
  );

  const zip = new JSZip();
  zip.file(`${base}.shp`, shp);
  zip.file(`${base}.shx`, shx);
  zip.file(`${base}.dbf`, dbf);
  zip.file(`${base}.cpg`, CODE_PAGES[encoding]);
  if (crs) {
    zip.file(`${base}.prj`, crs.wkt);
  } else {
    log.warn('No WKT known for output CRS, writing shapefile without .prj', { epsg: request.epsg });
  }

  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
}
