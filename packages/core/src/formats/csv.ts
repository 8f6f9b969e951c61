/**
 * Delimited-text point codec (csv-parse / csv-stringify)
 *
 * A header row is required. Coordinates come from the first matching column
 * pair (longitude/latitude, lon/lat, lng/lat, long/lat, x/y, easting/northing);
 * those columns become the point geometry and are not kept as attributes.
 * Every other column is read as text and left to the attribute normalizer.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { Geometry } from 'geojson';
import { z } from 'zod';
import { MalformedDataError, WriteCapabilityError } from '../core/errors.js';
import type { AttributeValue, FieldDefinition, Layer, LayerFeature } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { assignUniqueNames } from '../attributes/field-names.js';
import { decodeText, encodeText, firstUnencodable } from './encoding.js';
import { asText } from './schema-inference.js';
import type { DatasetInput, EncodeRequest } from './types.js';

const log = createLogger({ module: 'csv' });

const RowsSchema = z.array(z.array(z.string()));

const COORDINATE_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['longitude', 'latitude'],
  ['lon', 'lat'],
  ['lng', 'lat'],
  ['long', 'lat'],
  ['x', 'y'],
  ['easting', 'northing'],
];

const DELIMITERS = [',', ';', '\t', '|'] as const;

/**
 * Delimiter occurring most often in the header line (comma on ties)
 */
export function detectDelimiter(text: string): string {
  const header = text.split(/\r?\n/, 1)[0] ?? '';
  let best: string = ',';
  let bestCount = 0;
  for (const delimiter of DELIMITERS) {
    const count = header.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Column indices of the coordinate pair, matched case-insensitively
 */
export function findCoordinateColumns(header: readonly string[]): readonly [number, number] | undefined {
  const lower = header.map((h) => h.trim().toLowerCase());
  for (const [xName, yName] of COORDINATE_PAIRS) {
    const x = lower.indexOf(xName);
    const y = lower.indexOf(yName);
    if (x >= 0 && y >= 0) return [x, y];
  }
  return undefined;
}

function parseOrdinate(raw: string, column: string, featureIndex: number): number | null {
  const text = raw.trim();
  if (text === '') return null;
  const value = Number(text.replace(/^\+/, ''));
  if (!Number.isFinite(value)) {
    throw new MalformedDataError(`Non-numeric coordinate '${text}' in column '${column}'`, 'read', { featureIndex });
  }
  return value;
}

export async function readCsv(input: DatasetInput): Promise<Layer> {
  const decoded = decodeText(input.bytes, input.encoding);

  let parsed: unknown;
  try {
    parsed = parse(decoded.text, {
      bom: true,
      delimiter: detectDelimiter(decoded.text),
      skip_empty_lines: true,
      relax_quotes: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedDataError(`Invalid CSV: ${message}`, 'read', { cause: error });
  }

  const rows = RowsSchema.safeParse(parsed);
  if (!rows.success) {
    throw new MalformedDataError('CSV rows did not parse as text cells');
  }
  const [header, ...body] = rows.data;
  if (!header) {
    throw new MalformedDataError('CSV has no header row');
  }

  const coordinates = findCoordinateColumns(header);
  if (!coordinates) {
    throw new MalformedDataError(`CSV header has no coordinate columns: ${header.join(', ')}`);
  }
  log.debug('CSV coordinate columns', { x: header[coordinates[0]], y: header[coordinates[1]], rows: body.length });

  const attributeColumns = header.map((_, i) => i).filter((i) => !coordinates.includes(i));
  const names = assignUniqueNames(attributeColumns.map((i) => header[i] ?? ''));
  const schema: FieldDefinition[] = names.map((name) => ({ name, type: 'text' }));

  const features: LayerFeature[] = body.map((row, index) => {
    const [xi, yi] = coordinates;
    const x = parseOrdinate(row[xi] ?? '', header[xi] ?? 'x', index);
    const y = parseOrdinate(row[yi] ?? '', header[yi] ?? 'y', index);
    const geometry: Geometry | null = x !== null && y !== null ? { type: 'Point', coordinates: [x, y] } : null;
    const attributes: Record<string, AttributeValue> = {};
    attributeColumns.forEach((column, i) => {
      const name = names[i];
      if (name !== undefined) attributes[name] = row[column] ?? null;
    });
    return { index, geometry, attributes };
  });

  return {
    name: input.layerName,
    kind: 'point',
    schema,
    features,
    source: {
      format: 'csv',
      encoding: decoded.encoding,
      ...(decoded.fallbackFrom !== undefined ? { encodingFallback: decoded.encoding } : {}),
    },
  };
}

/**
 * Single position of a point feature, or undefined for null geometry
 *
 * @throws WriteCapabilityError for non-point geometries
 */
function pointOf(geometry: Geometry | null, featureIndex: number): readonly number[] | undefined {
  if (geometry === null) return undefined;
  if (geometry.type === 'Point') return geometry.coordinates.length > 0 ? geometry.coordinates : undefined;
  if (geometry.type === 'MultiPoint' && geometry.coordinates.length <= 1) return geometry.coordinates[0];
  throw new WriteCapabilityError(`CSV holds single points; feature has a ${geometry.type}`, { featureIndex });
}

export async function encodeCsv(request: EncodeRequest): Promise<Uint8Array> {
  const { layer, epsg, crs, encoding } = request;
  const geographic = crs?.geographic ?? epsg === 4326;
  const header = [...(geographic ? ['longitude', 'latitude'] : ['x', 'y']), ...layer.schema.map((f) => f.name)];

  const rows = layer.features.map((feature) => {
    const point = pointOf(feature.geometry, feature.index);
    return [
      point?.[0] !== undefined ? String(point[0]) : '',
      point?.[1] !== undefined ? String(point[1]) : '',
      ...layer.schema.map((f) => asText(feature.attributes[f.name] ?? null) ?? ''),
    ];
  });

  const text = stringify([header, ...rows], { record_delimiter: 'unix' });
  const bytes = encodeText(text, encoding);
  if (!bytes) {
    throw new WriteCapabilityError(
      `Character '${firstUnencodable(text, encoding) ?? '?'}' cannot be written in ${encoding}`
    );
  }
  return bytes;
}
