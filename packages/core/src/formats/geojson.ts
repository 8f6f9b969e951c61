/**
 * GeoJSON codec
 *
 * Reads a FeatureCollection, a single Feature or a bare geometry. The legacy
 * `crs` member (GeoJSON 2008) is kept as embedded CRS metadata, and written
 * on output so the CRS survives a round trip.
 */

import type { Geometry } from 'geojson';
import { z } from 'zod';
import { MalformedDataError } from '../core/errors.js';
import { deriveLayerKind } from '../core/geo-utils.js';
import type { AttributeRecord, AttributeValue, JsonObject, Layer, LayerFeature } from '../core/types.js';
import { decodeText } from './encoding.js';
import { inferSchema, toJsonValue } from './schema-inference.js';
import type { DatasetInput, EncodeRequest } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

const Coordinates1 = z.array(z.number());
const Coordinates2 = z.array(Coordinates1);
const Coordinates3 = z.array(Coordinates2);
const Coordinates4 = z.array(Coordinates3);

export const GeometrySchema: z.ZodType<Geometry> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('Point'), coordinates: Coordinates1 }),
    z.object({ type: z.literal('MultiPoint'), coordinates: Coordinates2 }),
    z.object({ type: z.literal('LineString'), coordinates: Coordinates2 }),
    z.object({ type: z.literal('MultiLineString'), coordinates: Coordinates3 }),
    z.object({ type: z.literal('Polygon'), coordinates: Coordinates3 }),
    z.object({ type: z.literal('MultiPolygon'), coordinates: Coordinates4 }),
    z.object({ type: z.literal('GeometryCollection'), geometries: z.array(GeometrySchema) }),
  ])
);

const FeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: GeometrySchema.nullable().optional(),
  properties: z.record(z.unknown()).nullable().optional(),
});

const CrsMemberSchema = z.union([
  z.object({ type: z.literal('name'), properties: z.object({ name: z.string() }) }),
  z.object({ type: z.literal('EPSG'), properties: z.object({ code: z.union([z.number(), z.string()]) }) }),
]);

const CollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  name: z.string().optional(),
  crs: CrsMemberSchema.optional().catch(undefined),
  features: z.array(FeatureSchema),
});

const DocumentSchema = z.union([
  CollectionSchema,
  FeatureSchema.extend({ crs: CrsMemberSchema.optional().catch(undefined) }),
  GeometrySchema,
]);

type CrsMember = z.infer<typeof CrsMemberSchema>;

function crsReference(member: CrsMember | undefined): string | undefined {
  if (!member) return undefined;
  return member.type === 'name' ? member.properties.name : `EPSG:${member.properties.code}`;
}

function toRecord(properties: Record<string, unknown> | null | undefined): AttributeRecord {
  const record: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(properties ?? {})) {
    record[key] = toJsonValue(value);
  }
  return record;
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid document';
  const path = issue.path.length > 0 ? issue.path.join('.') : 'document';
  return `${path}: ${issue.message}`;
}

// ============================================================================
// Reader
// ============================================================================

export async function readGeoJson(input: DatasetInput): Promise<Layer> {
  const decoded = decodeText(input.bytes, input.encoding);

  let raw: unknown;
  try {
    raw = JSON.parse(decoded.text);
  } catch (error) {
    throw new MalformedDataError(`Invalid JSON in ${input.layerName}`, 'read', { cause: error });
  }

  const parsed = DocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedDataError(`Not a GeoJSON document (${describeIssue(parsed.error)})`);
  }

  const doc = parsed.data;
  let name = input.layerName;
  let embeddedCrs: string | undefined;
  let sourceFeatures: Array<{ geometry: Geometry | null; properties: Record<string, unknown> | null | undefined }>;

  if (doc.type === 'FeatureCollection') {
    name = doc.name ?? name;
    embeddedCrs = crsReference(doc.crs);
    sourceFeatures = doc.features.map((f) => ({ geometry: f.geometry ?? null, properties: f.properties }));
  } else if (doc.type === 'Feature') {
    embeddedCrs = crsReference(doc.crs);
    sourceFeatures = [{ geometry: doc.geometry ?? null, properties: doc.properties }];
  } else {
    sourceFeatures = [{ geometry: doc, properties: null }];
  }

  const { schema, records } = inferSchema(sourceFeatures.map((f) => toRecord(f.properties)));
  const features: LayerFeature[] = sourceFeatures.map((f, index) => ({
    index,
    geometry: f.geometry,
    attributes: records[index] ?? {},
  }));

  return {
    name,
    kind: deriveLayerKind(features),
    schema,
    features,
    source: {
      format: 'geojson',
      ...(embeddedCrs !== undefined ? { embeddedCrs } : {}),
      encoding: decoded.encoding,
      ...(decoded.fallbackFrom !== undefined ? { encodingFallback: decoded.encoding } : {}),
    },
  };
}

// ============================================================================
// Writer
// ============================================================================

function crsMemberFor(epsg: number): CrsMember {
  return epsg === 4326
    ? { type: 'name', properties: { name: 'urn:ogc:def:crs:OGC:1.3:CRS84' } }
    : { type: 'name', properties: { name: `urn:ogc:def:crs:EPSG::${epsg}` } };
}

/**
 * Serialize as a FeatureCollection, one feature per line
 */
export async function encodeGeoJson(request: EncodeRequest): Promise<Uint8Array> {
  const { layer, epsg } = request;
  const lines = layer.features.map((feature) => {
    const properties: JsonObject = Object.fromEntries(
      layer.schema.map((field) => [field.name, feature.attributes[field.name] ?? null])
    );
    return JSON.stringify({ type: 'Feature', properties, geometry: feature.geometry });
  });

  const head = JSON.stringify({ type: 'FeatureCollection', name: layer.name, crs: crsMemberFor(epsg) });
  // Splice the feature lines into the header object: {"type":...,"crs":{...}} → {...,"features":[...]}
  const text = `${head.slice(0, -1)},\n"features": [\n${lines.join(',\n')}\n]\n}\n`;
  return new TextEncoder().encode(text);
}
