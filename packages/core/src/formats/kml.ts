/**
 * KML codec (fast-xml-parser)
 *
 * Placemarks are collected from the whole document tree, Folders included.
 * `name`, `description` and ExtendedData values become text attributes;
 * the attribute normalizer infers numeric and date types afterwards.
 *
 * KML coordinates are always WGS 84 longitude/latitude[/altitude].
 */

import type { Geometry, Position } from 'geojson';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedDataError } from '../core/errors.js';
import { deriveLayerKind } from '../core/geo-utils.js';
import type { AttributeValue, Layer, LayerFeature } from '../core/types.js';
import { decodeText } from './encoding.js';
import { asText, inferSchema } from './schema-inference.js';
import type { DatasetInput, EncodeRequest } from './types.js';

const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  suppressEmptyNode: true,
});

// ============================================================================
// Tree helpers
// ============================================================================

type XmlNode = Readonly<Record<string, unknown>>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Child elements named `key`, whether the parser produced one or many
 */
function children(node: XmlNode, key: string): unknown[] {
  const value = node[key];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function childNodes(node: XmlNode, key: string): XmlNode[] {
  return children(node, key).filter(isNode);
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  return undefined;
}

// ============================================================================
// Reader
// ============================================================================

const CONTAINERS = ['Document', 'Folder'] as const;

function collectPlacemarks(node: XmlNode, out: XmlNode[]): void {
  out.push(...childNodes(node, 'Placemark'));
  for (const container of CONTAINERS) {
    for (const child of childNodes(node, container)) collectPlacemarks(child, out);
  }
}

function parseCoordinates(text: string | undefined, featureIndex: number): Position[] {
  if (text === undefined) return [];
  return text
    .split(/\s+/)
    .filter((tuple) => tuple !== '')
    .map((tuple) => {
      const values = tuple.split(',').map((part) => Number(part));
      if (values.length < 2 || values.some((v) => !Number.isFinite(v))) {
        throw new MalformedDataError(`Invalid KML coordinate tuple '${tuple}'`, 'read', { featureIndex });
      }
      return values.slice(0, 3);
    });
}

function ringOf(boundary: XmlNode, featureIndex: number): Position[] {
  const [ring] = childNodes(boundary, 'LinearRing');
  return ring ? parseCoordinates(textOf(ring['coordinates']), featureIndex) : [];
}

function polygonRings(node: XmlNode, featureIndex: number): Position[][] {
  const outer = childNodes(node, 'outerBoundaryIs').map((b) => ringOf(b, featureIndex));
  const inner = childNodes(node, 'innerBoundaryIs').map((b) => ringOf(b, featureIndex));
  return [...outer, ...inner];
}

/**
 * Geometries directly under `node`, in the order points, lines, polygons, collections
 */
function geometriesIn(node: XmlNode, featureIndex: number): Geometry[] {
  const geometries: Geometry[] = [];
  for (const point of childNodes(node, 'Point')) {
    const [coordinates] = parseCoordinates(textOf(point['coordinates']), featureIndex);
    geometries.push({ type: 'Point', coordinates: coordinates ?? [] });
  }
  for (const line of childNodes(node, 'LineString')) {
    geometries.push({ type: 'LineString', coordinates: parseCoordinates(textOf(line['coordinates']), featureIndex) });
  }
  for (const polygon of childNodes(node, 'Polygon')) {
    geometries.push({ type: 'Polygon', coordinates: polygonRings(polygon, featureIndex) });
  }
  for (const multi of childNodes(node, 'MultiGeometry')) {
    geometries.push(combine(geometriesIn(multi, featureIndex)));
  }
  return geometries;
}

/**
 * Merge MultiGeometry members into a Multi* geometry when they share a type
 */
function combine(members: Geometry[]): Geometry {
  const types = new Set(members.map((m) => m.type));
  const [only] = types;
  if (types.size === 1 && only === 'Point') {
    return {
      type: 'MultiPoint',
      coordinates: members.flatMap((m) => (m.type === 'Point' && m.coordinates.length > 0 ? [m.coordinates] : [])),
    };
  }
  if (types.size === 1 && only === 'LineString') {
    return { type: 'MultiLineString', coordinates: members.flatMap((m) => (m.type === 'LineString' ? [m.coordinates] : [])) };
  }
  if (types.size === 1 && only === 'Polygon') {
    return { type: 'MultiPolygon', coordinates: members.flatMap((m) => (m.type === 'Polygon' ? [m.coordinates] : [])) };
  }
  return { type: 'GeometryCollection', geometries: members };
}

function placemarkAttributes(placemark: XmlNode): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = {};
  const name = textOf(placemark['name']);
  const description = textOf(placemark['description']);
  if (name !== undefined) attributes['name'] = name;
  if (description !== undefined) attributes['description'] = description;

  for (const extended of childNodes(placemark, 'ExtendedData')) {
    for (const data of childNodes(extended, 'Data')) {
      const key = textOf(data['@_name']);
      if (key !== undefined) attributes[key] = textOf(data['value']) ?? null;
    }
    for (const schemaData of childNodes(extended, 'SchemaData')) {
      for (const simple of children(schemaData, 'SimpleData')) {
        const key = isNode(simple) ? textOf(simple['@_name']) : undefined;
        if (key !== undefined) attributes[key] = textOf(simple) ?? null;
      }
    }
  }
  return attributes;
}

export async function readKml(input: DatasetInput): Promise<Layer> {
  const decoded = decodeText(input.bytes, input.encoding);
  const validation = XMLValidator.validate(decoded.text);
  if (validation !== true) {
    throw new MalformedDataError(`Invalid XML at line ${validation.err.line}: ${validation.err.msg}`);
  }

  const document: unknown = parser.parse(decoded.text);
  const root = isNode(document) ? document['kml'] : undefined;
  if (!isNode(root)) {
    throw new MalformedDataError('Document has no <kml> root element');
  }

  const placemarks: XmlNode[] = [];
  collectPlacemarks(root, placemarks);

  const geometries = placemarks.map((placemark, index) => {
    const [geometry] = geometriesIn(placemark, index);
    return geometry ?? null;
  });
  const { schema, records } = inferSchema(placemarks.map(placemarkAttributes));

  const features: LayerFeature[] = placemarks.map((_, index) => ({
    index,
    geometry: geometries[index] ?? null,
    attributes: records[index] ?? {},
  }));

  const [kmlDocument] = childNodes(root, 'Document');
  const documentName = kmlDocument ? textOf(kmlDocument['name']) : undefined;

  return {
    name: documentName ?? input.layerName,
    kind: deriveLayerKind(features),
    schema,
    features,
    source: {
      format: 'kml',
      embeddedCrs: 'EPSG:4326',
      encoding: decoded.encoding,
      ...(decoded.fallbackFrom !== undefined ? { encodingFallback: decoded.encoding } : {}),
    },
  };
}

// ============================================================================
// Writer
// ============================================================================

function coordinatesText(positions: readonly Position[]): string {
  return positions.map((p) => p.join(',')).join(' ');
}

function polygonNode(rings: readonly Position[][]): XmlNode {
  const [outer = [], ...inner] = rings;
  return {
    outerBoundaryIs: { LinearRing: { coordinates: coordinatesText(outer) } },
    ...(inner.length > 0
      ? { innerBoundaryIs: inner.map((ring) => ({ LinearRing: { coordinates: coordinatesText(ring) } })) }
      : {}),
  };
}

function geometryNode(geometry: Geometry): XmlNode {
  switch (geometry.type) {
    case 'Point':
      return { Point: { coordinates: coordinatesText([geometry.coordinates]) } };
    case 'LineString':
      return { LineString: { coordinates: coordinatesText(geometry.coordinates) } };
    case 'Polygon':
      return { Polygon: polygonNode(geometry.coordinates) };
    case 'MultiPoint':
      return { MultiGeometry: { Point: geometry.coordinates.map((c) => ({ coordinates: coordinatesText([c]) })) } };
    case 'MultiLineString':
      return { MultiGeometry: { LineString: geometry.coordinates.map((c) => ({ coordinates: coordinatesText(c) })) } };
    case 'MultiPolygon':
      return { MultiGeometry: { Polygon: geometry.coordinates.map(polygonNode) } };
    case 'GeometryCollection': {
      const grouped: Record<string, unknown[]> = {};
      for (const member of geometry.geometries) {
        for (const [key, value] of Object.entries(geometryNode(member))) {
          (grouped[key] ??= []).push(value);
        }
      }
      return { MultiGeometry: grouped };
    }
  }
}

/**
 * Serialize as a KML 2.2 Document, one Placemark per feature
 *
 * Text fields named `name` and `description` map to the Placemark elements
 * of the same name; other fields go to ExtendedData.
 */
export async function encodeKml(request: EncodeRequest): Promise<Uint8Array> {
  const { layer } = request;
  const placemarks = layer.features.map((feature) => {
    const placemark: Record<string, unknown> = {};
    const data: XmlNode[] = [];
    for (const field of layer.schema) {
      const text = asText(feature.attributes[field.name] ?? null);
      if (text === null) continue;
      if (field.name === 'name' || field.name === 'description') {
        placemark[field.name] = text;
      } else {
        data.push({ '@_name': field.name, value: text });
      }
    }
    if (data.length > 0) placemark['ExtendedData'] = { Data: data };
    return feature.geometry ? { ...placemark, ...geometryNode(feature.geometry) } : placemark;
  });

  const xml: unknown = builder.build({
    kml: {
      '@_xmlns': KML_NAMESPACE,
      Document: { name: layer.name, Placemark: placemarks },
    },
  });
  if (typeof xml !== 'string') {
    throw new MalformedDataError('KML builder produced no text', 'write');
  }
  return new TextEncoder().encode(`<?xml version="1.0" encoding="UTF-8"?>\n${xml}`);
}
