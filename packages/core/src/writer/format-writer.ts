/**
 * Format Writer
 *
 * Checks a layer against the target container's capabilities, fits field
 * names and types to what the container can hold, then hands the layer to
 * the container's codec. Nothing is encoded until every check has passed.
 */

import { WriteCapabilityError } from '../core/errors.js';
import { geometryKindsPresent, refreshLayerKind } from '../core/geo-utils.js';
import type { AttributeValue, FieldDefinition, FieldType, FormatId, Layer, LayerFeature } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { fitFieldNames } from '../attributes/field-names.js';
import { encodeCsv } from '../formats/csv.js';
import type { TextEncodingName } from '../formats/encoding.js';
import { getFormat, type FormatCapabilities } from '../formats/format-registry.js';
import { encodeGeoJson } from '../formats/geojson.js';
import { encodeGeoPackage } from '../formats/gpkg.js';
import { encodeKml } from '../formats/kml.js';
import { asText } from '../formats/schema-inference.js';
import { encodeShapefile } from '../formats/shapefile.js';
import type { DatasetEncoder } from '../formats/types.js';
import { getCrsRegistry, type CrsRegistry } from '../projection/crs-registry.js';

const log = createLogger({ module: 'format-writer' });

const ENCODERS: Readonly<Record<FormatId, DatasetEncoder>> = {
  geojson: encodeGeoJson,
  shapefile: encodeShapefile,
  gpkg: encodeGeoPackage,
  kml: encodeKml,
  csv: encodeCsv,
};

export interface WriteRequest {
  readonly layer: Layer;
  readonly format: FormatId;
  /** CRS of the layer's coordinates */
  readonly epsg: number;
  readonly encoding: TextEncodingName;
  /** Refuse text fallback for field types the container cannot hold natively */
  readonly strictFieldTypes: boolean;
  readonly registry?: CrsRegistry;
}

export interface TextFallback {
  readonly field: string;
  readonly from: FieldType;
}

export interface WriteResult {
  readonly bytes: Uint8Array;
  readonly format: FormatId;
  readonly extension: string;
  readonly mediaType: string;
  /** Encoding of the text in `bytes` */
  readonly encoding: TextEncodingName;
  /** The layer as written (fitted names and types) */
  readonly layer: Layer;
  /** Field names changed to fit the container: original → written */
  readonly renamedFields: Readonly<Record<string, string>>;
  readonly textFallbacks: readonly TextFallback[];
}

// ============================================================================
// Branch merge
// ============================================================================

/**
 * Combine the geometry branch (cleaned, reprojected) with the attribute
 * branch (normalized) of the same source layer
 *
 * Features are matched by source index; features the geometry branch
 * dropped stay dropped. The layer kind follows the geometries that remain.
 */
export function mergeBranches(geometryLayer: Layer, attributeLayer: Layer): Layer {
  const attributesByIndex = new Map(attributeLayer.features.map((f) => [f.index, f.attributes]));
  const features = geometryLayer.features.map((f) => ({ ...f, attributes: attributesByIndex.get(f.index) ?? {} }));
  return {
    ...geometryLayer,
    kind: refreshLayerKind(features, geometryLayer.kind),
    schema: attributeLayer.schema,
    features,
  };
}

// ============================================================================
// Capability checks
// ============================================================================

function assertGeometryKinds(layer: Layer, caps: FormatCapabilities): void {
  const kinds = geometryKindsPresent(layer.features);
  const unsupported = [...kinds].filter((kind) => !caps.geometryKinds.has(kind));
  if (unsupported.length > 0) {
    throw new WriteCapabilityError(`${caps.label} cannot hold ${unsupported.sort().join(', ')} geometries`);
  }
  if (caps.singleGeometryKind && kinds.size > 1) {
    throw new WriteCapabilityError(
      `${caps.label} holds a single geometry kind; layer has ${[...kinds].sort().join(', ')}`
    );
  }
}

interface FittedSchema {
  readonly schema: FieldDefinition[];
  readonly renamed: Record<string, string>;
  readonly textFallbacks: TextFallback[];
}

function fitSchema(layer: Layer, caps: FormatCapabilities, strictFieldTypes: boolean): FittedSchema {
  const textFallbacks: TextFallback[] = [];
  for (const field of layer.schema) {
    const encoding = caps.fieldTypes[field.type];
    if (encoding === 'unsupported' || (encoding === 'text' && strictFieldTypes)) {
      throw new WriteCapabilityError(`${caps.label} has no native type for field '${field.name}' (${field.type})`);
    }
    if (encoding === 'text') textFallbacks.push({ field: field.name, from: field.type });
  }

  const names = fitFieldNames(
    layer.schema.map((f) => f.name),
    {
      maxLength: caps.maxFieldNameLength,
      asciiOnly: caps.asciiFieldNames,
      caseInsensitive: caps.caseInsensitiveFieldNames,
      reserved: caps.reservedFieldNames,
    }
  );

  const renamed: Record<string, string> = {};
  const fallbackFields = new Set(textFallbacks.map((t) => t.field));
  const schema = layer.schema.map((field, i): FieldDefinition => {
    const name = names[i] ?? field.name;
    if (name !== field.name) renamed[field.name] = name;
    return { name, type: fallbackFields.has(field.name) ? 'text' : field.type };
  });

  return { schema, renamed, textFallbacks };
}

function fitFeatures(layer: Layer, schema: readonly FieldDefinition[], fallbackFields: ReadonlySet<string>): LayerFeature[] {
  return layer.features.map((feature) => {
    const attributes: Record<string, AttributeValue> = {};
    layer.schema.forEach((field, i) => {
      const target = schema[i];
      if (!target) return;
      const value = feature.attributes[field.name] ?? null;
      attributes[target.name] = fallbackFields.has(field.name) ? asText(value) : value;
    });
    return { ...feature, attributes };
  });
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Serialize `layer` into the target container
 *
 * @throws WriteCapabilityError when the container cannot represent the layer
 */
export async function writeLayer(request: WriteRequest): Promise<WriteResult> {
  const { layer, format, epsg, strictFieldTypes } = request;
  const caps = getFormat(format);
  const registry = request.registry ?? getCrsRegistry();

  if (caps.requiredEpsg !== undefined && epsg !== caps.requiredEpsg) {
    throw new WriteCapabilityError(`${caps.label} requires EPSG:${caps.requiredEpsg}, layer is in EPSG:${epsg}`);
  }
  assertGeometryKinds(layer, caps);

  const { schema, renamed, textFallbacks } = fitSchema(layer, caps, strictFieldTypes);
  const fitted: Layer = {
    ...layer,
    schema,
    features: fitFeatures(layer, schema, new Set(textFallbacks.map((t) => t.field))),
  };

  const encoding: TextEncodingName = caps.honorsEncoding ? request.encoding : 'utf-8';
  const crs = registry.get(epsg);
  const bytes = await ENCODERS[format]({ layer: fitted, epsg, encoding, ...(crs ? { crs } : {}) });

  if (Object.keys(renamed).length > 0 || textFallbacks.length > 0) {
    log.info('Fields fitted to container', { format, renamed, textFallbacks: textFallbacks.map((t) => t.field) });
  }
  log.info('Layer encoded', { format, features: fitted.features.length, bytes: bytes.byteLength, encoding });

  return {
    bytes,
    format,
    extension: caps.outputExtension,
    mediaType: caps.mediaType,
    encoding,
    layer: fitted,
    renamedFields: renamed,
    textFallbacks,
  };
}
