/**
 * Contracts between the format reader/writer and the per-container codecs
 */

import type { FormatId, Layer } from '../core/types.js';
import type { CrsDefinition } from '../projection/crs-registry.js';
import type { TextEncodingName } from './encoding.js';

export type CompanionExtension = '.dbf' | '.shx' | '.prj' | '.cpg';

/**
 * A located dataset, ready to parse
 */
export interface DatasetInput {
  readonly format: FormatId;
  /** Absolute path of the main file (on disk, possibly in scratch) */
  readonly path: string;
  readonly bytes: Uint8Array;
  /** Base name of the main file without extension */
  readonly layerName: string;
  /** Sidecar files sharing the main file's base name */
  readonly companions: Readonly<Partial<Record<CompanionExtension, Uint8Array>>>;
  readonly encoding: TextEncodingName;
}

export type DatasetReader = (input: DatasetInput) => Promise<Layer>;

/**
 * Everything a codec needs to serialize a layer whose field names and
 * values already fit the container
 */
export interface EncodeRequest {
  readonly layer: Layer;
  readonly epsg: number;
  /** Registry entry of `epsg`, when known */
  readonly crs?: CrsDefinition;
  readonly encoding: TextEncodingName;
}

export type DatasetEncoder = (request: EncodeRequest) => Promise<Uint8Array>;
