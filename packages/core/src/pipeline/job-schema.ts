/**
 * Job descriptor validation
 *
 * External collaborators send snake_case JSON:
 *
 * ```json
 * {
 *   "input_location": "/data/uploads/parcels.zip",
 *   "declared_format": "ESRI Shapefile",
 *   "source_epsg": 2154,
 *   "output_format": "GeoJSON",
 *   "target_epsg": 4326,
 *   "fix_geometries": true,
 *   "normalize_attributes": true,
 *   "encoding": "utf-8"
 * }
 * ```
 */

import { z } from 'zod';
import { MalformedDataError } from '../core/errors.js';
import type { JobSpec } from '../core/types.js';
import { canonicalEncoding } from '../formats/encoding.js';
import { resolveFormatId } from '../formats/format-registry.js';

const EpsgSchema = z.number().int().positive();

export const JobSpecSchema = z.object({
  input_location: z.string().min(1),
  declared_format: z.string().min(1).nullish(),
  source_epsg: EpsgSchema.nullish(),
  output_format: z.string().min(1),
  target_epsg: EpsgSchema.nullish(),
  fix_geometries: z.boolean().default(true),
  normalize_attributes: z.boolean().default(true),
  encoding: z.string().default('utf-8'),
});

export type JobSpecInput = z.input<typeof JobSpecSchema>;

/**
 * Validate a wire job descriptor
 *
 * @throws MalformedDataError (stage `job`) for schema violations and unknown encodings
 * @throws UnsupportedFormatError (stage `job`) for unknown format names
 */
export function parseJobSpec(raw: unknown): JobSpec {
  const result = JobSpecSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'job'}: ${i.message}`);
    throw new MalformedDataError(`Invalid job descriptor: ${issues.join('; ')}`, 'job');
  }

  const job = result.data;
  const encoding = canonicalEncoding(job.encoding);
  if (encoding === undefined) {
    throw new MalformedDataError(`Unsupported encoding '${job.encoding}' (use utf-8, latin1 or windows-1252)`, 'job');
  }

  const declaredFormat = job.declared_format ? resolveFormatId(job.declared_format, 'job') : undefined;
  return {
    inputLocation: job.input_location,
    ...(declaredFormat !== undefined ? { declaredFormat } : {}),
    ...(job.source_epsg != null ? { sourceEpsg: job.source_epsg } : {}),
    outputFormat: resolveFormatId(job.output_format, 'job'),
    ...(job.target_epsg != null ? { targetEpsg: job.target_epsg } : {}),
    fixGeometries: job.fix_geometries,
    normalizeAttributes: job.normalize_attributes,
    encoding,
  };
}
