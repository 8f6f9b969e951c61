/**
 * CRS Registry
 *
 * Coordinate reference systems the core can detect, transform between and
 * describe in output metadata. Definitions live in `data/crs-registry.json`
 * so new systems can be added without touching code.
 *
 * Each entry carries:
 * - a proj4 definition used by the reprojector
 * - names and aliases matched against `.prj` text
 * - ESRI WKT written beside Shapefile and GeoPackage output
 * - for projected systems, the bounds of their area of use (extent heuristic)
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ProjectionTransformError } from '../core/errors.js';

// ============================================================================
// Schema
// ============================================================================

const BoundsSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const CrsEntrySchema = z.object({
  epsg: z.number().int().positive(),
  name: z.string().min(1),
  geographic: z.boolean(),
  proj4: z.string().min(1),
  aliases: z.array(z.string()),
  wkt: z.string().min(1),
  bounds: BoundsSchema.nullable(),
});

const RegistryFileSchema = z.object({
  version: z.literal(1),
  crs: z.array(CrsEntrySchema).min(1),
});

export type CrsDefinition = Readonly<z.infer<typeof CrsEntrySchema>>;

// ============================================================================
// Registry
// ============================================================================

/**
 * Collapse a CRS name for comparison: `RGF93 / Lambert-93` → `rgf93_lambert_93`
 */
export function canonicalCrsName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export class CrsRegistry {
  private readonly byEpsg = new Map<number, CrsDefinition>();
  private readonly byName = new Map<string, CrsDefinition>();

  constructor(readonly definitions: readonly CrsDefinition[]) {
    for (const definition of definitions) {
      if (this.byEpsg.has(definition.epsg)) {
        throw new Error(`Duplicate CRS registry entry: EPSG:${definition.epsg}`);
      }
      this.byEpsg.set(definition.epsg, definition);
      for (const name of [definition.name, ...definition.aliases]) {
        const key = canonicalCrsName(name);
        // First registration wins so list order decides ambiguous aliases
        if (!this.byName.has(key)) this.byName.set(key, definition);
      }
    }
  }

  has(epsg: number): boolean {
    return this.byEpsg.has(epsg);
  }

  get(epsg: number): CrsDefinition | undefined {
    return this.byEpsg.get(epsg);
  }

  /**
   * @throws ProjectionTransformError for codes the registry does not know
   */
  require(epsg: number): CrsDefinition {
    const definition = this.byEpsg.get(epsg);
    if (!definition) {
      throw new ProjectionTransformError(`Unknown CRS EPSG:${epsg}`);
    }
    return definition;
  }

  /**
   * Match a CRS name as written in WKT (`PROJCS["..."]`) to a registry entry
   */
  findByName(name: string): CrsDefinition | undefined {
    return this.byName.get(canonicalCrsName(name));
  }

  /**
   * Projected systems with a known area of use, in registry order
   */
  projectedWithBounds(): ReadonlyArray<CrsDefinition & { readonly bounds: readonly [number, number, number, number] }> {
    const result: Array<CrsDefinition & { readonly bounds: readonly [number, number, number, number] }> = [];
    for (const definition of this.definitions) {
      const { bounds } = definition;
      if (!definition.geographic && bounds !== null) {
        result.push({ ...definition, bounds });
      }
    }
    return result;
  }
}

/**
 * Parse and validate registry JSON
 *
 * @throws Error naming the first schema violation
 */
export function parseCrsRegistry(raw: unknown): CrsRegistry {
  const result = RegistryFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : 'registry';
    throw new Error(`Invalid CRS registry at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return new CrsRegistry(result.data.crs);
}

let defaultRegistry: CrsRegistry | undefined;

/**
 * Registry bundled with the package, loaded on first use
 */
export function getCrsRegistry(): CrsRegistry {
  if (!defaultRegistry) {
    const file = new URL('../../data/crs-registry.json', import.meta.url);
    const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    defaultRegistry = parseCrsRegistry(raw);
  }
  return defaultRegistry;
}
