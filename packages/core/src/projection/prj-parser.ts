/**
 * Projection definition parsing
 *
 * Resolves the text of a `.prj` sidecar (ESRI WKT, OGC WKT1 or WKT2) or an
 * embedded CRS reference (`EPSG:2154`, `urn:ogc:def:crs:EPSG::2154`,
 * `OGC:CRS84`) to an EPSG code.
 */

import type { CrsRegistry } from './crs-registry.js';

// ============================================================================
// WKT tree
// ============================================================================

export type WktValue = string | number | WktNode;

export interface WktNode {
  readonly keyword: string;
  readonly args: readonly WktValue[];
}

class WktReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): WktNode {
    const node = this.node();
    this.skipSpace();
    if (this.pos !== this.text.length) {
      throw new Error(`Unexpected content after WKT at offset ${this.pos}`);
    }
    return node;
  }

  private node(): WktNode {
    this.skipSpace();
    const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.text.slice(this.pos));
    if (!match) {
      throw new Error(`Expected WKT keyword at offset ${this.pos}`);
    }
    const keyword = match[0].toUpperCase();
    this.pos += match[0].length;
    this.skipSpace();

    const open = this.text[this.pos];
    if (open !== '[' && open !== '(') {
      // Bare enumeration value such as `EAST` or `NORTH`
      return { keyword, args: [] };
    }
    const close = open === '[' ? ']' : ')';
    this.pos++;

    const args: WktValue[] = [];
    for (;;) {
      this.skipSpace();
      const ch = this.text[this.pos];
      if (ch === undefined) throw new Error('Unterminated WKT node');
      if (ch === close) {
        this.pos++;
        return { keyword, args };
      }
      if (args.length > 0) {
        if (ch !== ',') throw new Error(`Expected ',' at offset ${this.pos}`);
        this.pos++;
        this.skipSpace();
      }
      args.push(this.value());
    }
  }

  private value(): WktValue {
    const ch = this.text[this.pos];
    if (ch === '"') return this.quoted();
    const number = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?/.exec(this.text.slice(this.pos));
    if (number) {
      this.pos += number[0].length;
      return Number(number[0]);
    }
    return this.node();
  }

  private quoted(): string {
    let out = '';
    this.pos++;
    for (;;) {
      const ch = this.text[this.pos];
      if (ch === undefined) throw new Error('Unterminated WKT string');
      this.pos++;
      if (ch === '"') {
        // "" is an escaped quote
        if (this.text[this.pos] === '"') {
          out += '"';
          this.pos++;
          continue;
        }
        return out;
      }
      out += ch;
    }
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }
}

/**
 * Parse WKT into a keyword tree
 *
 * @throws Error on malformed input
 */
export function parseWkt(text: string): WktNode {
  return new WktReader(text.replace(/^\uFEFF/, '').trim()).parse();
}

// ============================================================================
// Resolution
// ============================================================================

const CRS_KEYWORDS = new Set([
  'PROJCS',
  'GEOGCS',
  'GEOCCS',
  'PROJCRS',
  'GEOGCRS',
  'GEODCRS',
  'BASEGEOGCRS',
  'COMPD_CS',
  'COMPOUNDCRS',
]);

function authorityCode(node: WktNode): number | undefined {
  for (const arg of node.args) {
    if (typeof arg === 'string' || typeof arg === 'number') continue;
    if (arg.keyword !== 'AUTHORITY' && arg.keyword !== 'ID') continue;
    const [authority, code] = arg.args;
    if (typeof authority !== 'string' || authority.toUpperCase() !== 'EPSG') continue;
    const parsed = typeof code === 'number' ? code : typeof code === 'string' ? Number(code) : NaN;
    if (Number.isInteger(parsed) && parsed > 0) return parsed;
  }
  return undefined;
}

function crsName(node: WktNode): string | undefined {
  const [first] = node.args;
  return typeof first === 'string' ? first : undefined;
}

/**
 * Resolve a parsed WKT tree: the outermost EPSG authority wins, then the
 * outermost CRS name known to the registry
 */
export function resolveWktNode(root: WktNode, registry: CrsRegistry): number | undefined {
  if (!CRS_KEYWORDS.has(root.keyword)) return undefined;

  const code = authorityCode(root);
  if (code !== undefined) return code;

  const name = crsName(root);
  if (name !== undefined) {
    const match = registry.findByName(name);
    if (match) return match.epsg;
  }

  // A bare geographic CRS is sometimes wrapped in COMPD_CS with a vertical part
  if (root.keyword === 'COMPD_CS' || root.keyword === 'COMPOUNDCRS') {
    for (const arg of root.args) {
      if (typeof arg === 'object') {
        const inner = resolveWktNode(arg, registry);
        if (inner !== undefined) return inner;
      }
    }
  }
  return undefined;
}

const EPSG_REFERENCE = [
  /^EPSG:{1,2}(\d+)$/i,
  /^urn:ogc:def:crs:EPSG:[^:]*:(\d+)$/i,
  /^https?:\/\/www\.opengis\.net\/def\/crs\/EPSG\/[^/]+\/(\d+)$/i,
];

const CRS84_REFERENCE = [/^(OGC:)?CRS:?84$/i, /^urn:ogc:def:crs:OGC:[^:]*:CRS84$/i];

/**
 * Resolve a short CRS reference such as `EPSG:2154` or a CRS84 URN
 */
export function resolveCrsReference(reference: string): number | undefined {
  const trimmed = reference.trim();
  for (const pattern of EPSG_REFERENCE) {
    const match = pattern.exec(trimmed);
    if (match?.[1]) return Number(match[1]);
  }
  if (CRS84_REFERENCE.some((pattern) => pattern.test(trimmed))) return 4326;
  return undefined;
}

/**
 * Resolve projection text of any supported flavor to an EPSG code
 *
 * Returns undefined when the text is unparseable or names an unknown CRS.
 */
export function resolveProjectionText(text: string, registry: CrsRegistry): number | undefined {
  const reference = resolveCrsReference(text);
  if (reference !== undefined) return reference;

  try {
    return resolveWktNode(parseWkt(text), registry);
  } catch {
    return undefined;
  }
}
