/**
 * Text encodings
 *
 * The core reads and writes UTF-8, latin1 (ISO-8859-1) and windows-1252, the
 * code page most `.cpg` files name. windows-1252 differs from latin1 only in
 * 0x80-0x9F, where it holds printable characters (€, curly quotes, œ, ...)
 * instead of C1 controls. UTF-8 input that does not decode cleanly is re-read
 * as latin1, the usual encoding of legacy DBF and CSV exports.
 */

export type TextEncodingName = 'utf-8' | 'latin1' | 'windows-1252';

const LABELS: Record<string, TextEncodingName> = {
  'utf-8': 'utf-8',
  utf8: 'utf-8',
  '65001': 'utf-8',
  ascii: 'utf-8',
  'us-ascii': 'utf-8',
  latin1: 'latin1',
  'latin-1': 'latin1',
  'iso-8859-1': 'latin1',
  'iso8859-1': 'latin1',
  iso88591: 'latin1',
  '88591': 'latin1',
  'windows-1252': 'windows-1252',
  cp1252: 'windows-1252',
  '1252': 'windows-1252',
  'ansi 1252': 'windows-1252',
};

const CP1252_DECODER = new TextDecoder('windows-1252');

// Character → byte for 0x80-0x9F; the five unassigned bytes map to their C1 control
const CP1252_HIGH: ReadonlyMap<string, number> = new Map(
  [...CP1252_DECODER.decode(Uint8Array.from({ length: 32 }, (_, i) => 0x80 + i))].map((ch, i) => [ch, 0x80 + i])
);

/**
 * Single byte of `ch` in a one-byte encoding, or undefined
 */
function singleByte(ch: string, encoding: 'latin1' | 'windows-1252'): number | undefined {
  const code = ch.codePointAt(0) ?? 0;
  if (encoding === 'latin1') return code <= 0xff ? code : undefined;
  if (code < 0x80 || (code >= 0xa0 && code <= 0xff)) return code;
  return CP1252_HIGH.get(ch);
}

/**
 * Map an encoding label (job option or `.cpg` content) to a supported encoding
 */
export function canonicalEncoding(label: string): TextEncodingName | undefined {
  return LABELS[label.trim().toLowerCase()];
}

export interface DecodedText {
  readonly text: string;
  readonly encoding: TextEncodingName;
  /** Set when `encoding` differs from the one requested */
  readonly fallbackFrom?: TextEncodingName;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function isValidUtf8(bytes: Uint8Array): boolean {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return true;
  } catch {
    return false;
  }
}

/**
 * Decode bytes, falling back from UTF-8 to latin1 when needed
 */
export function decodeText(bytes: Uint8Array, encoding: TextEncodingName): DecodedText {
  if (encoding === 'latin1') {
    return { text: toBuffer(bytes).toString('latin1'), encoding };
  }
  if (encoding === 'windows-1252') {
    return { text: CP1252_DECODER.decode(bytes), encoding };
  }
  try {
    const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(bytes);
    return { text, encoding };
  } catch {
    return { text: toBuffer(bytes).toString('latin1'), encoding: 'latin1', fallbackFrom: 'utf-8' };
  }
}

/**
 * Encode text, or return undefined when a character has no representation
 */
export function encodeText(text: string, encoding: TextEncodingName): Uint8Array | undefined {
  if (encoding === 'utf-8') {
    return new TextEncoder().encode(text);
  }
  const out = new Uint8Array(text.length);
  let length = 0;
  for (const ch of text) {
    const byte = singleByte(ch, encoding);
    if (byte === undefined) return undefined;
    out[length++] = byte;
  }
  return out.subarray(0, length);
}

/**
 * First character outside the encoding, for error messages
 */
export function firstUnencodable(text: string, encoding: TextEncodingName): string | undefined {
  if (encoding === 'utf-8') return undefined;
  for (const ch of text) {
    if (singleByte(ch, encoding) === undefined) return ch;
  }
  return undefined;
}
