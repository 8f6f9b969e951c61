/**
 * Text encodings
 */

import { describe, it, expect } from 'vitest';
import { canonicalEncoding, decodeText, encodeText, firstUnencodable } from '../../../formats/encoding.js';

describe('canonicalEncoding', () => {
  it('maps job and code page labels', () => {
    expect(canonicalEncoding('UTF8')).toBe('utf-8');
    expect(canonicalEncoding(' ISO-8859-1 ')).toBe('latin1');
    expect(canonicalEncoding('ANSI 1252')).toBe('windows-1252');
    expect(canonicalEncoding('1252')).toBe('windows-1252');
    expect(canonicalEncoding('CP1252')).toBe('windows-1252');
    expect(canonicalEncoding('shift_jis')).toBeUndefined();
  });
});

describe('decodeText', () => {
  it('decodes valid UTF-8 as requested', () => {
    const bytes = new TextEncoder().encode('Créteil');
    expect(decodeText(bytes, 'utf-8')).toEqual({ text: 'Créteil', encoding: 'utf-8' });
  });

  it('falls back to latin1 for invalid UTF-8', () => {
    const bytes = Uint8Array.from([0x43, 0x72, 0xe9, 0x74, 0x65, 0x69, 0x6c]);
    expect(decodeText(bytes, 'utf-8')).toEqual({ text: 'Créteil', encoding: 'latin1', fallbackFrom: 'utf-8' });
  });

  it('decodes latin1 without a fallback', () => {
    expect(decodeText(Uint8Array.from([0xe9]), 'latin1')).toEqual({ text: 'é', encoding: 'latin1' });
  });

  it('decodes the windows-1252 printable range', () => {
    expect(decodeText(Uint8Array.from([0x31, 0x30, 0x80]), 'windows-1252')).toEqual({
      text: '10€',
      encoding: 'windows-1252',
    });
    expect(decodeText(Uint8Array.from([0x93, 0x9c, 0x94, 0xe9]), 'windows-1252').text).toBe('“œ”é');
  });
});

describe('encodeText', () => {
  it('encodes latin1 one byte per character', () => {
    expect(Array.from(encodeText('é', 'latin1') ?? [])).toEqual([0xe9]);
    expect(Array.from(encodeText('é', 'utf-8') ?? [])).toEqual([0xc3, 0xa9]);
  });

  it('encodes windows-1252 characters to their code page bytes', () => {
    expect(Array.from(encodeText('10€ “œ”é', 'windows-1252') ?? [])).toEqual([
      0x31, 0x30, 0x80, 0x20, 0x93, 0x9c, 0x94, 0xe9,
    ]);
    expect(encodeText('Łódź', 'windows-1252')).toBeUndefined();
    expect(firstUnencodable('10€', 'windows-1252')).toBeUndefined();
    expect(firstUnencodable('10€', 'latin1')).toBe('€');
  });

  it('refuses characters outside latin1', () => {
    expect(encodeText('Łódź', 'latin1')).toBeUndefined();
    expect(firstUnencodable('Łódź', 'latin1')).toBe('Ł');
    expect(firstUnencodable('Łódź', 'utf-8')).toBeUndefined();
  });
});
