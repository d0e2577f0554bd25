import { describe, expect, it } from 'vitest';

import {
  decodeBytes,
  detectSourceEncoding,
  normalizeEncoding,
  splitByteLines,
} from './encoding';
import { DecodingError } from './error';

const CAFE_LATIN1 = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);

function lines(text: string): Uint8Array[] {
  return splitByteLines(Buffer.from(text, 'latin1'));
}

describe('splitByteLines', () => {
  it('splits on every kind of line break', () => {
    const split = lines('a\r\nb\rc\nd');

    expect(split.map((line) => Buffer.from(line).toString())).toEqual([
      'a',
      'b',
      'c',
      'd',
    ]);
  });

  it('does not add an empty line after a trailing newline', () => {
    expect(lines('only\n')).toHaveLength(1);
  });
});

describe('detectSourceEncoding', () => {
  it('finds a declaration on the second line', () => {
    const source = '#!/usr/bin/env node\n// -*- coding: latin-1 -*-\n';

    expect(detectSourceEncoding(lines(source))).toBe('latin-1');
  });

  it('ignores declarations after the second line', () => {
    expect(detectSourceEncoding(lines('a\nb\n// coding: latin-1\n'))).toBe(
      'ascii',
    );
  });

  it('uses the given default', () => {
    expect(detectSourceEncoding(lines('const a = 1;\n'), 'utf-8')).toBe('utf-8');
  });
});

describe('normalizeEncoding', () => {
  it('resolves common aliases', () => {
    expect(normalizeEncoding('UTF_8')).toBe('utf-8');
    expect(normalizeEncoding('ISO-8859-1')).toBe('latin1');
    expect(normalizeEncoding('us-ascii')).toBe('ascii');
  });

  it('returns undefined for unknown encodings', () => {
    expect(normalizeEncoding('klingon')).toBeUndefined();
  });
});

describe('decodeBytes', () => {
  it('decodes latin-1', () => {
    expect(decodeBytes(CAFE_LATIN1, 'latin-1')).toBe('café');
  });

  it('replaces bytes that are not ascii', () => {
    expect(decodeBytes(CAFE_LATIN1, 'ascii')).toBe('caf\uFFFD');
  });

  it('throws DecodingError in strict mode', () => {
    let thrown: unknown;
    try {
      decodeBytes(CAFE_LATIN1, 'ascii', 'strict');
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(DecodingError);
    expect(thrown).toMatchObject({
      name: 'DecodingError',
      encoding: 'ascii',
      start: 3,
      end: 4,
      message: "'ascii' codec can't process position 3: ordinal not in range(128)",
    });
  });

  it('throws DecodingError for invalid utf-8 in strict mode', () => {
    expect(() => decodeBytes(CAFE_LATIN1, 'utf-8', 'strict')).toThrow(
      DecodingError,
    );
  });

  it('throws RangeError for unknown encodings', () => {
    expect(() => decodeBytes(CAFE_LATIN1, 'klingon')).toThrow(RangeError);
  });
});
