import { describe, expect, it } from 'vitest';

import { escapeHtml, isMatchingPattern, safeJoin, splitLines } from './string';

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#x27;s&lt;/a&gt;',
    );
  });
});

describe('splitLines', () => {
  it('drops the trailing empty line', () => {
    expect(splitLines('a\r\nb\rc\n')).toEqual(['a', 'b', 'c']);
  });

  it('returns no lines for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });
});

describe('isMatchingPattern', () => {
  it('matches substrings unless an exact match is required', () => {
    expect(isMatchingPattern('Parser.parse', 'parse')).toBe(true);
    expect(isMatchingPattern('Parser.parse', 'parse', true)).toBe(false);
    expect(isMatchingPattern('parse', 'parse', true)).toBe(true);
  });

  it('matches regular expressions', () => {
    expect(isMatchingPattern('loadConfig', /^load/)).toBe(true);
    expect(isMatchingPattern('readConfig', /^load/)).toBe(false);
  });
});

describe('safeJoin', () => {
  it('joins values of any type', () => {
    expect(safeJoin(['failed:', 42, null], ' ')).toBe('failed: 42 null');
  });

  it('survives values that cannot be converted to strings', () => {
    const hostile = {
      toString(): string {
        throw new Error('no');
      },
    };

    expect(safeJoin(['value', hostile], ' ')).toBe(
      "value { toString: [Function: toString] }",
    );
  });
});
