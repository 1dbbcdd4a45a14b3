/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  countOccurrences,
  findAll,
  findText,
  replaceAll,
  replaceAt,
} from './textSearch.js';

describe('textSearch', () => {
  const lines = ['foo bar', 'baz foo', 'qux'];

  describe('findText', () => {
    it('returns null for an empty search string', () => {
      expect(findText(lines, '', { row: 0, col: 0 })).toBeNull();
    });

    it('returns null when the text is absent from every line', () => {
      expect(findText(lines, 'zzz', { row: 1, col: 2 })).toBeNull();
    });

    it('matches at the starting position itself', () => {
      expect(findText(lines, 'foo', { row: 0, col: 0 })).toEqual({
        row: 0,
        col: 0,
      });
    });

    it('scans forward onto later lines', () => {
      expect(findText(lines, 'foo', { row: 0, col: 1 })).toEqual({
        row: 1,
        col: 4,
      });
    });

    it('wraps to the first occurrence after the last one', () => {
      expect(findText(lines, 'foo', { row: 1, col: 5 })).toEqual({
        row: 0,
        col: 0,
      });
    });

    it('wraps onto the starting line before the starting column', () => {
      expect(findText(['ab ab'], 'ab', { row: 0, col: 4 })).toEqual({
        row: 0,
        col: 0,
      });
    });

    it('is case-sensitive and literal', () => {
      expect(findText(['Foo a.b'], 'foo', { row: 0, col: 0 })).toBeNull();
      expect(findText(['axb a.b'], 'a.b', { row: 0, col: 0 })).toEqual({
        row: 0,
        col: 4,
      });
    });

    it('reports columns in code points', () => {
      expect(findText(['😀 hit'], 'hit', { row: 0, col: 0 })).toEqual({
        row: 0,
        col: 2,
      });
    });

    it('never matches across a line break', () => {
      expect(findText(['ab', 'cd'], 'b\nc', { row: 0, col: 0 })).toBeNull();
    });
  });

  describe('countOccurrences / findAll', () => {
    it('counts non-overlapping occurrences', () => {
      expect(countOccurrences(['aaaa', 'aa a'], 'aa')).toBe(3);
      expect(countOccurrences(lines, '')).toBe(0);
    });

    it('lists every match in reading order', () => {
      expect(findAll(['aaa', 'xa'], 'a')).toEqual([
        { row: 0, col: 0 },
        { row: 0, col: 1 },
        { row: 0, col: 2 },
        { row: 1, col: 1 },
      ]);
      expect(findAll(['aaaa'], 'aa')).toEqual([
        { row: 0, col: 0 },
        { row: 0, col: 2 },
      ]);
    });
  });

  describe('replaceAll', () => {
    it('replaces every occurrence and reports the count', () => {
      const result = replaceAll(lines, 'foo', 'X');
      expect(result).toEqual({ lines: ['X bar', 'baz X', 'qux'], count: 2 });
      expect(lines[0]).toBe('foo bar');
    });

    it('treats $ in the replacement literally', () => {
      expect(replaceAll(['a-a'], 'a', '$&$1').lines).toEqual(['$&$1-$&$1']);
    });

    it('returns a zero count when nothing matches', () => {
      expect(replaceAll(lines, 'nope', 'X')).toEqual({
        lines: ['foo bar', 'baz foo', 'qux'],
        count: 0,
      });
    });
  });

  describe('replaceAt', () => {
    it('replaces only the occurrence at the given position', () => {
      expect(replaceAt(['ab ab'], { row: 0, col: 3 }, 'ab', 'xyz')).toEqual([
        'ab xyz',
      ]);
    });

    it('returns null when the search text does not start there', () => {
      expect(replaceAt(['ab ab'], { row: 0, col: 1 }, 'ab', 'x')).toBeNull();
      expect(replaceAt(['ab'], { row: 3, col: 0 }, 'ab', 'x')).toBeNull();
    });
  });
});
