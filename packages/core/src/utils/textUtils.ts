/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { LRUCache } from 'mnemonist';

/*
 * -------------------------------------------------------------------------
 *  Unicode‑aware helpers (work at the code‑point level rather than UTF‑16
 *  code units so that surrogate‑pair emoji count as one column.)
 * ---------------------------------------------------------------------- */

const LRU_CODE_POINT_CACHE_LIMIT = 20000;
const MAX_STRING_LENGTH_TO_CACHE = 1000;
const codePointsCache = new LRUCache<string, string[]>(
  LRU_CODE_POINT_CACHE_LIMIT,
);

/**
 * Checks if a string contains only ASCII characters (0-127).
 */
export function isAscii(str: string): boolean {
  for (let i = 0; i < str.length; i++) {
    if (str.charCodeAt(i) > 127) {
      return false;
    }
  }
  return true;
}

export function toCodePoints(str: string): string[] {
  // ASCII fast path
  if (isAscii(str)) {
    return str.split('');
  }

  if (str.length <= MAX_STRING_LENGTH_TO_CACHE) {
    const cached = codePointsCache.get(str);
    if (cached !== undefined) {
      return cached;
    }
  }

  const result = Array.from(str);

  if (str.length <= MAX_STRING_LENGTH_TO_CACHE) {
    codePointsCache.set(str, result);
  }

  return result;
}

export function cpLen(str: string): number {
  if (isAscii(str)) {
    return str.length;
  }
  return toCodePoints(str).length;
}

export function cpSlice(str: string, start: number, end?: number): string {
  if (isAscii(str)) {
    return str.slice(start, end);
  }
  return toCodePoints(str).slice(start, end).join('');
}

/**
 * Converts a code point index to a UTF-16 code unit offset.
 */
export function cpIndexToOffset(str: string, cpIndex: number): number {
  return cpSlice(str, 0, cpIndex).length;
}

/**
 * `indexOf` in code point units: finds `search` in `str` at or after the code
 * point index `fromCp`. Returns -1 when absent.
 */
export function cpIndexOf(str: string, search: string, fromCp = 0): number {
  if (isAscii(str)) {
    return str.indexOf(search, fromCp);
  }
  const idx = str.indexOf(search, cpIndexToOffset(str, fromCp));
  return idx === -1 ? -1 : cpLen(str.slice(0, idx));
}

/**
 * Replaces every occurrence of `oldString` with the literal `newString`,
 * escaping `$` so replacement patterns such as `$&` are not interpreted.
 */
export function safeLiteralReplace(
  str: string,
  oldString: string,
  newString: string,
): string {
  if (oldString === '' || !str.includes(oldString)) {
    return str;
  }

  if (!newString.includes('$')) {
    return str.replaceAll(oldString, newString);
  }

  const escapedNewString = newString.replaceAll('$', '$$$$');
  return str.replaceAll(oldString, escapedNewString);
}

/* -------------------------------------------------------------------------
 *  Indentation helpers
 * ---------------------------------------------------------------------- */

export function countLeadingWhitespace(line: string): number {
  let count = 0;
  for (const char of line) {
    if (char !== ' ' && char !== '\t') break;
    count++;
  }
  return count;
}

/**
 * Returns the leading indentation of a line with tabs expanded to
 * `tabSize` spaces.
 */
export function getIndentation(line: string, tabSize: number): string {
  let indent = '';
  for (const char of line) {
    if (char === ' ') {
      indent += ' ';
    } else if (char === '\t') {
      indent += ' '.repeat(tabSize);
    } else {
      break;
    }
  }
  return indent;
}

/** Column of the first tab stop strictly after `col`. */
export function nextTabStop(col: number, tabSize: number): number {
  const size = Math.max(1, tabSize);
  return (Math.floor(col / size) + 1) * size;
}

/* -------------------------------------------------------------------------
 *  Words and brackets
 * ---------------------------------------------------------------------- */

// Any Unicode letter, any Unicode number, or an underscore
export const isWordChar = (char: string): boolean =>
  /[\w\p{L}\p{N}]/u.test(char);

/**
 * Finds the word surrounding code point `pos`. Returns `[start, end)`;
 * both equal `pos` when it is out of range or not inside a word.
 */
export function findWordBoundaries(
  text: string,
  pos: number,
): [number, number] {
  const chars = toCodePoints(text);
  if (pos < 0 || pos >= chars.length) {
    return [pos, pos];
  }

  let start = pos;
  while (start > 0 && isWordChar(chars[start - 1])) {
    start--;
  }
  let end = pos;
  while (end < chars.length && isWordChar(chars[end])) {
    end++;
  }
  return [start, end];
}

const OPENING_BRACKETS: Record<string, string> = {
  '(': ')',
  '[': ']',
  '{': '}',
};
const CLOSING_BRACKETS: Record<string, string> = {
  ')': '(',
  ']': '[',
  '}': '{',
};

/**
 * Finds the bracket matching the one at code point `pos`, honouring nesting.
 * Returns null when `pos` is not on a bracket or the bracket is unbalanced.
 */
export function findMatchingBracket(text: string, pos: number): number | null {
  const chars = toCodePoints(text);
  if (pos < 0 || pos >= chars.length) {
    return null;
  }

  const char = chars[pos];
  const closing = OPENING_BRACKETS[char];
  const opening = CLOSING_BRACKETS[char];
  const target = closing ?? opening;
  if (target === undefined) {
    return null;
  }
  const step = closing !== undefined ? 1 : -1;

  let depth = 1;
  for (let i = pos + step; i >= 0 && i < chars.length; i += step) {
    if (chars[i] === char) {
      depth++;
    } else if (chars[i] === target) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return null;
}

/* -------------------------------------------------------------------------
 *  Offset <-> (line, column) conversion over '\n'-separated text
 * ---------------------------------------------------------------------- */

export function getLineAndColumnFromIndex(
  text: string,
  index: number,
): [number, number] {
  const chars = toCodePoints(text);
  if (index < 0 || index > chars.length) {
    return [0, 0];
  }

  let line = 0;
  let lineStart = 0;
  for (let i = 0; i < index; i++) {
    if (chars[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return [line, index - lineStart];
}

/**
 * Inverse of getLineAndColumnFromIndex. The column is clamped to the line's
 * length; a line past the end maps to the end of the text.
 */
export function getIndexFromLineAndColumn(
  text: string,
  line: number,
  column: number,
): number {
  const lines = text.split('\n');
  if (line < 0 || line >= lines.length) {
    return cpLen(text);
  }

  let index = 0;
  for (let i = 0; i < line; i++) {
    index += cpLen(lines[i]) + 1;
  }
  return index + Math.min(Math.max(column, 0), cpLen(lines[line]));
}
