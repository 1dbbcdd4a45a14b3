/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Position } from '../buffer/selection.js';
import {
  cpIndexOf,
  cpLen,
  cpSlice,
  safeLiteralReplace,
} from '../utils/textUtils.js';

/*
 * Literal, case-sensitive search over a line array. A match never spans a
 * line break; positions are in code points.
 */

export interface ReplaceAllResult {
  lines: string[];
  count: number;
}

/**
 * Finds the first match at or after `from`, scanning forward to the end of
 * the buffer and then wrapping from the top back to `from`. Returns null for
 * an empty search string or when nothing matches.
 */
export function findText(
  lines: readonly string[],
  search: string,
  from: Position,
): Position | null {
  if (search === '' || lines.length === 0) {
    return null;
  }

  const startRow = Math.min(Math.max(0, from.row), lines.length - 1);
  const startCol = Math.max(0, from.col);

  for (let row = startRow; row < lines.length; row++) {
    const col = cpIndexOf(lines[row], search, row === startRow ? startCol : 0);
    if (col !== -1) {
      return { row, col };
    }
  }

  // Wrap around: only matches strictly before the starting point.
  for (let row = 0; row <= startRow; row++) {
    const col = cpIndexOf(lines[row], search, 0);
    if (col !== -1 && (row < startRow || col < startCol)) {
      return { row, col };
    }
  }

  return null;
}

/** Counts non-overlapping occurrences across all lines. */
export function countOccurrences(
  lines: readonly string[],
  search: string,
): number {
  if (search === '') {
    return 0;
  }
  let count = 0;
  for (const line of lines) {
    count += line.split(search).length - 1;
  }
  return count;
}

/** Start positions of every non-overlapping occurrence, in reading order. */
export function findAll(lines: readonly string[], search: string): Position[] {
  const matches: Position[] = [];
  if (search === '') {
    return matches;
  }
  const searchLength = cpLen(search);
  lines.forEach((line, row) => {
    let col = cpIndexOf(line, search, 0);
    while (col !== -1) {
      matches.push({ row, col });
      col = cpIndexOf(line, search, col + searchLength);
    }
  });
  return matches;
}

/**
 * Replaces every non-overlapping occurrence, left to right. The input array
 * is not modified.
 */
export function replaceAll(
  lines: readonly string[],
  search: string,
  replacement: string,
): ReplaceAllResult {
  const count = countOccurrences(lines, search);
  if (count === 0) {
    return { lines: [...lines], count };
  }
  return {
    lines: lines.map((line) => safeLiteralReplace(line, search, replacement)),
    count,
  };
}

/**
 * Replaces the occurrence of `search` that starts at `pos`. Returns a new
 * line array, or null when `search` does not start at `pos`.
 */
export function replaceAt(
  lines: readonly string[],
  pos: Position,
  search: string,
  replacement: string,
): string[] | null {
  const line = lines[pos.row];
  if (search === '' || line === undefined) {
    return null;
  }
  const end = pos.col + cpLen(search);
  if (cpSlice(line, pos.col, end) !== search) {
    return null;
  }
  const next = [...lines];
  next[pos.row] = cpSlice(line, 0, pos.col) + replacement + cpSlice(line, end);
  return next;
}
