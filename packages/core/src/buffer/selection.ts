/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { cpLen } from '../utils/textUtils.js';

/** Zero-based insertion point; `col` counts code points. */
export interface Position {
  row: number;
  col: number;
}

export interface SelectionRange {
  start: Position;
  end: Position;
}

/** Negative when `a` precedes `b` in reading order, 0 when equal. */
export function comparePositions(a: Position, b: Position): number {
  if (a.row !== b.row) {
    return a.row - b.row;
  }
  return a.col - b.col;
}

/**
 * Orders two anchors so that `start` precedes `end`. Anchors arrive in the
 * order the user dragged them.
 */
export function normalizeSelection(
  anchor: Position,
  focus: Position,
): SelectionRange {
  return comparePositions(anchor, focus) <= 0
    ? { start: { ...anchor }, end: { ...focus } }
    : { start: { ...focus }, end: { ...anchor } };
}

export function isSelectionEmpty(range: SelectionRange): boolean {
  return comparePositions(range.start, range.end) === 0;
}

/**
 * Clamps a position into `lines`: the row to `[0, lines.length - 1]`, then
 * the column to `[0, length of that row]`.
 */
export function clampPosition(
  lines: readonly string[],
  pos: Position,
): Position {
  const lastRow = Math.max(0, lines.length - 1);
  const row = Math.min(Math.max(0, Math.trunc(pos.row) || 0), lastRow);
  const lineLength = cpLen(lines[row] ?? '');
  const col = Math.min(Math.max(0, Math.trunc(pos.col) || 0), lineLength);
  return { row, col };
}
