/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Bounded undo/redo stacks of whole-buffer snapshots.
 *
 * Every checkpoint copies the full line array. Depth is capped, so memory
 * stays proportional to `capacity` times the document size.
 *
 * Push behavior:
 * 1. A checkpoint copies the lines and cursor and freezes the copy.
 * 2. The redo stack is cleared.
 * 3. The oldest entry is dropped once the stack exceeds `capacity`.
 */

import type { Position } from '../buffer/selection.js';

export interface HistoryEntry {
  readonly lines: readonly string[];
  readonly cursorRow: number;
  readonly cursorCol: number;
}

export const DEFAULT_HISTORY_LIMIT = 50;

function createEntry(
  lines: readonly string[],
  cursor: Position,
): HistoryEntry {
  return Object.freeze({
    lines: Object.freeze([...lines]),
    cursorRow: cursor.row,
    cursorCol: cursor.col,
  });
}

export class UndoHistory {
  private undoStack: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];
  private _capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_LIMIT) {
    this._capacity = Math.max(1, Math.floor(capacity));
  }

  get capacity(): number {
    return this._capacity;
  }

  /** Changing the capacity evicts the oldest entries that no longer fit. */
  set capacity(value: number) {
    this._capacity = Math.max(1, Math.floor(value));
    this.trim(this.undoStack);
    this.trim(this.redoStack);
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  /**
   * Records the state as it is before a mutation.
   */
  checkpoint(lines: readonly string[], cursor: Position): void {
    this.undoStack.push(createEntry(lines, cursor));
    this.trim(this.undoStack);
    this.redoStack = [];
  }

  /**
   * Pops the most recent checkpoint, saving the current state for redo.
   * @returns The state to restore, or null if there is nothing to undo.
   */
  undo(
    currentLines: readonly string[],
    currentCursor: Position,
  ): HistoryEntry | null {
    const entry = this.undoStack.pop();
    if (!entry) return null;

    this.redoStack.push(createEntry(currentLines, currentCursor));
    this.trim(this.redoStack);
    return entry;
  }

  /**
   * Pops the most recently undone state, saving the current state for undo.
   * @returns The state to restore, or null if there is nothing to redo.
   */
  redo(
    currentLines: readonly string[],
    currentCursor: Position,
  ): HistoryEntry | null {
    const entry = this.redoStack.pop();
    if (!entry) return null;

    this.undoStack.push(createEntry(currentLines, currentCursor));
    this.trim(this.undoStack);
    return entry;
  }

  /** Clear all history. */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }

  private trim(stack: HistoryEntry[]): void {
    if (stack.length > this._capacity) {
      stack.splice(0, stack.length - this._capacity);
    }
  }
}
