/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { normalizeEncodingLabel } from '../codec/encoding.js';
import {
  normalizeLineEndings,
  type LineEndingStyle,
} from '../codec/lineEndings.js';
import {
  createSettings,
  type EditorSettings,
} from '../config/settingsSchema.js';
import { readDocument, writeDocument } from '../document/documentFile.js';
import { UndoHistory } from '../history/undoHistory.js';
import * as search from '../search/textSearch.js';
import { debugLogger } from '../utils/debugLogger.js';
import { NoFilePathError } from '../utils/errors.js';
import { editorEvents } from '../utils/events.js';
import {
  cpLen,
  cpSlice,
  findMatchingBracket,
  findWordBoundaries,
  getIndexFromLineAndColumn,
  getLineAndColumnFromIndex,
  nextTabStop,
} from '../utils/textUtils.js';
import {
  clampPosition,
  isSelectionEmpty,
  normalizeSelection,
  type Position,
  type SelectionRange,
} from './selection.js';

/**
 * The editable document: a never-empty array of lines, a cursor, an optional
 * selection, bounded undo/redo history and the file it was loaded from.
 *
 * Every public method runs to completion synchronously and leaves the cursor
 * inside the buffer (`row < lineCount`, `col <= length of that row`, columns
 * in code points). Mutations checkpoint the previous state first, mark the
 * buffer modified and clear the selection.
 *
 * Settings are held by reference and read on every call, so the owner can
 * toggle e.g. `insertMode` on its object and the next `insertChar` honours
 * it.
 */
export class TextBuffer {
  private lines: string[] = [''];
  private cursorRow = 0;
  private cursorCol = 0;
  private modified = false;
  private filePath: string | null = null;
  private encoding: string;
  private bom = false;
  private lineEnding: LineEndingStyle | null = null;
  private selectionAnchor: Position | null = null;
  private selectionFocus: Position | null = null;
  private lastSearch = '';
  private lastReplace = '';
  private readonly history: UndoHistory;

  constructor(private readonly settings: EditorSettings = createSettings()) {
    this.encoding = settings.encoding;
    this.history = new UndoHistory(settings.undoLevels);
  }

  // --- State -----------------------------------------------------------------

  getLines(): string[] {
    return [...this.lines];
  }

  /** Returns '' for a row outside the buffer. */
  getLine(row: number): string {
    return this.lines[row] ?? '';
  }

  getLineCount(): number {
    return this.lines.length;
  }

  getCurrentLine(): string {
    return this.getLine(this.cursorRow);
  }

  getText(): string {
    return this.lines.join('\n');
  }

  getCursorPosition(): Position {
    return { row: this.cursorRow, col: this.cursorCol };
  }

  isModified(): boolean {
    return this.modified;
  }

  getFilePath(): string | null {
    return this.filePath;
  }

  getEncoding(): string {
    return this.encoding;
  }

  /** Changes the encoding used by the next save. */
  setEncoding(encoding: string): void {
    this.encoding = normalizeEncodingLabel(encoding);
  }

  /** Line ending found on load or written by the last save. */
  getLineEnding(): LineEndingStyle | null {
    return this.lineEnding;
  }

  hasBOM(): boolean {
    return this.bom;
  }

  getLastSearch(): string {
    return this.lastSearch;
  }

  getLastReplace(): string {
    return this.lastReplace;
  }

  // --- Editing ---------------------------------------------------------------

  /**
   * Types a single character. Insert mode shifts the rest of the line right;
   * overwrite mode replaces the character under the cursor, or appends at
   * the end of the line.
   */
  insertChar(char: string): void {
    this.checkpoint();
    const line = this.getCurrentLine();
    const before = cpSlice(line, 0, this.cursorCol);

    const rest = this.settings.insertMode
      ? cpSlice(line, this.cursorCol)
      : cpSlice(line, this.cursorCol + 1);
    this.lines[this.cursorRow] = before + char + rest;
    this.cursorCol += cpLen(char);
    this.markModified();
  }

  insertNewline(): void {
    this.checkpoint();
    const line = this.getCurrentLine();
    this.lines.splice(
      this.cursorRow,
      1,
      cpSlice(line, 0, this.cursorCol),
      cpSlice(line, this.cursorCol),
    );
    this.cursorRow++;
    this.cursorCol = 0;
    this.markModified();
  }

  /**
   * Forward delete. At the end of a line the next line is joined onto this
   * one. At the very end of the buffer nothing changes and no undo step is
   * recorded.
   */
  deleteChar(): void {
    const line = this.getCurrentLine();
    const lineLength = cpLen(line);
    const isLastRow = this.cursorRow === this.lines.length - 1;
    if (this.cursorCol >= lineLength && isLastRow) {
      return;
    }

    this.checkpoint();
    if (this.cursorCol < lineLength) {
      this.lines[this.cursorRow] =
        cpSlice(line, 0, this.cursorCol) + cpSlice(line, this.cursorCol + 1);
    } else {
      const nextLine = this.lines[this.cursorRow + 1];
      this.lines.splice(this.cursorRow, 2, line + nextLine);
    }
    this.markModified();
  }

  /** Steps the cursor back one position, then deletes forward. */
  backspace(): void {
    if (this.cursorCol > 0) {
      this.cursorCol--;
    } else if (this.cursorRow > 0) {
      this.cursorRow--;
      this.cursorCol = cpLen(this.getCurrentLine());
    } else {
      return;
    }
    this.deleteChar();
  }

  /**
   * Inserts text that may span several lines at the cursor, replacing the
   * selection if there is one. Recorded as a single undo step.
   */
  insertText(text: string): void {
    if (text === '' && !this.hasSelection()) {
      return;
    }
    this.checkpoint();
    const range = this.hasSelection() ? this.getSelection() : null;
    const cursor = this.getCursorPosition();
    this.replaceRange(range?.start ?? cursor, range?.end ?? cursor, text);
    this.markModified();
  }

  /** Replaces the whole document, keeping the path and encoding. */
  setText(text: string): void {
    this.checkpoint();
    const lastRow = this.lines.length - 1;
    this.replaceRange(
      { row: 0, col: 0 },
      { row: lastRow, col: cpLen(this.lines[lastRow]) },
      text,
    );
    this.markModified();
  }

  /**
   * Inserts spaces up to the next tab stop when `useSpaces` is set,
   * otherwise a tab character.
   */
  insertTab(): void {
    if (!this.settings.useSpaces) {
      this.insertText('\t');
      return;
    }
    const range = this.hasSelection() ? this.getSelection() : null;
    const col = range ? range.start.col : this.cursorCol;
    this.insertText(' '.repeat(nextTabStop(col, this.settings.tabSize) - col));
  }

  // --- Navigation ------------------------------------------------------------

  /**
   * Relative motion. Moving left past column 0 wraps to the end of the
   * previous line and moving right past the end wraps to the start of the
   * next one. Rows beyond either end of the buffer clamp to the first line's
   * start or the last line's end. Vertical moves clamp the column to the
   * target line instead of wrapping.
   */
  moveCursor(deltaRow: number, deltaCol: number): void {
    let row = this.cursorRow + deltaRow;
    let col = this.cursorCol + deltaCol;
    const lastRow = this.lines.length - 1;

    if (row < 0) {
      row = 0;
      col = 0;
    } else if (row > lastRow) {
      row = lastRow;
      col = cpLen(this.getLine(row));
    } else if (deltaRow === 0) {
      const lineLength = cpLen(this.getLine(row));
      if (col < 0) {
        if (row > 0) {
          row--;
          col = cpLen(this.getLine(row));
        } else {
          col = 0;
        }
      } else if (col > lineLength) {
        if (row < lastRow) {
          row++;
          col = 0;
        } else {
          col = lineLength;
        }
      }
    }

    this.setCursorPosition(row, col);
  }

  setCursorPosition(row: number, col: number): void {
    const pos = clampPosition(this.lines, { row, col });
    this.cursorRow = pos.row;
    this.cursorCol = pos.col;
  }

  /** Jumps to the start of a 1-based line number, clamped to the buffer. */
  gotoLine(lineNumber: number): void {
    this.setCursorPosition(lineNumber - 1, 0);
  }

  moveToLineStart(): void {
    this.cursorCol = 0;
  }

  moveToLineEnd(): void {
    this.cursorCol = cpLen(this.getCurrentLine());
  }

  /** The word under (or just before) the cursor, or '' if there is none. */
  getWordAtCursor(): string {
    const line = this.getCurrentLine();
    const lineLength = cpLen(line);
    const pos =
      this.cursorCol === lineLength && lineLength > 0
        ? this.cursorCol - 1
        : this.cursorCol;
    const [start, end] = findWordBoundaries(line, pos);
    return cpSlice(line, start, end);
  }

  /**
   * Position of the bracket matching the one under the cursor, searching
   * across lines. Null if the cursor is not on a bracket or it is unmatched.
   */
  findMatchingBracket(): Position | null {
    const text = this.getText();
    const index = getIndexFromLineAndColumn(
      text,
      this.cursorRow,
      this.cursorCol,
    );
    const match = findMatchingBracket(text, index);
    if (match === null) {
      return null;
    }
    const [row, col] = getLineAndColumnFromIndex(text, match);
    return { row, col };
  }

  // --- Selection -------------------------------------------------------------

  /** Anchors are clamped into the buffer and kept in the order given. */
  setSelection(start: Position, end: Position): void {
    this.selectionAnchor = clampPosition(this.lines, start);
    this.selectionFocus = clampPosition(this.lines, end);
  }

  /** The selection in reading order, or null if none is set. */
  getSelection(): SelectionRange | null {
    if (!this.selectionAnchor || !this.selectionFocus) {
      return null;
    }
    return normalizeSelection(this.selectionAnchor, this.selectionFocus);
  }

  hasSelection(): boolean {
    const range = this.getSelection();
    return range !== null && !isSelectionEmpty(range);
  }

  clearSelection(): void {
    this.selectionAnchor = null;
    this.selectionFocus = null;
  }

  selectAll(): void {
    const lastRow = this.lines.length - 1;
    const end = { row: lastRow, col: cpLen(this.lines[lastRow]) };
    this.setSelection({ row: 0, col: 0 }, end);
    this.cursorRow = end.row;
    this.cursorCol = end.col;
  }

  /** Selected text with line breaks as '\n'; '' without a selection. */
  getSelectedText(): string {
    const range = this.getSelection();
    if (!range) {
      return '';
    }
    const { start, end } = range;
    if (start.row === end.row) {
      return cpSlice(this.getLine(start.row), start.col, end.col);
    }

    const parts = [cpSlice(this.getLine(start.row), start.col)];
    for (let row = start.row + 1; row < end.row; row++) {
      parts.push(this.getLine(row));
    }
    parts.push(cpSlice(this.getLine(end.row), 0, end.col));
    return parts.join('\n');
  }

  /**
   * Removes the selected text, leaving the cursor at the selection start.
   * @returns Whether anything was deleted.
   */
  deleteSelectedText(): boolean {
    const range = this.getSelection();
    if (!range || isSelectionEmpty(range)) {
      this.clearSelection();
      return false;
    }
    this.checkpoint();
    this.replaceRange(range.start, range.end, '');
    this.markModified();
    return true;
  }

  // --- Search ----------------------------------------------------------------

  /**
   * First occurrence at or after `fromPos` (default: the cursor), wrapping
   * around to the top of the buffer. Does not move the cursor.
   */
  findText(searchText: string, fromPos?: Position): Position | null {
    this.lastSearch = searchText;
    return search.findText(
      this.lines,
      searchText,
      fromPos ?? this.getCursorPosition(),
    );
  }

  /**
   * Replaces every occurrence (`all`) or the next one from the cursor.
   * A single replacement leaves the cursor after the inserted text.
   * @returns The number of replacements made.
   */
  replaceText(searchText: string, replacement: string, all: boolean): number {
    this.lastSearch = searchText;
    this.lastReplace = replacement;
    if (searchText === '') {
      return 0;
    }

    if (all) {
      const result = search.replaceAll(this.lines, searchText, replacement);
      if (result.count === 0) {
        return 0;
      }
      this.checkpoint();
      this.lines = result.lines;
      this.setCursorPosition(this.cursorRow, this.cursorCol);
      this.markModified();
      return result.count;
    }

    const pos = this.findText(searchText);
    if (!pos) {
      return 0;
    }
    const next = search.replaceAt(this.lines, pos, searchText, replacement);
    if (!next) {
      return 0;
    }
    this.checkpoint();
    this.lines = next;
    this.setCursorPosition(pos.row, pos.col + cpLen(replacement));
    this.markModified();
    return 1;
  }

  // --- History ---------------------------------------------------------------

  canUndo(): boolean {
    return this.history.canUndo;
  }

  canRedo(): boolean {
    return this.history.canRedo;
  }

  /** @returns false if there was nothing to undo. */
  undo(): boolean {
    const entry = this.history.undo(this.lines, this.getCursorPosition());
    if (!entry) {
      return false;
    }
    this.restore(entry.lines, entry.cursorRow, entry.cursorCol);
    return true;
  }

  /** @returns false if there was nothing to redo. */
  redo(): boolean {
    const entry = this.history.redo(this.lines, this.getCursorPosition());
    if (!entry) {
      return false;
    }
    this.restore(entry.lines, entry.cursorRow, entry.cursorCol);
    return true;
  }

  // --- Files -----------------------------------------------------------------

  /**
   * Replaces the buffer with a file's contents. History and selection are
   * discarded and the buffer is unmodified afterwards.
   *
   * @throws FileNotFoundError if the path does not exist.
   */
  load(filePath: string, encodingHint?: string): void {
    const doc = readDocument(filePath, encodingHint, this.settings.encoding);

    this.lines = doc.lines;
    this.filePath = filePath;
    this.encoding = doc.encoding;
    this.bom = doc.hasBOM;
    this.lineEnding = doc.lineEnding;
    this.cursorRow = 0;
    this.cursorCol = 0;
    this.modified = false;
    this.clearSelection();
    this.history.clear();

    debugLogger.debug(
      `Loaded ${filePath} (${doc.encoding}, ${doc.lines.length} lines)`,
    );
    editorEvents.emitDocumentLoaded({
      filePath,
      encoding: doc.encoding,
      lineCount: doc.lines.length,
    });
  }

  /**
   * Writes the buffer to `filePath`, or to the current path. The buffer's
   * encoding and BOM are kept; the line ending comes from the settings.
   *
   * @throws NoFilePathError if there is no path to save to.
   * @throws EncodingError if the encoding cannot represent the text. The
   * file on disk is left untouched.
   */
  save(filePath?: string): void {
    const target = filePath ?? this.filePath;
    if (target === null) {
      throw new NoFilePathError();
    }

    const lineEnding = this.settings.lineEnding;
    const byteLength = writeDocument(target, this.lines, {
      encoding: this.encoding,
      lineEnding,
      bom: this.bom,
      backup: this.settings.createBackup,
    });

    this.filePath = target;
    this.lineEnding = lineEnding;
    this.modified = false;

    debugLogger.debug(
      `Saved ${target} (${this.encoding}, ${byteLength} bytes)`,
    );
    editorEvents.emitDocumentSaved({
      filePath: target,
      encoding: this.encoding,
      lineEnding,
      byteLength,
    });
  }

  /** Resets to a single empty line, optionally associated with `filePath`. */
  newFile(filePath?: string): void {
    this.lines = [''];
    this.cursorRow = 0;
    this.cursorCol = 0;
    this.filePath = filePath ?? null;
    this.encoding = this.settings.encoding;
    this.bom = false;
    this.lineEnding = null;
    this.modified = false;
    this.clearSelection();
    this.history.clear();
  }

  // --- Internals -------------------------------------------------------------

  private checkpoint(): void {
    this.history.capacity = this.settings.undoLevels;
    this.history.checkpoint(this.lines, this.getCursorPosition());
  }

  private markModified(): void {
    this.modified = true;
    this.clearSelection();
  }

  private restore(lines: readonly string[], row: number, col: number): void {
    this.lines = lines.length > 0 ? [...lines] : [''];
    this.setCursorPosition(row, col);
    this.markModified();
  }

  /**
   * Replaces the text between two in-buffer positions (start before end)
   * and leaves the cursor at the end of the inserted text.
   */
  private replaceRange(start: Position, end: Position, text: string): void {
    const prefix = cpSlice(this.getLine(start.row), 0, start.col);
    const suffix = cpSlice(this.getLine(end.row), end.col);
    const parts = normalizeLineEndings(text).split('\n');
    const lastPart = parts[parts.length - 1];

    const replacement = [...parts];
    replacement[0] = prefix + replacement[0];
    replacement[replacement.length - 1] += suffix;
    this.lines.splice(start.row, end.row - start.row + 1, ...replacement);

    this.cursorRow = start.row + parts.length - 1;
    this.cursorCol = (parts.length > 1 ? 0 : start.col) + cpLen(lastPart);
  }
}
