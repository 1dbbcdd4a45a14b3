/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import {
  DEFAULT_ENCODING,
  isSupportedEncoding,
  normalizeEncodingLabel,
} from '../codec/encoding.js';
import {
  DEFAULT_LINE_ENDING,
  LINE_ENDING_STYLES,
} from '../codec/lineEndings.js';
import { DEFAULT_HISTORY_LIMIT } from '../history/undoHistory.js';

/**
 * Every user-tunable editor setting. Keys are validated one at a time when a
 * settings file is loaded, so a bad value only costs that one key.
 */
export const editorSettingsSchema = z.object({
  showLineNumbers: z.boolean().describe('Show the line number gutter'),
  showStatusBar: z.boolean().describe('Show the status bar'),
  showScrollbar: z.boolean().describe('Show the vertical scrollbar'),
  tabSize: z
    .number()
    .int()
    .min(1)
    .max(16)
    .describe('Width of a tab stop in columns'),
  useSpaces: z.boolean().describe('Insert spaces instead of a tab character'),
  lineEnding: z
    .enum(LINE_ENDING_STYLES)
    .describe('Line ending written on save'),
  encoding: z
    .string()
    .transform(normalizeEncodingLabel)
    .refine(isSupportedEncoding, { message: 'Unsupported encoding' })
    .describe('Encoding for new files and the default when loading'),
  insertMode: z
    .boolean()
    .describe('Insert (true) or overwrite (false) typed characters'),
  wrapLines: z.boolean().describe('Soft-wrap long lines'),
  retroColors: z.boolean().describe('Use the classic blue colour scheme'),
  blackBackground: z.boolean().describe('Use a black background'),
  undoLevels: z
    .number()
    .int()
    .positive()
    .describe('Maximum number of undo steps kept'),
  createBackup: z
    .boolean()
    .describe('Copy the previous file to <name>.bak before saving'),
});

export type EditorSettings = z.infer<typeof editorSettingsSchema>;

export const DEFAULT_SETTINGS: Readonly<EditorSettings> = Object.freeze({
  showLineNumbers: true,
  showStatusBar: true,
  showScrollbar: true,
  tabSize: 4,
  useSpaces: true,
  lineEnding: DEFAULT_LINE_ENDING,
  encoding: DEFAULT_ENCODING,
  insertMode: true,
  wrapLines: false,
  retroColors: true,
  blackBackground: true,
  undoLevels: DEFAULT_HISTORY_LIMIT,
  createBackup: false,
});

/** Returns a fresh, mutable settings object. */
export function createSettings(
  overrides: Partial<EditorSettings> = {},
): EditorSettings {
  return { ...DEFAULT_SETTINGS, ...overrides };
}
