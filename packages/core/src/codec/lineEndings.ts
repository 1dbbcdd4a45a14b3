/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const LINE_ENDING_STYLES = ['CR', 'LF', 'CRLF'] as const;

export type LineEndingStyle = (typeof LINE_ENDING_STYLES)[number];

export const DEFAULT_LINE_ENDING: LineEndingStyle = 'CRLF';

const LINE_ENDING_CHARS: Record<LineEndingStyle, string> = {
  CR: '\r',
  LF: '\n',
  CRLF: '\r\n',
};

export function getLineEndingChars(style: LineEndingStyle): string {
  return LINE_ENDING_CHARS[style];
}

/** Converts every `\r\n` and bare `\r` to `\n`. */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Normalizes all line breaks, then re-expands them to `style`.
 */
export function applyLineEnding(text: string, style: LineEndingStyle): string {
  const normalized = normalizeLineEndings(text);
  return style === 'LF'
    ? normalized
    : normalized.replace(/\n/g, getLineEndingChars(style));
}

/**
 * Detects the majority line ending over the first 1000 line breaks.
 * Returns null for text without any line break.
 */
export function detectLineEnding(text: string): LineEndingStyle | null {
  let crlfCount = 0;
  let lfCount = 0;
  let crCount = 0;
  let linesSeen = 0;

  for (let i = 0; i < text.length && linesSeen < 1000; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 13) {
      if (i + 1 < text.length && text.charCodeAt(i + 1) === 10) {
        crlfCount++;
        i++;
      } else {
        crCount++;
      }
      linesSeen++;
    } else if (ch === 10) {
      lfCount++;
      linesSeen++;
    }
  }

  if (linesSeen === 0) return null;
  if (crlfCount >= lfCount && crlfCount >= crCount) return 'CRLF';
  if (crCount > lfCount) return 'CR';
  return 'LF';
}

/**
 * Splits decoded file content into buffer lines. A single trailing line
 * break does not start an extra line, and the result is never empty.
 */
export function splitLines(text: string): string[] {
  const lines = normalizeLineEndings(text).split('\n');
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
